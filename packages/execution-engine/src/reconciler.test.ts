import { describe, expect, it, vi } from "vitest";
import {
	ReconciliationMismatch,
	type AlertSink,
	type ModuleLogger,
} from "@tradeloop/core";
import { DirectGateway } from "@tradeloop/gateway";
import { StrategyStateMachine } from "@tradeloop/strategy-engine";
import { PaperExchange } from "./paperExchange";
import { PositionReconciler } from "./reconciler";

const SYMBOL = "ETH/USD:USD";

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const machine = () =>
	new StrategyStateMachine(
		{
			id: "stub",
			indicators: [],
			requiredColumns: [],
			partialStyle: "inferred",
			usesTrailingStop: true,
			shouldEnterLong: () => null,
			shouldEnterShort: () => null,
			shouldExit: () => null,
			shouldPartialExit: () => null,
			initialLevels: () => ({ trailingStop: null, takeProfit: null }),
			trailCandidate: () => null,
		},
		{
			symbol: SYMBOL,
			tradeMode: "both",
			allowFlip: false,
			partialExits: false,
			logger: silentLogger(),
		}
	);

describe("PositionReconciler", () => {
	it("restores a position left open by a previous run", async () => {
		const paper = new PaperExchange({ logger: silentLogger() });
		paper.setMarkPrice(SYMBOL, 2_000);
		await paper.createMarketOrder(SYMBOL, "sell", 4);
		const alerts: AlertSink = { notify: vi.fn(async () => undefined) };
		const reconciler = new PositionReconciler({
			symbol: SYMBOL,
			client: paper,
			gateway: new DirectGateway(),
			alerts,
			logger: silentLogger(),
			now: () => 42,
		});
		const strategy = machine();

		const outcome = await reconciler.reconcile(strategy);
		expect(outcome.exchange).toMatchObject({ side: "SHORT", size: 4, entryPrice: 2_000 });
		expect(outcome.mismatch).toBeInstanceOf(ReconciliationMismatch);
		expect(strategy.state()).toMatchObject({
			direction: "SHORT",
			remainingQuantity: 4,
			trailingStop: 2_000,
			takeProfit: null,
		});
		expect(alerts.notify).toHaveBeenCalledWith(
			expect.objectContaining({
				kind: "status",
				key: `${SYMBOL}:reconcile`,
				timestamp: 42,
			})
		);
	});

	it("stays quiet when both sides agree on flat", async () => {
		const paper = new PaperExchange({ logger: silentLogger() });
		const alerts: AlertSink = { notify: vi.fn(async () => undefined) };
		const reconciler = new PositionReconciler({
			symbol: SYMBOL,
			client: paper,
			gateway: new DirectGateway(),
			alerts,
			logger: silentLogger(),
		});

		const outcome = await reconciler.reconcile(machine());
		expect(outcome.mismatch).toBeNull();
		expect(alerts.notify).not.toHaveBeenCalled();
	});
});

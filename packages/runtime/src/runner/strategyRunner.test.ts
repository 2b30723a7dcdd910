import { describe, expect, it, vi } from "vitest";
import {
	APIError,
	ExchangeRequestError,
	ReconciliationMismatch,
	type Candle,
	type ExecutionClient,
	type ModuleLogger,
	type StrategyConfig,
} from "@tradeloop/core";
import {
	OrderExecutor,
	PaperExchange,
	PositionReconciler,
} from "@tradeloop/execution-engine";
import { DirectGateway } from "@tradeloop/gateway";
import { PositionSizer } from "@tradeloop/risk-engine";
import { createStrategy } from "@tradeloop/strategy-engine";
import type { CandleFeed } from "../marketData/candleFeed";
import { nextTickDelay } from "./cooldown";
import { StrategyRunner } from "./strategyRunner";

const SYMBOL = "BTC/USD:USD";
const HOUR = 3_600_000;

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const candlesFrom = (closes: number[]): Candle[] =>
	closes.map((close, index) => ({
		symbol: SYMBOL,
		timeframe: "1h",
		timestamp: index * HOUR,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	}));

const strategyConfig: StrategyConfig = {
	id: "ema_cross",
	profile: "ema-cross",
	symbol: SYMBOL,
	assetId: "BTCUSD",
	timeframe: "1h",
	baseTimeframe: "1h",
	candleType: "standard",
	tradeMode: "both",
	allowFlip: false,
	historyCandles: 50,
	params: { fastLength: 2, slowLength: 3 },
};

const sizer = () =>
	new PositionSizer({
		targetMargin: 100,
		leverage: 5,
		contractValue: 0.001,
		enablePartialExits: false,
	});

const createHarness = (closes: number[], options: { client?: ExecutionClient } = {}) => {
	const logger = silentLogger();
	let candles = candlesFrom(closes);
	const feed: CandleFeed = { load: vi.fn(async () => candles) };
	const paper = new PaperExchange({ logger, contractValue: 0.001 });
	const client = options.client ?? paper;
	const gateway = new DirectGateway();
	const strategy = createStrategy(strategyConfig, { partialExits: false, logger });
	const reconciler = new PositionReconciler({ symbol: SYMBOL, client, gateway, logger });
	const executor = new OrderExecutor({
		symbol: SYMBOL,
		strategyId: strategy.id,
		client,
		gateway,
		sizer: sizer(),
		partialExitPct: 0.5,
		reconciler,
		logger,
		now: () => 0,
	});
	const runner = new StrategyRunner({
		series: { symbol: SYMBOL, baseTimeframe: "1h", timeframe: "1h", candleType: "standard" },
		feed,
		strategy,
		executor,
		reconciler,
		paper,
		logger,
	});
	return {
		runner,
		strategy,
		paper,
		feed,
		setCandles: (next: number[]) => {
			candles = candlesFrom(next);
		},
	};
};

// ema2/ema3 cross up on the close at index 4 and back down at index 5.
const ENTRY_CLOSES = [10, 10, 10, 10, 20, 21];
const ENTRY_NOW = 5 * HOUR + 60_000;

describe("StrategyRunner", () => {
	it("evaluates the closed candle and fills at the live price", async () => {
		const { runner, strategy, paper } = createHarness(ENTRY_CLOSES);

		const outcome = await runner.tick(ENTRY_NOW);

		expect(outcome.signal).toMatchObject({
			action: "ENTER_LONG",
			closedIndex: 4,
			timestamp: 4 * HOUR,
			price: 20,
		});
		expect(outcome.orderResult).toMatchObject({
			status: "filled",
			filledPrice: 21,
			openedQuantity: 25_000,
		});
		expect(outcome.livePrice).toBe(21);
		expect(outcome.error).toBeUndefined();
		expect(strategy.state()).toMatchObject({ direction: "LONG", entryPrice: 21 });
		expect(await paper.getPosition(SYMBOL)).toMatchObject({ side: "LONG", size: 25_000 });
	});

	it("acts on a closed candle once", async () => {
		const { runner, paper } = createHarness(ENTRY_CLOSES);
		await runner.tick(ENTRY_NOW);

		const again = await runner.tick(ENTRY_NOW + 60_000);

		expect(again.signal).toMatchObject({
			action: "NONE",
			reason: "candle_already_evaluated",
			closedIndex: 4,
		});
		expect(again.orderResult).toBeUndefined();
		expect((await paper.getPosition(SYMBOL)).size).toBe(25_000);
	});

	it("exits on the next closed candle", async () => {
		const { runner, strategy, paper, setCandles } = createHarness(ENTRY_CLOSES);
		await runner.tick(ENTRY_NOW);

		setCandles([10, 10, 10, 10, 20, 5, 6]);
		const outcome = await runner.tick(6 * HOUR + 60_000);

		expect(outcome.signal).toMatchObject({ action: "EXIT_LONG", closedIndex: 5, price: 5 });
		expect(outcome.orderResult).toMatchObject({ status: "filled", closedQuantity: 25_000 });
		expect(strategy.state().direction).toBe("FLAT");
		expect((await paper.getPosition(SYMBOL)).side).toBe("FLAT");
	});

	it("waits when no candle has closed yet", async () => {
		const { runner } = createHarness([10]);

		const outcome = await runner.tick(30 * 60_000);

		expect(outcome.signal.reason).toBe("no_closed_candle");
		expect(outcome.livePrice).toBe(10);
	});

	it("fails the tick, not the process, when candles cannot be loaded", async () => {
		const { runner, feed } = createHarness(ENTRY_CLOSES);
		const failure = new APIError("fetch_candles failed with status 503: busy", {
			label: "fetch_candles",
			status: 503,
			attempts: 5,
			overloaded: true,
		});
		vi.mocked(feed.load).mockRejectedValueOnce(failure);

		const outcome = await runner.tick(ENTRY_NOW);

		expect(outcome.signal.reason).toBe("tick_failed");
		expect(outcome.error?.cause).toBe(failure);
		expect(outcome.error?.reason).toBe(
			"BTC/USD:USD load_candles failed: fetch_candles failed with status 503: busy (status 503, 5 attempts)"
		);
		expect(nextTickDelay(outcome, { intervalMs: 60_000, rateLimitWindowMs: 300_000 })).toEqual({
			kind: "overloaded",
			delayMs: 300_000,
		});
	});

	it("evaluates a candle again after its order failed", async () => {
		const paper = new PaperExchange({ logger: silentLogger(), contractValue: 0.001 });
		let rejectNext = true;
		const client: ExecutionClient = {
			createMarketOrder: async (symbol, side, amount, options) => {
				if (rejectNext) {
					rejectNext = false;
					throw new ExchangeRequestError("invalid api key", { status: 401, kind: "http" });
				}
				return paper.createMarketOrder(symbol, side, amount, options);
			},
			getPosition: (symbol) => paper.getPosition(symbol),
			setLeverage: (symbol, leverage) => paper.setLeverage(symbol, leverage),
		};
		const harness = createHarness(ENTRY_CLOSES, { client });
		paper.setMarkPrice(SYMBOL, 21);

		const failed = await harness.runner.tick(ENTRY_NOW);
		expect(failed.orderResult?.status).toBe("failed");
		expect(failed.error?.reason).toBe("BTC/USD:USD ENTER_LONG failed: invalid api key");
		expect(nextTickDelay(failed, { intervalMs: 60_000, rateLimitWindowMs: 300_000 })).toEqual({
			kind: "interval",
			delayMs: 60_000,
		});
		expect(harness.strategy.state().direction).toBe("FLAT");

		const retried = await harness.runner.tick(ENTRY_NOW + 60_000);
		expect(retried.signal.action).toBe("ENTER_LONG");
		expect(retried.orderResult?.status).toBe("filled");
		expect(harness.strategy.state().direction).toBe("LONG");
	});

	it("refuses a tick while another one runs", async () => {
		const { runner, feed } = createHarness(ENTRY_CLOSES);
		let release: (candles: Candle[]) => void = () => undefined;
		vi.mocked(feed.load).mockImplementationOnce(
			() =>
				new Promise<Candle[]>((resolve) => {
					release = resolve;
				})
		);

		const first = runner.tick(ENTRY_NOW);
		const second = await runner.tick(ENTRY_NOW);
		expect(second.signal.reason).toBe("tick_in_progress");
		expect(await runner.reconcile()).toBeNull();

		release(candlesFrom(ENTRY_CLOSES));
		expect((await first).signal.action).toBe("ENTER_LONG");
	});

	it("adopts a position opened outside the runner", async () => {
		const { runner, strategy, paper } = createHarness(ENTRY_CLOSES);
		paper.setMarkPrice(SYMBOL, 30);
		await paper.createMarketOrder(SYMBOL, "sell", 3);

		const outcome = await runner.reconcile();

		expect(outcome?.mismatch).toBeInstanceOf(ReconciliationMismatch);
		expect(strategy.state()).toMatchObject({
			direction: "SHORT",
			remainingQuantity: 3,
			entryPrice: 30,
		});
	});

	it("replays history before the latest closed candle", async () => {
		const { runner, strategy } = createHarness([10, 10, 10, 10, 20, 5, 6]);

		const report = await runner.replay(6 * HOUR + 60_000, {
			sizer: sizer(),
			partialExitPct: 0.5,
			contractValue: 0.001,
		});

		expect(report.evaluated).toBe(5);
		expect(report.signals).toEqual({ NONE: 4, ENTER_LONG: 1 });
		expect(report.finalState).toMatchObject({
			direction: "LONG",
			remainingQuantity: 25_000,
			entryPrice: 20,
		});

		// Nothing is open on the live exchange, so the replayed trade is dropped.
		const reconciled = await runner.reconcile();
		expect(reconciled?.mismatch).toBeNull();
		expect(strategy.state().direction).toBe("FLAT");
	});

	it("can replay through the latest closed candle and skip it live", async () => {
		const { runner } = createHarness([10, 10, 10, 10, 20, 5, 6]);

		const report = await runner.replay(
			6 * HOUR + 60_000,
			{ sizer: sizer(), partialExitPct: 0.5, contractValue: 0.001 },
			{ includeLatest: true }
		);
		expect(report.evaluated).toBe(6);
		expect(report.signals).toEqual({ NONE: 4, ENTER_LONG: 1, EXIT_LONG: 1 });

		const outcome = await runner.tick(6 * HOUR + 120_000);
		expect(outcome.signal.reason).toBe("candle_already_evaluated");
	});
});

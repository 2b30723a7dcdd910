import { describe, expect, it, vi } from "vitest";
import {
	APIError,
	ExchangeRequestError,
	type AlertSink,
	type ExchangePositionSnapshot,
	type ExecutionClient,
	type ModuleLogger,
	type Signal,
	type SignalAction,
	type TradeJournal,
} from "@tradeloop/core";
import { DirectGateway, RateLimiter, ResilientGateway } from "@tradeloop/gateway";
import { PositionSizer } from "@tradeloop/risk-engine";
import {
	StrategyStateMachine,
	type ConditionEvaluator,
} from "@tradeloop/strategy-engine";
import { OrderExecutor } from "./orderExecutor";
import { PaperExchange } from "./paperExchange";

const SYMBOL = "BTC/USD:USD";
const PRICE = 50_000;

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const evaluator: ConditionEvaluator = {
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
};

const signal = (action: SignalAction, overrides: Partial<Signal> = {}): Signal => ({
	action,
	reason: "test",
	closedIndex: 10,
	timestamp: 36_000_000,
	price: PRICE,
	...overrides,
});

const flat: ExchangePositionSnapshot = {
	side: "FLAT",
	size: 0,
	entryPrice: null,
	unrealizedPnl: null,
};

const createHarness = (
	options: { client?: ExecutionClient; partialExitPct?: number; gateway?: ResilientGateway } = {}
) => {
	const paper = new PaperExchange({ logger: silentLogger(), contractValue: 0.001 });
	paper.setMarkPrice(SYMBOL, PRICE);
	const strategy = new StrategyStateMachine(evaluator, {
		symbol: SYMBOL,
		tradeMode: "both",
		allowFlip: true,
		partialExits: true,
		logger: silentLogger(),
	});
	const journal: TradeJournal = { record: vi.fn(async () => undefined) };
	const alerts: AlertSink = { notify: vi.fn(async () => undefined) };
	const logger = silentLogger();
	let ref = 0;
	const executor = new OrderExecutor({
		symbol: SYMBOL,
		strategyId: "stub",
		client: options.client ?? paper,
		gateway: options.gateway ?? new DirectGateway(),
		sizer: new PositionSizer({
			targetMargin: 100,
			leverage: 5,
			contractValue: 0.001,
			enablePartialExits: false,
		}),
		partialExitPct: options.partialExitPct ?? 0.5,
		journal,
		alerts,
		logger,
		now: () => 1_000,
		nextJournalRef: () => {
			ref += 1;
			return `ref-${ref}`;
		},
	});
	return { paper, strategy, journal, alerts, logger, executor };
};

const resilientGateway = (): ResilientGateway =>
	new ResilientGateway({
		limiter: new RateLimiter({ clock: () => 0, sleep: async () => undefined }),
		sleep: async () => undefined,
		random: () => 0,
		logger: silentLogger(),
	});

describe("OrderExecutor", () => {
	it("does nothing for NONE", async () => {
		const { executor, strategy } = createHarness();
		const result = await executor.execute(signal("NONE"), strategy);
		expect(result).toEqual({ status: "skipped", action: "NONE", reason: "no_signal" });
	});

	it("sizes entries, sets leverage and applies the fill", async () => {
		const { executor, strategy, paper, journal } = createHarness();
		const result = await executor.execute(signal("ENTER_LONG"), strategy);

		expect(result).toMatchObject({
			status: "filled",
			orderId: "paper-1",
			filledPrice: PRICE,
			closedQuantity: 0,
			openedQuantity: 10,
			intent: { side: "buy", quantity: 10, reduceOnly: false, kind: "market" },
		});
		expect(paper.getLeverage(SYMBOL)).toBe(5);
		expect(await paper.getPosition(SYMBOL)).toMatchObject({ side: "LONG", size: 10 });
		expect(strategy.state()).toMatchObject({
			direction: "LONG",
			remainingQuantity: 10,
			entryPrice: PRICE,
			entryTime: 1_000,
			journalRef: "ref-1",
		});
		expect(journal.record).toHaveBeenCalledWith(
			expect.objectContaining({
				kind: "entry",
				journalRef: "ref-1",
				strategyId: "stub",
				side: "LONG",
				quantity: 10,
			})
		);
	});

	it("adopts an unexpected exchange position instead of entering twice", async () => {
		const { executor, strategy, paper } = createHarness();
		await paper.createMarketOrder(SYMBOL, "buy", 3);

		const result = await executor.execute(signal("ENTER_LONG"), strategy);
		expect(result).toEqual({
			status: "skipped",
			action: "ENTER_LONG",
			reason: "position_drift",
		});
		expect((await paper.getPosition(SYMBOL)).size).toBe(3);
		expect(strategy.state()).toMatchObject({ direction: "LONG", remainingQuantity: 3 });
	});

	it("sizes exits from the live position", async () => {
		const { executor, strategy, paper } = createHarness();
		await executor.execute(signal("ENTER_LONG"), strategy);
		await paper.createMarketOrder(SYMBOL, "sell", 4, { reduceOnly: true });

		const result = await executor.execute(signal("EXIT_LONG"), strategy);
		expect(result).toMatchObject({
			status: "filled",
			closedQuantity: 6,
			intent: { side: "sell", quantity: 6, reduceOnly: true },
		});
		expect((await paper.getPosition(SYMBOL)).side).toBe("FLAT");
		expect(strategy.state().direction).toBe("FLAT");
	});

	it("reconciles instead of ordering when the exchange is already flat", async () => {
		const { executor, strategy, paper } = createHarness();
		await executor.execute(signal("ENTER_LONG"), strategy);
		await paper.createMarketOrder(SYMBOL, "sell", 10, { reduceOnly: true });
		const tradesBefore = paper.snapshotAccount().trades.total;

		const result = await executor.execute(signal("EXIT_LONG"), strategy);
		expect(result).toEqual({ status: "skipped", action: "EXIT_LONG", reason: "no_position" });
		expect(paper.snapshotAccount().trades.total).toBe(tradesBefore);
		expect(strategy.state().direction).toBe("FLAT");
	});

	it("flips with one order of live size plus the new entry", async () => {
		const { executor, strategy, paper, journal } = createHarness();
		await executor.execute(signal("ENTER_LONG"), strategy);

		const result = await executor.execute(
			signal("EXIT_LONG", { flipTo: "SHORT" }),
			strategy
		);
		expect(result).toMatchObject({
			status: "filled",
			closedQuantity: 10,
			openedQuantity: 10,
			intent: { side: "sell", quantity: 20, reduceOnly: false },
		});
		expect(await paper.getPosition(SYMBOL)).toMatchObject({ side: "SHORT", size: 10 });
		expect(strategy.state()).toMatchObject({
			direction: "SHORT",
			remainingQuantity: 10,
			journalRef: "ref-2",
		});
		expect(journal.record).toHaveBeenCalledWith(
			expect.objectContaining({ kind: "exit", journalRef: "ref-1", quantity: 10 })
		);
		expect(journal.record).toHaveBeenCalledWith(
			expect.objectContaining({ kind: "entry", journalRef: "ref-2", side: "SHORT" })
		);
	});

	it("takes the partial percentage of the live size, at least one contract", async () => {
		const { executor, strategy, paper } = createHarness();
		await executor.execute(signal("ENTER_LONG"), strategy);

		const result = await executor.execute(signal("PARTIAL_EXIT"), strategy);
		expect(result).toMatchObject({
			status: "filled",
			intent: { side: "sell", quantity: 5, reduceOnly: true },
		});
		expect((await paper.getPosition(SYMBOL)).size).toBe(5);
		expect(strategy.state()).toMatchObject({
			direction: "LONG",
			remainingQuantity: 5,
			partialExitTaken: true,
		});

		const small = createHarness({ partialExitPct: 0.1 });
		await small.paper.createMarketOrder(SYMBOL, "sell", 3);
		small.strategy.reconcile(await small.paper.getPosition(SYMBOL));
		const partial = await small.executor.execute(
			signal("EXIT_SHORT_PARTIAL"),
			small.strategy
		);
		expect(partial).toMatchObject({
			status: "filled",
			intent: { side: "buy", quantity: 1, reduceOnly: true },
		});
	});

	it("keeps the local size on the exchange's remainder after a partial", async () => {
		const { executor, strategy, paper, journal } = createHarness();
		await executor.execute(signal("ENTER_LONG"), strategy);
		await paper.createMarketOrder(SYMBOL, "sell", 4, { reduceOnly: true });

		const result = await executor.execute(signal("PARTIAL_EXIT"), strategy);
		expect(result).toMatchObject({ status: "filled", closedQuantity: 3 });
		expect((await paper.getPosition(SYMBOL)).size).toBe(3);
		expect(strategy.state()).toMatchObject({
			direction: "LONG",
			remainingQuantity: 3,
			partialExitTaken: true,
		});
		expect(journal.record).toHaveBeenCalledWith(
			expect.objectContaining({ kind: "partial_exit", quantity: 3, remainingQuantity: 3 })
		);
	});

	it("skips a side-specific partial that does not match the live side", async () => {
		const { executor, strategy } = createHarness();
		await executor.execute(signal("ENTER_LONG"), strategy);

		const result = await executor.execute(signal("EXIT_SHORT_PARTIAL"), strategy);
		expect(result).toEqual({
			status: "skipped",
			action: "EXIT_SHORT_PARTIAL",
			reason: "position_drift",
		});
		expect(strategy.state().remainingQuantity).toBe(10);
	});

	it("returns a typed failure and leaves the state untouched", async () => {
		const client: ExecutionClient = {
			createMarketOrder: vi.fn(async () => {
				throw new ExchangeRequestError("invalid api key", { status: 401, kind: "http" });
			}),
			getPosition: vi.fn(async () => flat),
			setLeverage: vi.fn(async () => undefined),
		};
		const { executor, strategy, alerts } = createHarness({
			client,
			gateway: resilientGateway(),
		});

		const result = await executor.execute(signal("ENTER_LONG"), strategy);
		expect(result.status).toBe("failed");
		if (result.status !== "failed") {
			return;
		}
		expect(result.error).toBeInstanceOf(APIError);
		expect(result.reason).toBe(
			"BTC/USD:USD ENTER_LONG failed: create_order failed with status 401: invalid api key (status 401, 1 attempts)"
		);
		expect(client.createMarketOrder).toHaveBeenCalledTimes(1);
		expect(strategy.state().direction).toBe("FLAT");
		expect(alerts.notify).toHaveBeenCalledWith(
			expect.objectContaining({ kind: "failure", key: "BTC/USD:USD:failure:ENTER_LONG" })
		);
	});

	it("treats an order confirmed by the position check as filled", async () => {
		const getPosition = vi
			.fn<(symbol: string) => Promise<ExchangePositionSnapshot>>()
			.mockResolvedValueOnce(flat)
			.mockResolvedValueOnce({
				side: "LONG",
				size: 10,
				entryPrice: 50_010,
				unrealizedPnl: 0,
			});
		const client: ExecutionClient = {
			createMarketOrder: vi.fn(async () => {
				throw new ExchangeRequestError("gateway timeout", { status: 504, kind: "http" });
			}),
			getPosition,
			setLeverage: vi.fn(async () => undefined),
		};
		const { executor, strategy } = createHarness({ client, gateway: resilientGateway() });

		const result = await executor.execute(signal("ENTER_LONG"), strategy);
		expect(result).toMatchObject({
			status: "filled",
			orderId: "confirmed-by-position",
			filledPrice: PRICE,
			openedQuantity: 10,
		});
		expect(client.createMarketOrder).toHaveBeenCalledTimes(1);
		expect(strategy.state().direction).toBe("LONG");
	});

	it("enters even when leverage cannot be set", async () => {
		const paper = new PaperExchange({ logger: silentLogger() });
		paper.setMarkPrice(SYMBOL, PRICE);
		const client: ExecutionClient = {
			createMarketOrder: (symbol, side, amount, options) =>
				paper.createMarketOrder(symbol, side, amount, options),
			getPosition: (symbol) => paper.getPosition(symbol),
			setLeverage: async () => {
				throw new ExchangeRequestError("leverage locked", { status: 403, kind: "http" });
			},
		};
		const { executor, strategy, logger } = createHarness({
			client,
			gateway: resilientGateway(),
		});

		const result = await executor.execute(signal("ENTER_LONG"), strategy);
		expect(result.status).toBe("filled");
		expect(logger.warn).toHaveBeenCalledWith(
			"leverage_set_failed",
			expect.objectContaining({ leverage: 5 })
		);
	});
});

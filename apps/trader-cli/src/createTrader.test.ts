import { describe, expect, it, vi } from "vitest";
import type {
	Candle,
	ExecutionClient,
	MarketDataClient,
	ModuleLogger,
	TradeloopConfig,
} from "@tradeloop/core";
import { createTrader } from "./createTrader";

const SYMBOL = "BTC/USD:USD";
const HOUR = 3_600_000;

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const config: TradeloopConfig = {
	env: {
		exchangeProfile: "delta",
		executionMode: "paper",
		deltaApiKey: "",
		deltaApiSecret: "",
		pollIntervalMs: 60_000,
		journalPath: "output/trades.jsonl",
		alertThrottleMs: 300_000,
		retry: {},
	},
	exchange: {
		id: "delta",
		exchange: "delta",
		testnet: false,
		rateLimit: { maxRequests: 150, windowMs: 300_000 },
		retry: { maxRetries: 4, backoffBaseMs: 2_000, backoffMaxMs: 60_000, jitterMs: 1_000 },
		credentials: { apiKey: "", apiSecret: "" },
	},
	strategy: {
		id: "ema_cross",
		profile: "ema-cross",
		symbol: SYMBOL,
		assetId: "BTCUSD",
		timeframe: "1h",
		baseTimeframe: "1h",
		candleType: "standard",
		tradeMode: "both",
		allowFlip: false,
		historyCandles: 6,
		params: { fastLength: 2, slowLength: 3 },
	},
	risk: {
		targetMargin: 100,
		leverage: 5,
		contractValue: 0.001,
		enablePartialExits: false,
		partialExitPct: 0.5,
		assets: { BTCUSD: { leverage: 10 } },
	},
};

const candles: Candle[] = [10, 10, 10, 10, 20, 21].map((close, index) => ({
	symbol: SYMBOL,
	timeframe: "1h",
	timestamp: index * HOUR,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
}));

const createExchange = () => {
	const fetchOHLCV = vi.fn<MarketDataClient["fetchOHLCV"]>(async () => candles);
	const createMarketOrder = vi.fn<ExecutionClient["createMarketOrder"]>(async () => {
		throw new Error("paper mode must not reach the exchange");
	});
	return {
		fetchOHLCV,
		createMarketOrder,
		getPosition: vi.fn<ExecutionClient["getPosition"]>(),
		setLeverage: vi.fn<ExecutionClient["setLeverage"]>(),
	};
};

describe("createTrader", () => {
	it("runs a paper tick with the per-asset risk override", async () => {
		const exchange = createExchange();
		const trader = createTrader(
			config,
			{ exchange, mode: "paper", clock: () => 5 * HOUR + 60_000, logger: silentLogger() },
			{ intervalMs: 60_000 }
		);

		expect(trader.asset).toMatchObject({ assetId: "BTCUSD", leverage: 10, targetMargin: 100 });

		const outcome = await trader.runner.tick(5 * HOUR + 60_000);

		expect(outcome.signal.action).toBe("ENTER_LONG");
		// 100 margin x 10 leverage / (20 x 0.001)
		expect(outcome.orderResult).toMatchObject({ status: "filled", openedQuantity: 50_000 });
		expect(trader.paper?.getLeverage(SYMBOL)).toBe(10);
		expect(exchange.createMarketOrder).not.toHaveBeenCalled();
		expect(exchange.fetchOHLCV).toHaveBeenCalledWith(SYMBOL, "1h", 500, 0);
		expect(trader.limiter.remaining()).toBe(146);
	});

	it("loads markets through one gateway call before trading", async () => {
		const loadMarkets = vi.fn(async () => undefined);
		const trader = createTrader(
			config,
			{
				exchange: { ...createExchange(), loadMarkets },
				mode: "paper",
				clock: () => 0,
				logger: silentLogger(),
			},
			{ intervalMs: 60_000 }
		);

		await trader.prepare();
		expect(loadMarkets).toHaveBeenCalledTimes(1);
		expect(trader.limiter.remaining()).toBe(149);
	});

	it("sends orders to the exchange in live mode", () => {
		const trader = createTrader(
			config,
			{ exchange: createExchange(), mode: "live", logger: silentLogger() },
			{ intervalMs: 60_000 }
		);

		expect(trader.paper).toBeNull();
		expect(trader.replaySettings).toMatchObject({ partialExitPct: 0.5, contractValue: 0.001 });
	});
});

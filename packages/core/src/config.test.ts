import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	loadExchangeConfig,
	loadRiskConfig,
	loadStrategyConfig,
	resolveAssetRisk,
	type EnvConfig,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");

const baseEnv: EnvConfig = {
	exchangeProfile: "paper",
	executionMode: "paper",
	deltaApiKey: "test-key",
	deltaApiSecret: "test-secret",
	pollIntervalMs: 60_000,
	journalPath: "output/trades.jsonl",
	alertThrottleMs: 300_000,
	retry: {},
};

describe("loadStrategyConfig", () => {
	it("throws when the config file omits an id", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "missing-id")).toThrowError(
			/must include an "id"/i
		);
	});

	it("rejects a timeframe that is not a whole multiple of the base", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "bad-multiple")).toThrow(
			ConfigError
		);
	});

	it("reads aggregation, candle type and trade mode", () => {
		const config = loadStrategyConfig(FIXTURE_DIR, "aggregated");
		expect(config).toMatchObject({
			id: "donchian_channel",
			symbol: "ETH/USD:USD",
			assetId: "ETHUSD",
			timeframe: "3h",
			baseTimeframe: "1h",
			candleType: "heikin-ashi",
			tradeMode: "long",
			allowFlip: false,
			historyCandles: 300,
			params: { enterPeriod: 20 },
		});
		expect(config.profile).toBe("aggregated");
	});

	it("rejects a fractional candle history", () => {
		expect(() => loadStrategyConfig(FIXTURE_DIR, "fractional-history")).toThrowError(
			"strategy.historyCandles must be an integer of at least 2, got 0.5"
		);
	});

	it("lets the caller override the symbol", () => {
		const config = loadStrategyConfig(FIXTURE_DIR, "aggregated", "SOL/USD:USD");
		expect(config.symbol).toBe("SOL/USD:USD");
	});
});

describe("loadExchangeConfig", () => {
	it("fills rate limit and retry defaults around the file values", () => {
		const config = loadExchangeConfig(baseEnv, FIXTURE_DIR);
		expect(config.rateLimit).toEqual({ maxRequests: 50, windowMs: 60_000 });
		expect(config.retry).toEqual({
			maxRetries: 3,
			backoffBaseMs: 500,
			backoffMaxMs: 60_000,
			jitterMs: 1_000,
		});
		expect(config.credentials).toEqual({
			apiKey: "test-key",
			apiSecret: "test-secret",
		});
	});

	it("prefers retry settings from the environment", () => {
		const config = loadExchangeConfig(
			{ ...baseEnv, retry: { maxRetries: 6, backoffMaxMs: 30_000 } },
			FIXTURE_DIR
		);
		expect(config.retry.maxRetries).toBe(6);
		expect(config.retry.backoffBaseMs).toBe(500);
		expect(config.retry.backoffMaxMs).toBe(30_000);
	});
});

describe("loadRiskConfig", () => {
	it("rejects non-positive leverage", () => {
		expect(() => loadRiskConfig(FIXTURE_DIR, "bad-leverage")).toThrowError(
			/risk.leverage must be positive/
		);
	});

	it("resolves per-asset overrides over the defaults", () => {
		const risk = loadRiskConfig(FIXTURE_DIR, "default");
		expect(resolveAssetRisk(risk, "ETHUSD")).toEqual({
			assetId: "ETHUSD",
			targetMargin: 100,
			leverage: 5,
			contractValue: 0.01,
			enablePartialExits: false,
			partialExitPct: 0.5,
		});
		expect(resolveAssetRisk(risk, "SOLUSD").leverage).toBe(10);
		expect(resolveAssetRisk(risk, "BTCUSD")).toMatchObject({
			leverage: 5,
			contractValue: 0.001,
			enablePartialExits: true,
		});
	});
});

import { describe, expect, it } from "vitest";
import {
	AuthenticationError,
	ExchangeError,
	ExchangeNotAvailable,
	InvalidOrder,
	NetworkError,
	RateLimitExceeded,
	RequestTimeout,
} from "ccxt";
import { ExchangeRequestError, ValidationError } from "@tradeloop/core";
import { DeltaClient } from "./deltaClient";
import {
	mapCcxtCandleToCandle,
	mapCcxtPosition,
	type CcxtPositionLike,
} from "./utils/ccxtMapper";
import { toExchangeRequestError } from "./errors";

const position = (overrides: CcxtPositionLike): CcxtPositionLike => ({
	info: {},
	symbol: "BTC/USD:USD",
	contracts: 0,
	...overrides,
});

describe("mapCcxtCandleToCandle", () => {
	it("maps the OHLCV tuple onto a candle", () => {
		expect(
			mapCcxtCandleToCandle(
				[3_600_000, 100, 110, 90, 105, 12],
				"BTC/USD:USD",
				"1h"
			)
		).toEqual({
			symbol: "BTC/USD:USD",
			timeframe: "1h",
			timestamp: 3_600_000,
			open: 100,
			high: 110,
			low: 90,
			close: 105,
			volume: 12,
		});
	});
});

describe("mapCcxtPosition", () => {
	it("reports FLAT when the exchange has no position", () => {
		expect(mapCcxtPosition(undefined)).toEqual({
			side: "FLAT",
			size: 0,
			entryPrice: null,
			unrealizedPnl: null,
		});
		expect(mapCcxtPosition(position({ contracts: 0 })).side).toBe("FLAT");
	});

	it("uses the unified side and absolute contract count", () => {
		expect(
			mapCcxtPosition(
				position({
					contracts: 4,
					side: "short",
					entryPrice: 2_500,
					unrealizedPnl: -3,
				})
			)
		).toEqual({ side: "SHORT", size: 4, entryPrice: 2_500, unrealizedPnl: -3 });
	});

	it("falls back to the sign of the raw size", () => {
		const snapshot = mapCcxtPosition(
			position({
				contracts: undefined,
				info: { size: "-6", entry_price: "101.5" },
			})
		);
		expect(snapshot).toEqual({
			side: "SHORT",
			size: 6,
			entryPrice: 101.5,
			unrealizedPnl: null,
		});
	});
});

describe("toExchangeRequestError", () => {
	it.each([
		[new RateLimitExceeded("slow down"), 429, "http"],
		[new ExchangeNotAvailable("maintenance"), 503, "http"],
		[new RequestTimeout("timed out"), 504, "http"],
		[new NetworkError("ECONNRESET"), null, "connection"],
		[new AuthenticationError("bad key"), 401, "http"],
		[new InvalidOrder("size too small"), 422, "http"],
		[new ExchangeError("unexpected"), null, "http"],
	])("maps %s", (error, status, kind) => {
		const mapped = toExchangeRequestError(error, "create_order");
		expect(mapped).toBeInstanceOf(ExchangeRequestError);
		expect(mapped.status).toBe(status);
		expect(mapped.kind).toBe(kind);
		expect(mapped.message).toBe(`create_order: ${error.message}`);
	});

	it("keeps an already mapped error", () => {
		const original = new ExchangeRequestError("boom", {
			status: 502,
			kind: "http",
		});
		expect(toExchangeRequestError(original, "fetch_ohlcv")).toBe(original);
	});
});

describe("DeltaClient", () => {
	it("refuses trading calls until markets are loaded", async () => {
		const client = new DeltaClient();
		const attempt = client.fetchOHLCV("BTC/USD:USD", "1h");
		await expect(attempt).rejects.toBeInstanceOf(ValidationError);
		await expect(attempt).rejects.toThrow("markets: load markets before fetch_ohlcv");
		await expect(client.getPosition("BTC/USD:USD")).rejects.toThrow(
			"markets: load markets before fetch_positions"
		);
	});
});

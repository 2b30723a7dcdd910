import type { OHLCV } from "ccxt";
import type { Candle, ExchangePositionSnapshot } from "@tradeloop/core";
import { flatExchangePosition } from "@tradeloop/core";

export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};

const finiteOrNull = (value: unknown): number | null => {
	const num = Number(value);
	return value === undefined || value === null || !Number.isFinite(num)
		? null
		: num;
};

/**
 * The subset of ccxt's unified position this client reads.
 */
export interface CcxtPositionLike {
	symbol?: string;
	side?: string;
	contracts?: number;
	entryPrice?: number;
	unrealizedPnl?: number;
	info?: Record<string, unknown>;
}

/**
 * Delta reports a signed `size` in the raw payload; the unified `side`
 * wins when ccxt provides it.
 */
export const mapCcxtPosition = (
	position: CcxtPositionLike | undefined
): ExchangePositionSnapshot => {
	if (!position) {
		return flatExchangePosition();
	}
	const signedSize = finiteOrNull(position.info?.size);
	const contracts = Math.abs(
		finiteOrNull(position.contracts) ?? signedSize ?? 0
	);
	if (!contracts) {
		return flatExchangePosition();
	}

	let side: ExchangePositionSnapshot["side"];
	if (position.side === "long") {
		side = "LONG";
	} else if (position.side === "short") {
		side = "SHORT";
	} else {
		side = (signedSize ?? 0) < 0 ? "SHORT" : "LONG";
	}

	return {
		side,
		size: contracts,
		entryPrice:
			finiteOrNull(position.entryPrice) ??
			finiteOrNull(position.info?.entry_price),
		unrealizedPnl:
			finiteOrNull(position.unrealizedPnl) ??
			finiteOrNull(position.info?.unrealized_pnl),
	};
};

import { isIntervalClosed, timeframeToMs, type Candle } from "@tradeloop/core";

/**
 * Index of the last candle whose whole interval has elapsed at `now`, or
 * null when none has. Recomputed on every call; the forming candle at the
 * head of a live series is never returned.
 */
export const closedCandleIndex = (
	candles: readonly Candle[],
	now: number,
	timeframe: string
): number | null => {
	const tfMs = timeframeToMs(timeframe);
	for (let i = candles.length - 1; i >= 0; i -= 1) {
		if (isIntervalClosed(candles[i].timestamp, tfMs, now)) {
			return i;
		}
	}
	return null;
};

/** Latest traded price, forming candle included. Display only. */
export const livePrice = (candles: readonly Candle[]): number | undefined =>
	candles.length ? candles[candles.length - 1].close : undefined;

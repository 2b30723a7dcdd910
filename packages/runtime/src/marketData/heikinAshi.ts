import type { Candle } from "@tradeloop/core";

/**
 * Heikin-Ashi transform. Timestamps, volume and ordering are untouched so
 * closed-candle detection works on the result as on the source.
 *
 * close = (o + h + l + c) / 4, open = mean of the previous HA open and
 * close (first row: (o + c) / 2), high/low widened to cover both.
 */
export const heikinAshi = (candles: readonly Candle[]): Candle[] => {
	const result: Candle[] = [];
	for (const candle of candles) {
		const previous = result[result.length - 1];
		const close = (candle.open + candle.high + candle.low + candle.close) / 4;
		const open = previous
			? (previous.open + previous.close) / 2
			: (candle.open + candle.close) / 2;
		result.push({
			...candle,
			open,
			close,
			high: Math.max(candle.high, open, close),
			low: Math.min(candle.low, open, close),
		});
	}
	return result;
};

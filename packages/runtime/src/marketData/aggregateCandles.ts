import type { Candle } from "@tradeloop/core";
import { bucketTimestamp, timeframeMultiple, timeframeToMs } from "@tradeloop/core";

/**
 * Aggregate the base candles of one target bucket into a single candle.
 *
 * Returns null unless every base slot of the bucket is present: a window
 * with a hole (or the still-filling window at the head of the series) must
 * never produce a candle.
 *
 * @param baseCandles - Base timeframe candles, sorted by open time
 * @param bucketStart - Open time of the target candle
 */
export function aggregateCandle(
	baseCandles: readonly Candle[],
	baseTimeframe: string,
	targetTimeframe: string,
	bucketStart: number,
	symbol: string
): Candle | null {
	const baseMs = timeframeToMs(baseTimeframe);
	const multiple = timeframeMultiple(baseTimeframe, targetTimeframe);
	const bucketEnd = bucketStart + multiple * baseMs;

	const candlesInBucket = baseCandles.filter(
		(c) => c.timestamp >= bucketStart && c.timestamp < bucketEnd
	);
	if (candlesInBucket.length !== multiple) {
		return null;
	}
	const complete = candlesInBucket.every(
		(c, slot) => c.timestamp === bucketStart + slot * baseMs
	);
	if (!complete) {
		return null;
	}

	return {
		symbol,
		timeframe: targetTimeframe,
		timestamp: bucketStart,
		open: candlesInBucket[0].open,
		high: Math.max(...candlesInBucket.map((c) => c.high)),
		low: Math.min(...candlesInBucket.map((c) => c.low)),
		close: candlesInBucket[candlesInBucket.length - 1].close,
		volume: candlesInBucket.reduce((sum, c) => sum + c.volume, 0),
	};
}

/**
 * Group base candles into epoch-aligned, non-overlapping target windows and
 * emit one candle per complete window, oldest first.
 */
export function aggregateCandles(
	baseCandles: readonly Candle[],
	baseTimeframe: string,
	targetTimeframe: string,
	symbol: string
): Candle[] {
	const multiple = timeframeMultiple(baseTimeframe, targetTimeframe);
	if (multiple === 1) {
		return [...baseCandles];
	}
	const targetMs = timeframeToMs(targetTimeframe);

	const buckets = new Map<number, Candle[]>();
	for (const candle of baseCandles) {
		const bucket = bucketTimestamp(candle.timestamp, targetMs);
		const members = buckets.get(bucket);
		if (members) {
			members.push(candle);
		} else {
			buckets.set(bucket, [candle]);
		}
	}

	const results: Candle[] = [];
	for (const bucket of [...buckets.keys()].sort((a, b) => a - b)) {
		const aggregated = aggregateCandle(
			buckets.get(bucket) ?? [],
			baseTimeframe,
			targetTimeframe,
			bucket,
			symbol
		);
		if (aggregated) {
			results.push(aggregated);
		}
	}
	return results;
}

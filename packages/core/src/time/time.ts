/**
 * Pure time utilities. Everything is UTC epoch milliseconds.
 */

import { SECOND_MS, MINUTE_MS, HOUR_MS, DAY_MS } from "./constants";

const TIMEFRAME_PATTERN = /^(\d+)([smhd])$/;

const UNIT_MS: Record<string, number> = {
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

/**
 * Parse timeframe string to milliseconds
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "3h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number => {
	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}
	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}
	return n * UNIT_MS[match[2]];
};

/**
 * Bucket a timestamp to the start of its timeframe period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

export const isBucketAligned = (ts: number, tfMs: number): boolean =>
	ts === bucketTimestamp(ts, tfMs);

/**
 * How many `base` candles make up one `target` candle.
 * @throws Error when target is not a whole multiple of base
 */
export const timeframeMultiple = (base: string, target: string): number => {
	const baseMs = timeframeToMs(base);
	const targetMs = timeframeToMs(target);
	if (targetMs < baseMs || targetMs % baseMs !== 0) {
		throw new Error(
			`Timeframe ${target} is not a whole multiple of base timeframe ${base}`
		);
	}
	return targetMs / baseMs;
};

/**
 * A candle opened at `openTime` is closed once its whole interval elapsed.
 */
export const isIntervalClosed = (
	openTime: number,
	tfMs: number,
	now: number
): boolean => openTime + tfMs <= now;

export interface SupertrendInput {
	high: number;
	low: number;
	close: number;
}

export interface SupertrendSeries {
	line: number[];
	/** 1 while the trend is up (line below price), -1 while it is down. */
	direction: number[];
}

/**
 * Supertrend over Wilder-smoothed ATR. The ATR is an expanding mean until
 * `period` true ranges exist, so every candle gets a value; the first
 * true range is the candle's own high-low range.
 */
export function supertrendSeries(
	candles: SupertrendInput[],
	period = 10,
	multiplier = 3
): SupertrendSeries {
	const line = new Array<number>(candles.length).fill(Number.NaN);
	const direction = new Array<number>(candles.length).fill(Number.NaN);
	if (period <= 0 || candles.length === 0) {
		return { line, direction };
	}

	const atr = smoothedRange(candles, period);
	let upper = Number.NaN;
	let lower = Number.NaN;
	let trend = 0;

	for (let i = 0; i < candles.length; i += 1) {
		const { high, low, close } = candles[i];
		const mid = (high + low) / 2;
		const basicUpper = mid + multiplier * atr[i];
		const basicLower = mid - multiplier * atr[i];

		if (i === 0) {
			upper = basicUpper;
			lower = basicLower;
			trend = close <= upper ? -1 : 1;
		} else {
			const previousClose = candles[i - 1].close;
			if (basicUpper < upper || previousClose > upper) {
				upper = basicUpper;
			}
			if (basicLower > lower || previousClose < lower) {
				lower = basicLower;
			}
			if (trend === 1) {
				trend = close > lower ? 1 : -1;
			} else {
				trend = close < upper ? -1 : 1;
			}
		}

		direction[i] = trend;
		line[i] = trend === 1 ? lower : upper;
	}

	return { line, direction };
}

const smoothedRange = (candles: SupertrendInput[], period: number): number[] => {
	const ranges = candles.map((candle, i) => {
		const highLow = candle.high - candle.low;
		if (i === 0) {
			return highLow;
		}
		const previousClose = candles[i - 1].close;
		return Math.max(
			highLow,
			Math.abs(candle.high - previousClose),
			Math.abs(candle.low - previousClose)
		);
	});

	const atr: number[] = [];
	let sum = 0;
	for (let i = 0; i < ranges.length; i += 1) {
		if (i < period) {
			sum += ranges[i];
			atr.push(sum / (i + 1));
		} else {
			atr.push((atr[i - 1] * (period - 1) + ranges[i]) / period);
		}
	}
	return atr;
};

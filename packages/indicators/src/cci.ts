export interface CciInput {
	high: number;
	low: number;
	close: number;
}

const LAMBERT = 0.015;

/**
 * Commodity channel index of the typical price. The first value lands at
 * index `length - 1`; a window with no deviation reads 0.
 */
export function cciSeries(candles: CciInput[], length = 20): number[] {
	const series = new Array<number>(candles.length).fill(Number.NaN);
	if (length <= 0) {
		return series;
	}

	const typical = candles.map((candle) => (candle.high + candle.low + candle.close) / 3);
	for (let i = length - 1; i < typical.length; i += 1) {
		const window = typical.slice(i - length + 1, i + 1);
		const mean = window.reduce((acc, value) => acc + value, 0) / length;
		const deviation =
			window.reduce((acc, value) => acc + Math.abs(value - mean), 0) / length;
		series[i] = deviation === 0 ? 0 : (typical[i] - mean) / (LAMBERT * deviation);
	}

	return series;
}

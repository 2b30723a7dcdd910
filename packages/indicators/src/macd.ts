import { emaSeries } from "./ema";

export interface MacdSeries {
	macd: number[];
	signal: number[];
	histogram: number[];
}

export function macdSeries(
	closes: number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdSeries {
	const empty = (): number[] =>
		new Array<number>(closes.length).fill(Number.NaN);
	if (fast <= 0 || slow <= 0 || signalLength <= 0 || fast >= slow) {
		return { macd: empty(), signal: empty(), histogram: empty() };
	}

	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);
	const macd = fastSeries.map((value, index) => value - slowSeries[index]);

	// The signal line starts once the MACD line itself is defined.
	const firstDefined = slow - 1;
	const signal = empty();
	if (closes.length > firstDefined) {
		const tail = emaSeries(macd.slice(firstDefined), signalLength);
		tail.forEach((value, offset) => {
			signal[firstDefined + offset] = value;
		});
	}
	const histogram = macd.map((value, index) => value - signal[index]);

	return { macd, signal, histogram };
}

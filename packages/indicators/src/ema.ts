/**
 * Exponential moving average over the whole input, seeded with the simple
 * average of the first `length` values. Entries before the seed are NaN.
 */
export function emaSeries(values: number[], length: number): number[] {
	const series = new Array<number>(values.length).fill(Number.NaN);
	if (length <= 0 || values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

export function ema(values: number[], length: number): number | null {
	const series = emaSeries(values, length);
	const last = series[series.length - 1];
	return last === undefined || Number.isNaN(last) ? null : last;
}

const average = (nums: number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};

/**
 * Wilder RSI aligned to the input: the first value lands at index `period`.
 */
export function rsiSeries(values: number[], period = 14): number[] {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	const series = new Array<number>(values.length).fill(Number.NaN);
	if (values.length <= period) {
		return series;
	}

	let gains = 0;
	let losses = 0;

	for (let i = 1; i <= period; i += 1) {
		const change = values[i] - values[i - 1];
		if (change >= 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	let avgGain = gains / period;
	let avgLoss = losses / period;

	for (let i = period; i < values.length; i += 1) {
		if (i > period) {
			const change = values[i] - values[i - 1];
			const gain = Math.max(change, 0);
			const loss = Math.max(-change, 0);
			avgGain = (avgGain * (period - 1) + gain) / period;
			avgLoss = (avgLoss * (period - 1) + loss) / period;
		}
		series[i] = toRsi(avgGain, avgLoss);
	}

	return series;
}

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return avgGain === 0 ? 50 : 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

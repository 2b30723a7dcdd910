export interface DonchianInput {
	high: number;
	low: number;
}

export interface DonchianSeries {
	upper: number[];
	lower: number[];
}

export function donchianSeries(
	candles: DonchianInput[],
	length: number
): DonchianSeries {
	const upper = new Array<number>(candles.length).fill(Number.NaN);
	const lower = new Array<number>(candles.length).fill(Number.NaN);
	if (length <= 0) {
		return { upper, lower };
	}

	for (let i = length - 1; i < candles.length; i += 1) {
		let high = Number.NEGATIVE_INFINITY;
		let low = Number.POSITIVE_INFINITY;
		for (let j = i - length + 1; j <= i; j += 1) {
			high = Math.max(high, candles[j].high);
			low = Math.min(low, candles[j].low);
		}
		upper[i] = high;
		lower[i] = low;
	}

	return { upper, lower };
}

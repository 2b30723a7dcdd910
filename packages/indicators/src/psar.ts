export interface PsarInput {
	high: number;
	low: number;
}

export interface PsarOptions {
	start: number;
	increment: number;
	max: number;
}

export const DEFAULT_PSAR_OPTIONS: PsarOptions = {
	start: 0.02,
	increment: 0.02,
	max: 0.2,
};

/**
 * Wilder parabolic SAR. Index 0 has no value; the initial trend is taken
 * from the directional movement between the first two candles.
 */
export function psarSeries(
	candles: PsarInput[],
	options: PsarOptions = DEFAULT_PSAR_OPTIONS
): number[] {
	const series = new Array<number>(candles.length).fill(Number.NaN);
	if (candles.length < 2) {
		return series;
	}

	const upMove = candles[1].high - candles[0].high;
	const downMove = candles[0].low - candles[1].low;
	let falling = downMove > upMove && downMove > 0;
	let sar = falling ? candles[0].high : candles[0].low;
	let extreme = falling ? candles[0].low : candles[0].high;
	let af = options.start;

	for (let i = 1; i < candles.length; i += 1) {
		const current = candles[i];
		const prev = candles[i - 1];
		const prev2 = i > 1 ? candles[i - 2] : prev;
		let next = sar + af * (extreme - sar);
		let reverse: boolean;

		if (falling) {
			next = Math.max(next, prev.high, prev2.high);
			reverse = current.high > next;
			if (!reverse && current.low < extreme) {
				extreme = current.low;
				af = Math.min(af + options.increment, options.max);
			}
		} else {
			next = Math.min(next, prev.low, prev2.low);
			reverse = current.low < next;
			if (!reverse && current.high > extreme) {
				extreme = current.high;
				af = Math.min(af + options.increment, options.max);
			}
		}

		if (reverse) {
			next = extreme;
			falling = !falling;
			extreme = falling ? current.low : current.high;
			af = options.start;
		}

		sar = next;
		series[i] = sar;
	}

	return series;
}

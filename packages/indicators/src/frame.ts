import { ValidationError, type Candle } from "@tradeloop/core";
import { calculateATRSeries } from "./atr";
import { cciSeries } from "./cci";
import { donchianSeries } from "./donchian";
import { emaSeries } from "./ema";
import { macdSeries } from "./macd";
import { psarSeries, type PsarOptions } from "./psar";
import { rsiSeries } from "./rsi";
import { supertrendSeries } from "./supertrend";

export type IndicatorSpec =
	| { kind: "ema"; name: string; length: number }
	| { kind: "rsi"; name: string; length: number }
	| { kind: "atr"; name: string; length: number }
	| { kind: "macd"; name: string; fast: number; slow: number; signal: number }
	| { kind: "donchian"; name: string; length: number }
	| { kind: "cci"; name: string; length: number }
	| { kind: "supertrend"; name: string; length: number; multiplier: number }
	| ({ kind: "psar"; name: string } & PsarOptions);

export const macdColumns = (name: string) => ({
	line: name,
	signal: `${name}_signal`,
	histogram: `${name}_hist`,
});

export const donchianColumns = (name: string) => ({
	upper: `${name}_upper`,
	lower: `${name}_lower`,
});

export const supertrendColumns = (name: string) => ({
	line: name,
	direction: `${name}_dir`,
});

/**
 * Candles plus named indicator columns, every column aligned index for
 * index with the candles. Warm-up rows hold NaN.
 */
export class IndicatorFrame {
	constructor(
		readonly candles: readonly Candle[],
		private readonly columns: ReadonlyMap<string, readonly number[]>
	) {}

	get length(): number {
		return this.candles.length;
	}

	columnNames(): string[] {
		return [...this.columns.keys()];
	}

	has(name: string): boolean {
		return this.columns.has(name);
	}

	column(name: string): readonly number[] {
		const column = this.columns.get(name);
		if (!column) {
			throw new ValidationError("indicator", `unknown column "${name}"`);
		}
		return column;
	}

	value(name: string, index: number): number {
		const value = this.column(name)[index];
		return value === undefined ? Number.NaN : value;
	}

	/** True when every named column holds a finite value at `index`. */
	isReady(names: readonly string[], index: number): boolean {
		return names.every((name) => Number.isFinite(this.value(name, index)));
	}
}

export function attachIndicators(
	candles: readonly Candle[],
	specs: readonly IndicatorSpec[]
): IndicatorFrame {
	const columns = new Map<string, number[]>();
	const closes = candles.map((candle) => candle.close);
	const rows = [...candles];

	const put = (name: string, values: number[]): void => {
		if (columns.has(name)) {
			throw new ValidationError("indicator", `duplicate column "${name}"`);
		}
		columns.set(name, values);
	};

	for (const spec of specs) {
		switch (spec.kind) {
			case "ema":
				put(spec.name, emaSeries(closes, spec.length));
				break;
			case "rsi":
				put(spec.name, rsiSeries(closes, spec.length));
				break;
			case "atr":
				put(spec.name, calculateATRSeries(rows, spec.length));
				break;
			case "macd": {
				const series = macdSeries(closes, spec.fast, spec.slow, spec.signal);
				const names = macdColumns(spec.name);
				put(names.line, series.macd);
				put(names.signal, series.signal);
				put(names.histogram, series.histogram);
				break;
			}
			case "donchian": {
				const series = donchianSeries(rows, spec.length);
				const names = donchianColumns(spec.name);
				put(names.upper, series.upper);
				put(names.lower, series.lower);
				break;
			}
			case "cci":
				put(spec.name, cciSeries(rows, spec.length));
				break;
			case "supertrend": {
				const series = supertrendSeries(rows, spec.length, spec.multiplier);
				const names = supertrendColumns(spec.name);
				put(names.line, series.line);
				put(names.direction, series.direction);
				break;
			}
			case "psar":
				put(
					spec.name,
					psarSeries(rows, {
						start: spec.start,
						increment: spec.increment,
						max: spec.max,
					})
				);
				break;
		}
	}

	return new IndicatorFrame(rows, columns);
}

import { ConfigError, type ActivePositionSide } from "@tradeloop/core";
import { macdColumns, type IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { numberParam, periodParam, type StrategyParams } from "./params";
import { fmt } from "./shared";

export interface MacdPsarConfig {
	emaLength: number;
	macdFast: number;
	macdSlow: number;
	macdSignal: number;
	sarStart: number;
	sarIncrement: number;
	sarMax: number;
}

export const MACD_PSAR_ID = "macd_psar";

export const parseMacdPsarConfig = (params: StrategyParams): MacdPsarConfig => {
	const config = {
		emaLength: periodParam(MACD_PSAR_ID, params, "emaLength", 100),
		macdFast: periodParam(MACD_PSAR_ID, params, "macdFast", 14),
		macdSlow: periodParam(MACD_PSAR_ID, params, "macdSlow", 26),
		macdSignal: periodParam(MACD_PSAR_ID, params, "macdSignal", 9),
		sarStart: numberParam(MACD_PSAR_ID, params, "sarStart", 0.005),
		sarIncrement: numberParam(MACD_PSAR_ID, params, "sarIncrement", 0.005),
		sarMax: numberParam(MACD_PSAR_ID, params, "sarMax", 0.2),
	};
	if (config.macdFast >= config.macdSlow) {
		throw new ConfigError(
			`${MACD_PSAR_ID}: macdFast (${config.macdFast}) must be below macdSlow (${config.macdSlow})`
		);
	}
	return config;
};

const EMA = "ema_trend";
const MACD = macdColumns("macd");
const SAR = "psar";

/**
 * Long-only trend follower: price above the EMA and the SAR with a
 * positive MACD histogram. The SAR doubles as the exit.
 */
export class MacdPsarStrategy implements ConditionEvaluator {
	readonly id = MACD_PSAR_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [EMA, MACD.histogram, SAR];
	readonly partialStyle = "inferred";
	readonly usesTrailingStop = false;

	constructor(config: MacdPsarConfig) {
		this.indicators = [
			{ kind: "ema", name: EMA, length: config.emaLength },
			{
				kind: "macd",
				name: "macd",
				fast: config.macdFast,
				slow: config.macdSlow,
				signal: config.macdSignal,
			},
			{
				kind: "psar",
				name: SAR,
				start: config.sarStart,
				increment: config.sarIncrement,
				max: config.sarMax,
			},
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const close = ctx.candle.close;
		const ema = ctx.frame.value(EMA, ctx.index);
		const hist = ctx.frame.value(MACD.histogram, ctx.index);
		const sar = ctx.frame.value(SAR, ctx.index);
		return close > ema && hist > 0 && close > sar
			? `trend: close ${fmt(close)} > ema ${fmt(ema)}, hist ${fmt(hist)} > 0, close > sar ${fmt(sar)}`
			: null;
	}

	shouldEnterShort(): Verdict {
		return null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const close = ctx.candle.close;
		const sar = ctx.frame.value(SAR, ctx.index);
		if (side === "LONG") {
			return close < sar ? `sar_exit: close ${fmt(close)} < sar ${fmt(sar)}` : null;
		}
		return close > sar ? `sar_exit: close ${fmt(close)} > sar ${fmt(sar)}` : null;
	}

	shouldPartialExit(): Verdict {
		return null;
	}

	initialLevels(): EntryLevels {
		return { trailingStop: null, takeProfit: null };
	}

	trailCandidate(): number | null {
		return null;
	}
}

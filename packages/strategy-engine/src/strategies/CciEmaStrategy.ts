import type { ActivePositionSide } from "@tradeloop/core";
import type { IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { numberParam, periodParam, type StrategyParams } from "./params";
import { atrOffset, fmt } from "./shared";

export interface CciEmaConfig {
	cciLength: number;
	emaLength: number;
	atrLength: number;
	atrMultiplier: number;
}

export const CCI_EMA_ID = "cci_ema";

export const parseCciEmaConfig = (params: StrategyParams): CciEmaConfig => ({
	cciLength: periodParam(CCI_EMA_ID, params, "cciLength", 20),
	emaLength: periodParam(CCI_EMA_ID, params, "emaLength", 50),
	atrLength: periodParam(CCI_EMA_ID, params, "atrLength", 20),
	atrMultiplier: numberParam(CCI_EMA_ID, params, "atrMultiplier", 9),
});

const CCI = "cci";
const EMA = "ema_trend";
const ATR = "atr";

/**
 * Long only. Enters while CCI is positive above the EMA, takes partial
 * profit once the bar's high reaches entry plus the current ATR multiple,
 * and closes when either filter turns. A bar that meets both the target
 * and the exit closes the whole position.
 */
export class CciEmaStrategy implements ConditionEvaluator {
	readonly id = CCI_EMA_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [CCI, EMA, ATR];
	readonly partialStyle = "explicit";
	readonly usesTrailingStop = false;

	constructor(private readonly config: CciEmaConfig) {
		this.indicators = [
			{ kind: "cci", name: CCI, length: config.cciLength },
			{ kind: "ema", name: EMA, length: config.emaLength },
			{ kind: "atr", name: ATR, length: config.atrLength },
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const cci = ctx.frame.value(CCI, ctx.index);
		const ema = ctx.frame.value(EMA, ctx.index);
		const close = ctx.candle.close;
		return cci > 0 && close > ema
			? `cci ${fmt(cci)} > 0, close ${fmt(close)} > ema ${fmt(ema)}`
			: null;
	}

	shouldEnterShort(): Verdict {
		return null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const cci = ctx.frame.value(CCI, ctx.index);
		const ema = ctx.frame.value(EMA, ctx.index);
		const close = ctx.candle.close;
		if (side === "LONG") {
			return cci < 0 || close < ema
				? `cci ${fmt(cci)} < 0 or close ${fmt(close)} < ema ${fmt(ema)}`
				: null;
		}
		return cci > 0 || close > ema
			? `cci ${fmt(cci)} > 0 or close ${fmt(close)} > ema ${fmt(ema)}`
			: null;
	}

	shouldPartialExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const entryPrice = ctx.position.entryPrice;
		if (entryPrice === null || this.shouldExit(ctx, side)) {
			return null;
		}
		const atr = ctx.frame.value(ATR, ctx.index);
		const target = atrOffset(side, entryPrice, atr, this.config.atrMultiplier, 1);
		if (side === "LONG") {
			return ctx.candle.high >= target
				? `partial_take_profit: high ${fmt(ctx.candle.high)} reached ${fmt(target)}`
				: null;
		}
		return ctx.candle.low <= target
			? `partial_take_profit: low ${fmt(ctx.candle.low)} reached ${fmt(target)}`
			: null;
	}

	initialLevels(
		ctx: EvaluationContext,
		side: ActivePositionSide,
		entryPrice: number
	): EntryLevels {
		const atr = ctx.frame.value(ATR, ctx.index);
		return {
			trailingStop: null,
			takeProfit: atrOffset(side, entryPrice, atr, this.config.atrMultiplier, 1),
		};
	}

	trailCandidate(): number | null {
		return null;
	}
}

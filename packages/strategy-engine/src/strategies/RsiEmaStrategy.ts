import type { ActivePositionSide } from "@tradeloop/core";
import type { IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { numberParam, periodParam, type StrategyParams } from "./params";
import { atrOffset, columnPair, fmt } from "./shared";

export interface RsiEmaConfig {
	rsiLength: number;
	rsiEntryLevel: number;
	rsiExitLevel: number;
	emaLength: number;
	atrLength: number;
	atrMultTp: number;
	atrMultTrail: number;
}

export const RSI_EMA_ID = "rsi_ema";

export const parseRsiEmaConfig = (params: StrategyParams): RsiEmaConfig => ({
	rsiLength: periodParam(RSI_EMA_ID, params, "rsiLength", 17),
	rsiEntryLevel: numberParam(RSI_EMA_ID, params, "rsiEntryLevel", 70),
	rsiExitLevel: numberParam(RSI_EMA_ID, params, "rsiExitLevel", 35),
	emaLength: periodParam(RSI_EMA_ID, params, "emaLength", 200),
	atrLength: periodParam(RSI_EMA_ID, params, "atrLength", 17),
	atrMultTp: numberParam(RSI_EMA_ID, params, "atrMultTp", 2.5),
	atrMultTrail: numberParam(RSI_EMA_ID, params, "atrMultTrail", 2.5),
});

const RSI = "rsi";
const EMA = "ema_trend";
const ATR = "atr";

/**
 * Long-only momentum entry: RSI crossing up through the entry level while
 * price holds above the long EMA. Partial exits are signalled per side.
 */
export class RsiEmaStrategy implements ConditionEvaluator {
	readonly id = RSI_EMA_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [RSI, EMA, ATR];
	readonly partialStyle = "explicit";
	readonly usesTrailingStop = true;

	constructor(private readonly config: RsiEmaConfig) {
		this.indicators = [
			{ kind: "rsi", name: RSI, length: config.rsiLength },
			{ kind: "ema", name: EMA, length: config.emaLength },
			{ kind: "atr", name: ATR, length: config.atrLength },
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const rsi = columnPair(ctx, RSI);
		const ema = ctx.frame.value(EMA, ctx.index);
		const close = ctx.candle.close;
		const level = this.config.rsiEntryLevel;
		const crossed = rsi.previous <= level && rsi.current > level;
		return crossed && close > ema
			? `rsi_cross_up: ${fmt(rsi.previous)} -> ${fmt(rsi.current)} over ${level}, close ${fmt(close)} > ema ${fmt(ema)}`
			: null;
	}

	shouldEnterShort(): Verdict {
		return null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const ema = ctx.frame.value(EMA, ctx.index);
		const close = ctx.candle.close;
		// Shorts only exist here after adopting an exchange position.
		if (side === "SHORT") {
			return close > ema ? `close ${fmt(close)} > ema ${fmt(ema)}` : null;
		}
		const rsi = columnPair(ctx, RSI);
		const level = this.config.rsiExitLevel;
		if (rsi.previous >= level && rsi.current < level) {
			return `rsi_cross_down: ${fmt(rsi.previous)} -> ${fmt(rsi.current)} under ${level}`;
		}
		return close < ema ? `close ${fmt(close)} < ema ${fmt(ema)}` : null;
	}

	shouldPartialExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const target = ctx.position.takeProfit;
		if (target === null) {
			return null;
		}
		const close = ctx.candle.close;
		const reached = side === "LONG" ? close >= target : close <= target;
		return reached
			? `partial_take_profit: close ${fmt(close)} reached ${fmt(target)}`
			: null;
	}

	initialLevels(
		ctx: EvaluationContext,
		side: ActivePositionSide,
		entryPrice: number
	): EntryLevels {
		const atr = ctx.frame.value(ATR, ctx.index);
		return {
			trailingStop: atrOffset(side, entryPrice, atr, this.config.atrMultTrail, -1),
			takeProfit: atrOffset(side, entryPrice, atr, this.config.atrMultTp, 1),
		};
	}

	trailCandidate(ctx: EvaluationContext, side: ActivePositionSide): number | null {
		const atr = ctx.frame.value(ATR, ctx.index);
		return atrOffset(side, ctx.candle.close, atr, this.config.atrMultTrail, -1);
	}
}

import type { ActivePositionSide } from "@tradeloop/core";
import { supertrendColumns, type IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { numberParam, periodParam, type StrategyParams } from "./params";
import { columnPair, fmt } from "./shared";

export interface RsiSupertrendConfig {
	rsiLength: number;
	rsiLongLevel: number;
	atrLength: number;
	atrMultiplier: number;
}

export const RSI_SUPERTREND_ID = "rsi_supertrend";

export const parseRsiSupertrendConfig = (
	params: StrategyParams
): RsiSupertrendConfig => ({
	rsiLength: periodParam(RSI_SUPERTREND_ID, params, "rsiLength", 14),
	rsiLongLevel: numberParam(RSI_SUPERTREND_ID, params, "rsiLongLevel", 50),
	atrLength: periodParam(RSI_SUPERTREND_ID, params, "atrLength", 10),
	atrMultiplier: numberParam(RSI_SUPERTREND_ID, params, "atrMultiplier", 2),
});

const RSI = "rsi";
const TREND = supertrendColumns("supertrend");

/**
 * Long only. Enters on a fresh RSI cross above the level and holds until
 * the supertrend turns down.
 */
export class RsiSupertrendStrategy implements ConditionEvaluator {
	readonly id = RSI_SUPERTREND_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [RSI, TREND.line, TREND.direction];
	readonly partialStyle = "explicit";
	readonly usesTrailingStop = false;

	constructor(private readonly config: RsiSupertrendConfig) {
		this.indicators = [
			{ kind: "rsi", name: RSI, length: config.rsiLength },
			{
				kind: "supertrend",
				name: TREND.line,
				length: config.atrLength,
				multiplier: config.atrMultiplier,
			},
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const rsi = columnPair(ctx, RSI);
		const level = this.config.rsiLongLevel;
		return rsi.previous <= level && rsi.current > level
			? `rsi_cross_up: ${fmt(rsi.previous)} -> ${fmt(rsi.current)} over ${level}`
			: null;
	}

	shouldEnterShort(): Verdict {
		return null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const direction = columnPair(ctx, TREND.direction);
		const line = ctx.frame.value(TREND.line, ctx.index);
		if (side === "LONG") {
			return direction.previous > 0 && direction.current < 0
				? `supertrend_down: close ${fmt(ctx.candle.close)} under ${fmt(line)}`
				: null;
		}
		return direction.previous < 0 && direction.current > 0
			? `supertrend_up: close ${fmt(ctx.candle.close)} over ${fmt(line)}`
			: null;
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

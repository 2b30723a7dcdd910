import type { ActivePositionSide } from "@tradeloop/core";
import type { IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { numberParam, periodParam, type StrategyParams } from "./params";
import { fmt } from "./shared";

export interface RsiEmaTrendConfig {
	emaLength: number;
	rsiLength: number;
	rsiEntryLevel: number;
}

export const RSI_EMA_TREND_ID = "rsi_ema_trend";

export const parseRsiEmaTrendConfig = (params: StrategyParams): RsiEmaTrendConfig => ({
	emaLength: periodParam(RSI_EMA_TREND_ID, params, "emaLength", 50),
	rsiLength: periodParam(RSI_EMA_TREND_ID, params, "rsiLength", 14),
	rsiEntryLevel: numberParam(RSI_EMA_TREND_ID, params, "rsiEntryLevel", 40),
});

const RSI = "rsi";
const EMA = "ema_trend";

/**
 * Long only. The entry state is close above the EMA with RSI above the
 * level; only the first bar of that state enters, so a restart in the
 * middle of a trend waits for the next one.
 */
export class RsiEmaTrendStrategy implements ConditionEvaluator {
	readonly id = RSI_EMA_TREND_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [RSI, EMA];
	readonly partialStyle = "explicit";
	readonly usesTrailingStop = false;

	constructor(private readonly config: RsiEmaTrendConfig) {
		this.indicators = [
			{ kind: "ema", name: EMA, length: config.emaLength },
			{ kind: "rsi", name: RSI, length: config.rsiLength },
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const now = this.inEntryState(ctx, ctx.index, ctx.candle.close);
		const before = this.inEntryState(ctx, ctx.index - 1, ctx.previous.close);
		if (!now || before) {
			return null;
		}
		const ema = ctx.frame.value(EMA, ctx.index);
		const rsi = ctx.frame.value(RSI, ctx.index);
		return `fresh_entry: close ${fmt(ctx.candle.close)} > ema ${fmt(ema)}, rsi ${fmt(rsi)} > ${this.config.rsiEntryLevel}`;
	}

	shouldEnterShort(): Verdict {
		return null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const ema = ctx.frame.value(EMA, ctx.index);
		const close = ctx.candle.close;
		if (side === "LONG") {
			return close < ema ? `close ${fmt(close)} < ema ${fmt(ema)}` : null;
		}
		return close > ema ? `close ${fmt(close)} > ema ${fmt(ema)}` : null;
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

	private inEntryState(ctx: EvaluationContext, index: number, close: number): boolean {
		return (
			close > ctx.frame.value(EMA, index) &&
			ctx.frame.value(RSI, index) > this.config.rsiEntryLevel
		);
	}
}

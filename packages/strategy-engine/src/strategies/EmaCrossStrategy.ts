import { ConfigError, type ActivePositionSide } from "@tradeloop/core";
import type { IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { periodParam, type StrategyParams } from "./params";
import { columnPair, crossedAbove, crossedBelow, fmt } from "./shared";

export interface EmaCrossConfig {
	fastLength: number;
	slowLength: number;
}

export const EMA_CROSS_ID = "ema_cross";

export const parseEmaCrossConfig = (params: StrategyParams): EmaCrossConfig => {
	const config = {
		fastLength: periodParam(EMA_CROSS_ID, params, "fastLength", 10),
		slowLength: periodParam(EMA_CROSS_ID, params, "slowLength", 20),
	};
	if (config.fastLength >= config.slowLength) {
		throw new ConfigError(
			`${EMA_CROSS_ID}: fastLength (${config.fastLength}) must be below slowLength (${config.slowLength})`
		);
	}
	return config;
};

const FAST = "ema_fast";
const SLOW = "ema_slow";

/**
 * Fast/slow EMA crossover. The opposite cross closes the position; with
 * flips allowed the state machine reverses on the same bar.
 */
export class EmaCrossStrategy implements ConditionEvaluator {
	readonly id = EMA_CROSS_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [FAST, SLOW];
	readonly partialStyle = "inferred";
	readonly usesTrailingStop = false;

	constructor(private readonly config: EmaCrossConfig) {
		this.indicators = [
			{ kind: "ema", name: FAST, length: config.fastLength },
			{ kind: "ema", name: SLOW, length: config.slowLength },
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const fast = columnPair(ctx, FAST);
		const slow = columnPair(ctx, SLOW);
		return crossedAbove(fast, slow)
			? `bullish_cross: ema${this.config.fastLength} ${fmt(fast.current)} > ema${this.config.slowLength} ${fmt(slow.current)}`
			: null;
	}

	shouldEnterShort(ctx: EvaluationContext): Verdict {
		const fast = columnPair(ctx, FAST);
		const slow = columnPair(ctx, SLOW);
		return crossedBelow(fast, slow)
			? `bearish_cross: ema${this.config.fastLength} ${fmt(fast.current)} < ema${this.config.slowLength} ${fmt(slow.current)}`
			: null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		return side === "LONG" ? this.shouldEnterShort(ctx) : this.shouldEnterLong(ctx);
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

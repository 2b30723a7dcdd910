import type { ActivePositionSide } from "@tradeloop/core";
import type { IndicatorSpec } from "@tradeloop/indicators";
import type {
	ClosedPosition,
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import {
	booleanParam,
	numberParam,
	periodParam,
	type StrategyParams,
} from "./params";
import { fmt } from "./shared";

export interface DoubleDipRsiConfig {
	rsiLength: number;
	longEntryLevel: number;
	longExitLevel: number;
	shortEntryLevel: number;
	shortExitLevel: number;
	/** Only short after a long that lasted at least `minLongDays`. */
	requireLongDuration: boolean;
	minLongDays: number;
}

export const DOUBLE_DIP_RSI_ID = "double_dip_rsi";

const DAY_MS = 24 * 60 * 60 * 1000;

export const parseDoubleDipRsiConfig = (params: StrategyParams): DoubleDipRsiConfig => ({
	rsiLength: periodParam(DOUBLE_DIP_RSI_ID, params, "rsiLength", 14),
	longEntryLevel: numberParam(DOUBLE_DIP_RSI_ID, params, "longEntryLevel", 50),
	longExitLevel: numberParam(DOUBLE_DIP_RSI_ID, params, "longExitLevel", 40),
	shortEntryLevel: numberParam(DOUBLE_DIP_RSI_ID, params, "shortEntryLevel", 35),
	shortExitLevel: numberParam(DOUBLE_DIP_RSI_ID, params, "shortExitLevel", 35),
	requireLongDuration: booleanParam(
		DOUBLE_DIP_RSI_ID,
		params,
		"requireLongDuration",
		true
	),
	minLongDays: numberParam(DOUBLE_DIP_RSI_ID, params, "minLongDays", 2),
});

const RSI = "rsi";

/**
 * RSI level strategy on both sides. A short needs the last completed long
 * to have lasted `minLongDays`; with no completed long there is no short.
 * Each qualifying long allows one short.
 */
export class DoubleDipRsiStrategy implements ConditionEvaluator {
	readonly id = DOUBLE_DIP_RSI_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [RSI];
	readonly partialStyle = "explicit";
	readonly usesTrailingStop = false;
	private lastLongDurationMs = 0;

	constructor(private readonly config: DoubleDipRsiConfig) {
		this.indicators = [{ kind: "rsi", name: RSI, length: config.rsiLength }];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const rsi = ctx.frame.value(RSI, ctx.index);
		return rsi > this.config.longEntryLevel
			? `rsi ${fmt(rsi)} > ${this.config.longEntryLevel}`
			: null;
	}

	shouldEnterShort(ctx: EvaluationContext): Verdict {
		const rsi = ctx.frame.value(RSI, ctx.index);
		if (!(rsi < this.config.shortEntryLevel) || !this.shortAllowed()) {
			return null;
		}
		const days = this.lastLongDurationMs / DAY_MS;
		return `rsi ${fmt(rsi)} < ${this.config.shortEntryLevel} after a ${days.toFixed(2)}d long`;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const rsi = ctx.frame.value(RSI, ctx.index);
		if (side === "LONG") {
			return rsi < this.config.longExitLevel
				? `rsi ${fmt(rsi)} < ${this.config.longExitLevel}`
				: null;
		}
		return rsi > this.config.shortExitLevel
			? `rsi ${fmt(rsi)} > ${this.config.shortExitLevel}`
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

	positionOpened(side: ActivePositionSide): void {
		if (side === "SHORT") {
			this.lastLongDurationMs = 0;
		}
	}

	positionClosed(trade: ClosedPosition): void {
		if (trade.side === "LONG" && trade.entryTime !== null) {
			this.lastLongDurationMs = Math.max(trade.exitTime - trade.entryTime, 0);
		}
	}

	private shortAllowed(): boolean {
		if (!this.config.requireLongDuration) {
			return true;
		}
		return (
			this.lastLongDurationMs > 0 &&
			this.lastLongDurationMs >= this.config.minLongDays * DAY_MS
		);
	}
}

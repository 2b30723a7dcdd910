import type { ActivePositionSide } from "@tradeloop/core";
import { donchianColumns, type IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EntryLevels,
	EvaluationContext,
	Verdict,
} from "../types";
import { numberParam, periodParam, type StrategyParams } from "./params";
import { atrOffset, fmt, unrealisedPct } from "./shared";

export interface DonchianChannelConfig {
	enterPeriod: number;
	exitPeriod: number;
	atrPeriod: number;
	atrMultTp: number;
	atrMultTrail: number;
	emaLength: number;
	/** Unrealised move in percent below which the position is closed. */
	pnlExitThreshold: number;
}

export const DONCHIAN_CHANNEL_ID = "donchian_channel";

export const parseDonchianChannelConfig = (
	params: StrategyParams
): DonchianChannelConfig => ({
	enterPeriod: periodParam(DONCHIAN_CHANNEL_ID, params, "enterPeriod", 20),
	exitPeriod: periodParam(DONCHIAN_CHANNEL_ID, params, "exitPeriod", 10),
	atrPeriod: periodParam(DONCHIAN_CHANNEL_ID, params, "atrPeriod", 16),
	atrMultTp: numberParam(DONCHIAN_CHANNEL_ID, params, "atrMultTp", 4),
	atrMultTrail: numberParam(DONCHIAN_CHANNEL_ID, params, "atrMultTrail", 2),
	emaLength: periodParam(DONCHIAN_CHANNEL_ID, params, "emaLength", 100),
	pnlExitThreshold: numberParam(
		DONCHIAN_CHANNEL_ID,
		params,
		"pnlExitThreshold",
		-10,
		{ signed: true }
	),
});

const UPPER = donchianColumns("dc_enter").upper;
const LOWER = donchianColumns("dc_exit").lower;
const ATR = "atr";
const EMA = "ema_trend";

/**
 * Channel breakout with an EMA trend filter. Breakouts compare the closed
 * candle against the previous bar's channel, so the bar cannot confirm
 * itself. Upper band uses the entry period, lower band the exit period.
 */
export class DonchianChannelStrategy implements ConditionEvaluator {
	readonly id = DONCHIAN_CHANNEL_ID;
	readonly indicators: readonly IndicatorSpec[];
	readonly requiredColumns = [UPPER, LOWER, ATR, EMA];
	readonly partialStyle = "inferred";
	readonly usesTrailingStop = true;

	constructor(private readonly config: DonchianChannelConfig) {
		this.indicators = [
			{ kind: "donchian", name: "dc_enter", length: config.enterPeriod },
			{ kind: "donchian", name: "dc_exit", length: config.exitPeriod },
			{ kind: "atr", name: ATR, length: config.atrPeriod },
			{ kind: "ema", name: EMA, length: config.emaLength },
		];
	}

	shouldEnterLong(ctx: EvaluationContext): Verdict {
		const close = ctx.candle.close;
		const upper = ctx.frame.value(UPPER, ctx.index - 1);
		const ema = ctx.frame.value(EMA, ctx.index);
		return close >= upper && close > ema
			? `breakout: close ${fmt(close)} >= upper ${fmt(upper)} above ema ${fmt(ema)}`
			: null;
	}

	shouldEnterShort(ctx: EvaluationContext): Verdict {
		const close = ctx.candle.close;
		const lower = ctx.frame.value(LOWER, ctx.index - 1);
		const ema = ctx.frame.value(EMA, ctx.index);
		return close <= lower && close < ema
			? `breakdown: close ${fmt(close)} <= lower ${fmt(lower)} below ema ${fmt(ema)}`
			: null;
	}

	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict {
		const close = ctx.candle.close;
		const entryPrice = ctx.position.entryPrice;
		if (entryPrice !== null && entryPrice > 0) {
			const pnl = unrealisedPct(side, entryPrice, close);
			if (pnl < this.config.pnlExitThreshold) {
				return `pnl_guard: ${pnl.toFixed(2)}% < ${this.config.pnlExitThreshold}%`;
			}
		}

		if (side === "LONG") {
			const lower = ctx.frame.value(LOWER, ctx.index - 1);
			return close <= lower
				? `channel_exit: close ${fmt(close)} <= lower ${fmt(lower)}`
				: null;
		}
		const upper = ctx.frame.value(UPPER, ctx.index - 1);
		return close >= upper
			? `channel_exit: close ${fmt(close)} >= upper ${fmt(upper)}`
			: null;
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

import type { ActivePositionSide } from "@tradeloop/core";
import type { EvaluationContext } from "../types";

export interface ColumnPair {
	previous: number;
	current: number;
}

export const columnPair = (ctx: EvaluationContext, name: string): ColumnPair => ({
	previous: ctx.frame.value(name, ctx.index - 1),
	current: ctx.frame.value(name, ctx.index),
});

export const crossedAbove = (a: ColumnPair, b: ColumnPair): boolean =>
	a.previous <= b.previous && a.current > b.current;

export const crossedBelow = (a: ColumnPair, b: ColumnPair): boolean =>
	a.previous >= b.previous && a.current < b.current;

/** Price move since entry in percent, positive when the position gains. */
export const unrealisedPct = (
	side: ActivePositionSide,
	entryPrice: number,
	price: number
): number => {
	const move = ((price - entryPrice) / entryPrice) * 100;
	return side === "LONG" ? move : -move;
};

/** ATR-scaled level on the profitable (+1) or losing (-1) side of `price`. */
export const atrOffset = (
	side: ActivePositionSide,
	price: number,
	atr: number,
	multiplier: number,
	direction: 1 | -1
): number => {
	const sign = side === "LONG" ? direction : -direction;
	return price + sign * atr * multiplier;
};

export const fmt = (value: number): string => value.toFixed(4);

import { ValidationError, type AssetRiskConfig } from "@tradeloop/core";

export interface SizingInput {
	targetMargin: number;
	leverage: number;
	price: number;
	contractValue: number;
	/** Keep the size even so a half-position partial exit is whole. */
	partialExits: boolean;
}

// Guards floor() against 9.999999 style results of the division.
const EPSILON = 1e-9;

const requirePositive = (value: number, field: string): void => {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ValidationError(field, `must be a positive number, got ${value}`);
	}
};

export const computePositionSize = (input: SizingInput): number => {
	requirePositive(input.targetMargin, "targetMargin");
	requirePositive(input.leverage, "leverage");
	requirePositive(input.price, "price");
	requirePositive(input.contractValue, "contractValue");

	const notional = input.targetMargin * input.leverage;
	const contracts = Math.max(
		Math.floor(notional / (input.price * input.contractValue) + EPSILON),
		1
	);
	if (!input.partialExits) {
		return contracts;
	}
	return Math.max(Math.round(contracts / 2) * 2, 2);
};

/**
 * Sizes entries for one asset. Partial exits change the rounding, so the
 * sizer is built from the already resolved per-asset risk settings.
 */
export class PositionSizer {
	constructor(
		private readonly risk: Pick<
			AssetRiskConfig,
			"targetMargin" | "leverage" | "contractValue" | "enablePartialExits"
		>
	) {}

	get leverage(): number {
		return this.risk.leverage;
	}

	size(price: number): number {
		return computePositionSize({
			targetMargin: this.risk.targetMargin,
			leverage: this.risk.leverage,
			contractValue: this.risk.contractValue,
			partialExits: this.risk.enablePartialExits,
			price,
		});
	}
}

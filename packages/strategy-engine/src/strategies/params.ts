import { ConfigError } from "@tradeloop/core";

export type StrategyParams = Record<string, unknown>;

interface NumberRule {
	integer?: boolean;
	/** Allow zero and negative values. */
	signed?: boolean;
}

/**
 * Read one numeric strategy parameter, falling back to the strategy's
 * default when the profile leaves it out.
 */
export const numberParam = (
	strategyId: string,
	params: StrategyParams,
	key: string,
	fallback: number,
	rule: NumberRule = {}
): number => {
	const raw = params[key];
	if (raw === undefined) {
		return fallback;
	}
	if (typeof raw !== "number" || !Number.isFinite(raw)) {
		throw new ConfigError(`${strategyId}.params.${key} must be a number`);
	}
	if (rule.integer && !Number.isInteger(raw)) {
		throw new ConfigError(`${strategyId}.params.${key} must be an integer, got ${raw}`);
	}
	if (!rule.signed && raw <= 0) {
		throw new ConfigError(`${strategyId}.params.${key} must be positive, got ${raw}`);
	}
	return raw;
};

export const periodParam = (
	strategyId: string,
	params: StrategyParams,
	key: string,
	fallback: number
): number => numberParam(strategyId, params, key, fallback, { integer: true });

export const booleanParam = (
	strategyId: string,
	params: StrategyParams,
	key: string,
	fallback: boolean
): boolean => {
	const raw = params[key];
	if (raw === undefined) {
		return fallback;
	}
	if (typeof raw !== "boolean") {
		throw new ConfigError(`${strategyId}.params.${key} must be true or false`);
	}
	return raw;
};

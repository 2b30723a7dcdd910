import {
	ConfigError,
	type ModuleLogger,
	type StrategyConfig,
} from "@tradeloop/core";
import { StrategyStateMachine } from "./stateMachine";
import {
	CCI_EMA_ID,
	CciEmaStrategy,
	parseCciEmaConfig,
} from "./strategies/CciEmaStrategy";
import {
	DONCHIAN_CHANNEL_ID,
	DonchianChannelStrategy,
	parseDonchianChannelConfig,
} from "./strategies/DonchianChannelStrategy";
import {
	DOUBLE_DIP_RSI_ID,
	DoubleDipRsiStrategy,
	parseDoubleDipRsiConfig,
} from "./strategies/DoubleDipRsiStrategy";
import {
	EMA_CROSS_ID,
	EmaCrossStrategy,
	parseEmaCrossConfig,
} from "./strategies/EmaCrossStrategy";
import {
	MACD_PSAR_ID,
	MacdPsarStrategy,
	parseMacdPsarConfig,
} from "./strategies/MacdPsarStrategy";
import {
	RSI_EMA_ID,
	RsiEmaStrategy,
	parseRsiEmaConfig,
} from "./strategies/RsiEmaStrategy";
import {
	RSI_EMA_TREND_ID,
	RsiEmaTrendStrategy,
	parseRsiEmaTrendConfig,
} from "./strategies/RsiEmaTrendStrategy";
import {
	RSI_SUPERTREND_ID,
	RsiSupertrendStrategy,
	parseRsiSupertrendConfig,
} from "./strategies/RsiSupertrendStrategy";
import type { StrategyParams } from "./strategies/params";
import type { ConditionEvaluator, TradingStrategy } from "./types";

export interface StrategyManifest {
	id: string;
	name: string;
	description: string;
	/** Profile under config/strategies used when none is given. */
	defaultProfile: string;
}

interface StrategyDefinition<TConfig> {
	manifest: StrategyManifest;
	parse: (params: StrategyParams) => TConfig;
	create: (config: TConfig) => ConditionEvaluator;
}

export interface RegisteredStrategy {
	manifest: StrategyManifest;
	build: (params: StrategyParams) => ConditionEvaluator;
}

const defineStrategy = <TConfig>(
	definition: StrategyDefinition<TConfig>
): RegisteredStrategy => ({
	manifest: definition.manifest,
	build: (params) => definition.create(definition.parse(params)),
});

const STRATEGY_REGISTRY = {
	[EMA_CROSS_ID]: defineStrategy({
		manifest: {
			id: EMA_CROSS_ID,
			name: "EMA Cross",
			description: "Fast/slow EMA crossover with optional same-bar reversal",
			defaultProfile: "ema-cross",
		},
		parse: parseEmaCrossConfig,
		create: (config) => new EmaCrossStrategy(config),
	}),
	[DONCHIAN_CHANNEL_ID]: defineStrategy({
		manifest: {
			id: DONCHIAN_CHANNEL_ID,
			name: "Donchian Channel",
			description:
				"Channel breakout with EMA filter, ATR trailing stop and partial take-profit",
			defaultProfile: "donchian-channel",
		},
		parse: parseDonchianChannelConfig,
		create: (config) => new DonchianChannelStrategy(config),
	}),
	[RSI_EMA_ID]: defineStrategy({
		manifest: {
			id: RSI_EMA_ID,
			name: "RSI + EMA",
			description: "RSI momentum entry above the long EMA, long only",
			defaultProfile: "rsi-ema",
		},
		parse: parseRsiEmaConfig,
		create: (config) => new RsiEmaStrategy(config),
	}),
	[MACD_PSAR_ID]: defineStrategy({
		manifest: {
			id: MACD_PSAR_ID,
			name: "MACD + PSAR",
			description: "EMA trend, positive MACD histogram and SAR, long only",
			defaultProfile: "macd-psar",
		},
		parse: parseMacdPsarConfig,
		create: (config) => new MacdPsarStrategy(config),
	}),
	[RSI_SUPERTREND_ID]: defineStrategy({
		manifest: {
			id: RSI_SUPERTREND_ID,
			name: "RSI + Supertrend",
			description: "RSI cross entry held until the supertrend turns, long only",
			defaultProfile: "rsi-supertrend",
		},
		parse: parseRsiSupertrendConfig,
		create: (config) => new RsiSupertrendStrategy(config),
	}),
	[CCI_EMA_ID]: defineStrategy({
		manifest: {
			id: CCI_EMA_ID,
			name: "CCI + EMA",
			description: "Positive CCI above the EMA with an ATR partial target, long only",
			defaultProfile: "cci-ema",
		},
		parse: parseCciEmaConfig,
		create: (config) => new CciEmaStrategy(config),
	}),
	[DOUBLE_DIP_RSI_ID]: defineStrategy({
		manifest: {
			id: DOUBLE_DIP_RSI_ID,
			name: "Double-Dip RSI",
			description: "RSI levels on both sides, shorts only after a long of minimum duration",
			defaultProfile: "double-dip-rsi",
		},
		parse: parseDoubleDipRsiConfig,
		create: (config) => new DoubleDipRsiStrategy(config),
	}),
	[RSI_EMA_TREND_ID]: defineStrategy({
		manifest: {
			id: RSI_EMA_TREND_ID,
			name: "RSI + EMA trend",
			description: "First bar above the EMA with RSI over the level, long only",
			defaultProfile: "rsi-ema-trend",
		},
		parse: parseRsiEmaTrendConfig,
		create: (config) => new RsiEmaTrendStrategy(config),
	}),
} satisfies Record<string, RegisteredStrategy>;

export type StrategyId = keyof typeof STRATEGY_REGISTRY;

export const getRegisteredStrategyIds = (): StrategyId[] =>
	Object.keys(STRATEGY_REGISTRY).filter(isRegisteredStrategyId);

export const isRegisteredStrategyId = (value: string): value is StrategyId =>
	Object.prototype.hasOwnProperty.call(STRATEGY_REGISTRY, value);

export const getStrategyDefinition = (id: string): RegisteredStrategy => {
	if (!isRegisteredStrategyId(id)) {
		throw new ConfigError(
			`Unknown strategy "${id}". Registered: ${getRegisteredStrategyIds().join(", ")}`
		);
	}
	return STRATEGY_REGISTRY[id];
};

export interface CreateStrategyOptions {
	partialExits: boolean;
	logger?: ModuleLogger;
}

/**
 * Build the state machine for a loaded strategy profile.
 */
export const createStrategy = (
	config: StrategyConfig,
	options: CreateStrategyOptions
): TradingStrategy => {
	const evaluator = getStrategyDefinition(config.id).build(config.params);
	return new StrategyStateMachine(evaluator, {
		symbol: config.symbol,
		tradeMode: config.tradeMode,
		allowFlip: config.allowFlip,
		partialExits: options.partialExits,
		logger: options.logger,
	});
};

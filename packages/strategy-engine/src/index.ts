/**
 * Signal generation: a generic position state machine driven by
 * per-strategy condition evaluators.
 */
export * from "./types";
export { StrategyStateMachine, type StateMachineOptions } from "./stateMachine";
export {
	createStrategy,
	getRegisteredStrategyIds,
	getStrategyDefinition,
	isRegisteredStrategyId,
	type CreateStrategyOptions,
	type RegisteredStrategy,
	type StrategyId,
	type StrategyManifest,
} from "./registry";
export {
	EmaCrossStrategy,
	parseEmaCrossConfig,
	type EmaCrossConfig,
} from "./strategies/EmaCrossStrategy";
export {
	DonchianChannelStrategy,
	parseDonchianChannelConfig,
	type DonchianChannelConfig,
} from "./strategies/DonchianChannelStrategy";
export {
	RsiEmaStrategy,
	parseRsiEmaConfig,
	type RsiEmaConfig,
} from "./strategies/RsiEmaStrategy";
export {
	MacdPsarStrategy,
	parseMacdPsarConfig,
	type MacdPsarConfig,
} from "./strategies/MacdPsarStrategy";
export {
	RsiSupertrendStrategy,
	parseRsiSupertrendConfig,
	type RsiSupertrendConfig,
} from "./strategies/RsiSupertrendStrategy";
export {
	CciEmaStrategy,
	parseCciEmaConfig,
	type CciEmaConfig,
} from "./strategies/CciEmaStrategy";
export {
	DoubleDipRsiStrategy,
	parseDoubleDipRsiConfig,
	type DoubleDipRsiConfig,
} from "./strategies/DoubleDipRsiStrategy";
export {
	RsiEmaTrendStrategy,
	parseRsiEmaTrendConfig,
	type RsiEmaTrendConfig,
} from "./strategies/RsiEmaTrendStrategy";

export { aggregateCandle, aggregateCandles } from "./marketData/aggregateCandles";
export { closedCandleIndex, livePrice } from "./marketData/closedCandle";
export { heikinAshi } from "./marketData/heikinAshi";
export { prepareCandles, type CandleSeriesSettings } from "./marketData/prepareCandles";
export {
	loadCandleHistory,
	type CandleHistoryDeps,
	type CandleHistoryRequest,
} from "./marketData/loadCandleHistory";
export {
	ExchangeCandleFeed,
	type CandleFeed,
	type ExchangeCandleFeedOptions,
} from "./marketData/candleFeed";
export { LogAlertSink } from "./alerts/logAlertSink";
export {
	ThrottledAlertSink,
	DEFAULT_ALERT_THROTTLE_MS,
	type ThrottledAlertSinkOptions,
} from "./alerts/throttledAlertSink";
export { StrategyRunner, type StrategyRunnerOptions } from "./runner/strategyRunner";
export { PollingLoop, type PollingLoopOptions } from "./runner/pollingLoop";
export {
	nextTickDelay,
	type CooldownSettings,
	type DelayKind,
	type NextDelay,
} from "./runner/cooldown";
export type { TickDriver, TickFailure, TickOutcome } from "./runner/types";
export {
	replayHistory,
	type ReplayOptions,
	type ReplayReport,
	type ReplaySettings,
} from "./replay/replayHistory";

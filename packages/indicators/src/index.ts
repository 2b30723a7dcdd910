export { ema, emaSeries } from "./ema";
export { rsiSeries } from "./rsi";
export { calculateATR, calculateATRSeries, type AtrInput } from "./atr";
export { macdSeries, type MacdSeries } from "./macd";
export { donchianSeries, type DonchianSeries } from "./donchian";
export {
	psarSeries,
	DEFAULT_PSAR_OPTIONS,
	type PsarOptions,
} from "./psar";
export { cciSeries, type CciInput } from "./cci";
export {
	supertrendSeries,
	type SupertrendInput,
	type SupertrendSeries,
} from "./supertrend";
export {
	attachIndicators,
	IndicatorFrame,
	donchianColumns,
	macdColumns,
	supertrendColumns,
	type IndicatorSpec,
} from "./frame";

import type { Candle, CandleType } from "@tradeloop/core";
import { aggregateCandles } from "./aggregateCandles";
import { heikinAshi } from "./heikinAshi";

export interface CandleSeriesSettings {
	symbol: string;
	baseTimeframe: string;
	timeframe: string;
	candleType: CandleType;
}

/**
 * Base candles in, strategy candles out: aggregation first, then the
 * optional Heikin-Ashi transform.
 */
export const prepareCandles = (
	baseCandles: readonly Candle[],
	settings: CandleSeriesSettings
): Candle[] => {
	const aggregated = aggregateCandles(
		baseCandles,
		settings.baseTimeframe,
		settings.timeframe,
		settings.symbol
	);
	return settings.candleType === "heikin-ashi"
		? heikinAshi(aggregated)
		: aggregated;
};

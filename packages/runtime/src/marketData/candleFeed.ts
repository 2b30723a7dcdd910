import type { Candle, MarketDataClient, ModuleLogger } from "@tradeloop/core";
import type { ApiGateway } from "@tradeloop/gateway";
import { loadCandleHistory } from "./loadCandleHistory";

/**
 * Source of base-timeframe candles for one tick. The runner asks for the
 * whole window every time; nothing is cached between ticks.
 */
export interface CandleFeed {
	load(now: number): Promise<Candle[]>;
}

export interface ExchangeCandleFeedOptions {
	client: MarketDataClient;
	gateway: ApiGateway;
	symbol: string;
	timeframe: string;
	count: number;
	pageLimit?: number;
	logger?: ModuleLogger;
}

export class ExchangeCandleFeed implements CandleFeed {
	constructor(private readonly options: ExchangeCandleFeedOptions) {}

	load(now: number): Promise<Candle[]> {
		return loadCandleHistory(
			{
				symbol: this.options.symbol,
				timeframe: this.options.timeframe,
				count: this.options.count,
				pageLimit: this.options.pageLimit,
				now,
			},
			{
				client: this.options.client,
				gateway: this.options.gateway,
				logger: this.options.logger,
			}
		);
	}
}

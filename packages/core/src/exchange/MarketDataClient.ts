import type { Candle } from "../types";

/**
 * Market data client interface for fetching historical and real-time candle data.
 */
export interface MarketDataClient {
	/**
	 * Fetch OHLCV candle data for a symbol and timeframe.
	 * @param symbol - Exchange symbol (e.g., "BTC/USD:USD")
	 * @param timeframe - Timeframe string (e.g., "1m", "5m", "1h")
	 * @param limit - Maximum number of candles to fetch (default: 500)
	 * @param since - Optional timestamp to fetch candles from
	 * @returns Array of candles in chronological order
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;

	/** One-off instrument metadata fetch, where the venue needs it first. */
	loadMarkets?(): Promise<void>;
}

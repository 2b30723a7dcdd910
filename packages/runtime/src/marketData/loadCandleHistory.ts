import {
	bucketTimestamp,
	createLogger,
	timeframeToMs,
	ValidationError,
	type Candle,
	type MarketDataClient,
	type ModuleLogger,
} from "@tradeloop/core";
import type { ApiGateway } from "@tradeloop/gateway";

const DEFAULT_PAGE_LIMIT = 500;

export interface CandleHistoryRequest {
	symbol: string;
	timeframe: string;
	/** How many intervals to load, counted back from the interval holding `now`. */
	count: number;
	now: number;
	pageLimit?: number;
}

export interface CandleHistoryDeps {
	client: MarketDataClient;
	gateway: ApiGateway;
	logger?: ModuleLogger;
}

/**
 * Page forward from `now - count` intervals until the exchange runs dry.
 * Every page goes through the gateway, so a long history costs one
 * rate-limit slot per page. Duplicate open times keep the later page's
 * row; the result is sorted and may end with the forming candle.
 */
export const loadCandleHistory = async (
	request: CandleHistoryRequest,
	deps: CandleHistoryDeps
): Promise<Candle[]> => {
	if (!Number.isInteger(request.count) || request.count <= 0) {
		throw new ValidationError("count", `must be a positive integer, got ${request.count}`);
	}
	const logger = deps.logger ?? createLogger("runtime:history");
	const tfMs = timeframeToMs(request.timeframe);
	const pageLimit = request.pageLimit ?? DEFAULT_PAGE_LIMIT;
	const start = bucketTimestamp(request.now, tfMs) - (request.count - 1) * tfMs;

	const byTimestamp = new Map<number, Candle>();
	let since = Math.max(start, 0);
	let pages = 0;
	while (since <= request.now) {
		const page = await deps.gateway.call("fetch_candles", () =>
			deps.client.fetchOHLCV(request.symbol, request.timeframe, pageLimit, since)
		);
		pages += 1;
		const fresh = page.filter(
			(candle) => candle.timestamp >= start && candle.timestamp <= request.now
		);
		for (const candle of fresh) {
			byTimestamp.set(candle.timestamp, {
				...candle,
				symbol: request.symbol,
				timeframe: request.timeframe,
			});
		}
		if (!fresh.length || page.length < pageLimit) {
			break;
		}
		const newest = Math.max(...fresh.map((candle) => candle.timestamp));
		if (newest < since) {
			break;
		}
		since = newest + tfMs;
	}

	const candles = [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
	logger.debug("candle_history_loaded", {
		symbol: request.symbol,
		timeframe: request.timeframe,
		requested: request.count,
		received: candles.length,
		pages,
	});
	return candles;
};

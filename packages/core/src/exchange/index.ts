export type {
	ExchangePositionSnapshot,
	ExchangeOrder,
	ExecutionClient,
	MarketOrderOptions,
} from "./ExecutionClient";
export type { MarketDataClient } from "./MarketDataClient";

import type { ExchangePositionSnapshot } from "./ExecutionClient";

export const flatExchangePosition = (): ExchangePositionSnapshot => ({
	side: "FLAT",
	size: 0,
	entryPrice: null,
	unrealizedPnl: null,
});

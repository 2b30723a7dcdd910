import type { PositionSide, TradeOrderSide } from "../types";

/**
 * Authoritative position as reported by the exchange.
 */
export interface ExchangePositionSnapshot {
	side: PositionSide;
	size: number;
	entryPrice: number | null;
	unrealizedPnl: number | null;
}

/**
 * Minimal order information returned by exchange execution clients.
 * This mirrors the CCXT Order type subset we actually use.
 */
export interface ExchangeOrder {
	id: string;
	symbol: string;
	type: string;
	side: TradeOrderSide;
	amount: number;
	price?: number;
	average?: number;
}

export interface MarketOrderOptions {
	reduceOnly?: boolean;
}

/**
 * Execution client interface for placing orders and managing positions.
 *
 * Implementations perform exactly one request per call and report failures
 * as `ExchangeRequestError`; retrying and rate limiting belong to the
 * gateway wrapped around them.
 */
export interface ExecutionClient {
	/**
	 * Create a market order (immediate execution at current market price).
	 * @param symbol - Trading pair symbol
	 * @param side - Order side ("buy" or "sell")
	 * @param amount - Order size in contracts
	 */
	createMarketOrder(
		symbol: string,
		side: TradeOrderSide,
		amount: number,
		options?: MarketOrderOptions
	): Promise<ExchangeOrder>;

	/**
	 * Get current position for a symbol.
	 * @returns Position snapshot (FLAT if no position)
	 */
	getPosition(symbol: string): Promise<ExchangePositionSnapshot>;

	setLeverage(symbol: string, leverage: number): Promise<void>;
}

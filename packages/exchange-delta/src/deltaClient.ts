import ccxt from "ccxt";
import type { OHLCV, Position, delta } from "ccxt";
import {
	createLogger,
	ValidationError,
	type Candle,
	type ExchangeOrder,
	type ExchangePositionSnapshot,
	type ExecutionClient,
	type MarketDataClient,
	type MarketOrderOptions,
	type TradeOrderSide,
} from "@tradeloop/core";
import { toExchangeRequestError } from "./errors";
import { mapCcxtCandleToCandle, mapCcxtPosition } from "./utils/ccxtMapper";

const deltaLogger = createLogger("exchange:delta");

export interface DeltaClientOptions {
	apiKey?: string;
	secret?: string;
	testnet?: boolean;
}

/**
 * Delta Exchange perpetuals through ccxt. One method call is one request:
 * ccxt's own throttle is disabled because the gateway owns the budget.
 */
export class DeltaClient implements MarketDataClient, ExecutionClient {
	private readonly exchange: delta;
	private marketsLoaded = false;

	constructor(options: DeltaClientOptions = {}) {
		this.exchange = new ccxt.delta({
			apiKey: options.apiKey || undefined,
			secret: options.secret || undefined,
			enableRateLimit: false,
		});
		if (options.testnet) {
			this.exchange.setSandboxMode(true);
		}
	}

	hasCredentials(): boolean {
		return Boolean(this.exchange.apiKey && this.exchange.secret);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Candle[]> {
		const rows = await this.request("fetch_ohlcv", () =>
			this.exchange.fetchOHLCV(symbol, timeframe, since, limit)
		);
		return rows.map((row: OHLCV) =>
			mapCcxtCandleToCandle(row, symbol, timeframe)
		);
	}

	async createMarketOrder(
		symbol: string,
		side: TradeOrderSide,
		amount: number,
		options: MarketOrderOptions = {}
	): Promise<ExchangeOrder> {
		const order = await this.request("create_order", () =>
			this.exchange.createOrder(
				symbol,
				"market",
				side,
				amount,
				undefined,
				options.reduceOnly ? { reduceOnly: true } : {}
			)
		);
		deltaLogger.info("order_created", {
			symbol,
			side,
			amount,
			reduceOnly: options.reduceOnly ?? false,
			orderId: order.id,
			average: order.average ?? null,
		});
		return {
			id: order.id,
			symbol,
			type: order.type ?? "market",
			side,
			amount: order.amount ?? amount,
			price: order.price ?? undefined,
			average: order.average ?? undefined,
		};
	}

	async getPosition(symbol: string): Promise<ExchangePositionSnapshot> {
		const positions = await this.request("fetch_positions", () =>
			this.exchange.fetchPositions([symbol])
		);
		const match = positions.find(
			(position: Position) => position.symbol === symbol
		);
		return mapCcxtPosition(match);
	}

	async setLeverage(symbol: string, leverage: number): Promise<void> {
		await this.request("set_leverage", () =>
			this.exchange.setLeverage(leverage, symbol)
		);
		deltaLogger.info("leverage_set", { symbol, leverage });
	}

	/** Must run once, through its own gateway call, before anything else. */
	async loadMarkets(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.request("load_markets", () => this.exchange.loadMarkets());
		this.marketsLoaded = true;
		deltaLogger.info("markets_loaded", {
			markets: Object.keys(this.exchange.markets ?? {}).length,
		});
	}

	private async request<T>(label: string, fn: () => Promise<T>): Promise<T> {
		if (!this.marketsLoaded && label !== "load_markets") {
			throw new ValidationError("markets", `load markets before ${label}`);
		}
		try {
			return await fn();
		} catch (error) {
			throw toExchangeRequestError(error, label);
		}
	}
}

import {
	ExchangeRequestError,
	ValidationError,
	createLogger,
	type ActivePositionSide,
	type ExchangeOrder,
	type ExchangePositionSnapshot,
	type ExecutionClient,
	type MarketOrderOptions,
	type ModuleLogger,
	type PositionSide,
	type TradeOrderSide,
} from "@tradeloop/core";
import { PaperAccount, type PaperAccountSnapshot } from "./paperAccount";

export interface PaperExchangeOptions {
	/** Underlying units per contract, used for PnL. */
	contractValue?: number;
	startingBalance?: number;
	now?: () => number;
	logger?: ModuleLogger;
}

interface PaperPosition {
	side: PositionSide;
	size: number;
	entryPrice: number | null;
}

const direction = (side: ActivePositionSide): 1 | -1 => (side === "LONG" ? 1 : -1);

/**
 * In-process venue with one netted position per symbol. Market orders fill
 * completely at the last mark price handed to `setMarkPrice`.
 */
export class PaperExchange implements ExecutionClient {
	readonly account: PaperAccount;
	private readonly positions = new Map<string, PaperPosition>();
	private readonly marks = new Map<string, number>();
	private readonly leverage = new Map<string, number>();
	private readonly contractValue: number;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;
	private orderSeq = 0;

	constructor(options: PaperExchangeOptions = {}) {
		this.contractValue = options.contractValue ?? 1;
		this.account = new PaperAccount(options.startingBalance ?? 10_000);
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("execution-engine:paper");
	}

	setMarkPrice(symbol: string, price: number): void {
		if (!Number.isFinite(price) || price <= 0) {
			throw new ValidationError("markPrice", `must be positive, got ${price}`);
		}
		this.marks.set(symbol, price);
	}

	getLeverage(symbol: string): number | null {
		return this.leverage.get(symbol) ?? null;
	}

	async setLeverage(symbol: string, leverage: number): Promise<void> {
		this.leverage.set(symbol, leverage);
	}

	async getPosition(symbol: string): Promise<ExchangePositionSnapshot> {
		const position = this.ensurePosition(symbol);
		return {
			side: position.side,
			size: position.size,
			entryPrice: position.entryPrice,
			unrealizedPnl: this.unrealized(symbol, position),
		};
	}

	async createMarketOrder(
		symbol: string,
		side: TradeOrderSide,
		amount: number,
		options: MarketOrderOptions = {}
	): Promise<ExchangeOrder> {
		if (!Number.isFinite(amount) || amount <= 0) {
			throw new ExchangeRequestError(`create_order: invalid amount ${amount}`, {
				status: 422,
				kind: "http",
			});
		}
		const price = this.markPrice(symbol);
		const position = this.ensurePosition(symbol);
		const orderSide: ActivePositionSide = side === "buy" ? "LONG" : "SHORT";

		let remaining = amount;
		if (position.side !== "FLAT" && position.side !== orderSide) {
			const closing = Math.min(remaining, position.size);
			this.realize(symbol, position, position.side, closing, price);
			remaining -= closing;
		}

		if (options.reduceOnly) {
			if (remaining === amount) {
				throw new ExchangeRequestError(
					"create_order: reduce-only order would increase the position",
					{ status: 422, kind: "http" }
				);
			}
			remaining = 0;
		}

		if (remaining > 0) {
			if (position.side === orderSide && position.entryPrice !== null) {
				const size = position.size + remaining;
				position.entryPrice =
					(position.entryPrice * position.size + price * remaining) / size;
				position.size = size;
			} else {
				position.side = orderSide;
				position.size = remaining;
				position.entryPrice = price;
			}
		}

		this.orderSeq += 1;
		const order: ExchangeOrder = {
			id: `paper-${this.orderSeq}`,
			symbol,
			type: "market",
			side,
			amount,
			price,
			average: price,
		};
		this.logger.info("paper_fill", {
			symbol,
			side,
			amount,
			price,
			reduceOnly: options.reduceOnly ?? false,
			positionSide: position.side,
			positionSize: position.size,
		});
		return order;
	}

	snapshotAccount(): PaperAccountSnapshot {
		let unrealized = 0;
		for (const [symbol, position] of this.positions) {
			unrealized += this.unrealized(symbol, position) ?? 0;
		}
		return this.account.snapshot(unrealized);
	}

	private realize(
		symbol: string,
		position: PaperPosition,
		side: ActivePositionSide,
		quantity: number,
		price: number
	): void {
		const entryPrice = position.entryPrice ?? price;
		const realizedPnl =
			(price - entryPrice) * quantity * this.contractValue * direction(side);
		this.account.registerClosedTrade({
			symbol,
			side,
			size: quantity,
			entryPrice,
			exitPrice: price,
			realizedPnl,
			timestamp: this.now(),
		});

		position.size -= quantity;
		if (position.size === 0) {
			position.side = "FLAT";
			position.entryPrice = null;
		}
	}

	private unrealized(symbol: string, position: PaperPosition): number | null {
		const mark = this.marks.get(symbol);
		if (position.side === "FLAT" || position.entryPrice === null || mark === undefined) {
			return null;
		}
		return (
			(mark - position.entryPrice) *
			position.size *
			this.contractValue *
			direction(position.side)
		);
	}

	private markPrice(symbol: string): number {
		const mark = this.marks.get(symbol);
		if (mark === undefined) {
			throw new ValidationError("markPrice", `no mark price for ${symbol}`);
		}
		return mark;
	}

	private ensurePosition(symbol: string): PaperPosition {
		const existing = this.positions.get(symbol);
		if (existing) {
			return existing;
		}
		const created: PaperPosition = { side: "FLAT", size: 0, entryPrice: null };
		this.positions.set(symbol, created);
		return created;
	}
}

import type { ActivePositionSide } from "@tradeloop/core";

export interface ClosedTrade {
	symbol: string;
	side: ActivePositionSide;
	size: number;
	entryPrice: number;
	exitPrice: number;
	realizedPnl: number;
	timestamp: number;
}

export interface PaperAccountSnapshot {
	startingBalance: number;
	balance: number;
	equity: number;
	totalRealizedPnl: number;
	maxEquity: number;
	maxDrawdown: number;
	trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	lastTrade?: ClosedTrade;
}

/**
 * Running balance of the paper exchange. A partial close counts as a trade
 * of its own.
 */
export class PaperAccount {
	private balance: number;
	private maxEquity: number;
	private maxDrawdown = 0;
	private readonly trades = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};
	private lastTrade?: ClosedTrade;

	constructor(private readonly startingBalance: number) {
		this.balance = startingBalance;
		this.maxEquity = startingBalance;
	}

	registerClosedTrade(trade: ClosedTrade): PaperAccountSnapshot {
		this.balance += trade.realizedPnl;
		this.trades.total += 1;

		if (trade.realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		this.lastTrade = trade;
		return this.snapshot(0);
	}

	snapshot(unrealizedPnl: number): PaperAccountSnapshot {
		const equity = this.balance + unrealizedPnl;
		this.maxEquity = Math.max(this.maxEquity, equity);
		this.maxDrawdown = Math.max(this.maxDrawdown, this.maxEquity - equity);

		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			equity,
			totalRealizedPnl: this.balance - this.startingBalance,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxDrawdown,
			trades: { ...this.trades },
			lastTrade: this.lastTrade,
		};
	}
}

import type { ActivePositionSide } from "./types";

export type TradeEventKind = "entry" | "exit" | "partial_exit";

export interface TradeEvent {
	kind: TradeEventKind;
	journalRef: string;
	strategyId: string;
	symbol: string;
	side: ActivePositionSide;
	quantity: number;
	remainingQuantity: number;
	price: number;
	timestamp: number;
	reason: string;
	entryPrice?: number | null;
	orderId?: string;
}

/**
 * Write-only trade journal. Callers never await it on the trading path.
 */
export interface TradeJournal {
	record(event: TradeEvent): Promise<void>;
}

export type AlertKind = "entry" | "exit" | "partial_exit" | "failure" | "status";

export interface Alert {
	kind: AlertKind;
	/** Failure and status alerts sharing a key are throttled together. */
	key: string;
	title: string;
	message: string;
	timestamp: number;
	details?: Record<string, unknown>;
}

export interface AlertSink {
	notify(alert: Alert): Promise<void>;
}

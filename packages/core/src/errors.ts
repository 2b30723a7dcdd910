import type { PositionSide } from "./types";

export class TradingError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends TradingError {}

export class ValidationError extends TradingError {
	constructor(
		readonly field: string,
		message: string
	) {
		super(`${field}: ${message}`);
	}
}

export class RateLimitTimeout extends TradingError {
	constructor(
		readonly label: string,
		readonly waitedMs: number,
		readonly maxWaitMs: number
	) {
		super(
			`Rate limiter could not grant a slot for ${label} within ${maxWaitMs}ms (waited ${waitedMs}ms)`
		);
	}
}

/**
 * Failure reported by an exchange client. The gateway classifies it:
 * `status` is the HTTP-like status (null when the request never got an
 * answer), `kind` separates transport failures from exchange replies.
 */
export class ExchangeRequestError extends TradingError {
	readonly status: number | null;
	readonly kind: "connection" | "http";

	constructor(
		message: string,
		details: { status: number | null; kind: "connection" | "http" },
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.status = details.status;
		this.kind = details.kind;
	}
}

export interface ApiErrorDetails {
	label: string;
	status: number | null;
	attempts: number;
	overloaded: boolean;
}

export class APIError extends TradingError {
	readonly label: string;
	readonly status: number | null;
	readonly attempts: number;
	readonly overloaded: boolean;

	constructor(
		message: string,
		details: ApiErrorDetails,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.label = details.label;
		this.status = details.status;
		this.attempts = details.attempts;
		this.overloaded = details.overloaded;
	}
}

export class ReconciliationMismatch extends TradingError {
	constructor(
		readonly symbol: string,
		readonly localDirection: PositionSide,
		readonly localQuantity: number,
		readonly exchangeDirection: PositionSide,
		readonly exchangeQuantity: number
	) {
		super(
			`Position drift on ${symbol}: local ${localDirection} x${localQuantity}, exchange ${exchangeDirection} x${exchangeQuantity}`
		);
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

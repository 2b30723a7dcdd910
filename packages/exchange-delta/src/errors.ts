import {
	AuthenticationError,
	BadRequest,
	DDoSProtection,
	ExchangeNotAvailable,
	InsufficientFunds,
	InvalidOrder,
	NetworkError,
	PermissionDenied,
	RateLimitExceeded,
	RequestTimeout,
} from "ccxt";
import { ExchangeRequestError, errorMessage } from "@tradeloop/core";

/**
 * Translate a ccxt failure into the status-carrying error the gateway
 * classifies. Order matters: the ccxt classes form a hierarchy.
 */
export const toExchangeRequestError = (
	error: unknown,
	label: string
): ExchangeRequestError => {
	if (error instanceof ExchangeRequestError) {
		return error;
	}
	const message = `${label}: ${errorMessage(error)}`;
	const http = (status: number): ExchangeRequestError =>
		new ExchangeRequestError(message, { status, kind: "http" }, { cause: error });

	if (error instanceof RateLimitExceeded || error instanceof DDoSProtection) {
		return http(429);
	}
	if (error instanceof ExchangeNotAvailable) {
		return http(503);
	}
	if (error instanceof RequestTimeout) {
		return http(504);
	}
	if (error instanceof NetworkError) {
		return new ExchangeRequestError(
			message,
			{ status: null, kind: "connection" },
			{ cause: error }
		);
	}
	if (error instanceof PermissionDenied) {
		return http(403);
	}
	if (error instanceof AuthenticationError) {
		return http(401);
	}
	if (error instanceof InsufficientFunds || error instanceof InvalidOrder) {
		return http(422);
	}
	if (error instanceof BadRequest) {
		return http(400);
	}
	return new ExchangeRequestError(
		message,
		{ status: null, kind: "http" },
		{ cause: error }
	);
};

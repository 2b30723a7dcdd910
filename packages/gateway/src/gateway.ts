import {
	APIError,
	ExchangeRequestError,
	createLogger,
	errorMessage,
	type ModuleLogger,
} from "@tradeloop/core";
import type { RateLimiter } from "./rateLimiter";
import { sleep as defaultSleep, type Sleep } from "./sleep";

/**
 * Statuses treated as transient. 400 is on the list because the exchange
 * answers 400 when it sheds load.
 */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([
	400, 429, 500, 502, 503, 504,
]);

export interface BackoffOptions {
	backoffBaseMs: number;
	backoffMaxMs: number;
	jitterMs: number;
	random: () => number;
}

export interface GatewayOptions extends Partial<BackoffOptions> {
	limiter: RateLimiter;
	maxRetries?: number;
	sleep?: Sleep;
	logger?: ModuleLogger;
}

/**
 * Outcome of looking for an order whose submission failed ambiguously.
 */
export type OrderVerification<T> =
	| { status: "absent" }
	| { status: "filled"; order: T }
	| { status: "unknown"; reason: string };

/**
 * Anything that can run exchange calls on behalf of the executor and the
 * reconciler.
 */
export interface ApiGateway {
	call<T>(label: string, fn: () => Promise<T>): Promise<T>;
	placeOrder<T>(
		label: string,
		submit: () => Promise<T>,
		verify: () => Promise<OrderVerification<T>>
	): Promise<T>;
}

export const computeBackoffDelay = (
	attempt: number,
	options: BackoffOptions
): number => {
	const exponential = Math.min(
		options.backoffBaseMs * 2 ** attempt,
		options.backoffMaxMs
	);
	return exponential + options.random() * options.jitterMs;
};

interface ClassifiedFailure {
	status: number | null;
	retryable: boolean;
	message: string;
}

const classify = (error: ExchangeRequestError): ClassifiedFailure => ({
	status: error.status,
	retryable:
		error.kind === "connection" ||
		(error.status !== null && RETRYABLE_STATUSES.has(error.status)),
	message: error.message,
});

const isOverloaded = (status: number | null): boolean =>
	status !== null && RETRYABLE_STATUSES.has(status);

/**
 * Rate-limited, retrying front door to the exchange.
 *
 * Every attempt (including retries) takes a limiter slot. Failures that are
 * not `ExchangeRequestError` are programming errors and pass through as-is.
 */
export class ResilientGateway implements ApiGateway {
	private readonly limiter: RateLimiter;
	private readonly maxRetries: number;
	private readonly backoff: BackoffOptions;
	private readonly sleep: Sleep;
	private readonly logger: ModuleLogger;

	constructor(options: GatewayOptions) {
		this.limiter = options.limiter;
		this.maxRetries = options.maxRetries ?? 4;
		this.backoff = {
			backoffBaseMs: options.backoffBaseMs ?? 2_000,
			backoffMaxMs: options.backoffMaxMs ?? 60_000,
			jitterMs: options.jitterMs ?? 1_000,
			random: options.random ?? Math.random,
		};
		this.sleep = options.sleep ?? defaultSleep;
		this.logger = options.logger ?? createLogger("gateway");
	}

	async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
		for (let attempt = 0; ; attempt += 1) {
			await this.limiter.acquire(label);
			try {
				return await fn();
			} catch (error) {
				const failure = this.retryableFailure(label, error, attempt);
				if (attempt >= this.maxRetries) {
					throw this.exhausted(label, failure, attempt, error);
				}
				await this.backOff(label, failure, attempt);
			}
		}
	}

	/**
	 * Submit an order. A retryable failure is only retried once `verify`
	 * confirms the order never reached the book; a confirmed fill is returned
	 * as the result and an unverifiable outcome fails the call.
	 */
	async placeOrder<T>(
		label: string,
		submit: () => Promise<T>,
		verify: () => Promise<OrderVerification<T>>
	): Promise<T> {
		for (let attempt = 0; ; attempt += 1) {
			await this.limiter.acquire(label);
			try {
				return await submit();
			} catch (error) {
				const failure = this.retryableFailure(label, error, attempt);
				const verification = await this.verifyOrder(label, verify);
				if (verification.status === "filled") {
					this.logger.warn("order_confirmed_after_error", {
						label,
						status: failure.status,
						error: failure.message,
					});
					return verification.order;
				}
				if (verification.status === "unknown") {
					this.logger.error("order_state_unknown", {
						label,
						status: failure.status,
						reason: verification.reason,
					});
					throw new APIError(
						`${label}: order state unknown after ${failure.message} (${verification.reason})`,
						{
							label,
							status: failure.status,
							attempts: attempt + 1,
							overloaded: isOverloaded(failure.status),
						},
						{ cause: error }
					);
				}
				if (attempt >= this.maxRetries) {
					throw this.exhausted(label, failure, attempt, error);
				}
				await this.backOff(label, failure, attempt);
			}
		}
	}

	/** Throws for failures that must not be retried; returns the rest. */
	private retryableFailure(
		label: string,
		error: unknown,
		attempt: number
	): ClassifiedFailure {
		if (!(error instanceof ExchangeRequestError)) {
			throw error;
		}
		const failure = classify(error);
		if (!failure.retryable) {
			this.logger.error("api_call_rejected", {
				label,
				status: failure.status,
				error: failure.message,
			});
			throw new APIError(
				`${label} failed with status ${failure.status ?? "n/a"}: ${failure.message}`,
				{
					label,
					status: failure.status,
					attempts: attempt + 1,
					overloaded: false,
				},
				{ cause: error }
			);
		}
		return failure;
	}

	private exhausted(
		label: string,
		failure: ClassifiedFailure,
		attempt: number,
		cause: unknown
	): APIError {
		this.logger.error("api_retries_exhausted", {
			label,
			status: failure.status,
			attempts: attempt + 1,
			error: failure.message,
		});
		return new APIError(
			`${label} failed after ${attempt + 1} attempts: ${failure.message}`,
			{
				label,
				status: failure.status,
				attempts: attempt + 1,
				overloaded: isOverloaded(failure.status),
			},
			{ cause }
		);
	}

	private async backOff(
		label: string,
		failure: ClassifiedFailure,
		attempt: number
	): Promise<void> {
		const delayMs = computeBackoffDelay(attempt, this.backoff);
		this.logger.warn("api_call_retry", {
			label,
			status: failure.status,
			attempt: attempt + 1,
			maxRetries: this.maxRetries,
			delayMs: Math.round(delayMs),
			error: failure.message,
		});
		await this.sleep(delayMs);
	}

	private async verifyOrder<T>(
		label: string,
		verify: () => Promise<OrderVerification<T>>
	): Promise<OrderVerification<T>> {
		try {
			return await this.call(`${label}:verify`, verify);
		} catch (error) {
			return { status: "unknown", reason: errorMessage(error) };
		}
	}
}

/**
 * Gateway without limiter or retries, for in-process venues such as the
 * paper exchange during history replay.
 */
export class DirectGateway implements ApiGateway {
	call<T>(_label: string, fn: () => Promise<T>): Promise<T> {
		return fn();
	}

	placeOrder<T>(
		_label: string,
		submit: () => Promise<T>,
		_verify: () => Promise<OrderVerification<T>>
	): Promise<T> {
		return submit();
	}
}

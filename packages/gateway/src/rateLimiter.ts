import {
	RateLimitTimeout,
	ValidationError,
	createLogger,
	type ModuleLogger,
} from "@tradeloop/core";
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from "./sleep";

export interface RateLimiterOptions {
	/** Requests allowed inside one window. */
	maxRequests?: number;
	windowMs?: number;
	/** Longest a single acquire may wait before failing. Defaults to one window. */
	maxWaitMs?: number;
	clock?: Clock;
	sleep?: Sleep;
	logger?: ModuleLogger;
}

export const DEFAULT_MAX_REQUESTS = 150;
export const DEFAULT_WINDOW_MS = 300_000;

/**
 * Sliding-window limiter shared by every caller that talks to one exchange
 * account. Acquisitions are granted strictly in call order.
 */
export class RateLimiter {
	readonly maxRequests: number;
	readonly windowMs: number;
	private readonly maxWaitMs: number;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly logger: ModuleLogger;
	private readonly granted: number[] = [];
	private queue: Promise<void> = Promise.resolve();

	constructor(options: RateLimiterOptions = {}) {
		this.maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;
		this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
		this.maxWaitMs = options.maxWaitMs ?? this.windowMs;
		if (!Number.isInteger(this.maxRequests) || this.maxRequests <= 0) {
			throw new ValidationError("maxRequests", "must be a positive integer");
		}
		if (this.windowMs <= 0) {
			throw new ValidationError("windowMs", "must be positive");
		}
		this.clock = options.clock ?? systemClock;
		this.sleep = options.sleep ?? defaultSleep;
		this.logger = options.logger ?? createLogger("gateway:rate-limiter");
	}

	/**
	 * Resolves once a slot is granted. Time spent queued behind earlier
	 * callers counts against `maxWaitMs`.
	 */
	acquire(label = "request"): Promise<void> {
		const requestedAt = this.clock();
		const turn = this.queue.then(() => this.waitForSlot(label, requestedAt));
		// A timed-out caller must not block the ones queued behind it.
		this.queue = turn.then(
			() => undefined,
			() => undefined
		);
		return turn;
	}

	/** Slots still free in the current window. */
	remaining(): number {
		this.evict(this.clock());
		return this.maxRequests - this.granted.length;
	}

	private async waitForSlot(label: string, requestedAt: number): Promise<void> {
		for (;;) {
			const now = this.clock();
			this.evict(now);
			if (this.granted.length < this.maxRequests) {
				this.granted.push(now);
				return;
			}

			const waitMs = this.granted[0] + this.windowMs - now;
			const waited = now - requestedAt;
			if (waited + waitMs > this.maxWaitMs) {
				throw new RateLimitTimeout(label, waited, this.maxWaitMs);
			}
			this.logger.info("rate_limit_wait", {
				label,
				waitMs,
				inWindow: this.granted.length,
				maxRequests: this.maxRequests,
			});
			await this.sleep(waitMs);
		}
	}

	private evict(now: number): void {
		const cutoff = now - this.windowMs;
		while (this.granted.length && this.granted[0] <= cutoff) {
			this.granted.shift();
		}
	}
}

import { createLogger, type ModuleLogger } from "@tradeloop/core";
import { systemClock, type Clock, type Sleep } from "@tradeloop/gateway";
import { nextTickDelay, type CooldownSettings } from "./cooldown";
import type { TickDriver, TickOutcome } from "./types";

export interface PollingLoopOptions extends CooldownSettings {
	runner: TickDriver;
	clock?: Clock;
	/** Replaces the built-in wait, which `stop()` cuts short. */
	sleep?: Sleep;
	onOutcome?: (outcome: TickOutcome) => void;
	logger?: ModuleLogger;
}

/**
 * Drives one tick at a time on a fixed interval, stretching the pause after
 * overload and rate-limit failures.
 */
export class PollingLoop {
	private readonly logger: ModuleLogger;
	private readonly clock: Clock;
	private readonly abort = new AbortController();
	private running = false;

	constructor(private readonly options: PollingLoopOptions) {
		this.logger = options.logger ?? createLogger("runtime:loop");
		this.clock = options.clock ?? systemClock;
	}

	async run(): Promise<void> {
		this.running = true;
		this.logger.info("loop_started", { intervalMs: this.options.intervalMs });
		while (this.running) {
			const outcome = await this.options.runner.tick(this.clock());
			this.options.onOutcome?.(outcome);
			if (!this.running) {
				break;
			}
			const next = nextTickDelay(outcome, this.options);
			if (next.kind !== "interval") {
				this.logger.warn("cooldown", {
					kind: next.kind,
					delayMs: next.delayMs,
					reason: outcome.error?.reason ?? null,
				});
			}
			await this.wait(next.delayMs);
		}
		this.logger.info("loop_stopped");
	}

	stop(): void {
		this.running = false;
		this.abort.abort();
	}

	private wait(ms: number): Promise<void> {
		if (this.options.sleep) {
			return this.options.sleep(ms);
		}
		const signal = this.abort.signal;
		if (signal.aborted) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				signal.removeEventListener("abort", onAbort);
				resolve();
			}, Math.max(0, ms));
			const onAbort = (): void => {
				clearTimeout(timer);
				resolve();
			};
			signal.addEventListener("abort", onAbort, { once: true });
		});
	}
}

import { APIError, DEFAULT_COOLDOWN_MS, RateLimitTimeout } from "@tradeloop/core";
import type { TickOutcome } from "./types";

export interface CooldownSettings {
	intervalMs: number;
	/** Rate limiter window; a limiter timeout waits one full window. */
	rateLimitWindowMs: number;
	overloadCooldownMs?: number;
}

export type DelayKind = "interval" | "overloaded" | "rate_limited";

export interface NextDelay {
	kind: DelayKind;
	delayMs: number;
}

export const nextTickDelay = (
	outcome: TickOutcome,
	settings: CooldownSettings
): NextDelay => {
	const cause = outcome.error?.cause;
	if (cause instanceof APIError && cause.overloaded) {
		return {
			kind: "overloaded",
			delayMs: settings.overloadCooldownMs ?? DEFAULT_COOLDOWN_MS,
		};
	}
	if (cause instanceof RateLimitTimeout) {
		return { kind: "rate_limited", delayMs: settings.rateLimitWindowMs };
	}
	return { kind: "interval", delayMs: settings.intervalMs };
};

import type { Signal } from "@tradeloop/core";
import type { OrderResult } from "@tradeloop/execution-engine";

export interface TickFailure {
	/** Symbol, action and the underlying status or message. */
	reason: string;
	cause: Error;
}

export interface TickOutcome {
	signal: Signal;
	orderResult?: OrderResult;
	error?: TickFailure;
	/** Close of the newest row, forming candle included. */
	livePrice?: number;
}

export interface TickDriver {
	tick(now: number): Promise<TickOutcome>;
}

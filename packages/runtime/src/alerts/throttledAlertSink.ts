import {
	createLogger,
	MINUTE_MS,
	type Alert,
	type AlertKind,
	type AlertSink,
	type ModuleLogger,
} from "@tradeloop/core";

export const DEFAULT_ALERT_THROTTLE_MS = 5 * MINUTE_MS;

/** Trade alerts always go out; only repeating conditions are throttled. */
const THROTTLED_KINDS: ReadonlySet<AlertKind> = new Set(["failure", "status"]);

export interface ThrottledAlertSinkOptions {
	throttleMs?: number;
	now?: () => number;
	logger?: ModuleLogger;
}

/**
 * Drops a failure or status alert when another with the same key went out
 * less than `throttleMs` ago. A suppressed alert does not extend the quiet
 * period.
 */
export class ThrottledAlertSink implements AlertSink {
	private readonly lastSent = new Map<string, number>();
	private readonly throttleMs: number;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(
		private readonly inner: AlertSink,
		options: ThrottledAlertSinkOptions = {}
	) {
		this.throttleMs = options.throttleMs ?? DEFAULT_ALERT_THROTTLE_MS;
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("runtime:alerts");
	}

	notify(alert: Alert): Promise<void> {
		if (!THROTTLED_KINDS.has(alert.kind)) {
			return this.inner.notify(alert);
		}
		const now = this.now();
		const last = this.lastSent.get(alert.key);
		if (last !== undefined && now - last < this.throttleMs) {
			this.logger.debug("alert_throttled", {
				key: alert.key,
				kind: alert.kind,
				sinceLastMs: now - last,
			});
			return Promise.resolve();
		}
		this.lastSent.set(alert.key, now);
		return this.inner.notify(alert);
	}
}

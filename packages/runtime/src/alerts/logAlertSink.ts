import {
	createLogger,
	type Alert,
	type AlertSink,
	type ModuleLogger,
} from "@tradeloop/core";

/**
 * Writes alerts to the structured log. Failures go out as warnings, every
 * other kind at info.
 */
export class LogAlertSink implements AlertSink {
	private readonly logger: ModuleLogger;

	constructor(logger?: ModuleLogger) {
		this.logger = logger ?? createLogger("runtime:alerts");
	}

	async notify(alert: Alert): Promise<void> {
		const payload = {
			kind: alert.kind,
			key: alert.key,
			title: alert.title,
			message: alert.message,
			timestamp: alert.timestamp,
			...alert.details,
		};
		if (alert.kind === "failure") {
			this.logger.warn("alert", payload);
			return;
		}
		this.logger.info("alert", payload);
	}
}

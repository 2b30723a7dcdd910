import type { ModuleLogger } from "@tradeloop/core";

/**
 * Run a side task (journal write, alert) without holding up the trading
 * path. Failures are logged and dropped.
 */
export const fireAndForget = (
	logger: ModuleLogger,
	event: string,
	task: () => Promise<void>,
	context: Record<string, unknown> = {}
): void => {
	void task().catch((error: unknown) => {
		logger.warn(event, {
			...context,
			error: error instanceof Error ? error.message : "unknown",
		});
	});
};

/**
 * Shared contracts, configuration and logging for every other package.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./config";
export * from "./sinks";
export * from "./exchange";
export {
	createLogger,
	log,
	type LogLevel,
	type ModuleLogger,
	type BaseLogPayload,
} from "./utils/logger";

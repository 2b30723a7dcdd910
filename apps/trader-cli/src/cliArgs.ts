import { ConfigError, timeframeToMs, type ExecutionMode } from "@tradeloop/core";
import {
	getRegisteredStrategyIds,
	isRegisteredStrategyId,
	type StrategyId,
} from "@tradeloop/strategy-engine";

export type ArgValue = string | boolean;
export type CliArgs = Record<string, ArgValue>;

export const parseCliArgs = (argv: string[]): CliArgs => {
	const args: CliArgs = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const getStringArg = (args: CliArgs, key: string): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const getFlagArg = (args: CliArgs, key: string): boolean => {
	const value = args[key];
	return value === true || value === "true";
};

const availableIds = (): string =>
	getRegisteredStrategyIds()
		.map((id) => `  - ${id}`)
		.join("\n");

/**
 * Validate --strategy. Accepts the registered id in any case, with dashes
 * or underscores. Undefined when the flag is absent.
 */
export const parseStrategyArg = (args: CliArgs): StrategyId | undefined => {
	const raw = getStringArg(args, "strategy");
	if (raw === undefined) {
		if (args.strategy === true) {
			throw new ConfigError(
				`--strategy needs a value.\n\nAvailable strategy ids:\n${availableIds()}`
			);
		}
		return undefined;
	}
	const normalized = raw.trim().toLowerCase().replace(/-/g, "_");
	if (!isRegisteredStrategyId(normalized)) {
		throw new ConfigError(
			`Invalid strategy id: "${raw}"\n\nAvailable strategy ids:\n${availableIds()}`
		);
	}
	return normalized;
};

export const parseModeArg = (args: CliArgs): ExecutionMode | undefined => {
	const raw = getStringArg(args, "mode");
	if (raw === undefined) {
		return undefined;
	}
	const mode = raw.trim().toLowerCase();
	if (mode === "paper" || mode === "live") {
		return mode;
	}
	throw new ConfigError(`--mode must be "paper" or "live", got "${raw}"`);
};

/**
 * Durations as plain milliseconds ("90000") or timeframe style ("90s", "5m").
 */
export const parseDurationArg = (args: CliArgs, key: string): number | undefined => {
	const raw = getStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const trimmed = raw.trim();
	if (/^\d+$/.test(trimmed)) {
		const ms = Number(trimmed);
		if (ms <= 0) {
			throw new ConfigError(`--${key} must be positive, got "${raw}"`);
		}
		return ms;
	}
	try {
		return timeframeToMs(trimmed);
	} catch (error) {
		throw new ConfigError(
			`--${key}: ${error instanceof Error ? error.message : "invalid duration"}`,
			{ cause: error }
		);
	}
};

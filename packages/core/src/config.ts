import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError } from "./errors";
import { timeframeMultiple, timeframeToMs } from "./time";
import type { CandleType, TradeMode } from "./types";

const isRecord = (value: unknown): value is Record<PropertyKey, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export type ExecutionMode = "paper" | "live";
export type PartialExitStyle = "inferred" | "explicit";

export interface RetryConfig {
	maxRetries: number;
	backoffBaseMs: number;
	backoffMaxMs: number;
	jitterMs: number;
}

export interface RateLimitConfig {
	maxRequests: number;
	windowMs: number;
}

export interface EnvConfig {
	exchangeProfile: string;
	executionMode: ExecutionMode;
	deltaApiKey: string;
	deltaApiSecret: string;
	strategyProfile?: string;
	symbol?: string;
	pollIntervalMs: number;
	journalPath: string;
	alertThrottleMs: number;
	retry: Partial<RetryConfig>;
}

export interface ExchangeConfig {
	id: string;
	exchange: string;
	testnet: boolean;
	rateLimit: RateLimitConfig;
	retry: RetryConfig;
	credentials: {
		apiKey: string;
		apiSecret: string;
	};
}

export interface StrategyConfig {
	id: string;
	profile: string;
	symbol: string;
	/** Key into the per-asset risk overrides, e.g. "BTCUSD". */
	assetId: string;
	timeframe: string;
	baseTimeframe: string;
	candleType: CandleType;
	tradeMode: TradeMode;
	allowFlip: boolean;
	historyCandles: number;
	params: Record<string, unknown>;
}

export interface AssetRiskOverride {
	targetMargin?: number;
	leverage?: number;
	contractValue?: number;
	enablePartialExits?: boolean;
	partialExitPct?: number;
}

export interface RiskConfig {
	targetMargin: number;
	leverage: number;
	contractValue: number;
	enablePartialExits: boolean;
	partialExitPct: number;
	assets: Record<string, AssetRiskOverride>;
}

export type AssetRiskConfig = Omit<RiskConfig, "assets"> & { assetId: string };

export interface TradeloopConfig {
	env: EnvConfig;
	exchange: ExchangeConfig;
	strategy: StrategyConfig;
	risk: RiskConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	exchangeProfile?: string;
	strategyProfile?: string;
	riskProfile?: string;
	/** Wins over TRADER_SYMBOL and the profile's symbol. */
	symbol?: string;
}

const DEFAULT_RETRY: RetryConfig = {
	maxRetries: 4,
	backoffBaseMs: 2_000,
	backoffMaxMs: 60_000,
	jitterMs: 1_000,
};

const DEFAULT_RATE_LIMIT: RateLimitConfig = {
	maxRequests: 150,
	windowMs: 300_000,
};

const WORKSPACE_SENTINELS = ["package-lock.json", ".git", "config"];

const findWorkspaceRoot = (): string => {
	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}

	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const getEnvVar = (key: string, fallback?: string): string => {
	const value = process.env[key];
	if (value !== undefined && value !== "") {
		return value;
	}
	if (fallback !== undefined) {
		return fallback;
	}
	throw new ConfigError(`Missing required environment variable: ${key}`);
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readOptionalEnvNumber = (key: string): number | undefined => {
	const raw = readOptionalEnvVar(key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value < 0) {
		throw new ConfigError(`Environment variable ${key} must be a non-negative number`);
	}
	return value;
};

const normalizeExecutionMode = (value: string | undefined): ExecutionMode => {
	return value?.toLowerCase() === "live" ? "live" : "paper";
};

const readJsonFile = (filePath: string): Record<PropertyKey, unknown> => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Config file not found: ${filePath}`);
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	if (!isRecord(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
	}
	return parsed;
};

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositive = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (num <= 0) {
		throw new ConfigError(`${field} must be positive, got ${num}`);
	}
	return num;
};

const ensureString = (value: unknown, field: string): string => {
	if (typeof value !== "string" || !value.trim().length) {
		throw new ConfigError(`Required string field missing in ${field}`);
	}
	return value.trim();
};

const optionalBoolean = (
	value: unknown,
	field: string,
	fallback: boolean
): boolean => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new ConfigError(`${field} must be a boolean`);
	}
	return value;
};

const optionalNumber = (value: unknown, field: string): number | undefined =>
	value === undefined ? undefined : ensurePositive(value, field);

const ensureOneOf = <T extends string>(
	value: unknown,
	allowed: readonly T[],
	field: string,
	fallback: T
): T => {
	if (value === undefined) {
		return fallback;
	}
	const match = allowed.find((candidate) => candidate === value);
	if (!match) {
		throw new ConfigError(
			`${field} must be one of ${allowed.join(", ")}, got ${String(value)}`
		);
	}
	return match;
};

const ensureTimeframe = (value: unknown, field: string): string => {
	const timeframe = ensureString(value, field);
	try {
		timeframeToMs(timeframe);
	} catch (error) {
		throw new ConfigError(
			`${field}: ${error instanceof Error ? error.message : "invalid"}`,
			{ cause: error }
		);
	}
	return timeframe;
};

const optionalPercentage = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	const pct = ensurePositive(value, field);
	if (pct >= 1) {
		throw new ConfigError(`${field} must be a fraction below 1, got ${pct}`);
	}
	return pct;
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	// Variables already in the environment win over the file.
	dotenv.config({ path: envPath });

	const backoffBaseSec = readOptionalEnvNumber("API_BACKOFF_BASE_SEC");
	const backoffMaxSec = readOptionalEnvNumber("API_BACKOFF_MAX_SEC");
	const retry: Partial<RetryConfig> = {};
	const maxRetries = readOptionalEnvNumber("API_MAX_RETRIES");
	if (maxRetries !== undefined) {
		retry.maxRetries = Math.floor(maxRetries);
	}
	if (backoffBaseSec !== undefined) {
		retry.backoffBaseMs = backoffBaseSec * 1_000;
	}
	if (backoffMaxSec !== undefined) {
		retry.backoffMaxMs = backoffMaxSec * 1_000;
	}

	return {
		exchangeProfile: getEnvVar("EXCHANGE_PROFILE", "delta"),
		executionMode: normalizeExecutionMode(getEnvVar("EXECUTION_MODE", "paper")),
		deltaApiKey: getEnvVar("DELTA_API_KEY", ""),
		deltaApiSecret: getEnvVar("DELTA_API_SECRET", ""),
		strategyProfile: readOptionalEnvVar("TRADER_STRATEGY"),
		symbol: readOptionalEnvVar("TRADER_SYMBOL"),
		pollIntervalMs: readOptionalEnvNumber("POLL_INTERVAL_MS") ?? 60_000,
		journalPath: getEnvVar("JOURNAL_PATH", "output/trades.jsonl"),
		alertThrottleMs:
			(readOptionalEnvNumber("ALERT_THROTTLE_SECONDS") ?? 300) * 1_000,
		retry,
	};
};

export const loadExchangeConfig = (
	env: EnvConfig,
	configDir = getDefaultConfigDir(),
	exchangeProfile?: string
): ExchangeConfig => {
	const profile = exchangeProfile ?? env.exchangeProfile;
	const exchangePath = path.join(configDir, "exchange", `${profile}.json`);
	const file = readJsonFile(exchangePath);
	const rateLimit: Record<PropertyKey, unknown> = isRecord(file.rateLimit)
		? file.rateLimit
		: {};
	const retry: Record<PropertyKey, unknown> = isRecord(file.retry)
		? file.retry
		: {};

	return {
		id: profile,
		exchange: ensureString(file.exchange, "exchange.exchange"),
		testnet: optionalBoolean(file.testnet, "exchange.testnet", false),
		rateLimit: {
			maxRequests:
				optionalNumber(rateLimit.maxRequests, "exchange.rateLimit.maxRequests") ??
				DEFAULT_RATE_LIMIT.maxRequests,
			windowMs:
				optionalNumber(rateLimit.windowMs, "exchange.rateLimit.windowMs") ??
				DEFAULT_RATE_LIMIT.windowMs,
		},
		retry: {
			maxRetries:
				env.retry.maxRetries ??
				optionalNumber(retry.maxRetries, "exchange.retry.maxRetries") ??
				DEFAULT_RETRY.maxRetries,
			backoffBaseMs:
				env.retry.backoffBaseMs ??
				optionalNumber(retry.backoffBaseMs, "exchange.retry.backoffBaseMs") ??
				DEFAULT_RETRY.backoffBaseMs,
			backoffMaxMs:
				env.retry.backoffMaxMs ??
				optionalNumber(retry.backoffMaxMs, "exchange.retry.backoffMaxMs") ??
				DEFAULT_RETRY.backoffMaxMs,
			jitterMs:
				optionalNumber(retry.jitterMs, "exchange.retry.jitterMs") ??
				DEFAULT_RETRY.jitterMs,
		},
		credentials: {
			apiKey: env.deltaApiKey,
			apiSecret: env.deltaApiSecret,
		},
	};
};

export const resolveStrategyConfigPath = (
	configDir: string,
	strategyProfile: string
): string => {
	const profileName = strategyProfile.endsWith(".json")
		? strategyProfile
		: `${strategyProfile}.json`;
	const candidates = [
		path.join(configDir, "strategies", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigError(
		`Strategy config not found. Looked for ${candidates.join(", ")}`
	);
};

const MIN_HISTORY_CANDLES = 2;

const historyCount = (value: unknown): number => {
	if (value === undefined) {
		return 300;
	}
	const count = ensureNumber(value, "strategy.historyCandles");
	if (!Number.isInteger(count) || count < MIN_HISTORY_CANDLES) {
		throw new ConfigError(
			`strategy.historyCandles must be an integer of at least ${MIN_HISTORY_CANDLES}, got ${count}`
		);
	}
	return count;
};

const TRADE_MODES: readonly TradeMode[] = ["long", "short", "both"];
const CANDLE_TYPES: readonly CandleType[] = ["standard", "heikin-ashi"];

export const loadStrategyConfig = (
	configDir = getDefaultConfigDir(),
	strategyProfile = "donchian-channel",
	symbolOverride?: string
): StrategyConfig => {
	const strategyPath = resolveStrategyConfigPath(configDir, strategyProfile);
	const file = readJsonFile(strategyPath);
	if (typeof file.id !== "string" || !file.id.length) {
		throw new ConfigError(
			`Strategy config at ${strategyPath} must include an "id" property.`
		);
	}
	const timeframe = ensureTimeframe(file.timeframe, "strategy.timeframe");
	const baseTimeframe =
		file.baseTimeframe === undefined
			? timeframe
			: ensureTimeframe(file.baseTimeframe, "strategy.baseTimeframe");
	try {
		timeframeMultiple(baseTimeframe, timeframe);
	} catch (error) {
		throw new ConfigError(
			`strategy.timeframe: ${error instanceof Error ? error.message : "invalid"}`,
			{ cause: error }
		);
	}

	return {
		id: file.id,
		profile: strategyProfile,
		symbol: symbolOverride ?? ensureString(file.symbol, "strategy.symbol"),
		assetId: ensureString(file.assetId, "strategy.assetId"),
		timeframe,
		baseTimeframe,
		candleType: ensureOneOf(
			file.candleType,
			CANDLE_TYPES,
			"strategy.candleType",
			"standard"
		),
		tradeMode: ensureOneOf(
			file.tradeMode,
			TRADE_MODES,
			"strategy.tradeMode",
			"both"
		),
		allowFlip: optionalBoolean(file.allowFlip, "strategy.allowFlip", false),
		historyCandles: historyCount(file.historyCandles),
		params: isRecord(file.params) ? { ...file.params } : {},
	};
};

const parseAssetOverride = (
	assetId: string,
	value: unknown
): AssetRiskOverride => {
	if (!isRecord(value)) {
		throw new ConfigError(`risk.assets.${assetId} must be an object`);
	}
	const prefix = `risk.assets.${assetId}`;
	const override: AssetRiskOverride = {};
	const targetMargin = optionalNumber(value.targetMargin, `${prefix}.targetMargin`);
	const leverage = optionalNumber(value.leverage, `${prefix}.leverage`);
	const contractValue = optionalNumber(
		value.contractValue,
		`${prefix}.contractValue`
	);
	if (targetMargin !== undefined) {
		override.targetMargin = targetMargin;
	}
	if (leverage !== undefined) {
		override.leverage = leverage;
	}
	if (contractValue !== undefined) {
		override.contractValue = contractValue;
	}
	if (value.enablePartialExits !== undefined) {
		override.enablePartialExits = optionalBoolean(
			value.enablePartialExits,
			`${prefix}.enablePartialExits`,
			true
		);
	}
	if (value.partialExitPct !== undefined) {
		override.partialExitPct = optionalPercentage(
			value.partialExitPct,
			`${prefix}.partialExitPct`,
			0.5
		);
	}
	return override;
};

export const loadRiskConfig = (
	configDir = getDefaultConfigDir(),
	riskProfile = "default"
): RiskConfig => {
	const riskPath = path.join(configDir, "risk", `${riskProfile}.json`);
	const file = readJsonFile(riskPath);
	const assets: Record<string, AssetRiskOverride> = {};
	if (isRecord(file.assets)) {
		for (const [assetId, value] of Object.entries(file.assets)) {
			assets[assetId] = parseAssetOverride(assetId, value);
		}
	}
	return {
		targetMargin: ensurePositive(file.targetMargin, "risk.targetMargin"),
		leverage: ensurePositive(file.leverage, "risk.leverage"),
		contractValue: ensurePositive(file.contractValue, "risk.contractValue"),
		enablePartialExits: optionalBoolean(
			file.enablePartialExits,
			"risk.enablePartialExits",
			true
		),
		partialExitPct: optionalPercentage(
			file.partialExitPct,
			"risk.partialExitPct",
			0.5
		),
		assets,
	};
};

/**
 * Merge the per-asset override (if any) over the risk defaults. Done once
 * when the runner is built; nothing re-reads the override map afterwards.
 */
export const resolveAssetRisk = (
	risk: RiskConfig,
	assetId: string
): AssetRiskConfig => {
	const override = risk.assets[assetId] ?? {};
	return {
		assetId,
		targetMargin: override.targetMargin ?? risk.targetMargin,
		leverage: override.leverage ?? risk.leverage,
		contractValue: override.contractValue ?? risk.contractValue,
		enablePartialExits: override.enablePartialExits ?? risk.enablePartialExits,
		partialExitPct: override.partialExitPct ?? risk.partialExitPct,
	};
};

export const loadTradeloopConfig = (
	options: ConfigLoadOptions = {}
): TradeloopConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const envPath = options.envPath ?? path.join(workspaceRoot, ".env");
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const env = loadEnvConfig(envPath);
	return {
		env,
		exchange: loadExchangeConfig(env, configDir, options.exchangeProfile),
		strategy: loadStrategyConfig(
			configDir,
			options.strategyProfile ?? env.strategyProfile,
			options.symbol ?? env.symbol
		),
		risk: loadRiskConfig(configDir, options.riskProfile),
	};
};

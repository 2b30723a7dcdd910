import path from "node:path";
import {
	ConfigError,
	createLogger,
	errorMessage,
	getWorkspaceRoot,
	loadTradeloopConfig,
} from "@tradeloop/core";
import { DeltaClient } from "@tradeloop/exchange-delta";
import { fireAndForget } from "@tradeloop/execution-engine";
import { JsonlTradeJournal } from "@tradeloop/persistence";
import { LogAlertSink, ThrottledAlertSink } from "@tradeloop/runtime";
import { getStrategyDefinition } from "@tradeloop/strategy-engine";
import {
	getFlagArg,
	getStringArg,
	parseCliArgs,
	parseDurationArg,
	parseModeArg,
	parseStrategyArg,
} from "./cliArgs";
import { createTrader } from "./createTrader";

const logger = createLogger("trader-cli");

const DEFAULT_RECONCILE_EVERY_MS = 15 * 60_000;

const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	const requestedStrategy = parseStrategyArg(args);
	const config = loadTradeloopConfig({
		strategyProfile:
			getStringArg(args, "profile") ??
			(requestedStrategy
				? getStrategyDefinition(requestedStrategy).manifest.defaultProfile
				: undefined),
		exchangeProfile: getStringArg(args, "exchange"),
		riskProfile: getStringArg(args, "risk"),
		symbol: getStringArg(args, "symbol"),
	});
	if (requestedStrategy && config.strategy.id !== requestedStrategy) {
		throw new ConfigError(
			`Profile ${config.strategy.profile} holds strategy ${config.strategy.id}, not ${requestedStrategy}`
		);
	}

	const mode = parseModeArg(args) ?? config.env.executionMode;
	const intervalMs = parseDurationArg(args, "interval") ?? config.env.pollIntervalMs;
	const reconcileEveryMs =
		parseDurationArg(args, "reconcile-every") ?? DEFAULT_RECONCILE_EVERY_MS;

	const exchange = new DeltaClient({
		apiKey: config.exchange.credentials.apiKey,
		secret: config.exchange.credentials.apiSecret,
		testnet: config.exchange.testnet,
	});
	if (mode === "live" && !exchange.hasCredentials()) {
		throw new ConfigError(
			"Live mode needs DELTA_API_KEY and DELTA_API_SECRET in the environment"
		);
	}

	const journalPath = path.resolve(getWorkspaceRoot(), config.env.journalPath);
	const alerts = new ThrottledAlertSink(new LogAlertSink(), {
		throttleMs: config.env.alertThrottleMs,
	});
	const trader = createTrader(
		config,
		{ exchange, mode, journal: new JsonlTradeJournal(journalPath), alerts },
		{ intervalMs }
	);

	logger.info("cli_starting", {
		strategyId: trader.strategy.id,
		profile: config.strategy.profile,
		symbol: trader.symbol,
		timeframe: config.strategy.timeframe,
		baseTimeframe: config.strategy.baseTimeframe,
		candleType: config.strategy.candleType,
		mode,
		testnet: config.exchange.testnet,
		intervalMs,
		reconcileEveryMs,
		journalPath,
		leverage: trader.asset.leverage,
		targetMargin: trader.asset.targetMargin,
	});

	await trader.prepare();

	if (!getFlagArg(args, "no-warmup")) {
		try {
			await trader.runner.replay(Date.now(), trader.replaySettings);
		} catch (error) {
			logger.warn("warmup_failed", { error: errorMessage(error) });
		}
	}

	try {
		const outcome = await trader.runner.reconcile();
		logger.info("startup_reconciled", {
			exchangeSide: outcome?.exchange.side ?? null,
			exchangeSize: outcome?.exchange.size ?? null,
			adopted: Boolean(outcome?.mismatch),
		});
	} catch (error) {
		logger.warn("startup_reconcile_failed", { error: errorMessage(error) });
	}

	fireAndForget(
		logger,
		"alert_failed",
		() =>
			alerts.notify({
				kind: "status",
				key: `${trader.symbol}:startup`,
				title: `${trader.strategy.id} started on ${trader.symbol}`,
				message: `${mode} mode, ${config.strategy.timeframe} candles, direction ${trader.strategy.state().direction}`,
				timestamp: Date.now(),
			}),
		{ symbol: trader.symbol }
	);

	const reconcileTimer = setInterval(() => {
		fireAndForget(
			logger,
			"reconcile_failed",
			async () => {
				await trader.runner.reconcile();
			},
			{ symbol: trader.symbol }
		);
	}, reconcileEveryMs);

	const shutdown = (signal: NodeJS.Signals): void => {
		logger.info("cli_shutdown", { signal });
		clearInterval(reconcileTimer);
		trader.loop.stop();
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	try {
		await trader.loop.run();
	} finally {
		clearInterval(reconcileTimer);
	}
	logger.info("cli_stopped", { state: trader.strategy.state() });
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});

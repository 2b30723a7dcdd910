import path from "node:path";
import {
	ConfigError,
	createLogger,
	getWorkspaceRoot,
	loadTradeloopConfig,
	type TradeloopConfig,
} from "@tradeloop/core";
import { DeltaClient } from "@tradeloop/exchange-delta";
import { JsonlTradeJournal } from "@tradeloop/persistence";
import { getStrategyDefinition } from "@tradeloop/strategy-engine";
import {
	getStringArg,
	parseCliArgs,
	parseStrategyArg,
} from "./cliArgs";
import { createTrader } from "./createTrader";

const logger = createLogger("trader-cli:replay");

const parseCandlesArg = (raw: string | undefined): number | undefined => {
	if (raw === undefined) {
		return undefined;
	}
	const count = Number(raw);
	if (!Number.isInteger(count) || count <= 0) {
		throw new ConfigError(`--candles must be a positive integer, got "${raw}"`);
	}
	return count;
};

/**
 * Replays recent exchange history through the paper exchange and prints the
 * account summary. Nothing is sent to the exchange besides candle requests.
 */
const main = async (): Promise<void> => {
	const args = parseCliArgs(process.argv.slice(2));
	const requestedStrategy = parseStrategyArg(args);
	const loaded = loadTradeloopConfig({
		strategyProfile:
			getStringArg(args, "profile") ??
			(requestedStrategy
				? getStrategyDefinition(requestedStrategy).manifest.defaultProfile
				: undefined),
		exchangeProfile: getStringArg(args, "exchange"),
		riskProfile: getStringArg(args, "risk"),
		symbol: getStringArg(args, "symbol"),
	});
	const historyCandles = parseCandlesArg(getStringArg(args, "candles"));
	const config: TradeloopConfig = historyCandles
		? { ...loaded, strategy: { ...loaded.strategy, historyCandles } }
		: loaded;

	const journalArg = getStringArg(args, "journal");
	const journal = journalArg
		? new JsonlTradeJournal(path.resolve(getWorkspaceRoot(), journalArg))
		: undefined;

	const trader = createTrader(
		config,
		{
			exchange: new DeltaClient({ testnet: config.exchange.testnet }),
			mode: "paper",
		},
		{ intervalMs: config.env.pollIntervalMs }
	);

	logger.info("replay_starting", {
		strategyId: trader.strategy.id,
		symbol: trader.symbol,
		timeframe: config.strategy.timeframe,
		candles: config.strategy.historyCandles,
		journal: journalArg ?? null,
	});

	await trader.prepare();

	const report = await trader.runner.replay(
		Date.now(),
		{ ...trader.replaySettings, journal },
		{ includeLatest: true }
	);

	logger.info("replay_report", {
		evaluated: report.evaluated,
		signals: report.signals,
		fills: report.fills,
		failures: report.failures,
		startingBalance: report.account.startingBalance,
		equity: report.account.equity,
		totalRealizedPnl: report.account.totalRealizedPnl,
		maxDrawdown: report.account.maxDrawdown,
		trades: report.account.trades,
		finalState: report.finalState,
	});
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});

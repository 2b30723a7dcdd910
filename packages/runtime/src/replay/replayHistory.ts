import {
	createLogger,
	timeframeToMs,
	type Candle,
	type ModuleLogger,
	type SignalAction,
	type StrategyPositionState,
	type TradeJournal,
} from "@tradeloop/core";
import {
	OrderExecutor,
	PaperExchange,
	type PaperAccountSnapshot,
} from "@tradeloop/execution-engine";
import { DirectGateway } from "@tradeloop/gateway";
import { attachIndicators } from "@tradeloop/indicators";
import type { PositionSizer } from "@tradeloop/risk-engine";
import type { TradingStrategy } from "@tradeloop/strategy-engine";

export interface ReplaySettings {
	sizer: PositionSizer;
	partialExitPct: number;
	contractValue: number;
	startingBalance?: number;
	journal?: TradeJournal;
}

export interface ReplayOptions extends ReplaySettings {
	symbol: string;
	timeframe: string;
	candles: readonly Candle[];
	strategy: TradingStrategy;
	/** Exclusive upper bound on the evaluated indices. */
	until?: number;
	logger?: ModuleLogger;
}

export interface ReplayReport {
	evaluated: number;
	signals: Partial<Record<SignalAction, number>>;
	fills: number;
	failures: string[];
	account: PaperAccountSnapshot;
	finalState: StrategyPositionState;
}

/**
 * Walk a candle history through the same evaluate/execute path as a live
 * tick, filling on a paper exchange at each closed candle's close. Every
 * replayed index counts as closed one interval after its open.
 */
export const replayHistory = async (options: ReplayOptions): Promise<ReplayReport> => {
	const logger = options.logger ?? createLogger("runtime:replay");
	const tfMs = timeframeToMs(options.timeframe);
	let clock = 0;
	const paper = new PaperExchange({
		contractValue: options.contractValue,
		startingBalance: options.startingBalance,
		now: () => clock,
		logger,
	});
	const executor = new OrderExecutor({
		symbol: options.symbol,
		strategyId: options.strategy.id,
		client: paper,
		gateway: new DirectGateway(),
		sizer: options.sizer,
		partialExitPct: options.partialExitPct,
		journal: options.journal,
		logger,
		now: () => clock,
	});

	const frame = attachIndicators(options.candles, options.strategy.indicators);
	const until = Math.min(options.until ?? options.candles.length, options.candles.length);
	const signals: Partial<Record<SignalAction, number>> = {};
	const failures: string[] = [];
	let fills = 0;

	for (let index = 0; index < until; index += 1) {
		const candle = options.candles[index];
		clock = candle.timestamp + tfMs;
		paper.setMarkPrice(options.symbol, candle.close);
		const signal = options.strategy.evaluate(frame, index);
		signals[signal.action] = (signals[signal.action] ?? 0) + 1;
		if (signal.action === "NONE") {
			continue;
		}
		const result = await executor.execute(signal, options.strategy);
		if (result.status === "filled") {
			fills += 1;
		} else if (result.status === "failed") {
			failures.push(result.reason);
		}
	}

	const report: ReplayReport = {
		evaluated: Math.max(until, 0),
		signals,
		fills,
		failures,
		account: paper.snapshotAccount(),
		finalState: options.strategy.state(),
	};
	logger.info("replay_complete", {
		symbol: options.symbol,
		strategyId: options.strategy.id,
		evaluated: report.evaluated,
		fills,
		failures: failures.length,
		realizedPnl: report.account.totalRealizedPnl,
	});
	return report;
};

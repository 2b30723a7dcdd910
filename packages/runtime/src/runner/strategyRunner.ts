import {
	TradingError,
	createLogger,
	errorMessage,
	noneSignal,
	type Candle,
	type ModuleLogger,
} from "@tradeloop/core";
import {
	describeFailure,
	type OrderExecutor,
	type PaperExchange,
	type PositionReconciler,
	type ReconcileOutcome,
} from "@tradeloop/execution-engine";
import { attachIndicators } from "@tradeloop/indicators";
import type { TradingStrategy } from "@tradeloop/strategy-engine";
import type { CandleFeed } from "../marketData/candleFeed";
import { closedCandleIndex, livePrice } from "../marketData/closedCandle";
import { prepareCandles, type CandleSeriesSettings } from "../marketData/prepareCandles";
import { replayHistory, type ReplayReport, type ReplaySettings } from "../replay/replayHistory";
import type { TickDriver, TickOutcome } from "./types";

export interface StrategyRunnerOptions {
	series: CandleSeriesSettings;
	feed: CandleFeed;
	strategy: TradingStrategy;
	executor: OrderExecutor;
	reconciler: PositionReconciler;
	/** Paper mode: marked to the live price before each evaluation. */
	paper?: PaperExchange;
	logger?: ModuleLogger;
}

const toError = (error: unknown): Error =>
	error instanceof Error ? error : new TradingError(errorMessage(error));

/**
 * One tick: load candles, find the closed index, evaluate, execute. Ticks
 * never overlap, and a closed candle is acted on once: a candle whose tick
 * failed is evaluated again on the next tick.
 */
export class StrategyRunner implements TickDriver {
	private readonly logger: ModuleLogger;
	private busy = false;
	private lastEvaluated: number | null = null;

	constructor(private readonly options: StrategyRunnerOptions) {
		this.logger = options.logger ?? createLogger("runtime:runner");
	}

	get symbol(): string {
		return this.options.series.symbol;
	}

	async tick(now: number): Promise<TickOutcome> {
		if (this.busy) {
			this.logger.warn("tick_in_progress", { symbol: this.symbol, now });
			return { signal: noneSignal("tick_in_progress") };
		}
		this.busy = true;
		try {
			return await this.runTick(now);
		} finally {
			this.busy = false;
		}
	}

	/**
	 * Pull the exchange position into the strategy. Skipped (null) while a
	 * tick holds the strategy.
	 */
	async reconcile(): Promise<ReconcileOutcome | null> {
		if (this.busy) {
			this.logger.info("reconcile_skipped", { symbol: this.symbol, reason: "tick_in_progress" });
			return null;
		}
		this.busy = true;
		try {
			return await this.options.reconciler.reconcile(this.options.strategy);
		} finally {
			this.busy = false;
		}
	}

	/**
	 * Replay the closed history on a paper exchange through the strategy, so
	 * trailing levels and the partial latch are rebuilt. The latest closed
	 * candle is left for the first live tick unless `includeLatest` is set.
	 */
	async replay(
		now: number,
		settings: ReplaySettings,
		options: { includeLatest?: boolean } = {}
	): Promise<ReplayReport> {
		const candles = await this.loadSeries(now);
		const closedIndex = closedCandleIndex(candles, now, this.options.series.timeframe);
		let until = 0;
		if (closedIndex !== null) {
			until = options.includeLatest ? closedIndex + 1 : closedIndex;
		}
		const report = await replayHistory({
			...settings,
			symbol: this.symbol,
			timeframe: this.options.series.timeframe,
			candles,
			strategy: this.options.strategy,
			until,
			logger: this.logger,
		});
		if (options.includeLatest && closedIndex !== null) {
			this.lastEvaluated = candles[closedIndex].timestamp;
		}
		this.logger.info("replay_finished", {
			symbol: this.symbol,
			evaluated: report.evaluated,
			fills: report.fills,
			direction: report.finalState.direction,
		});
		return report;
	}

	private async runTick(now: number): Promise<TickOutcome> {
		let candles: Candle[];
		try {
			candles = await this.loadSeries(now);
		} catch (error) {
			return this.failed(now, "load_candles", toError(error));
		}

		const price = livePrice(candles);
		const closedIndex = closedCandleIndex(candles, now, this.options.series.timeframe);
		if (closedIndex === null) {
			return { signal: noneSignal("no_closed_candle"), livePrice: price };
		}
		const closed = candles[closedIndex];
		if (this.lastEvaluated !== null && closed.timestamp <= this.lastEvaluated) {
			return {
				signal: noneSignal("candle_already_evaluated", closedIndex, closed.timestamp, closed.close),
				livePrice: price,
			};
		}

		try {
			if (price !== undefined && this.options.paper) {
				this.options.paper.setMarkPrice(this.symbol, price);
			}
			const frame = attachIndicators(candles, this.options.strategy.indicators);
			const signal = this.options.strategy.evaluate(frame, closedIndex);
			const orderResult = await this.options.executor.execute(signal, this.options.strategy);
			if (orderResult.status === "failed") {
				this.logger.warn("tick_order_failed", {
					symbol: this.symbol,
					action: signal.action,
					reason: orderResult.reason,
				});
				return {
					signal,
					orderResult,
					error: { reason: orderResult.reason, cause: orderResult.error },
					livePrice: price,
				};
			}
			this.lastEvaluated = closed.timestamp;
			this.logger.info("tick_completed", {
				symbol: this.symbol,
				closedIndex,
				candleTime: closed.timestamp,
				action: signal.action,
				reason: signal.reason,
				orderStatus: orderResult.status,
				livePrice: price ?? null,
			});
			return { signal, orderResult, livePrice: price };
		} catch (error) {
			return this.failed(now, "evaluate", toError(error), price);
		}
	}

	private loadSeries(now: number): Promise<Candle[]> {
		return this.options.feed
			.load(now)
			.then((base) => prepareCandles(base, this.options.series));
	}

	private failed(now: number, stage: string, cause: Error, price?: number): TickOutcome {
		const reason = describeFailure(this.symbol, stage, cause);
		this.logger.error("tick_failed", {
			symbol: this.symbol,
			stage,
			now,
			error: cause.message,
			errorType: cause.name,
		});
		return { signal: noneSignal("tick_failed"), error: { reason, cause }, livePrice: price };
	}
}

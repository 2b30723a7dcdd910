import {
	resolveAssetRisk,
	timeframeMultiple,
	type AlertSink,
	type AssetRiskConfig,
	type ExecutionClient,
	type ExecutionMode,
	type MarketDataClient,
	type ModuleLogger,
	type TradeJournal,
	type TradeloopConfig,
} from "@tradeloop/core";
import {
	OrderExecutor,
	PaperExchange,
	PositionReconciler,
} from "@tradeloop/execution-engine";
import {
	RateLimiter,
	ResilientGateway,
	type Clock,
	type Sleep,
} from "@tradeloop/gateway";
import { PositionSizer } from "@tradeloop/risk-engine";
import {
	ExchangeCandleFeed,
	PollingLoop,
	StrategyRunner,
	type ReplaySettings,
	type TickOutcome,
} from "@tradeloop/runtime";
import { createStrategy, type TradingStrategy } from "@tradeloop/strategy-engine";

export interface TraderDeps {
	/** Market data always comes from here; orders too in live mode. */
	exchange: MarketDataClient & ExecutionClient;
	mode: ExecutionMode;
	journal?: TradeJournal;
	alerts?: AlertSink;
	clock?: Clock;
	sleep?: Sleep;
	random?: () => number;
	logger?: ModuleLogger;
}

export interface TraderSettings {
	intervalMs: number;
	onOutcome?: (outcome: TickOutcome) => void;
}

export interface Trader {
	symbol: string;
	asset: AssetRiskConfig;
	limiter: RateLimiter;
	gateway: ResilientGateway;
	strategy: TradingStrategy;
	paper: PaperExchange | null;
	runner: StrategyRunner;
	loop: PollingLoop;
	replaySettings: ReplaySettings;
	/** Loads exchange metadata through the gateway before the first tick. */
	prepare(): Promise<void>;
}

/**
 * Wire one strategy instance. Every exchange call, from candles to the
 * reconciliation timer, shares the same limiter through one gateway.
 */
export const createTrader = (
	config: TradeloopConfig,
	deps: TraderDeps,
	settings: TraderSettings
): Trader => {
	const { strategy: strategyConfig } = config;
	const symbol = strategyConfig.symbol;
	const asset = resolveAssetRisk(config.risk, strategyConfig.assetId);

	const limiter = new RateLimiter({
		maxRequests: config.exchange.rateLimit.maxRequests,
		windowMs: config.exchange.rateLimit.windowMs,
		clock: deps.clock,
		sleep: deps.sleep,
		logger: deps.logger,
	});
	const gateway = new ResilientGateway({
		limiter,
		...config.exchange.retry,
		sleep: deps.sleep,
		random: deps.random,
		logger: deps.logger,
	});

	const paper =
		deps.mode === "paper"
			? new PaperExchange({
					contractValue: asset.contractValue,
					now: deps.clock,
					logger: deps.logger,
				})
			: null;
	const client: ExecutionClient = paper ?? deps.exchange;

	const strategy = createStrategy(strategyConfig, {
		partialExits: asset.enablePartialExits,
		logger: deps.logger,
	});
	const sizer = new PositionSizer(asset);
	const reconciler = new PositionReconciler({
		symbol,
		client,
		gateway,
		alerts: deps.alerts,
		logger: deps.logger,
		now: deps.clock,
	});
	const executor = new OrderExecutor({
		symbol,
		strategyId: strategy.id,
		client,
		gateway,
		sizer,
		partialExitPct: asset.partialExitPct,
		reconciler,
		journal: deps.journal,
		alerts: deps.alerts,
		logger: deps.logger,
		now: deps.clock,
	});

	const multiple = timeframeMultiple(strategyConfig.baseTimeframe, strategyConfig.timeframe);
	const feed = new ExchangeCandleFeed({
		client: deps.exchange,
		gateway,
		symbol,
		timeframe: strategyConfig.baseTimeframe,
		count: strategyConfig.historyCandles * multiple,
		logger: deps.logger,
	});
	const runner = new StrategyRunner({
		series: {
			symbol,
			baseTimeframe: strategyConfig.baseTimeframe,
			timeframe: strategyConfig.timeframe,
			candleType: strategyConfig.candleType,
		},
		feed,
		strategy,
		executor,
		reconciler,
		paper: paper ?? undefined,
		logger: deps.logger,
	});
	const loop = new PollingLoop({
		runner,
		intervalMs: settings.intervalMs,
		rateLimitWindowMs: limiter.windowMs,
		clock: deps.clock,
		onOutcome: settings.onOutcome,
		logger: deps.logger,
	});

	return {
		symbol,
		asset,
		limiter,
		gateway,
		strategy,
		paper,
		runner,
		loop,
		replaySettings: {
			sizer,
			partialExitPct: asset.partialExitPct,
			contractValue: asset.contractValue,
		},
		prepare: async () => {
			const loadMarkets = deps.exchange.loadMarkets?.bind(deps.exchange);
			if (loadMarkets) {
				await gateway.call("load_markets", loadMarkets);
			}
		},
	};
};

import type {
	ActivePositionSide,
	Candle,
	ExchangePositionSnapshot,
	PartialExitStyle,
	ReconciliationMismatch,
	Signal,
	StrategyPositionState,
	TradeMode,
} from "@tradeloop/core";
import type { IndicatorFrame, IndicatorSpec } from "@tradeloop/indicators";

/**
 * Everything a condition can look at for one closed candle. `candle` is
 * `frame.candles[index]`; `previous` is the bar before it.
 */
export interface EvaluationContext {
	frame: IndicatorFrame;
	index: number;
	candle: Candle;
	previous: Candle;
	position: Readonly<StrategyPositionState>;
}

/** A condition either holds (and says why) or it doesn't. */
export type Verdict = string | null;

export interface EntryLevels {
	trailingStop: number | null;
	takeProfit: number | null;
}

/** A filled exit that left the machine flat. */
export interface ClosedPosition {
	side: ActivePositionSide;
	entryTime: number | null;
	exitTime: number;
}

/**
 * Strategy-specific conditions plugged into the generic state machine.
 */
export interface ConditionEvaluator {
	readonly id: string;
	readonly indicators: readonly IndicatorSpec[];
	/** Columns that must be finite at the closed index and the one before. */
	readonly requiredColumns: readonly string[];
	readonly partialStyle: PartialExitStyle;
	readonly usesTrailingStop: boolean;
	shouldEnterLong(ctx: EvaluationContext): Verdict;
	shouldEnterShort(ctx: EvaluationContext): Verdict;
	shouldExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict;
	shouldPartialExit(ctx: EvaluationContext, side: ActivePositionSide): Verdict;
	initialLevels(
		ctx: EvaluationContext,
		side: ActivePositionSide,
		entryPrice: number
	): EntryLevels;
	/** Stop level suggested by this bar; the machine only ever tightens. */
	trailCandidate(ctx: EvaluationContext, side: ActivePositionSide): number | null;
	/** Called after a fill opens a position. */
	positionOpened?(side: ActivePositionSide, timestamp: number): void;
	/** Called after a filled exit closes the whole position. */
	positionClosed?(trade: ClosedPosition): void;
}

/**
 * What the exchange confirmed for a submitted signal.
 */
export interface FillReport {
	price: number;
	timestamp: number;
	/** Contracts taken off the existing position. */
	closedQuantity: number;
	/** Contracts opened on the new side (entries and flips). */
	openedQuantity: number;
	/** Exchange size left after a partial exit, when the caller read it. */
	remainingQuantity?: number;
	journalRef?: string;
}

export interface StrategyMachineOptions {
	symbol: string;
	tradeMode: TradeMode;
	allowFlip: boolean;
	partialExits: boolean;
}

/**
 * The object the runner drives. One instance per strategy and symbol.
 */
export interface TradingStrategy {
	readonly id: string;
	readonly indicators: readonly IndicatorSpec[];
	evaluate(frame: IndicatorFrame, closedIndex: number | null): Signal;
	applyFill(signal: Signal, fill: FillReport): void;
	reconcile(exchange: ExchangePositionSnapshot): ReconciliationMismatch | null;
	state(): StrategyPositionState;
}

import {
	ReconciliationMismatch,
	ValidationError,
	createLogger,
	entrySide,
	flatPositionState,
	isEntryAction,
	isFullExitAction,
	isPartialExitAction,
	noneSignal,
	oppositeSide,
	type ActivePositionSide,
	type ExchangePositionSnapshot,
	type ModuleLogger,
	type Signal,
	type SignalAction,
	type StrategyPositionState,
} from "@tradeloop/core";
import type { IndicatorFrame, IndicatorSpec } from "@tradeloop/indicators";
import type {
	ConditionEvaluator,
	EvaluationContext,
	FillReport,
	StrategyMachineOptions,
	TradingStrategy,
} from "./types";

export interface StateMachineOptions extends StrategyMachineOptions {
	logger?: ModuleLogger;
}

const exitAction = (side: ActivePositionSide): SignalAction =>
	side === "LONG" ? "EXIT_LONG" : "EXIT_SHORT";

const stopBreached = (
	side: ActivePositionSide,
	close: number,
	stop: number
): boolean => (side === "LONG" ? close <= stop : close >= stop);

/**
 * Generic position state machine. The evaluator decides *whether* a
 * condition holds; the machine owns the order in which conditions are
 * checked and every change to the position state.
 */
export class StrategyStateMachine implements TradingStrategy {
	private position: StrategyPositionState = flatPositionState();
	// Context of the last actionable signal, used to place levels on fill.
	private pendingContext: EvaluationContext | null = null;
	private readonly logger: ModuleLogger;

	constructor(
		private readonly evaluator: ConditionEvaluator,
		private readonly options: StateMachineOptions
	) {
		this.logger = options.logger ?? createLogger("strategy-engine");
	}

	get id(): string {
		return this.evaluator.id;
	}

	get indicators(): readonly IndicatorSpec[] {
		return this.evaluator.indicators;
	}

	state(): StrategyPositionState {
		return { ...this.position };
	}

	evaluate(frame: IndicatorFrame, closedIndex: number | null): Signal {
		if (closedIndex === null) {
			return noneSignal("no_closed_candle");
		}
		if (
			!Number.isInteger(closedIndex) ||
			closedIndex < 0 ||
			closedIndex >= frame.length
		) {
			throw new ValidationError(
				"closedIndex",
				`${closedIndex} is outside a frame of ${frame.length} candles`
			);
		}

		const candle = frame.candles[closedIndex];
		if (
			closedIndex < 1 ||
			!frame.isReady(this.evaluator.requiredColumns, closedIndex) ||
			!frame.isReady(this.evaluator.requiredColumns, closedIndex - 1)
		) {
			return noneSignal(
				"warming_up",
				closedIndex,
				candle.timestamp,
				candle.close
			);
		}

		const ctx: EvaluationContext = {
			frame,
			index: closedIndex,
			candle,
			previous: frame.candles[closedIndex - 1],
			position: this.position,
		};

		const direction = this.position.direction;
		const signal =
			direction === "FLAT"
				? this.evaluateFlat(ctx)
				: this.evaluateOpen(ctx, direction);

		if (signal.action === "NONE") {
			this.logger.debug("strategy_hold", {
				symbol: this.options.symbol,
				strategyId: this.id,
				closedIndex,
				reason: signal.reason,
				trailingStop: this.position.trailingStop,
			});
			return signal;
		}

		this.pendingContext = ctx;
		this.logger.info("strategy_signal", {
			symbol: this.options.symbol,
			strategyId: this.id,
			timestamp: signal.timestamp,
			action: signal.action,
			reason: signal.reason,
			price: signal.price,
			flipTo: signal.flipTo,
		});
		return signal;
	}

	applyFill(signal: Signal, fill: FillReport): void {
		const action = signal.action;
		if (action === "NONE") {
			return;
		}

		if (isEntryAction(action)) {
			this.open(entrySide(action), fill);
		} else if (isFullExitAction(action)) {
			this.close(fill);
			if (signal.flipTo && fill.openedQuantity > 0) {
				this.open(signal.flipTo, fill);
			}
		} else if (isPartialExitAction(action)) {
			const remaining = Math.max(
				fill.remainingQuantity ??
					this.position.remainingQuantity - fill.closedQuantity,
				0
			);
			if (remaining === 0) {
				this.close(fill);
			} else {
				this.position = {
					...this.position,
					remainingQuantity: remaining,
					takeProfit: null,
					partialExitTaken: true,
				};
			}
		}

		this.pendingContext = null;
		this.logger.info("position_updated", {
			symbol: this.options.symbol,
			strategyId: this.id,
			action,
			fillPrice: fill.price,
			direction: this.position.direction,
			remainingQuantity: this.position.remainingQuantity,
			trailingStop: this.position.trailingStop,
			takeProfit: this.position.takeProfit,
		});
	}

	/**
	 * Adopt the exchange's view of the position. Returns the mismatch when
	 * the exchange holds a side the local state did not have.
	 */
	reconcile(exchange: ExchangePositionSnapshot): ReconciliationMismatch | null {
		const before = this.position;
		const side = exchange.side;

		if (side === "FLAT" || exchange.size <= 0) {
			if (before.direction !== "FLAT") {
				this.logger.warn("position_closed_externally", {
					symbol: this.options.symbol,
					localDirection: before.direction,
					localQuantity: before.remainingQuantity,
				});
			}
			this.position = flatPositionState();
			this.logReconciled(before);
			return null;
		}

		if (before.direction === side) {
			this.position = {
				...before,
				remainingQuantity: exchange.size,
				entryPrice: exchange.entryPrice ?? before.entryPrice,
			};
			this.logReconciled(before);
			return null;
		}

		const mismatch = new ReconciliationMismatch(
			this.options.symbol,
			before.direction,
			before.remainingQuantity,
			side,
			exchange.size
		);
		this.logger.warn("reconciliation_mismatch", {
			symbol: this.options.symbol,
			localDirection: before.direction,
			localQuantity: before.remainingQuantity,
			exchangeDirection: side,
			exchangeQuantity: exchange.size,
		});
		this.position = {
			direction: side,
			entryPrice: exchange.entryPrice,
			entryTime: null,
			remainingQuantity: exchange.size,
			trailingStop: this.evaluator.usesTrailingStop ? exchange.entryPrice : null,
			takeProfit: null,
			partialExitTaken: false,
			journalRef: null,
		};
		this.logReconciled(before);
		return mismatch;
	}

	private evaluateFlat(ctx: EvaluationContext): Signal {
		if (this.allows("LONG")) {
			const reason = this.evaluator.shouldEnterLong(ctx);
			if (reason) {
				return this.signal("ENTER_LONG", reason, ctx);
			}
		}
		if (this.allows("SHORT")) {
			const reason = this.evaluator.shouldEnterShort(ctx);
			if (reason) {
				return this.signal("ENTER_SHORT", reason, ctx);
			}
		}
		return noneSignal(
			"no_entry",
			ctx.index,
			ctx.candle.timestamp,
			ctx.candle.close
		);
	}

	private evaluateOpen(ctx: EvaluationContext, side: ActivePositionSide): Signal {
		this.ratchetStop(ctx, side);

		const stop = this.position.trailingStop;
		if (stop !== null && stopBreached(side, ctx.candle.close, stop)) {
			return this.signal(
				exitAction(side),
				`trailing_stop: close ${ctx.candle.close} crossed stop ${stop}`,
				ctx
			);
		}

		if (this.options.partialExits && !this.position.partialExitTaken) {
			const reason = this.evaluator.shouldPartialExit(ctx, side);
			if (reason) {
				return this.signal(this.partialAction(side), reason, ctx);
			}
		}

		const exitReason = this.evaluator.shouldExit(ctx, side);
		if (exitReason) {
			const flipTo = this.flipTarget(ctx, side);
			return flipTo
				? this.signal(
						exitAction(side),
						`${exitReason}; flip: ${flipTo.reason}`,
						ctx,
						flipTo.side
					)
				: this.signal(exitAction(side), exitReason, ctx);
		}

		return noneSignal(
			"holding",
			ctx.index,
			ctx.candle.timestamp,
			ctx.candle.close
		);
	}

	private ratchetStop(ctx: EvaluationContext, side: ActivePositionSide): void {
		const candidate = this.evaluator.trailCandidate(ctx, side);
		if (candidate === null || !Number.isFinite(candidate)) {
			return;
		}
		const current = this.position.trailingStop;
		const tighter =
			current === null ||
			(side === "LONG" ? candidate > current : candidate < current);
		if (tighter) {
			this.position = { ...this.position, trailingStop: candidate };
			ctx.position = this.position;
		}
	}

	private flipTarget(
		ctx: EvaluationContext,
		side: ActivePositionSide
	): { side: ActivePositionSide; reason: string } | null {
		const target = oppositeSide(side);
		if (!this.options.allowFlip || !this.allows(target)) {
			return null;
		}
		const reason =
			target === "LONG"
				? this.evaluator.shouldEnterLong(ctx)
				: this.evaluator.shouldEnterShort(ctx);
		return reason ? { side: target, reason } : null;
	}

	private partialAction(side: ActivePositionSide): SignalAction {
		if (this.evaluator.partialStyle === "inferred") {
			return "PARTIAL_EXIT";
		}
		return side === "LONG" ? "EXIT_LONG_PARTIAL" : "EXIT_SHORT_PARTIAL";
	}

	private allows(side: ActivePositionSide): boolean {
		const mode = this.options.tradeMode;
		return mode === "both" || (side === "LONG" ? mode === "long" : mode === "short");
	}

	private open(side: ActivePositionSide, fill: FillReport): void {
		if (!(fill.openedQuantity > 0)) {
			throw new ValidationError(
				"openedQuantity",
				`must be positive to open a ${side} position, got ${fill.openedQuantity}`
			);
		}
		const levels = this.pendingContext
			? this.evaluator.initialLevels(this.pendingContext, side, fill.price)
			: {
					trailingStop: this.evaluator.usesTrailingStop ? fill.price : null,
					takeProfit: null,
				};
		this.position = {
			direction: side,
			entryPrice: fill.price,
			entryTime: fill.timestamp,
			remainingQuantity: fill.openedQuantity,
			trailingStop: levels.trailingStop,
			takeProfit: levels.takeProfit,
			partialExitTaken: false,
			journalRef: fill.journalRef ?? null,
		};
		this.evaluator.positionOpened?.(side, fill.timestamp);
	}

	private close(fill: FillReport): void {
		const before = this.position;
		this.position = flatPositionState();
		if (before.direction !== "FLAT") {
			this.evaluator.positionClosed?.({
				side: before.direction,
				entryTime: before.entryTime,
				exitTime: fill.timestamp,
			});
		}
	}

	private signal(
		action: SignalAction,
		reason: string,
		ctx: EvaluationContext,
		flipTo?: ActivePositionSide
	): Signal {
		const signal: Signal = {
			action,
			reason,
			closedIndex: ctx.index,
			timestamp: ctx.candle.timestamp,
			price: ctx.candle.close,
		};
		if (flipTo) {
			signal.flipTo = flipTo;
		}
		return signal;
	}

	private logReconciled(before: StrategyPositionState): void {
		this.logger.info("position_reconciled", {
			symbol: this.options.symbol,
			before: {
				direction: before.direction,
				quantity: before.remainingQuantity,
				entryPrice: before.entryPrice,
			},
			after: {
				direction: this.position.direction,
				quantity: this.position.remainingQuantity,
				entryPrice: this.position.entryPrice,
			},
		});
	}
}

import { randomUUID } from "node:crypto";
import {
	APIError,
	TradingError,
	ValidationError,
	closingOrderSide,
	createLogger,
	entrySide,
	openingOrderSide,
	type ActivePositionSide,
	type AlertKind,
	type AlertSink,
	type ExchangeOrder,
	type ExchangePositionSnapshot,
	type ExecutionClient,
	type ModuleLogger,
	type OrderIntent,
	type Signal,
	type SignalAction,
	type TradeEvent,
	type TradeJournal,
	type TradeOrderSide,
} from "@tradeloop/core";
import type { ApiGateway, OrderVerification } from "@tradeloop/gateway";
import type { PositionSizer } from "@tradeloop/risk-engine";
import type { TradingStrategy } from "@tradeloop/strategy-engine";
import { fireAndForget } from "./dispatch";
import { PositionReconciler } from "./reconciler";

export type OrderResult =
	| {
			status: "filled";
			action: SignalAction;
			intent: OrderIntent;
			orderId: string;
			filledPrice: number;
			closedQuantity: number;
			openedQuantity: number;
	  }
	| {
			status: "skipped";
			action: SignalAction;
			reason: "no_signal" | "no_position" | "position_drift";
	  }
	| {
			status: "failed";
			action: SignalAction;
			reason: string;
			error: TradingError;
	  };

export interface OrderExecutorOptions {
	symbol: string;
	strategyId: string;
	client: ExecutionClient;
	gateway: ApiGateway;
	sizer: PositionSizer;
	/** Fraction of the live position closed by a partial exit. */
	partialExitPct: number;
	reconciler?: PositionReconciler;
	journal?: TradeJournal;
	alerts?: AlertSink;
	logger?: ModuleLogger;
	now?: () => number;
	nextJournalRef?: () => string;
}

type FilledResult = Extract<OrderResult, { status: "filled" }>;

// Keeps floor() honest on products such as 100 * 0.29.
const EPSILON = 1e-9;

const signedSize = (position: ExchangePositionSnapshot): number => {
	if (position.side === "FLAT") {
		return 0;
	}
	return position.side === "LONG" ? position.size : -position.size;
};

const isFlat = (position: ExchangePositionSnapshot): boolean =>
	position.side === "FLAT" || position.size <= 0;

export const describeFailure = (
	symbol: string,
	action: string,
	error: Error
): string => {
	const detail =
		error instanceof APIError
			? ` (status ${error.status ?? "n/a"}, ${error.attempts} attempts)`
			: "";
	return `${symbol} ${action} failed: ${error.message}${detail}`;
};

/**
 * Turns signals into market orders. Exits are sized from the position the
 * exchange reports right before submission; a failed submission leaves the
 * strategy state untouched.
 */
export class OrderExecutor {
	private readonly reconciler: PositionReconciler;
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly nextJournalRef: () => string;

	constructor(private readonly options: OrderExecutorOptions) {
		this.logger = options.logger ?? createLogger("execution-engine");
		this.now = options.now ?? Date.now;
		this.nextJournalRef = options.nextJournalRef ?? randomUUID;
		this.reconciler =
			options.reconciler ??
			new PositionReconciler({
				symbol: options.symbol,
				client: options.client,
				gateway: options.gateway,
				alerts: options.alerts,
				logger: this.logger,
				now: this.now,
			});
	}

	async execute(signal: Signal, strategy: TradingStrategy): Promise<OrderResult> {
		const action = signal.action;
		try {
			switch (action) {
				case "NONE":
					return { status: "skipped", action, reason: "no_signal" };
				case "ENTER_LONG":
				case "ENTER_SHORT":
					return await this.enter(signal, entrySide(action), strategy);
				case "EXIT_LONG":
				case "EXIT_SHORT":
					return await this.exit(signal, strategy);
				case "EXIT_LONG_PARTIAL":
				case "EXIT_SHORT_PARTIAL":
				case "PARTIAL_EXIT":
					return await this.partialExit(signal, strategy);
			}
		} catch (error) {
			if (!(error instanceof TradingError)) {
				throw error;
			}
			const reason = describeFailure(this.options.symbol, action, error);
			this.logger.error("order_failed", {
				symbol: this.options.symbol,
				action,
				error: error.message,
				errorType: error.name,
			});
			this.alert("failure", `${this.options.symbol}:failure:${action}`, {
				title: `${this.options.symbol} ${action} failed`,
				message: reason,
			});
			return { status: "failed", action, reason, error };
		}
	}

	private async enter(
		signal: Signal,
		side: ActivePositionSide,
		strategy: TradingStrategy
	): Promise<OrderResult> {
		const price = this.signalPrice(signal);
		const live = await this.reconciler.fetch();
		if (!isFlat(live)) {
			this.logger.warn("entry_skipped_position_open", {
				symbol: this.options.symbol,
				action: signal.action,
				exchangeSide: live.side,
				exchangeSize: live.size,
			});
			this.reconciler.adopt(strategy, live);
			return { status: "skipped", action: signal.action, reason: "position_drift" };
		}

		const quantity = this.options.sizer.size(price);
		await this.applyLeverage();
		const intent = this.intent(signal, openingOrderSide(side), quantity, false);
		const order = await this.submit(intent, live);
		const filledPrice = order.average ?? order.price ?? price;
		const journalRef = this.nextJournalRef();

		strategy.applyFill(signal, {
			price: filledPrice,
			timestamp: this.now(),
			closedQuantity: 0,
			openedQuantity: quantity,
			journalRef,
		});
		this.record({
			kind: "entry",
			journalRef,
			side,
			quantity,
			remainingQuantity: quantity,
			price: filledPrice,
			reason: signal.reason,
			orderId: order.id,
		});
		return this.filled(intent, order, filledPrice, 0, quantity);
	}

	private async exit(signal: Signal, strategy: TradingStrategy): Promise<OrderResult> {
		const local = strategy.state();
		const live = await this.reconciler.fetch();
		const drift = this.checkDrift(signal, strategy, live, local.direction);
		if (drift) {
			return drift;
		}
		const liveSide = local.direction === "SHORT" ? "SHORT" : "LONG";

		const closing = live.size;
		let opening = 0;
		if (signal.flipTo) {
			opening = this.options.sizer.size(this.signalPrice(signal));
			await this.applyLeverage();
		}
		const intent = this.intent(
			signal,
			closingOrderSide(liveSide),
			closing + opening,
			opening === 0
		);
		const order = await this.submit(intent, live);
		const filledPrice = order.average ?? order.price ?? this.signalPrice(signal);
		const flipRef = opening > 0 ? this.nextJournalRef() : undefined;

		strategy.applyFill(signal, {
			price: filledPrice,
			timestamp: this.now(),
			closedQuantity: closing,
			openedQuantity: opening,
			journalRef: flipRef,
		});
		this.record({
			kind: "exit",
			journalRef: local.journalRef ?? this.nextJournalRef(),
			side: liveSide,
			quantity: closing,
			remainingQuantity: 0,
			price: filledPrice,
			reason: signal.reason,
			entryPrice: local.entryPrice,
			orderId: order.id,
		});
		if (flipRef && signal.flipTo) {
			this.record({
				kind: "entry",
				journalRef: flipRef,
				side: signal.flipTo,
				quantity: opening,
				remainingQuantity: opening,
				price: filledPrice,
				reason: signal.reason,
				orderId: order.id,
			});
		}
		return this.filled(intent, order, filledPrice, closing, opening);
	}

	private async partialExit(
		signal: Signal,
		strategy: TradingStrategy
	): Promise<OrderResult> {
		const local = strategy.state();
		const live = await this.reconciler.fetch();
		// PARTIAL_EXIT leaves the side to the live position.
		const expected =
			signal.action === "EXIT_LONG_PARTIAL"
				? "LONG"
				: signal.action === "EXIT_SHORT_PARTIAL"
					? "SHORT"
					: local.direction;
		const drift = this.checkDrift(signal, strategy, live, expected);
		if (drift) {
			return drift;
		}
		const liveSide = live.side === "SHORT" ? "SHORT" : "LONG";

		const quantity = Math.min(
			Math.max(Math.floor(live.size * this.options.partialExitPct + EPSILON), 1),
			live.size
		);
		const intent = this.intent(signal, closingOrderSide(liveSide), quantity, true);
		const order = await this.submit(intent, live);
		const filledPrice = order.average ?? order.price ?? this.signalPrice(signal);

		strategy.applyFill(signal, {
			price: filledPrice,
			timestamp: this.now(),
			closedQuantity: quantity,
			openedQuantity: 0,
			remainingQuantity: live.size - quantity,
		});
		this.record({
			kind: "partial_exit",
			journalRef: local.journalRef ?? this.nextJournalRef(),
			side: liveSide,
			quantity,
			remainingQuantity: live.size - quantity,
			price: filledPrice,
			reason: signal.reason,
			entryPrice: local.entryPrice,
			orderId: order.id,
		});
		return this.filled(intent, order, filledPrice, quantity, 0);
	}

	/**
	 * Exit paths only act on a position the exchange confirms on the side
	 * the strategy believes it holds. Anything else is reconciled instead.
	 */
	private checkDrift(
		signal: Signal,
		strategy: TradingStrategy,
		live: ExchangePositionSnapshot,
		expected: string
	): OrderResult | null {
		if (isFlat(live)) {
			this.logger.warn("exit_without_position", {
				symbol: this.options.symbol,
				action: signal.action,
			});
			this.reconciler.adopt(strategy, live);
			return { status: "skipped", action: signal.action, reason: "no_position" };
		}
		if (live.side !== expected) {
			this.logger.warn("exit_side_mismatch", {
				symbol: this.options.symbol,
				action: signal.action,
				expected,
				exchangeSide: live.side,
			});
			this.reconciler.adopt(strategy, live);
			return { status: "skipped", action: signal.action, reason: "position_drift" };
		}
		return null;
	}

	private submit(
		intent: OrderIntent,
		before: ExchangePositionSnapshot
	): Promise<ExchangeOrder> {
		return this.options.gateway.placeOrder(
			"create_order",
			() =>
				this.options.client.createMarketOrder(
					intent.symbol,
					intent.side,
					intent.quantity,
					{ reduceOnly: intent.reduceOnly }
				),
			() => this.verify(intent, before)
		);
	}

	/** Position-delta check after an ambiguous submission failure. */
	private async verify(
		intent: OrderIntent,
		before: ExchangePositionSnapshot
	): Promise<OrderVerification<ExchangeOrder>> {
		const current = await this.options.client.getPosition(intent.symbol);
		const startSize = signedSize(before);
		const delta = intent.side === "buy" ? intent.quantity : -intent.quantity;
		const currentSize = signedSize(current);

		if (currentSize === startSize) {
			return { status: "absent" };
		}
		if (currentSize === startSize + delta) {
			return {
				status: "filled",
				order: {
					id: "confirmed-by-position",
					symbol: intent.symbol,
					type: intent.kind,
					side: intent.side,
					amount: intent.quantity,
				},
			};
		}
		return {
			status: "unknown",
			reason: `position moved from ${startSize} to ${currentSize}, expected ${startSize + delta}`,
		};
	}

	private async applyLeverage(): Promise<void> {
		const leverage = this.options.sizer.leverage;
		try {
			await this.options.gateway.call("set_leverage", () =>
				this.options.client.setLeverage(this.options.symbol, leverage)
			);
		} catch (error) {
			this.logger.warn("leverage_set_failed", {
				symbol: this.options.symbol,
				leverage,
				error: error instanceof Error ? error.message : "unknown",
			});
		}
	}

	private intent(
		signal: Signal,
		side: TradeOrderSide,
		quantity: number,
		reduceOnly: boolean
	): OrderIntent {
		return {
			symbol: this.options.symbol,
			side,
			quantity,
			kind: "market",
			reduceOnly,
			signal,
		};
	}

	private signalPrice(signal: Signal): number {
		if (signal.price === null || !(signal.price > 0)) {
			throw new ValidationError(
				"signal.price",
				`${signal.action} needs the closed candle price`
			);
		}
		return signal.price;
	}

	private filled(
		intent: OrderIntent,
		order: ExchangeOrder,
		filledPrice: number,
		closedQuantity: number,
		openedQuantity: number
	): FilledResult {
		this.logger.info("order_submitted", {
			symbol: intent.symbol,
			action: intent.signal.action,
			side: intent.side,
			quantity: intent.quantity,
			reduceOnly: intent.reduceOnly,
			orderId: order.id,
			filledPrice,
		});
		return {
			status: "filled",
			action: intent.signal.action,
			intent,
			orderId: order.id,
			filledPrice,
			closedQuantity,
			openedQuantity,
		};
	}

	private record(
		event: Omit<TradeEvent, "strategyId" | "symbol" | "timestamp">
	): void {
		const full: TradeEvent = {
			...event,
			strategyId: this.options.strategyId,
			symbol: this.options.symbol,
			timestamp: this.now(),
		};
		const journal = this.options.journal;
		if (journal) {
			fireAndForget(this.logger, "journal_write_failed", () => journal.record(full), {
				journalRef: full.journalRef,
			});
		}
		this.alert(event.kind, `${this.options.symbol}:${event.kind}`, {
			title: `${this.options.symbol} ${event.kind.replace("_", " ")} ${event.side}`,
			message: `${event.quantity} @ ${event.price}: ${event.reason}`,
			details: { journalRef: event.journalRef, orderId: event.orderId },
		});
	}

	private alert(
		kind: AlertKind,
		key: string,
		content: { title: string; message: string; details?: Record<string, unknown> }
	): void {
		const alerts = this.options.alerts;
		if (!alerts) {
			return;
		}
		fireAndForget(
			this.logger,
			"alert_failed",
			() => alerts.notify({ kind, key, timestamp: this.now(), ...content }),
			{ key }
		);
	}
}

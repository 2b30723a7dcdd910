export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type ActivePositionSide = "LONG" | "SHORT";
export type PositionSide = ActivePositionSide | "FLAT";

export type TradeOrderSide = "buy" | "sell";

export type TradeMode = "long" | "short" | "both";

export type CandleType = "standard" | "heikin-ashi";

export type SignalAction =
	| "ENTER_LONG"
	| "ENTER_SHORT"
	| "EXIT_LONG"
	| "EXIT_SHORT"
	| "EXIT_LONG_PARTIAL"
	| "EXIT_SHORT_PARTIAL"
	| "PARTIAL_EXIT"
	| "NONE";

export type EntryAction = Extract<SignalAction, "ENTER_LONG" | "ENTER_SHORT">;
export type FullExitAction = Extract<SignalAction, "EXIT_LONG" | "EXIT_SHORT">;
export type PartialExitAction = Extract<
	SignalAction,
	"EXIT_LONG_PARTIAL" | "EXIT_SHORT_PARTIAL" | "PARTIAL_EXIT"
>;

/**
 * Decision produced by one evaluation of a closed candle.
 *
 * `flipTo` is only set on full exits: the position is closed and the
 * opposite side opened by the same order.
 */
export interface Signal {
	action: SignalAction;
	reason: string;
	closedIndex: number | null;
	timestamp: number | null;
	price: number | null;
	flipTo?: ActivePositionSide;
}

export interface StrategyPositionState {
	direction: PositionSide;
	entryPrice: number | null;
	entryTime: number | null;
	remainingQuantity: number;
	trailingStop: number | null;
	takeProfit: number | null;
	partialExitTaken: boolean;
	journalRef: string | null;
}

export interface OrderIntent {
	symbol: string;
	side: TradeOrderSide;
	quantity: number;
	kind: "market";
	reduceOnly: boolean;
	signal: Signal;
}

export const isEntryAction = (action: SignalAction): action is EntryAction =>
	action === "ENTER_LONG" || action === "ENTER_SHORT";

export const isFullExitAction = (
	action: SignalAction
): action is FullExitAction => action === "EXIT_LONG" || action === "EXIT_SHORT";

export const isPartialExitAction = (
	action: SignalAction
): action is PartialExitAction =>
	action === "EXIT_LONG_PARTIAL" ||
	action === "EXIT_SHORT_PARTIAL" ||
	action === "PARTIAL_EXIT";

export const entrySide = (action: EntryAction): ActivePositionSide =>
	action === "ENTER_LONG" ? "LONG" : "SHORT";

export const oppositeSide = (side: ActivePositionSide): ActivePositionSide =>
	side === "LONG" ? "SHORT" : "LONG";

export const openingOrderSide = (side: ActivePositionSide): TradeOrderSide =>
	side === "LONG" ? "buy" : "sell";

export const closingOrderSide = (side: ActivePositionSide): TradeOrderSide =>
	side === "LONG" ? "sell" : "buy";

export const noneSignal = (
	reason: string,
	closedIndex: number | null = null,
	timestamp: number | null = null,
	price: number | null = null
): Signal => ({ action: "NONE", reason, closedIndex, timestamp, price });

export const flatPositionState = (): StrategyPositionState => ({
	direction: "FLAT",
	entryPrice: null,
	entryTime: null,
	remainingQuantity: 0,
	trailingStop: null,
	takeProfit: null,
	partialExitTaken: false,
	journalRef: null,
});

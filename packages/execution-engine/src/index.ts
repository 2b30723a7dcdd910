export {
	OrderExecutor,
	describeFailure,
	type OrderExecutorOptions,
	type OrderResult,
} from "./orderExecutor";
export {
	PositionReconciler,
	type PositionReconcilerOptions,
	type ReconcileOutcome,
} from "./reconciler";
export { PaperExchange, type PaperExchangeOptions } from "./paperExchange";
export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot, ClosedTrade } from "./paperAccount";
export { fireAndForget } from "./dispatch";

export { DeltaClient, type DeltaClientOptions } from "./deltaClient";
export { toExchangeRequestError } from "./errors";
export {
	mapCcxtCandleToCandle,
	mapCcxtPosition,
	type CcxtPositionLike,
} from "./utils/ccxtMapper";

export {
	RateLimiter,
	DEFAULT_MAX_REQUESTS,
	DEFAULT_WINDOW_MS,
	type RateLimiterOptions,
} from "./rateLimiter";
export {
	ResilientGateway,
	DirectGateway,
	RETRYABLE_STATUSES,
	computeBackoffDelay,
	type ApiGateway,
	type BackoffOptions,
	type GatewayOptions,
	type OrderVerification,
} from "./gateway";
export { sleep, systemClock, type Clock, type Sleep } from "./sleep";

import {
	createLogger,
	type AlertSink,
	type ExchangePositionSnapshot,
	type ExecutionClient,
	type ModuleLogger,
	type ReconciliationMismatch,
} from "@tradeloop/core";
import type { ApiGateway } from "@tradeloop/gateway";
import type { TradingStrategy } from "@tradeloop/strategy-engine";
import { fireAndForget } from "./dispatch";

export interface PositionReconcilerOptions {
	symbol: string;
	client: ExecutionClient;
	gateway: ApiGateway;
	alerts?: AlertSink;
	logger?: ModuleLogger;
	now?: () => number;
}

export interface ReconcileOutcome {
	exchange: ExchangePositionSnapshot;
	mismatch: ReconciliationMismatch | null;
}

/**
 * Pulls the authoritative position and pushes it into the strategy. The
 * exchange always wins.
 */
export class PositionReconciler {
	private readonly logger: ModuleLogger;
	private readonly now: () => number;

	constructor(private readonly options: PositionReconcilerOptions) {
		this.logger = options.logger ?? createLogger("execution-engine:reconciler");
		this.now = options.now ?? Date.now;
	}

	fetch(): Promise<ExchangePositionSnapshot> {
		return this.options.gateway.call("fetch_position", () =>
			this.options.client.getPosition(this.options.symbol)
		);
	}

	async reconcile(strategy: TradingStrategy): Promise<ReconcileOutcome> {
		const exchange = await this.fetch();
		return { exchange, mismatch: this.adopt(strategy, exchange) };
	}

	adopt(
		strategy: TradingStrategy,
		exchange: ExchangePositionSnapshot
	): ReconciliationMismatch | null {
		const mismatch = strategy.reconcile(exchange);
		if (mismatch) {
			const alerts = this.options.alerts;
			if (alerts) {
				fireAndForget(
					this.logger,
					"alert_failed",
					() =>
						alerts.notify({
							kind: "status",
							key: `${this.options.symbol}:reconcile`,
							title: `${this.options.symbol} position adopted from exchange`,
							message: mismatch.message,
							timestamp: this.now(),
						}),
					{ symbol: this.options.symbol }
				);
			}
		}
		return mismatch;
	}
}

import { promises as fs } from "node:fs";
import path from "node:path";
import {
	createLogger,
	type ModuleLogger,
	type TradeEvent,
	type TradeJournal,
} from "@tradeloop/core";

export interface JsonlTradeJournalOptions {
	logger?: ModuleLogger;
}

/**
 * Appends one JSON object per line. Writes are chained so concurrent
 * records land in call order.
 */
export class JsonlTradeJournal implements TradeJournal {
	private readonly logger: ModuleLogger;
	private pending: Promise<void> = Promise.resolve();
	private dirReady = false;

	constructor(
		readonly filePath: string,
		options: JsonlTradeJournalOptions = {}
	) {
		this.logger = options.logger ?? createLogger("persistence:journal");
	}

	record(event: TradeEvent): Promise<void> {
		const write = this.pending.then(() => this.append(event));
		this.pending = write.catch(() => undefined);
		return write;
	}

	private async append(event: TradeEvent): Promise<void> {
		if (!this.dirReady) {
			await fs.mkdir(path.dirname(this.filePath), { recursive: true });
			this.dirReady = true;
		}
		await fs.appendFile(this.filePath, `${JSON.stringify(event)}\n`, "utf8");
		this.logger.debug("journal_recorded", {
			journalRef: event.journalRef,
			kind: event.kind,
			path: this.filePath,
		});
	}
}

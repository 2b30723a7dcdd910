import type { TradeEvent, TradeJournal } from "@tradeloop/core";

export class InMemoryTradeJournal implements TradeJournal {
	readonly events: TradeEvent[] = [];

	async record(event: TradeEvent): Promise<void> {
		this.events.push(event);
	}

	/** Exit and partial events for one trade, in record order. */
	closesFor(journalRef: string): TradeEvent[] {
		return this.events.filter(
			(event) => event.journalRef === journalRef && event.kind !== "entry"
		);
	}
}

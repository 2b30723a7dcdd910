/**
 * Trade journal sinks. The trading path never reads the journal back.
 */
export { JsonlTradeJournal, type JsonlTradeJournalOptions } from "./jsonlJournal";
export { InMemoryTradeJournal } from "./memoryJournal";

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ModuleLogger, TradeEvent } from "@tradeloop/core";
import { InMemoryTradeJournal } from "./memoryJournal";
import { JsonlTradeJournal } from "./jsonlJournal";

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const event = (overrides: Partial<TradeEvent> = {}): TradeEvent => ({
	kind: "entry",
	journalRef: "ref-1",
	strategyId: "donchian_channel",
	symbol: "BTC/USD:USD",
	side: "LONG",
	quantity: 10,
	remainingQuantity: 10,
	price: 50_000,
	timestamp: 1_700_000_000_000,
	reason: "breakout",
	...overrides,
});

const tempDirs: string[] = [];

afterEach(async () => {
	await Promise.all(
		tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true }))
	);
});

describe("JsonlTradeJournal", () => {
	it("creates the directory and appends one line per event in order", async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), "journal-"));
		tempDirs.push(dir);
		const filePath = path.join(dir, "nested", "trades.jsonl");
		const journal = new JsonlTradeJournal(filePath, { logger: silentLogger() });

		await Promise.all([
			journal.record(event()),
			journal.record(event({ kind: "partial_exit", quantity: 5, remainingQuantity: 5 })),
			journal.record(event({ kind: "exit", quantity: 5, remainingQuantity: 0 })),
		]);

		const lines = (await fs.readFile(filePath, "utf8")).trim().split("\n");
		expect(lines.map((line) => JSON.parse(line).kind)).toEqual([
			"entry",
			"partial_exit",
			"exit",
		]);
		expect(JSON.parse(lines[1])).toEqual(
			event({ kind: "partial_exit", quantity: 5, remainingQuantity: 5 })
		);
	});

	it("keeps accepting records after a failed write", async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), "journal-"));
		tempDirs.push(dir);
		// A directory where the file should be makes the first append fail.
		const filePath = path.join(dir, "trades.jsonl");
		await fs.mkdir(filePath);
		const journal = new JsonlTradeJournal(filePath, { logger: silentLogger() });

		await expect(journal.record(event())).rejects.toThrow();
		await fs.rm(filePath, { recursive: true });
		await journal.record(event({ journalRef: "ref-2" }));

		const content = await fs.readFile(filePath, "utf8");
		expect(JSON.parse(content.trim()).journalRef).toBe("ref-2");
	});
});

describe("InMemoryTradeJournal", () => {
	it("groups closing events by trade", async () => {
		const journal = new InMemoryTradeJournal();
		await journal.record(event());
		await journal.record(event({ kind: "exit", remainingQuantity: 0 }));
		await journal.record(event({ journalRef: "ref-2" }));

		expect(journal.closesFor("ref-1")).toHaveLength(1);
		expect(journal.closesFor("ref-2")).toEqual([]);
	});
});

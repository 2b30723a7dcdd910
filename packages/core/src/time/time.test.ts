import { describe, it, expect } from "vitest";
import {
	timeframeToMs,
	bucketTimestamp,
	isBucketAligned,
	timeframeMultiple,
	isIntervalClosed,
} from "./time";

describe("time utilities", () => {
	describe("timeframeToMs", () => {
		it("parses minute, hour and day timeframes", () => {
			expect(timeframeToMs("1m")).toBe(60_000);
			expect(timeframeToMs("15m")).toBe(900_000);
			expect(timeframeToMs("1h")).toBe(3_600_000);
			expect(timeframeToMs("3h")).toBe(10_800_000);
			expect(timeframeToMs("1d")).toBe(86_400_000);
		});

		it("is case-insensitive and trims whitespace", () => {
			expect(timeframeToMs(" 1H ")).toBe(3_600_000);
		});

		it("rejects malformed and zero timeframes", () => {
			expect(() => timeframeToMs("1w")).toThrow(/Invalid timeframe format/);
			expect(() => timeframeToMs("0m")).toThrow(/must be positive/);
		});
	});

	describe("bucketTimestamp", () => {
		it("floors to the start of the period", () => {
			expect(bucketTimestamp(1_735_690_261_234, 60_000)).toBe(
				1_735_690_260_000
			);
		});

		it("aligns 3h buckets to the epoch", () => {
			const threeHours = 10_800_000;
			expect(bucketTimestamp(7 * 3_600_000, threeHours)).toBe(6 * 3_600_000);
			expect(isBucketAligned(6 * 3_600_000, threeHours)).toBe(true);
			expect(isBucketAligned(7 * 3_600_000, threeHours)).toBe(false);
		});

		it("rejects negative timestamps", () => {
			expect(() => bucketTimestamp(-1, 60_000)).toThrow(/Invalid timestamp/);
		});
	});

	describe("timeframeMultiple", () => {
		it("returns how many base candles fit in the target", () => {
			expect(timeframeMultiple("1h", "3h")).toBe(3);
			expect(timeframeMultiple("5m", "5m")).toBe(1);
		});

		it("rejects targets that are not whole multiples", () => {
			expect(() => timeframeMultiple("1h", "90m")).toThrow(/whole multiple/);
		});
	});

	describe("isIntervalClosed", () => {
		it("treats the exact close boundary as closed", () => {
			expect(isIntervalClosed(0, 60_000, 60_000)).toBe(true);
			expect(isIntervalClosed(0, 60_000, 59_999)).toBe(false);
		});
	});
});

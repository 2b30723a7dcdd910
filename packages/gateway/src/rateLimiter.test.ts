import { describe, expect, it } from "vitest";
import { RateLimitTimeout } from "@tradeloop/core";
import { RateLimiter } from "./rateLimiter";

const createFakeTime = () => {
	let now = 0;
	const sleeps: number[] = [];
	return {
		clock: () => now,
		sleep: async (ms: number) => {
			sleeps.push(ms);
			now += ms;
		},
		advance: (ms: number) => {
			now += ms;
		},
		sleeps,
	};
};

describe("RateLimiter", () => {
	it("blocks the request past the limit until the oldest slot expires", async () => {
		const time = createFakeTime();
		const limiter = new RateLimiter({
			maxRequests: 150,
			windowMs: 300_000,
			clock: time.clock,
			sleep: time.sleep,
		});

		for (let i = 0; i < 150; i += 1) {
			await limiter.acquire();
		}
		expect(time.sleeps).toEqual([]);
		expect(limiter.remaining()).toBe(0);

		await limiter.acquire();
		expect(time.sleeps).toEqual([300_000]);
		expect(time.clock()).toBe(300_000);
		expect(limiter.remaining()).toBe(149);
	});

	it("only waits for the part of the window still outstanding", async () => {
		const time = createFakeTime();
		const limiter = new RateLimiter({
			maxRequests: 5,
			windowMs: 1_000,
			clock: time.clock,
			sleep: time.sleep,
		});

		await limiter.acquire();
		time.advance(400);
		for (let i = 0; i < 4; i += 1) {
			await limiter.acquire();
		}
		await limiter.acquire();

		expect(time.sleeps).toEqual([600]);
	});

	it("never grants more than maxRequests inside any window", async () => {
		const time = createFakeTime();
		const limiter = new RateLimiter({
			maxRequests: 3,
			windowMs: 1_000,
			clock: time.clock,
			sleep: time.sleep,
		});
		const grantedAt: number[] = [];

		for (let i = 0; i < 10; i += 1) {
			await limiter.acquire();
			grantedAt.push(time.clock());
		}

		for (let i = 0; i + 3 < grantedAt.length; i += 1) {
			expect(grantedAt[i + 3] - grantedAt[i]).toBeGreaterThanOrEqual(1_000);
		}
	});

	it("grants concurrent callers in call order", async () => {
		const time = createFakeTime();
		const limiter = new RateLimiter({
			maxRequests: 2,
			windowMs: 1_000,
			clock: time.clock,
			sleep: time.sleep,
		});
		const order: string[] = [];

		await Promise.all(
			["a", "b", "c", "d"].map((label) =>
				limiter.acquire(label).then(() => {
					order.push(label);
				})
			)
		);

		expect(order).toEqual(["a", "b", "c", "d"]);
		expect(time.sleeps).toEqual([1_000]);
	});

	it("fails with RateLimitTimeout instead of waiting past maxWaitMs", async () => {
		const time = createFakeTime();
		const limiter = new RateLimiter({
			maxRequests: 1,
			windowMs: 1_000,
			maxWaitMs: 500,
			clock: time.clock,
			sleep: time.sleep,
		});

		await limiter.acquire("first");
		await expect(limiter.acquire("second")).rejects.toBeInstanceOf(
			RateLimitTimeout
		);

		time.advance(600);
		await limiter.acquire("third");
		expect(time.sleeps).toEqual([400]);
	});

	it("counts time queued behind other callers against maxWaitMs", async () => {
		const time = createFakeTime();
		const limiter = new RateLimiter({
			maxRequests: 1,
			windowMs: 1_000,
			clock: time.clock,
			sleep: time.sleep,
		});

		const [first, second, third] = await Promise.allSettled([
			limiter.acquire("first"),
			limiter.acquire("second"),
			limiter.acquire("third"),
		]);

		expect(first.status).toBe("fulfilled");
		expect(second.status).toBe("fulfilled");
		expect(third.status).toBe("rejected");
		if (third.status === "rejected") {
			expect(third.reason).toBeInstanceOf(RateLimitTimeout);
			expect(third.reason).toMatchObject({ label: "third", waitedMs: 1_000, maxWaitMs: 1_000 });
		}
		expect(time.sleeps).toEqual([1_000]);
	});

	it("rejects a non-positive request budget", () => {
		expect(() => new RateLimiter({ maxRequests: 0 })).toThrow(/maxRequests/);
	});
});

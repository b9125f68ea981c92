import { describe, expect, it } from "vitest";
import { FakeClock } from "../../shared/time.js";
import { RateLimiterManager } from "./rate-limiter-manager.js";

describe("RateLimiterManager", () => {
	it("hands the same bucket to callers sharing a key", () => {
		const limiters = new RateLimiterManager(new FakeClock());

		const a = limiters.getOrCreate("acct-1", { capacity: 2, refillRate: 1 });
		const b = limiters.getOrCreate("acct-1", { capacity: 50, refillRate: 50 });

		expect(b).toBe(a);
		expect(limiters.size).toBe(1);
		a.tryAcquire();
		a.tryAcquire();
		expect(b.tryAcquire()).toBe(false);
	});

	it("keeps separate budgets per key on one clock", () => {
		const clock = new FakeClock();
		const limiters = new RateLimiterManager(clock);
		const first = limiters.getOrCreate("acct-1", { capacity: 1, refillRate: 1 });
		const second = limiters.getOrCreate("acct-2", { capacity: 1, refillRate: 1 });

		first.tryAcquire();
		expect(second.tryAcquire()).toBe(true);

		clock.advance(1_000);
		expect(first.availableTokens()).toBe(1);
		expect(second.availableTokens()).toBe(1);
	});

	it("reports stats per key", () => {
		const limiters = new RateLimiterManager(new FakeClock());
		limiters.getOrCreate("acct-1", { capacity: 1, refillRate: 0 }).tryAcquire();
		const idle = limiters.getOrCreate("acct-2", { capacity: 1, refillRate: 0 });
		idle.tryAcquire();
		idle.tryAcquire();

		const stats = limiters.getAllStats();

		expect(stats.get("acct-1")).toEqual({ hits: 1, misses: 0, waits: 0, avgWaitMs: 0 });
		expect(stats.get("acct-2")).toEqual({ hits: 1, misses: 1, waits: 0, avgWaitMs: 0 });
	});
});

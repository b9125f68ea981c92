import { afterEach, describe, expect, it, vi } from "vitest";
import { NetworkError, RateLimitError, RejectError, SystemError } from "../shared/errors.js";
import { CallKind, CallPolicy, computeDelay } from "./call-policy.js";

const FAST = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 };

/** Throws each queued error in turn, then resolves with `value`. */
function scripted<T>(errors: Error[], value: T): { fn: () => Promise<T>; calls: () => number } {
	let calls = 0;
	return {
		fn: async () => {
			const next = errors[calls];
			calls++;
			if (next !== undefined) throw next;
			return value;
		},
		calls: () => calls,
	};
}

describe("CallPolicy", () => {
	describe("queries", () => {
		it("passes through on first success", async () => {
			const call = scripted([], 3);
			const result = await new CallPolicy(FAST).run(CallKind.Query, "q", call.fn);
			expect(result).toEqual({ ok: true, value: 3 });
			expect(call.calls()).toBe(1);
		});

		it("retries a retryable error then succeeds", async () => {
			const call = scripted([new NetworkError("connection reset")], 2);
			const result = await new CallPolicy(FAST).run(CallKind.Query, "q", call.fn);
			expect(result.ok).toBe(true);
			expect(call.calls()).toBe(2);
		});

		it("stops at maxAttempts and returns the last error", async () => {
			const call = scripted(
				[new NetworkError("fail 1"), new NetworkError("fail 2"), new NetworkError("fail 3")],
				0,
			);
			const result = await new CallPolicy(FAST).run(CallKind.Query, "q", call.fn);
			expect(call.calls()).toBe(3);
			if (result.ok) throw new Error("expected failure");
			expect(result.error.message).toBe("fail 3");
		});

		it("does not retry a non-retryable error", async () => {
			const call = scripted([new RejectError("bad symbol")], 0);
			const result = await new CallPolicy(FAST).run(CallKind.Query, "q", call.fn);
			expect(result.ok).toBe(false);
			expect(call.calls()).toBe(1);
		});

		it("classifies plain errors", async () => {
			const call = scripted([new Error("something odd")], 0);
			const result = await new CallPolicy(FAST).run(CallKind.Query, "q", call.fn);
			if (result.ok) throw new Error("expected failure");
			expect(result.error).toBeInstanceOf(SystemError);
			expect(call.calls()).toBe(1);
		});
	});

	describe("orders", () => {
		it("never retries, even a retryable error", async () => {
			const call = scripted([new NetworkError("connection reset")], "ord-1");
			const result = await new CallPolicy(FAST).run(CallKind.Order, "placeOrder", call.fn);
			expect(result.ok).toBe(false);
			expect(call.calls()).toBe(1);
		});

		it("returns the value on success", async () => {
			const call = scripted([], "ord-1");
			const result = await new CallPolicy(FAST).run(CallKind.Order, "placeOrder", call.fn);
			expect(result).toEqual({ ok: true, value: "ord-1" });
		});
	});

	it("never retries a priority call", async () => {
		const call = scripted([new NetworkError("connection reset")], 2);
		const result = await new CallPolicy(FAST).run(CallKind.Priority, "queryPosition", call.fn);
		expect(result.ok).toBe(false);
		expect(call.calls()).toBe(1);
	});
});

describe("computeDelay", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("doubles per attempt and caps at maxDelayMs", () => {
		const config = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 300, jitterFactor: 0 };
		const e = new NetworkError("x");
		expect(computeDelay(0, config, e)).toBe(100);
		expect(computeDelay(1, config, e)).toBe(200);
		expect(computeDelay(2, config, e)).toBe(300);
	});

	it("honours a rate limit's retry-after", () => {
		const config = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 10_000, jitterFactor: 0 };
		expect(computeDelay(0, config, new RateLimitError("slow down", 1_500))).toBe(1_500);
	});

	it("jitters in both directions", () => {
		const config = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 10_000, jitterFactor: 0.5 };
		vi.spyOn(Math, "random").mockReturnValue(0);
		expect(computeDelay(0, config, new NetworkError("x"))).toBe(50);
		vi.spyOn(Math, "random").mockReturnValue(1);
		expect(computeDelay(0, config, new NetworkError("x"))).toBe(150);
	});
});

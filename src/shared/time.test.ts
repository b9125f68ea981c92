import { afterEach, describe, expect, it, vi } from "vitest";
import { Duration, FakeClock, SystemClock, sleep, utcDayKey, withDeadline } from "./time.js";

describe("clocks", () => {
	it("reads wall time from the system clock", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	it("moves a fake clock only when told to", () => {
		const clock = new FakeClock(1_000);
		clock.advance(250);
		expect(clock.now()).toBe(1_250);
		clock.set(5);
		expect(clock.now()).toBe(5);
		expect(new FakeClock().now()).toBe(0);
	});
});

describe("Duration", () => {
	it("converts to milliseconds", () => {
		expect(Duration.ms(15)).toBe(15);
		expect(Duration.seconds(2)).toBe(2_000);
		expect(Duration.minutes(1.5)).toBe(90_000);
		expect(Duration.hours(24)).toBe(86_400_000);
	});
});

describe("utcDayKey", () => {
	it("names the UTC calendar day of a timestamp", () => {
		expect(utcDayKey(Date.UTC(2024, 2, 8, 23, 59, 59))).toBe("2024-03-08");
		expect(utcDayKey(Date.UTC(2024, 2, 9, 0, 0, 0))).toBe("2024-03-09");
		expect(utcDayKey(0)).toBe("1970-01-01");
	});
});

describe("timers", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves sleep(0) without a timer", async () => {
		vi.useFakeTimers();
		await expect(sleep(0)).resolves.toBeUndefined();
		expect(vi.getTimerCount()).toBe(0);
	});

	it("resolves sleep after the delay", async () => {
		vi.useFakeTimers();
		let done = false;
		const waiting = sleep(100).then(() => {
			done = true;
		});
		await vi.advanceTimersByTimeAsync(99);
		expect(done).toBe(false);
		await vi.advanceTimersByTimeAsync(1);
		await waiting;
		expect(done).toBe(true);
	});

	it("reports work that finishes before the deadline", async () => {
		const outcome = await withDeadline(Promise.resolve(42), 1_000);
		expect(outcome).toEqual({ kind: "completed", value: 42 });
	});

	it("reports work that fails before the deadline", async () => {
		const failure = new Error("broker down");
		const outcome = await withDeadline(Promise.reject(failure), 1_000);
		expect(outcome).toEqual({ kind: "failed", error: failure });
	});

	it("expires when the work outlives the deadline and clears its timer", async () => {
		vi.useFakeTimers();
		const pending = withDeadline(new Promise<number>(() => {}), 500);
		await vi.advanceTimersByTimeAsync(500);
		expect(await pending).toEqual({ kind: "expired" });
		expect(vi.getTimerCount()).toBe(0);
	});
});

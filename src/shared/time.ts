/**
 * Time utilities — injectable clock plus timer helpers.
 *
 * Timestamps recorded on fills, transitions and drift records come from
 * Clock.now() so tests can pin them. Waiting (poll intervals, deadlines)
 * uses real timers.
 */

/** Injectable time source -- engine code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

/** UTC calendar day of a timestamp, e.g. "2024-03-08". */
export function utcDayKey(ms: number): string {
	return new Date(ms).toISOString().slice(0, 10);
}

// ── Timers ───────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/** Outcome of racing work against a deadline. */
export type DeadlineOutcome<T> =
	| { readonly kind: "completed"; readonly value: T }
	| { readonly kind: "failed"; readonly error: unknown }
	| { readonly kind: "expired" };

/**
 * Race `work` against a timer. The work is not cancelled on expiry;
 * callers that need it to stop must observe their own abort flag.
 */
export async function withDeadline<T>(work: Promise<T>, ms: number): Promise<DeadlineOutcome<T>> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const expiry = new Promise<DeadlineOutcome<T>>((resolve) => {
		timer = setTimeout(() => resolve({ kind: "expired" }), ms);
	});
	try {
		return await Promise.race([
			work.then(
				(value): DeadlineOutcome<T> => ({ kind: "completed", value }),
				(error: unknown): DeadlineOutcome<T> => ({ kind: "failed", error }),
			),
			expiry,
		]);
	} finally {
		if (timer !== undefined) clearTimeout(timer);
	}
}

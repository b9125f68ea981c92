/**
 * Call policy — the single place that decides whether a broker call may be
 * retried.
 *
 * Queries (position, working orders, fills) are idempotent and retried with
 * exponential backoff and jitter on retryable errors. Order placement and
 * cancellation are single-shot: a duplicate submission is worse than a
 * visible failure. Priority calls (the kill switch) are single-shot too.
 */

import type { Logger } from "../lib/logger/index.js";
import type { QueryRetrySettings } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { RateLimitError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { type Result, tryCatchAsync } from "../shared/result.js";
import { sleep } from "../shared/time.js";

export const CallKind = {
	Query: "query",
	Order: "order",
	/** Any call made under a deadline; never retried */
	Priority: "priority",
} as const;

export type CallKind = (typeof CallKind)[keyof typeof CallKind];

/** @internal Exported for testing only. */
export function computeDelay(
	attempt: number,
	config: QueryRetrySettings,
	error: TradingError,
): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	let delay = Math.min(exponential, config.maxDelayMs);

	if (error instanceof RateLimitError && Number.isFinite(error.retryAfterMs)) {
		delay = Math.max(delay, error.retryAfterMs);
	}

	const jitter = 1 + (Math.random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

export class CallPolicy {
	private readonly config: QueryRetrySettings;
	private readonly logger: Logger | undefined;

	constructor(config: QueryRetrySettings = DEFAULT_ENGINE_CONFIG.queryRetry, logger?: Logger) {
		this.config = config;
		this.logger = logger;
	}

	/**
	 * Run a broker call, classifying anything thrown into a TradingError.
	 *
	 * @example
	 * ```ts
	 * const pos = await policy.run(CallKind.Query, "queryPosition", () => api.queryPosition(acct, sym));
	 * ```
	 */
	async run<T>(
		kind: CallKind,
		label: string,
		fn: () => Promise<T>,
	): Promise<Result<T, TradingError>> {
		let result = await tryCatchAsync(fn, classifyError);
		if (kind !== CallKind.Query || result.ok || !result.error.isRetryable) {
			return result;
		}

		for (let attempt = 1; attempt < this.config.maxAttempts; attempt++) {
			const delay = computeDelay(attempt - 1, this.config, result.error);
			this.logger?.debug(
				{ call: label, attempt, delayMs: Math.round(delay), error: result.error.message },
				"retrying broker query",
			);
			await sleep(delay);

			result = await tryCatchAsync(fn, classifyError);
			if (result.ok || !result.error.isRetryable) return result;
		}

		return result;
	}
}

import type { Clock } from "../../shared/time.js";
import type { RateLimiterConfig, RateLimiterStats } from "./rate-limiter.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

/**
 * Keyed rate limiters sharing one clock.
 *
 * The key decides what shares a budget: callers that pass the same key
 * draw from the same bucket.
 */
export class RateLimiterManager {
	private readonly clock: Clock;
	private readonly limiters: Map<string, TokenBucketRateLimiter> = new Map();

	constructor(clock: Clock) {
		this.clock = clock;
	}

	/**
	 * Returns the limiter for `key`, creating it on first access.
	 * First registration wins: a later config for the same key is ignored.
	 */
	getOrCreate(key: string, config: Omit<RateLimiterConfig, "clock">): TokenBucketRateLimiter {
		const existing = this.limiters.get(key);
		if (existing) return existing;
		const limiter = new TokenBucketRateLimiter({ ...config, clock: this.clock });
		this.limiters.set(key, limiter);
		return limiter;
	}

	get size(): number {
		return this.limiters.size;
	}

	getAllStats(): ReadonlyMap<string, RateLimiterStats> {
		const stats = new Map<string, RateLimiterStats>();
		for (const [key, limiter] of this.limiters) {
			stats.set(key, limiter.getStats());
		}
		return stats;
	}
}

import { ConfigError, RateLimitError } from "../../shared/errors.js";
import type { Clock } from "../../shared/time.js";

/**
 * Configuration for TokenBucketRateLimiter.
 */
export interface RateLimiterConfig {
	readonly capacity: number;
	/** Tokens per second */
	readonly refillRate: number;
	readonly clock: Clock;
}

/** Snapshot of rate limiter usage statistics. */
export interface RateLimiterStats {
	readonly hits: number;
	readonly misses: number;
	readonly waits: number;
	readonly avgWaitMs: number;
}

/**
 * Token-bucket rate limiter with injectable clock.
 *
 * Tokens accumulate at `refillRate` tokens/second up to `capacity`.
 * `tryAcquire()` never blocks; `acquire()` sleeps until the next token is due.
 * Waiters are served in call order; `acquirePriority()` does not queue behind them.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private tokens: number;
	private lastRefillMs: number;
	private queue: Promise<void> = Promise.resolve();
	private priorityWaiters = 0;

	private _hits = 0;
	private _misses = 0;
	private _waits = 0;
	private _totalWaitMs = 0;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate < 0) {
			throw new ConfigError("refillRate must be >= 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/**
	 * Attempts to acquire one token without blocking.
	 * @returns true if a token was acquired
	 */
	tryAcquire(): boolean {
		const acquired = this.take();
		if (acquired) {
			this._hits++;
		} else {
			this._misses++;
		}
		return acquired;
	}

	/** Current number of whole tokens (after refill). */
	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	/**
	 * Milliseconds until the next token is available: 0 if one is available
	 * now, Infinity if refillRate is 0 and the bucket is empty.
	 */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		if (this.refillRate === 0) {
			return Number.POSITIVE_INFINITY;
		}
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	/**
	 * Waits for a token, then consumes it.
	 * @param timeoutMs - Maximum wait before giving up (default: 30000ms)
	 * @throws RateLimitError if no token becomes available within `timeoutMs`
	 */
	acquire(timeoutMs = 30_000): Promise<void> {
		const turn = this.queue.then(() => this.waitForToken(timeoutMs, false));
		this.queue = turn.catch(() => undefined);
		return turn;
	}

	/**
	 * Takes the next token that frees up, ahead of every queued `acquire()`.
	 * @throws RateLimitError if no token becomes available within `timeoutMs`
	 */
	async acquirePriority(timeoutMs = 30_000): Promise<void> {
		this.priorityWaiters++;
		try {
			await this.waitForToken(timeoutMs, true);
		} finally {
			this.priorityWaiters--;
		}
	}

	getStats(): RateLimiterStats {
		return {
			hits: this._hits,
			misses: this._misses,
			waits: this._waits,
			avgWaitMs: this._waits > 0 ? this._totalWaitMs / this._waits : 0,
		};
	}

	private async waitForToken(timeoutMs: number, priority: boolean): Promise<void> {
		// queued callers leave freed tokens to priority waiters
		const take = (): boolean => (priority || this.priorityWaiters === 0) && this.take();
		if (take()) {
			this._hits++;
			return;
		}
		const startMs = this.clock.now();
		this._waits++;
		for (;;) {
			const waitMs = this.timeUntilNextTokenMs();
			const elapsed = this.clock.now() - startMs;
			if (elapsed + waitMs > timeoutMs) {
				throw new RateLimitError("Timeout waiting for rate limit token", waitMs, {
					timeoutMs,
				});
			}
			await new Promise<void>((resolve) => setTimeout(resolve, Math.max(1, waitMs)));
			if (take()) {
				this._hits++;
				this._totalWaitMs += this.clock.now() - startMs;
				return;
			}
		}
	}

	private take(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		const newTokens = (elapsedMs / 1000) * this.refillRate;
		this.tokens = Math.min(this.capacity, this.tokens + newTokens);
		this.lastRefillMs = now;
	}
}

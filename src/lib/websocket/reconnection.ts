export interface ReconnectionConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** 0 retries forever */
	readonly maxAttempts: number;
	readonly jitterFactor: number;
}

export const DEFAULT_RECONNECTION: ReconnectionConfig = {
	baseDelayMs: 250,
	maxDelayMs: 10_000,
	maxAttempts: 0,
	jitterFactor: 0.2,
};

/**
 * Exponential backoff reconnection policy with jitter and attempt limiting.
 * Call `reset()` once a connection is re-established.
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private attempts = 0;

	constructor(config: ReconnectionConfig = DEFAULT_RECONNECTION) {
		this.config = config;
	}

	nextDelay(): number {
		const raw = this.config.baseDelayMs * 2 ** this.attempts;
		const capped = Math.min(raw, this.config.maxDelayMs);
		this.attempts += 1;
		if (this.config.jitterFactor === 0) return capped;
		const jitter = capped * this.config.jitterFactor * (Math.random() * 2 - 1);
		return Math.max(0, Math.round(capped + jitter));
	}

	reset(): void {
		this.attempts = 0;
	}

	shouldRetry(): boolean {
		return this.config.maxAttempts === 0 || this.attempts < this.config.maxAttempts;
	}

	get attemptCount(): number {
		return this.attempts;
	}
}

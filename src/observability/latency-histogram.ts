/**
 * Log-scale latency histogram in milliseconds.
 *
 * Bucket i holds samples below 2^i ms (i = 0..11, so up to 2048 ms); one
 * overflow bucket takes the rest. Percentiles report the bucket's upper
 * bound, so they never understate a latency. Used for kill-switch runs,
 * where the interesting question is how close they come to the deadline.
 */

const NUM_BUCKETS = 12;
const BUCKET_BOUNDARIES_MS: readonly number[] = Array.from(
	{ length: NUM_BUCKETS },
	(_, i) => 2 ** i,
);

export interface LatencySnapshot {
	readonly count: number;
	readonly p50Ms: number;
	readonly p95Ms: number;
	readonly p99Ms: number;
	readonly maxMs: number;
	/** Samples at or above the threshold passed to `snapshot()` */
	readonly overThreshold: number;
}

export class LatencyHistogram {
	private readonly buckets: number[];
	private readonly samplesOver = new Map<number, number>();
	private _count = 0;
	private _maxMs = 0;
	private readonly thresholds: readonly number[];

	private constructor(thresholds: readonly number[]) {
		this.buckets = new Array<number>(NUM_BUCKETS + 1).fill(0);
		this.thresholds = thresholds;
	}

	/** @param thresholds latencies (ms) to count exceedances of, e.g. a deadline */
	static create(thresholds: readonly number[] = []): LatencyHistogram {
		return new LatencyHistogram(thresholds);
	}

	record(latencyMs: number): void {
		const idx = this.bucketIndex(latencyMs);
		this.buckets[idx] = (this.buckets[idx] ?? 0) + 1;
		this._count++;
		if (latencyMs > this._maxMs) this._maxMs = latencyMs;
		for (const threshold of this.thresholds) {
			if (latencyMs >= threshold) {
				this.samplesOver.set(threshold, (this.samplesOver.get(threshold) ?? 0) + 1);
			}
		}
	}

	get count(): number {
		return this._count;
	}

	get maxMs(): number {
		return this._maxMs;
	}

	/** Upper bound of the bucket holding the p-th percentile. 0 with no data. */
	percentileMs(p: number): number {
		if (this._count === 0) return 0;
		const target = Math.ceil(this._count * (p / 100));
		let cumulative = 0;

		for (let i = 0; i <= NUM_BUCKETS; i++) {
			cumulative += this.buckets[i] ?? 0;
			if (cumulative >= target) {
				if (i >= NUM_BUCKETS) return this._maxMs;
				return BUCKET_BOUNDARIES_MS[i] ?? this._maxMs;
			}
		}
		return this._maxMs;
	}

	/** Samples recorded at or above `thresholdMs`; 0 for a threshold not tracked. */
	countOver(thresholdMs: number): number {
		return this.samplesOver.get(thresholdMs) ?? 0;
	}

	snapshot(thresholdMs?: number): LatencySnapshot {
		return {
			count: this._count,
			p50Ms: this.percentileMs(50),
			p95Ms: this.percentileMs(95),
			p99Ms: this.percentileMs(99),
			maxMs: this._maxMs,
			overThreshold: thresholdMs === undefined ? 0 : this.countOver(thresholdMs),
		};
	}

	reset(): void {
		this.buckets.fill(0);
		this.samplesOver.clear();
		this._count = 0;
		this._maxMs = 0;
	}

	private bucketIndex(latencyMs: number): number {
		if (latencyMs <= 0) return 0;
		for (let i = 0; i < NUM_BUCKETS; i++) {
			const boundary = BUCKET_BOUNDARIES_MS[i];
			if (boundary !== undefined && latencyMs < boundary) return i;
		}
		return NUM_BUCKETS;
	}
}

import { Decimal } from "../shared/decimal.js";
import type { Candle } from "./types.js";

interface MutableCandle {
	open: Decimal;
	high: Decimal;
	low: Decimal;
	close: Decimal;
	tickCount: number;
	timestampMs: number;
}

export interface BarAggregatorConfig {
	/** Bar length, default one minute */
	readonly intervalMs: number;
	/** Completed bars retained per symbol */
	readonly maxBars: number;
}

const DEFAULT_CONFIG: BarAggregatorConfig = { intervalMs: 60_000, maxBars: 200 };

/**
 * Aggregates ticks into fixed-interval OHLC bars for one symbol.
 *
 * Only the bars that saw ticks exist; a gap leaves no empty bar behind.
 * Bars older than `maxBars` are dropped.
 */
export class BarAggregator {
	private readonly config: BarAggregatorConfig;
	private readonly bars: MutableCandle[] = [];

	constructor(config: Partial<BarAggregatorConfig> = {}) {
		this.config = { ...DEFAULT_CONFIG, ...config };
	}

	addTick(price: Decimal, timestampMs: number): void {
		const bucketStart = Math.floor(timestampMs / this.config.intervalMs) * this.config.intervalMs;
		const last = this.bars[this.bars.length - 1];

		if (last !== undefined && last.timestampMs === bucketStart) {
			last.high = Decimal.max(last.high, price);
			last.low = Decimal.min(last.low, price);
			last.close = price;
			last.tickCount++;
			return;
		}
		// out-of-order tick for an already closed bar
		if (last !== undefined && bucketStart < last.timestampMs) return;

		this.bars.push({
			open: price,
			high: price,
			low: price,
			close: price,
			tickCount: 1,
			timestampMs: bucketStart,
		});
		if (this.bars.length > this.config.maxBars) {
			this.bars.splice(0, this.bars.length - this.config.maxBars);
		}
	}

	/** Bars oldest first, including the one still forming. */
	candles(): readonly Candle[] {
		return this.bars.map((b) => ({ ...b }));
	}

	get size(): number {
		return this.bars.length;
	}
}

import type { Decimal } from "../shared/decimal.js";

/** OHLC bar built from ticks; all prices as Decimal. */
export interface Candle {
	readonly open: Decimal;
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
	readonly tickCount: number;
	readonly timestampMs: number;
}

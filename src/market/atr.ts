import { Decimal } from "../shared/decimal.js";
import type { Candle } from "./types.js";

/**
 * True Range: max(H-L, |H-prevClose|, |L-prevClose|)
 */
export function trueRange(candle: Candle, prevClose: Decimal): Decimal {
	const hl = candle.high.sub(candle.low);
	const hc = candle.high.sub(prevClose).abs();
	const lc = candle.low.sub(prevClose).abs();
	return Decimal.max(hl, Decimal.max(hc, lc));
}

/**
 * Wilder's Average True Range over chronological candles.
 * Needs `period + 1` candles; returns null with fewer.
 */
export function calcATR(candles: readonly Candle[], period = 14): Decimal | null {
	if (period < 1 || candles.length < period + 1) {
		return null;
	}

	const trValues: Decimal[] = [];
	let prev: Candle | undefined;
	for (const candle of candles) {
		if (prev !== undefined) trValues.push(trueRange(candle, prev.close));
		prev = candle;
	}

	const periodD = Decimal.from(period);
	let atr = trValues
		.slice(0, period)
		.reduce((sum, tr) => sum.add(tr), Decimal.zero())
		.div(periodD);

	for (const tr of trValues.slice(period)) {
		atr = atr
			.mul(Decimal.from(period - 1))
			.add(tr)
			.div(periodD);
	}

	return atr;
}

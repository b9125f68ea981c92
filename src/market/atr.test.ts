import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { calcATR, trueRange } from "./atr.js";
import type { Candle } from "./types.js";

function bar(high: string, low: string, close: string, minute: number): Candle {
	return {
		open: Decimal.from(close),
		high: Decimal.from(high),
		low: Decimal.from(low),
		close: Decimal.from(close),
		tickCount: 1,
		timestampMs: minute * 60_000,
	};
}

const BARS = [
	bar("12", "9", "11", 0),
	bar("13", "10", "12", 1),
	bar("12", "11", "11.5", 2),
	bar("15", "12", "14", 3),
	bar("14", "13", "13", 4),
];

describe("trueRange", () => {
	it("is the bar's range when it contains the previous close", () => {
		expect(trueRange(bar("13", "10", "12", 1), Decimal.from("11")).toString()).toBe("3");
	});

	it("reaches back to the previous close across a gap", () => {
		expect(trueRange(bar("10", "9", "9.5", 1), Decimal.from("12")).toString()).toBe("3");
		expect(trueRange(bar("15", "12", "14", 1), Decimal.from("11.5")).toString()).toBe("3.5");
	});
});

describe("calcATR", () => {
	it("needs one bar more than the period", () => {
		expect(calcATR(BARS.slice(0, 3), 3)).toBeNull();
		expect(calcATR(BARS, 0)).toBeNull();
	});

	it("seeds with the mean of the first true ranges", () => {
		expect(calcATR(BARS.slice(0, 4), 3)?.toString()).toBe("2.5");
	});

	it("smooths later bars the Wilder way", () => {
		expect(calcATR(BARS, 3)?.toString()).toBe("2");
	});
});

import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { BarAggregator } from "./bar-aggregator.js";

const d = Decimal.from;

function summary(bars: BarAggregator) {
	return bars.candles().map((c) => ({
		at: c.timestampMs,
		ohlc: [c.open, c.high, c.low, c.close].map((p) => p.toString()),
		ticks: c.tickCount,
	}));
}

describe("BarAggregator", () => {
	it("folds ticks in one interval into a single bar", () => {
		const bars = new BarAggregator({ intervalMs: 1_000 });
		bars.addTick(d("100"), 0);
		bars.addTick(d("102"), 500);
		bars.addTick(d("99"), 900);
		bars.addTick(d("101"), 999);

		expect(summary(bars)).toEqual([{ at: 0, ohlc: ["100", "102", "99", "101"], ticks: 4 }]);
	});

	it("opens a bar per interval and leaves gaps empty", () => {
		const bars = new BarAggregator({ intervalMs: 1_000 });
		bars.addTick(d("100"), 200);
		bars.addTick(d("103"), 2_500);

		expect(summary(bars).map((b) => b.at)).toEqual([0, 2_000]);
	});

	it("drops a late tick for a bar already closed", () => {
		const bars = new BarAggregator({ intervalMs: 1_000 });
		bars.addTick(d("100"), 0);
		bars.addTick(d("103"), 2_500);
		bars.addTick(d("50"), 1_500);

		expect(bars.size).toBe(2);
		expect(summary(bars)[1]?.ohlc).toEqual(["103", "103", "103", "103"]);
	});

	it("keeps only the newest maxBars", () => {
		const bars = new BarAggregator({ intervalMs: 1_000, maxBars: 2 });
		bars.addTick(d("100"), 0);
		bars.addTick(d("101"), 1_000);
		bars.addTick(d("102"), 2_000);

		expect(summary(bars).map((b) => b.at)).toEqual([1_000, 2_000]);
	});

	it("hands out copies of its bars", () => {
		const bars = new BarAggregator();
		bars.addTick(d("100"), 0);
		const before = bars.candles();
		bars.addTick(d("105"), 1);

		expect(before[0]?.high.toString()).toBe("100");
		expect(bars.candles()[0]?.high.toString()).toBe("105");
	});
});

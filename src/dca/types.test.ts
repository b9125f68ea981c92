import { describe, expect, it } from "vitest";
import { encodeDcaConfig, parseDcaConfig } from "./types.js";

describe("parseDcaConfig", () => {
	it("parses rungs into decimals and defaults the protective distances", () => {
		const result = parseDcaConfig({
			triggerMode: "PERCENT",
			rungs: [
				{ distance: "0.5", quantity: 1 },
				{ distance: 1.25, quantity: 2 },
			],
			maxQuantity: 6,
		});

		if (!result.ok) throw result.error;
		expect(result.value.rungs.map((r) => r.distance.toString())).toEqual(["0.5", "1.25"]);
		expect(result.value.takeProfitTicks).toBeNull();
		expect(result.value.stopLossTicks).toBeNull();
	});

	it("accepts an empty rung list", () => {
		const result = parseDcaConfig({ triggerMode: "TICKS", rungs: [], maxQuantity: 1 });
		expect(result.ok).toBe(true);
	});

	it("rejects an unknown trigger mode", () => {
		const result = parseDcaConfig({ triggerMode: "POINTS", rungs: [], maxQuantity: 1 });
		expect(result.ok).toBe(false);
		expect(!result.ok && result.error.issues[0]?.path).toEqual(["triggerMode"]);
	});

	it("rejects a non-positive distance and a fractional quantity", () => {
		const result = parseDcaConfig({
			triggerMode: "TICKS",
			rungs: [{ distance: 0, quantity: 1.5 }],
			maxQuantity: 3,
		});
		if (result.ok) throw new Error("expected failure");
		const paths = result.error.issues.map((i) => i.path.join("."));
		expect(paths).toContain("rungs.0.distance");
		expect(paths).toContain("rungs.0.quantity");
	});

	it("rejects rungs that get closer to the entry", () => {
		const result = parseDcaConfig({
			triggerMode: "TICKS",
			rungs: [
				{ distance: 20, quantity: 1 },
				{ distance: 10, quantity: 1 },
			],
			maxQuantity: 3,
		});
		if (result.ok) throw new Error("expected failure");
		expect(result.error.issues).toEqual([
			{ path: ["rungs", 1, "distance"], message: "rung distances must not decrease" },
		]);
	});

	it("encodes back to the plain form it was parsed from", () => {
		const input = {
			triggerMode: "ATR",
			rungs: [{ distance: "1.5", quantity: 1 }],
			maxQuantity: 4,
			takeProfitTicks: 8,
			stopLossTicks: 20,
		} as const;
		const parsed = parseDcaConfig(input);
		if (!parsed.ok) throw parsed.error;
		expect(encodeDcaConfig(parsed.value)).toEqual({
			triggerMode: "ATR",
			rungs: [{ distance: "1.5", quantity: 1 }],
			maxQuantity: 4,
			takeProfitTicks: 8,
			stopLossTicks: 20,
		});
	});
});

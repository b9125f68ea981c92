import { describe, expect, it } from "vitest";
import { ACCT, MYM, dcaConfig } from "../__tests__/harness.js";
import { flatPosition } from "../ledger/types.js";
import type { Position } from "../ledger/types.js";
import { ContractBook } from "../shared/contracts.js";
import { Decimal } from "../shared/decimal.js";
import { PositionSide } from "../shared/side.js";
import { ExitConditions, StopLossTicks, TakeProfitTicks } from "./exit-conditions.js";

const d = Decimal.from;
const spec = new ContractBook().resolve(MYM);

function open(
	quantity: number,
	stopLossTicks: number | null,
	takeProfitTicks: number | null,
): Position {
	return {
		...flatPosition(ACCT, MYM),
		side: quantity > 0 ? PositionSide.Long : PositionSide.Short,
		quantity,
		averageEntryPrice: d("100"),
		dcaConfig: dcaConfig({
			triggerMode: "TICKS",
			rungs: [],
			maxQuantity: 10,
			stopLossTicks,
			takeProfitTicks,
		}),
	};
}

describe("ExitConditions", () => {
	const conditions = ExitConditions.standard();

	it("lists its conditions in evaluation order", () => {
		expect(conditions.names()).toEqual(["StopLossTicks", "TakeProfitTicks"]);
	});

	it("triggers the stop at or beyond the level for a long", () => {
		const long = open(2, 5, 10);
		expect(conditions.evaluate(long, d("96"), spec)).toBeNull();
		const signal = conditions.evaluate(long, d("95"), spec);
		expect(signal?.type).toBe("stop_loss");
		expect(signal?.level.toString()).toBe("95");
	});

	it("triggers the take-profit when price gaps through it", () => {
		const long = open(2, 5, 10);
		const signal = conditions.evaluate(long, d("115"), spec);
		expect(signal?.type).toBe("take_profit");
		expect(signal?.level.toString()).toBe("110");
	});

	it("mirrors the levels for a short", () => {
		const short = open(-2, 5, 10);
		expect(conditions.evaluate(short, d("105"), spec)?.type).toBe("stop_loss");
		expect(conditions.evaluate(short, d("90"), spec)?.type).toBe("take_profit");
		expect(conditions.evaluate(short, d("100"), spec)).toBeNull();
	});

	it("ignores levels that are not configured", () => {
		const noStop = open(2, null, null);
		expect(conditions.evaluate(noStop, d("1"), spec)).toBeNull();
	});

	it("ignores flat positions", () => {
		expect(conditions.evaluate(flatPosition(ACCT, MYM), d("1"), spec)).toBeNull();
	});

	it("evaluates only the conditions it was built with", () => {
		const stopOnly = ExitConditions.create().with(StopLossTicks);
		expect(stopOnly.evaluate(open(2, 5, 10), d("200"), spec)).toBeNull();
		expect(TakeProfitTicks.name).toBe("TakeProfitTicks");
	});
});

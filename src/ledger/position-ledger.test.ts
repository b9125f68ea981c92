import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ExitTrigger } from "../exit/exit-state.js";
import { Decimal } from "../shared/decimal.js";
import { accountId, fillId, orderId, symbolId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { FakeClock } from "../shared/time.js";
import { MemoryLedgerStore } from "./memory-store.js";
import { PositionLedger } from "./position-ledger.js";
import type { Fill, FillRole, Position } from "./types.js";

const ACCT = accountId("acct-1");
const MNQ = symbolId("MNQZ5");

let seq = 0;

function fill(
	side: OrderSide,
	quantity: number,
	price: string,
	overrides: { id?: string; ts?: number; role?: FillRole } = {},
): Fill {
	seq++;
	return {
		fillId: fillId(overrides.id ?? `f-${seq}`),
		orderId: orderId(`o-${seq}`),
		accountId: ACCT,
		symbol: MNQ,
		side,
		quantity,
		price: Decimal.from(price),
		timestampMs: overrides.ts ?? seq,
		role: overrides.role ?? "entry",
	};
}

function setup(store = new MemoryLedgerStore(), clock = new FakeClock(1_000)) {
	return { store, clock, ledger: new PositionLedger({ store, clock }) };
}

describe("PositionLedger.recordFill", () => {
	it("returns the recomputed position and emits positionChanged", async () => {
		const { ledger } = setup();
		const seen: Position[] = [];
		ledger.on("positionChanged", (p) => seen.push(p));

		await ledger.recordFill(fill(OrderSide.Buy, 3, "100"));
		const result = await ledger.recordFill(fill(OrderSide.Buy, 2, "90"));

		if (!result.ok) throw result.error;
		expect(result.value.side).toBe("long");
		expect(result.value.quantity).toBe(5);
		expect(result.value.averageEntryPrice?.toString()).toBe("96");
		expect(seen.map((p) => p.quantity)).toEqual([3, 5]);
		expect(ledger.currentPosition(ACCT, MNQ).quantity).toBe(5);
	});

	it("ignores a fill id it has already recorded", async () => {
		const { ledger, store } = setup();
		const f = fill(OrderSide.Buy, 1, "100");
		await ledger.recordFill(f);
		const again = await ledger.recordFill(f);

		expect(again.ok && again.value.quantity).toBe(1);
		expect(store.fills).toHaveLength(1);
	});

	it("rejects a non-integer quantity", async () => {
		const { ledger } = setup();
		const result = await ledger.recordFill(fill(OrderSide.Buy, 1.5, "100"));
		expect(result.ok).toBe(false);
		expect(!result.ok && result.error.code).toBe("VALIDATION_FAILED");
	});

	it("refuses to grow a position mid-exit but accepts the reducing fill", async () => {
		const { ledger, store } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 2, "100"));
		await ledger.transitionExit(ACCT, MNQ, ExitTrigger.RequestExit);

		const grow = await ledger.recordFill(fill(OrderSide.Buy, 1, "99"));
		expect(!grow.ok && grow.error.code).toBe("CONFLICTING_INTENT");
		expect(store.fills).toHaveLength(1);

		const reduce = await ledger.recordFill(fill(OrderSide.Sell, 2, "101", { role: "exit" }));
		expect(reduce.ok && reduce.value.quantity).toBe(0);
	});

	it("refuses a fill through zero while flattening", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 1, "100"));
		await ledger.setFlattening(ACCT, MNQ, true);

		const cross = await ledger.recordFill(fill(OrderSide.Sell, 2, "100"));
		expect(!cross.ok && cross.error.code).toBe("CONFLICTING_INTENT");
	});

	it("books adjustment fills regardless of the exit state", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 1, "100"));
		await ledger.transitionExit(ACCT, MNQ, ExitTrigger.RequestExit);

		const adjusted = await ledger.recordFill(
			fill(OrderSide.Buy, 1, "100", { role: "adjustment" }),
		);
		expect(adjusted.ok && adjusted.value.quantity).toBe(2);
	});

	it("refuses an exit fill that would open or grow a position, exit or not", async () => {
		const { ledger } = setup();
		const opening = await ledger.recordFill(fill(OrderSide.Sell, 2, "100", { role: "exit" }));
		expect(!opening.ok && opening.error.code).toBe("CONFLICTING_INTENT");

		await ledger.recordFill(fill(OrderSide.Buy, 1, "100"));
		const growing = await ledger.recordFill(fill(OrderSide.Buy, 1, "101", { role: "exit" }));
		expect(!growing.ok && growing.error.message).toBe(
			"Refusing an exit fill that would open or grow the position",
		);
		expect(ledger.currentPosition(ACCT, MNQ).quantity).toBe(1);
		expect(ledger.fills(ACCT, MNQ)).toHaveLength(1);
	});

	it("does not book a late fill again once an adjustment accounted for it", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 2, "100", { ts: 10 }));
		const adjustment = fill(OrderSide.Sell, 2, "101", { ts: 50, role: "adjustment" });
		await ledger.recordFill({ ...adjustment, orderId: null });

		const late = fill(OrderSide.Sell, 2, "101", { id: "late-exit", ts: 40, role: "exit" });
		const first = await ledger.recordFill(late);
		const again = await ledger.recordFill(late);

		expect(first.ok && first.value.quantity).toBe(0);
		expect(again.ok && again.value.quantity).toBe(0);
		expect(ledger.fills(ACCT, MNQ)).toHaveLength(2);
		expect(ledger.coveredByAdjustment(ACCT, MNQ, "late-exit")).toBe(true);

		const fresh = await ledger.recordFill(fill(OrderSide.Sell, 2, "99", { ts: 60 }));
		expect(fresh.ok && fresh.value.quantity).toBe(-2);
	});

	it("matches partial fills of the order an adjustment stands in for", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 2, "100", { ts: 10 }));
		const adjustment = fill(OrderSide.Sell, 2, "101", { ts: 50, role: "adjustment" });
		await ledger.recordFill({ ...adjustment, orderId: orderId("exit-7") });

		const part = (id: string) => ({
			...fill(OrderSide.Sell, 1, "101", { id, ts: 30, role: "exit" }),
			orderId: orderId("exit-7"),
		});
		expect((await ledger.recordFill(part("p-1"))).ok).toBe(true);
		expect((await ledger.recordFill(part("p-2"))).ok).toBe(true);
		const third = await ledger.recordFill(part("p-3"));

		expect(third.ok).toBe(false);
		expect(ledger.currentPosition(ACCT, MNQ).quantity).toBe(0);
		expect(ledger.fills(ACCT, MNQ)).toHaveLength(2);
	});

	it("reports closedAt only once the exit is back to IDLE", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 1, "100", { ts: 10 }));
		await ledger.transitionExit(ACCT, MNQ, ExitTrigger.RequestExit);
		await ledger.transitionExit(ACCT, MNQ, ExitTrigger.ExitSubmitted);

		const filled = await ledger.recordFill(
			fill(OrderSide.Sell, 1, "104", { ts: 20, role: "exit" }),
		);
		expect(filled.ok && filled.value.closedAt).toBeNull();

		await ledger.transitionExit(ACCT, MNQ, ExitTrigger.ExitFilled);
		const idle = await ledger.transitionExit(ACCT, MNQ, ExitTrigger.ConfirmedFlat);
		if (!idle.ok) throw idle.error;
		expect(idle.value.exitState).toBe("IDLE");
		expect(idle.value.closedAt).toBe(20);
		expect(idle.value.realizedPnl.toString()).toBe("8");
		expect(idle.value.history.map((h) => h.to)).toEqual([
			"PREPARE_EXIT",
			"WORKING_EXIT",
			"CONFIRM_FLAT",
			"IDLE",
		]);
	});

	it("re-marks the open position when a fill lands after a price", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 1, "100"));
		ledger.mark(ACCT, MNQ, Decimal.from("98"));
		const added = await ledger.recordFill(fill(OrderSide.Buy, 1, "98"));

		if (!added.ok) throw added.error;
		// avg 99, last 98, 2 contracts, 2 $/pt
		expect(added.value.unrealizedPnl.toString()).toBe("-4");
		expect(added.value.worstUnrealizedPnl.toString()).toBe("-4");
	});
});

describe("PositionLedger control state", () => {
	it("refuses an invalid exit transition", async () => {
		const { ledger } = setup();
		const result = await ledger.transitionExit(ACCT, MNQ, ExitTrigger.ConfirmedFlat);
		expect(!result.ok && result.error.code).toBe("CONFLICTING_INTENT");
		expect(ledger.currentPosition(ACCT, MNQ).exitState).toBe("IDLE");
	});

	it("persists fired rungs across a restart", async () => {
		const store = new MemoryLedgerStore();
		const first = setup(store).ledger;
		await first.recordFill(fill(OrderSide.Buy, 3, "100"));
		await first.markRungFired(ACCT, MNQ, 1);
		await first.markRungFired(ACCT, MNQ, 0);
		await first.markRungFired(ACCT, MNQ, 1);

		const restarted = setup(store).ledger;
		const loaded = await restarted.load();

		expect(loaded).toEqual({ ok: true, value: 1 });
		const position = restarted.currentPosition(ACCT, MNQ);
		expect(position.dcaTriggeredIndices).toEqual([0, 1]);
		expect(position.quantity).toBe(3);
	});

	it("clears fired rungs and excursions when a new lifecycle opens", async () => {
		const { ledger } = setup();
		await ledger.recordFill(fill(OrderSide.Buy, 1, "100"));
		await ledger.markRungFired(ACCT, MNQ, 0);
		ledger.mark(ACCT, MNQ, Decimal.from("90"));
		await ledger.recordFill(fill(OrderSide.Sell, 1, "90"));

		const reopened = await ledger.recordFill(fill(OrderSide.Buy, 1, "91"));
		if (!reopened.ok) throw reopened.error;
		expect(reopened.value.dcaTriggeredIndices).toEqual([]);
		// excursion restarts from zero: (90 - 91) * 2 $/pt
		expect(reopened.value.worstUnrealizedPnl.toString()).toBe("-2");
		expect(reopened.value.realizedPnl.toString()).toBe("0");
	});

	it("stamps attention and halt with the clock", async () => {
		const { ledger, clock } = setup();
		clock.set(5_000);
		await ledger.setAttention(ACCT, MNQ, { code: "exit_rejected", message: "no margin" });
		const halted = await ledger.setHalted(ACCT, MNQ, "kill_switch_timeout");

		if (!halted.ok) throw halted.error;
		expect(halted.value.attention).toEqual({
			code: "exit_rejected",
			message: "no margin",
			at: 5_000,
		});
		expect(halted.value.halted).toEqual({ reason: "kill_switch_timeout", at: 5_000 });
	});
});

describe("PositionLedger.rebuild", () => {
	it("refolds the stored log after a stale row", async () => {
		const store = new MemoryLedgerStore();
		const { ledger } = setup(store);
		await ledger.recordFill(fill(OrderSide.Buy, 2, "100"));
		await store.appendFill(fill(OrderSide.Buy, 1, "97"));

		const rebuilt = await ledger.rebuild(ACCT, MNQ);
		if (!rebuilt.ok) throw rebuilt.error;
		expect(rebuilt.value.quantity).toBe(3);
		expect(rebuilt.value.averageEntryPrice?.toString()).toBe("99");
		expect(ledger.fills(ACCT, MNQ)).toHaveLength(2);
	});

	it("halts the position when the log repeats a fill id", async () => {
		const store = new MemoryLedgerStore();
		const { ledger } = setup(store);
		const f = fill(OrderSide.Buy, 1, "100", { id: "dup" });
		await ledger.recordFill(f);
		await store.appendFill(f);

		const rebuilt = await ledger.rebuild(ACCT, MNQ);
		expect(!rebuilt.ok && rebuilt.error.code).toBe("LEDGER_CORRUPTION");
		expect(ledger.currentPosition(ACCT, MNQ).halted?.reason).toBe("ledger_corruption");
	});

	it("matches incremental recording for any fill sequence", async () => {
		const fillArb = fc.record({
			buy: fc.boolean(),
			quantity: fc.integer({ min: 1, max: 5 }),
			ticks: fc.integer({ min: 360, max: 440 }),
		});
		await fc.assert(
			fc.asyncProperty(fc.array(fillArb, { minLength: 1, maxLength: 25 }), async (steps) => {
				const { ledger } = setup();
				for (const step of steps) {
					const price = Decimal.from(step.ticks).mul(Decimal.from("0.25")).toString();
					const side = step.buy ? OrderSide.Buy : OrderSide.Sell;
					const recorded = await ledger.recordFill(fill(side, step.quantity, price));
					if (!recorded.ok) throw recorded.error;
				}
				const incremental = ledger.currentPosition(ACCT, MNQ);
				const rebuilt = await ledger.rebuild(ACCT, MNQ);
				if (!rebuilt.ok) throw rebuilt.error;

				expect(rebuilt.value.quantity).toBe(incremental.quantity);
				expect(rebuilt.value.side).toBe(incremental.side);
				expect(rebuilt.value.averageEntryPrice?.toString()).toBe(
					incremental.averageEntryPrice?.toString(),
				);
				expect(rebuilt.value.realizedPnl.toString()).toBe(incremental.realizedPnl.toString());
				expect(rebuilt.value.openedAt).toBe(incremental.openedAt);
				expect(rebuilt.value.closedAt).toBe(incremental.closedAt);
				expect(rebuilt.value.quantity === 0).toBe(rebuilt.value.averageEntryPrice === null);
			}),
			{ numRuns: 100 },
		);
	});
});

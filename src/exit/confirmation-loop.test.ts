import { afterEach, describe, expect, it, vi } from "vitest";
import { ACCT, MYM, createHarness, holdPosition, quote, wireExit } from "../__tests__/harness.js";
import type { ExitRig, Harness } from "../__tests__/harness.js";
import { sleep } from "../shared/time.js";
import { ExitState, ExitTrigger } from "./exit-state.js";

const rigs: ExitRig[] = [];

function setup(confirmTimeoutMs = 500): { h: Harness; rig: ExitRig } {
	const h = createHarness();
	const rig = wireExit(h, { confirmTimeoutMs });
	rigs.push(rig);
	return { h, rig };
}

afterEach(async () => {
	for (const rig of rigs.splice(0)) {
		rig.confirmation.stopAll();
		await rig.loop.close();
	}
});

describe("ConfirmationLoop", () => {
	it("escalates to the kill switch when the broker stays open past the deadline", async () => {
		const { h, rig } = setup(30);
		await holdPosition(h, 2, "100");
		h.broker.stallMarketOrders(1);
		const exit = await rig.requestExit();
		expect(exit.ok && exit.value.kind).toBe("submitted");

		await vi.waitFor(() => {
			const position = h.ledger.currentPosition(ACCT, MYM);
			expect(position.quantity).toBe(0);
			expect(position.flattening).toBe(false);
		});

		const position = h.ledger.currentPosition(ACCT, MYM);
		expect(position.exitState).toBe(ExitState.Idle);
		expect(position.history.at(-1)?.trigger).toBe(ExitTrigger.KillSwitch);
		expect(h.broker.cancelled).toEqual(["paper-1"]);
		expect(h.raised.map((a) => a.type)).toEqual(["exit_confirm_timed_out", "drift_corrected"]);
		expect(rig.confirmation.isWatching(ACCT, MYM)).toBe(false);
	});

	it("keeps polling through a failed broker query", async () => {
		const { h, rig } = setup();
		quote(h, "100");
		await h.ledger.transitionExit(ACCT, MYM, ExitTrigger.RequestExit);
		await h.ledger.transitionExit(ACCT, MYM, ExitTrigger.NothingToExit);
		h.broker.failQueries(3);

		rig.confirmation.start(ACCT, MYM, rig.epochs.current(rig.key));

		await vi.waitFor(() =>
			expect(h.ledger.currentPosition(ACCT, MYM).exitState).toBe(ExitState.Idle),
		);
		expect(h.raised).toEqual([]);
	});

	it("drops the watch once the position is back to IDLE", async () => {
		const { h, rig } = setup();
		quote(h, "100");

		rig.confirmation.start(ACCT, MYM, rig.epochs.current(rig.key));
		expect(rig.confirmation.isWatching(ACCT, MYM)).toBe(true);

		await vi.waitFor(() => expect(rig.confirmation.isWatching(ACCT, MYM)).toBe(false));
		expect(h.broker.submitted).toHaveLength(0);
	});

	it("goes quiet when the epoch moves on", async () => {
		const { h, rig } = setup(20);
		await holdPosition(h, 1, "100");
		await h.ledger.transitionExit(ACCT, MYM, ExitTrigger.RequestExit);
		await h.ledger.transitionExit(ACCT, MYM, ExitTrigger.ExitSubmitted);

		rig.confirmation.start(ACCT, MYM, rig.epochs.current(rig.key));
		rig.epochs.bump(rig.key);
		await sleep(60);
		await rig.loop.drain();

		expect(h.raised).toEqual([]);
		expect(rig.killSwitch.isActive(ACCT, MYM)).toBe(false);
		expect(h.ledger.currentPosition(ACCT, MYM).exitState).toBe(ExitState.WorkingExit);
	});
});

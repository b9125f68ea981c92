import { afterEach, describe, expect, it, vi } from "vitest";
import { ACCT, MYM, createHarness, holdPosition, quote, wireExit } from "../__tests__/harness.js";
import type { ExitRig, Harness } from "../__tests__/harness.js";
import { ExitRejectionPolicy } from "../shared/config.js";
import { orderId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { ExitState, ExitTrigger } from "./exit-state.js";

const rigs: ExitRig[] = [];

function setup(policy: ExitRejectionPolicy = ExitRejectionPolicy.RequireOperator): {
	h: Harness;
	rig: ExitRig;
} {
	const h = createHarness();
	const rig = wireExit(h, { policy });
	rigs.push(rig);
	return { h, rig };
}

afterEach(async () => {
	for (const rig of rigs.splice(0)) {
		rig.confirmation.stopAll();
		await rig.loop.close();
	}
});

function idle(h: Harness): void {
	expect(h.ledger.currentPosition(ACCT, MYM).exitState).toBe(ExitState.Idle);
}

describe("ExitMachine", () => {
	it("sizes the exit from the broker and walks to confirmed flat", async () => {
		const { h, rig } = setup();
		await holdPosition(h, 2, "100");
		quote(h, "103");

		const result = await rig.requestExit();

		if (!result.ok) throw result.error;
		expect(result.value).toMatchObject({ kind: "submitted", orderId: "paper-1", quantity: 2 });
		expect(result.value.position.exitState).toBe(ExitState.WorkingExit);
		expect(h.broker.submitted).toEqual([
			{
				accountId: ACCT,
				symbol: MYM,
				side: OrderSide.Sell,
				quantity: 2,
				type: "market",
				purpose: "exit",
			},
		]);

		await vi.waitFor(() => idle(h));
		const position = h.ledger.currentPosition(ACCT, MYM);
		expect(position.quantity).toBe(0);
		expect(position.realizedPnl.toString()).toBe("3");
		expect(position.history.map((t) => t.trigger)).toEqual([
			ExitTrigger.RequestExit,
			ExitTrigger.ExitSubmitted,
			ExitTrigger.BrokerFlat,
			ExitTrigger.ConfirmedFlat,
		]);
		expect(rig.confirmation.isWatching(ACCT, MYM)).toBe(false);
	});

	it("sizes a short exit as a buy of the broker quantity", async () => {
		const { h, rig } = setup();
		await holdPosition(h, -3, "100");
		h.broker.setPosition(ACCT, MYM, -1);

		const result = await rig.requestExit();

		expect(result.ok && result.value.kind === "submitted" && result.value.quantity).toBe(1);
		expect(h.broker.submitted.map((i) => [i.side, i.quantity])).toEqual([[OrderSide.Buy, 1]]);
		await vi.waitFor(() => idle(h));
	});

	it("leaves an exit in flight untouched when asked again", async () => {
		const { h, rig } = setup();
		await holdPosition(h, 2, "100");

		const first = await rig.requestExit("stop_loss");
		const second = await rig.requestExit("manual");

		expect(first.ok && first.value.kind).toBe("submitted");
		if (!second.ok) throw second.error;
		expect(second.value.kind).toBe("in_flight");
		expect(second.value.position.exitState).toBe(ExitState.WorkingExit);
		expect(h.broker.submitted).toHaveLength(1);
		await vi.waitFor(() => idle(h));
	});

	it("confirms an already flat broker without sending an order", async () => {
		const { h, rig } = setup();
		quote(h, "100");

		const result = await rig.requestExit();

		expect(result.ok && result.value.kind).toBe("nothing_to_exit");
		expect(h.broker.submitted).toHaveLength(0);
		await vi.waitFor(() => idle(h));
		expect(h.ledger.currentPosition(ACCT, MYM).history.map((t) => t.trigger)).toEqual([
			ExitTrigger.RequestExit,
			ExitTrigger.NothingToExit,
			ExitTrigger.ConfirmedFlat,
		]);
	});

	it("refuses to exit a halted symbol", async () => {
		const { h, rig } = setup();
		await holdPosition(h, 1, "100");
		await h.ledger.setHalted(ACCT, MYM, "kill_switch_timeout");

		const result = await rig.requestExit();

		expect(result.ok).toBe(false);
		expect(!result.ok && result.error.code).toBe("CONFLICTING_INTENT");
		expect(h.broker.submitted).toHaveLength(0);
	});

	it("reverts and flags the position when the broker cannot be read", async () => {
		const { h, rig } = setup();
		await holdPosition(h, 1, "100");
		// Three attempts for the working-order list, three for the position.
		h.broker.failQueries(6);

		const result = await rig.requestExit();

		expect(!result.ok && result.error.code).toBe("NETWORK_ERROR");
		idle(h);
		expect(h.ledger.currentPosition(ACCT, MYM).attention?.code).toBe("exit_unsized");
		expect(h.broker.submitted).toHaveLength(0);
	});

	it("stands down when the kill switch takes over mid-exit", async () => {
		const { h, rig } = setup();
		await holdPosition(h, 2, "100");
		vi.spyOn(h.desk, "cancelAll").mockImplementationOnce(async () => {
			rig.epochs.bump(rig.key);
			await h.ledger.transitionExit(ACCT, MYM, ExitTrigger.KillSwitch, "test");
			return { cancelled: [], failed: [], queryError: null };
		});

		const result = await rig.requestExit();

		expect(result.ok && result.value.kind).toBe("stood_down");
		expect(h.broker.submitted).toHaveLength(0);
		idle(h);
	});

	describe("rejected exit", () => {
		it("reverts to IDLE and asks for an operator by default", async () => {
			const { h, rig } = setup();
			await holdPosition(h, 2, "100");
			h.broker.rejectNext("Insufficient margin");

			const result = await rig.requestExit();

			if (!result.ok) throw result.error;
			expect(result.value).toMatchObject({ kind: "rejected", resolution: "needs_attention" });
			const position = h.ledger.currentPosition(ACCT, MYM);
			expect(position.exitState).toBe(ExitState.Idle);
			expect(position.quantity).toBe(2);
			expect(position.attention?.code).toBe("exit_rejected");
			expect(position.lastError).toBe("Insufficient margin");
			expect(h.raised).toMatchObject([
				{
					type: "exit_rejected",
					severity: "critical",
					reason: "Insufficient margin",
					brokerQuantity: 2,
					policy: "require_operator",
				},
			]);
			expect(h.broker.submitted).toHaveLength(1);
		});

		it("books the broker's flat position instead of paging when nothing is left", async () => {
			const { h, rig } = setup();
			await holdPosition(h, 2, "100");
			h.broker.rejectNext("Position already closed");
			vi.spyOn(h.desk, "submit").mockImplementationOnce(async (request) => {
				h.broker.setPosition(ACCT, MYM, 0);
				return h.desk.submit(request);
			});

			const result = await rig.requestExit();

			expect(result.ok && result.value.kind === "rejected" && result.value.resolution).toBe(
				"flat",
			);
			const position = h.ledger.currentPosition(ACCT, MYM);
			expect(position.quantity).toBe(0);
			expect(position.attention).toBeNull();
			expect(h.raised.map((a) => [a.type, a.severity])).toEqual([
				["drift_corrected", "warning"],
				["exit_rejected", "warning"],
			]);
		});

		it("retries once under retry_once", async () => {
			const { h, rig } = setup(ExitRejectionPolicy.RetryOnce);
			await holdPosition(h, 2, "100");
			h.broker.rejectNext("Busy");

			const result = await rig.requestExit();

			if (!result.ok) throw result.error;
			expect(result.value).toMatchObject({ kind: "rejected", resolution: "retried" });
			expect(result.value.position.exitState).toBe(ExitState.WorkingExit);
			expect(h.broker.submitted).toHaveLength(2);
			expect(h.raised.map((a) => a.severity)).toEqual(["warning"]);
			await vi.waitFor(() => idle(h));
			expect(h.ledger.currentPosition(ACCT, MYM).quantity).toBe(0);
		});

		it("falls back to the operator when the retry is rejected too", async () => {
			const { h, rig } = setup(ExitRejectionPolicy.RetryOnce);
			await holdPosition(h, 2, "100");
			h.broker.rejectNext("Busy");
			h.broker.rejectNext("Still busy");

			const result = await rig.requestExit();

			expect(result.ok && result.value.kind === "rejected" && result.value.resolution).toBe(
				"needs_attention",
			);
			expect(h.broker.submitted).toHaveLength(2);
			expect(h.raised.map((a) => a.severity)).toEqual(["warning", "critical"]);
			expect(h.ledger.currentPosition(ACCT, MYM).attention?.code).toBe("exit_rejected");
		});

		it("hands the position to the kill switch under escalate_kill_switch", async () => {
			const { h, rig } = setup(ExitRejectionPolicy.EscalateKillSwitch);
			await holdPosition(h, 2, "100");
			h.broker.rejectNext("Busy");

			const result = await rig.requestExit();

			expect(result.ok && result.value.kind === "rejected" && result.value.resolution).toBe(
				"escalated",
			);
			expect(h.broker.submitted.map((i) => [i.side, i.quantity, i.purpose])).toEqual([
				[OrderSide.Sell, 2, "exit"],
				[OrderSide.Sell, 2, "exit"],
			]);
			await vi.waitFor(() => {
				const position = h.ledger.currentPosition(ACCT, MYM);
				expect(position.flattening).toBe(false);
				expect(position.quantity).toBe(0);
			});
			idle(h);
			expect(h.raised.map((a) => a.type)).toEqual(["exit_rejected", "drift_corrected"]);
		});

		it("resolves a rejection that arrives after the exit was accepted", async () => {
			const { h, rig } = setup();
			await holdPosition(h, 2, "100");
			h.broker.rejectNextAsync("Price band");

			const submitted = await rig.requestExit();
			expect(submitted.ok && submitted.value.kind).toBe("submitted");

			const stale = await rig.loop.run(rig.key, () =>
				rig.machine.onExitRejected(ACCT, MYM, orderId("paper-99"), "unrelated"),
			);
			expect(stale.ok && stale.value.kind).toBe("in_flight");

			const result = await rig.loop.run(rig.key, () =>
				rig.machine.onExitRejected(ACCT, MYM, orderId("paper-1"), "Price band"),
			);

			expect(result.ok && result.value.kind === "rejected" && result.value.resolution).toBe(
				"needs_attention",
			);
			idle(h);
			expect(rig.confirmation.isWatching(ACCT, MYM)).toBe(false);
		});
	});
});

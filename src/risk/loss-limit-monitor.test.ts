import { describe, expect, it, vi } from "vitest";
import { ACCT, MYM, createHarness, makeFill } from "../__tests__/harness.js";
import type { Harness } from "../__tests__/harness.js";
import type { Flattener, KillSwitchReport } from "../exit/kill-switch.js";
import { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import { OrderSide } from "../shared/side.js";
import { Duration, FakeClock } from "../shared/time.js";
import { LossLimitMonitor } from "./loss-limit-monitor.js";

function fakeFlattener() {
	const activate = vi.fn(
		async (
			accountId: AccountId,
			symbol: SymbolId,
			reason: string,
		): Promise<Result<KillSwitchReport, TradingError>> =>
			ok({ accountId, symbol, reason, elapsedMs: 1, cancelled: [], flattenOrders: [] }),
	);
	const flattener: Flattener = { activate };
	return { flattener, activate };
}

function setup(maxDailyLoss: number | null) {
	const h = createHarness();
	const clock = new FakeClock(Date.UTC(2025, 2, 7, 15));
	const { flattener, activate } = fakeFlattener();
	const monitor = new LossLimitMonitor({
		ledger: h.ledger,
		flattener,
		alerts: h.alerts,
		maxDailyLoss,
		clock,
	});
	return { h, clock, monitor, activate };
}

async function longTwoAt100(h: Harness): Promise<void> {
	await h.ledger.recordFill(makeFill(OrderSide.Buy, 2, "100"));
}

describe("LossLimitMonitor", () => {
	it("does nothing when no limit is configured", async () => {
		const { h, monitor, activate } = setup(null);
		await longTwoAt100(h);
		h.ledger.mark(ACCT, MYM, Decimal.from("1"));

		expect(await monitor.check(ACCT)).toEqual({ kind: "disabled" });
		expect(activate).not.toHaveBeenCalled();
	});

	it("counts open PnL against the limit", async () => {
		const { h, monitor, activate } = setup(10);
		await longTwoAt100(h);
		h.ledger.mark(ACCT, MYM, Decimal.from("95"));

		const check = await monitor.check(ACCT);

		expect(check.kind).toBe("within");
		expect(check.kind === "within" && check.total.toString()).toBe("-5");
		expect(activate).not.toHaveBeenCalled();
	});

	it("flattens every open position once the limit is breached, once per day", async () => {
		const { h, clock, monitor, activate } = setup(10);
		await longTwoAt100(h);
		h.ledger.mark(ACCT, MYM, Decimal.from("80"));

		const check = await monitor.check(ACCT);

		expect(check.kind === "tripped" && check.flattened).toEqual([MYM]);
		expect(activate).toHaveBeenCalledWith(ACCT, MYM, "daily_loss_limit");
		expect(h.raised).toMatchObject([
			{
				type: "daily_loss_exceeded",
				severity: "critical",
				totalPnl: "-20",
				limit: 10,
				flattened: [MYM],
			},
		]);
		expect(monitor.isLocked(ACCT)).toBe(true);
		expect(await monitor.check(ACCT)).toEqual({ kind: "locked" });
		expect(activate).toHaveBeenCalledTimes(1);

		clock.advance(Duration.hours(12));
		expect(monitor.isLocked(ACCT)).toBe(false);
	});

	it("keeps the realized loss of positions closed earlier in the day", async () => {
		const { h, monitor, activate } = setup(5);
		await longTwoAt100(h);
		await h.ledger.recordFill(makeFill(OrderSide.Sell, 2, "90", "exit"));

		expect(monitor.dailyPnl(ACCT).toString()).toBe("-10");
		const check = await monitor.check(ACCT);

		expect(check.kind === "tripped" && check.flattened).toEqual([]);
		expect(activate).not.toHaveBeenCalled();
	});
});

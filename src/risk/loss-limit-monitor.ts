import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import type { Flattener } from "../exit/kill-switch.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import type { Fill, Position } from "../ledger/types.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import { type Clock, SystemClock, utcDayKey } from "../shared/time.js";

export interface LossLimitMonitorConfig {
	readonly ledger: PositionLedger;
	readonly flattener: Flattener;
	readonly alerts: AlertDispatcher;
	/** Positive loss in account currency; null disables the monitor */
	readonly maxDailyLoss: number | null;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export type LossCheck =
	| { readonly kind: "disabled" }
	| { readonly kind: "within"; readonly total: Decimal }
	| { readonly kind: "tripped"; readonly total: Decimal; readonly flattened: readonly SymbolId[] }
	/** Already tripped today; positions were flattened then */
	| { readonly kind: "locked" };

/**
 * Per-account daily loss limit.
 *
 * The day's PnL is what positions closed today realized plus the realized
 * and open PnL of every position still open. Breaching `-maxDailyLoss`
 * flattens every open position of the account once, and new entries stay
 * refused until the UTC day rolls over.
 *
 * @example
 * ```ts
 * const monitor = new LossLimitMonitor({ ledger, flattener, alerts, maxDailyLoss: 500 });
 * await monitor.check(accountId);
 * monitor.isLocked(accountId); // true once breached today
 * ```
 */
export class LossLimitMonitor {
	private readonly ledger: PositionLedger;
	private readonly flattener: Flattener;
	private readonly alerts: AlertDispatcher;
	private readonly limit: Decimal | null;
	private readonly maxDailyLoss: number | null;
	private readonly clock: Clock;
	private readonly logger: Logger;
	/** `${accountId}|${day}` → realized PnL of lifecycles closed that day */
	private readonly booked = new Map<string, Decimal>();
	private readonly locked = new Set<string>();
	private readonly unsubscribe: () => void;

	constructor(config: LossLimitMonitorConfig) {
		this.ledger = config.ledger;
		this.flattener = config.flattener;
		this.alerts = config.alerts;
		this.maxDailyLoss = config.maxDailyLoss;
		this.limit = config.maxDailyLoss === null ? null : Decimal.from(config.maxDailyLoss).neg();
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "loss-limit" });
		this.unsubscribe = this.ledger.listen("positionChanged", (p, fill) => this.onChange(p, fill));
	}

	/** PnL of the account for the current UTC day. */
	dailyPnl(accountId: AccountId): Decimal {
		let total = this.booked.get(this.dayKey(accountId)) ?? Decimal.zero();
		for (const position of this.ledger.positions()) {
			if (position.accountId !== accountId || position.quantity === 0) continue;
			total = total.add(position.realizedPnl).add(position.unrealizedPnl);
		}
		return total;
	}

	isLocked(accountId: AccountId): boolean {
		return this.locked.has(this.dayKey(accountId));
	}

	/** Flattens the account when its daily PnL has breached the limit. */
	async check(accountId: AccountId): Promise<LossCheck> {
		if (this.limit === null || this.maxDailyLoss === null) return { kind: "disabled" };
		const key = this.dayKey(accountId);
		if (this.locked.has(key)) return { kind: "locked" };

		const total = this.dailyPnl(accountId);
		if (total.gte(this.limit)) return { kind: "within", total };

		this.locked.add(key);
		const open = this.ledger
			.positions()
			.filter((p) => p.accountId === accountId && p.quantity !== 0);
		const symbols = open.map((p) => p.symbol);
		this.logger.error(
			{ accountId, total: total.toString(), limit: this.maxDailyLoss, symbols },
			"daily loss limit breached; flattening the account",
		);

		const results = await Promise.all(
			symbols.map((symbol) => this.flattener.activate(accountId, symbol, "daily_loss_limit")),
		);
		const flattened: SymbolId[] = [];
		results.forEach((result, i) => {
			const symbol = symbols[i];
			if (symbol === undefined) return;
			if (result.ok) {
				flattened.push(symbol);
			} else {
				this.logger.error(
					{ accountId, symbol, error: result.error.message },
					"loss-limit flatten failed",
				);
			}
		});

		this.alerts.emit({
			type: "daily_loss_exceeded",
			timestamp: this.clock.now(),
			severity: AlertSeverity.Critical,
			accountId,
			totalPnl: total.toString(),
			limit: this.maxDailyLoss,
			flattened,
		});
		return { kind: "tripped", total, flattened };
	}

	dispose(): void {
		this.unsubscribe();
	}

	private onChange(position: Position, fill: Fill | null): void {
		// A fill that closes a lifecycle moves its realized PnL into the day's book.
		if (fill === null || position.quantity !== 0) return;
		const key = this.dayKey(position.accountId);
		const prior = this.booked.get(key) ?? Decimal.zero();
		this.booked.set(key, prior.add(position.realizedPnl));
	}

	private dayKey(accountId: AccountId): string {
		return `${accountId}|${utcDayKey(this.clock.now())}`;
	}
}

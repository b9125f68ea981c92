/**
 * Drift Reconciler — keeps the ledger's quantity in line with the broker's.
 *
 * Accounting only: it never places an order. On a mismatch it books the
 * broker fills the log is missing, then closes any remaining gap with an
 * adjustment fill. Every mismatch leaves a drift record.
 */

import type { BrokerGateway } from "../broker/broker-gateway.js";
import type { OrderRegistry } from "../broker/order-registry.js";
import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import { ExitState } from "../exit/exit-state.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import type { LedgerStore } from "../ledger/store.js";
import { DriftResolution, FillRole, fillFromBroker, fillRoleFor } from "../ledger/types.js";
import type { DriftRecord, Position } from "../ledger/types.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import type { PriceFeed } from "../market/price-feed.js";
import type { Decimal } from "../shared/decimal.js";
import { DriftDetectedError, SystemError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { fillId } from "../shared/identifiers.js";
import type { AccountId, OrderId, SymbolId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";

export interface ReconcileOptions {
	/** Run even while an exit or flatten owns the position */
	readonly force?: boolean;
}

export type ReconcileOutcome =
	| { readonly kind: "skipped"; readonly reason: "exit_in_flight" | "flattening" | "halted" }
	| { readonly kind: "in_sync"; readonly quantity: number }
	| { readonly kind: "corrected"; readonly record: DriftRecord }
	| { readonly kind: "failed"; readonly error: TradingError };

/** What the exit path and kill switch need from the reconciler. */
export interface PositionCorrector {
	reconcile(
		accountId: AccountId,
		symbol: SymbolId,
		options?: ReconcileOptions,
	): Promise<ReconcileOutcome>;
}

export interface DriftReconcilerConfig {
	readonly ledger: PositionLedger;
	readonly gateway: BrokerGateway;
	readonly store: LedgerStore;
	readonly prices: PriceFeed;
	readonly alerts: AlertDispatcher;
	/** Tags booked broker fills with the role of the order behind them */
	readonly registry?: OrderRegistry;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class DriftReconciler implements PositionCorrector {
	private readonly ledger: PositionLedger;
	private readonly gateway: BrokerGateway;
	private readonly store: LedgerStore;
	private readonly prices: PriceFeed;
	private readonly alerts: AlertDispatcher;
	private readonly registry: OrderRegistry | null;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private seq = 0;

	constructor(config: DriftReconcilerConfig) {
		this.ledger = config.ledger;
		this.gateway = config.gateway;
		this.store = config.store;
		this.prices = config.prices;
		this.alerts = config.alerts;
		this.registry = config.registry ?? null;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "reconciler" });
	}

	/**
	 * Compares the ledger with the broker for one position and corrects the
	 * ledger on a mismatch. Must run inside the position's loop slot.
	 */
	async reconcile(
		accountId: AccountId,
		symbol: SymbolId,
		options: ReconcileOptions = {},
	): Promise<ReconcileOutcome> {
		const before = this.ledger.currentPosition(accountId, symbol);
		if (options.force !== true) {
			if (before.halted !== null) return { kind: "skipped", reason: "halted" };
			if (before.flattening) return { kind: "skipped", reason: "flattening" };
			if (before.exitState !== ExitState.Idle) {
				return { kind: "skipped", reason: "exit_in_flight" };
			}
		}

		const broker = await this.gateway.queryPosition(accountId, symbol);
		if (!broker.ok) {
			this.logger.warn(
				{ accountId, symbol, error: broker.error.message },
				"broker position unavailable",
			);
			return { kind: "failed", error: broker.error };
		}

		const brokerQuantity = broker.value.quantity;
		const virtualQuantity = this.ledger.currentPosition(accountId, symbol).quantity;
		if (brokerQuantity === virtualQuantity) {
			return { kind: "in_sync", quantity: brokerQuantity };
		}

		const drift = new DriftDetectedError(
			`Ledger holds ${virtualQuantity}, broker holds ${brokerQuantity}`,
			virtualQuantity,
			brokerQuantity,
			{ accountId, symbol },
		);
		this.logger.warn({ accountId, symbol, error: drift.toJSON() }, "position drift detected");

		const pending: DriftRecord = {
			id: this.nextId(accountId, symbol),
			accountId,
			symbol,
			virtualQuantity,
			brokerQuantity,
			detectedAt: this.clock.now(),
			resolution: DriftResolution.Pending,
			resolvedAt: null,
		};
		await this.saveRecord(pending);

		await this.bookMissingFills(accountId, symbol);
		let resolution: DriftResolution = DriftResolution.CorrectedFromFills;

		const afterFills = this.ledger.currentPosition(accountId, symbol);
		if (afterFills.quantity !== brokerQuantity) {
			const price = this.adjustmentPrice(afterFills, broker.value.averagePrice ?? null);
			if (price === null) {
				const error = new SystemError("No price known to book the drift adjustment", {
					accountId,
					symbol,
				});
				this.logger.error({ accountId, symbol, driftId: pending.id }, error.message);
				return { kind: "failed", error };
			}
			const delta = brokerQuantity - afterFills.quantity;
			const side = delta > 0 ? OrderSide.Buy : OrderSide.Sell;
			const booked = await this.ledger.recordFill(
				{
					fillId: fillId(`adj-${pending.id}`),
					orderId: this.workingOrderFor(accountId, symbol, side, Math.abs(delta)),
					accountId,
					symbol,
					side,
					quantity: Math.abs(delta),
					price,
					timestampMs: this.clock.now(),
					role: FillRole.Adjustment,
				},
				{ bypassGrowthGuard: true },
			);
			if (!booked.ok) {
				this.logger.error(
					{ accountId, symbol, driftId: pending.id, error: booked.error.message },
					"drift adjustment failed",
				);
				return { kind: "failed", error: booked.error };
			}
			resolution = DriftResolution.CorrectedByAdjustment;
		}

		const record: DriftRecord = { ...pending, resolution, resolvedAt: this.clock.now() };
		await this.saveRecord(record);
		this.logger.info(
			{ accountId, symbol, driftId: record.id, resolution, quantity: brokerQuantity },
			"drift corrected",
		);
		this.alerts.emit({
			type: "drift_corrected",
			timestamp: record.resolvedAt ?? record.detectedAt,
			severity: AlertSeverity.Warning,
			accountId,
			symbol,
			virtualQuantity,
			brokerQuantity,
			resolution,
		});
		return { kind: "corrected", record };
	}

	async driftRecords(accountId: AccountId, symbol: SymbolId): Promise<readonly DriftRecord[]> {
		const loaded = await this.store.loadDrifts(accountId, symbol);
		if (!loaded.ok) {
			this.logger.warn(
				{ accountId, symbol, error: loaded.error.message },
				"drift records unavailable",
			);
			return [];
		}
		return loaded.value;
	}

	// ── Internals ──────────────────────────────────────────────────

	private async bookMissingFills(accountId: AccountId, symbol: SymbolId): Promise<void> {
		const history = await this.gateway.queryFills(accountId, symbol);
		if (!history.ok) {
			this.logger.warn(
				{ accountId, symbol, error: history.error.message },
				"broker fill history unavailable",
			);
			return;
		}
		if (history.value === null) return;

		const missing = history.value
			.filter((fill) => !this.ledger.hasFill(accountId, symbol, fill.fillId))
			.sort((a, b) => a.timestampMs - b.timestampMs);
		for (const fill of missing) {
			const purpose = this.registry?.get(fill.orderId)?.purpose ?? null;
			const booked = await this.ledger.recordFill(fillFromBroker(fill, fillRoleFor(purpose)), {
				bypassGrowthGuard: true,
			});
			if (!booked.ok) {
				this.logger.warn(
					{ accountId, symbol, fillId: fill.fillId, error: booked.error.message },
					"broker fill not booked",
				);
			}
		}
	}

	/** A working order that would close the gap; its late fill then matches the adjustment. */
	private workingOrderFor(
		accountId: AccountId,
		symbol: SymbolId,
		side: OrderSide,
		quantity: number,
	): OrderId | null {
		const orders = this.registry?.working(accountId, symbol) ?? [];
		return orders.find((o) => o.side === side && o.quantity === quantity)?.orderId ?? null;
	}

	private adjustmentPrice(position: Position, brokerAverage: Decimal | null): Decimal | null {
		return (
			this.prices.lastPrice(position.symbol) ??
			position.lastPrice ??
			brokerAverage ??
			position.averageEntryPrice
		);
	}

	private async saveRecord(record: DriftRecord): Promise<void> {
		const saved = await this.store.saveDrift(record);
		if (!saved.ok) {
			this.logger.error(
				{ driftId: record.id, error: saved.error.message },
				"drift record write failed",
			);
		}
	}

	private nextId(accountId: AccountId, symbol: SymbolId): string {
		this.seq++;
		return `${accountId}:${symbol}:${this.clock.now()}:${this.seq}`;
	}
}

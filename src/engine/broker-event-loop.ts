/**
 * Broker Event Loop — routes broker push events into the position slots.
 *
 * Fills, snapshots and rejections for one (account, symbol) are handled
 * strictly in arrival order, one at a time, inside that position's slot.
 * Order status updates only touch the registry and are applied at once.
 */

import type { OrderRegistry } from "../broker/order-registry.js";
import { OrderPurpose, OrderStatus } from "../broker/types.js";
import type { BrokerEvent, BrokerEventHandler, BrokerFill } from "../broker/types.js";
import type { DcaEngine } from "../dca/dca-engine.js";
import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import type { ExitMachine } from "../exit/exit-machine.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import { FillRole, fillFromBroker, fillRoleFor } from "../ledger/types.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import type { PositionCorrector } from "../reconcile/drift-reconciler.js";
import { isConflictingIntent } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, OrderId, SymbolId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { SymbolLoop } from "./symbol-loop.js";

/** Registers a handler with an event source and returns its unsubscribe. */
export type BrokerEventSource = (handler: BrokerEventHandler) => () => void;

export interface BrokerEventLoopConfig {
	readonly loop: SymbolLoop;
	readonly ledger: PositionLedger;
	readonly registry: OrderRegistry;
	readonly exits: ExitMachine;
	readonly dca: DcaEngine;
	readonly corrector: PositionCorrector;
	readonly alerts: AlertDispatcher;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class BrokerEventLoop {
	private readonly loop: SymbolLoop;
	private readonly ledger: PositionLedger;
	private readonly registry: OrderRegistry;
	private readonly exits: ExitMachine;
	private readonly dca: DcaEngine;
	private readonly corrector: PositionCorrector;
	private readonly alerts: AlertDispatcher;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly detach: Array<() => void> = [];

	constructor(config: BrokerEventLoopConfig) {
		this.loop = config.loop;
		this.ledger = config.ledger;
		this.registry = config.registry;
		this.exits = config.exits;
		this.dca = config.dca;
		this.corrector = config.corrector;
		this.alerts = config.alerts;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "event-loop" });
	}

	attach(source: BrokerEventSource): void {
		this.detach.push(source((event) => this.dispatch(event)));
	}

	detachAll(): void {
		for (const off of this.detach.splice(0)) off();
	}

	dispatch(event: BrokerEvent): void {
		switch (event.type) {
			case "fill": {
				const { accountId, symbol } = event.fill;
				this.loop.enqueue(positionKey(accountId, symbol), "fill", () => this.onFill(event.fill));
				return;
			}
			case "position_snapshot": {
				const { accountId, symbol, quantity } = event;
				this.loop.enqueue(positionKey(accountId, symbol), "snapshot", () =>
					this.onSnapshot(accountId, symbol, quantity),
				);
				return;
			}
			case "order_rejected": {
				const tracked = this.registry.get(event.orderId);
				if (tracked === null) {
					this.logger.warn(
						{ accountId: event.accountId, orderId: event.orderId, reason: event.reason },
						"rejection for an order this engine did not place",
					);
					return;
				}
				this.registry.updateStatus(event.orderId, OrderStatus.Rejected);
				const { accountId, symbol, purpose } = tracked;
				this.loop.enqueue(positionKey(accountId, symbol), "order-rejected", () =>
					this.onOrderRejected(accountId, symbol, event.orderId, purpose, event.reason),
				);
				return;
			}
			case "order_status":
				this.registry.updateStatus(event.orderId, event.status);
				if (event.status !== OrderStatus.Working) this.dca.forget(event.orderId);
				return;
		}
	}

	/** Books one broker fill and lets the exit and DCA logic react to it. */
	async onFill(fill: BrokerFill): Promise<void> {
		const { accountId, symbol } = fill;
		if (this.ledger.hasFill(accountId, symbol, fill.fillId)) {
			this.logger.debug({ accountId, symbol, fillId: fill.fillId }, "fill already booked");
			return;
		}
		const role = fillRoleFor(this.registry.get(fill.orderId)?.purpose ?? null);
		const booked = await this.ledger.recordFill(fillFromBroker(fill, role));
		if (!booked.ok) {
			if (isConflictingIntent(booked.error)) {
				this.alerts.emit({
					type: "fill_refused",
					timestamp: this.clock.now(),
					severity: AlertSeverity.Warning,
					accountId,
					symbol,
					fillId: fill.fillId,
					reason: booked.error.message,
				});
				await this.reconcileRefused(accountId, symbol);
				return;
			}
			this.logger.error(
				{ accountId, symbol, fillId: fill.fillId, error: booked.error.message },
				"fill not booked",
			);
			return;
		}
		if (this.ledger.coveredByAdjustment(accountId, symbol, fill.fillId)) return;

		if (role === FillRole.Exit) {
			await this.exits.onExitFill(accountId, symbol);
			return;
		}
		const tp = await this.dca.replaceTakeProfit(accountId, symbol);
		if (tp.kind === "failed") {
			this.logger.warn({ accountId, symbol, error: tp.error.message }, "take-profit not replaced");
		}
	}

	/**
	 * The broker holds a refused fill regardless. Outside an exit the
	 * reconciler books what the broker reports now; mid-exit it skips, and
	 * the exit's own reconcile picks it up.
	 */
	private async reconcileRefused(accountId: AccountId, symbol: SymbolId): Promise<void> {
		const outcome = await this.corrector.reconcile(accountId, symbol);
		if (outcome.kind === "failed") {
			this.logger.warn(
				{ accountId, symbol, error: outcome.error.message },
				"reconcile after a refused fill failed",
			);
		}
	}

	/** A pushed broker quantity that disagrees with the ledger is drift. */
	async onSnapshot(accountId: AccountId, symbol: SymbolId, quantity: number): Promise<void> {
		if (this.ledger.currentPosition(accountId, symbol).quantity === quantity) return;
		const outcome = await this.corrector.reconcile(accountId, symbol);
		if (outcome.kind === "failed") {
			this.logger.warn(
				{ accountId, symbol, error: outcome.error.message },
				"snapshot reconcile failed",
			);
		}
	}

	async onOrderRejected(
		accountId: AccountId,
		symbol: SymbolId,
		orderId: OrderId,
		purpose: OrderPurpose,
		reason: string,
	): Promise<void> {
		switch (purpose) {
			case OrderPurpose.Exit: {
				const handled = await this.exits.onExitRejected(accountId, symbol, orderId, reason);
				if (!handled.ok) {
					this.logger.error(
						{ accountId, symbol, orderId, error: handled.error.message },
						"exit rejection not resolved",
					);
				}
				return;
			}
			case OrderPurpose.DcaEntry:
				await this.dca.onOrderRejected(accountId, symbol, orderId, reason);
				return;
			default:
				this.logger.warn({ accountId, symbol, orderId, purpose, reason }, "order rejected");
				await this.ledger.setLastError(accountId, symbol, reason);
		}
	}
}

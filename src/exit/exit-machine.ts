/**
 * Exit State Machine — drives one position from a request to confirmed flat.
 *
 *   IDLE → PREPARE_EXIT → WORKING_EXIT → CONFIRM_FLAT → IDLE
 *
 * PREPARE cancels every resting order and sizes the exit from a fresh broker
 * query, never from the ledger. Exits are market orders sent once; a
 * rejection is resolved by the configured policy after re-reading the
 * broker. Every method runs inside the position's serialized slot.
 */

import type { BrokerGateway } from "../broker/broker-gateway.js";
import type { OrderDesk } from "../broker/order-desk.js";
import { OrderPurpose } from "../broker/types.js";
import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import type { Position } from "../ledger/types.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import type { PositionCorrector } from "../reconcile/drift-reconciler.js";
import { ExitRejectionPolicy } from "../shared/config.js";
import { ConflictingIntentError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, OrderId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { closingOrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { ConfirmationLoop } from "./confirmation-loop.js";
import type { ExitEpochs } from "./exit-epoch.js";
import { ExitState, ExitTrigger } from "./exit-state.js";
import type { Flattener } from "./kill-switch.js";

export interface ExitMachineConfig {
	readonly ledger: PositionLedger;
	readonly desk: OrderDesk;
	readonly gateway: BrokerGateway;
	readonly corrector: PositionCorrector;
	readonly flattener: Flattener;
	readonly confirmation: ConfirmationLoop;
	readonly alerts: AlertDispatcher;
	readonly epochs: ExitEpochs;
	readonly policy: ExitRejectionPolicy;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

/** How a rejected exit was resolved. */
export type RejectionResolution =
	/** The broker was flat after all */
	| "flat"
	/** A second market exit is working */
	| "retried"
	/** Back to IDLE with attention set; automation paused */
	| "needs_attention"
	/** Handed to the kill switch, which flattened the position */
	| "escalated";

export type ExitOutcome =
	/** Another exit or a flatten already owns the position; nothing changed */
	| { readonly kind: "in_flight"; readonly position: Position }
	| {
			readonly kind: "submitted";
			readonly orderId: OrderId;
			readonly quantity: number;
			readonly position: Position;
	  }
	| { readonly kind: "nothing_to_exit"; readonly position: Position }
	/** The kill switch or an operator reset took over mid-exit */
	| { readonly kind: "stood_down"; readonly position: Position }
	| {
			readonly kind: "rejected";
			readonly resolution: RejectionResolution;
			readonly position: Position;
	  };

interface ActiveExit {
	readonly orderId: OrderId;
	readonly attempt: number;
}

export class ExitMachine {
	private readonly ledger: PositionLedger;
	private readonly desk: OrderDesk;
	private readonly gateway: BrokerGateway;
	private readonly corrector: PositionCorrector;
	private readonly flattener: Flattener;
	private readonly confirmation: ConfirmationLoop;
	private readonly alerts: AlertDispatcher;
	private readonly epochs: ExitEpochs;
	private readonly policy: ExitRejectionPolicy;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly active = new Map<PositionKey, ActiveExit>();

	constructor(config: ExitMachineConfig) {
		this.ledger = config.ledger;
		this.desk = config.desk;
		this.gateway = config.gateway;
		this.corrector = config.corrector;
		this.flattener = config.flattener;
		this.confirmation = config.confirmation;
		this.alerts = config.alerts;
		this.epochs = config.epochs;
		this.policy = config.policy;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "exit" });
	}

	/**
	 * Starts an exit. A request while one is already in flight (or the kill
	 * switch is flattening) changes nothing and returns the current position.
	 */
	async requestExit(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
	): Promise<Result<ExitOutcome, TradingError>> {
		const key = positionKey(accountId, symbol);
		const position = this.ledger.currentPosition(accountId, symbol);
		if (position.halted !== null) {
			return err(
				new ConflictingIntentError(
					"Symbol is halted",
					{ accountId, symbol, halted: position.halted.reason },
					"Check the broker, then reset the symbol",
				),
			);
		}
		if (position.exitState !== ExitState.Idle || position.flattening) {
			this.logger.info(
				{ accountId, symbol, reason, exitState: position.exitState },
				"exit already in flight",
			);
			return ok({ kind: "in_flight", position });
		}

		const started = await this.ledger.transitionExit(
			accountId,
			symbol,
			ExitTrigger.RequestExit,
			reason,
		);
		if (!started.ok) return started;
		const epoch = this.epochs.current(key);
		this.logger.info({ accountId, symbol, reason, quantity: position.quantity }, "exit requested");

		const cancel = await this.desk.cancelAll(accountId, symbol);
		if (cancel.failed.length > 0) {
			// A resting order that survives and fills leaves the broker not flat;
			// confirmation then times out into the kill switch.
			const ids = cancel.failed.map((f) => f.orderId);
			this.logger.warn({ accountId, symbol, orderIds: ids }, "resting orders not cancelled");
			await this.ledger.setLastError(accountId, symbol, `Cancel failed for ${ids.join(", ")}`);
		}
		if (!this.epochs.isCurrent(key, epoch)) return this.stoodDown(accountId, symbol);

		const sized = await this.gateway.queryPosition(accountId, symbol);
		if (!this.epochs.isCurrent(key, epoch)) return this.stoodDown(accountId, symbol);
		if (!sized.ok) {
			this.logger.error(
				{ accountId, symbol, error: sized.error.message },
				"exit not sized: broker position unavailable",
			);
			await this.ledger.transitionExit(accountId, symbol, ExitTrigger.ExitRejected, "exit_unsized");
			await this.ledger.setAttention(accountId, symbol, {
				code: "exit_unsized",
				message: `Broker position unavailable: ${sized.error.message}`,
			});
			return err(sized.error);
		}

		if (sized.value.quantity === 0) {
			const moved = await this.ledger.transitionExit(accountId, symbol, ExitTrigger.NothingToExit);
			if (!moved.ok) return moved;
			this.logger.info({ accountId, symbol }, "broker already flat; confirming");
			this.confirmation.start(accountId, symbol, epoch);
			return ok({ kind: "nothing_to_exit", position: moved.value });
		}
		return this.placeExit(accountId, symbol, sized.value.quantity, epoch, 1);
	}

	/** After an exit fill is booked: the fill that brings the ledger to zero moves on. */
	async onExitFill(accountId: AccountId, symbol: SymbolId): Promise<void> {
		const position = this.ledger.currentPosition(accountId, symbol);
		if (position.exitState !== ExitState.WorkingExit || position.quantity !== 0) return;
		const moved = await this.ledger.transitionExit(accountId, symbol, ExitTrigger.ExitFilled);
		if (!moved.ok) {
			this.logger.warn({ accountId, symbol, error: moved.error.message }, "exit fill not applied");
		}
		this.active.delete(positionKey(accountId, symbol));
	}

	/** A working exit order was rejected after it was accepted. */
	async onExitRejected(
		accountId: AccountId,
		symbol: SymbolId,
		orderId: OrderId,
		reason: string,
	): Promise<Result<ExitOutcome, TradingError>> {
		const key = positionKey(accountId, symbol);
		const active = this.active.get(key);
		const position = this.ledger.currentPosition(accountId, symbol);
		if (active === undefined || active.orderId !== orderId) {
			this.logger.debug({ accountId, symbol, orderId }, "rejection for an exit no longer active");
			return ok({ kind: "in_flight", position });
		}
		if (position.exitState !== ExitState.WorkingExit) {
			return ok({ kind: "in_flight", position });
		}
		this.active.delete(key);
		const epoch = this.epochs.current(key);
		return this.resolveRejection(accountId, symbol, reason, epoch, active.attempt);
	}

	/** Drops in-flight exit bookkeeping; the caller resets the ledger state. */
	reset(accountId: AccountId, symbol: SymbolId): void {
		const key = positionKey(accountId, symbol);
		this.epochs.bump(key);
		this.confirmation.stop(accountId, symbol);
		this.active.delete(key);
	}

	// ── Internals ──────────────────────────────────────────────────

	private async placeExit(
		accountId: AccountId,
		symbol: SymbolId,
		brokerQuantity: number,
		epoch: number,
		attempt: number,
	): Promise<Result<ExitOutcome, TradingError>> {
		const key = positionKey(accountId, symbol);
		const placed = await this.desk.submit({
			accountId,
			symbol,
			side: closingOrderSide(brokerQuantity),
			quantity: Math.abs(brokerQuantity),
			purpose: OrderPurpose.Exit,
		});
		if (!this.epochs.isCurrent(key, epoch)) return this.stoodDown(accountId, symbol);
		if (!placed.ok) {
			return this.resolveRejection(accountId, symbol, placed.error.message, epoch, attempt);
		}

		const orderId = placed.value.orderId;
		this.active.set(key, { orderId, attempt });
		if (this.ledger.currentPosition(accountId, symbol).exitState === ExitState.PrepareExit) {
			const moved = await this.ledger.transitionExit(accountId, symbol, ExitTrigger.ExitSubmitted);
			if (!moved.ok) return moved;
		}
		this.logger.info(
			{ accountId, symbol, orderId, quantity: Math.abs(brokerQuantity), attempt },
			"market exit submitted",
		);
		this.confirmation.start(accountId, symbol, epoch);
		return ok({
			kind: "submitted",
			orderId,
			quantity: Math.abs(brokerQuantity),
			position: this.ledger.currentPosition(accountId, symbol),
		});
	}

	private async resolveRejection(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
		epoch: number,
		attempt: number,
	): Promise<Result<ExitOutcome, TradingError>> {
		const key = positionKey(accountId, symbol);
		this.confirmation.stop(accountId, symbol);
		this.logger.warn({ accountId, symbol, reason, attempt }, "exit order rejected");
		await this.ledger.setLastError(accountId, symbol, reason);

		const seen = await this.gateway.queryPosition(accountId, symbol);
		if (!this.epochs.isCurrent(key, epoch)) return this.stoodDown(accountId, symbol);
		const brokerQuantity = seen.ok ? seen.value.quantity : null;

		if (brokerQuantity === 0) {
			await this.ledger.transitionExit(accountId, symbol, ExitTrigger.ExitRejected, reason);
			await this.corrector.reconcile(accountId, symbol, { force: true });
			this.raise(accountId, symbol, reason, 0, AlertSeverity.Warning);
			this.logger.info({ accountId, symbol }, "exit rejected but broker is flat");
			return this.rejected(accountId, symbol, "flat");
		}

		let policy = this.policy;
		if (policy === ExitRejectionPolicy.RetryOnce && (attempt >= 2 || brokerQuantity === null)) {
			policy = ExitRejectionPolicy.RequireOperator;
		}

		if (policy === ExitRejectionPolicy.RetryOnce && brokerQuantity !== null) {
			this.raise(accountId, symbol, reason, brokerQuantity, AlertSeverity.Warning);
			const retried = await this.placeExit(accountId, symbol, brokerQuantity, epoch, attempt + 1);
			if (!retried.ok || retried.value.kind !== "submitted") return retried;
			return this.rejected(accountId, symbol, "retried");
		}

		if (policy === ExitRejectionPolicy.EscalateKillSwitch) {
			this.raise(accountId, symbol, reason, brokerQuantity, AlertSeverity.Critical);
			const flattened = await this.flattener.activate(accountId, symbol, "exit_rejected");
			if (!flattened.ok) return flattened;
			return this.rejected(accountId, symbol, "escalated");
		}

		await this.ledger.transitionExit(accountId, symbol, ExitTrigger.ExitRejected, reason);
		await this.ledger.setAttention(accountId, symbol, {
			code: "exit_rejected",
			message: `Exit rejected (${reason}); broker holds ${brokerQuantity ?? "an unknown quantity"}`,
		});
		this.logger.fatal(
			{ accountId, symbol, reason, brokerQuantity },
			"exit rejected with a position open; automation paused for the symbol",
		);
		this.raise(accountId, symbol, reason, brokerQuantity, AlertSeverity.Critical);
		return this.rejected(accountId, symbol, "needs_attention");
	}

	private raise(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
		brokerQuantity: number | null,
		severity: AlertSeverity,
	): void {
		this.alerts.emit({
			type: "exit_rejected",
			timestamp: this.clock.now(),
			severity,
			accountId,
			symbol,
			reason,
			brokerQuantity,
			policy: this.policy,
		});
	}

	private rejected(
		accountId: AccountId,
		symbol: SymbolId,
		resolution: RejectionResolution,
	): Result<ExitOutcome, TradingError> {
		return ok({
			kind: "rejected",
			resolution,
			position: this.ledger.currentPosition(accountId, symbol),
		});
	}

	private stoodDown(accountId: AccountId, symbol: SymbolId): Result<ExitOutcome, TradingError> {
		this.logger.info({ accountId, symbol }, "exit stood down");
		return ok({ kind: "stood_down", position: this.ledger.currentPosition(accountId, symbol) });
	}
}

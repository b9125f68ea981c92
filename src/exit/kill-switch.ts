/**
 * Kill Switch — emergency flatten for one (account, symbol).
 *
 * Runs outside the position's serialized slot. Activation bumps the exit
 * epoch (any exit task in flight stands down), marks the position
 * flattening, then cancels every resting order while a market exit for the
 * broker's quantity goes out in parallel. The sizing query gets a slice of
 * the deadline; past it the ledger quantity is flattened instead. Every
 * broker call here is a priority call. The broker must report flat before
 * the deadline; otherwise the symbol is halted and an operator is paged.
 * Concurrent activations share one run.
 */

import type { BrokerGateway, CallOptions } from "../broker/broker-gateway.js";
import type { OrderDesk } from "../broker/order-desk.js";
import { OrderPurpose } from "../broker/types.js";
import type { Scheduler } from "../engine/symbol-loop.js";
import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { LatencyHistogram } from "../observability/latency-histogram.js";
import type { PositionCorrector } from "../reconcile/drift-reconciler.js";
import { ErrorCategory, TimeoutError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, OrderId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { closingOrderSide } from "../shared/side.js";
import { type Clock, SystemClock, sleep, withDeadline } from "../shared/time.js";
import type { ExitEpochs } from "./exit-epoch.js";
import { ExitState, ExitTrigger } from "./exit-state.js";

const PRIORITY: CallOptions = { priority: true };

export interface KillSwitchReport {
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly reason: string;
	readonly elapsedMs: number;
	readonly cancelled: readonly OrderId[];
	/** Market exits sent; empty when the broker was already flat */
	readonly flattenOrders: readonly OrderId[];
}

/** What the exit machine and loss monitor need from the kill switch. */
export interface Flattener {
	activate(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
	): Promise<Result<KillSwitchReport, TradingError>>;
}

export interface KillSwitchConfig {
	readonly ledger: PositionLedger;
	readonly desk: OrderDesk;
	readonly gateway: BrokerGateway;
	readonly alerts: AlertDispatcher;
	readonly epochs: ExitEpochs;
	readonly corrector: PositionCorrector;
	/** Queues the post-flatten ledger correction into the position's slot */
	readonly schedule: Scheduler;
	readonly deadlineMs: number;
	readonly pollIntervalMs: number;
	/** Longest the flatten order waits on the broker's position; default a quarter of the deadline */
	readonly sizingTimeoutMs?: number;
	readonly histogram?: LatencyHistogram;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

/** Mutable state of one activation, shared with the work racing the deadline. */
interface Run {
	stopped: boolean;
	/** The single flatten order of this activation has been sent (or refused) */
	attempted: boolean;
	brokerQuantity: number | null;
	readonly flattenOrders: OrderId[];
}

export class KillSwitch implements Flattener {
	private readonly ledger: PositionLedger;
	private readonly desk: OrderDesk;
	private readonly gateway: BrokerGateway;
	private readonly alerts: AlertDispatcher;
	private readonly epochs: ExitEpochs;
	private readonly corrector: PositionCorrector;
	private readonly schedule: Scheduler;
	private readonly deadlineMs: number;
	private readonly pollIntervalMs: number;
	private readonly sizingTimeoutMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly inFlight = new Map<
		PositionKey,
		Promise<Result<KillSwitchReport, TradingError>>
	>();
	readonly histogram: LatencyHistogram;

	constructor(config: KillSwitchConfig) {
		this.ledger = config.ledger;
		this.desk = config.desk;
		this.gateway = config.gateway;
		this.alerts = config.alerts;
		this.epochs = config.epochs;
		this.corrector = config.corrector;
		this.schedule = config.schedule;
		this.deadlineMs = config.deadlineMs;
		this.pollIntervalMs = config.pollIntervalMs;
		this.sizingTimeoutMs =
			config.sizingTimeoutMs ?? Math.max(1, Math.floor(config.deadlineMs / 4));
		this.histogram = config.histogram ?? LatencyHistogram.create([config.deadlineMs]);
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "kill-switch" });
	}

	/** Flattens the position; a second call while one runs joins it. */
	activate(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
	): Promise<Result<KillSwitchReport, TradingError>> {
		const key = positionKey(accountId, symbol);
		const running = this.inFlight.get(key);
		if (running !== undefined) return running;
		const run = this.run(accountId, symbol, reason).finally(() => this.inFlight.delete(key));
		this.inFlight.set(key, run);
		return run;
	}

	isActive(accountId: AccountId, symbol: SymbolId): boolean {
		return this.inFlight.has(positionKey(accountId, symbol));
	}

	private async run(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
	): Promise<Result<KillSwitchReport, TradingError>> {
		const key = positionKey(accountId, symbol);
		const started = this.clock.now();
		const epoch = this.epochs.bump(key);
		const before = this.ledger.currentPosition(accountId, symbol);
		this.logger.warn(
			{ accountId, symbol, reason, quantity: before.quantity, exitState: before.exitState },
			"kill switch activated",
		);

		// Both commit in memory now; only their writes are awaited below.
		const control = Promise.all([
			this.ledger.setFlattening(accountId, symbol, true),
			before.exitState === ExitState.Idle
				? null
				: this.ledger.transitionExit(accountId, symbol, ExitTrigger.KillSwitch, reason),
		]);

		const state: Run = {
			stopped: false,
			attempted: false,
			brokerQuantity: null,
			flattenOrders: [],
		};
		const outcome = await withDeadline(
			this.flattenAndConfirm(accountId, symbol, state),
			this.deadlineMs,
		);
		state.stopped = true;
		const elapsedMs = this.clock.now() - started;
		this.histogram.record(elapsedMs);

		for (const written of await control) {
			if (written !== null && !written.ok) {
				this.logger.error(
					{ accountId, symbol, error: written.error.message },
					"kill switch state not persisted",
				);
			}
		}

		if (outcome.kind === "completed") {
			this.logger.info(
				{
					accountId,
					symbol,
					elapsedMs,
					cancelled: outcome.value.length,
					orders: state.flattenOrders,
				},
				"kill switch confirmed flat",
			);
			this.schedule(key, "kill-switch-release", () => this.release(accountId, symbol, epoch));
			return ok({
				accountId,
				symbol,
				reason,
				elapsedMs,
				cancelled: outcome.value,
				flattenOrders: state.flattenOrders,
			});
		}

		const error =
			outcome.kind === "expired"
				? new TimeoutError(
						`Kill switch did not confirm flat within ${this.deadlineMs}ms`,
						{ accountId, symbol, deadlineMs: this.deadlineMs },
						ErrorCategory.NonRetryable,
					)
				: classifyError(outcome.error);
		await this.ledger.setHalted(accountId, symbol, "kill_switch_timeout");
		this.logger.fatal(
			{
				accountId,
				symbol,
				elapsedMs,
				brokerQuantity: state.brokerQuantity,
				error: error.message,
			},
			"kill switch failed to flatten; symbol halted",
		);
		this.alerts.emit({
			type: "kill_switch_deadline_exceeded",
			timestamp: this.clock.now(),
			severity: AlertSeverity.Critical,
			accountId,
			symbol,
			deadlineMs: this.deadlineMs,
			brokerQuantity: state.brokerQuantity,
		});
		return err(error);
	}

	/** Cancel ‖ flatten, then poll until the broker is flat. Resolves with the cancelled ids. */
	private async flattenAndConfirm(
		accountId: AccountId,
		symbol: SymbolId,
		state: Run,
	): Promise<readonly OrderId[]> {
		const [cancel] = await Promise.all([
			this.desk.cancelAll(accountId, symbol, PRIORITY),
			this.flatten(accountId, symbol, state, null),
		]);

		while (!state.stopped) {
			const seen = await this.gateway.queryPosition(accountId, symbol, PRIORITY);
			if (seen.ok) {
				state.brokerQuantity = seen.value.quantity;
				if (seen.value.quantity === 0) return cancel.cancelled;
				// Sized from the ledger while the broker was unreachable, and it read flat.
				if (!state.attempted) {
					await this.flatten(accountId, symbol, state, seen.value.quantity);
				}
			}
			await sleep(this.pollIntervalMs);
		}
		return cancel.cancelled;
	}

	private async flatten(
		accountId: AccountId,
		symbol: SymbolId,
		state: Run,
		known: number | null,
	): Promise<void> {
		const quantity = known ?? (await this.size(accountId, symbol, state));
		// Once sized the order goes out even if the deadline has passed meanwhile.
		if (quantity === 0 || state.attempted) return;

		state.attempted = true;
		const placed = await this.desk.submit(
			{
				accountId,
				symbol,
				side: closingOrderSide(quantity),
				quantity: Math.abs(quantity),
				purpose: OrderPurpose.Exit,
			},
			PRIORITY,
		);
		if (!placed.ok) {
			this.logger.error(
				{ accountId, symbol, quantity, code: placed.error.code, error: placed.error.message },
				"flatten order refused",
			);
			return;
		}
		state.flattenOrders.push(placed.value.orderId);
	}

	/** The broker's quantity if it answers within the sizing slice, else the ledger's. */
	private async size(accountId: AccountId, symbol: SymbolId, state: Run): Promise<number> {
		const seen = await withDeadline(
			this.gateway.queryPosition(accountId, symbol, PRIORITY),
			this.sizingTimeoutMs,
		);
		let reason: string;
		if (seen.kind === "completed") {
			if (seen.value.ok) {
				state.brokerQuantity = seen.value.value.quantity;
				return seen.value.value.quantity;
			}
			reason = seen.value.error.message;
		} else if (seen.kind === "failed") {
			reason = classifyError(seen.error).message;
		} else {
			reason = `no answer within ${this.sizingTimeoutMs}ms`;
		}
		const quantity = this.ledger.currentPosition(accountId, symbol).quantity;
		this.logger.warn(
			{ accountId, symbol, quantity, error: reason },
			"broker position unavailable; flattening the ledger quantity",
		);
		return quantity;
	}

	/** Books what the broker did, then lets automation resume. */
	private async release(accountId: AccountId, symbol: SymbolId, epoch: number): Promise<void> {
		if (!this.epochs.isCurrent(positionKey(accountId, symbol), epoch)) return;
		const position = this.ledger.currentPosition(accountId, symbol);
		if (position.halted !== null || !position.flattening) return;

		const corrected = await this.corrector.reconcile(accountId, symbol, { force: true });
		if (corrected.kind === "failed") {
			this.logger.warn(
				{ accountId, symbol, error: corrected.error.message },
				"post-flatten reconcile failed; the periodic audit will retry",
			);
		}
		const released = await this.ledger.setFlattening(accountId, symbol, false);
		if (!released.ok) {
			this.logger.error(
				{ accountId, symbol, error: released.error.message },
				"flattening flag not cleared",
			);
			return;
		}
		this.logger.info({ accountId, symbol }, "kill switch released");
	}
}

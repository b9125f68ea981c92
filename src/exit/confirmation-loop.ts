/**
 * Confirmation loop — polls the broker after an exit until it reports flat.
 *
 * Each poll is one task in the position's slot, scheduled from a timer, so
 * fills and snapshots for the position keep flowing between polls. A poll
 * that finds the broker flat settles the ledger and walks the machine to
 * IDLE; one that finds the deadline passed hands the position to the kill
 * switch.
 */

import type { BrokerGateway } from "../broker/broker-gateway.js";
import type { Scheduler } from "../engine/symbol-loop.js";
import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import type { PositionCorrector } from "../reconcile/drift-reconciler.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { ExitEpochs } from "./exit-epoch.js";
import { ExitState, ExitTrigger } from "./exit-state.js";
import type { Flattener } from "./kill-switch.js";

export interface ConfirmationLoopConfig {
	readonly ledger: PositionLedger;
	readonly gateway: BrokerGateway;
	readonly corrector: PositionCorrector;
	readonly flattener: Flattener;
	readonly alerts: AlertDispatcher;
	readonly epochs: ExitEpochs;
	readonly schedule: Scheduler;
	readonly pollIntervalMs: number;
	readonly timeoutMs: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

interface Watch {
	readonly epoch: number;
	readonly startedAt: number;
	timer: ReturnType<typeof setTimeout> | null;
}

export class ConfirmationLoop {
	private readonly ledger: PositionLedger;
	private readonly gateway: BrokerGateway;
	private readonly corrector: PositionCorrector;
	private readonly flattener: Flattener;
	private readonly alerts: AlertDispatcher;
	private readonly epochs: ExitEpochs;
	private readonly schedule: Scheduler;
	private readonly pollIntervalMs: number;
	private readonly timeoutMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly watches = new Map<PositionKey, Watch>();

	constructor(config: ConfirmationLoopConfig) {
		this.ledger = config.ledger;
		this.gateway = config.gateway;
		this.corrector = config.corrector;
		this.flattener = config.flattener;
		this.alerts = config.alerts;
		this.epochs = config.epochs;
		this.schedule = config.schedule;
		this.pollIntervalMs = config.pollIntervalMs;
		this.timeoutMs = config.timeoutMs;
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "confirm-flat" });
	}

	/** Starts watching the position; the deadline runs from now. */
	start(accountId: AccountId, symbol: SymbolId, epoch: number): void {
		const key = positionKey(accountId, symbol);
		this.stop(accountId, symbol);
		const watch: Watch = { epoch, startedAt: this.clock.now(), timer: null };
		this.watches.set(key, watch);
		this.arm(accountId, symbol, watch);
	}

	stop(accountId: AccountId, symbol: SymbolId): void {
		const key = positionKey(accountId, symbol);
		const watch = this.watches.get(key);
		if (watch !== undefined && watch.timer !== null) clearTimeout(watch.timer);
		this.watches.delete(key);
	}

	stopAll(): void {
		for (const watch of this.watches.values()) {
			if (watch.timer !== null) clearTimeout(watch.timer);
		}
		this.watches.clear();
	}

	isWatching(accountId: AccountId, symbol: SymbolId): boolean {
		return this.watches.has(positionKey(accountId, symbol));
	}

	private arm(accountId: AccountId, symbol: SymbolId, watch: Watch): void {
		const key = positionKey(accountId, symbol);
		watch.timer = setTimeout(() => {
			watch.timer = null;
			this.schedule(key, "confirm-flat", () => this.poll(accountId, symbol, watch));
		}, this.pollIntervalMs);
	}

	private async poll(accountId: AccountId, symbol: SymbolId, watch: Watch): Promise<void> {
		const key = positionKey(accountId, symbol);
		if (!this.isLive(key, watch)) return;
		const position = this.ledger.currentPosition(accountId, symbol);
		if (position.exitState === ExitState.Idle) {
			this.watches.delete(key);
			return;
		}

		const elapsedMs = this.clock.now() - watch.startedAt;
		if (elapsedMs >= this.timeoutMs) {
			this.escalate(accountId, symbol, elapsedMs);
			return;
		}

		const seen = await this.gateway.queryPosition(accountId, symbol);
		if (!this.isLive(key, watch)) return;
		if (!seen.ok) {
			this.logger.debug({ accountId, symbol, error: seen.error.message }, "confirm poll failed");
		} else if (seen.value.quantity === 0 && (await this.settle(accountId, symbol))) {
			this.watches.delete(key);
			return;
		}
		if (this.isLive(key, watch)) this.arm(accountId, symbol, watch);
	}

	/** The broker is flat: bring the ledger along and finish the exit. */
	private async settle(accountId: AccountId, symbol: SymbolId): Promise<boolean> {
		const position = this.ledger.currentPosition(accountId, symbol);
		if (position.quantity !== 0) {
			const corrected = await this.corrector.reconcile(accountId, symbol, { force: true });
			if (corrected.kind === "failed") return false;
		}
		if (this.ledger.currentPosition(accountId, symbol).quantity !== 0) return false;

		if (position.exitState === ExitState.WorkingExit) {
			// The exit fill event is late or lost; the reconciler booked it.
			const moved = await this.ledger.transitionExit(accountId, symbol, ExitTrigger.BrokerFlat);
			if (!moved.ok) return false;
		}
		const done = await this.ledger.transitionExit(accountId, symbol, ExitTrigger.ConfirmedFlat);
		if (!done.ok) {
			this.logger.error({ accountId, symbol, error: done.error.message }, "exit not confirmed");
			return false;
		}
		this.logger.info(
			{ accountId, symbol, realizedPnl: done.value.realizedPnl.toString() },
			"exit confirmed flat",
		);
		return true;
	}

	private escalate(accountId: AccountId, symbol: SymbolId, elapsedMs: number): void {
		this.watches.delete(positionKey(accountId, symbol));
		this.logger.error(
			{ accountId, symbol, elapsedMs, timeoutMs: this.timeoutMs },
			"exit not confirmed in time; escalating to the kill switch",
		);
		this.alerts.emit({
			type: "exit_confirm_timed_out",
			timestamp: this.clock.now(),
			severity: AlertSeverity.Warning,
			accountId,
			symbol,
			elapsedMs,
		});
		// Not awaited: the kill switch runs outside this slot.
		this.flattener
			.activate(accountId, symbol, "exit_confirm_timeout")
			.then((result) => {
				if (!result.ok) {
					this.logger.error(
						{ accountId, symbol, error: result.error.message },
						"escalation failed",
					);
				}
			})
			.catch((e: unknown) => {
				this.logger.error({ accountId, symbol, error: String(e) }, "escalation threw");
			});
	}

	private isLive(key: PositionKey, watch: Watch): boolean {
		return this.watches.get(key) === watch && this.epochs.isCurrent(key, watch.epoch);
	}
}

/**
 * Engine alerts — conditions an operator should see.
 *
 * Each alert names its (account, symbol) where it has one. Severity drives
 * routing: `critical` alerts mean automation on the symbol has stopped and
 * needs a human.
 */

import type { ExitRejectionPolicy } from "../shared/config.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";

export const AlertSeverity = {
	Info: "info",
	Warning: "warning",
	Critical: "critical",
} as const;

export type AlertSeverity = (typeof AlertSeverity)[keyof typeof AlertSeverity];

export type EngineAlert =
	| ScaleInRejected
	| ExitRejected
	| ExitConfirmTimedOut
	| KillSwitchDeadlineExceeded
	| LedgerCorrupted
	| DriftCorrected
	| FillRefused
	| DailyLossExceeded;

// ── Alert types ──────────────────────────────────────────────────────

interface PositionAlert {
	readonly timestamp: number;
	readonly severity: AlertSeverity;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
}

/** A DCA order was refused; the rung stays marked fired. */
export interface ScaleInRejected extends PositionAlert {
	readonly type: "scale_in_rejected";
	readonly rungIndex: number;
	readonly reason: string;
}

export interface ExitRejected extends PositionAlert {
	readonly type: "exit_rejected";
	readonly reason: string;
	/** Broker quantity seen after the rejection; null when the query failed */
	readonly brokerQuantity: number | null;
	readonly policy: ExitRejectionPolicy;
}

export interface ExitConfirmTimedOut extends PositionAlert {
	readonly type: "exit_confirm_timed_out";
	readonly elapsedMs: number;
}

export interface KillSwitchDeadlineExceeded extends PositionAlert {
	readonly type: "kill_switch_deadline_exceeded";
	readonly deadlineMs: number;
	readonly brokerQuantity: number | null;
}

export interface LedgerCorrupted extends PositionAlert {
	readonly type: "ledger_corrupted";
	readonly detail: string;
}

export interface DriftCorrected extends PositionAlert {
	readonly type: "drift_corrected";
	readonly virtualQuantity: number;
	readonly brokerQuantity: number;
	readonly resolution: string;
}

/** A broker fill the ledger would not book (growth mid-exit). */
export interface FillRefused extends PositionAlert {
	readonly type: "fill_refused";
	readonly fillId: string;
	readonly reason: string;
}

export interface DailyLossExceeded {
	readonly type: "daily_loss_exceeded";
	readonly timestamp: number;
	readonly severity: AlertSeverity;
	readonly accountId: AccountId;
	readonly totalPnl: string;
	readonly limit: number;
	readonly flattened: readonly SymbolId[];
}

export type EngineAlertType = EngineAlert["type"];

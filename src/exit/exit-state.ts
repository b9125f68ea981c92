/**
 * Exit states and their validated transitions.
 *
 * One exit controller per (account, symbol). Every move goes through
 * `nextExitState()`; anything not listed in TRANSITIONS is refused, which is
 * what keeps a second exit from starting while one is in flight.
 */

import { ConflictingIntentError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

// ── States ───────────────────────────────────────────────────────────

export const ExitState = {
	/** No exit in flight */
	Idle: "IDLE",
	/** Cancelling resting orders and sizing the exit from the broker */
	PrepareExit: "PREPARE_EXIT",
	/** Market exit submitted, waiting for its fill */
	WorkingExit: "WORKING_EXIT",
	/** Exit filled, waiting for the broker to report flat */
	ConfirmFlat: "CONFIRM_FLAT",
} as const;

export type ExitState = (typeof ExitState)[keyof typeof ExitState];

// ── Triggers ─────────────────────────────────────────────────────────

export const ExitTrigger = {
	RequestExit: "request_exit",
	ExitSubmitted: "exit_submitted",
	/** Broker already flat when the exit was sized */
	NothingToExit: "nothing_to_exit",
	ExitFilled: "exit_filled",
	/** A confirmation poll saw the broker flat before the exit fill arrived */
	BrokerFlat: "broker_flat",
	ConfirmedFlat: "confirmed_flat",
	ExitRejected: "exit_rejected",
	KillSwitch: "kill_switch",
	OperatorReset: "operator_reset",
} as const;

export type ExitTrigger = (typeof ExitTrigger)[keyof typeof ExitTrigger];

export interface ExitTransition {
	readonly from: ExitState;
	readonly to: ExitState;
	readonly trigger: ExitTrigger;
	readonly at: number;
	readonly reason: string | null;
}

export const MAX_EXIT_HISTORY = 50;

const ANY: readonly ExitState[] = [
	ExitState.Idle,
	ExitState.PrepareExit,
	ExitState.WorkingExit,
	ExitState.ConfirmFlat,
];

const TRANSITIONS: Readonly<Record<ExitTrigger, { from: readonly ExitState[]; to: ExitState }>> = {
	request_exit: { from: [ExitState.Idle], to: ExitState.PrepareExit },
	exit_submitted: { from: [ExitState.PrepareExit], to: ExitState.WorkingExit },
	nothing_to_exit: { from: [ExitState.PrepareExit], to: ExitState.ConfirmFlat },
	exit_filled: { from: [ExitState.WorkingExit], to: ExitState.ConfirmFlat },
	broker_flat: { from: [ExitState.WorkingExit], to: ExitState.ConfirmFlat },
	confirmed_flat: { from: [ExitState.ConfirmFlat], to: ExitState.Idle },
	exit_rejected: { from: [ExitState.PrepareExit, ExitState.WorkingExit], to: ExitState.Idle },
	kill_switch: { from: ANY, to: ExitState.Idle },
	operator_reset: { from: ANY, to: ExitState.Idle },
};

/** Target state for `trigger` from `from`, or a refusal naming both. */
export function nextExitState(
	from: ExitState,
	trigger: ExitTrigger,
): Result<ExitState, ConflictingIntentError> {
	const rule = TRANSITIONS[trigger];
	if (!rule.from.includes(from)) {
		return err(
			new ConflictingIntentError(`Cannot ${trigger} from ${from}`, { from, trigger }),
		);
	}
	return ok(rule.to);
}

/** True while an exit owns the position. */
export function isExitInFlight(state: ExitState): boolean {
	return state !== ExitState.Idle;
}

/** Append, keeping only the most recent MAX_EXIT_HISTORY entries. */
export function appendTransition(
	history: readonly ExitTransition[],
	entry: ExitTransition,
): readonly ExitTransition[] {
	const next = [...history, entry];
	return next.length > MAX_EXIT_HISTORY ? next.slice(next.length - MAX_EXIT_HISTORY) : next;
}

/**
 * Ledger records: fills, the position derived from them, drift audits.
 *
 * Quantity, average entry, realized PnL and the open/close timestamps are a
 * pure fold over the fill log. The remaining Position fields are control
 * state (exit state, fired rungs, flags) persisted with the position row.
 */

import type { BrokerFill, OrderPurpose } from "../broker/types.js";
import type { DcaConfig } from "../dca/types.js";
import { ExitState, type ExitTransition } from "../exit/exit-state.js";
import { Decimal } from "../shared/decimal.js";
import type { AccountId, FillId, OrderId, SymbolId } from "../shared/identifiers.js";
import { type OrderSide, PositionSide } from "../shared/side.js";

// ── Fills ────────────────────────────────────────────────────────────

export const FillRole = {
	Entry: "entry",
	Dca: "dca",
	Exit: "exit",
	/** Booked by the drift reconciler; no order behind it */
	Adjustment: "adjustment",
} as const;

export type FillRole = (typeof FillRole)[keyof typeof FillRole];

export interface Fill {
	readonly fillId: FillId;
	/** On an adjustment, the working order it stands in for, if one explains the gap */
	readonly orderId: OrderId | null;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly side: OrderSide;
	/** Positive contract count */
	readonly quantity: number;
	readonly price: Decimal;
	readonly timestampMs: number;
	readonly role: FillRole;
}

/** Role of a broker fill, from the purpose of the order behind it. Unknown orders book as entries. */
export function fillRoleFor(purpose: OrderPurpose | null): FillRole {
	switch (purpose) {
		case "dcaEntry":
			return FillRole.Dca;
		case "exit":
		case "takeProfit":
		case "stopLoss":
			return FillRole.Exit;
		default:
			return FillRole.Entry;
	}
}

export function fillFromBroker(fill: BrokerFill, role: FillRole): Fill {
	return {
		fillId: fill.fillId,
		orderId: fill.orderId,
		accountId: fill.accountId,
		symbol: fill.symbol,
		side: fill.side,
		quantity: fill.quantity,
		price: fill.price,
		timestampMs: fill.timestampMs,
		role,
	};
}

// ── Position ─────────────────────────────────────────────────────────

/** Automation is paused for the position until an operator clears this. */
export interface Attention {
	readonly code: string;
	readonly message: string;
	readonly at: number;
}

/** Fatal stop: nothing automated runs for the position until a reset. */
export interface Halt {
	readonly reason: string;
	readonly at: number;
}

export interface Position {
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly side: PositionSide;
	/** Signed: positive long, negative short */
	readonly quantity: number;
	/** Null exactly when flat */
	readonly averageEntryPrice: Decimal | null;
	readonly openedAt: number | null;
	/** Set once flat and no exit is in flight */
	readonly closedAt: number | null;
	readonly realizedPnl: Decimal;
	readonly unrealizedPnl: Decimal;
	/** Lowest unrealized PnL seen this lifecycle */
	readonly worstUnrealizedPnl: Decimal;
	readonly bestUnrealizedPnl: Decimal;
	readonly lastPrice: Decimal | null;
	/** Ascending, persisted before the rung's order is sent */
	readonly dcaTriggeredIndices: readonly number[];
	readonly dcaConfig: DcaConfig | null;
	readonly exitState: ExitState;
	/** Kill switch active */
	readonly flattening: boolean;
	readonly attention: Attention | null;
	readonly halted: Halt | null;
	readonly lastError: string | null;
	readonly history: readonly ExitTransition[];
	readonly updatedAt: number;
}

export function flatPosition(accountId: AccountId, symbol: SymbolId, now = 0): Position {
	return {
		accountId,
		symbol,
		side: PositionSide.Flat,
		quantity: 0,
		averageEntryPrice: null,
		openedAt: null,
		closedAt: null,
		realizedPnl: Decimal.zero(),
		unrealizedPnl: Decimal.zero(),
		worstUnrealizedPnl: Decimal.zero(),
		bestUnrealizedPnl: Decimal.zero(),
		lastPrice: null,
		dcaTriggeredIndices: [],
		dcaConfig: null,
		exitState: ExitState.Idle,
		flattening: false,
		attention: null,
		halted: null,
		lastError: null,
		history: [],
		updatedAt: now,
	};
}

// ── Drift ────────────────────────────────────────────────────────────

export const DriftResolution = {
	Pending: "pending",
	/** Missing broker fills were appended to the log */
	CorrectedFromFills: "corrected_from_fills",
	/** An adjustment fill closed the remaining gap */
	CorrectedByAdjustment: "corrected_by_adjustment",
} as const;

export type DriftResolution = (typeof DriftResolution)[keyof typeof DriftResolution];

export interface DriftRecord {
	readonly id: string;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly virtualQuantity: number;
	readonly brokerQuantity: number;
	readonly detectedAt: number;
	readonly resolution: DriftResolution;
	readonly resolvedAt: number | null;
}

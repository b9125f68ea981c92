/**
 * Row codec for persisted ledger records.
 *
 * Decimals are stored as strings and ids as plain strings; decoding
 * validates every row and restores branded ids and Decimals.
 */

import { dcaConfigSchema, encodeDcaConfig } from "../dca/types.js";
import type { DcaConfigInput } from "../dca/types.js";
import { ExitState, type ExitTransition, ExitTrigger } from "../exit/exit-state.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { accountId, fillId, orderId, symbolId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { OrderSide, PositionSide } from "../shared/side.js";
import { DriftResolution, FillRole } from "./types.js";
import type { DriftRecord, Fill, Position } from "./types.js";

// ── Schemas ──────────────────────────────────────────────────────────

const DECIMAL = /^-?\d+(\.\d+)?(e[+-]?\d+)?$/i;

const decimal = z
	.string()
	.regex(DECIMAL, "not a decimal")
	.transform((v) => Decimal.from(v));
const id = z.string().min(1);
const epochMs = z.number().int().nonnegative();

const fillRow = z.object({
	fillId: id.transform(fillId),
	orderId: id.transform(orderId).nullable(),
	accountId: id.transform(accountId),
	symbol: id.transform(symbolId),
	side: z.nativeEnum(OrderSide),
	quantity: z.number().int().positive(),
	price: decimal,
	timestampMs: epochMs,
	role: z.nativeEnum(FillRole),
});

const transitionRow = z.object({
	from: z.nativeEnum(ExitState),
	to: z.nativeEnum(ExitState),
	trigger: z.nativeEnum(ExitTrigger),
	at: epochMs,
	reason: z.string().nullable(),
});

const positionRow = z.object({
	accountId: id.transform(accountId),
	symbol: id.transform(symbolId),
	side: z.nativeEnum(PositionSide),
	quantity: z.number().int(),
	averageEntryPrice: decimal.nullable(),
	openedAt: epochMs.nullable(),
	closedAt: epochMs.nullable(),
	realizedPnl: decimal,
	unrealizedPnl: decimal,
	worstUnrealizedPnl: decimal,
	bestUnrealizedPnl: decimal,
	lastPrice: decimal.nullable(),
	dcaTriggeredIndices: z.array(z.number().int().nonnegative()),
	dcaConfig: dcaConfigSchema.nullable(),
	exitState: z.nativeEnum(ExitState),
	flattening: z.boolean(),
	attention: z.object({ code: z.string(), message: z.string(), at: epochMs }).nullable(),
	halted: z.object({ reason: z.string(), at: epochMs }).nullable(),
	lastError: z.string().nullable(),
	history: z.array(transitionRow),
	updatedAt: epochMs,
});

const driftRow = z.object({
	id,
	accountId: id.transform(accountId),
	symbol: id.transform(symbolId),
	virtualQuantity: z.number().int(),
	brokerQuantity: z.number().int(),
	detectedAt: epochMs,
	resolution: z.nativeEnum(DriftResolution),
	resolvedAt: epochMs.nullable(),
});

// ── Rows ─────────────────────────────────────────────────────────────

export type FillRow = z.input<typeof fillRow>;
export type PositionRow = z.input<typeof positionRow>;
export type DriftRow = z.input<typeof driftRow>;

export function encodeFill(fill: Fill): FillRow {
	return {
		fillId: fill.fillId,
		orderId: fill.orderId,
		accountId: fill.accountId,
		symbol: fill.symbol,
		side: fill.side,
		quantity: fill.quantity,
		price: fill.price.toString(),
		timestampMs: fill.timestampMs,
		role: fill.role,
	};
}

export function decodeFill(row: unknown): Result<Fill, ValidationError> {
	return validate(fillRow, row, "Invalid fill row");
}

function encodeTransition(t: ExitTransition): z.input<typeof transitionRow> {
	return { from: t.from, to: t.to, trigger: t.trigger, at: t.at, reason: t.reason };
}

export function encodePosition(p: Position): PositionRow {
	const dcaConfig: DcaConfigInput | null =
		p.dcaConfig === null ? null : encodeDcaConfig(p.dcaConfig);
	return {
		accountId: p.accountId,
		symbol: p.symbol,
		side: p.side,
		quantity: p.quantity,
		averageEntryPrice: p.averageEntryPrice?.toString() ?? null,
		openedAt: p.openedAt,
		closedAt: p.closedAt,
		realizedPnl: p.realizedPnl.toString(),
		unrealizedPnl: p.unrealizedPnl.toString(),
		worstUnrealizedPnl: p.worstUnrealizedPnl.toString(),
		bestUnrealizedPnl: p.bestUnrealizedPnl.toString(),
		lastPrice: p.lastPrice?.toString() ?? null,
		dcaTriggeredIndices: [...p.dcaTriggeredIndices],
		dcaConfig,
		exitState: p.exitState,
		flattening: p.flattening,
		attention: p.attention,
		halted: p.halted,
		lastError: p.lastError,
		history: p.history.map(encodeTransition),
		updatedAt: p.updatedAt,
	};
}

export function decodePosition(row: unknown): Result<Position, ValidationError> {
	return validate(positionRow, row, "Invalid position row");
}

export function encodeDrift(record: DriftRecord): DriftRow {
	return { ...record };
}

export function decodeDrift(row: unknown): Result<DriftRecord, ValidationError> {
	return validate(driftRow, row, "Invalid drift row");
}

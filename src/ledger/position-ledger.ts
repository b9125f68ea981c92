/**
 * PositionLedger — append-only fill log plus the position derived from it,
 * one per (account, symbol).
 *
 * The fill log is the source of truth: quantity, average entry, realized
 * PnL and open/close times are refolded from it by `rebuild()` and on
 * `load()`. Control state (exit state, fired rungs, flags) lives on the
 * position row. Every write updates the in-memory position synchronously
 * and then persists it, so a caller outside the symbol's loop (the kill
 * switch) never has its update overwritten by a stale copy.
 */

import type { DcaConfig } from "../dca/types.js";
import {
	ExitState,
	type ExitTrigger,
	appendTransition,
	nextExitState,
} from "../exit/exit-state.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import type { ValidationIssue } from "../lib/validation/index.js";
import { type Marks, ZERO_MARKS, markToMarket } from "../pnl/pnl-math.js";
import { ContractBook } from "../shared/contracts.js";
import type { Decimal } from "../shared/decimal.js";
import { ConflictingIntentError, LedgerCorruptionError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { sideOfQuantity } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	FLAT_HOLDING,
	type Holding,
	applyFill,
	classifyFill,
	coveringAdjustment,
	duplicateFillIds,
	foldFills,
	isGrowth,
	opensLifecycle,
} from "./position-math.js";
import type { LedgerStore } from "./store.js";
import { FillRole, flatPosition } from "./types.js";
import type { Fill, Position } from "./types.js";

export type LedgerEvents = {
	/** `fill` is null for control-state changes and rebuilds */
	positionChanged: (position: Position, fill: Fill | null) => void;
};

export interface PositionLedgerConfig {
	readonly store: LedgerStore;
	readonly contracts?: ContractBook;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export interface RecordFillOptions {
	/** Drift correction books what the broker already holds, exit or not. */
	readonly bypassGrowthGuard?: boolean;
}

interface Entry {
	holding: Holding;
	position: Position;
	fills: Fill[];
	readonly fillIds: Set<string>;
	/** Broker fills an earlier adjustment already booked */
	readonly coveredFillIds: Set<string>;
	/** Adjustment fill id to the quantity of broker fills matched against it */
	readonly consumed: Map<string, number>;
}

export class PositionLedger extends TypedEmitter<LedgerEvents> {
	private readonly store: LedgerStore;
	private readonly contracts: ContractBook;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly entries = new Map<PositionKey, Entry>();

	constructor(config: PositionLedgerConfig) {
		super();
		this.store = config.store;
		this.contracts = config.contracts ?? new ContractBook();
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "ledger" });
	}

	// ── Startup ────────────────────────────────────────────────────

	/**
	 * Restores every stored position and refolds it from its fills.
	 * A position whose log holds duplicate fill ids is loaded halted.
	 * @returns the number of positions loaded
	 */
	async load(): Promise<Result<number, TradingError>> {
		const rows = await this.store.loadPositions();
		if (!rows.ok) return rows;
		const fills = await this.store.loadAllFills();
		if (!fills.ok) return fills;

		const byKey = new Map<PositionKey, Fill[]>();
		for (const fill of fills.value) {
			const key = positionKey(fill.accountId, fill.symbol);
			const list = byKey.get(key) ?? [];
			list.push(fill);
			byKey.set(key, list);
		}
		const stored = new Map<PositionKey, Position>();
		for (const row of rows.value) {
			stored.set(positionKey(row.accountId, row.symbol), row);
		}

		const keys = new Set<PositionKey>([...stored.keys(), ...byKey.keys()]);
		for (const key of keys) {
			const keyFills = byKey.get(key) ?? [];
			const first = stored.get(key) ?? keyFills[0];
			if (first === undefined) continue;
			let row =
				stored.get(key) ?? flatPosition(first.accountId, first.symbol, this.clock.now());
			const dupes = duplicateFillIds(keyFills);
			if (dupes.length > 0) {
				this.logger.fatal(
					{ accountId: row.accountId, symbol: row.symbol, duplicates: dupes },
					"fill log has duplicate ids, position halted",
				);
				row = { ...row, halted: { reason: "ledger_corruption", at: this.clock.now() } };
			}
			const holding = foldFills(keyFills, this.contracts.resolve(row.symbol));
			this.entries.set(key, {
				holding,
				position: withHolding(row, holding),
				fills: keyFills,
				fillIds: new Set(keyFills.map((f) => f.fillId)),
				coveredFillIds: new Set(),
				consumed: new Map(),
			});
		}
		this.logger.info({ positions: keys.size, fills: fills.value.length }, "ledger loaded");
		return ok(keys.size);
	}

	// ── Queries ────────────────────────────────────────────────────

	/** The derived position; flat and IDLE for a key never seen. */
	currentPosition(accountId: AccountId, symbol: SymbolId): Position {
		const entry = this.entries.get(positionKey(accountId, symbol));
		return entry?.position ?? flatPosition(accountId, symbol);
	}

	positions(): readonly Position[] {
		return [...this.entries.values()].map((e) => e.position);
	}

	fills(accountId: AccountId, symbol: SymbolId): readonly Fill[] {
		return this.entries.get(positionKey(accountId, symbol))?.fills ?? [];
	}

	/** In the log, or matched against an adjustment that stands in for it. */
	hasFill(accountId: AccountId, symbol: SymbolId, fillId: string): boolean {
		const entry = this.entries.get(positionKey(accountId, symbol));
		if (entry === undefined) return false;
		return entry.fillIds.has(fillId) || entry.coveredFillIds.has(fillId);
	}

	coveredByAdjustment(accountId: AccountId, symbol: SymbolId, fillId: string): boolean {
		return this.entries.get(positionKey(accountId, symbol))?.coveredFillIds.has(fillId) ?? false;
	}

	// ── Fills ──────────────────────────────────────────────────────

	/**
	 * Appends a fill and returns the recomputed position. A fill id already
	 * in the log is ignored, and so is a broker fill that a drift adjustment
	 * booked earlier (see `coveringAdjustment`). An exit fill that would open
	 * or grow the position is refused, and so is any fill that would grow it
	 * while an exit or flatten is in flight. The position row is a cache of
	 * the log: a failed row write is logged, not returned.
	 */
	async recordFill(
		fill: Fill,
		options: RecordFillOptions = {},
	): Promise<Result<Position, TradingError>> {
		const invalid = checkFill(fill);
		if (invalid !== null) return err(invalid);

		const entry = this.entryFor(fill.accountId, fill.symbol);
		if (entry.fillIds.has(fill.fillId) || entry.coveredFillIds.has(fill.fillId)) {
			this.logger.debug({ fillId: fill.fillId }, "duplicate fill ignored");
			return ok(entry.position);
		}
		if (fill.role !== FillRole.Adjustment) {
			const cover = coveringAdjustment(entry.fills, entry.consumed, fill);
			if (cover !== null) {
				const used = entry.consumed.get(cover.fillId) ?? 0;
				entry.consumed.set(cover.fillId, used + fill.quantity);
				entry.coveredFillIds.add(fill.fillId);
				this.logger.info(
					{
						accountId: fill.accountId,
						symbol: fill.symbol,
						fillId: fill.fillId,
						adjustment: cover.fillId,
					},
					"fill already booked by a drift adjustment",
				);
				return ok(entry.position);
			}
		}

		const current = entry.position;
		const guarded = options.bypassGrowthGuard !== true && fill.role !== FillRole.Adjustment;
		const exiting = current.exitState !== ExitState.Idle || current.flattening;
		const growth = isGrowth(current.quantity, fill);
		const strayExit = fill.role === FillRole.Exit && growth;
		if (guarded && growth && (exiting || strayExit)) {
			this.logger.warn(
				{
					accountId: fill.accountId,
					symbol: fill.symbol,
					fillId: fill.fillId,
					role: fill.role,
					exitState: current.exitState,
					quantity: current.quantity,
				},
				strayExit
					? "fill refused: exit fill would open or grow the position"
					: "fill refused: would grow a position mid-exit",
			);
			return err(
				new ConflictingIntentError(
					strayExit
						? "Refusing an exit fill that would open or grow the position"
						: "Refusing to grow a position while an exit is in flight",
					{
						accountId: fill.accountId,
						symbol: fill.symbol,
						fillId: fill.fillId,
						exitState: current.exitState,
						quantity: current.quantity,
					},
					"Let the exit finish; the drift reconciler books what the broker holds",
				),
			);
		}

		entry.fillIds.add(fill.fillId);
		const appended = await this.store.appendFill(fill);
		if (!appended.ok) {
			entry.fillIds.delete(fill.fillId);
			this.logger.error(
				{ fillId: fill.fillId, error: appended.error.message },
				"fill append failed",
			);
			return err(appended.error);
		}

		const effect = classifyFill(entry.holding.quantity, fill);
		const spec = this.contracts.resolve(fill.symbol);
		entry.fills.push(fill);
		entry.holding = applyFill(entry.holding, fill, spec);

		const latest = entry.position;
		const reset = opensLifecycle(effect);
		const prevMarks: Marks = reset
			? { ...ZERO_MARKS, lastPrice: latest.lastPrice }
			: marksOf(latest);
		const marks =
			prevMarks.lastPrice === null
				? prevMarks
				: markToMarket(
						prevMarks,
						entry.holding.quantity,
						entry.holding.averageEntryPrice,
						prevMarks.lastPrice,
						spec,
					);
		const position = this.commit(entry, {
			...latest,
			...marks,
			dcaTriggeredIndices: reset ? [] : latest.dcaTriggeredIndices,
		});

		this.logger.info(
			{
				accountId: fill.accountId,
				symbol: fill.symbol,
				fillId: fill.fillId,
				role: fill.role,
				side: fill.side,
				quantity: fill.quantity,
				price: fill.price.toString(),
				position: position.quantity,
			},
			"fill recorded",
		);
		this.emit("positionChanged", position, fill);

		const saved = await this.store.savePosition(position);
		if (!saved.ok) {
			this.logger.error({ error: saved.error.message }, "position row write failed");
		}
		return ok(position);
	}

	/**
	 * Replays the stored fill log for one position. Duplicate fill ids in the
	 * log are corruption: the position is halted and the error returned.
	 */
	async rebuild(accountId: AccountId, symbol: SymbolId): Promise<Result<Position, TradingError>> {
		const loaded = await this.store.loadFills(accountId, symbol);
		const entry = this.entryFor(accountId, symbol);
		if (!loaded.ok) {
			if (loaded.error instanceof LedgerCorruptionError) {
				await this.haltForCorruption(entry, loaded.error.message);
			}
			return loaded;
		}
		const dupes = duplicateFillIds(loaded.value);
		if (dupes.length > 0) {
			await this.haltForCorruption(entry, `duplicate fill ids: ${dupes.join(", ")}`);
			return err(
				new LedgerCorruptionError("Fill log has duplicate fill ids", {
					accountId,
					symbol,
					duplicates: dupes,
				}),
			);
		}

		entry.fills = [...loaded.value];
		entry.fillIds.clear();
		for (const fill of loaded.value) entry.fillIds.add(fill.fillId);
		const spec = this.contracts.resolve(symbol);
		entry.holding = foldFills(loaded.value, spec);

		const latest = entry.position;
		const marks =
			latest.lastPrice === null
				? marksOf(latest)
				: markToMarket(
						marksOf(latest),
						entry.holding.quantity,
						entry.holding.averageEntryPrice,
						latest.lastPrice,
						spec,
					);
		const position = this.commit(entry, { ...latest, ...marks });
		this.emit("positionChanged", position, null);
		const saved = await this.store.savePosition(position);
		if (!saved.ok) return saved;
		return ok(position);
	}

	// ── Control state ──────────────────────────────────────────────

	/** Applies a validated exit transition and records it in the history. */
	async transitionExit(
		accountId: AccountId,
		symbol: SymbolId,
		trigger: ExitTrigger,
		reason: string | null = null,
	): Promise<Result<Position, TradingError>> {
		const entry = this.entryFor(accountId, symbol);
		const from = entry.position.exitState;
		const to = nextExitState(from, trigger);
		if (!to.ok) return to;
		const now = this.clock.now();
		this.logger.info({ accountId, symbol, from, to: to.value, trigger, reason }, "exit transition");
		return this.update(entry, (p) => ({
			...p,
			exitState: to.value,
			history: appendTransition(p.history, { from, to: to.value, trigger, at: now, reason }),
		}));
	}

	/** Persists a fired rung. Resolves once durable; the caller orders only after that. */
	async markRungFired(
		accountId: AccountId,
		symbol: SymbolId,
		index: number,
	): Promise<Result<Position, TradingError>> {
		const entry = this.entryFor(accountId, symbol);
		if (entry.position.dcaTriggeredIndices.includes(index)) return ok(entry.position);
		return this.update(entry, (p) => ({
			...p,
			dcaTriggeredIndices: [...p.dcaTriggeredIndices, index].sort((a, b) => a - b),
		}));
	}

	async setDcaConfig(
		accountId: AccountId,
		symbol: SymbolId,
		dcaConfig: DcaConfig | null,
	): Promise<Result<Position, TradingError>> {
		return this.update(this.entryFor(accountId, symbol), (p) => ({ ...p, dcaConfig }));
	}

	async setFlattening(
		accountId: AccountId,
		symbol: SymbolId,
		flattening: boolean,
	): Promise<Result<Position, TradingError>> {
		return this.update(this.entryFor(accountId, symbol), (p) => ({ ...p, flattening }));
	}

	async setAttention(
		accountId: AccountId,
		symbol: SymbolId,
		attention: { readonly code: string; readonly message: string } | null,
	): Promise<Result<Position, TradingError>> {
		const at = this.clock.now();
		return this.update(this.entryFor(accountId, symbol), (p) => ({
			...p,
			attention: attention === null ? null : { ...attention, at },
		}));
	}

	async setHalted(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string | null,
	): Promise<Result<Position, TradingError>> {
		const at = this.clock.now();
		return this.update(this.entryFor(accountId, symbol), (p) => ({
			...p,
			halted: reason === null ? null : { reason, at },
		}));
	}

	async setLastError(
		accountId: AccountId,
		symbol: SymbolId,
		lastError: string | null,
	): Promise<Result<Position, TradingError>> {
		return this.update(this.entryFor(accountId, symbol), (p) => ({ ...p, lastError }));
	}

	/** Re-marks at `price`. In memory only; the next row write carries it. */
	mark(accountId: AccountId, symbol: SymbolId, price: Decimal): Position {
		const entry = this.entryFor(accountId, symbol);
		const p = entry.position;
		const marks = markToMarket(
			marksOf(p),
			p.quantity,
			p.averageEntryPrice,
			price,
			this.contracts.resolve(symbol),
		);
		return this.commit(entry, { ...p, ...marks });
	}

	// ── Internals ──────────────────────────────────────────────────

	private entryFor(accountId: AccountId, symbol: SymbolId): Entry {
		const key = positionKey(accountId, symbol);
		let entry = this.entries.get(key);
		if (entry === undefined) {
			entry = {
				holding: FLAT_HOLDING,
				position: flatPosition(accountId, symbol, this.clock.now()),
				fills: [],
				fillIds: new Set(),
				coveredFillIds: new Set(),
				consumed: new Map(),
			};
			this.entries.set(key, entry);
		}
		return entry;
	}

	private commit(entry: Entry, next: Position): Position {
		const position = withHolding({ ...next, updatedAt: this.clock.now() }, entry.holding);
		entry.position = position;
		return position;
	}

	private async update(
		entry: Entry,
		fn: (p: Position) => Position,
	): Promise<Result<Position, TradingError>> {
		const position = this.commit(entry, fn(entry.position));
		this.emit("positionChanged", position, null);
		const saved = await this.store.savePosition(position);
		if (!saved.ok) {
			this.logger.error(
				{ accountId: position.accountId, symbol: position.symbol, error: saved.error.message },
				"position row write failed",
			);
			return saved;
		}
		return ok(position);
	}

	private async haltForCorruption(entry: Entry, detail: string): Promise<void> {
		const { accountId, symbol } = entry.position;
		this.logger.fatal({ accountId, symbol, detail }, "fill log unreadable, position halted");
		const halted = await this.setHalted(accountId, symbol, "ledger_corruption");
		if (!halted.ok) {
			this.logger.error({ accountId, symbol, error: halted.error.message }, "halt not persisted");
		}
	}
}

function withHolding(p: Position, h: Holding): Position {
	return {
		...p,
		side: sideOfQuantity(h.quantity),
		quantity: h.quantity,
		averageEntryPrice: h.averageEntryPrice,
		realizedPnl: h.realizedPnl,
		openedAt: h.openedAt,
		closedAt: p.exitState === ExitState.Idle ? h.closedAt : null,
	};
}

function marksOf(p: Position): Marks {
	return {
		lastPrice: p.lastPrice,
		unrealizedPnl: p.unrealizedPnl,
		worstUnrealizedPnl: p.worstUnrealizedPnl,
		bestUnrealizedPnl: p.bestUnrealizedPnl,
	};
}

function checkFill(fill: Fill): ValidationError | null {
	const issues: ValidationIssue[] = [];
	if (!Number.isInteger(fill.quantity) || fill.quantity <= 0) {
		issues.push({ path: ["quantity"], message: "must be a positive integer" });
	}
	if (!fill.price.isPositive()) {
		issues.push({ path: ["price"], message: "must be positive" });
	}
	return issues.length > 0 ? new ValidationError("Invalid fill", issues) : null;
}

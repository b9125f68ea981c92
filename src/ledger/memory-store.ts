/**
 * MemoryLedgerStore — in-process LedgerStore for tests and paper sessions.
 * Nothing survives the process; hand the same instance to a new ledger to
 * simulate a restart.
 */

import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { LedgerStore } from "./store.js";
import type { DriftRecord, Fill, Position } from "./types.js";

export class MemoryLedgerStore implements LedgerStore {
	private readonly fillLog: Fill[] = [];
	private readonly rows = new Map<PositionKey, Position>();
	private readonly drifts = new Map<string, DriftRecord>();

	async appendFill(fill: Fill): Promise<Result<void, TradingError>> {
		this.fillLog.push(fill);
		return ok(undefined);
	}

	async loadFills(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<readonly Fill[], TradingError>> {
		return ok(this.fillLog.filter((f) => f.accountId === accountId && f.symbol === symbol));
	}

	async loadAllFills(): Promise<Result<readonly Fill[], TradingError>> {
		return ok([...this.fillLog]);
	}

	async savePosition(position: Position): Promise<Result<void, TradingError>> {
		this.rows.set(positionKey(position.accountId, position.symbol), position);
		return ok(undefined);
	}

	async loadPosition(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<Position | null, TradingError>> {
		return ok(this.rows.get(positionKey(accountId, symbol)) ?? null);
	}

	async loadPositions(): Promise<Result<readonly Position[], TradingError>> {
		return ok([...this.rows.values()]);
	}

	async saveDrift(record: DriftRecord): Promise<Result<void, TradingError>> {
		this.drifts.set(record.id, record);
		return ok(undefined);
	}

	async loadDrifts(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<readonly DriftRecord[], TradingError>> {
		return ok(
			[...this.drifts.values()].filter((d) => d.accountId === accountId && d.symbol === symbol),
		);
	}

	async close(): Promise<void> {}

	/** Raw fill log, for assertions. */
	get fills(): readonly Fill[] {
		return this.fillLog;
	}
}

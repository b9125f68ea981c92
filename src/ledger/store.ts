import type { TradingError } from "../shared/errors.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { DriftRecord, Fill, Position } from "./types.js";

/**
 * Durable storage behind the ledger: an append-only fill log, one row per
 * position and the drift audit trail. Writes resolve once durable.
 */
export interface LedgerStore {
	appendFill(fill: Fill): Promise<Result<void, TradingError>>;
	/** Fills for one position in append order. */
	loadFills(accountId: AccountId, symbol: SymbolId): Promise<Result<readonly Fill[], TradingError>>;
	loadAllFills(): Promise<Result<readonly Fill[], TradingError>>;
	/** Insert or replace the row for the position's (account, symbol). */
	savePosition(position: Position): Promise<Result<void, TradingError>>;
	loadPosition(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<Position | null, TradingError>>;
	loadPositions(): Promise<Result<readonly Position[], TradingError>>;
	/** Insert or replace by `id`. */
	saveDrift(record: DriftRecord): Promise<Result<void, TradingError>>;
	loadDrifts(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<readonly DriftRecord[], TradingError>>;
	close(): Promise<void>;
}

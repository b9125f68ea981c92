/**
 * FileLedgerStore — JSONL-backed LedgerStore.
 *
 * Three append-only files in one directory: `fills.jsonl` (the fill log),
 * `positions.jsonl` (a row snapshot per save, last one per key wins) and
 * `drifts.jsonl` (last one per id wins). Writes are serialized through one
 * queue and resolve after the line is appended. A line that fails to parse
 * or validate makes every load of that file fail with LedgerCorruptionError.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { LedgerCorruptionError, SystemError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	decodeDrift,
	decodeFill,
	decodePosition,
	encodeDrift,
	encodeFill,
	encodePosition,
} from "./codec.js";
import type { LedgerStore } from "./store.js";
import type { DriftRecord, Fill, Position } from "./types.js";

export interface FileLedgerStoreConfig {
	readonly directory: string;
}

/** A line that could not be parsed or validated. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

const FILLS = "fills.jsonl";
const POSITIONS = "positions.jsonl";
const DRIFTS = "drifts.jsonl";

export class FileLedgerStore implements LedgerStore {
	private readonly directory: string;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly _writeErrors: Error[] = [];

	private constructor(config: FileLedgerStoreConfig) {
		this.directory = config.directory;
	}

	/** Creates the directory if needed and compacts the position snapshots. */
	static async open(
		config: FileLedgerStoreConfig,
	): Promise<Result<FileLedgerStore, TradingError>> {
		const store = new FileLedgerStore(config);
		try {
			await mkdir(config.directory, { recursive: true });
		} catch (e: unknown) {
			return err(storeError("create", config.directory, e));
		}
		const compacted = await store.compact();
		if (!compacted.ok) return compacted;
		return ok(store);
	}

	// ── Fills ──────────────────────────────────────────────────────

	async appendFill(fill: Fill): Promise<Result<void, TradingError>> {
		return this.append(FILLS, encodeFill(fill));
	}

	async loadFills(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<readonly Fill[], TradingError>> {
		const all = await this.loadAllFills();
		if (!all.ok) return all;
		return ok(all.value.filter((f) => f.accountId === accountId && f.symbol === symbol));
	}

	async loadAllFills(): Promise<Result<readonly Fill[], TradingError>> {
		return this.readRows(FILLS, decodeFill);
	}

	// ── Positions ──────────────────────────────────────────────────

	async savePosition(position: Position): Promise<Result<void, TradingError>> {
		return this.append(POSITIONS, encodePosition(position));
	}

	async loadPosition(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<Position | null, TradingError>> {
		const rows = await this.latestPositions();
		if (!rows.ok) return rows;
		return ok(rows.value.get(positionKey(accountId, symbol)) ?? null);
	}

	async loadPositions(): Promise<Result<readonly Position[], TradingError>> {
		const rows = await this.latestPositions();
		if (!rows.ok) return rows;
		return ok([...rows.value.values()]);
	}

	// ── Drift ──────────────────────────────────────────────────────

	async saveDrift(record: DriftRecord): Promise<Result<void, TradingError>> {
		return this.append(DRIFTS, encodeDrift(record));
	}

	async loadDrifts(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<readonly DriftRecord[], TradingError>> {
		const rows = await this.readRows(DRIFTS, decodeDrift);
		if (!rows.ok) return rows;
		const latest = new Map<string, DriftRecord>();
		for (const record of rows.value) {
			if (record.accountId === accountId && record.symbol === symbol) {
				latest.set(record.id, record);
			}
		}
		return ok([...latest.values()]);
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Rewrites `positions.jsonl` with one row per key. The new file is
	 * written beside the old one and renamed over it. Only safe before the
	 * store is handed out.
	 */
	private async compact(): Promise<Result<number, TradingError>> {
		const rows = await this.latestPositions();
		if (!rows.ok) return rows;
		const body = [...rows.value.values()]
			.map((p) => `${JSON.stringify(encodePosition(p))}\n`)
			.join("");
		const target = this.path(POSITIONS);
		const next = this.enqueue(async () => {
			await writeFile(`${target}.tmp`, body, "utf-8");
			await rename(`${target}.tmp`, target);
		});
		try {
			await next;
			return ok(rows.value.size);
		} catch (e: unknown) {
			return err(storeError("compact", target, e));
		}
	}

	/** Drains pending writes; later writes fail. */
	async close(): Promise<void> {
		this.closed = true;
		await this.writeQueue.catch(() => {});
	}

	async flush(): Promise<void> {
		await this.writeQueue.catch(() => {});
	}

	/** The last 10 write errors. */
	writeErrors(): readonly Error[] {
		return this._writeErrors;
	}

	// ── Internals ──────────────────────────────────────────────────

	private path(file: string): string {
		return join(this.directory, file);
	}

	private enqueue(write: () => Promise<void>): Promise<void> {
		const prev = this.writeQueue;
		this.writeQueue = prev.catch(() => {}).then(write);
		return this.writeQueue;
	}

	private async append(file: string, row: unknown): Promise<Result<void, TradingError>> {
		const target = this.path(file);
		if (this.closed) {
			return err(new SystemError("FileLedgerStore is closed", { path: target }));
		}
		const line = `${JSON.stringify(row)}\n`;
		try {
			await this.enqueue(() => appendFile(target, line, "utf-8"));
			return ok(undefined);
		} catch (e: unknown) {
			const error = storeError("append to", target, e);
			this._writeErrors.push(error);
			if (this._writeErrors.length > 10) {
				this._writeErrors.shift();
			}
			return err(error);
		}
	}

	private async latestPositions(): Promise<Result<Map<PositionKey, Position>, TradingError>> {
		const rows = await this.readRows(POSITIONS, decodePosition);
		if (!rows.ok) return rows;
		const latest = new Map<PositionKey, Position>();
		for (const row of rows.value) {
			latest.set(positionKey(row.accountId, row.symbol), row);
		}
		return ok(latest);
	}

	private async readRows<T>(
		file: string,
		decode: (row: unknown) => Result<T, TradingError>,
	): Promise<Result<T[], TradingError>> {
		const target = this.path(file);
		await this.flush();
		let content: string;
		try {
			content = await readFile(target, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				return ok([]);
			}
			return err(storeError("read", target, e));
		}

		const rows: T[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");
		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) {
				continue;
			}
			const decoded = parseLine(trimmed, decode);
			if (decoded.ok) {
				rows.push(decoded.value);
			} else {
				corruptLines.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
			}
		}

		if (corruptLines.length > 0) {
			return err(
				new LedgerCorruptionError(`Unreadable rows in ${file}`, {
					path: target,
					lines: corruptLines,
				}),
			);
		}
		return ok(rows);
	}
}

function parseLine<T>(
	line: string,
	decode: (row: unknown) => Result<T, TradingError>,
): Result<T, TradingError | SyntaxError> {
	let row: unknown;
	try {
		row = JSON.parse(line);
	} catch (e: unknown) {
		return err(e instanceof SyntaxError ? e : new SyntaxError(String(e)));
	}
	return decode(row);
}

function storeError(action: string, path: string, e: unknown): SystemError {
	const code = isNodeError(e) ? e.code : "UNKNOWN";
	const msg = e instanceof Error ? e.message : String(e);
	return new SystemError(`FileLedgerStore ${action} ${path} failed: [${code}] ${msg}`, {
		path,
		cause: e,
	});
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

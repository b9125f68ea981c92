/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Prevents passing an OrderId where an AccountId is expected, or a raw
 * contract code where a normalized symbol is.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Brokerage account identifier, opaque to the engine. */
export type AccountId = Brand<string, "AccountId">;
/** Tradable contract code as the broker names it, e.g. "MNQZ5". */
export type SymbolId = Brand<string, "SymbolId">;
/** Broker-assigned order identifier. */
export type OrderId = Brand<string, "OrderId">;
/** Unique fill identifier; duplicates are dropped by the ledger. */
export type FillId = Brand<string, "FillId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

export function accountId(value: string): AccountId {
	return createBrandedId(value, "AccountId");
}

/** Symbols are upper-cased so "mnqz5" and "MNQZ5" address the same position. */
export function symbolId(value: string): SymbolId {
	return createBrandedId(value.toUpperCase(), "SymbolId");
}

export function orderId(value: string): OrderId {
	return createBrandedId(value, "OrderId");
}

export function fillId(value: string): FillId {
	return createBrandedId(value, "FillId");
}

// ── Position key ─────────────────────────────────────────────────────

/** Composite key of one position: one serialized consumer per key. */
export type PositionKey = `${string}:${string}`;

export function positionKey(account: AccountId, sym: SymbolId): PositionKey {
	return `${account}:${sym}`;
}

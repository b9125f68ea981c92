/**
 * Decimal — financial math facade.
 *
 * Every price, tick size, tick value and PnL amount is a Decimal. Contract
 * quantities are plain integers. Internals are delegated to lib/decimal.
 */

import { LibDecimal } from "../lib/decimal/index.js";

export class Decimal {
	private readonly inner: LibDecimal;

	private constructor(inner: LibDecimal) {
		this.inner = inner;
	}

	// ── Factories ──────────────────────────────────────────────────

	static from(value: string | number): Decimal {
		return new Decimal(LibDecimal.from(value));
	}

	static zero(): Decimal {
		return new Decimal(LibDecimal.zero());
	}

	static one(): Decimal {
		return new Decimal(LibDecimal.one());
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.inner.add(other.inner));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.inner.sub(other.inner));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.inner.mul(other.inner));
	}

	/** Multiply by a plain integer, e.g. a contract quantity. */
	times(n: number): Decimal {
		return new Decimal(this.inner.mul(LibDecimal.from(n)));
	}

	div(other: Decimal): Decimal {
		return new Decimal(this.inner.div(other.inner));
	}

	neg(): Decimal {
		return new Decimal(this.inner.neg());
	}

	abs(): Decimal {
		return new Decimal(this.inner.abs());
	}

	/**
	 * Snap to the nearest multiple of `increment` (a tick size).
	 * @example Decimal.from("96.13").roundTo(Decimal.from("0.25")) // 96.25
	 */
	roundTo(increment: Decimal): Decimal {
		return new Decimal(this.inner.div(increment.inner).round().mul(increment.inner));
	}

	/** Whole-number part, truncated toward zero. */
	trunc(): Decimal {
		return new Decimal(this.inner.trunc());
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.inner.eq(other.inner);
	}

	gt(other: Decimal): boolean {
		return this.inner.gt(other.inner);
	}

	gte(other: Decimal): boolean {
		return this.inner.gte(other.inner);
	}

	lt(other: Decimal): boolean {
		return this.inner.lt(other.inner);
	}

	lte(other: Decimal): boolean {
		return this.inner.lte(other.inner);
	}

	isZero(): boolean {
		return this.inner.isZero();
	}

	isPositive(): boolean {
		return this.inner.isPositive();
	}

	isNegative(): boolean {
		return this.inner.isNegative();
	}

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toNumber(): number {
		return this.inner.toNumber();
	}

	toString(): string {
		return this.inner.toString();
	}

	toFixed(places: number): string {
		return this.inner.toFixed(places);
	}

	toJSON(): string {
		return this.toString();
	}
}

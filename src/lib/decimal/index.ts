/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Prices, tick sizes and money amounts flow through this type via the
 * shared/decimal facade; nothing else imports decimal.js-light.
 */
import decimalLight from "decimal.js-light";
import type { Decimal as DecimalValue } from "decimal.js-light";

type DecimalConstructor = typeof DecimalValue;

function isDecimalConstructor(value: unknown): value is DecimalConstructor {
	return typeof value === "function" && "ROUND_HALF_UP" in value;
}

// The ESM build exports the constructor as default; the CommonJS build's
// module.exports is the constructor, which also carries itself as `default`.
function resolveDecimalConstructor(mod: unknown): DecimalConstructor {
	if (isDecimalConstructor(mod)) return mod;
	if (typeof mod === "object" && mod !== null && "default" in mod) {
		const inner: unknown = mod.default;
		if (isDecimalConstructor(inner)) return inner;
	}
	throw new Error("decimal.js-light: Decimal constructor not found");
}

const DecimalLight = resolveDecimalConstructor(decimalLight);

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalValue;

	private constructor(raw: DecimalValue) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("4512.25")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/**
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/**
	 * Rounds to the nearest whole number, halves away from zero.
	 * @example LibDecimal.from("2.5").round() // "3"
	 */
	round(): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(0, DecimalLight.ROUND_HALF_UP));
	}

	/**
	 * Truncates toward zero.
	 * @example LibDecimal.from("-2.7").trunc() // "-2"
	 */
	trunc(): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(0, DecimalLight.ROUND_DOWN));
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("96.500").toString() // "96.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** May lose precision; use for ratios and logging only. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}

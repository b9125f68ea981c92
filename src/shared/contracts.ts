/**
 * Futures contract specifications.
 *
 * Dollar PnL per contract = price move / tickSize * tickValue. Broker symbols
 * carry a month code and year ("MNQZ5", "ESH24"); specs are keyed by root.
 */

import { Decimal } from "./decimal.js";
import type { SymbolId } from "./identifiers.js";

export interface ContractSpec {
	readonly root: string;
	readonly tickSize: Decimal;
	readonly tickValue: Decimal;
}

/** Dollar value of a one-point move for one contract. */
export function pointValue(spec: ContractSpec): Decimal {
	return spec.tickValue.div(spec.tickSize);
}

const BUILT_IN: ReadonlyArray<readonly [string, string, string]> = [
	["MNQ", "0.25", "0.5"],
	["NQ", "0.25", "5"],
	["MES", "0.25", "1.25"],
	["ES", "0.25", "12.5"],
	["M2K", "0.1", "0.5"],
	["RTY", "0.1", "5"],
	["MYM", "1", "0.5"],
	["YM", "1", "5"],
	["MCL", "0.01", "1"],
	["CL", "0.01", "10"],
	["MGC", "0.1", "1"],
	["GC", "0.1", "10"],
];

const MONTH_SUFFIX = /^([A-Z0-9]+?)[FGHJKMNQUVXZ]\d{1,2}$/;

/**
 * Strip a trailing month code and year.
 * @example rootSymbol("MNQZ5") // "MNQ"
 * @example rootSymbol("ES") // "ES"
 */
export function rootSymbol(code: string): string {
	const upper = code.toUpperCase();
	const match = MONTH_SUFFIX.exec(upper);
	return match?.[1] ?? upper;
}

/** Resolves a broker symbol to its contract spec, with a configurable fallback. */
export class ContractBook {
	private readonly specs: Map<string, ContractSpec>;
	private readonly fallback: ContractSpec;

	constructor(overrides: readonly ContractSpec[] = [], fallback?: ContractSpec) {
		this.specs = new Map();
		for (const [root, tickSize, tickValue] of BUILT_IN) {
			this.specs.set(root, {
				root,
				tickSize: Decimal.from(tickSize),
				tickValue: Decimal.from(tickValue),
			});
		}
		for (const spec of overrides) {
			this.specs.set(spec.root.toUpperCase(), spec);
		}
		this.fallback = fallback ?? {
			root: "*",
			tickSize: Decimal.from("0.25"),
			tickValue: Decimal.from("0.5"),
		};
	}

	resolve(sym: SymbolId | string): ContractSpec {
		return this.specs.get(rootSymbol(sym)) ?? this.fallback;
	}

	has(root: string): boolean {
		return this.specs.has(root.toUpperCase());
	}
}

/**
 * Position math — the pure fold from an ordered fill log to a holding.
 *
 * Immutable: every step returns a new Holding. Realized PnL on a reducing
 * fill is booked against the average entry that held at that fill.
 */

import { realizedPnlFor } from "../pnl/pnl-math.js";
import type { ContractSpec } from "../shared/contracts.js";
import { Decimal } from "../shared/decimal.js";
import { type OrderSide, orderSign } from "../shared/side.js";
import { FillRole } from "./types.js";
import type { Fill } from "./types.js";

export interface Holding {
	readonly quantity: number;
	readonly averageEntryPrice: Decimal | null;
	readonly realizedPnl: Decimal;
	readonly openedAt: number | null;
	/** Time of the fill that last brought the quantity to zero */
	readonly closedAt: number | null;
}

export const FLAT_HOLDING: Holding = {
	quantity: 0,
	averageEntryPrice: null,
	realizedPnl: Decimal.zero(),
	openedAt: null,
	closedAt: null,
};

/**
 * What a fill does to a signed quantity.
 * `reverse` closes the position and opens the remainder on the other side.
 */
export type FillEffect = "open" | "add" | "reduce" | "close" | "reverse";

export function classifyFill(
	quantity: number,
	fill: { readonly side: OrderSide; readonly quantity: number },
): FillEffect {
	const next = quantity + orderSign(fill.side) * fill.quantity;
	if (quantity === 0) return "open";
	if (next === 0) return "close";
	if (Math.sign(next) !== Math.sign(quantity)) return "reverse";
	return Math.abs(next) > Math.abs(quantity) ? "add" : "reduce";
}

/** Moves the quantity away from zero or across it. */
export function isGrowth(
	quantity: number,
	fill: { readonly side: OrderSide; readonly quantity: number },
): boolean {
	const effect = classifyFill(quantity, fill);
	return effect === "open" || effect === "add" || effect === "reverse";
}

/** Starts a new lifecycle: the fill opens from flat or reverses through zero. */
export function opensLifecycle(effect: FillEffect): boolean {
	return effect === "open" || effect === "reverse";
}

export function applyFill(holding: Holding, fill: Fill, spec: ContractSpec): Holding {
	const quantity = holding.quantity;
	const next = quantity + orderSign(fill.side) * fill.quantity;
	const avg = holding.averageEntryPrice ?? fill.price;
	const direction = quantity > 0 ? 1 : -1;

	switch (classifyFill(quantity, fill)) {
		case "open":
			return {
				quantity: next,
				averageEntryPrice: fill.price,
				realizedPnl: Decimal.zero(),
				openedAt: fill.timestampMs,
				closedAt: null,
			};
		case "add":
			return {
				...holding,
				quantity: next,
				averageEntryPrice: avg
					.times(Math.abs(quantity))
					.add(fill.price.times(fill.quantity))
					.div(Decimal.from(Math.abs(next))),
			};
		case "reduce":
			return {
				...holding,
				quantity: next,
				realizedPnl: holding.realizedPnl.add(
					realizedPnlFor(avg, fill.price, fill.quantity, direction, spec),
				),
			};
		case "close":
			return {
				...holding,
				quantity: 0,
				averageEntryPrice: null,
				realizedPnl: holding.realizedPnl.add(
					realizedPnlFor(avg, fill.price, fill.quantity, direction, spec),
				),
				closedAt: fill.timestampMs,
			};
		case "reverse":
			return {
				quantity: next,
				averageEntryPrice: fill.price,
				realizedPnl: holding.realizedPnl.add(
					realizedPnlFor(avg, fill.price, Math.abs(quantity), direction, spec),
				),
				openedAt: fill.timestampMs,
				closedAt: null,
			};
	}
}

export function foldFills(fills: readonly Fill[], spec: ContractSpec): Holding {
	let holding = FLAT_HOLDING;
	for (const fill of fills) {
		holding = applyFill(holding, fill, spec);
	}
	return holding;
}

/** Fill ids that appear more than once, in first-repeat order. */
export function duplicateFillIds(fills: readonly Fill[]): string[] {
	const seen = new Set<string>();
	const dupes: string[] = [];
	for (const fill of fills) {
		if (seen.has(fill.fillId)) {
			dupes.push(fill.fillId);
		} else {
			seen.add(fill.fillId);
		}
	}
	return dupes;
}

/**
 * The adjustment in the log that already accounts for a broker fill: booked
 * no earlier than the fill executed, on the same side, and either tagged with
 * the fill's order or untagged with exactly the fill's quantity left.
 * `consumed` holds the quantity of each adjustment already matched.
 */
export function coveringAdjustment(
	log: readonly Fill[],
	consumed: ReadonlyMap<string, number>,
	fill: Fill,
): Fill | null {
	let bySize: Fill | null = null;
	for (const adjustment of log) {
		if (adjustment.role !== FillRole.Adjustment || adjustment.side !== fill.side) continue;
		if (adjustment.timestampMs < fill.timestampMs) continue;
		const left = adjustment.quantity - (consumed.get(adjustment.fillId) ?? 0);
		if (left < fill.quantity) continue;
		if (adjustment.orderId !== null && adjustment.orderId === fill.orderId) return adjustment;
		if (adjustment.orderId === null && left === fill.quantity && bySize === null) {
			bySize = adjustment;
		}
	}
	return bySize;
}

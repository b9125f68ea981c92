/**
 * Pure scale-in decisions: how far price has moved against a position,
 * which rung that reaches, and where the take-profit sits.
 */

import type { ContractSpec } from "../shared/contracts.js";
import type { Decimal } from "../shared/decimal.js";
import { TriggerMode } from "./types.js";
import type { DcaConfig } from "./types.js";

/**
 * Adverse move from the average entry, in the unit of `mode`. Positive
 * means price is against the position. Null when ATR mode has no ATR.
 */
export function adverseExcursion(
	mode: TriggerMode,
	position: { readonly quantity: number; readonly averageEntryPrice: Decimal },
	price: Decimal,
	spec: ContractSpec,
	atr: Decimal | null,
): Decimal | null {
	const move =
		position.quantity > 0
			? position.averageEntryPrice.sub(price)
			: price.sub(position.averageEntryPrice);
	switch (mode) {
		case TriggerMode.Ticks:
			return move.div(spec.tickSize);
		case TriggerMode.Percent:
			return move.div(position.averageEntryPrice).times(100);
		case TriggerMode.Atr:
			return atr === null || !atr.isPositive() ? null : move.div(atr);
	}
}

export type RungDecision =
	| { readonly kind: "fire"; readonly index: number; readonly quantity: number }
	| { readonly kind: "blocked"; readonly index: number; readonly reason: "max_quantity" }
	| { readonly kind: "none" };

/**
 * Walks unfired rungs in index order and returns the first one reached.
 * A reached rung that would take the position past `maxQuantity` blocks
 * the walk: deeper rungs never fire ahead of it.
 */
export function selectRung(
	config: DcaConfig,
	fired: readonly number[],
	absQuantity: number,
	excursion: Decimal,
): RungDecision {
	for (let index = 0; index < config.rungs.length; index++) {
		if (fired.includes(index)) continue;
		const rung = config.rungs[index];
		if (rung === undefined || excursion.lt(rung.distance)) return { kind: "none" };
		if (absQuantity + rung.quantity > config.maxQuantity) {
			return { kind: "blocked", index, reason: "max_quantity" };
		}
		return { kind: "fire", index, quantity: rung.quantity };
	}
	return { kind: "none" };
}

/** Take-profit price `ticks` in the position's favour, on the tick grid. */
export function takeProfitPrice(
	quantity: number,
	averageEntryPrice: Decimal,
	ticks: number,
	spec: ContractSpec,
): Decimal {
	const offset = spec.tickSize.times(ticks);
	const raw = quantity > 0 ? averageEntryPrice.add(offset) : averageEntryPrice.sub(offset);
	return raw.roundTo(spec.tickSize);
}

/** Stop price `ticks` against the position. */
export function stopLossPrice(
	quantity: number,
	averageEntryPrice: Decimal,
	ticks: number,
	spec: ContractSpec,
): Decimal {
	const offset = spec.tickSize.times(ticks);
	return quantity > 0 ? averageEntryPrice.sub(offset) : averageEntryPrice.add(offset);
}

/** Ticks from `price` to `target`, never negative. */
export function ticksBetween(price: Decimal, target: Decimal, spec: ContractSpec): Decimal {
	return target.sub(price).abs().div(spec.tickSize);
}

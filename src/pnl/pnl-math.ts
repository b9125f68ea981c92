/**
 * Dollar PnL for futures contracts.
 *
 * price move × contracts × point value, where point value is
 * tickValue / tickSize for the contract.
 */

import { type ContractSpec, pointValue } from "../shared/contracts.js";
import { Decimal } from "../shared/decimal.js";

/**
 * PnL booked by closing `quantity` contracts entered at `entry`.
 * @param direction +1 when the closed contracts were long, -1 when short
 */
export function realizedPnlFor(
	entry: Decimal,
	exit: Decimal,
	quantity: number,
	direction: 1 | -1,
	spec: ContractSpec,
): Decimal {
	return exit
		.sub(entry)
		.times(quantity * direction)
		.mul(pointValue(spec));
}

/** Open PnL of a signed quantity at `lastPrice`; zero when flat. */
export function unrealizedPnlFor(
	quantity: number,
	averageEntryPrice: Decimal | null,
	lastPrice: Decimal,
	spec: ContractSpec,
): Decimal {
	if (quantity === 0 || averageEntryPrice === null) return Decimal.zero();
	return lastPrice.sub(averageEntryPrice).times(quantity).mul(pointValue(spec));
}

export interface Marks {
	readonly lastPrice: Decimal | null;
	readonly unrealizedPnl: Decimal;
	readonly worstUnrealizedPnl: Decimal;
	readonly bestUnrealizedPnl: Decimal;
}

export const ZERO_MARKS: Marks = {
	lastPrice: null,
	unrealizedPnl: Decimal.zero(),
	worstUnrealizedPnl: Decimal.zero(),
	bestUnrealizedPnl: Decimal.zero(),
};

/**
 * Re-mark at `price`. Worst only ever falls and best only ever rises;
 * a flat position keeps its excursions from the lifecycle that just ended.
 */
export function markToMarket(
	prev: Marks,
	quantity: number,
	averageEntryPrice: Decimal | null,
	price: Decimal,
	spec: ContractSpec,
): Marks {
	if (quantity === 0) {
		return { ...prev, lastPrice: price, unrealizedPnl: Decimal.zero() };
	}
	const unrealized = unrealizedPnlFor(quantity, averageEntryPrice, price, spec);
	return {
		lastPrice: price,
		unrealizedPnl: unrealized,
		worstUnrealizedPnl: Decimal.min(prev.worstUnrealizedPnl, unrealized),
		bestUnrealizedPnl: Decimal.max(prev.bestUnrealizedPnl, unrealized),
	};
}

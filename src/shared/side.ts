/**
 * Position and order sides.
 *
 * A position is long, short or flat; an order buys or sells. Signed
 * quantities are positive for long, negative for short.
 */

export const PositionSide = {
	Long: "long",
	Short: "short",
	Flat: "flat",
} as const;

export type PositionSide = (typeof PositionSide)[keyof typeof PositionSide];

/** A side a position can be opened on. */
export type OpenSide = Exclude<PositionSide, "flat">;

export const OrderSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

/** +1 for long, -1 for short, 0 for flat. */
export function sideSign(side: PositionSide): 1 | -1 | 0 {
	switch (side) {
		case PositionSide.Long:
			return 1;
		case PositionSide.Short:
			return -1;
		case PositionSide.Flat:
			return 0;
	}
}

export function sideOfQuantity(quantity: number): PositionSide {
	if (quantity > 0) return PositionSide.Long;
	if (quantity < 0) return PositionSide.Short;
	return PositionSide.Flat;
}

/** +1 for buy, -1 for sell. */
export function orderSign(side: OrderSide): 1 | -1 {
	return side === OrderSide.Buy ? 1 : -1;
}

/** The order side that adds to a position on `side`. */
export function entryOrderSide(side: OpenSide): OrderSide {
	return side === PositionSide.Long ? OrderSide.Buy : OrderSide.Sell;
}

/** The order side that reduces a signed quantity toward zero. */
export function closingOrderSide(quantity: number): OrderSide {
	return quantity > 0 ? OrderSide.Sell : OrderSide.Buy;
}

/**
 * Broker-facing types: order intents, the capability object the engine calls,
 * and the events a broker pushes back.
 */

import type { SessionToken } from "../auth/session-token.js";
import type { Decimal } from "../shared/decimal.js";
import { ConflictingIntentError } from "../shared/errors.js";
import type { AccountId, FillId, OrderId, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { OrderSide } from "../shared/side.js";

// ── Order intent ─────────────────────────────────────────────────────

export const OrderType = {
	Market: "market",
	Limit: "limit",
} as const;

export type OrderType = (typeof OrderType)[keyof typeof OrderType];

export const OrderPurpose = {
	Entry: "entry",
	TakeProfit: "takeProfit",
	StopLoss: "stopLoss",
	DcaEntry: "dcaEntry",
	Exit: "exit",
} as const;

export type OrderPurpose = (typeof OrderPurpose)[keyof typeof OrderPurpose];

interface IntentBase {
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly side: OrderSide;
	/** Contracts, always a positive integer */
	readonly quantity: number;
}

/** Exits have no limit variant: a resting exit can be stranded by a gap. */
export interface ExitOrderIntent extends IntentBase {
	readonly purpose: "exit";
	readonly type: "market";
}

export interface MarketOrderIntent extends IntentBase {
	readonly purpose: Exclude<OrderPurpose, "exit">;
	readonly type: "market";
}

export interface LimitOrderIntent extends IntentBase {
	readonly purpose: Exclude<OrderPurpose, "exit">;
	readonly type: "limit";
	readonly price: Decimal;
}

export type OrderIntent = ExitOrderIntent | MarketOrderIntent | LimitOrderIntent;

/** Loosely shaped request, as an adapter or caller might build it. */
export interface OrderRequest {
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly side: OrderSide;
	readonly quantity: number;
	readonly purpose: OrderPurpose;
	readonly type?: OrderType;
	readonly price?: Decimal;
}

/**
 * Build a well-formed intent. Any exit becomes a market order whatever
 * type was asked for; limits require a price.
 */
export function createOrderIntent(req: OrderRequest): Result<OrderIntent, ConflictingIntentError> {
	if (!Number.isInteger(req.quantity) || req.quantity <= 0) {
		return err(
			new ConflictingIntentError(`Order quantity must be a positive integer, got ${req.quantity}`, {
				accountId: req.accountId,
				symbol: req.symbol,
			}),
		);
	}
	const base: IntentBase = {
		accountId: req.accountId,
		symbol: req.symbol,
		side: req.side,
		quantity: req.quantity,
	};
	if (req.purpose === OrderPurpose.Exit) {
		return ok({ ...base, purpose: "exit", type: "market" });
	}
	if (req.type === OrderType.Limit) {
		if (req.price === undefined || !req.price.isPositive()) {
			return err(
				new ConflictingIntentError("Limit order requires a positive price", {
					accountId: req.accountId,
					symbol: req.symbol,
					purpose: req.purpose,
				}),
			);
		}
		return ok({ ...base, purpose: req.purpose, type: "limit", price: req.price });
	}
	return ok({ ...base, purpose: req.purpose, type: "market" });
}

export function isLimitIntent(intent: OrderIntent): intent is LimitOrderIntent {
	return intent.type === OrderType.Limit;
}

// ── Broker capability ────────────────────────────────────────────────

export interface PlacedOrder {
	readonly orderId: OrderId;
}

export interface BrokerPosition {
	/** Signed: positive long, negative short */
	readonly quantity: number;
	readonly averagePrice?: Decimal;
}

export interface BrokerFill {
	readonly fillId: FillId;
	readonly orderId: OrderId;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly side: OrderSide;
	readonly quantity: number;
	readonly price: Decimal;
	readonly timestampMs: number;
}

/**
 * What a broker adapter must provide. Implementations throw on failure;
 * the gateway classifies and wraps. `queryFills` is optional because not
 * every broker exposes fill history.
 */
export interface BrokerApi {
	placeOrder(intent: OrderIntent): Promise<PlacedOrder>;
	cancelOrder(accountId: AccountId, orderId: OrderId): Promise<void>;
	queryPosition(accountId: AccountId, symbol: SymbolId): Promise<BrokerPosition>;
	/** Working (resting) orders for the symbol */
	queryOrders(accountId: AccountId, symbol: SymbolId): Promise<readonly OrderId[]>;
	queryFills?(accountId: AccountId, symbol: SymbolId): Promise<readonly BrokerFill[]>;
}

export const BrokerEnvironment = {
	Simulated: "simulated",
	Live: "live",
} as const;

export type BrokerEnvironment = (typeof BrokerEnvironment)[keyof typeof BrokerEnvironment];

/** An account plus the session that authorizes calls against it. */
export interface BrokerAccount {
	readonly accountId: AccountId;
	readonly sessionToken: SessionToken;
	readonly environment: BrokerEnvironment;
	readonly api: BrokerApi;
}

// ── Push events ──────────────────────────────────────────────────────

export const OrderStatus = {
	Working: "working",
	Filled: "filled",
	Canceled: "canceled",
	Rejected: "rejected",
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export type BrokerEvent =
	| { readonly type: "fill"; readonly fill: BrokerFill }
	| {
			readonly type: "position_snapshot";
			readonly accountId: AccountId;
			readonly symbol: SymbolId;
			readonly quantity: number;
	  }
	| {
			readonly type: "order_rejected";
			readonly accountId: AccountId;
			readonly orderId: OrderId;
			readonly reason: string;
	  }
	| {
			readonly type: "order_status";
			readonly accountId: AccountId;
			readonly orderId: OrderId;
			readonly status: OrderStatus;
	  };

export type BrokerEventHandler = (event: BrokerEvent) => void;

/**
 * OrderRegistry — what the engine has sent to the broker.
 *
 * Maps a broker order id back to its (account, symbol) and purpose, so a
 * fill or rejection event can be routed and attributed. Indexed by
 * position key; terminal orders are dropped after a TTL.
 */

import type { Decimal } from "../shared/decimal.js";
import type { AccountId, OrderId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { positionKey } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { OrderStatus } from "./types.js";
import type { OrderPurpose, OrderType } from "./types.js";

export interface TrackedOrder {
	readonly orderId: OrderId;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly purpose: OrderPurpose;
	readonly side: OrderSide;
	readonly quantity: number;
	readonly type: OrderType;
	readonly price: Decimal | null;
	readonly placedAtMs: number;
	readonly status: OrderStatus;
}

function isTerminal(status: OrderStatus): boolean {
	return status !== OrderStatus.Working;
}

export class OrderRegistry {
	private readonly orders = new Map<string, TrackedOrder>();
	private readonly byPosition = new Map<PositionKey, string[]>();
	private readonly terminalAtMs = new Map<string, number>();
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
	}

	/** Ignores an id that is already tracked; the first record wins. */
	track(order: Omit<TrackedOrder, "status" | "placedAtMs">): TrackedOrder {
		const existing = this.orders.get(order.orderId);
		if (existing !== undefined) return existing;

		const tracked: TrackedOrder = {
			...order,
			placedAtMs: this.clock.now(),
			status: OrderStatus.Working,
		};
		this.orders.set(order.orderId, tracked);

		const key = positionKey(order.accountId, order.symbol);
		const ids = this.byPosition.get(key) ?? [];
		this.byPosition.set(key, [...ids, order.orderId]);
		return tracked;
	}

	get(orderId: OrderId): TrackedOrder | null {
		return this.orders.get(orderId) ?? null;
	}

	/** Terminal statuses are sticky: a late "working" echo never revives an order. */
	updateStatus(orderId: OrderId, status: OrderStatus): TrackedOrder | null {
		const order = this.orders.get(orderId);
		if (order === undefined) return null;
		if (isTerminal(order.status)) return order;

		const updated: TrackedOrder = { ...order, status };
		this.orders.set(orderId, updated);
		if (isTerminal(status)) {
			this.terminalAtMs.set(orderId, this.clock.now());
		}
		return updated;
	}

	/** Working orders for a position, optionally of one purpose. */
	working(accountId: AccountId, symbol: SymbolId, purpose?: OrderPurpose): readonly TrackedOrder[] {
		const ids = this.byPosition.get(positionKey(accountId, symbol)) ?? [];
		return ids
			.map((id) => this.orders.get(id))
			.filter(
				(o): o is TrackedOrder =>
					o !== undefined &&
					o.status === OrderStatus.Working &&
					(purpose === undefined || o.purpose === purpose),
			);
	}

	activeCount(): number {
		let count = 0;
		for (const order of this.orders.values()) {
			if (!isTerminal(order.status)) count++;
		}
		return count;
	}

	/**
	 * Removes terminal orders older than `ttlMs`.
	 * @returns Number of orders removed
	 */
	cleanup(ttlMs: number): number {
		const now = this.clock.now();
		let cleaned = 0;

		for (const [id, terminalAt] of this.terminalAtMs.entries()) {
			if (now - terminalAt < ttlMs) continue;
			const order = this.orders.get(id);
			this.orders.delete(id);
			this.terminalAtMs.delete(id);
			if (order !== undefined) {
				const key = positionKey(order.accountId, order.symbol);
				const remaining = (this.byPosition.get(key) ?? []).filter((k) => k !== id);
				if (remaining.length === 0) {
					this.byPosition.delete(key);
				} else {
					this.byPosition.set(key, remaining);
				}
			}
			cleaned++;
		}
		return cleaned;
	}
}

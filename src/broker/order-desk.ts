/**
 * OrderDesk — submits orders through the gateway and keeps the registry
 * in step, so fill and rejection events can be routed back.
 */

import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { isNotFoundError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, OrderId, SymbolId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { BrokerGateway, CallOptions } from "./broker-gateway.js";
import type { OrderRegistry, TrackedOrder } from "./order-registry.js";
import { OrderStatus, createOrderIntent } from "./types.js";
import type { OrderPurpose, OrderRequest } from "./types.js";

export interface CancelFailure {
	readonly orderId: OrderId;
	readonly error: TradingError;
}

export interface CancelReport {
	/** Cancelled now, or already gone at the broker */
	readonly cancelled: readonly OrderId[];
	readonly failed: readonly CancelFailure[];
	/** Set when the broker's working-order list could not be read */
	readonly queryError: TradingError | null;
}

export class OrderDesk {
	private readonly gateway: BrokerGateway;
	private readonly registry: OrderRegistry;
	private readonly logger: Logger;

	constructor(gateway: BrokerGateway, registry: OrderRegistry, logger?: Logger) {
		this.gateway = gateway;
		this.registry = registry;
		this.logger = (logger ?? createSilentLogger()).child({ component: "order-desk" });
	}

	/** Places an order and tracks it under its purpose. Never retried. */
	async submit(
		request: OrderRequest,
		options: CallOptions = {},
	): Promise<Result<TrackedOrder, TradingError>> {
		const intent = createOrderIntent(request);
		if (!intent.ok) return intent;
		const placed = await this.gateway.placeOrder(intent.value, options);
		if (!placed.ok) return placed;

		const value = intent.value;
		return ok(
			this.registry.track({
				orderId: placed.value.orderId,
				accountId: value.accountId,
				symbol: value.symbol,
				purpose: value.purpose,
				side: value.side,
				quantity: value.quantity,
				type: value.type,
				price: value.type === "limit" ? value.price : null,
			}),
		);
	}

	/** Tracked orders still working for the position, optionally of one purpose. */
	working(accountId: AccountId, symbol: SymbolId, purpose?: OrderPurpose): readonly TrackedOrder[] {
		return this.registry.working(accountId, symbol, purpose);
	}

	/**
	 * Cancels every working order for the position: those the broker lists
	 * plus those the registry still holds. All cancels go out in parallel.
	 */
	async cancelAll(
		accountId: AccountId,
		symbol: SymbolId,
		options: CallOptions = {},
	): Promise<CancelReport> {
		const listed = await this.gateway.queryOrders(accountId, symbol, options);
		const ids = new Set<OrderId>(this.registry.working(accountId, symbol).map((o) => o.orderId));
		if (listed.ok) {
			for (const id of listed.value) ids.add(id);
		} else {
			this.logger.warn(
				{ accountId, symbol, error: listed.error.message },
				"working orders unavailable, cancelling tracked orders only",
			);
		}
		const report = await this.cancelEach(accountId, [...ids], options);
		return { ...report, queryError: listed.ok ? null : listed.error };
	}

	/** Cancels the tracked working orders of one purpose. */
	async cancelPurpose(
		accountId: AccountId,
		symbol: SymbolId,
		purpose: OrderPurpose,
	): Promise<CancelReport> {
		const ids = this.registry.working(accountId, symbol, purpose).map((o) => o.orderId);
		const report = await this.cancelEach(accountId, ids);
		return { ...report, queryError: null };
	}

	private async cancelEach(
		accountId: AccountId,
		ids: readonly OrderId[],
		options: CallOptions = {},
	): Promise<Omit<CancelReport, "queryError">> {
		const results = await Promise.all(
			ids.map(async (orderId) => ({
				orderId,
				result: await this.gateway.cancelOrder(accountId, orderId, options),
			})),
		);
		const cancelled: OrderId[] = [];
		const failed: CancelFailure[] = [];
		for (const { orderId, result } of results) {
			if (result.ok || isNotFoundError(result.error)) {
				this.registry.updateStatus(orderId, OrderStatus.Canceled);
				cancelled.push(orderId);
			} else {
				this.logger.warn({ accountId, orderId, error: result.error.message }, "cancel failed");
				failed.push({ orderId, error: result.error });
			}
		}
		return { cancelled, failed };
	}
}

/**
 * PaperBroker — in-process simulated broker behind the BrokerApi interface.
 *
 * Market orders fill at the last price set with `setPrice()`; the broker
 * position changes when the order is accepted, and the fill reaches
 * subscribers later, the way a push stream delivers it. Limit orders rest
 * until the price crosses them. Test hooks script rejections, stalled
 * fills, query failures and out-of-band position changes.
 */

import { Decimal } from "../shared/decimal.js";
import { NetworkError, NotFoundError, RejectError } from "../shared/errors.js";
import type { AccountId, OrderId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { fillId, orderId, positionKey } from "../shared/identifiers.js";
import { OrderSide, orderSign } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { OrderStatus, OrderType } from "./types.js";
import type {
	BrokerApi,
	BrokerEvent,
	BrokerEventHandler,
	BrokerFill,
	BrokerPosition,
	OrderIntent,
	PlacedOrder,
} from "./types.js";

export interface PaperBrokerConfig {
	readonly clock: Clock;
	/** Delay before fill and status events reach subscribers */
	readonly eventDelayMs: number;
}

interface PaperPosition {
	quantity: number;
	averagePrice: Decimal | null;
}

interface WorkingOrder {
	readonly orderId: OrderId;
	readonly intent: OrderIntent;
}

export class PaperBroker implements BrokerApi {
	private readonly config: PaperBrokerConfig;
	private readonly positions = new Map<PositionKey, PaperPosition>();
	private readonly prices = new Map<string, Decimal>();
	private readonly working = new Map<string, WorkingOrder>();
	private readonly fillLog: BrokerFill[] = [];
	private readonly handlers: BrokerEventHandler[] = [];
	private readonly rejections: string[] = [];
	private readonly asyncRejections: string[] = [];
	private stalledMarkets = 0;
	private failingQueries = 0;
	private orderCounter = 0;
	private fillCounter = 0;

	/** Every intent accepted or rejected, in submission order. */
	readonly submitted: OrderIntent[] = [];
	readonly cancelled: OrderId[] = [];

	constructor(config?: Partial<PaperBrokerConfig>) {
		this.config = {
			clock: config?.clock ?? SystemClock,
			eventDelayMs: config?.eventDelayMs ?? 0,
		};
	}

	// ── Push stream ────────────────────────────────────────────────

	subscribe(handler: BrokerEventHandler): () => void {
		this.handlers.push(handler);
		return () => {
			const i = this.handlers.indexOf(handler);
			if (i >= 0) this.handlers.splice(i, 1);
		};
	}

	// ── Market ─────────────────────────────────────────────────────

	/** Sets the last price and fills any resting limit it crosses. */
	setPrice(symbol: SymbolId, price: Decimal): void {
		this.prices.set(symbol, price);
		for (const order of [...this.working.values()]) {
			const { intent } = order;
			if (intent.symbol !== symbol || intent.type !== OrderType.Limit) continue;
			const crossed =
				intent.side === OrderSide.Buy ? price.lte(intent.price) : price.gte(intent.price);
			if (crossed) {
				this.working.delete(order.orderId);
				this.execute(order.orderId, intent, intent.price);
			}
		}
	}

	// ── Test hooks ─────────────────────────────────────────────────

	/** The next placeOrder call throws RejectError. */
	rejectNext(reason = "Order rejected by broker"): void {
		this.rejections.push(reason);
	}

	/** The next order is accepted, then rejected through the push stream. */
	rejectNextAsync(reason = "Order rejected by broker"): void {
		this.asyncRejections.push(reason);
	}

	/** The next `count` market orders are accepted but never fill until released. */
	stallMarketOrders(count = 1): void {
		this.stalledMarkets += count;
	}

	/** Fills every stalled market order at the current price. */
	releaseStalled(): void {
		for (const order of [...this.working.values()]) {
			if (order.intent.type !== OrderType.Market) continue;
			const price = this.prices.get(order.intent.symbol);
			if (price === undefined) continue;
			this.working.delete(order.orderId);
			this.execute(order.orderId, order.intent, price);
		}
	}

	/** The next `count` queries throw a retryable NetworkError. */
	failQueries(count: number): void {
		this.failingQueries += count;
	}

	/** Changes the broker position without a fill, as a manual trade elsewhere would. */
	setPosition(
		accountId: AccountId,
		symbol: SymbolId,
		quantity: number,
		averagePrice?: Decimal,
	): void {
		this.positions.set(positionKey(accountId, symbol), {
			quantity,
			averagePrice: quantity === 0 ? null : (averagePrice ?? this.prices.get(symbol) ?? null),
		});
	}

	/** Pushes a position snapshot for the current broker quantity. */
	pushSnapshot(accountId: AccountId, symbol: SymbolId): void {
		this.emit({
			type: "position_snapshot",
			accountId,
			symbol,
			quantity: this.position(accountId, symbol).quantity,
		});
	}

	// ── BrokerApi ──────────────────────────────────────────────────

	async placeOrder(intent: OrderIntent): Promise<PlacedOrder> {
		this.submitted.push(intent);
		const reason = this.rejections.shift();
		if (reason !== undefined) {
			throw new RejectError(reason, { symbol: intent.symbol, purpose: intent.purpose });
		}

		this.orderCounter++;
		const id = orderId(`paper-${this.orderCounter}`);

		const asyncReason = this.asyncRejections.shift();
		if (asyncReason !== undefined) {
			this.emitLater({
				type: "order_rejected",
				accountId: intent.accountId,
				orderId: id,
				reason: asyncReason,
			});
			return { orderId: id };
		}

		if (intent.type === OrderType.Limit) {
			this.working.set(id, { orderId: id, intent });
			const last = this.prices.get(intent.symbol);
			if (last !== undefined) this.setPrice(intent.symbol, last);
			return { orderId: id };
		}

		const price = this.prices.get(intent.symbol);
		if (price === undefined) {
			throw new RejectError(`No market for ${intent.symbol}`, { symbol: intent.symbol });
		}
		if (this.stalledMarkets > 0) {
			this.stalledMarkets--;
			this.working.set(id, { orderId: id, intent });
			return { orderId: id };
		}
		this.execute(id, intent, price);
		return { orderId: id };
	}

	async cancelOrder(accountId: AccountId, id: OrderId): Promise<void> {
		const order = this.working.get(id);
		if (order === undefined || order.intent.accountId !== accountId) {
			throw new NotFoundError(`Order ${id} not found`, { orderId: id });
		}
		this.working.delete(id);
		this.cancelled.push(id);
		this.emitLater({ type: "order_status", accountId, orderId: id, status: OrderStatus.Canceled });
	}

	async queryPosition(accountId: AccountId, symbol: SymbolId): Promise<BrokerPosition> {
		this.maybeFailQuery("queryPosition");
		const pos = this.position(accountId, symbol);
		return pos.averagePrice === null
			? { quantity: pos.quantity }
			: { quantity: pos.quantity, averagePrice: pos.averagePrice };
	}

	async queryOrders(accountId: AccountId, symbol: SymbolId): Promise<readonly OrderId[]> {
		this.maybeFailQuery("queryOrders");
		return [...this.working.values()]
			.filter((o) => o.intent.accountId === accountId && o.intent.symbol === symbol)
			.map((o) => o.orderId);
	}

	async queryFills(accountId: AccountId, symbol: SymbolId): Promise<readonly BrokerFill[]> {
		this.maybeFailQuery("queryFills");
		return this.fillLog.filter((f) => f.accountId === accountId && f.symbol === symbol);
	}

	// ── Internals ──────────────────────────────────────────────────

	workingOrderCount(): number {
		return this.working.size;
	}

	private position(accountId: AccountId, symbol: SymbolId): PaperPosition {
		const held = this.positions.get(positionKey(accountId, symbol));
		return held ?? { quantity: 0, averagePrice: null };
	}

	private execute(id: OrderId, intent: OrderIntent, price: Decimal): void {
		const key = positionKey(intent.accountId, intent.symbol);
		const current = this.position(intent.accountId, intent.symbol);
		const delta = intent.quantity * orderSign(intent.side);
		const next = current.quantity + delta;

		let averagePrice: Decimal | null;
		if (next === 0) {
			averagePrice = null;
		} else if (current.quantity === 0 || Math.sign(next) !== Math.sign(current.quantity)) {
			averagePrice = price;
		} else if (Math.abs(next) > Math.abs(current.quantity) && current.averagePrice !== null) {
			averagePrice = current.averagePrice
				.times(Math.abs(current.quantity))
				.add(price.times(intent.quantity))
				.div(Decimal.from(Math.abs(next)));
		} else {
			averagePrice = current.averagePrice;
		}
		this.positions.set(key, { quantity: next, averagePrice });

		this.fillCounter++;
		const fill: BrokerFill = {
			fillId: fillId(`pf-${this.fillCounter}`),
			orderId: id,
			accountId: intent.accountId,
			symbol: intent.symbol,
			side: intent.side,
			quantity: intent.quantity,
			price,
			timestampMs: this.config.clock.now(),
		};
		this.fillLog.push(fill);
		this.emitLater({ type: "fill", fill });
		this.emitLater({
			type: "order_status",
			accountId: intent.accountId,
			orderId: id,
			status: OrderStatus.Filled,
		});
	}

	private maybeFailQuery(call: string): void {
		if (this.failingQueries > 0) {
			this.failingQueries--;
			throw new NetworkError(`Paper broker ${call} unavailable`);
		}
	}

	private emitLater(event: BrokerEvent): void {
		setTimeout(() => this.emit(event), this.config.eventDelayMs);
	}

	private emit(event: BrokerEvent): void {
		for (const handler of [...this.handlers]) {
			handler(event);
		}
	}
}

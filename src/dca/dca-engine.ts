/**
 * DCA Engine — scales an open position in at configured adverse rungs and
 * keeps its resting take-profit at the current average.
 *
 * Runs inside the position's serialized loop. A rung is persisted as fired
 * before its order is sent and is never rolled back: a rejected scale-in is
 * surfaced as an alert, not retried.
 */

import type { OrderDesk } from "../broker/order-desk.js";
import { OrderPurpose, OrderType } from "../broker/types.js";
import type { AlertDispatcher } from "../events/alert-dispatcher.js";
import { AlertSeverity } from "../events/alerts.js";
import { ExitState } from "../exit/exit-state.js";
import type { PositionLedger } from "../ledger/position-ledger.js";
import type { Position } from "../ledger/types.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import type { PriceFeed } from "../market/price-feed.js";
import { ContractBook } from "../shared/contracts.js";
import { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, OrderId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { PositionSide, closingOrderSide, entryOrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { adverseExcursion, selectRung, takeProfitPrice, ticksBetween } from "./trigger.js";

export interface DcaEngineConfig {
	readonly ledger: PositionLedger;
	readonly desk: OrderDesk;
	readonly prices: PriceFeed;
	readonly alerts: AlertDispatcher;
	/** A take-profit closer than this to the last price is not placed */
	readonly takeProfitMinTicks: number;
	readonly contracts?: ContractBook;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export type DcaSkipReason =
	| "flat"
	| "no_config"
	| "exit_in_flight"
	| "flattening"
	| "halted"
	| "attention"
	| "no_atr";

export type DcaOutcome =
	| { readonly kind: "skipped"; readonly reason: DcaSkipReason }
	| { readonly kind: "none" }
	| { readonly kind: "blocked"; readonly index: number }
	| { readonly kind: "fired"; readonly index: number; readonly orderId: OrderId }
	| { readonly kind: "rejected"; readonly index: number; readonly error: TradingError }
	| { readonly kind: "failed"; readonly index: number; readonly error: TradingError };

export type TakeProfitOutcome =
	| { readonly kind: "placed"; readonly orderId: OrderId; readonly price: Decimal }
	| { readonly kind: "skipped"; readonly reason: string }
	| { readonly kind: "failed"; readonly error: TradingError };

export class DcaEngine {
	private readonly ledger: PositionLedger;
	private readonly desk: OrderDesk;
	private readonly prices: PriceFeed;
	private readonly alerts: AlertDispatcher;
	private readonly takeProfitMinTicks: number;
	private readonly contracts: ContractBook;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly atrWarned = new Set<PositionKey>();
	private readonly blockedLogged = new Map<PositionKey, number>();
	/** Scale-in orders still open, by the rung that sent them */
	private readonly rungOrders = new Map<OrderId, number>();

	constructor(config: DcaEngineConfig) {
		this.ledger = config.ledger;
		this.desk = config.desk;
		this.prices = config.prices;
		this.alerts = config.alerts;
		this.takeProfitMinTicks = config.takeProfitMinTicks;
		this.contracts = config.contracts ?? new ContractBook();
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? createSilentLogger()).child({ component: "dca" });
	}

	/** Evaluates the rungs at `price`. Fires at most one. */
	async onTick(accountId: AccountId, symbol: SymbolId, price: Decimal): Promise<DcaOutcome> {
		const position = this.ledger.currentPosition(accountId, symbol);
		const skip = skipReason(position);
		if (skip !== null) return { kind: "skipped", reason: skip };
		const { dcaConfig, averageEntryPrice } = position;
		if (dcaConfig === null || averageEntryPrice === null) {
			return { kind: "skipped", reason: "no_config" };
		}

		const key = positionKey(accountId, symbol);
		const spec = this.contracts.resolve(symbol);
		const excursion = adverseExcursion(
			dcaConfig.triggerMode,
			{ quantity: position.quantity, averageEntryPrice },
			price,
			spec,
			this.prices.atr(symbol),
		);
		if (excursion === null) {
			if (!this.atrWarned.has(key)) {
				this.atrWarned.add(key);
				this.logger.warn({ accountId, symbol }, "ATR rungs skipped: no ATR for symbol yet");
			}
			return { kind: "skipped", reason: "no_atr" };
		}
		this.atrWarned.delete(key);

		const decision = selectRung(
			dcaConfig,
			position.dcaTriggeredIndices,
			Math.abs(position.quantity),
			excursion,
		);
		if (decision.kind === "none") return decision;
		if (decision.kind === "blocked") {
			if (this.blockedLogged.get(key) !== decision.index) {
				this.blockedLogged.set(key, decision.index);
				this.logger.info(
					{ accountId, symbol, rung: decision.index, maxQuantity: dcaConfig.maxQuantity },
					"rung reached but blocked by max quantity",
				);
			}
			return { kind: "blocked", index: decision.index };
		}
		this.blockedLogged.delete(key);
		return this.fire(position, decision.index, decision.quantity, price);
	}

	/**
	 * Replaces the resting take-profit after the position grew. Skipped when
	 * the target is already within `takeProfitMinTicks` of the last price:
	 * the exit conditions take that case with a market exit.
	 */
	async replaceTakeProfit(accountId: AccountId, symbol: SymbolId): Promise<TakeProfitOutcome> {
		const position = this.ledger.currentPosition(accountId, symbol);
		const skip = skipReason(position);
		if (skip !== null) return { kind: "skipped", reason: skip };
		const ticks = position.dcaConfig?.takeProfitTicks ?? null;
		if (ticks === null || position.averageEntryPrice === null) {
			return { kind: "skipped", reason: "no_take_profit" };
		}

		await this.desk.cancelPurpose(accountId, symbol, OrderPurpose.TakeProfit);

		const spec = this.contracts.resolve(symbol);
		const target = takeProfitPrice(position.quantity, position.averageEntryPrice, ticks, spec);
		const last = this.prices.lastPrice(symbol) ?? position.lastPrice;
		if (last !== null) {
			const reached = position.quantity > 0 ? last.gte(target) : last.lte(target);
			const tooClose = ticksBetween(last, target, spec).lt(Decimal.from(this.takeProfitMinTicks));
			if (reached || tooClose) {
				this.logger.info(
					{ accountId, symbol, target: target.toString(), last: last.toString() },
					"take-profit not placed: marketable at the last price",
				);
				return { kind: "skipped", reason: "marketable" };
			}
		}

		const placed = await this.desk.submit({
			accountId,
			symbol,
			side: closingOrderSide(position.quantity),
			quantity: Math.abs(position.quantity),
			purpose: OrderPurpose.TakeProfit,
			type: OrderType.Limit,
			price: target,
		});
		if (!placed.ok) {
			this.logger.warn(
				{ accountId, symbol, code: placed.error.code, error: placed.error.message },
				"take-profit placement failed",
			);
			await this.ledger.setLastError(accountId, symbol, placed.error.message);
			return { kind: "failed", error: placed.error };
		}
		this.logger.info(
			{ accountId, symbol, orderId: placed.value.orderId, price: target.toString() },
			"take-profit placed",
		);
		return { kind: "placed", orderId: placed.value.orderId, price: target };
	}

	private async fire(
		position: Position,
		index: number,
		quantity: number,
		price: Decimal,
	): Promise<DcaOutcome> {
		const { accountId, symbol } = position;
		const marked = await this.ledger.markRungFired(accountId, symbol, index);
		if (!marked.ok) {
			this.logger.error(
				{ accountId, symbol, rung: index, error: marked.error.message },
				"rung not persisted, scale-in not sent",
			);
			return { kind: "failed", index, error: marked.error };
		}

		const side = position.side === PositionSide.Short ? PositionSide.Short : PositionSide.Long;
		const placed = await this.desk.submit({
			accountId,
			symbol,
			side: entryOrderSide(side),
			quantity,
			purpose: OrderPurpose.DcaEntry,
			type: OrderType.Market,
		});
		if (!placed.ok) {
			await this.scaleInRejected(accountId, symbol, index, placed.error.message);
			return { kind: "rejected", index, error: placed.error };
		}
		this.rungOrders.set(placed.value.orderId, index);

		this.logger.info(
			{
				accountId,
				symbol,
				rung: index,
				quantity,
				price: price.toString(),
				orderId: placed.value.orderId,
			},
			"scale-in sent",
		);
		await this.desk.cancelPurpose(accountId, symbol, OrderPurpose.TakeProfit);
		return { kind: "fired", index, orderId: placed.value.orderId };
	}

	/** A scale-in the broker accepted, then rejected. Its rung stays fired. */
	async onOrderRejected(
		accountId: AccountId,
		symbol: SymbolId,
		orderId: OrderId,
		reason: string,
	): Promise<void> {
		const index = this.rungOrders.get(orderId);
		if (index === undefined) return;
		this.rungOrders.delete(orderId);
		await this.scaleInRejected(accountId, symbol, index, reason);
	}

	/** The scale-in's order filled or ended; stop tracking it. */
	forget(orderId: OrderId): void {
		this.rungOrders.delete(orderId);
	}

	private async scaleInRejected(
		accountId: AccountId,
		symbol: SymbolId,
		index: number,
		reason: string,
	): Promise<void> {
		this.logger.warn(
			{ accountId, symbol, rung: index, reason },
			"scale-in rejected; rung stays fired",
		);
		await this.ledger.setLastError(accountId, symbol, reason);
		this.alerts.emit({
			type: "scale_in_rejected",
			timestamp: this.clock.now(),
			severity: AlertSeverity.Warning,
			accountId,
			symbol,
			rungIndex: index,
			reason,
		});
	}
}

function skipReason(position: Position): DcaSkipReason | null {
	if (position.quantity === 0) return "flat";
	if (position.exitState !== ExitState.Idle) return "exit_in_flight";
	if (position.flattening) return "flattening";
	if (position.halted !== null) return "halted";
	if (position.attention !== null) return "attention";
	if (position.dcaConfig === null) return "no_config";
	return null;
}

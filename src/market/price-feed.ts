/**
 * PriceFeed — normalizes pushed ticks into a per-symbol last-price table.
 *
 * Also derives ATR from one-minute bars for ATR-mode scale-in rungs,
 * unless a value has been pushed with `setAtr`.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Decimal } from "../shared/decimal.js";
import type { SymbolId } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { calcATR } from "./atr.js";
import { BarAggregator } from "./bar-aggregator.js";

export interface Quote {
	readonly symbol: SymbolId;
	readonly price: Decimal;
	readonly timestampMs: number;
}

export type PriceFeedEvents = {
	tick: (quote: Quote) => void;
};

export interface PriceFeedConfig {
	readonly clock: Clock;
	readonly atrPeriod: number;
	readonly barIntervalMs: number;
}

interface SymbolState {
	last: Quote | null;
	pushedAtr: Decimal | null;
	readonly bars: BarAggregator;
}

export class PriceFeed extends TypedEmitter<PriceFeedEvents> {
	private readonly config: PriceFeedConfig;
	private readonly symbols = new Map<SymbolId, SymbolState>();

	constructor(config: Partial<PriceFeedConfig> = {}) {
		super();
		this.config = {
			clock: config.clock ?? SystemClock,
			atrPeriod: config.atrPeriod ?? 14,
			barIntervalMs: config.barIntervalMs ?? 60_000,
		};
	}

	/**
	 * Records a tick and notifies subscribers.
	 * Non-positive prices are dropped.
	 */
	onTick(symbol: SymbolId, price: Decimal, timestampMs?: number): Quote | null {
		if (!price.isPositive()) return null;
		const state = this.stateFor(symbol);
		const quote: Quote = { symbol, price, timestampMs: timestampMs ?? this.config.clock.now() };
		state.last = quote;
		state.bars.addTick(price, quote.timestampMs);
		this.emit("tick", quote);
		return quote;
	}

	lastPrice(symbol: SymbolId): Decimal | null {
		return this.symbols.get(symbol)?.last?.price ?? null;
	}

	lastQuote(symbol: SymbolId): Quote | null {
		return this.symbols.get(symbol)?.last ?? null;
	}

	/** Pushes an externally computed ATR; it takes precedence over the bar-derived value. */
	setAtr(symbol: SymbolId, atr: Decimal | null): void {
		this.stateFor(symbol).pushedAtr = atr;
	}

	/** Pushed ATR, else ATR(period) from bars, else null while bars are still warming up. */
	atr(symbol: SymbolId): Decimal | null {
		const state = this.symbols.get(symbol);
		if (state === undefined) return null;
		if (state.pushedAtr !== null) return state.pushedAtr;
		return calcATR(state.bars.candles(), this.config.atrPeriod);
	}

	private stateFor(symbol: SymbolId): SymbolState {
		let state = this.symbols.get(symbol);
		if (state === undefined) {
			state = {
				last: null,
				pushedAtr: null,
				bars: new BarAggregator({
					intervalMs: this.config.barIntervalMs,
					maxBars: this.config.atrPeriod * 4,
				}),
			};
			this.symbols.set(symbol, state);
		}
		return state;
	}
}

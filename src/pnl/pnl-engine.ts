/**
 * PnL Engine — marks positions to the latest price and summarizes PnL.
 *
 * Read-only over fills: realized PnL comes from the ledger's fold, open PnL
 * from `markToMarket`. Marking runs inside the symbol's loop on every tick.
 */

import type { PositionLedger } from "../ledger/position-ledger.js";
import type { Position } from "../ledger/types.js";
import { Decimal } from "../shared/decimal.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";

export interface PnlSummary {
	readonly realized: Decimal;
	readonly unrealized: Decimal;
	readonly worst: Decimal;
	readonly best: Decimal;
	readonly total: Decimal;
}

export function summarizePnl(position: Position): PnlSummary {
	return {
		realized: position.realizedPnl,
		unrealized: position.unrealizedPnl,
		worst: position.worstUnrealizedPnl,
		best: position.bestUnrealizedPnl,
		total: position.realizedPnl.add(position.unrealizedPnl),
	};
}

export class PnlEngine {
	private readonly ledger: PositionLedger;

	constructor(ledger: PositionLedger) {
		this.ledger = ledger;
	}

	/** Re-marks one position at `price` and returns it. */
	onPrice(accountId: AccountId, symbol: SymbolId, price: Decimal): Position {
		return this.ledger.mark(accountId, symbol, price);
	}

	summarize(accountId: AccountId, symbol: SymbolId): PnlSummary {
		return summarizePnl(this.ledger.currentPosition(accountId, symbol));
	}

	/** Open PnL across every position of the account. */
	accountUnrealized(accountId: AccountId): Decimal {
		let total = Decimal.zero();
		for (const position of this.ledger.positions()) {
			if (position.accountId === accountId) {
				total = total.add(position.unrealizedPnl);
			}
		}
		return total;
	}
}

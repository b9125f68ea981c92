/**
 * Exit conditions — price levels that hand an open position to the exit
 * machine.
 *
 * OR semantics: the first condition that triggers wins. A take-profit level
 * triggers a market exit even while a take-profit limit rests at the broker,
 * so a gapped-through target is never left resting.
 */

import { stopLossPrice, takeProfitPrice } from "../dca/trigger.js";
import type { Position } from "../ledger/types.js";
import type { ContractSpec } from "../shared/contracts.js";
import type { Decimal } from "../shared/decimal.js";

export type ExitSignal =
	| { readonly type: "stop_loss"; readonly level: Decimal }
	| { readonly type: "take_profit"; readonly level: Decimal };

/** The slice of a position the conditions read. */
export interface OpenPosition {
	readonly quantity: number;
	readonly averageEntryPrice: Decimal;
	readonly stopLossTicks: number | null;
	readonly takeProfitTicks: number | null;
}

export interface ExitCondition {
	readonly name: string;
	check(position: OpenPosition, price: Decimal, spec: ContractSpec): ExitSignal | null;
}

export const StopLossTicks: ExitCondition = {
	name: "StopLossTicks",
	check(position, price, spec) {
		if (position.stopLossTicks === null) return null;
		const level = stopLossPrice(
			position.quantity,
			position.averageEntryPrice,
			position.stopLossTicks,
			spec,
		);
		const hit = position.quantity > 0 ? price.lte(level) : price.gte(level);
		return hit ? { type: "stop_loss", level } : null;
	},
};

export const TakeProfitTicks: ExitCondition = {
	name: "TakeProfitTicks",
	check(position, price, spec) {
		if (position.takeProfitTicks === null) return null;
		const level = takeProfitPrice(
			position.quantity,
			position.averageEntryPrice,
			position.takeProfitTicks,
			spec,
		);
		const hit = position.quantity > 0 ? price.gte(level) : price.lte(level);
		return hit ? { type: "take_profit", level } : null;
	},
};

export class ExitConditions {
	private readonly conditions: readonly ExitCondition[];

	private constructor(conditions: readonly ExitCondition[]) {
		this.conditions = conditions;
	}

	static create(): ExitConditions {
		return new ExitConditions([]);
	}

	/** Stop first: when both trigger on one gap the loss side is named. */
	static standard(): ExitConditions {
		return ExitConditions.create().with(StopLossTicks).with(TakeProfitTicks);
	}

	with(condition: ExitCondition): ExitConditions {
		return new ExitConditions([...this.conditions, condition]);
	}

	/**
	 * Evaluates a ledger position at `price`. Null for a flat position or one
	 * without levels configured.
	 */
	evaluate(position: Position, price: Decimal, spec: ContractSpec): ExitSignal | null {
		const { averageEntryPrice, dcaConfig } = position;
		if (position.quantity === 0 || averageEntryPrice === null || dcaConfig === null) {
			return null;
		}
		const open: OpenPosition = {
			quantity: position.quantity,
			averageEntryPrice,
			stopLossTicks: dcaConfig.stopLossTicks,
			takeProfitTicks: dcaConfig.takeProfitTicks,
		};
		for (const condition of this.conditions) {
			const signal = condition.check(open, price, spec);
			if (signal !== null) return signal;
		}
		return null;
	}

	names(): readonly string[] {
		return this.conditions.map((c) => c.name);
	}
}

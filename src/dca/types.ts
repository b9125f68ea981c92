/**
 * Scale-in configuration: trigger unit, rungs and a quantity ceiling.
 *
 * A rung fires once the position has moved `distance` units against the
 * average entry; its index is its position in `rungs`.
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import type { Result } from "../shared/result.js";

export const TriggerMode = {
	/** Distance in ticks of the contract */
	Ticks: "TICKS",
	/** Distance in percent of the average entry price */
	Percent: "PERCENT",
	/** Distance in multiples of the symbol's ATR */
	Atr: "ATR",
} as const;

export type TriggerMode = (typeof TriggerMode)[keyof typeof TriggerMode];

export interface DcaRung {
	readonly distance: Decimal;
	readonly quantity: number;
}

export interface DcaConfig {
	readonly triggerMode: TriggerMode;
	readonly rungs: readonly DcaRung[];
	/** Ceiling on absolute position size; a rung that would exceed it does not fire */
	readonly maxQuantity: number;
	/** Resting take-profit distance from the average entry; null places none */
	readonly takeProfitTicks: number | null;
	/** Virtual stop distance from the average entry; null disables */
	readonly stopLossTicks: number | null;
}

const positiveDecimal = z.union([z.number(), z.string()]).transform((v, ctx) => {
	const n = Number(v);
	if (!Number.isFinite(n) || n <= 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a positive number" });
		return z.NEVER;
	}
	return Decimal.from(v);
});

const ticks = z.number().int().positive().nullable().default(null);

export const dcaConfigSchema = z
	.object({
		triggerMode: z.enum(["TICKS", "PERCENT", "ATR"]),
		rungs: z.array(
			z.object({
				distance: positiveDecimal,
				quantity: z.number().int().positive(),
			}),
		),
		maxQuantity: z.number().int().positive(),
		takeProfitTicks: ticks,
		stopLossTicks: ticks,
	})
	.superRefine((config, ctx) => {
		for (let i = 1; i < config.rungs.length; i++) {
			const prev = config.rungs[i - 1];
			const rung = config.rungs[i];
			if (prev !== undefined && rung !== undefined && rung.distance.lt(prev.distance)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: "rung distances must not decrease",
					path: ["rungs", i, "distance"],
				});
			}
		}
	});

/** Plain-JSON form, as received from callers and stored with the position row. */
export type DcaConfigInput = z.input<typeof dcaConfigSchema>;

export function parseDcaConfig(input: unknown): Result<DcaConfig, ValidationError> {
	return validate(dcaConfigSchema, input, "Invalid DCA config");
}

export function encodeDcaConfig(config: DcaConfig): DcaConfigInput {
	return {
		triggerMode: config.triggerMode,
		rungs: config.rungs.map((r) => ({ distance: r.distance.toString(), quantity: r.quantity })),
		maxQuantity: config.maxQuantity,
		takeProfitTicks: config.takeProfitTicks,
		stopLossTicks: config.stopLossTicks,
	};
}

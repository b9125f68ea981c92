import { describe, expect, it } from "vitest";
import { TradingError } from "../../shared/errors.js";
import { ValidationError, formatIssues, validate, z } from "./index.js";

const rungSchema = z.object({
	distance: z.number().positive(),
	quantity: z.number().int().positive(),
});

const ladderSchema = z.object({
	triggerMode: z.enum(["TICKS", "ATR"]),
	rungs: z.array(rungSchema),
	note: z.string().optional(),
});

describe("validate", () => {
	it("returns the parsed value", () => {
		const result = validate(ladderSchema, {
			triggerMode: "TICKS",
			rungs: [{ distance: 10, quantity: 2 }],
		});

		expect(result).toEqual({
			ok: true,
			value: { triggerMode: "TICKS", rungs: [{ distance: 10, quantity: 2 }] },
		});
	});

	it("collects every issue with its path", () => {
		const result = validate(ladderSchema, {
			triggerMode: "TICKS",
			rungs: [
				{ distance: 10, quantity: 2 },
				{ distance: 0, quantity: 1.5 },
			],
		});

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.issues.map((i) => i.path)).toEqual([
				["rungs", 1, "distance"],
				["rungs", 1, "quantity"],
			]);
			expect(result.error.message).toBe("Validation failed");
		}
	});

	it("uses the label as the error message", () => {
		const result = validate(rungSchema, null, "Invalid DCA rung");
		expect(!result.ok && result.error.message).toBe("Invalid DCA rung");
	});
});

describe("ValidationError", () => {
	it("is a non-retryable TradingError carrying the formatted issues", () => {
		const issues = [{ path: ["maxQuantity"], message: "Required" }];
		const error = new ValidationError("Invalid DCA config", issues);

		expect(error).toBeInstanceOf(TradingError);
		expect(error.name).toBe("ValidationError");
		expect(error.code).toBe("VALIDATION_FAILED");
		expect(error.isRetryable).toBe(false);
		expect(error.issues).toBe(issues);
		expect(error.context["issues"]).toEqual(["maxQuantity: Required"]);
	});
});

describe("formatIssues", () => {
	it("joins the path with dots and drops an empty one", () => {
		expect(
			formatIssues([
				{ path: ["rungs", 0, "distance"], message: "Number must be greater than 0" },
				{ path: [], message: "Expected object, received null" },
			]),
		).toEqual([
			"rungs.0.distance: Number must be greater than 0",
			"Expected object, received null",
		]);
	});
});

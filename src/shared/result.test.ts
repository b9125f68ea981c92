import { describe, expect, it } from "vitest";
import { RejectError, TradingError, classifyError } from "./errors.js";
import { err, isErr, isOk, map, mapErr, ok, tryCatchAsync, unwrap, unwrapOr } from "./result.js";

describe("Result", () => {
	it("narrows on the ok flag", () => {
		const filled = ok({ quantity: 2 });
		const refused = err(new RejectError("Order rejected: margin"));

		expect(isOk(filled) && filled.value.quantity).toBe(2);
		expect(isErr(refused) && refused.error.code).toBe("ORDER_REJECTED");
	});

	it("maps the value and leaves an error alone", () => {
		expect(map(ok(3), (q) => -q)).toEqual(ok(-3));
		expect(map(err("no market"), (q: number) => -q)).toEqual(err("no market"));
	});

	it("maps the error and leaves a value alone", () => {
		expect(mapErr(err("timeout"), (e) => `broker: ${e}`)).toEqual(err("broker: timeout"));
		expect(mapErr(ok(1), (e: string) => `broker: ${e}`)).toEqual(ok(1));
	});

	it("unwraps at the boundary", () => {
		expect(unwrap(ok("paper-1"))).toBe("paper-1");
		expect(() => unwrap(err(new RejectError("Order rejected: halted")))).toThrow(
			"Order rejected: halted",
		);
		expect(() => unwrap(err("plain reason"))).toThrow("plain reason");
		expect(unwrapOr(err("gone"), 0)).toBe(0);
	});

	describe("tryCatchAsync", () => {
		it("wraps a resolved call", async () => {
			expect(await tryCatchAsync(async () => 42, classifyError)).toEqual(ok(42));
		});

		it("classifies what the call throws", async () => {
			const r = await tryCatchAsync(async () => {
				throw new Error("connect ECONNREFUSED 127.0.0.1:443");
			}, classifyError);

			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error).toBeInstanceOf(TradingError);
				expect(r.error.code).toBe("NETWORK_ERROR");
				expect(r.error.isRetryable).toBe(true);
			}
		});
	});
});

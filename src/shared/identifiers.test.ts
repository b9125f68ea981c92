import { describe, expect, it } from "vitest";
import { accountId, fillId, orderId, positionKey, symbolId } from "./identifiers.js";

describe("identifiers", () => {
	it("trims surrounding whitespace", () => {
		expect(accountId("  acct-1 ")).toBe("acct-1");
		expect(orderId("\tpaper-3\n")).toBe("paper-3");
		expect(fillId(" pf-9")).toBe("pf-9");
	});

	it("upper-cases symbols so one contract maps to one position", () => {
		expect(symbolId("mnqz5")).toBe("MNQZ5");
		expect(positionKey(accountId("a"), symbolId("mnqz5"))).toBe(
			positionKey(accountId("a"), symbolId("MNQZ5")),
		);
	});

	it("refuses empty values", () => {
		expect(() => accountId("")).toThrow("AccountId cannot be empty");
		expect(() => symbolId("   ")).toThrow("SymbolId cannot be empty");
		expect(() => orderId("\n")).toThrow("OrderId cannot be empty");
		expect(() => fillId("\t")).toThrow("FillId cannot be empty");
	});

	it("keys a position by account and symbol", () => {
		expect(positionKey(accountId("acct-1"), symbolId("MESH6"))).toBe("acct-1:MESH6");
	});
});

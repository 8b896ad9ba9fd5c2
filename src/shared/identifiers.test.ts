import { describe, expect, it } from "vitest";
import { assertIndex, positionKeyToString, traderAddress } from "./identifiers.js";

describe("identifiers", () => {
	describe("traderAddress", () => {
		it("trims the raw value", () => {
			expect(traderAddress("  0xabc ")).toBe("0xabc");
		});

		it("rejects empty strings", () => {
			expect(() => traderAddress("   ")).toThrow("TraderAddress cannot be empty");
		});
	});

	describe("assertIndex", () => {
		it("accepts non-negative integers", () => {
			expect(() => assertIndex(0, "pairIndex")).not.toThrow();
			expect(() => assertIndex(7, "pairIndex")).not.toThrow();
		});

		it("rejects negatives and fractions", () => {
			expect(() => assertIndex(-1, "pairIndex")).toThrow(
				"pairIndex must be a non-negative integer, got -1",
			);
			expect(() => assertIndex(1.5, "groupIndex")).toThrow(RangeError);
		});
	});

	it("positionKeyToString joins the key parts", () => {
		const key = { trader: traderAddress("0xabc"), pairIndex: 7, index: 2 };
		expect(positionKeyToString(key)).toBe("0xabc:7:2");
	});
});

import { describe, expect, it } from "vitest";
import {
	AccessDeniedError,
	BorrowingError,
	CapacityOverflowError,
	ConfigError,
	ErrorCategory,
	InvalidParameterError,
	SystemError,
	classifyError,
	isAccessDenied,
	isCapacityOverflow,
	isInvalidParameter,
} from "./errors.js";

describe("BorrowingError hierarchy", () => {
	describe("error categories", () => {
		const cases: Array<[string, BorrowingError, ErrorCategory]> = [
			["InvalidParameterError", new InvalidParameterError("bad"), ErrorCategory.NonRetryable],
			["AccessDeniedError", new AccessDeniedError("denied"), ErrorCategory.NonRetryable],
			["CapacityOverflowError", new CapacityOverflowError("full"), ErrorCategory.NonRetryable],
			["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
			["SystemError", new SystemError("panic"), ErrorCategory.Fatal],
		];

		it.each(cases)("%s has category %s", (_name, error, expected) => {
			expect(error.category).toBe(expected);
		});
	});

	describe("error properties", () => {
		it("preserves message, code, and context", () => {
			const e = new InvalidParameterError("wrong exponent", { feeExponent: 4 });
			expect(e.message).toBe("wrong exponent");
			expect(e.code).toBe("INVALID_PARAMETER");
			expect(e.name).toBe("InvalidParameterError");
			expect(e.context).toEqual({ feeExponent: 4 });
		});

		it("moves cause out of the context", () => {
			const root = new Error("root");
			const e = new SystemError("wrapped", { cause: root, step: "settle" });
			expect(e.cause).toBe(root);
			expect(e.context).toEqual({ step: "settle" });
		});

		it("is instanceof Error and BorrowingError", () => {
			const e = new CapacityOverflowError("full");
			expect(e).toBeInstanceOf(Error);
			expect(e).toBeInstanceOf(BorrowingError);
		});

		it("isFatal follows the category", () => {
			expect(new ConfigError("x").isFatal).toBe(true);
			expect(new AccessDeniedError("x").isFatal).toBe(false);
		});
	});
});

describe("classifyError", () => {
	it("returns BorrowingError as-is", () => {
		const original = new AccessDeniedError("no role");
		expect(classifyError(original)).toBe(original);
	});

	it("maps RangeError to InvalidParameterError", () => {
		const e = classifyError(new RangeError("block order"));
		expect(e).toBeInstanceOf(InvalidParameterError);
		expect(e.message).toBe("block order");
	});

	it("classifies unknown errors as SystemError", () => {
		const e = classifyError(new Error("something weird"));
		expect(e).toBeInstanceOf(SystemError);
		expect(e.category).toBe(ErrorCategory.Fatal);
	});

	it("handles non-Error thrown values", () => {
		const e = classifyError("string error");
		expect(e).toBeInstanceOf(SystemError);
		expect(e.message).toBe("string error");
	});
});

describe("toJSON", () => {
	it("serializes all fields", () => {
		const e = new CapacityOverflowError("oi overflow", { groupIndex: 3 });
		expect(e.toJSON()).toEqual({
			name: "CapacityOverflowError",
			message: "oi overflow",
			code: "CAPACITY_OVERFLOW",
			category: ErrorCategory.NonRetryable,
			context: { groupIndex: 3 },
		});
	});
});

describe("type guards", () => {
	it("isInvalidParameter", () => {
		expect(isInvalidParameter(new InvalidParameterError("x"))).toBe(true);
		expect(isInvalidParameter(new AccessDeniedError("x"))).toBe(false);
	});

	it("isAccessDenied", () => {
		expect(isAccessDenied(new AccessDeniedError("x"))).toBe(true);
		expect(isAccessDenied(new Error("x"))).toBe(false);
	});

	it("isCapacityOverflow", () => {
		expect(isCapacityOverflow(new CapacityOverflowError("x"))).toBe(true);
		expect(isCapacityOverflow("not an error")).toBe(false);
	});
});

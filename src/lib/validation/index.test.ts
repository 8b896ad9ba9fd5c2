import { describe, expect, it } from "vitest";
import { InvalidParameterError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { ValidationError, amountSchema, indexSchema, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error).toBeInstanceOf(InvalidParameterError);
				expect(result.error.code).toBe("INVALID_PARAMETER");
			}
		});

		it("names the rejected input in the message", () => {
			const result = validate(z.number(), "x", "pair params");
			if (!result.ok) {
				expect(result.error.message).toBe("Invalid pair params");
			}
		});

		it("includes issue paths for nested objects", () => {
			const schema = z.object({
				params: z.object({
					feeExponent: z.number(),
					maxOi: z.bigint(),
				}),
			});
			const result = validate(schema, { params: { feeExponent: "1", maxOi: 5 } });

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				const paths = result.error.issues.map((i) => i.path.join("."));
				expect(paths).toEqual(["params.feeExponent", "params.maxOi"]);
				expect(result.error.context).toEqual({ issues: result.error.issues });
			}
		});
	});

	describe("indexSchema", () => {
		it("accepts non-negative integers", () => {
			expect(isOk(validate(indexSchema, 0))).toBe(true);
			expect(isOk(validate(indexSchema, 42))).toBe(true);
		});

		it("rejects negative and fractional numbers", () => {
			expect(isErr(validate(indexSchema, -1))).toBe(true);
			expect(isErr(validate(indexSchema, 2.5))).toBe(true);
		});
	});

	describe("amountSchema", () => {
		it("accepts non-negative bigints", () => {
			expect(isOk(validate(amountSchema, 0n))).toBe(true);
			expect(isOk(validate(amountSchema, 10n ** 30n))).toBe(true);
		});

		it("rejects negative bigints and plain numbers", () => {
			expect(isErr(validate(amountSchema, -1n))).toBe(true);
			expect(isErr(validate(amountSchema, 5))).toBe(true);
		});
	});
});

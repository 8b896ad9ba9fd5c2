/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code imports `{ z }` from here rather than from "zod" directly, so
 * the dependency stays behind a single import path.
 */

import { z } from "zod";
import { InvalidParameterError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Input rejected by a schema; carries one issue per failing field. */
export class ValidationError extends InvalidParameterError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T>,
	data: unknown,
	label = "input",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(`Invalid ${label}`, issues));
}

// ── Shared schema pieces ────────────────────────────────────────────

/** Dense entity index: a non-negative safe integer. */
export const indexSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/** Non-negative scaled amount. */
export const amountSchema = z.bigint().nonnegative();

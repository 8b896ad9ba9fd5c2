/**
 * BorrowingError hierarchy: structured error classification.
 *
 * Every error carries a machine-readable code and a category. Nothing inside
 * the engine retries: a failed operation is rolled back and reported, and the
 * caller re-issues it as a whole.
 */

/** Error severity categories. */
export const ErrorCategory = {
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing BorrowingError subclasses with optional cause chain. */
interface BorrowingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & BorrowingErrorOptions;

/** Base error class for every failure the engine reports. */
export class BorrowingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "BorrowingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Fee exponent out of range, reserved group index, batch length mismatch, malformed input. */
export class InvalidParameterError extends BorrowingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_PARAMETER", ErrorCategory.NonRetryable, context);
		this.name = "InvalidParameterError";
	}
}

/** The caller lacks the capability an entry point requires. */
export class AccessDeniedError extends BorrowingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ACCESS_DENIED", ErrorCategory.NonRetryable, context);
		this.name = "AccessDeniedError";
	}
}

/** An open-interest value would exceed its storage bound. */
export class CapacityOverflowError extends BorrowingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CAPACITY_OVERFLOW", ErrorCategory.NonRetryable, context);
		this.name = "CapacityOverflowError";
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends BorrowingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends BorrowingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Normalize anything thrown at a boundary into a BorrowingError. */
export function classifyError(error: unknown): BorrowingError {
	if (error instanceof BorrowingError) return error;
	if (error instanceof RangeError) {
		return new InvalidParameterError(error.message, { cause: error });
	}
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidParameterError. */
export function isInvalidParameter(e: unknown): e is InvalidParameterError {
	return e instanceof InvalidParameterError;
}

/** Type guard for AccessDeniedError. */
export function isAccessDenied(e: unknown): e is AccessDeniedError {
	return e instanceof AccessDeniedError;
}

/** Type guard for CapacityOverflowError. */
export function isCapacityOverflow(e: unknown): e is CapacityOverflowError {
	return e instanceof CapacityOverflowError;
}

/**
 * Result<T, E>: explicit error values for engine operations.
 *
 * Fallible engine entry points return Result instead of throwing, so a
 * rejected operation can be rolled back before the caller sees it.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given error. */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Run `fn` for each item in order, stopping at the first failure.
 * Returns the collected values when every call succeeds.
 */
export function collect<I, T, E>(
	items: readonly I[],
	fn: (item: I, index: number) => Result<T, E>,
): Result<T[], E> {
	const values: T[] = [];
	for (const [index, item] of items.entries()) {
		const result = fn(item, index);
		if (!result.ok) return result;
		values.push(result.value);
	}
	return ok(values);
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Type guard: narrows a Result to its success variant. */
export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

/** Type guard: narrows a Result to its error variant. */
export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

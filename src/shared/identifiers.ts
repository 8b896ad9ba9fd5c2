/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Pair and group indices are plain dense integers; traders are opaque
 * address strings branded so they cannot be confused with other strings.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Account that owns a trade. */
export type TraderAddress = Brand<string, "TraderAddress">;

/** Identifies the fee context of one open trade. */
export interface PositionKey {
	readonly trader: TraderAddress;
	readonly pairIndex: number;
	readonly index: number;
}

// ── Factory functions with validation ────────────────────────────────

/** Create a validated TraderAddress from a raw string. Throws if empty. */
export function traderAddress(value: string): TraderAddress {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new RangeError("TraderAddress cannot be empty");
	}
	return trimmed as TraderAddress;
}

/** Throws unless `value` is a non-negative safe integer. */
export function assertIndex(value: number, label: string): void {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
	}
}

/** Stable string form of a PositionKey, usable as a map key. */
export function positionKeyToString(key: PositionKey): string {
	return `${key.trader}:${key.pairIndex}:${key.index}`;
}

/**
 * Fixed-point helpers: all amounts are scaled bigints, never floats.
 *
 * Collateral amounts arrive at the collateral token's precision (18 decimals
 * by default); accumulators and open interest live at the engine's internal
 * precision (10 decimals by default). Every conversion truncates toward zero.
 */

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/** 10^decimals as a bigint. */
export function pow10(decimals: number): bigint {
	if (!Number.isSafeInteger(decimals) || decimals < 0) {
		throw new RangeError(`pow10: invalid decimals ${decimals}`);
	}
	return 10n ** BigInt(decimals);
}

/** Convert a scaled amount between precisions, truncating extra digits. */
export function rescale(amount: bigint, fromDecimals: number, toDecimals: number): bigint {
	if (fromDecimals === toDecimals) return amount;
	if (fromDecimals > toDecimals) {
		return amount / pow10(fromDecimals - toDecimals);
	}
	return amount * pow10(toDecimals - fromDecimals);
}

/**
 * Parse a decimal string into a scaled integer.
 * @example parseUnits("1000.5", 18) // 1000500000000000000000n
 */
export function parseUnits(value: string, decimals: number): bigint {
	const trimmed = value.trim();
	if (!DECIMAL_PATTERN.test(trimmed)) {
		throw new RangeError(`parseUnits: invalid decimal "${value}"`);
	}
	const scale = pow10(decimals);
	const negative = trimmed.startsWith("-");
	const abs = negative ? trimmed.slice(1) : trimmed;
	const [intPart = "0", fracPart = ""] = abs.split(".");
	const paddedFrac = fracPart.padEnd(decimals, "0").slice(0, decimals);
	const raw = BigInt(intPart) * scale + (decimals > 0 ? BigInt(paddedFrac) : 0n);
	return negative ? -raw : raw;
}

/**
 * Render a scaled integer as a decimal string without trailing zeros.
 * @example formatUnits(25n * 10n ** 17n, 18) // "2.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
	const scale = pow10(decimals);
	const negative = value < 0n;
	const abs = negative ? -value : value;
	const intPart = abs / scale;
	const fracStr = (abs % scale).toString().padStart(decimals, "0").replace(/0+$/, "");
	const prefix = negative ? "-" : "";
	return fracStr.length > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
}

/** Larger of two bigints. */
export function maxBigInt(a: bigint, b: bigint): bigint {
	return a >= b ? a : b;
}

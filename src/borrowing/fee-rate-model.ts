/**
 * FeeRateModel: the accrual curve, as an injectable pure function.
 *
 * The default curve charges the side carrying the net open interest:
 *
 *   delta = elapsed × feePerBlock × (netOi × P / maxOi)^e / P^e
 *
 * where P is the internal precision and e the fee exponent (integer division
 * at every step). Only the heavier side's accumulator grows; a balanced book
 * accrues nothing, and a zero cap or exponent disables accrual.
 */

import type { PendingAccFees } from "./types.js";

export interface PendingAccFeesInput {
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
	readonly oiLong: bigint;
	readonly oiShort: bigint;
	readonly feePerBlock: bigint;
	readonly currentBlock: number;
	readonly accLastUpdatedBlock: number;
	readonly maxOi: bigint;
	readonly feeExponent: number;
	/** 10^decimals of the internal precision */
	readonly precision: bigint;
}

/**
 * Deterministic, side-effect free and monotonic in elapsed blocks.
 * Callers guarantee `currentBlock >= accLastUpdatedBlock`.
 */
export type FeeRateModel = (input: PendingAccFeesInput) => PendingAccFees;

/** Net-OI utilization curve raised to the fee exponent. */
export const netOiUtilizationModel: FeeRateModel = (input) => {
	if (input.currentBlock < input.accLastUpdatedBlock) {
		throw new RangeError(
			`Block order: current ${input.currentBlock} before last update ${input.accLastUpdatedBlock}`,
		);
	}

	const moreShorts = input.oiLong < input.oiShort;
	const netOi = moreShorts ? input.oiShort - input.oiLong : input.oiLong - input.oiShort;
	const elapsed = BigInt(input.currentBlock - input.accLastUpdatedBlock);

	const delta =
		input.maxOi > 0n && input.feeExponent > 0
			? (elapsed *
					input.feePerBlock *
					((netOi * input.precision) / input.maxOi) ** BigInt(input.feeExponent)) /
				input.precision ** BigInt(input.feeExponent)
			: 0n;

	return {
		accFeeLong: moreShorts ? input.accFeeLong : input.accFeeLong + delta,
		accFeeShort: moreShorts ? input.accFeeShort + delta : input.accFeeShort,
		delta,
	};
};

/**
 * BoundedUint: unsigned integer with an explicit upper bound.
 *
 * Addition is checked (exceeding the bound is a CapacityOverflowError);
 * subtraction saturates at zero so rounding drift between the collateral and
 * internal precisions can never produce a negative quantity.
 */

import { CapacityOverflowError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

/** Upper bound of a 72-bit unsigned slot, the storage width of group open interest. */
export const UINT72_MAX = 2n ** 72n - 1n;

export class BoundedUint {
	readonly value: bigint;
	readonly max: bigint;

	private constructor(value: bigint, max: bigint) {
		this.value = value;
		this.max = max;
	}

	/**
	 * Wraps `value` if it lies in `[0, max]`.
	 * @example BoundedUint.of(5n, UINT72_MAX)
	 */
	static of(value: bigint, max: bigint = UINT72_MAX): Result<BoundedUint, CapacityOverflowError> {
		if (value < 0n || value > max) {
			return err(
				new CapacityOverflowError(`Value ${value} outside [0, ${max}]`, {
					value: value.toString(),
					max: max.toString(),
				}),
			);
		}
		return ok(new BoundedUint(value, max));
	}

	static zero(max: bigint = UINT72_MAX): BoundedUint {
		return new BoundedUint(0n, max);
	}

	/** Checked addition: fails when the sum exceeds the bound. */
	checkedAdd(amount: bigint): Result<BoundedUint, CapacityOverflowError> {
		return BoundedUint.of(this.value + amount, this.max);
	}

	/** Saturating subtraction: clamps at zero instead of going negative. */
	saturatingSub(amount: bigint): BoundedUint {
		return new BoundedUint(amount >= this.value ? 0n : this.value - amount, this.max);
	}
}

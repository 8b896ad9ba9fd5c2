/**
 * OpenInterestTracker: group long/short open interest.
 *
 * Amounts arrive at collateral precision and are stored at the internal
 * precision inside a 72-bit bound. Increments past the bound fail;
 * decrements clamp at zero. Group 0 never tracks open interest.
 */

import type { EventQueue } from "../events/event-dispatcher.js";
import type { Logger } from "../lib/logger/index.js";
import { BoundedUint, UINT72_MAX } from "../shared/bounded-uint.js";
import type { CapacityOverflowError } from "../shared/errors.js";
import { rescale } from "../shared/fixed-point.js";
import { type Result, ok } from "../shared/result.js";
import type { BorrowingLedger } from "./ledger.js";
import { type Group, UNGROUPED } from "./types.js";

export interface OpenInterestDeps {
	readonly ledger: BorrowingLedger;
	readonly events: EventQueue;
	readonly logger: Logger;
	readonly precisionDecimals: number;
	readonly collateralDecimals: number;
	/** Defaults to UINT72_MAX */
	readonly bound?: bigint;
}

export class OpenInterestTracker {
	private readonly ledger: BorrowingLedger;
	private readonly events: EventQueue;
	private readonly logger: Logger;
	private readonly precisionDecimals: number;
	private readonly collateralDecimals: number;
	private readonly bound: bigint;

	constructor(deps: OpenInterestDeps) {
		this.ledger = deps.ledger;
		this.events = deps.events;
		this.logger = deps.logger;
		this.precisionDecimals = deps.precisionDecimals;
		this.collateralDecimals = deps.collateralDecimals;
		this.bound = deps.bound ?? UINT72_MAX;
	}

	/** Collateral-precision amount at internal precision. */
	toInternal(amount: bigint): bigint {
		return rescale(amount, this.collateralDecimals, this.precisionDecimals);
	}

	/**
	 * Adds `amount` to, or removes it from, one side of the group's open interest.
	 * Returns the group as stored afterwards.
	 */
	adjustGroupOi(
		groupIndex: number,
		long: boolean,
		increase: boolean,
		amount: bigint,
		block: number,
	): Result<Group, CapacityOverflowError> {
		const group = this.ledger.group(groupIndex);
		if (groupIndex === UNGROUPED) return ok(group);

		const scaled = BoundedUint.of(this.toInternal(amount), this.bound);
		if (!scaled.ok) return scaled;
		const current = BoundedUint.of(long ? group.oiLong : group.oiShort, this.bound);
		if (!current.ok) return current;

		let next: BoundedUint;
		if (increase) {
			const sum = current.value.checkedAdd(scaled.value.value);
			if (!sum.ok) return sum;
			next = sum.value;
		} else {
			if (scaled.value.value > current.value.value) {
				this.logger.warn(
					{ groupIndex, long, oi: current.value.value, amount: scaled.value.value },
					"group open interest clamped at zero",
				);
			}
			next = current.value.saturatingSub(scaled.value.value);
		}

		const updated: Group = long
			? { ...group, oiLong: next.value }
			: { ...group, oiShort: next.value };
		this.ledger.saveGroup(groupIndex, updated);
		this.events.push({
			type: "group_oi_updated",
			block,
			groupIndex,
			long,
			increase,
			amount: scaled.value.value,
			oiLong: updated.oiLong,
			oiShort: updated.oiShort,
		});
		return ok(updated);
	}

	/**
	 * True when opening `positionSize` (collateral precision) on the group's
	 * `long` side stays within its cap. Uncapped groups (maxOi 0) and group 0
	 * always accept.
	 */
	withinMaxGroupOi(groupIndex: number, long: boolean, positionSize: bigint): boolean {
		if (groupIndex === UNGROUPED) return true;
		const group = this.ledger.group(groupIndex);
		if (group.maxOi === 0n) return true;
		const side = long ? group.oiLong : group.oiShort;
		return side + this.toInternal(positionSize) <= group.maxOi;
	}
}

/**
 * GroupReassignment: moves a pair from its current group to another.
 *
 * Settles the pair and both groups at the current block, migrates the pair's
 * open interest from the old group to the new one, then freezes all three
 * accumulators in a new transition-log entry. Fee resolution for trades
 * spanning the move reads those frozen values.
 */

import type { EventQueue } from "../events/event-dispatcher.js";
import type { Logger } from "../lib/logger/index.js";
import type { BorrowingError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { OpenInterestTracker } from "./open-interest.js";
import type { PairOpenInterestSource } from "./position-ledger.js";
import type { AccumulatorSettlement } from "./settlement.js";
import type { TransitionLog } from "./transition-log.js";
import { type PairGroup, type SideValues, UNGROUPED } from "./types.js";

export interface GroupReassignmentDeps {
	readonly settlement: AccumulatorSettlement;
	readonly openInterest: OpenInterestTracker;
	readonly positions: PairOpenInterestSource;
	readonly log: TransitionLog;
	readonly events: EventQueue;
	readonly logger: Logger;
}

export class GroupReassignment {
	private readonly deps: GroupReassignmentDeps;

	constructor(deps: GroupReassignmentDeps) {
		this.deps = deps;
	}

	/**
	 * Moves `pairIndex` into `groupIndex` at `block`. Returns the appended
	 * entry, or null when the pair already belongs to that group.
	 */
	reassign(
		pairIndex: number,
		groupIndex: number,
		block: number,
	): Result<PairGroup | null, BorrowingError> {
		const { settlement, log, events, logger } = this.deps;
		const prevGroupIndex = log.currentGroupIndex(pairIndex);
		if (prevGroupIndex === groupIndex) return ok(null);

		const pairAcc = settlement.settlePair(pairIndex, block);
		if (!pairAcc.ok) return pairAcc;
		const prevGroupAcc = settlement.settleGroup(prevGroupIndex, block);
		if (!prevGroupAcc.ok) return prevGroupAcc;
		const groupAcc = settlement.settleGroup(groupIndex, block);
		if (!groupAcc.ok) return groupAcc;

		const oi = this.deps.positions.pairOpenInterest(pairIndex);
		if (prevGroupIndex !== UNGROUPED) {
			const moved = this.moveOi(prevGroupIndex, false, oi, block);
			if (!moved.ok) return moved;
		}
		if (groupIndex !== UNGROUPED) {
			const moved = this.moveOi(groupIndex, true, oi, block);
			if (!moved.ok) return moved;
		}

		const entry: PairGroup = {
			groupIndex,
			block,
			initialAccFeeLong: groupAcc.value.long,
			initialAccFeeShort: groupAcc.value.short,
			prevGroupAccFeeLong: prevGroupAcc.value.long,
			prevGroupAccFeeShort: prevGroupAcc.value.short,
			pairAccFeeLong: pairAcc.value.long,
			pairAccFeeShort: pairAcc.value.short,
		};
		const appended = log.append(pairIndex, entry);
		if (!appended.ok) return appended;

		events.push({ type: "pair_group_updated", block, pairIndex, prevGroupIndex, groupIndex });
		logger.info({ pairIndex, prevGroupIndex, groupIndex, block, oi }, "pair group updated");
		return ok(entry);
	}

	/** Adds or removes the pair's long and short open interest (collateral precision). */
	private moveOi(
		groupIndex: number,
		increase: boolean,
		oi: SideValues,
		block: number,
	): Result<void, BorrowingError> {
		const { openInterest } = this.deps;
		for (const [long, amount] of [
			[true, oi.long],
			[false, oi.short],
		] as const) {
			if (amount === 0n) continue;
			const adjusted = openInterest.adjustGroupOi(groupIndex, long, increase, amount, block);
			if (!adjusted.ok) return adjusted;
		}
		return ok(undefined);
	}
}

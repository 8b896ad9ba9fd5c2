/**
 * TradeFeeResolver: reconstructs a trade's borrowing fee from the pair's
 * transition log.
 *
 * The log is replayed from the newest entry backwards. Each segment the pair
 * spent in one group charges the larger of the group's and the pair's
 * accumulator growth over that segment, so moving a pair to a cheaper group
 * never lowers what an open trade owes. The walk stops at the segment that
 * contains the trade's open block.
 *
 *   fee = collateral × leverage × Σ max(groupDelta, pairDelta) / P / 100
 */

import type { InvalidParameterError } from "../shared/errors.js";
import { maxBigInt, pow10 } from "../shared/fixed-point.js";
import { type Result, ok } from "../shared/result.js";
import type { AccumulatorSettlement } from "./settlement.js";
import type { TransitionLog } from "./transition-log.js";
import { type InitialAccFees, type PairGroup, sideOf } from "./types.js";

export interface TradeFeeResolverDeps {
	readonly settlement: AccumulatorSettlement;
	readonly log: TransitionLog;
	readonly precisionDecimals: number;
}

/** What the resolver needs to know about a trade. */
export interface FeeTrade {
	readonly pairIndex: number;
	readonly long: boolean;
	readonly collateral: bigint;
	readonly leverage: bigint;
}

interface SegmentDelta {
	readonly group: bigint;
	readonly pair: bigint;
	readonly beforeTradeOpen: boolean;
}

export class TradeFeeResolver {
	private readonly settlement: AccumulatorSettlement;
	private readonly log: TransitionLog;
	private readonly precision: bigint;

	constructor(deps: TradeFeeResolverDeps) {
		this.settlement = deps.settlement;
		this.log = deps.log;
		this.precision = pow10(deps.precisionDecimals);
	}

	/** Borrowing fee owed at `block`, at collateral precision. */
	tradeFee(
		trade: FeeTrade,
		initial: InitialAccFees,
		block: number,
	): Result<bigint, InvalidParameterError> {
		const total = this.accumulatedDelta(trade.pairIndex, trade.long, initial, block);
		if (!total.ok) return total;
		return ok((trade.collateral * trade.leverage * total.value) / this.precision / 100n);
	}

	/** Σ of per-segment max(groupDelta, pairDelta) since the trade opened. */
	accumulatedDelta(
		pairIndex: number,
		long: boolean,
		initial: InitialAccFees,
		block: number,
	): Result<bigint, InvalidParameterError> {
		const entries = this.log.entries(pairIndex);
		let total = 0n;

		const first = entries[0];
		if (first === undefined || first.block > initial.block) {
			// Opened while the pair was still ungrouped: only the pair rate applies
			// until the first move (or until now).
			let pairAcc: bigint;
			if (first === undefined) {
				const pending = this.settlement.pendingPairAccFee(pairIndex, block, long);
				if (!pending.ok) return pending;
				pairAcc = pending.value;
			} else {
				pairAcc = sideOf(long, first.pairAccFeeLong, first.pairAccFeeShort);
			}
			total = pairAcc - initial.accPairFee;
		}

		for (let i = entries.length - 1; i >= 0; i--) {
			const delta = this.segmentDelta(pairIndex, long, entries, i, initial, block);
			if (!delta.ok) return delta;
			total += maxBigInt(delta.value.group, delta.value.pair);
			if (delta.value.beforeTradeOpen) break;
		}

		return ok(total);
	}

	// ── Internal ──────────────────────────────────────────────────

	private segmentDelta(
		pairIndex: number,
		long: boolean,
		entries: readonly PairGroup[],
		i: number,
		initial: InitialAccFees,
		block: number,
	): Result<SegmentDelta, InvalidParameterError> {
		const entry = entries[i];
		const next = entries[i + 1];
		if (entry === undefined) return ok({ group: 0n, pair: 0n, beforeTradeOpen: true });

		const beforeTradeOpen = entry.block < initial.block;

		let groupAcc: bigint;
		let pairAcc: bigint;
		if (next === undefined) {
			const group = this.settlement.pendingGroupAccFee(entry.groupIndex, block, long);
			if (!group.ok) return group;
			const pair = this.settlement.pendingPairAccFee(pairIndex, block, long);
			if (!pair.ok) return pair;
			groupAcc = group.value;
			pairAcc = pair.value;
		} else {
			// The trade opened at or after the pair left this group.
			if (beforeTradeOpen && next.block <= initial.block) {
				return ok({ group: 0n, pair: 0n, beforeTradeOpen });
			}
			groupAcc = sideOf(long, next.prevGroupAccFeeLong, next.prevGroupAccFeeShort);
			pairAcc = sideOf(long, next.pairAccFeeLong, next.pairAccFeeShort);
		}

		if (beforeTradeOpen) {
			return ok({
				group: groupAcc - initial.accGroupFee,
				pair: pairAcc - initial.accPairFee,
				beforeTradeOpen,
			});
		}
		return ok({
			group: groupAcc - sideOf(long, entry.initialAccFeeLong, entry.initialAccFeeShort),
			pair: pairAcc - sideOf(long, entry.pairAccFeeLong, entry.pairAccFeeShort),
			beforeTradeOpen,
		});
	}
}

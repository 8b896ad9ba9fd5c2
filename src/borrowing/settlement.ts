/**
 * AccumulatorSettlement: advances pair and group accumulators to a block.
 *
 * The pending computation is read-only and backs every query; settling
 * writes the pending values back and moves the entity's update marker. Pair
 * open interest comes from the position ledger at collateral precision and
 * is rescaled to the internal precision before it reaches the fee model.
 */

import type { EventQueue } from "../events/event-dispatcher.js";
import type { Logger } from "../lib/logger/index.js";
import { InvalidParameterError } from "../shared/errors.js";
import { pow10, rescale } from "../shared/fixed-point.js";
import { type Result, err, ok } from "../shared/result.js";
import type { FeeRateModel } from "./fee-rate-model.js";
import type { BorrowingLedger } from "./ledger.js";
import type { PairOpenInterestSource } from "./position-ledger.js";
import { type PendingAccFees, type SideValues, sideOf } from "./types.js";

export interface SettlementDeps {
	readonly ledger: BorrowingLedger;
	readonly positions: PairOpenInterestSource;
	readonly model: FeeRateModel;
	readonly precisionDecimals: number;
	readonly collateralDecimals: number;
	readonly events: EventQueue;
	readonly logger: Logger;
}

interface AccrualState {
	readonly feePerBlock: bigint;
	readonly feeExponent: number;
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
	readonly accLastUpdatedBlock: number;
	readonly maxOi: bigint;
}

export class AccumulatorSettlement {
	private readonly ledger: BorrowingLedger;
	private readonly positions: PairOpenInterestSource;
	private readonly model: FeeRateModel;
	private readonly precision: bigint;
	private readonly precisionDecimals: number;
	private readonly collateralDecimals: number;
	private readonly events: EventQueue;
	private readonly logger: Logger;

	constructor(deps: SettlementDeps) {
		this.ledger = deps.ledger;
		this.positions = deps.positions;
		this.model = deps.model;
		this.precision = pow10(deps.precisionDecimals);
		this.precisionDecimals = deps.precisionDecimals;
		this.collateralDecimals = deps.collateralDecimals;
		this.events = deps.events;
		this.logger = deps.logger;
	}

	/** The pair's open interest rescaled to the internal precision. */
	pairOpenInterest(pairIndex: number): SideValues {
		const oi = this.positions.pairOpenInterest(pairIndex);
		return {
			long: rescale(oi.long, this.collateralDecimals, this.precisionDecimals),
			short: rescale(oi.short, this.collateralDecimals, this.precisionDecimals),
		};
	}

	// ── Pending (read-only) ─────────────────────────────────────────

	pendingPairAccFees(pairIndex: number, block: number): Result<PendingAccFees, InvalidParameterError> {
		const state = this.ledger.pairState(pairIndex);
		return this.pending(state, this.pairOpenInterest(pairIndex), block, { pairIndex });
	}

	pendingGroupAccFees(
		groupIndex: number,
		block: number,
	): Result<PendingAccFees, InvalidParameterError> {
		const group = this.ledger.group(groupIndex);
		return this.pending(group, { long: group.oiLong, short: group.oiShort }, block, {
			groupIndex,
		});
	}

	pendingPairAccFee(
		pairIndex: number,
		block: number,
		long: boolean,
	): Result<bigint, InvalidParameterError> {
		const pending = this.pendingPairAccFees(pairIndex, block);
		if (!pending.ok) return pending;
		return ok(sideOf(long, pending.value.accFeeLong, pending.value.accFeeShort));
	}

	pendingGroupAccFee(
		groupIndex: number,
		block: number,
		long: boolean,
	): Result<bigint, InvalidParameterError> {
		const pending = this.pendingGroupAccFees(groupIndex, block);
		if (!pending.ok) return pending;
		return ok(sideOf(long, pending.value.accFeeLong, pending.value.accFeeShort));
	}

	// ── Settling (write) ────────────────────────────────────────────

	/** Writes the pair's pending accumulators at `block` and returns them. */
	settlePair(pairIndex: number, block: number): Result<SideValues, InvalidParameterError> {
		const pending = this.pendingPairAccFees(pairIndex, block);
		if (!pending.ok) return pending;

		const { accFeeLong, accFeeShort, delta } = pending.value;
		this.ledger.savePairState(pairIndex, {
			...this.ledger.pairState(pairIndex),
			accFeeLong,
			accFeeShort,
			accLastUpdatedBlock: block,
		});
		this.events.push({ type: "pair_acc_fees_updated", block, pairIndex, accFeeLong, accFeeShort });
		this.logger.debug({ pairIndex, block, accFeeLong, accFeeShort, delta }, "pair settled");
		return ok({ long: accFeeLong, short: accFeeShort });
	}

	/** Writes the group's pending accumulators at `block` and returns them. */
	settleGroup(groupIndex: number, block: number): Result<SideValues, InvalidParameterError> {
		const pending = this.pendingGroupAccFees(groupIndex, block);
		if (!pending.ok) return pending;

		const { accFeeLong, accFeeShort, delta } = pending.value;
		this.ledger.saveGroup(groupIndex, {
			...this.ledger.group(groupIndex),
			accFeeLong,
			accFeeShort,
			accLastUpdatedBlock: block,
		});
		this.events.push({
			type: "group_acc_fees_updated",
			block,
			groupIndex,
			accFeeLong,
			accFeeShort,
		});
		this.logger.debug({ groupIndex, block, accFeeLong, accFeeShort, delta }, "group settled");
		return ok({ long: accFeeLong, short: accFeeShort });
	}

	// ── Internal ──────────────────────────────────────────────────

	private pending(
		state: AccrualState,
		oi: SideValues,
		block: number,
		entity: Record<string, number>,
	): Result<PendingAccFees, InvalidParameterError> {
		if (block < state.accLastUpdatedBlock) {
			return err(
				new InvalidParameterError(
					`Block ${block} precedes last accumulator update at ${state.accLastUpdatedBlock}`,
					{ ...entity, block, accLastUpdatedBlock: state.accLastUpdatedBlock },
				),
			);
		}
		return ok(
			this.model({
				accFeeLong: state.accFeeLong,
				accFeeShort: state.accFeeShort,
				oiLong: oi.long,
				oiShort: oi.short,
				feePerBlock: state.feePerBlock,
				currentBlock: block,
				accLastUpdatedBlock: state.accLastUpdatedBlock,
				maxOi: state.maxOi,
				feeExponent: state.feeExponent,
				precision: this.precision,
			}),
		);
	}
}

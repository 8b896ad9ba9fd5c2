/**
 * Borrowing-fee domain types.
 *
 * Accumulators ("acc fees") are running totals of fee per unit of position,
 * at the engine's internal precision. They only ever grow. Open interest is
 * stored at the same internal precision.
 */

import type { PositionKey, TraderAddress } from "../shared/identifiers.js";

/** Index of the reserved "ungrouped" bucket. */
export const UNGROUPED = 0;

/** Risk tier sharing a fee rate and an open-interest cap across member pairs. */
export interface Group {
	readonly feePerBlock: bigint;
	readonly maxOi: bigint;
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
	readonly accLastUpdatedBlock: number;
	readonly oiLong: bigint;
	readonly oiShort: bigint;
	readonly feeExponent: number;
}

/**
 * Frozen snapshot taken when a pair entered `groupIndex`: the incoming
 * group's, the outgoing group's and the pair's own accumulators at `block`.
 */
export interface PairGroup {
	readonly groupIndex: number;
	readonly block: number;
	readonly initialAccFeeLong: bigint;
	readonly initialAccFeeShort: bigint;
	readonly prevGroupAccFeeLong: bigint;
	readonly prevGroupAccFeeShort: bigint;
	readonly pairAccFeeLong: bigint;
	readonly pairAccFeeShort: bigint;
}

/** Pair state without its transition log. */
export interface PairState {
	readonly feePerBlock: bigint;
	readonly feeExponent: number;
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
	readonly accLastUpdatedBlock: number;
	readonly maxOi: bigint;
}

/** Tradable instrument; the last `groups` entry is its current group. */
export interface Pair extends PairState {
	readonly groups: readonly PairGroup[];
}

/** Pair and group accumulator values recorded once, when a trade opens. */
export interface InitialAccFees {
	readonly accPairFee: bigint;
	readonly accGroupFee: bigint;
	readonly block: number;
}

/** Long/short pair of values. */
export interface SideValues {
	readonly long: bigint;
	readonly short: bigint;
}

/** Accumulators after settlement plus the delta accrued since the last update. */
export interface PendingAccFees {
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
	readonly delta: bigint;
}

// ── Parameters ──────────────────────────────────────────────────────

export interface PairParams {
	readonly groupIndex: number;
	readonly feePerBlock: bigint;
	readonly feeExponent: number;
	readonly maxOi: bigint;
}

export interface GroupParams {
	readonly feePerBlock: bigint;
	readonly maxOi: bigint;
	readonly feeExponent: number;
}

// ── Trade inputs ────────────────────────────────────────────────────

/** Open or close notification from the trading flow. */
export interface TradeAction extends PositionKey {
	/** Collateral × leverage, at collateral precision */
	readonly positionSize: bigint;
	readonly open: boolean;
	readonly long: boolean;
}

export interface TradeFeeInput extends PositionKey {
	readonly long: boolean;
	/** At collateral precision */
	readonly collateral: bigint;
	readonly leverage: bigint;
}

export interface LiquidationPriceInput extends TradeFeeInput {
	/** At price precision */
	readonly openPrice: bigint;
	/** Rollover fee already owed by the trade, at collateral precision */
	readonly rolloverFee: bigint;
}

export type { PositionKey, TraderAddress };

// ── Helpers ─────────────────────────────────────────────────────────

/** Pick the long or short value. */
export function sideOf<T>(long: boolean, longValue: T, shortValue: T): T {
	return long ? longValue : shortValue;
}

export const EMPTY_GROUP: Group = {
	feePerBlock: 0n,
	maxOi: 0n,
	accFeeLong: 0n,
	accFeeShort: 0n,
	accLastUpdatedBlock: 0,
	oiLong: 0n,
	oiShort: 0n,
	feeExponent: 0,
};

export const EMPTY_PAIR_STATE: PairState = {
	feePerBlock: 0n,
	feeExponent: 0,
	accFeeLong: 0n,
	accFeeShort: 0n,
	accLastUpdatedBlock: 0,
	maxOi: 0n,
};

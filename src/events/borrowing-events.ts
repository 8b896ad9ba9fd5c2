/**
 * Borrowing events: what changed in the engine's state.
 *
 * Emitted after the operation that produced them has committed; a rolled-back
 * operation emits nothing. Amounts are raw scaled integers.
 */

import type { TraderAddress } from "../shared/identifiers.js";

export type BorrowingEvent =
	| PairAccFeesUpdated
	| GroupAccFeesUpdated
	| GroupOiUpdated
	| PairGroupUpdated
	| PairParamsUpdated
	| GroupUpdated
	| TradeInitialAccFeesStored
	| TradeActionHandled;

export type BorrowingEventType = BorrowingEvent["type"];

// ── Accrual ──────────────────────────────────────────────────────────

export interface PairAccFeesUpdated {
	readonly type: "pair_acc_fees_updated";
	readonly block: number;
	readonly pairIndex: number;
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
}

export interface GroupAccFeesUpdated {
	readonly type: "group_acc_fees_updated";
	readonly block: number;
	readonly groupIndex: number;
	readonly accFeeLong: bigint;
	readonly accFeeShort: bigint;
}

export interface GroupOiUpdated {
	readonly type: "group_oi_updated";
	readonly block: number;
	readonly groupIndex: number;
	readonly long: boolean;
	readonly increase: boolean;
	/** Internal precision */
	readonly amount: bigint;
	readonly oiLong: bigint;
	readonly oiShort: bigint;
}

// ── Administration ───────────────────────────────────────────────────

export interface PairGroupUpdated {
	readonly type: "pair_group_updated";
	readonly block: number;
	readonly pairIndex: number;
	readonly prevGroupIndex: number;
	readonly groupIndex: number;
}

export interface PairParamsUpdated {
	readonly type: "pair_params_updated";
	readonly block: number;
	readonly pairIndex: number;
	readonly groupIndex: number;
	readonly feePerBlock: bigint;
	readonly feeExponent: number;
	readonly maxOi: bigint;
}

export interface GroupUpdated {
	readonly type: "group_updated";
	readonly block: number;
	readonly groupIndex: number;
	readonly feePerBlock: bigint;
	readonly maxOi: bigint;
	readonly feeExponent: number;
}

// ── Trades ───────────────────────────────────────────────────────────

export interface TradeInitialAccFeesStored {
	readonly type: "trade_initial_acc_fees_stored";
	readonly block: number;
	readonly trader: TraderAddress;
	readonly pairIndex: number;
	readonly index: number;
	readonly long: boolean;
	readonly accPairFee: bigint;
	readonly accGroupFee: bigint;
}

export interface TradeActionHandled {
	readonly type: "trade_action_handled";
	readonly block: number;
	readonly trader: TraderAddress;
	readonly pairIndex: number;
	readonly index: number;
	readonly open: boolean;
	readonly long: boolean;
	readonly positionSize: bigint;
}

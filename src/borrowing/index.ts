export {
	UNGROUPED,
	type Group,
	type PairGroup,
	type PairState,
	type Pair,
	type InitialAccFees,
	type SideValues,
	type PendingAccFees,
	type PairParams,
	type GroupParams,
	type TradeAction,
	type TradeFeeInput,
	type LiquidationPriceInput,
	sideOf,
	EMPTY_GROUP,
	EMPTY_PAIR_STATE,
} from "./types.js";

export {
	type PendingAccFeesInput,
	type FeeRateModel,
	netOiUtilizationModel,
} from "./fee-rate-model.js";
export {
	type LiquidationPriceParams,
	type LiquidationPriceFormula,
	thresholdLiquidationPrice,
} from "./liquidation.js";
export {
	Capability,
	type AccessPolicy,
	RoleAccessPolicy,
	requireCapability,
} from "./access.js";
export { type PairOpenInterestSource, InMemoryPositionLedger } from "./position-ledger.js";
export { type BorrowingLedger, InMemoryBorrowingLedger } from "./ledger.js";
export { type SettlementDeps, AccumulatorSettlement } from "./settlement.js";
export { type OpenInterestDeps, OpenInterestTracker } from "./open-interest.js";
export { TransitionLog, currentGroupIndex } from "./transition-log.js";
export { type GroupReassignmentDeps, GroupReassignment } from "./group-reassignment.js";
export {
	type TradeFeeResolverDeps,
	type FeeTrade,
	TradeFeeResolver,
} from "./trade-fee-resolver.js";
export { type BorrowingFeesEngineDeps, BorrowingFeesEngine } from "./engine.js";

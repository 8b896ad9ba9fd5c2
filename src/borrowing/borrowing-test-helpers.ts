/**
 * Shared test helpers for the borrowing components: a wired set of
 * collaborators over in-memory stand-ins, and a trivially traceable curve.
 */

import { EventQueue } from "../events/event-dispatcher.js";
import { silentLogger } from "../lib/logger/index.js";
import { traderAddress } from "../shared/identifiers.js";
import { type FeeRateModel, netOiUtilizationModel } from "./fee-rate-model.js";
import { GroupReassignment } from "./group-reassignment.js";
import { InMemoryBorrowingLedger } from "./ledger.js";
import { OpenInterestTracker } from "./open-interest.js";
import { InMemoryPositionLedger } from "./position-ledger.js";
import { AccumulatorSettlement } from "./settlement.js";
import { TradeFeeResolver } from "./trade-fee-resolver.js";
import { TransitionLog } from "./transition-log.js";
import { EMPTY_GROUP, EMPTY_PAIR_STATE, type Group, type PairState } from "./types.js";

export const P = 10n ** 10n;
/** One whole collateral unit at 18 decimals. */
export const UNIT = 10n ** 18n;
export const TRADER = traderAddress("0xtrader");

/** Both sides grow by `feePerBlock` per elapsed block, whatever the open interest. */
export const linearModel: FeeRateModel = (input) => {
	const delta = BigInt(input.currentBlock - input.accLastUpdatedBlock) * input.feePerBlock;
	return {
		accFeeLong: input.accFeeLong + delta,
		accFeeShort: input.accFeeShort + delta,
		delta,
	};
};

export function pairState(overrides: Partial<PairState> = {}): PairState {
	return { ...EMPTY_PAIR_STATE, ...overrides };
}

export function group(overrides: Partial<Group> = {}): Group {
	return { ...EMPTY_GROUP, ...overrides };
}

export function createHarness(model: FeeRateModel = netOiUtilizationModel) {
	const ledger = new InMemoryBorrowingLedger();
	const positions = new InMemoryPositionLedger();
	const events = new EventQueue();
	const logger = silentLogger();
	const precision = { precisionDecimals: 10, collateralDecimals: 18 };

	const settlement = new AccumulatorSettlement({
		ledger,
		positions,
		model,
		events,
		logger,
		...precision,
	});
	const openInterest = new OpenInterestTracker({ ledger, events, logger, ...precision });
	const log = new TransitionLog(ledger);
	const reassignment = new GroupReassignment({
		settlement,
		openInterest,
		positions,
		log,
		events,
		logger,
	});
	const resolver = new TradeFeeResolver({ settlement, log, precisionDecimals: 10 });

	return { ledger, positions, events, settlement, openInterest, log, reassignment, resolver };
}

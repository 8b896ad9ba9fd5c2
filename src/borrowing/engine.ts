/**
 * BorrowingFeesEngine: the entry points the trading venue calls.
 *
 * Administrative setters require the manager capability, trade notifications
 * the callbacks capability. Every state-changing call reads the block clock
 * once, runs as one atomic ledger unit and publishes its events only after
 * it commits. Queries compute pending state and never write.
 */

import { EventDispatcher, EventQueue } from "../events/event-dispatcher.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { validate } from "../lib/validation/index.js";
import type { BlockClock } from "../shared/block-clock.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../shared/config.js";
import { type BorrowingError, InvalidParameterError, classifyError } from "../shared/errors.js";
import { type PositionKey, assertIndex, traderAddress } from "../shared/identifiers.js";
import { type Result, collect, err, ok } from "../shared/result.js";
import { type AccessPolicy, Capability, requireCapability } from "./access.js";
import { type FeeRateModel, netOiUtilizationModel } from "./fee-rate-model.js";
import { GroupReassignment } from "./group-reassignment.js";
import { type BorrowingLedger, InMemoryBorrowingLedger } from "./ledger.js";
import { type LiquidationPriceFormula, thresholdLiquidationPrice } from "./liquidation.js";
import { OpenInterestTracker } from "./open-interest.js";
import type { PairOpenInterestSource } from "./position-ledger.js";
import {
	groupParamsSchema,
	indexListSchema,
	liquidationPriceInputSchema,
	pairParamsSchema,
	tradeActionSchema,
	tradeFeeInputSchema,
} from "./schemas.js";
import { AccumulatorSettlement } from "./settlement.js";
import { TradeFeeResolver } from "./trade-fee-resolver.js";
import { TransitionLog } from "./transition-log.js";
import {
	type Group,
	type GroupParams,
	type InitialAccFees,
	type LiquidationPriceInput,
	type Pair,
	type PairGroup,
	type PairParams,
	type PendingAccFees,
	type SideValues,
	type TradeAction,
	type TradeFeeInput,
	UNGROUPED,
	sideOf,
} from "./types.js";

export interface BorrowingFeesEngineDeps {
	readonly clock: BlockClock;
	readonly access: AccessPolicy;
	readonly positions: PairOpenInterestSource;
	/** Defaults to an InMemoryBorrowingLedger */
	readonly ledger?: BorrowingLedger;
	/** Defaults to the net-OI utilization curve */
	readonly model?: FeeRateModel;
	readonly liquidationPrice?: LiquidationPriceFormula;
	readonly config?: Partial<EngineConfig>;
	/** Defaults to a pino logger at the configured level */
	readonly logger?: Logger;
	readonly dispatcher?: EventDispatcher;
}

export class BorrowingFeesEngine {
	readonly config: EngineConfig;
	/** Subscribe here to committed events. */
	readonly dispatcher: EventDispatcher;

	private readonly clock: BlockClock;
	private readonly access: AccessPolicy;
	private readonly ledger: BorrowingLedger;
	private readonly liquidationPrice: LiquidationPriceFormula;
	private readonly logger: Logger;
	private readonly events = new EventQueue();
	private readonly settlement: AccumulatorSettlement;
	private readonly openInterest: OpenInterestTracker;
	private readonly log: TransitionLog;
	private readonly reassignment: GroupReassignment;
	private readonly resolver: TradeFeeResolver;

	constructor(deps: BorrowingFeesEngineDeps) {
		this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
		this.clock = deps.clock;
		this.access = deps.access;
		this.ledger = deps.ledger ?? new InMemoryBorrowingLedger();
		this.liquidationPrice = deps.liquidationPrice ?? thresholdLiquidationPrice;
		this.logger = (deps.logger ?? createLogger({ level: this.config.logLevel })).child({
			name: this.config.name,
		});
		this.dispatcher =
			deps.dispatcher ??
			new EventDispatcher((error, event) => {
				this.logger.error(
					{ event: event.type, error: classifyError(error).toJSON() },
					"event handler failed",
				);
			});

		const { precisionDecimals, collateralDecimals } = this.config;
		this.settlement = new AccumulatorSettlement({
			ledger: this.ledger,
			positions: deps.positions,
			model: deps.model ?? netOiUtilizationModel,
			precisionDecimals,
			collateralDecimals,
			events: this.events,
			logger: this.logger.child({ component: "settlement" }),
		});
		this.openInterest = new OpenInterestTracker({
			ledger: this.ledger,
			events: this.events,
			logger: this.logger.child({ component: "open-interest" }),
			precisionDecimals,
			collateralDecimals,
		});
		this.log = new TransitionLog(this.ledger);
		this.reassignment = new GroupReassignment({
			settlement: this.settlement,
			openInterest: this.openInterest,
			positions: deps.positions,
			log: this.log,
			events: this.events,
			logger: this.logger.child({ component: "reassignment" }),
		});
		this.resolver = new TradeFeeResolver({
			settlement: this.settlement,
			log: this.log,
			precisionDecimals,
		});
	}

	// ── Administration ──────────────────────────────────────────────

	setPairParams(
		caller: string,
		pairIndex: number,
		params: PairParams,
	): Result<void, BorrowingError> {
		return this.setPairParamsArray(caller, [pairIndex], [params]);
	}

	/** Applies every entry or none. */
	setPairParamsArray(
		caller: string,
		pairIndices: readonly number[],
		params: readonly PairParams[],
	): Result<void, BorrowingError> {
		return this.run("setPairParams", caller, Capability.Manager, (block) => {
			if (pairIndices.length !== params.length) {
				return err(batchLengthMismatch(pairIndices.length, params.length));
			}
			const indices = validate(indexListSchema, pairIndices, "pair indices");
			if (!indices.ok) return indices;
			const applied = collect(pairIndices, (pairIndex, i) =>
				this.applyPairParams(pairIndex, params[i], block),
			);
			return applied.ok ? ok(undefined) : applied;
		});
	}

	setGroupParams(
		caller: string,
		groupIndex: number,
		params: GroupParams,
	): Result<void, BorrowingError> {
		return this.setGroupParamsArray(caller, [groupIndex], [params]);
	}

	/** Applies every entry or none. */
	setGroupParamsArray(
		caller: string,
		groupIndices: readonly number[],
		params: readonly GroupParams[],
	): Result<void, BorrowingError> {
		return this.run("setGroupParams", caller, Capability.Manager, (block) => {
			if (groupIndices.length !== params.length) {
				return err(batchLengthMismatch(groupIndices.length, params.length));
			}
			const indices = validate(indexListSchema, groupIndices, "group indices");
			if (!indices.ok) return indices;
			const applied = collect(groupIndices, (groupIndex, i) =>
				this.applyGroupParams(groupIndex, params[i], block),
			);
			return applied.ok ? ok(undefined) : applied;
		});
	}

	// ── Trade lifecycle ─────────────────────────────────────────────

	/**
	 * Called once when a trade opens and once when it closes, before the
	 * position ledger reflects the change.
	 */
	handleTradeAction(caller: string, action: TradeAction): Result<void, BorrowingError> {
		return this.run("handleTradeAction", caller, Capability.Callbacks, (block) => {
			const parsed = validate(tradeActionSchema, action, "trade action");
			if (!parsed.ok) return parsed;
			const { pairIndex, index, positionSize, open, long } = parsed.value;
			const trader = traderAddress(parsed.value.trader);

			const pairAcc = this.settlement.settlePair(pairIndex, block);
			if (!pairAcc.ok) return pairAcc;
			const groupIndex = this.log.currentGroupIndex(pairIndex);
			const groupAcc = this.settlement.settleGroup(groupIndex, block);
			if (!groupAcc.ok) return groupAcc;

			const adjusted = this.openInterest.adjustGroupOi(
				groupIndex,
				long,
				open,
				positionSize,
				block,
			);
			if (!adjusted.ok) return adjusted;

			if (open) {
				const initial: InitialAccFees = {
					accPairFee: sideOf(long, pairAcc.value.long, pairAcc.value.short),
					accGroupFee: sideOf(long, groupAcc.value.long, groupAcc.value.short),
					block,
				};
				this.ledger.saveInitialAccFees({ trader, pairIndex, index }, initial);
				this.events.push({
					type: "trade_initial_acc_fees_stored",
					block,
					trader,
					pairIndex,
					index,
					long,
					accPairFee: initial.accPairFee,
					accGroupFee: initial.accGroupFee,
				});
			}

			this.events.push({
				type: "trade_action_handled",
				block,
				trader,
				pairIndex,
				index,
				open,
				long,
				positionSize,
			});
			return ok(undefined);
		});
	}

	// ── Queries ─────────────────────────────────────────────────────

	/** Whether opening `positionSize` (collateral precision) fits the pair's group cap. */
	withinMaxGroupOi(pairIndex: number, long: boolean, positionSize: bigint): boolean {
		assertIndex(pairIndex, "pairIndex");
		if (positionSize < 0n) {
			throw new RangeError(`positionSize must be non-negative, got ${positionSize}`);
		}
		return this.openInterest.withinMaxGroupOi(
			this.log.currentGroupIndex(pairIndex),
			long,
			positionSize,
		);
	}

	/** Borrowing fee the trade owes at the current block, at collateral precision. */
	getTradeBorrowingFee(input: TradeFeeInput): Result<bigint, BorrowingError> {
		const parsed = validate(tradeFeeInputSchema, input, "trade");
		if (!parsed.ok) return parsed;
		return this.borrowingFee(
			{ ...parsed.value, trader: traderAddress(parsed.value.trader) },
			this.clock.currentBlock(),
		);
	}

	/** Liquidation price including the borrowing fee owed at the current block. */
	getTradeLiquidationPrice(input: LiquidationPriceInput): Result<bigint, BorrowingError> {
		const parsed = validate(liquidationPriceInputSchema, input, "trade");
		if (!parsed.ok) return parsed;
		const trade = { ...parsed.value, trader: traderAddress(parsed.value.trader) };

		const fee = this.borrowingFee(trade, this.clock.currentBlock());
		if (!fee.ok) return fee;
		try {
			return ok(
				this.liquidationPrice({
					openPrice: trade.openPrice,
					long: trade.long,
					collateral: trade.collateral,
					leverage: trade.leverage,
					rolloverFee: trade.rolloverFee,
					borrowingFee: fee.value,
					liqThresholdPct: this.config.liqThresholdPct,
				}),
			);
		} catch (error: unknown) {
			return err(classifyError(error));
		}
	}

	getPairPendingAccFees(pairIndex: number): Result<PendingAccFees, BorrowingError> {
		assertIndex(pairIndex, "pairIndex");
		return this.settlement.pendingPairAccFees(pairIndex, this.clock.currentBlock());
	}

	getGroupPendingAccFees(groupIndex: number): Result<PendingAccFees, BorrowingError> {
		assertIndex(groupIndex, "groupIndex");
		return this.settlement.pendingGroupAccFees(groupIndex, this.clock.currentBlock());
	}

	// ── Accessors ───────────────────────────────────────────────────

	getPair(pairIndex: number): Pair {
		assertIndex(pairIndex, "pairIndex");
		return { ...this.ledger.pairState(pairIndex), groups: [...this.ledger.pairGroups(pairIndex)] };
	}

	getGroup(groupIndex: number): Group {
		assertIndex(groupIndex, "groupIndex");
		return this.ledger.group(groupIndex);
	}

	/** Every pair from index 0 to the highest ever written. */
	getAllPairs(): Pair[] {
		return Array.from({ length: this.ledger.pairCount() }, (_, i) => this.getPair(i));
	}

	getGroups(groupIndices: readonly number[]): Group[] {
		return groupIndices.map((i) => this.getGroup(i));
	}

	getPairMaxOi(pairIndex: number): bigint {
		assertIndex(pairIndex, "pairIndex");
		return this.ledger.pairState(pairIndex).maxOi;
	}

	getPairGroupIndex(pairIndex: number): number {
		assertIndex(pairIndex, "pairIndex");
		return this.log.currentGroupIndex(pairIndex);
	}

	getPairGroups(pairIndex: number): PairGroup[] {
		assertIndex(pairIndex, "pairIndex");
		return [...this.log.entries(pairIndex)];
	}

	getTradeInitialAccFees(key: PositionKey): InitialAccFees | null {
		return this.ledger.initialAccFees(key);
	}

	/** The pair's open interest at internal precision. */
	getPairOpenInterest(pairIndex: number): SideValues {
		assertIndex(pairIndex, "pairIndex");
		return this.settlement.pairOpenInterest(pairIndex);
	}

	// ── Internal ──────────────────────────────────────────────────

	private applyPairParams(
		pairIndex: number,
		params: PairParams | undefined,
		block: number,
	): Result<void, BorrowingError> {
		const parsed = validate(pairParamsSchema, params, `pair ${pairIndex} params`);
		if (!parsed.ok) return parsed;
		const { groupIndex, feePerBlock, feeExponent, maxOi } = parsed.value;

		// A group change settles the pair itself.
		const moved = this.reassignment.reassign(pairIndex, groupIndex, block);
		if (!moved.ok) return moved;
		if (moved.value === null) {
			const settled = this.settlement.settlePair(pairIndex, block);
			if (!settled.ok) return settled;
		}

		this.ledger.savePairState(pairIndex, {
			...this.ledger.pairState(pairIndex),
			feePerBlock,
			feeExponent,
			maxOi,
		});
		this.events.push({
			type: "pair_params_updated",
			block,
			pairIndex,
			groupIndex,
			feePerBlock,
			feeExponent,
			maxOi,
		});
		this.logger.info(
			{ pairIndex, groupIndex, feePerBlock, feeExponent, maxOi, block },
			"pair params set",
		);
		return ok(undefined);
	}

	private applyGroupParams(
		groupIndex: number,
		params: GroupParams | undefined,
		block: number,
	): Result<void, BorrowingError> {
		if (groupIndex === UNGROUPED) {
			return err(new InvalidParameterError("Group 0 is reserved and cannot be configured"));
		}
		const parsed = validate(groupParamsSchema, params, `group ${groupIndex} params`);
		if (!parsed.ok) return parsed;
		const { feePerBlock, maxOi, feeExponent } = parsed.value;

		const settled = this.settlement.settleGroup(groupIndex, block);
		if (!settled.ok) return settled;

		this.ledger.saveGroup(groupIndex, {
			...this.ledger.group(groupIndex),
			feePerBlock,
			maxOi,
			feeExponent,
		});
		this.events.push({ type: "group_updated", block, groupIndex, feePerBlock, maxOi, feeExponent });
		this.logger.info({ groupIndex, feePerBlock, maxOi, feeExponent, block }, "group params set");
		return ok(undefined);
	}

	private borrowingFee(input: TradeFeeInput, block: number): Result<bigint, BorrowingError> {
		const initial = this.ledger.initialAccFees(input);
		if (initial === null) {
			return err(
				new InvalidParameterError("No open trade recorded for this position", {
					trader: input.trader,
					pairIndex: input.pairIndex,
					index: input.index,
				}),
			);
		}
		return this.resolver.tradeFee(input, initial, block);
	}

	/**
	 * Capability check, then `fn` as one atomic unit at the current block.
	 * Events are published on commit and dropped on rollback.
	 */
	private run(
		operation: string,
		caller: string,
		capability: Capability,
		fn: (block: number) => Result<void, BorrowingError>,
	): Result<void, BorrowingError> {
		const block = this.clock.currentBlock();
		let result: Result<void, BorrowingError>;

		const allowed = requireCapability(this.access, caller, capability);
		if (!allowed.ok) {
			result = allowed;
		} else {
			try {
				result = this.ledger.atomically(() => fn(block));
			} catch (error: unknown) {
				result = err(classifyError(error));
			}
		}

		if (!result.ok) {
			this.events.discard();
			this.logger.warn(
				{ operation, caller, block, error: result.error.toJSON() },
				"operation rejected",
			);
			return result;
		}
		for (const event of this.events.drain()) {
			this.dispatcher.emit(event);
		}
		return result;
	}
}

function batchLengthMismatch(indices: number, params: number): InvalidParameterError {
	return new InvalidParameterError(`Batch length mismatch: ${indices} indices, ${params} params`, {
		indices,
		params,
	});
}

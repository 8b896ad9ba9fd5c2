import * as fc from "fast-check";
import { beforeEach, describe, expect, it } from "vitest";
import { RoleAccessPolicy } from "../borrowing/access.js";
import { TRADER, UNIT, linearModel } from "../borrowing/borrowing-test-helpers.js";
import { BorrowingFeesEngine } from "../borrowing/engine.js";
import type { FeeRateModel } from "../borrowing/fee-rate-model.js";
import { InMemoryPositionLedger } from "../borrowing/position-ledger.js";
import type { GroupParams, PairParams, TradeAction } from "../borrowing/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { FakeBlockClock } from "../shared/block-clock.js";
import { CapacityOverflowError } from "../shared/errors.js";

const MANAGER = "manager-key";
const CALLBACKS = "trading-callbacks";

function createEngine(model?: FeeRateModel, startBlock = 100) {
	const clock = new FakeBlockClock(startBlock);
	const positions = new InMemoryPositionLedger();
	const engine = new BorrowingFeesEngine({
		clock,
		positions,
		access: new RoleAccessPolicy({ manager: [MANAGER], callbacks: [CALLBACKS] }),
		logger: silentLogger(),
		...(model ? { model } : {}),
	});
	return { clock, positions, engine };
}

function pairParams(overrides: Partial<PairParams> = {}): PairParams {
	return { groupIndex: 0, feePerBlock: 10n ** 8n, feeExponent: 1, maxOi: 10n ** 12n, ...overrides };
}

function groupParams(overrides: Partial<GroupParams> = {}): GroupParams {
	return { feePerBlock: 10n ** 8n, maxOi: 10n ** 12n, feeExponent: 1, ...overrides };
}

function openLong(pairIndex: number, positionSize: bigint, index = 0): TradeAction {
	return { trader: TRADER, pairIndex, index, positionSize, open: true, long: true };
}

/** The net-OI curve written out for a single elapsed span. */
function referenceDelta(
	elapsed: bigint,
	feePerBlock: bigint,
	netOi: bigint,
	maxOi: bigint,
	exponent: bigint,
): bigint {
	const P = 10n ** 10n;
	const utilization = (netOi * P) / maxOi;
	return (elapsed * feePerBlock * utilization ** exponent) / P ** exponent;
}

describe("Borrowing fees (integration)", () => {
	describe("pinned scenario", () => {
		it("charges an ungrouped pair's own accrual over 50 blocks", () => {
			const { clock, positions, engine } = createEngine();
			engine.setPairParams(MANAGER, 7, pairParams());
			engine.handleTradeAction(CALLBACKS, openLong(7, 10_000n));
			positions.increase(7, true, 50n * UNIT);
			clock.set(150);

			const accDelta = referenceDelta(50n, 10n ** 8n, 5n * 10n ** 11n, 10n ** 12n, 1n);
			const expected = (1000n * 10n * accDelta) / 10n ** 10n / 100n;

			const fee = engine.getTradeBorrowingFee({
				trader: TRADER,
				pairIndex: 7,
				index: 0,
				long: true,
				collateral: 1000n,
				leverage: 10n,
			});
			expect(accDelta).toBe(2_500_000_000n);
			expect(fee).toEqual({ ok: true, value: expected });
			expect(expected).toBe(25n);
		});
	});

	describe("trade spanning reassignments", () => {
		// Linear curve: pair 10/block, group 1 100/block, group 2 1/block.
		let env: ReturnType<typeof createEngine>;

		beforeEach(() => {
			env = createEngine(linearModel, 5);
			const { engine, clock, positions } = env;
			engine.setGroupParamsArray(
				MANAGER,
				[1, 2],
				[groupParams({ feePerBlock: 100n }), groupParams({ feePerBlock: 1n })],
			);
			engine.setPairParams(MANAGER, 1, pairParams({ groupIndex: 1, feePerBlock: 10n, maxOi: 0n }));

			clock.set(10);
			engine.handleTradeAction(CALLBACKS, openLong(1, UNIT));
			positions.increase(1, true, UNIT);

			clock.set(20);
			engine.setPairParams(MANAGER, 1, pairParams({ groupIndex: 2, feePerBlock: 10n, maxOi: 0n }));
			clock.set(30);
			engine.setPairParams(MANAGER, 1, pairParams({ groupIndex: 1, feePerBlock: 10n, maxOi: 0n }));
			clock.set(40);
		});

		it("keeps a strictly increasing log across A → B → A", () => {
			expect(env.engine.getPairGroups(1).map((e) => [e.groupIndex, e.block])).toEqual([
				[1, 5],
				[2, 20],
				[1, 30],
			]);
		});

		it("charges max(group, pair) per segment", () => {
			// [10,20) max(1000,100) + [20,30) max(10,100) + [30,40) max(1000,100)
			const fee = env.engine.getTradeBorrowingFee({
				trader: TRADER,
				pairIndex: 1,
				index: 0,
				long: true,
				collateral: 10n ** 11n,
				leverage: 10n,
			});
			expect(fee).toEqual({ ok: true, value: 2100n });
		});

		it("never charges less than the pair's own accrual", () => {
			const pairOnly = 350n - 50n;
			const fee = env.engine.getTradeBorrowingFee({
				trader: TRADER,
				pairIndex: 1,
				index: 0,
				long: true,
				collateral: 10n ** 11n,
				leverage: 10n,
			});
			expect(fee.ok && fee.value >= pairOnly).toBe(true);
		});

		it("follows the pair's open interest between groups", () => {
			expect(env.engine.getGroup(1).oiLong).toBe(10n ** 10n);
			expect(env.engine.getGroup(2).oiLong).toBe(0n);

			env.engine.handleTradeAction(CALLBACKS, { ...openLong(1, UNIT), open: false });
			expect(env.engine.getGroup(1).oiLong).toBe(0n);
		});
	});

	describe("unrelated administration", () => {
		function runTrade(extraAdmin: boolean): bigint | null {
			const { clock, positions, engine } = createEngine();
			engine.setGroupParams(MANAGER, 1, groupParams());
			engine.setPairParams(MANAGER, 1, pairParams({ groupIndex: 1 }));
			engine.handleTradeAction(CALLBACKS, openLong(1, 50n * UNIT));
			positions.increase(1, true, 50n * UNIT);

			clock.set(120);
			if (extraAdmin) {
				engine.setPairParams(MANAGER, 2, pairParams({ groupIndex: 1 }));
				engine.setGroupParams(MANAGER, 3, groupParams({ feePerBlock: 7n }));
			}
			clock.set(150);

			const fee = engine.getTradeBorrowingFee({
				trader: TRADER,
				pairIndex: 1,
				index: 0,
				long: true,
				collateral: 1000n,
				leverage: 10n,
			});
			return fee.ok ? fee.value : null;
		}

		it("does not change a trade's fee", () => {
			expect(runTrade(false)).toBe(25n);
			expect(runTrade(true)).toBe(25n);
		});
	});

	describe("capacity overflow", () => {
		it("leaves no partial state when a move cannot migrate open interest", () => {
			const { clock, positions, engine } = createEngine();
			engine.setGroupParams(MANAGER, 1, groupParams({ maxOi: 0n }));
			engine.handleTradeAction(CALLBACKS, openLong(1, 10_000n));
			positions.increase(1, true, 2n ** 72n * 10n ** 8n);
			clock.advance();

			const before = { pair: engine.getPair(1), group: engine.getGroup(1) };
			const r = engine.setPairParams(MANAGER, 1, pairParams({ groupIndex: 1 }));

			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error).toBeInstanceOf(CapacityOverflowError);
			expect(engine.getPair(1)).toEqual(before.pair);
			expect(engine.getGroup(1)).toEqual(before.group);
			expect(engine.getPairGroupIndex(1)).toBe(0);
		});
	});

	describe("invariants under arbitrary operation sequences", () => {
		const opArb = fc.oneof(
			fc.record({ kind: fc.constant("advance" as const), blocks: fc.integer({ min: 0, max: 5 }) }),
			fc.record({
				kind: fc.constant("trade" as const),
				pairIndex: fc.integer({ min: 0, max: 2 }),
				index: fc.integer({ min: 0, max: 2 }),
				size: fc.bigInt({ min: 0n, max: 100n * UNIT }),
				open: fc.boolean(),
				long: fc.boolean(),
			}),
			fc.record({
				kind: fc.constant("pair" as const),
				pairIndex: fc.integer({ min: 0, max: 2 }),
				groupIndex: fc.integer({ min: 0, max: 2 }),
				feePerBlock: fc.bigInt({ min: 0n, max: 10n ** 9n }),
				feeExponent: fc.integer({ min: 1, max: 3 }),
			}),
			fc.record({
				kind: fc.constant("group" as const),
				groupIndex: fc.integer({ min: 1, max: 2 }),
				feePerBlock: fc.bigInt({ min: 0n, max: 10n ** 9n }),
				feeExponent: fc.integer({ min: 1, max: 3 }),
			}),
		);

		it("accumulators never decrease, logs stay ordered, group 0 holds no OI", () => {
			fc.assert(
				fc.property(fc.array(opArb, { maxLength: 40 }), (ops) => {
					const { clock, positions, engine } = createEngine(undefined, 0);
					const lastAcc = new Map<string, bigint>();

					const check = (key: string, value: bigint): void => {
						expect(value >= (lastAcc.get(key) ?? 0n)).toBe(true);
						lastAcc.set(key, value);
					};

					for (const op of ops) {
						switch (op.kind) {
							case "advance":
								clock.advance(op.blocks);
								break;
							case "trade":
								engine.handleTradeAction(CALLBACKS, {
									trader: TRADER,
									pairIndex: op.pairIndex,
									index: op.index,
									positionSize: op.size,
									open: op.open,
									long: op.long,
								});
								if (op.open) positions.increase(op.pairIndex, op.long, op.size);
								else positions.decrease(op.pairIndex, op.long, op.size);
								break;
							case "pair":
								engine.setPairParams(MANAGER, op.pairIndex, {
									groupIndex: op.groupIndex,
									feePerBlock: op.feePerBlock,
									feeExponent: op.feeExponent,
									maxOi: 10n ** 12n,
								});
								break;
							case "group":
								engine.setGroupParams(MANAGER, op.groupIndex, {
									feePerBlock: op.feePerBlock,
									maxOi: 10n ** 12n,
									feeExponent: op.feeExponent,
								});
								break;
						}

						for (let i = 0; i <= 2; i++) {
							const pair = engine.getPair(i);
							check(`pair-${i}-long`, pair.accFeeLong);
							check(`pair-${i}-short`, pair.accFeeShort);
							const blocks = pair.groups.map((e) => e.block);
							expect(blocks.every((b, j) => j === 0 || b > (blocks[j - 1] ?? -1))).toBe(true);

							const group = engine.getGroup(i);
							check(`group-${i}-long`, group.accFeeLong);
							check(`group-${i}-short`, group.accFeeShort);
						}
						expect(engine.getGroup(0)).toMatchObject({ oiLong: 0n, oiShort: 0n });
					}
				}),
				{ numRuns: 100 },
			);
		});
	});
});

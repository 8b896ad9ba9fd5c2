import { bench, describe } from "vitest";
import { RoleAccessPolicy } from "../src/borrowing/access.js";
import { BorrowingFeesEngine } from "../src/borrowing/engine.js";
import { InMemoryPositionLedger } from "../src/borrowing/position-ledger.js";
import { silentLogger } from "../src/lib/logger/index.js";
import { FakeBlockClock } from "../src/shared/block-clock.js";
import { traderAddress } from "../src/shared/identifiers.js";

const MANAGER = "manager";
const CALLBACKS = "callbacks";
const UNIT = 10n ** 18n;

function engineWithLog(reassignments: number) {
	const clock = new FakeBlockClock(1);
	const positions = new InMemoryPositionLedger();
	const engine = new BorrowingFeesEngine({
		clock,
		positions,
		access: new RoleAccessPolicy({ manager: [MANAGER], callbacks: [CALLBACKS] }),
		logger: silentLogger(),
	});
	const group = { feePerBlock: 10n ** 8n, maxOi: 10n ** 13n, feeExponent: 2 };
	engine.setGroupParamsArray(MANAGER, [1, 2, 3], [group, group, group]);

	const trader = traderAddress("0xbench");
	engine.handleTradeAction(CALLBACKS, {
		trader,
		pairIndex: 0,
		index: 0,
		positionSize: 500n * UNIT,
		open: true,
		long: true,
	});
	positions.increase(0, true, 500n * UNIT);

	for (let i = 0; i < reassignments; i++) {
		clock.advance(10);
		engine.setPairParams(MANAGER, 0, {
			groupIndex: (i % 3) + 1,
			feePerBlock: 10n ** 8n,
			feeExponent: 1,
			maxOi: 10n ** 13n,
		});
	}
	clock.advance(10);

	const query = { trader, pairIndex: 0, index: 0, long: true, collateral: 100n * UNIT, leverage: 5n };
	return () => engine.getTradeBorrowingFee(query);
}

describe("trade fee resolution", () => {
	const short = engineWithLog(3);
	const long = engineWithLog(300);

	bench("3 reassignments 1000x", () => {
		for (let i = 0; i < 1000; i++) short();
	});

	bench("300 reassignments 1000x", () => {
		for (let i = 0; i < 1000; i++) long();
	});
});

function engineWithOpenTrades(openTrades: number) {
	const clock = new FakeBlockClock(1);
	const engine = new BorrowingFeesEngine({
		clock,
		positions: new InMemoryPositionLedger(),
		access: new RoleAccessPolicy({ callbacks: [CALLBACKS] }),
		logger: silentLogger(),
	});
	const trader = traderAddress("0xbench");
	let index = 0;
	const open = () =>
		engine.handleTradeAction(CALLBACKS, {
			trader,
			pairIndex: 0,
			index: index++,
			positionSize: UNIT,
			open: true,
			long: true,
		});
	for (let i = 0; i < openTrades; i++) open();
	return open;
}

describe("trade opens over a growing book", () => {
	const small = engineWithOpenTrades(100);
	const large = engineWithOpenTrades(10_000);

	bench("100 prior trades 1000x", () => {
		for (let i = 0; i < 1000; i++) small();
	});

	bench("10000 prior trades 1000x", () => {
		for (let i = 0; i < 1000; i++) large();
	});
});

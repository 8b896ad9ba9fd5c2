/**
 * Fee walkthrough: one trade, one group change, fees printed per block.
 *
 * Run: npx tsx examples/fee-walkthrough.ts
 */

import {
	BorrowingFeesEngine,
	FakeBlockClock,
	InMemoryPositionLedger,
	RoleAccessPolicy,
	createLogger,
	formatUnits,
	parseUnits,
	resolveConfig,
	traderAddress,
	unwrap,
} from "../src/index.js";

const config = resolveConfig({ logLevel: "info" });
const logger = createLogger({ level: config.logLevel });
const clock = new FakeBlockClock(1_000);
const positions = new InMemoryPositionLedger();
const engine = new BorrowingFeesEngine({
	clock,
	positions,
	access: new RoleAccessPolicy({ manager: ["ops"], callbacks: ["trading"] }),
	config,
	logger,
});

engine.dispatcher.on("pair_group_updated", (event) => {
	logger.info({ event }, "pair moved");
});

// ── Setup: a volatile tier and an ungrouped pair ────────────────────

const collateralDecimals = config.collateralDecimals;
unwrap(
	engine.setGroupParams("ops", 1, {
		feePerBlock: 30_000n,
		maxOi: parseUnits("1000000", config.precisionDecimals),
		feeExponent: 1,
	}),
);
unwrap(
	engine.setPairParams("ops", 0, {
		groupIndex: 0,
		feePerBlock: 10_000n,
		feeExponent: 1,
		maxOi: parseUnits("1000000", config.precisionDecimals),
	}),
);

// ── Open a 10x long with 1000 collateral ────────────────────────────

const trader = traderAddress("0x00000000000000000000000000000000000000aa");
const collateral = parseUnits("1000", collateralDecimals);
const leverage = 10n;
const positionSize = collateral * leverage;

unwrap(
	engine.handleTradeAction("trading", {
		trader,
		pairIndex: 0,
		index: 0,
		positionSize,
		open: true,
		long: true,
	}),
);
positions.increase(0, true, positionSize);

function report(): void {
	const fee = unwrap(
		engine.getTradeBorrowingFee({ trader, pairIndex: 0, index: 0, long: true, collateral, leverage }),
	);
	const liq = unwrap(
		engine.getTradeLiquidationPrice({
			trader,
			pairIndex: 0,
			index: 0,
			long: true,
			collateral,
			leverage,
			openPrice: parseUnits("20000", 10),
			rolloverFee: 0n,
		}),
	);
	logger.info(
		{
			block: clock.currentBlock(),
			fee: formatUnits(fee, collateralDecimals),
			liquidationPrice: formatUnits(liq, 10),
		},
		"trade status",
	);
}

clock.advance(1_000);
report();

// ── Move the pair into the volatile tier ────────────────────────────

unwrap(
	engine.setPairParams("ops", 0, {
		groupIndex: 1,
		feePerBlock: 10_000n,
		feeExponent: 1,
		maxOi: parseUnits("1000000", config.precisionDecimals),
	}),
);

clock.advance(1_000);
report();

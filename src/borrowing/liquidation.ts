/**
 * Liquidation price: the price at which a trade's remaining collateral
 * reaches the liquidation threshold.
 *
 *   distance = openPrice × (collateral × threshold% / 100 − rolloverFee − borrowingFee)
 *              / collateral / leverage
 *
 * Longs liquidate below the open price, shorts above it. Fees larger than
 * the threshold share flip the distance's sign. The result never goes below
 * zero.
 */

export interface LiquidationPriceParams {
	/** At price precision */
	readonly openPrice: bigint;
	readonly long: boolean;
	/** At collateral precision */
	readonly collateral: bigint;
	readonly leverage: bigint;
	/** At collateral precision */
	readonly rolloverFee: bigint;
	/** At collateral precision */
	readonly borrowingFee: bigint;
	/** Percentage of collateral that may be lost, e.g. 90 */
	readonly liqThresholdPct: number;
}

/** Pure formula; the engine injects one and feeds it its own fee output. */
export type LiquidationPriceFormula = (params: LiquidationPriceParams) => bigint;

export const thresholdLiquidationPrice: LiquidationPriceFormula = (params) => {
	if (params.collateral <= 0n || params.leverage <= 0n) {
		throw new RangeError("Liquidation price needs positive collateral and leverage");
	}
	const threshold = (params.collateral * BigInt(params.liqThresholdPct)) / 100n;
	const distance =
		(params.openPrice * (threshold - params.rolloverFee - params.borrowingFee)) /
		params.collateral /
		params.leverage;
	const price = params.long ? params.openPrice - distance : params.openPrice + distance;
	return price > 0n ? price : 0n;
};

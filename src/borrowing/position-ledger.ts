/**
 * Pair open interest as reported by the trading flow.
 *
 * The engine never writes pair OI: it only reads it when settling a pair or
 * migrating a pair between groups. Values are at collateral precision.
 */

import type { SideValues } from "./types.js";

export interface PairOpenInterestSource {
	pairOpenInterest(pairIndex: number): SideValues;
}

/** In-process position ledger keeping per-pair long/short totals. */
export class InMemoryPositionLedger implements PairOpenInterestSource {
	private readonly totals = new Map<number, SideValues>();

	pairOpenInterest(pairIndex: number): SideValues {
		return this.totals.get(pairIndex) ?? { long: 0n, short: 0n };
	}

	set(pairIndex: number, oi: SideValues): void {
		if (oi.long < 0n || oi.short < 0n) {
			throw new RangeError(`Open interest must be non-negative for pair ${pairIndex}`);
		}
		this.totals.set(pairIndex, oi);
	}

	increase(pairIndex: number, long: boolean, amount: bigint): void {
		this.adjust(pairIndex, long, amount);
	}

	/** Decreases saturate at zero. */
	decrease(pairIndex: number, long: boolean, amount: bigint): void {
		this.adjust(pairIndex, long, -amount);
	}

	private adjust(pairIndex: number, long: boolean, signed: bigint): void {
		const current = this.pairOpenInterest(pairIndex);
		const next = (value: bigint): bigint => (value + signed < 0n ? 0n : value + signed);
		this.totals.set(
			pairIndex,
			long
				? { long: next(current.long), short: current.short }
				: { long: current.long, short: next(current.short) },
		);
	}
}

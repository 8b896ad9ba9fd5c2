/**
 * TransitionLog: per-pair, append-only history of group membership.
 *
 * The last entry is the pair's current group; an empty log means the pair
 * has always been ungrouped. Entry blocks strictly increase.
 */

import { InvalidParameterError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { BorrowingLedger } from "./ledger.js";
import { type PairGroup, UNGROUPED } from "./types.js";

/** Group index recorded by the last entry, or group 0 for an empty log. */
export function currentGroupIndex(log: readonly PairGroup[]): number {
	return log.at(-1)?.groupIndex ?? UNGROUPED;
}

export class TransitionLog {
	private readonly ledger: BorrowingLedger;

	constructor(ledger: BorrowingLedger) {
		this.ledger = ledger;
	}

	entries(pairIndex: number): readonly PairGroup[] {
		return this.ledger.pairGroups(pairIndex);
	}

	currentGroupIndex(pairIndex: number): number {
		return currentGroupIndex(this.entries(pairIndex));
	}

	append(pairIndex: number, entry: PairGroup): Result<void, InvalidParameterError> {
		const last = this.entries(pairIndex).at(-1);
		if (last !== undefined && entry.block <= last.block) {
			return err(
				new InvalidParameterError(
					`Pair ${pairIndex} already changed group at block ${last.block}`,
					{ pairIndex, block: entry.block, lastBlock: last.block },
				),
			);
		}
		this.ledger.appendPairGroup(pairIndex, entry);
		return ok(undefined);
	}
}

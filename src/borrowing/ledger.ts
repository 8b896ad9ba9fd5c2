/**
 * BorrowingLedger: repository owning every piece of engine state.
 *
 * Pairs and groups are dense, index-addressed and permanently resident: an
 * index that was never written reads as an empty record. Transition logs are
 * append-only. All state-changing entry points run inside `atomically`, which
 * discards every write made by a failed operation.
 */

import { type PositionKey, positionKeyToString } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import {
	EMPTY_GROUP,
	EMPTY_PAIR_STATE,
	type Group,
	type InitialAccFees,
	type PairGroup,
	type PairState,
} from "./types.js";

export interface BorrowingLedger {
	pairState(pairIndex: number): PairState;
	savePairState(pairIndex: number, state: PairState): void;

	/** The pair's transition log, oldest first. */
	pairGroups(pairIndex: number): readonly PairGroup[];
	appendPairGroup(pairIndex: number, entry: PairGroup): void;

	group(groupIndex: number): Group;
	saveGroup(groupIndex: number, group: Group): void;

	/** One past the highest pair index ever written. */
	pairCount(): number;
	/** One past the highest group index ever written. */
	groupCount(): number;

	initialAccFees(key: PositionKey): InitialAccFees | null;
	saveInitialAccFees(key: PositionKey, fees: InitialAccFees): void;

	/**
	 * Runs `fn` as one all-or-nothing unit: when it returns an error or
	 * throws, every write it made is undone.
	 */
	atomically<T, E>(fn: () => Result<T, E>): Result<T, E>;
}

/** Ledger held in process memory. Records are immutable values; logs are arrays. */
export class InMemoryBorrowingLedger implements BorrowingLedger {
	private readonly pairs = new Map<number, PairState>();
	private readonly groups = new Map<number, Group>();
	private readonly initialFees = new Map<string, InitialAccFees>();
	private readonly logs = new Map<number, PairGroup[]>();
	private knownPairs = 0;
	private knownGroups = 0;

	/** Undo steps for writes made inside open units, newest last. */
	private readonly undo: (() => void)[] = [];
	private depth = 0;

	pairState(pairIndex: number): PairState {
		return this.pairs.get(pairIndex) ?? EMPTY_PAIR_STATE;
	}

	savePairState(pairIndex: number, state: PairState): void {
		this.journal(this.pairs, pairIndex);
		this.pairs.set(pairIndex, state);
		this.touchPair(pairIndex);
	}

	pairGroups(pairIndex: number): readonly PairGroup[] {
		return this.logs.get(pairIndex) ?? [];
	}

	appendPairGroup(pairIndex: number, entry: PairGroup): void {
		const log = this.logs.get(pairIndex);
		if (log) {
			log.push(entry);
			this.record(() => log.pop());
		} else {
			this.logs.set(pairIndex, [entry]);
			this.record(() => this.logs.delete(pairIndex));
		}
		this.touchPair(pairIndex);
	}

	group(groupIndex: number): Group {
		return this.groups.get(groupIndex) ?? EMPTY_GROUP;
	}

	saveGroup(groupIndex: number, group: Group): void {
		this.journal(this.groups, groupIndex);
		this.groups.set(groupIndex, group);
		if (groupIndex >= this.knownGroups) {
			const known = this.knownGroups;
			this.record(() => {
				this.knownGroups = known;
			});
			this.knownGroups = groupIndex + 1;
		}
	}

	pairCount(): number {
		return this.knownPairs;
	}

	groupCount(): number {
		return this.knownGroups;
	}

	initialAccFees(key: PositionKey): InitialAccFees | null {
		return this.initialFees.get(positionKeyToString(key)) ?? null;
	}

	saveInitialAccFees(key: PositionKey, fees: InitialAccFees): void {
		const id = positionKeyToString(key);
		this.journal(this.initialFees, id);
		this.initialFees.set(id, fees);
	}

	atomically<T, E>(fn: () => Result<T, E>): Result<T, E> {
		const mark = this.undo.length;
		this.depth += 1;
		try {
			const result = fn();
			if (!result.ok) this.rollback(mark);
			return result;
		} catch (error: unknown) {
			this.rollback(mark);
			throw error;
		} finally {
			this.depth -= 1;
			if (this.depth === 0) this.undo.length = 0;
		}
	}

	// ── Internal ──────────────────────────────────────────────────

	private record(step: () => void): void {
		if (this.depth > 0) this.undo.push(step);
	}

	/** Remembers the value `key` holds before it is overwritten. */
	private journal<K, V>(map: Map<K, V>, key: K): void {
		if (this.depth === 0) return;
		const previous = map.get(key);
		this.undo.push(() => {
			if (previous === undefined) {
				map.delete(key);
			} else {
				map.set(key, previous);
			}
		});
	}

	private touchPair(pairIndex: number): void {
		if (pairIndex < this.knownPairs) return;
		const known = this.knownPairs;
		this.record(() => {
			this.knownPairs = known;
		});
		this.knownPairs = pairIndex + 1;
	}

	private rollback(mark: number): void {
		while (this.undo.length > mark) {
			this.undo.pop()?.();
		}
	}
}

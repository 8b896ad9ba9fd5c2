/**
 * Block clock: injectable source of the current block number.
 *
 * The engine never reads chain height directly; it asks a BlockClock, which
 * lets tests step blocks deterministically.
 */

/** Monotonic source of the current block number. */
export interface BlockClock {
	currentBlock(): number;
}

/** Controllable clock for deterministic testing -- advance blocks manually with `advance()`. */
export class FakeBlockClock implements BlockClock {
	private block: number;

	constructor(startBlock = 0) {
		this.block = startBlock;
	}

	currentBlock(): number {
		return this.block;
	}

	advance(blocks = 1): void {
		if (!Number.isSafeInteger(blocks) || blocks < 0) {
			throw new RangeError(`FakeBlockClock.advance: invalid block count ${blocks}`);
		}
		this.block += blocks;
	}

	/** Jump to `block`; the clock never moves backwards. */
	set(block: number): void {
		if (!Number.isSafeInteger(block) || block < this.block) {
			throw new RangeError(`FakeBlockClock.set: cannot move from ${this.block} to ${block}`);
		}
		this.block = block;
	}
}

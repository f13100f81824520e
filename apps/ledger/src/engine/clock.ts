/**
 * Logical clocks — the host's block height.
 *
 * The engine never reads a clock itself; the server asks one for the
 * current height and threads it into each operation.
 */

import { blockFromTimestamp } from "@tithe/rules";

export interface BlockClock {
  current(): bigint;
}

/** Explicitly driven clock. Monotonic: refuses to move backwards. */
export class ManualClock implements BlockClock {
  private block: bigint;

  constructor(start: bigint = 0n) {
    if (start < 0n) throw new Error(`Clock cannot start below 0: ${start}`);
    this.block = start;
  }

  current(): bigint {
    return this.block;
  }

  set(block: bigint): void {
    if (block < this.block) {
      throw new Error(`Clock cannot move backwards: ${block} < ${this.block}`);
    }
    this.block = block;
  }

  advance(blocks: bigint): bigint {
    this.set(this.block + blocks);
    return this.block;
  }
}

/** Block height derived from wall time since genesis. */
export class WallBlockClock implements BlockClock {
  constructor(
    private readonly genesisMs: number,
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  current(): bigint {
    return blockFromTimestamp(this.now(), this.genesisMs, this.intervalMs);
  }
}

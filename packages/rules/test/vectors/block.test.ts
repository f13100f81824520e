/**
 * Block height from wall time.
 */

import { describe, it, expect } from "vitest";
import { blockFromTimestamp, blockStartMs } from "../../src/block.js";
import { BLOCK_INTERVAL_MS_DEFAULT } from "../../src/constants.js";

describe("block height", () => {
  const genesis = 1_700_000_000_000;

  it("genesis is block 0", () => {
    expect(blockFromTimestamp(genesis, genesis)).toBe(0n);
  });

  it("before genesis clamps to 0", () => {
    expect(blockFromTimestamp(genesis - 1, genesis)).toBe(0n);
  });

  it("advances one block per interval", () => {
    expect(blockFromTimestamp(genesis + BLOCK_INTERVAL_MS_DEFAULT - 1, genesis)).toBe(0n);
    expect(blockFromTimestamp(genesis + BLOCK_INTERVAL_MS_DEFAULT, genesis)).toBe(1n);
    expect(blockFromTimestamp(genesis + 144 * BLOCK_INTERVAL_MS_DEFAULT, genesis)).toBe(144n);
  });

  it("custom interval", () => {
    expect(blockFromTimestamp(genesis + 5_000, genesis, 1_000)).toBe(5n);
  });

  it("rejects a non-positive interval", () => {
    expect(() => blockFromTimestamp(genesis, genesis, 0)).toThrow("Block interval must be positive: 0");
  });

  it("block start inverts block height", () => {
    expect(blockStartMs(144n, genesis)).toBe(genesis + 144 * BLOCK_INTERVAL_MS_DEFAULT);
  });
});

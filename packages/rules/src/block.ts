/**
 * Block-height utilities.
 *
 * The ledger never reads wall time itself; hosts that have no native
 * block height derive one from a genesis timestamp and a fixed interval.
 */

import { BLOCK_INTERVAL_MS_DEFAULT } from "./constants.js";

/** Block height at `timestampMs`. Timestamps before genesis map to block 0. */
export function blockFromTimestamp(
  timestampMs: number,
  genesisMs: number,
  intervalMs: number = BLOCK_INTERVAL_MS_DEFAULT,
): bigint {
  if (intervalMs <= 0) throw new Error(`Block interval must be positive: ${intervalMs}`);
  if (timestampMs < genesisMs) return 0n;
  return BigInt(Math.floor((timestampMs - genesisMs) / intervalMs));
}

/** Wall-clock start of a block in ms. */
export function blockStartMs(
  block: bigint,
  genesisMs: number,
  intervalMs: number = BLOCK_INTERVAL_MS_DEFAULT,
): number {
  return genesisMs + Number(block) * intervalMs;
}

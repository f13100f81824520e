/**
 * Cumulative holdings — balance × blocks held.
 *
 * Must be accrued BEFORE the balance changes and BEFORE
 * last_activity_block advances, so the interval is charged at the
 * balance actually held during it.
 */

export function blocksHeld(lastActivityBlock: bigint, currentBlock: bigint): bigint {
  return currentBlock - lastActivityBlock;
}

export function accrueHoldings(
  cumulativeHoldings: bigint,
  balanceBefore: bigint,
  lastActivityBlock: bigint,
  currentBlock: bigint,
): bigint {
  return cumulativeHoldings + balanceBefore * blocksHeld(lastActivityBlock, currentBlock);
}

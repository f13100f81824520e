/**
 * Transfer fee split.
 *
 * fee(a) = floor(a × FEE_BPS / BPS_DENOM), net(a) = a − fee(a)
 *
 * The fee is carved out of the transferred amount, not charged on top:
 * the recipient receives strictly less than `a` whenever fee(a) > 0.
 * Truncation always rounds in the protocol's favour (smaller fee, never
 * a fractional unit).
 */

import { FEE_BPS, BPS_DENOM } from "./constants.js";

export interface FeeSplit {
  fee: bigint;
  net: bigint;
}

/** Fee withheld from a transfer of `amount`. Caller rejects amount ≤ 0. */
export function transferFee(amount: bigint): bigint {
  return (amount * FEE_BPS) / BPS_DENOM;
}

/** Amount credited to the recipient. */
export function transferNet(amount: bigint): bigint {
  return amount - transferFee(amount);
}

export function splitFee(amount: bigint): FeeSplit {
  const fee = transferFee(amount);
  return { fee, net: amount - fee };
}

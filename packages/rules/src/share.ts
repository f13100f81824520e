/**
 * Base share — an account's proportional claim on the pool.
 *
 * share = floor(pool × 60 × balance / (100 × supply))
 *       + floor(pool × 40 × score   / (100 × totalScore))
 *
 * The two halves truncate independently, so the result never exceeds
 * the real-valued share. Zero when the account holds nothing or either
 * denominator is zero.
 */

import {
  SHARE_BALANCE_WEIGHT,
  SHARE_SCORE_WEIGHT,
  SHARE_WEIGHT_DENOM,
} from "./constants.js";

export interface ShareInput {
  pool: bigint;
  balance: bigint;
  score: bigint;
  totalSupply: bigint;
  totalScore: bigint;
}

export function baseShare(s: ShareInput): bigint {
  if (s.balance <= 0n || s.totalScore <= 0n || s.totalSupply <= 0n) return 0n;
  const byBalance =
    (s.pool * SHARE_BALANCE_WEIGHT * s.balance) / (SHARE_WEIGHT_DENOM * s.totalSupply);
  const byScore =
    (s.pool * SHARE_SCORE_WEIGHT * s.score) / (SHARE_WEIGHT_DENOM * s.totalScore);
  return byBalance + byScore;
}

/**
 * Advanced redistribution — time multiplier, velocity bonus, eligibility.
 *
 * Pure per-beneficiary evaluation. The caller owns the batch loop and the
 * shared pool counter: each beneficiary must be evaluated against the pool
 * and aggregates left behind by the ones before it.
 *
 *   mult     = blocks_held ≥ 144 ? min(20000, 10000 + floor(blocks_held × 10000 / 1440)) : 10000
 *   bonus    = blocks_since_claim < 288 ? 1500 : 0
 *   adjusted = floor(base × mult × (10000 + bonus) / 10000²)
 *   eligible = balance ≥ floor(supply / 1000) ∧ adjusted > 0 ∧ blocks_since_claim ≥ 144
 */

import {
  MIN_HOLD_BLOCKS,
  MULTIPLIER_SCALE,
  MULTIPLIER_CAP,
  MULTIPLIER_RAMP_PERIODS,
  VELOCITY_BONUS,
  VELOCITY_WINDOW_PERIODS,
  ELIGIBILITY_SUPPLY_DIVISOR,
} from "./constants.js";
import { baseShare } from "./share.js";

/** Holding-time multiplier, scaled ×10000 (1.0× – 2.0×). */
export function timeMultiplier(blocksHeld: bigint): bigint {
  if (blocksHeld < MIN_HOLD_BLOCKS) return MULTIPLIER_SCALE;
  const ramp = (blocksHeld * MULTIPLIER_SCALE) / (MIN_HOLD_BLOCKS * MULTIPLIER_RAMP_PERIODS);
  const mult = MULTIPLIER_SCALE + ramp;
  return mult < MULTIPLIER_CAP ? mult : MULTIPLIER_CAP;
}

/** Recent-claim bonus, scaled ×10000. */
export function velocityBonus(blocksSinceClaim: bigint): bigint {
  return blocksSinceClaim < MIN_HOLD_BLOCKS * VELOCITY_WINDOW_PERIODS ? VELOCITY_BONUS : 0n;
}

export function adjustedShare(base: bigint, multiplier: bigint, bonus: bigint): bigint {
  return (base * multiplier * (MULTIPLIER_SCALE + bonus)) / (MULTIPLIER_SCALE * MULTIPLIER_SCALE);
}

/** Minimum balance to qualify: 0.1% of supply, truncated. */
export function eligibilityThreshold(totalSupply: bigint): bigint {
  return totalSupply / ELIGIBILITY_SUPPLY_DIVISOR;
}

export function isRedistributionEligible(e: {
  balance: bigint;
  totalSupply: bigint;
  adjusted: bigint;
  blocksSinceClaim: bigint;
}): boolean {
  return (
    e.balance >= eligibilityThreshold(e.totalSupply) &&
    e.adjusted > 0n &&
    e.blocksSinceClaim >= MIN_HOLD_BLOCKS
  );
}

export interface BeneficiaryInput {
  balance: bigint;
  score: bigint;
  lastActivityBlock: bigint;
  lastClaimBlock: bigint;
  pool: bigint;
  totalSupply: bigint;
  totalScore: bigint;
  currentBlock: bigint;
}

export interface BeneficiaryAssessment {
  blocksHeld: bigint;
  blocksSinceClaim: bigint;
  multiplier: bigint;
  bonus: bigint;
  base: bigint;
  adjusted: bigint;
  eligible: boolean;
  /** adjusted when eligible, else 0. */
  payout: bigint;
}

export function assessBeneficiary(b: BeneficiaryInput): BeneficiaryAssessment {
  const blocksHeld = b.currentBlock - b.lastActivityBlock;
  const blocksSinceClaim = b.currentBlock - b.lastClaimBlock;
  const multiplier = timeMultiplier(blocksHeld);
  const bonus = velocityBonus(blocksSinceClaim);
  const base = baseShare({
    pool: b.pool,
    balance: b.balance,
    score: b.score,
    totalSupply: b.totalSupply,
    totalScore: b.totalScore,
  });
  const adjusted = adjustedShare(base, multiplier, bonus);
  const eligible = isRedistributionEligible({
    balance: b.balance,
    totalSupply: b.totalSupply,
    adjusted,
    blocksSinceClaim,
  });
  return {
    blocksHeld,
    blocksSinceClaim,
    multiplier,
    bonus,
    base,
    adjusted,
    eligible,
    payout: eligible ? adjusted : 0n,
  };
}

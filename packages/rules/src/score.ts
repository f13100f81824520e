/**
 * Participation score transitions.
 *
 * Every qualifying activity (transfer, successful claim) moves an
 * account's score exactly once:
 *
 *   elapsed > 1000 blocks  → decay: floor(score × 9 / 10)
 *   otherwise              → boost: min(10000, score + floor(score / 100))
 *
 * Scores below 100 get a zero boost (integer truncation). That stall is
 * part of the protocol and must not be smoothed over.
 *
 * Each transition reports a signed `delta` so the caller can keep
 * total_participation_score exact without rescanning every account.
 */

import {
  SCORE_MAX,
  SCORE_DECAY_AFTER_BLOCKS,
  SCORE_DECAY_NUM,
  SCORE_DECAY_DEN,
  SCORE_BOOST_DIVISOR,
  SCORE_CLAIM_BOOST,
} from "./constants.js";

export type ScoreTransitionKind = "decay" | "boost" | "claim";

export interface ScoreTransition {
  kind: ScoreTransitionKind;
  previous: bigint;
  score: bigint;
  /** score − previous; negative on decay. */
  delta: bigint;
}

function minBig(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

function transition(kind: ScoreTransitionKind, previous: bigint, score: bigint): ScoreTransition {
  return { kind, previous, score, delta: score - previous };
}

/**
 * Decay-or-boost transition for an account whose last recorded activity
 * was at `lastActivityBlock`.
 */
export function transitionScore(
  score: bigint,
  lastActivityBlock: bigint,
  currentBlock: bigint,
): ScoreTransition {
  const elapsed = currentBlock - lastActivityBlock;
  if (elapsed > SCORE_DECAY_AFTER_BLOCKS) {
    return transition("decay", score, (score * SCORE_DECAY_NUM) / SCORE_DECAY_DEN);
  }
  return transition("boost", score, minBig(SCORE_MAX, score + score / SCORE_BOOST_DIVISOR));
}

/** Flat post-claim boost: +100, capped. Not proportional to the score. */
export function claimBoost(score: bigint): ScoreTransition {
  return transition("claim", score, minBig(SCORE_MAX, score + SCORE_CLAIM_BOOST));
}

/** Apply a transition's delta to the running aggregate. */
export function applyScoreDelta(total: bigint, t: ScoreTransition): bigint {
  return total + t.delta;
}

export function isScoreInRange(score: bigint): boolean {
  return score >= 0n && score <= SCORE_MAX;
}

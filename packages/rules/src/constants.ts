/**
 * Frozen protocol constants.
 *
 * FROZEN constants never change — changing one alters every derived
 * payout and breaks replay of existing journals.
 * All values are bigint: there is no floating point on any ledger path.
 */

// ── Basis points ───────────────────────────────────────────────────
export const BPS_DENOM = 10_000n; // 100%
export const FEE_BPS = 200n; // 2.00% transfer fee, truncating

// ── Participation score ────────────────────────────────────────────
export const SCORE_MAX = 10_000n;
export const SCORE_INITIAL = 5_000n; // assigned at registration
export const SCORE_DECAY_AFTER_BLOCKS = 1_000n; // idle > this → decay
export const SCORE_DECAY_NUM = 9n; // decay keeps 9/10
export const SCORE_DECAY_DEN = 10n;
export const SCORE_BOOST_DIVISOR = 100n; // boost adds score / 100
export const SCORE_CLAIM_BOOST = 100n; // flat boost after a successful claim

// ── Base share weighting (percent) ─────────────────────────────────
export const SHARE_BALANCE_WEIGHT = 60n;
export const SHARE_SCORE_WEIGHT = 40n;
export const SHARE_WEIGHT_DENOM = 100n;

// ── Advanced redistribution ────────────────────────────────────────
export const MIN_HOLD_BLOCKS = 144n; // ~1 day at 10-minute blocks
export const MULTIPLIER_SCALE = 10_000n; // 1.0×
export const MULTIPLIER_CAP = 20_000n; // 2.0×
export const MULTIPLIER_RAMP_PERIODS = 10n; // cap reached at 10 × MIN_HOLD
export const VELOCITY_BONUS = 1_500n; // +15% (scaled ×10000)
export const VELOCITY_WINDOW_PERIODS = 2n; // bonus while blocks_since_claim < 2 × MIN_HOLD
export const ELIGIBILITY_SUPPLY_DIVISOR = 1_000n; // need ≥ 0.1% of supply
export const MAX_BATCH_BENEFICIARIES = 10;

// ── Clock ──────────────────────────────────────────────────────────
export const BLOCK_INTERVAL_MS_DEFAULT = 10 * 60_000; // 10 min

// ── Snapshot format ────────────────────────────────────────────────
export const SNAPSHOT_VERSION = 1;

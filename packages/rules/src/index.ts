/**
 * @tithe/rules — Frozen ledger rules.
 *
 * This package contains ONLY frozen arithmetic and versioned schemas.
 * It has no I/O and no state: every function is pure and integer-exact.
 * The ledger engine imports from here, never the reverse.
 */

// Fee split
export { transferFee, transferNet, splitFee, type FeeSplit } from "./fee.js";

// Participation score
export {
  transitionScore,
  claimBoost,
  applyScoreDelta,
  isScoreInRange,
  type ScoreTransition,
  type ScoreTransitionKind,
} from "./score.js";

// Cumulative holdings
export { accrueHoldings, blocksHeld } from "./holdings.js";

// Base share
export { baseShare, type ShareInput } from "./share.js";

// Advanced redistribution
export {
  timeMultiplier,
  velocityBonus,
  adjustedShare,
  eligibilityThreshold,
  isRedistributionEligible,
  assessBeneficiary,
  type BeneficiaryInput,
  type BeneficiaryAssessment,
} from "./redistribution.js";

// Block height
export { blockFromTimestamp, blockStartMs } from "./block.js";

// State records
export {
  GENESIS_GLOBALS,
  newAccount,
  isAccountId,
  type AccountId,
  type AccountState,
  type GlobalState,
} from "./state.js";

// Canonical encoding, state roots, snapshots
export { canonicalEncode, canonicalDecode } from "./canonical.js";
export { rootFromBytes, type StateRoot } from "./state-root.js";
export {
  encodeSnapshot,
  decodeSnapshot,
  snapshotRoot,
  type LedgerSnapshot,
  type SnapshotAccount,
} from "./snapshot.js";

// Failure codes
export {
  LEDGER_ERROR_CODES,
  ok,
  fail,
  type LedgerErrorCode,
  type LedgerResult,
} from "./errors.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";

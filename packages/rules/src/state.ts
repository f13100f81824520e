/**
 * Ledger state records.
 *
 * An account exists iff it has been registered; absent accounts are
 * `undefined`, never fabricated zero records.
 */

import { SCORE_INITIAL } from "./constants.js";

/** 64-char lowercase hex public key. */
export type AccountId = string;

const ACCOUNT_ID_RE = /^[0-9a-f]{64}$/;

export function isAccountId(value: string): value is AccountId {
  return ACCOUNT_ID_RE.test(value);
}

export interface AccountState {
  readonly balance: bigint;
  /** [0, 10000] */
  readonly participationScore: bigint;
  readonly lastActivityBlock: bigint;
  readonly lastClaimBlock: bigint;
  /** Σ balance × blocks held; never decreases. */
  readonly cumulativeHoldings: bigint;
}

export interface GlobalState {
  readonly redistributionPool: bigint;
  readonly totalSupply: bigint;
  /** Always Σ participationScore over all accounts. */
  readonly totalParticipationScore: bigint;
  readonly redistributionActive: boolean;
  readonly registeredCount: bigint;
}

export const GENESIS_GLOBALS: GlobalState = {
  redistributionPool: 0n,
  totalSupply: 0n,
  totalParticipationScore: 0n,
  redistributionActive: false,
  registeredCount: 0n,
};

/** Fresh record at registration: score 5000, clocks at `block`, empty. */
export function newAccount(block: bigint): AccountState {
  return {
    balance: 0n,
    participationScore: SCORE_INITIAL,
    lastActivityBlock: block,
    lastClaimBlock: block,
    cumulativeHoldings: 0n,
  };
}

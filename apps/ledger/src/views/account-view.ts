/**
 * Wire views — bigint state → JSON-safe V1 records.
 */

import type { AccountId, AccountV1, LedgerStateV1 } from "@tithe/rules";
import type { Ledger } from "../engine/ledger.js";
import type { AuditReport } from "../engine/audit.js";

/** Unregistered accounts render with zero values and registered=false. */
export function toAccountV1(ledger: Ledger, id: AccountId): AccountV1 {
  const account = ledger.getAccount(id);
  return {
    id,
    registered: account !== undefined,
    balance: (account?.balance ?? 0n).toString(),
    participation_score: (account?.participationScore ?? 0n).toString(),
    last_activity_block: (account?.lastActivityBlock ?? 0n).toString(),
    last_claim_block: (account?.lastClaimBlock ?? 0n).toString(),
    cumulative_holdings: (account?.cumulativeHoldings ?? 0n).toString(),
    pending_rewards: ledger.getPendingRewards(id).toString(),
  };
}

export function toLedgerStateV1(ledger: Ledger): LedgerStateV1 {
  const g = ledger.getGlobals();
  return {
    block: ledger.height.toString(),
    redistribution_pool: g.redistributionPool.toString(),
    total_supply: g.totalSupply.toString(),
    total_participation_score: g.totalParticipationScore.toString(),
    redistribution_active: g.redistributionActive,
    registered_count: g.registeredCount.toString(),
    state_root: ledger.stateRoot(),
  };
}

export function toAuditV1(report: AuditReport) {
  return {
    ok: report.ok,
    balance_sum: report.balanceSum.toString(),
    pool: report.pool.toString(),
    total_supply: report.totalSupply.toString(),
    score_sum: report.scoreSum.toString(),
    total_participation_score: report.totalParticipationScore.toString(),
    account_count: report.accountCount.toString(),
    registered_count: report.registeredCount.toString(),
    violations: report.violations,
  };
}

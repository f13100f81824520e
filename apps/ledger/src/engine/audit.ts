/**
 * Full-recount invariant audit.
 *
 * The engine maintains its aggregates incrementally; this rescans every
 * account and compares. Any violation means a bug, not bad input.
 *
 *   Σ balance + pool == total_supply
 *   Σ score == total_participation_score, every score in [0, 10000]
 *   #accounts == registered_count
 */

import { isScoreInRange } from "@tithe/rules";
import type { LedgerStore } from "../store/ledger-store.js";

export interface AuditReport {
  ok: boolean;
  balanceSum: bigint;
  pool: bigint;
  totalSupply: bigint;
  scoreSum: bigint;
  totalParticipationScore: bigint;
  accountCount: bigint;
  registeredCount: bigint;
  violations: string[];
}

export function auditStore(store: LedgerStore): AuditReport {
  const globals = store.getGlobals();
  const violations: string[] = [];
  let balanceSum = 0n;
  let scoreSum = 0n;
  let accountCount = 0n;

  for (const [id, account] of store.listAccounts()) {
    accountCount++;
    balanceSum += account.balance;
    scoreSum += account.participationScore;
    if (account.balance < 0n) violations.push(`negative balance: ${id}`);
    if (!isScoreInRange(account.participationScore)) {
      violations.push(`score out of range: ${id} = ${account.participationScore}`);
    }
  }

  if (balanceSum + globals.redistributionPool !== globals.totalSupply) {
    violations.push(
      `supply mismatch: balances ${balanceSum} + pool ${globals.redistributionPool} != supply ${globals.totalSupply}`,
    );
  }
  if (scoreSum !== globals.totalParticipationScore) {
    violations.push(
      `score mismatch: sum ${scoreSum} != total ${globals.totalParticipationScore}`,
    );
  }
  if (accountCount !== globals.registeredCount) {
    violations.push(`count mismatch: ${accountCount} accounts != registered ${globals.registeredCount}`);
  }

  return {
    ok: violations.length === 0,
    balanceSum,
    pool: globals.redistributionPool,
    totalSupply: globals.totalSupply,
    scoreSum,
    totalParticipationScore: globals.totalParticipationScore,
    accountCount,
    registeredCount: globals.registeredCount,
    violations,
  };
}

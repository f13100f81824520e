/**
 * tithe audit    — ask the node for its full-recount audit
 * tithe verify   — replay the node's journal locally, compare state roots
 */

import type { AccountId, LedgerStateV1 } from "@tithe/rules";
import { parseJournalEntries, replayJournal } from "@tithe/ledger";
import type { CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";

interface AuditResponse {
  ok: boolean;
  balance_sum: string;
  pool: string;
  total_supply: string;
  score_sum: string;
  total_participation_score: string;
  account_count: string;
  registered_count: string;
  violations: string[];
}

interface JournalResponse {
  admin: AccountId;
  base_root: string | null;
  count: number;
  entries: unknown;
}

export interface VerifyResult {
  ok: boolean;
  entries: number;
  localRoot: string;
  nodeRoot: string;
}

export async function auditCommand(config: CliConfig): Promise<AuditResponse> {
  const report = await httpGet<AuditResponse>(config.ledgers, "/audit");
  console.log(`Audit: ${report.ok ? "OK" : "FAILED"}\n`);
  console.log(`  balances + pool: ${report.balance_sum} + ${report.pool} (supply ${report.total_supply})`);
  console.log(`  score sum:       ${report.score_sum} (total ${report.total_participation_score})`);
  console.log(`  accounts:        ${report.account_count} (registered ${report.registered_count})`);
  for (const v of report.violations) console.log(`  ✗ ${v}`);
  return report;
}

export async function verifyCommand(config: CliConfig): Promise<VerifyResult> {
  // State before journal: a write in between can only produce a mismatch.
  const state = await httpGet<LedgerStateV1>(config.ledgers, "/state");
  const journal = await httpGet<JournalResponse>(config.ledgers, "/journal");
  if (journal.base_root !== null) {
    throw new Error(
      `Node was restored from snapshot ${journal.base_root}; its journal does not start at genesis`,
    );
  }

  const entries = parseJournalEntries(journal.entries);
  const localRoot = replayJournal(entries, { admin: journal.admin }).stateRoot();
  const result = {
    ok: localRoot === state.state_root,
    entries: entries.length,
    localRoot,
    nodeRoot: state.state_root,
  };

  console.log(`Replayed ${result.entries} entries`);
  console.log(`  local: ${localRoot}`);
  console.log(`  node:  ${state.state_root}`);
  console.log(result.ok ? "State roots match" : "State roots DIFFER");
  return result;
}

/**
 * Ledger snapshots — canonical CBOR of the full state.
 *
 * Layout (snake_case, keys sorted by the canonical encoder):
 *   { version: 1, block, globals: {...}, accounts: [{ id, ... }] }
 *
 * Accounts are sorted by id so equal states encode to equal bytes.
 * Decoding validates every field and throws on anything malformed.
 */

import { SCORE_MAX, SNAPSHOT_VERSION } from "./constants.js";
import { canonicalEncode, canonicalDecode } from "./canonical.js";
import { rootFromBytes, type StateRoot } from "./state-root.js";
import { isAccountId, type AccountId, type AccountState, type GlobalState } from "./state.js";

export interface SnapshotAccount extends AccountState {
  readonly id: AccountId;
}

export interface LedgerSnapshot {
  /** Clock height when the snapshot was taken. */
  block: bigint;
  globals: GlobalState;
  accounts: SnapshotAccount[];
}

function encodeAccount(a: SnapshotAccount): Record<string, unknown> {
  return {
    id: a.id,
    balance: a.balance,
    participation_score: a.participationScore,
    last_activity_block: a.lastActivityBlock,
    last_claim_block: a.lastClaimBlock,
    cumulative_holdings: a.cumulativeHoldings,
  };
}

function encodeGlobals(g: GlobalState): Record<string, unknown> {
  return {
    redistribution_pool: g.redistributionPool,
    total_supply: g.totalSupply,
    total_participation_score: g.totalParticipationScore,
    redistribution_active: g.redistributionActive,
    registered_count: g.registeredCount,
  };
}

export function encodeSnapshot(s: LedgerSnapshot): Uint8Array {
  const accounts = [...s.accounts].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return canonicalEncode({
    version: SNAPSHOT_VERSION,
    block: s.block,
    globals: encodeGlobals(s.globals),
    accounts: accounts.map(encodeAccount),
  });
}

export function snapshotRoot(s: LedgerSnapshot): StateRoot {
  return rootFromBytes(encodeSnapshot(s));
}

// ── Decoding ───────────────────────────────────────────────────────

function asRecord(value: unknown, field: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`Snapshot field ${field} must be a map`);
  }
  return value as Record<string, unknown>;
}

/** CBOR may hand back small integers as number and large ones as bigint. */
function asUint(value: unknown, field: string): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) throw new Error(`Snapshot field ${field} is negative`);
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  throw new Error(`Snapshot field ${field} must be an unsigned integer`);
}

function asBool(value: unknown, field: string): boolean {
  if (typeof value !== "boolean") throw new Error(`Snapshot field ${field} must be a boolean`);
  return value;
}

function decodeAccount(value: unknown, index: number): SnapshotAccount {
  const r = asRecord(value, `accounts[${index}]`);
  const id = r.id;
  if (typeof id !== "string" || !isAccountId(id)) {
    throw new Error(`Snapshot field accounts[${index}].id must be 64 hex chars`);
  }
  const f = (name: string) => `accounts[${index}].${name}`;
  const participationScore = asUint(r.participation_score, f("participation_score"));
  if (participationScore > SCORE_MAX) {
    throw new Error(`Snapshot field ${f("participation_score")} exceeds ${SCORE_MAX}`);
  }
  return {
    id,
    balance: asUint(r.balance, f("balance")),
    participationScore,
    lastActivityBlock: asUint(r.last_activity_block, f("last_activity_block")),
    lastClaimBlock: asUint(r.last_claim_block, f("last_claim_block")),
    cumulativeHoldings: asUint(r.cumulative_holdings, f("cumulative_holdings")),
  };
}

export function decodeSnapshot(bytes: Uint8Array): LedgerSnapshot {
  const root = asRecord(canonicalDecode(bytes), "<root>");
  const version = root.version;
  if (version !== SNAPSHOT_VERSION) {
    throw new Error(`Unsupported snapshot version: ${String(version)}`);
  }
  const g = asRecord(root.globals, "globals");
  if (!Array.isArray(root.accounts)) throw new Error("Snapshot field accounts must be an array");

  const accounts = root.accounts.map(decodeAccount);
  const seen = new Set<string>();
  for (const a of accounts) {
    if (seen.has(a.id)) throw new Error(`Duplicate account in snapshot: ${a.id}`);
    seen.add(a.id);
  }

  return {
    block: asUint(root.block, "block"),
    globals: {
      redistributionPool: asUint(g.redistribution_pool, "globals.redistribution_pool"),
      totalSupply: asUint(g.total_supply, "globals.total_supply"),
      totalParticipationScore: asUint(
        g.total_participation_score,
        "globals.total_participation_score",
      ),
      redistributionActive: asBool(g.redistribution_active, "globals.redistribution_active"),
      registeredCount: asUint(g.registered_count, "globals.registered_count"),
    },
    accounts,
  };
}

/**
 * Canonical encoding + snapshot decoding.
 */

import { describe, it, expect } from "vitest";
import { canonicalEncode, canonicalDecode } from "../../src/canonical.js";
import { encodeSnapshot, decodeSnapshot, snapshotRoot, type LedgerSnapshot } from "../../src/snapshot.js";

const A = "aa".repeat(32);
const B = "bb".repeat(32);

function makeSnapshot(): LedgerSnapshot {
  return {
    block: 1500n,
    globals: {
      redistributionPool: 20n,
      totalSupply: 10_000n,
      totalParticipationScore: 9550n,
      redistributionActive: true,
      registeredCount: 2n,
    },
    accounts: [
      {
        id: B,
        balance: 980n,
        participationScore: 5050n,
        lastActivityBlock: 1500n,
        lastClaimBlock: 0n,
        cumulativeHoldings: 0n,
      },
      {
        id: A,
        balance: 9000n,
        participationScore: 4500n,
        lastActivityBlock: 1500n,
        lastClaimBlock: 0n,
        cumulativeHoldings: 15_000_000n,
      },
    ],
  };
}

describe("canonical encoding", () => {
  it("key order does not change the bytes", () => {
    expect(canonicalEncode({ b: 1, a: 2 })).toEqual(canonicalEncode({ a: 2, b: 1 }));
  });

  it("rejects floats", () => {
    expect(() => canonicalEncode({ pool: 1.5 })).toThrow("Non-integer number at pool: 1.5");
  });

  it("decodes what it encodes", () => {
    expect(canonicalDecode(canonicalEncode({ kind: "x", n: 7 }))).toEqual({ kind: "x", n: 7 });
  });
});

describe("snapshot", () => {
  it("round-trips every field", () => {
    const snap = makeSnapshot();
    const decoded = decodeSnapshot(encodeSnapshot(snap));
    expect(decoded.block).toBe(1500n);
    expect(decoded.globals).toEqual(snap.globals);
    // accounts come back sorted by id
    expect(decoded.accounts.map((a) => a.id)).toEqual([A, B]);
    expect(decoded.accounts[0]).toEqual(snap.accounts[1]);
    expect(decoded.accounts[1]).toEqual(snap.accounts[0]);
  });

  it("account order does not change the root", () => {
    const snap = makeSnapshot();
    const reversed = { ...snap, accounts: [...snap.accounts].reverse() };
    expect(snapshotRoot(reversed)).toBe(snapshotRoot(snap));
  });

  it("any field change changes the root", () => {
    const snap = makeSnapshot();
    const bumped = { ...snap, globals: { ...snap.globals, redistributionPool: 21n } };
    expect(snapshotRoot(bumped)).not.toBe(snapshotRoot(snap));
  });

  it("root is 64 hex chars", () => {
    expect(snapshotRoot(makeSnapshot())).toMatch(/^[0-9a-f]{64}$/);
  });

  it("rejects an unknown version", () => {
    const bytes = canonicalEncode({ version: 2, block: 0n, globals: {}, accounts: [] });
    expect(() => decodeSnapshot(bytes)).toThrow("Unsupported snapshot version: 2");
  });

  it("rejects a malformed account id", () => {
    const bytes = canonicalEncode({
      version: 1,
      block: 0n,
      globals: {
        redistribution_pool: 0n,
        total_supply: 0n,
        total_participation_score: 0n,
        redistribution_active: false,
        registered_count: 1n,
      },
      accounts: [
        {
          id: "not-hex",
          balance: 0n,
          participation_score: 5000n,
          last_activity_block: 0n,
          last_claim_block: 0n,
          cumulative_holdings: 0n,
        },
      ],
    });
    expect(() => decodeSnapshot(bytes)).toThrow("Snapshot field accounts[0].id must be 64 hex chars");
  });

  it("rejects a score above the maximum", () => {
    const bytes = canonicalEncode({
      version: 1,
      block: 0n,
      globals: {
        redistribution_pool: 0n,
        total_supply: 0n,
        total_participation_score: 10_001n,
        redistribution_active: false,
        registered_count: 1n,
      },
      accounts: [
        {
          id: "aa".repeat(32),
          balance: 0n,
          participation_score: 10_001n,
          last_activity_block: 0n,
          last_claim_block: 0n,
          cumulative_holdings: 0n,
        },
      ],
    });
    expect(() => decodeSnapshot(bytes)).toThrow(
      "Snapshot field accounts[0].participation_score exceeds 10000",
    );
  });

  it("rejects a missing global", () => {
    const bytes = canonicalEncode({
      version: 1,
      block: 0n,
      globals: { redistribution_pool: 0n },
      accounts: [],
    });
    expect(() => decodeSnapshot(bytes)).toThrow(
      "Snapshot field globals.total_supply must be an unsigned integer",
    );
  });
});

/**
 * Journal writer — in-memory append-only log.
 *
 * Lives for the process. A node restored from a snapshot starts a fresh
 * journal whose base is that snapshot, not genesis.
 */

import { Value } from "@sinclair/typebox/value";
import type { StateRoot } from "@tithe/rules";
import { JournalEntry, type JournalEntryInput } from "./schemas.js";

export class Journal {
  private readonly entries: JournalEntry[] = [];

  /**
   * @param baseRoot - state root the first entry applies to; null when the
   *   journal starts at genesis
   */
  constructor(readonly baseRoot: StateRoot | null = null) {}

  append(entry: JournalEntryInput): JournalEntry {
    const record: JournalEntry = { ...entry, seq: this.entries.length + 1 };
    this.entries.push(record);
    return record;
  }

  /** Entries with seq ≥ fromSeq, in order. */
  getEntries(fromSeq: number = 1): JournalEntry[] {
    return this.entries.slice(Math.max(0, fromSeq - 1));
  }

  getEntriesByType<T extends JournalEntry["type"]>(
    type: T,
  ): Array<Extract<JournalEntry, { type: T }>> {
    return this.entries.filter((e): e is Extract<JournalEntry, { type: T }> => e.type === type);
  }

  count(): number {
    return this.entries.length;
  }
}

/**
 * Validate untrusted entries (e.g. fetched from a remote node).
 * Throws on the first malformed entry, a seq gap, or a history that
 * does not start at seq 1.
 */
export function parseJournalEntries(raw: unknown): JournalEntry[] {
  if (!Array.isArray(raw)) throw new Error("Journal must be an array");
  const parsed: JournalEntry[] = [];
  for (const [i, value] of raw.entries()) {
    if (!Value.Check(JournalEntry, value)) {
      const first = Value.Errors(JournalEntry, value).First();
      throw new Error(`Malformed journal entry at index ${i}: ${first?.message ?? "invalid"}`);
    }
    const prev = parsed[parsed.length - 1];
    if (!prev && value.seq !== 1) {
      throw new Error(`Journal must start at seq 1. Got: ${value.seq}`);
    }
    if (prev && value.seq !== prev.seq + 1) {
      throw new Error(`Journal seq gap at index ${i}: ${prev.seq} → ${value.seq}`);
    }
    parsed.push(value);
  }
  return parsed;
}

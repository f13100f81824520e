/**
 * Snapshot scheduler — persists ledger state periodically.
 *
 * Design:
 *   - Writes only when the journal has grown since the last save
 *   - Errors go to onError; a failed write is retried on the next tick
 *   - flush() forces a write regardless (used on shutdown)
 *   - Writes are queued in call order; the last one queued lands last
 */

import type { LedgerSnapshot, StateRoot } from "@tithe/rules";
import type { Ledger } from "./engine/ledger.js";
import { saveSnapshot } from "./store/snapshot-file.js";

export interface SnapshotResult {
  path: string;
  root: StateRoot;
  /** Journal length captured by this snapshot. */
  entries: number;
}

export interface SchedulerOptions {
  path: string;
  /** How often to check for new entries (ms). Default: 60_000 (1 min). */
  intervalMs?: number;
  /** Callback after each successful write. */
  onSave?: (result: SnapshotResult) => void;
  /** Callback for errors. */
  onError?: (error: unknown) => void;
}

export interface SnapshotScheduler {
  start(): void;
  stop(): void;
  /** Write if anything changed since the last save. */
  tick(): Promise<SnapshotResult | null>;
  /** Write unconditionally. */
  flush(): Promise<SnapshotResult | null>;
  lastSavedEntries(): number;
}

const DEFAULT_INTERVAL_MS = 60_000;

export function createSnapshotScheduler(
  ledger: Ledger,
  options: SchedulerOptions,
): SnapshotScheduler {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const onError = options.onError ?? ((err) => console.error("[snapshot] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;
  let _lastSavedEntries = 0;

  // Writes share one tmp file, so they run one after another.
  let pending: Promise<unknown> = Promise.resolve();

  async function persist(snapshot: LedgerSnapshot, entries: number): Promise<SnapshotResult | null> {
    try {
      const root = await saveSnapshot(options.path, snapshot);
      _lastSavedEntries = entries;
      const result = { path: options.path, root, entries };
      if (options.onSave) options.onSave(result);
      return result;
    } catch (err) {
      onError(err);
      return null;
    }
  }

  function write(): Promise<SnapshotResult | null> {
    // Captured synchronously: no operation can interleave with this read.
    const snapshot = ledger.snapshot();
    const entries = ledger.journal.count();
    const next = pending.then(() => persist(snapshot, entries));
    pending = next;
    return next;
  }

  async function tick(): Promise<SnapshotResult | null> {
    if (ledger.journal.count() === _lastSavedEntries) return null;
    return write();
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    tick,

    flush: write,

    lastSavedEntries() {
      return _lastSavedEntries;
    },
  };
}

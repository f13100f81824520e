/**
 * @tithe/ledger — stateful ledger engine + host.
 *
 * The server entry point is ./server.ts; this barrel is the library
 * surface (engine, stores, journal replay) for embedding and tooling.
 */

export {
  Ledger,
  type OpContext,
  type LedgerOptions,
  type MintReceipt,
  type TransferReceipt,
} from "./engine/ledger.js";
export { createAccessPolicy, type AccessPolicy } from "./engine/access.js";
export { ManualClock, WallBlockClock, type BlockClock } from "./engine/clock.js";
export { auditStore, type AuditReport } from "./engine/audit.js";

export { MemoryLedgerStore, type LedgerStore } from "./store/ledger-store.js";
export { OverlayStore } from "./store/overlay-store.js";
export { saveSnapshot, loadSnapshot } from "./store/snapshot-file.js";

export { Journal, parseJournalEntries } from "./event-log/writer.js";
export { replayJournal, applyEntry, type ReplayOptions } from "./event-log/replay.js";
export {
  JournalEntry,
  REGISTER_EVENT,
  MINT_EVENT,
  TRANSFER_EVENT,
  TOGGLE_EVENT,
  REDISTRIBUTE_EVENT,
  type JournalEntryInput,
} from "./event-log/schemas.js";

export { toAccountV1, toLedgerStateV1, toAuditV1 } from "./views/account-view.js";

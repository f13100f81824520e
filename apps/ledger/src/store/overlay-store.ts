/**
 * Write-buffering overlay over a LedgerStore.
 *
 * Every mutating operation runs against an overlay; the base store sees
 * the writes only on commit(). Dropping the overlay discards them, which
 * is how a batch aborted midway leaves no trace.
 */

import type { AccountId, AccountState, GlobalState } from "@tithe/rules";
import type { LedgerStore } from "./ledger-store.js";

export class OverlayStore implements LedgerStore {
  private readonly pending = new Map<AccountId, AccountState>();
  private pendingGlobals: GlobalState | null = null;

  constructor(private readonly base: LedgerStore) {}

  getAccount(id: AccountId): AccountState | undefined {
    return this.pending.get(id) ?? this.base.getAccount(id);
  }

  putAccount(id: AccountId, state: AccountState): void {
    this.pending.set(id, state);
  }

  listAccounts(): Array<[AccountId, AccountState]> {
    const merged = new Map(this.base.listAccounts());
    for (const [id, state] of this.pending) merged.set(id, state);
    return Array.from(merged.entries());
  }

  getGlobals(): GlobalState {
    return this.pendingGlobals ?? this.base.getGlobals();
  }

  putGlobals(globals: GlobalState): void {
    this.pendingGlobals = globals;
  }

  /** Number of buffered account writes. */
  get size(): number {
    return this.pending.size;
  }

  commit(): void {
    for (const [id, state] of this.pending) this.base.putAccount(id, state);
    if (this.pendingGlobals) this.base.putGlobals(this.pendingGlobals);
    this.pending.clear();
    this.pendingGlobals = null;
  }
}

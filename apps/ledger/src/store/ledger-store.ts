/**
 * Account store — the only persistence seam the engine needs.
 *
 * Synchronous by contract: an operation never yields between reading
 * state and writing it back, so a single-threaded host gets atomicity
 * for free. Records are immutable; callers replace, never mutate.
 */

import {
  GENESIS_GLOBALS,
  type AccountId,
  type AccountState,
  type GlobalState,
  type LedgerSnapshot,
} from "@tithe/rules";

export interface LedgerStore {
  getAccount(id: AccountId): AccountState | undefined;
  putAccount(id: AccountId, state: AccountState): void;
  /** All accounts, in insertion order. */
  listAccounts(): Array<[AccountId, AccountState]>;
  getGlobals(): GlobalState;
  putGlobals(globals: GlobalState): void;
}

export class MemoryLedgerStore implements LedgerStore {
  private readonly accounts = new Map<AccountId, AccountState>();
  private globals: GlobalState = GENESIS_GLOBALS;

  static fromSnapshot(snapshot: LedgerSnapshot): MemoryLedgerStore {
    const store = new MemoryLedgerStore();
    for (const { id, ...state } of snapshot.accounts) {
      store.putAccount(id, state);
    }
    store.putGlobals(snapshot.globals);
    return store;
  }

  getAccount(id: AccountId): AccountState | undefined {
    return this.accounts.get(id);
  }

  putAccount(id: AccountId, state: AccountState): void {
    this.accounts.set(id, { ...state });
  }

  listAccounts(): Array<[AccountId, AccountState]> {
    return Array.from(this.accounts.entries());
  }

  getGlobals(): GlobalState {
    return this.globals;
  }

  putGlobals(globals: GlobalState): void {
    this.globals = { ...globals };
  }
}

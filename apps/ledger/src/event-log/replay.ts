/**
 * Journal replay — rebuild a ledger from genesis.
 *
 * Each entry is re-executed with its recorded caller and block. Any
 * entry that is rejected, or a redistribution that pays differently than
 * recorded, means the journal and the rules disagree: replay throws.
 */

import type { Logger } from "pino";
import type { AccountId, LedgerResult } from "@tithe/rules";
import { Ledger } from "../engine/ledger.js";
import {
  REGISTER_EVENT,
  MINT_EVENT,
  TRANSFER_EVENT,
  TOGGLE_EVENT,
  REDISTRIBUTE_EVENT,
  type JournalEntry,
} from "./schemas.js";

export interface ReplayOptions {
  admin: AccountId;
  logger?: Logger;
}

function expectOk<T>(entry: JournalEntry, result: LedgerResult<T>): T {
  if (!result.ok) {
    throw new Error(`Journal diverged at seq ${entry.seq} (${entry.type}): ${result.error}`);
  }
  return result.value;
}

export function applyEntry(ledger: Ledger, entry: JournalEntry): void {
  const ctx = { caller: entry.caller, block: BigInt(entry.block) };

  switch (entry.type) {
    case REGISTER_EVENT:
      expectOk(entry, ledger.register(ctx, entry.payload.account));
      return;
    case MINT_EVENT:
      expectOk(entry, ledger.mint(ctx, BigInt(entry.payload.amount), entry.payload.recipient));
      return;
    case TRANSFER_EVENT: {
      const receipt = expectOk(
        entry,
        ledger.transfer(ctx, BigInt(entry.payload.amount), entry.payload.sender, entry.payload.recipient),
      );
      if (receipt.fee.toString() !== entry.payload.fee) {
        throw new Error(
          `Journal diverged at seq ${entry.seq}: fee ${receipt.fee} != recorded ${entry.payload.fee}`,
        );
      }
      return;
    }
    case TOGGLE_EVENT:
      expectOk(entry, ledger.setRedistributionActive(ctx, entry.payload.active));
      return;
    case REDISTRIBUTE_EVENT: {
      const payouts = expectOk(
        entry,
        ledger.executeAlgorithmicRedistribution(ctx, entry.payload.beneficiaries),
      ).map((p) => p.toString());
      if (payouts.join(",") !== entry.payload.payouts.join(",")) {
        throw new Error(
          `Journal diverged at seq ${entry.seq}: payouts [${payouts.join(", ")}] != recorded [${entry.payload.payouts.join(", ")}]`,
        );
      }
      return;
    }
  }
}

export function replayJournal(entries: readonly JournalEntry[], options: ReplayOptions): Ledger {
  const ledger = new Ledger({ admin: options.admin, logger: options.logger });
  for (const entry of entries) applyEntry(ledger, entry);
  return ledger;
}

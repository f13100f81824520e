/**
 * Journal schemas — append-only record of committed operations.
 *
 * Every committed mutation is one entry. The ledger state is a pure
 * function of the entries: replaying them in seq order from genesis
 * rebuilds it exactly. Rejected operations are never journalled.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hex32, UintString } from "@tithe/rules";

// ── Entry types ────────────────────────────────────────────────────

export const REGISTER_EVENT = "account.register.v1" as const;
export const MINT_EVENT = "supply.mint.v1" as const;
export const TRANSFER_EVENT = "ledger.transfer.v1" as const;
export const TOGGLE_EVENT = "redistribution.toggle.v1" as const;
export const REDISTRIBUTE_EVENT = "redistribution.execute.v1" as const;

/** Fields common to every entry. */
const envelope = {
  /** Monotonic sequence number, from 1. */
  seq: Type.Integer({ minimum: 1 }),
  /** Block height the operation ran at. */
  block: UintString,
  /** Identity that invoked the operation. */
  caller: Hex32,
};

export const RegisterEntry = Type.Object({
  ...envelope,
  type: Type.Literal(REGISTER_EVENT),
  payload: Type.Object({ account: Hex32 }),
});

export const MintEntry = Type.Object({
  ...envelope,
  type: Type.Literal(MINT_EVENT),
  payload: Type.Object({ recipient: Hex32, amount: UintString }),
});

export const TransferEntry = Type.Object({
  ...envelope,
  type: Type.Literal(TRANSFER_EVENT),
  payload: Type.Object({
    sender: Hex32,
    recipient: Hex32,
    amount: UintString,
    fee: UintString,
  }),
});

export const ToggleEntry = Type.Object({
  ...envelope,
  type: Type.Literal(TOGGLE_EVENT),
  payload: Type.Object({ active: Type.Boolean() }),
});

export const RedistributeEntry = Type.Object({
  ...envelope,
  type: Type.Literal(REDISTRIBUTE_EVENT),
  payload: Type.Object({
    beneficiaries: Type.Array(Hex32),
    payouts: Type.Array(UintString),
  }),
});

export const JournalEntry = Type.Union([
  RegisterEntry,
  MintEntry,
  TransferEntry,
  ToggleEntry,
  RedistributeEntry,
]);

export type JournalEntry = Static<typeof JournalEntry>;

type WithoutSeq<T> = T extends unknown ? Omit<T, "seq"> : never;

/** An entry before the journal assigns its seq. */
export type JournalEntryInput = WithoutSeq<JournalEntry>;

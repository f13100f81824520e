/**
 * Argument checks shared by commands. Amounts stay decimal strings end
 * to end; the node parses them.
 */

import { isAccountId, type AccountId } from "@tithe/rules";

const UINT = /^(0|[1-9][0-9]*)$/;

export function parseAccount(value: string, label: string = "account"): AccountId {
  const id = value.toLowerCase();
  if (!isAccountId(id)) throw new Error(`Invalid ${label}: must be 64-char hex. Got: ${value}`);
  return id;
}

export function parseAmount(value: string, label: string = "amount"): string {
  if (!UINT.test(value)) throw new Error(`Invalid ${label}: must be a non-negative integer. Got: ${value}`);
  return value;
}

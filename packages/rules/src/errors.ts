/**
 * Ledger failure codes.
 *
 * Every failure is reported to the caller; none is retried internally and
 * none leaves a partial mutation behind.
 */

export const LEDGER_ERROR_CODES = [
  "unauthorized",
  "invalid_amount",
  "insufficient_balance",
  "not_registered",
  "already_registered",
  "redistribution_locked",
  "no_rewards",
  "self_transfer",
  "batch_too_large",
  "pool_exhausted",
] as const;

export type LedgerErrorCode = (typeof LEDGER_ERROR_CODES)[number];

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LedgerErrorCode };

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: LedgerErrorCode): LedgerResult<T> {
  return { ok: false, error };
}

/**
 * Ledger node configuration.
 */

import { isAccountId, BLOCK_INTERVAL_MS_DEFAULT, type AccountId } from "@tithe/rules";

export type ClockMode = "manual" | "wall";

export interface LedgerConfig {
  port: number;
  host: string;
  /** Hex public key of the administrator. */
  admin: AccountId;
  clock: ClockMode;
  genesisTimestampMs: number;
  blockIntervalMs: number;
  /** Snapshot file path. Empty = no persistence. */
  snapshotPath: string;
  /** Snapshot write interval (ms). 0 = disabled. */
  snapshotIntervalMs: number;
  logLevel: string;
}

type EnvSource = Record<string, string | undefined>;

function env(source: EnvSource, key: string, fallback?: string): string {
  const val = source[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

function int(source: EnvSource, key: string, fallback: string): number {
  const raw = env(source, key, fallback);
  const val = parseInt(raw, 10);
  if (isNaN(val) || val < 0) throw new Error(`Invalid env: ${key}=${raw}`);
  return val;
}

export function loadConfig(source: EnvSource = process.env): LedgerConfig {
  const admin = env(source, "LEDGER_ADMIN");
  if (!isAccountId(admin)) throw new Error("Invalid env: LEDGER_ADMIN must be 64 hex chars");

  const clock = env(source, "LEDGER_CLOCK", "manual");
  if (clock !== "manual" && clock !== "wall") {
    throw new Error(`Invalid env: LEDGER_CLOCK=${clock} (manual|wall)`);
  }

  const blockIntervalMs = int(source, "LEDGER_BLOCK_INTERVAL_MS", String(BLOCK_INTERVAL_MS_DEFAULT));
  if (blockIntervalMs === 0) throw new Error("Invalid env: LEDGER_BLOCK_INTERVAL_MS must be > 0");

  return {
    port: int(source, "LEDGER_PORT", "3200"),
    host: env(source, "LEDGER_HOST", "0.0.0.0"),
    admin,
    clock,
    genesisTimestampMs: int(source, "LEDGER_GENESIS_MS", "0"),
    blockIntervalMs,
    snapshotPath: env(source, "LEDGER_SNAPSHOT_PATH", ""),
    snapshotIntervalMs: int(source, "LEDGER_SNAPSHOT_INTERVAL_MS", "60000"),
    logLevel: env(source, "LOG_LEVEL", "info"),
  };
}

/**
 * CLI configuration — loads from ~/.tithe/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 *
 * Multi-endpoint support:
 *   "ledgers" lists ledger nodes in order of preference; requests rotate
 *   to the next one on network errors. The singular "ledger" field always
 *   points at the first entry.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { isAccountId, type AccountId } from "@tithe/rules";

export interface CliConfig {
  /** Primary ledger URL (first entry of ledgers[]). */
  ledger: string;
  /** All ledger endpoints, ordered by preference. */
  ledgers: string[];
  /** Identity sent as x-caller. Unset → read-only commands only. */
  caller?: AccountId;
}

interface FileConfig {
  ledgers?: string[];
  ledger?: string;
  caller?: string;
}

type EnvSource = Record<string, string | undefined>;

const DEFAULT_LEDGER = "http://localhost:3200";

export function getConfigPath(): string {
  return process.env["TITHE_CONFIG"] ?? join(homedir(), ".tithe", "config.json");
}

async function readFileConfig(path: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    // No config file yet: defaults apply
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must hold a JSON object: ${path}`);
  }
  const file: FileConfig = {};
  if ("ledgers" in parsed && Array.isArray(parsed.ledgers)) {
    file.ledgers = parsed.ledgers.filter((u): u is string => typeof u === "string");
  }
  if ("ledger" in parsed && typeof parsed.ledger === "string") file.ledger = parsed.ledger;
  if ("caller" in parsed && typeof parsed.caller === "string") file.caller = parsed.caller;
  return file;
}

function checkCaller(value: string | undefined, source: string): AccountId | undefined {
  if (value === undefined || value === "") return undefined;
  if (!isAccountId(value)) throw new Error(`Invalid caller in ${source}: must be 64-char hex`);
  return value;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(
  env: EnvSource = process.env,
  path: string = getConfigPath(),
): Promise<CliConfig> {
  const file = await readFileConfig(path);

  // env list > env single > file list > file single > default
  const envLedgers = env["TITHE_LEDGER_URLS"]?.split(",").map((s) => s.trim()).filter(Boolean);
  const envLedger = env["TITHE_LEDGER_URL"];
  const ledgers: string[] =
    envLedgers ??
    (envLedger ? [envLedger] : null) ??
    (file.ledgers && file.ledgers.length > 0 ? file.ledgers : null) ??
    (file.ledger ? [file.ledger] : null) ??
    [DEFAULT_LEDGER];

  return {
    ledger: ledgers[0] ?? DEFAULT_LEDGER,
    ledgers,
    caller: checkCaller(env["TITHE_CALLER"], "TITHE_CALLER") ?? checkCaller(file.caller, path),
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig, path: string = getConfigPath()): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const toSave = {
    ledgers: config.ledgers,
    ...(config.caller ? { caller: config.caller } : {}),
  };
  await writeFile(path, JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}

/** Caller identity or a usage error for commands that mutate. */
export function requireCaller(config: CliConfig): AccountId {
  if (!config.caller) {
    throw new Error("No caller configured: set TITHE_CALLER or run `tithe config --caller <hex>`");
  }
  return config.caller;
}

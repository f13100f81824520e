/**
 * tithe config [--ledger url] [--caller hex]
 *
 * Show or update CLI configuration.
 */

import { loadConfig, saveConfig, getConfigPath, type CliConfig } from "../lib/config.js";
import { parseAccount } from "../lib/args.js";

interface ConfigOptions {
  ledger?: string;
  caller?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<CliConfig> {
  const config = await loadConfig();
  let changed = false;

  if (opts.ledger) {
    // Add as primary, preserving others
    const existing = config.ledgers.filter((l) => l !== opts.ledger);
    config.ledgers = [opts.ledger, ...existing];
    config.ledger = opts.ledger;
    changed = true;
  }
  if (opts.caller) {
    config.caller = parseAccount(opts.caller, "caller");
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  ledgers: ${config.ledgers.join(", ") || "(none)"}`);
  console.log(`  caller:  ${config.caller ?? "(unset)"}`);
  return config;
}

#!/usr/bin/env -S npx tsx
/**
 * tithe CLI — operator tool for a ledger node.
 *
 * Commands:
 *   register [id]                 Register an account (default: caller)
 *   mint <recipient> <amount>     Mint new supply (administrator)
 *   transfer <recipient> <amount> Send from caller; 2% funds the pool
 *   toggle <on|off>               Enable/disable redistribution (administrator)
 *   redistribute <ids...>         Pay out the pool, ≤ 10 per batch (administrator)
 *   account <id>                  Balance, score, pending rewards
 *   pool                          Redistribution pool
 *   supply                        Total supply
 *   audit                         Node's full-recount invariant audit
 *   verify                        Replay the journal locally, compare roots
 *   clock [--advance n]           Show/advance the node's block height
 *   config                        Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { registerCommand, accountCommand } from "./commands/account.js";
import { mintCommand, supplyCommand } from "./commands/supply.js";
import { transferCommand } from "./commands/transfer.js";
import { toggleCommand, redistributeCommand, poolCommand } from "./commands/redistribution.js";
import { auditCommand, verifyCommand } from "./commands/audit.js";
import { clockCommand } from "./commands/clock.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("tithe")
  .description("Fee-funded redistribution ledger")
  .version("0.1.0");

/** Load config with per-command --ledger override. */
async function withLedger(opts: { ledger?: string }): Promise<CliConfig> {
  const config = await loadConfig();
  if (opts.ledger) {
    config.ledger = opts.ledger;
    config.ledgers = [opts.ledger];
  }
  return config;
}

// ── accounts ────────────────────────────────────────────────────────

program
  .command("register")
  .description("Register an account (owner or administrator)")
  .argument("[id]", "Account id (64-char hex); defaults to the caller")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (id: string | undefined, opts: { ledger?: string }) => {
    await registerCommand(id, await withLedger(opts));
  });

program
  .command("account")
  .description("Show an account")
  .argument("<id>", "Account id (64-char hex)")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (id: string, opts: { ledger?: string }) => {
    await accountCommand(id, await withLedger(opts));
  });

// ── supply ──────────────────────────────────────────────────────────

program
  .command("mint")
  .description("Mint to a registered account (administrator)")
  .argument("<recipient>", "Recipient id (64-char hex)")
  .argument("<amount>", "Amount (integer)")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (recipient: string, amount: string, opts: { ledger?: string }) => {
    await mintCommand(recipient, amount, await withLedger(opts));
  });

program
  .command("supply")
  .description("Total supply")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (opts: { ledger?: string }) => {
    await supplyCommand(await withLedger(opts));
  });

// ── transfer ────────────────────────────────────────────────────────

program
  .command("transfer")
  .description("Transfer from the caller; 2% goes to the redistribution pool")
  .argument("<recipient>", "Recipient id (64-char hex)")
  .argument("<amount>", "Amount (integer)")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (recipient: string, amount: string, opts: { ledger?: string }) => {
    await transferCommand(recipient, amount, await withLedger(opts));
  });

// ── redistribution ──────────────────────────────────────────────────

program
  .command("toggle")
  .description("Enable or disable algorithmic redistribution (administrator)")
  .argument("<state>", "on|off")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (state: string, opts: { ledger?: string }) => {
    await toggleCommand(state, await withLedger(opts));
  });

program
  .command("redistribute")
  .description("Pay out the pool to up to 10 beneficiaries, in order (administrator)")
  .argument("<ids...>", "Beneficiary ids (64-char hex)")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (ids: string[], opts: { ledger?: string }) => {
    await redistributeCommand(ids, await withLedger(opts));
  });

program
  .command("pool")
  .description("Redistribution pool balance")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (opts: { ledger?: string }) => {
    await poolCommand(await withLedger(opts));
  });

// ── integrity ───────────────────────────────────────────────────────

program
  .command("audit")
  .description("Run the node's invariant audit")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (opts: { ledger?: string }) => {
    const report = await auditCommand(await withLedger(opts));
    if (!report.ok) process.exitCode = 2;
  });

program
  .command("verify")
  .description("Replay the node's journal locally and compare state roots")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (opts: { ledger?: string }) => {
    const result = await verifyCommand(await withLedger(opts));
    if (!result.ok) process.exitCode = 2;
  });

// ── clock ───────────────────────────────────────────────────────────

program
  .command("clock")
  .description("Show the node's block height, or advance a manual clock (administrator)")
  .option("--advance <blocks>", "Blocks to advance")
  .option("-l, --ledger <url>", "Ledger URL override")
  .action(async (opts: { advance?: string; ledger?: string }) => {
    await clockCommand(await withLedger(opts), { advance: opts.advance });
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("-l, --ledger <url>", "Set primary ledger URL")
  .option("--caller <hex>", "Set caller identity")
  .action(async (opts: { ledger?: string; caller?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});

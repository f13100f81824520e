/**
 * tithe register [id]
 * tithe account <id>
 *
 * POST /accounts/:id/register, GET /accounts/:id.
 */

import type { AccountV1 } from "@tithe/rules";
import { requireCaller, type CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { parseAccount } from "../lib/args.js";

export async function registerCommand(
  id: string | undefined,
  config: CliConfig,
): Promise<AccountV1> {
  const caller = requireCaller(config);
  const account = id === undefined ? caller : parseAccount(id);

  const res = await httpPost<{ account: AccountV1 }>(
    config.ledgers,
    `/accounts/${account}/register`,
    undefined,
    caller,
  );
  console.log(`Registered ${account}`);
  console.log(`  score: ${res.account.participation_score}`);
  return res.account;
}

export async function accountCommand(id: string, config: CliConfig): Promise<AccountV1> {
  const account = await httpGet<AccountV1>(config.ledgers, `/accounts/${parseAccount(id)}`);
  printAccount(account);
  return account;
}

function printAccount(a: AccountV1): void {
  console.log(`Account ${a.id}${a.registered ? "" : " (not registered)"}\n`);
  console.log(`  balance:             ${a.balance}`);
  console.log(`  participation score: ${a.participation_score}`);
  console.log(`  pending rewards:     ${a.pending_rewards}`);
  if (a.registered) {
    console.log(`  last activity:       block ${a.last_activity_block}`);
    console.log(`  last claim:          block ${a.last_claim_block}`);
    console.log(`  holdings:            ${a.cumulative_holdings}`);
  }
}

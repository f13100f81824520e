/**
 * tithe mint <recipient> <amount>   (administrator)
 * tithe supply
 */

import { requireCaller, type CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { parseAccount, parseAmount } from "../lib/args.js";

interface MintResponse {
  recipient: string;
  balance: string;
  total_supply: string;
}

export async function mintCommand(
  recipient: string,
  amount: string,
  config: CliConfig,
): Promise<MintResponse> {
  const caller = requireCaller(config);
  const res = await httpPost<MintResponse>(
    config.ledgers,
    "/mint",
    { recipient: parseAccount(recipient, "recipient"), amount: parseAmount(amount) },
    caller,
  );
  console.log(`Minted ${amount} → ${res.recipient}`);
  console.log(`  balance:      ${res.balance}`);
  console.log(`  total supply: ${res.total_supply}`);
  return res;
}

export async function supplyCommand(config: CliConfig): Promise<string> {
  const res = await httpGet<{ total_supply: string }>(config.ledgers, "/supply");
  console.log(res.total_supply);
  return res.total_supply;
}

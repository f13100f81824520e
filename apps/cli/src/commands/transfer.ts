/**
 * tithe transfer <recipient> <amount>
 *
 * Sender is the configured caller; 2% of the amount goes to the pool.
 */

import { requireCaller, type CliConfig } from "../lib/config.js";
import { httpPost } from "../lib/http.js";
import { parseAccount, parseAmount } from "../lib/args.js";

export interface TransferResponse {
  sender: string;
  recipient: string;
  amount: string;
  fee: string;
  net: string;
  sender_balance: string;
  recipient_balance: string;
  redistribution_pool: string;
}

export async function transferCommand(
  recipient: string,
  amount: string,
  config: CliConfig,
): Promise<TransferResponse> {
  const caller = requireCaller(config);
  const res = await httpPost<TransferResponse>(
    config.ledgers,
    "/transfer",
    { recipient: parseAccount(recipient, "recipient"), amount: parseAmount(amount) },
    caller,
  );
  console.log(`Sent ${res.amount} → ${res.recipient.slice(0, 16)}...`);
  console.log(`  fee:     ${res.fee} (to pool, now ${res.redistribution_pool})`);
  console.log(`  arrived: ${res.net}`);
  console.log(`  balance: ${res.sender_balance}`);
  return res;
}

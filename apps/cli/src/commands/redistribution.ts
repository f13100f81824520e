/**
 * tithe toggle <on|off>          (administrator)
 * tithe redistribute <ids...>    (administrator, ≤ 10 per batch)
 * tithe pool
 */

import { MAX_BATCH_BENEFICIARIES } from "@tithe/rules";
import { requireCaller, type CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { parseAccount } from "../lib/args.js";

interface ExecuteResponse {
  payouts: string[];
  redistribution_pool: string;
}

export async function toggleCommand(state: string, config: CliConfig): Promise<boolean> {
  if (state !== "on" && state !== "off") throw new Error(`Expected on|off. Got: ${state}`);
  const caller = requireCaller(config);
  const res = await httpPost<{ active: boolean }>(
    config.ledgers,
    "/redistribution/active",
    { active: state === "on" },
    caller,
  );
  console.log(`Redistribution ${res.active ? "active" : "inactive"}`);
  return res.active;
}

export async function redistributeCommand(
  ids: string[],
  config: CliConfig,
): Promise<ExecuteResponse> {
  if (ids.length > MAX_BATCH_BENEFICIARIES) {
    throw new Error(`At most ${MAX_BATCH_BENEFICIARIES} beneficiaries per batch. Got: ${ids.length}`);
  }
  const caller = requireCaller(config);
  const beneficiaries = ids.map((id) => parseAccount(id, "beneficiary"));

  const res = await httpPost<ExecuteResponse>(
    config.ledgers,
    "/redistribution/execute",
    { beneficiaries },
    caller,
  );

  beneficiaries.forEach((id, i) => {
    console.log(`  ${id.slice(0, 16)}...  ${res.payouts[i] ?? "0"}`);
  });
  console.log(`Pool remaining: ${res.redistribution_pool}`);
  return res;
}

export async function poolCommand(config: CliConfig): Promise<string> {
  const res = await httpGet<{ redistribution_pool: string }>(config.ledgers, "/pool");
  console.log(res.redistribution_pool);
  return res.redistribution_pool;
}

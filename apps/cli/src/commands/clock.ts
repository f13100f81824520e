/**
 * tithe clock [--advance n]
 *
 * Advancing only works against a node running a manual clock.
 */

import { requireCaller, type CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { parseAmount } from "../lib/args.js";

export async function clockCommand(
  config: CliConfig,
  opts: { advance?: string } = {},
): Promise<string> {
  if (opts.advance !== undefined) {
    const blocks = parseAmount(opts.advance, "block count");
    const res = await httpPost<{ block: string }>(
      config.ledgers,
      "/clock/advance",
      { blocks },
      requireCaller(config),
    );
    console.log(`Block ${res.block}`);
    return res.block;
  }

  const res = await httpGet<{ block: string; mode: string }>(config.ledgers, "/clock");
  console.log(`Block ${res.block} (${res.mode} clock)`);
  return res.block;
}

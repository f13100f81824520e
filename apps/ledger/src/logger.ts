/**
 * Process logger — one pino instance shared by Fastify and the engine.
 */

import { pino, type Logger } from "pino";

export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: "ledger" },
  });
}

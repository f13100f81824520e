/**
 * Ledger server — HTTP surface over the ledger engine.
 *
 * Caller identity arrives in the `x-caller` header. Authenticating it
 * (signatures, sessions) is the fronting host's job.
 *
 * Routes:
 *   POST /accounts/:id/register  — register an account (owner or admin)
 *   POST /mint                   — mint to a registered account (admin)
 *   POST /transfer               — transfer from caller, 2% to the pool
 *   POST /redistribution/active  — toggle advanced redistribution (admin)
 *   POST /redistribution/execute — batch payout, ≤ 10 beneficiaries (admin)
 *   GET  /accounts/:id           — full account view + pending rewards
 *   GET  /accounts/:id/balance   — balance
 *   GET  /accounts/:id/score     — participation score
 *   GET  /accounts/:id/pending   — base share claimable now
 *   GET  /pool                   — redistribution pool
 *   GET  /supply                 — total supply
 *   GET  /state                  — globals + state root
 *   GET  /audit                  — full-recount invariant audit
 *   GET  /journal                — committed operations (from=seq)
 *   GET  /clock                  — current block height
 *   POST /clock/advance          — advance a manual clock (admin)
 *   GET  /health                 — health check
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import type { Logger } from "pino";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  isAccountId,
  MintRequest,
  TransferRequest,
  RedistributionToggleRequest,
  RedistributionExecuteRequest,
  ClockAdvanceRequest,
  type AccountId,
  type LedgerErrorCode,
} from "@tithe/rules";
import { loadConfig, type LedgerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { Ledger, type OpContext } from "./engine/ledger.js";
import { ManualClock, WallBlockClock, type BlockClock } from "./engine/clock.js";
import { loadSnapshot } from "./store/snapshot-file.js";
import { toAccountV1, toAuditV1, toLedgerStateV1 } from "./views/account-view.js";
import { createSnapshotScheduler } from "./scheduler.js";

const ERROR_STATUS: Record<LedgerErrorCode, number> = {
  unauthorized: 403,
  not_registered: 404,
  already_registered: 409,
  invalid_amount: 422,
  self_transfer: 422,
  batch_too_large: 422,
  insufficient_balance: 409,
  no_rewards: 409,
  pool_exhausted: 409,
  redistribution_locked: 423,
};

const MISSING_CALLER = { error: "missing_caller", detail: "x-caller must be 64 hex chars" };

function callerFrom(header: string | string[] | undefined): AccountId | null {
  return typeof header === "string" && isAccountId(header) ? header : null;
}

export interface LedgerDeps {
  config: LedgerConfig;
  ledger?: Ledger;
  clock?: BlockClock;
  logger?: Logger;
}

export function createClock(config: LedgerConfig, start: bigint): BlockClock {
  if (config.clock === "wall") {
    return new WallBlockClock(config.genesisTimestampMs, config.blockIntervalMs);
  }
  return new ManualClock(start);
}

type Parsed<T extends TSchema> = { ok: true; value: Static<T> } | { ok: false; detail: string };

function parse<T extends TSchema>(schema: T, value: unknown): Parsed<T> {
  if (Value.Check(schema, value)) return { ok: true, value };
  const first = Value.Errors(schema, value).First();
  return {
    ok: false,
    detail: first ? `${first.path || "body"}: ${first.message}` : "invalid body",
  };
}

export async function buildApp(deps: LedgerDeps) {
  const { config } = deps;
  const logger = deps.logger ?? createLogger(config.logLevel);
  const ledger = deps.ledger ?? new Ledger({ admin: config.admin, logger });
  const clock = deps.clock ?? createClock(config, ledger.height);
  const start = clock.current();
  if (start < ledger.height) {
    throw new Error(`Clock reads block ${start}, below ledger height ${ledger.height}`);
  }
  const app = Fastify({ loggerInstance: logger });

  function context(caller: AccountId): OpContext {
    return { caller, block: clock.current() };
  }

  // ── Registration ───────────────────────────────────────────────
  app.post<{ Params: { id: string } }>("/accounts/:id/register", async (req, reply) => {
    const id = req.params.id;
    if (!isAccountId(id)) return reply.status(422).send({ error: "invalid_account" });
    const caller = callerFrom(req.headers["x-caller"]);
    if (!caller) return reply.status(401).send(MISSING_CALLER);

    const result = ledger.register(context(caller), id);
    if (!result.ok) return reply.status(ERROR_STATUS[result.error]).send({ error: result.error });
    return reply.send({ account: toAccountV1(ledger, id) });
  });

  // ── Mint ───────────────────────────────────────────────────────
  app.post("/mint", async (req, reply) => {
    const body = parse(MintRequest, req.body);
    if (!body.ok) return reply.status(422).send({ error: "invalid_request", detail: body.detail });
    const caller = callerFrom(req.headers["x-caller"]);
    if (!caller) return reply.status(401).send(MISSING_CALLER);

    const { recipient, amount } = body.value;
    const result = ledger.mint(context(caller), BigInt(amount), recipient);
    if (!result.ok) return reply.status(ERROR_STATUS[result.error]).send({ error: result.error });
    return reply.send({
      recipient,
      balance: result.value.balance.toString(),
      total_supply: result.value.totalSupply.toString(),
    });
  });

  // ── Transfer ───────────────────────────────────────────────────
  app.post("/transfer", async (req, reply) => {
    const body = parse(TransferRequest, req.body);
    if (!body.ok) return reply.status(422).send({ error: "invalid_request", detail: body.detail });
    const caller = callerFrom(req.headers["x-caller"]);
    if (!caller) return reply.status(401).send(MISSING_CALLER);

    const { recipient, amount } = body.value;
    const result = ledger.transfer(context(caller), BigInt(amount), caller, recipient);
    if (!result.ok) return reply.status(ERROR_STATUS[result.error]).send({ error: result.error });
    const r = result.value;
    return reply.send({
      sender: caller,
      recipient,
      amount,
      fee: r.fee.toString(),
      net: r.net.toString(),
      sender_balance: r.senderBalance.toString(),
      recipient_balance: r.recipientBalance.toString(),
      redistribution_pool: r.pool.toString(),
    });
  });

  // ── Redistribution ─────────────────────────────────────────────
  app.post("/redistribution/active", async (req, reply) => {
    const body = parse(RedistributionToggleRequest, req.body);
    if (!body.ok) return reply.status(422).send({ error: "invalid_request", detail: body.detail });
    const caller = callerFrom(req.headers["x-caller"]);
    if (!caller) return reply.status(401).send(MISSING_CALLER);

    const result = ledger.setRedistributionActive(context(caller), body.value.active);
    if (!result.ok) return reply.status(ERROR_STATUS[result.error]).send({ error: result.error });
    return reply.send({ active: result.value });
  });

  app.post("/redistribution/execute", async (req, reply) => {
    const body = parse(RedistributionExecuteRequest, req.body);
    if (!body.ok) return reply.status(422).send({ error: "invalid_request", detail: body.detail });
    const caller = callerFrom(req.headers["x-caller"]);
    if (!caller) return reply.status(401).send(MISSING_CALLER);

    const result = ledger.executeAlgorithmicRedistribution(
      context(caller),
      body.value.beneficiaries,
    );
    if (!result.ok) return reply.status(ERROR_STATUS[result.error]).send({ error: result.error });
    return reply.send({
      payouts: result.value.map((p) => p.toString()),
      redistribution_pool: ledger.getRedistributionPool().toString(),
    });
  });

  // ── Queries ────────────────────────────────────────────────────
  app.get<{ Params: { id: string } }>("/accounts/:id", async (req, reply) => {
    const id = req.params.id;
    if (!isAccountId(id)) return reply.status(422).send({ error: "invalid_account" });
    return reply.send(toAccountV1(ledger, id));
  });

  app.get<{ Params: { id: string } }>("/accounts/:id/balance", async (req, reply) => {
    const id = req.params.id;
    if (!isAccountId(id)) return reply.status(422).send({ error: "invalid_account" });
    return reply.send({ id, balance: ledger.getBalance(id).toString() });
  });

  app.get<{ Params: { id: string } }>("/accounts/:id/score", async (req, reply) => {
    const id = req.params.id;
    if (!isAccountId(id)) return reply.status(422).send({ error: "invalid_account" });
    return reply.send({ id, participation_score: ledger.getParticipationScore(id).toString() });
  });

  app.get<{ Params: { id: string } }>("/accounts/:id/pending", async (req, reply) => {
    const id = req.params.id;
    if (!isAccountId(id)) return reply.status(422).send({ error: "invalid_account" });
    return reply.send({ id, pending_rewards: ledger.getPendingRewards(id).toString() });
  });

  app.get("/pool", async (_req, reply) => {
    return reply.send({ redistribution_pool: ledger.getRedistributionPool().toString() });
  });

  app.get("/supply", async (_req, reply) => {
    return reply.send({ total_supply: ledger.getTotalSupply().toString() });
  });

  app.get("/state", async (_req, reply) => {
    return reply.send(toLedgerStateV1(ledger));
  });

  app.get("/audit", async (_req, reply) => {
    return reply.send(toAuditV1(ledger.audit()));
  });

  app.get<{ Querystring: { from?: string } }>("/journal", async (req, reply) => {
    const raw = req.query.from ?? "1";
    if (!/^[1-9][0-9]*$/.test(raw)) {
      return reply.status(422).send({ error: "invalid_from", detail: "from must be a positive integer" });
    }
    return reply.send({
      admin: ledger.access.admin,
      base_root: ledger.journal.baseRoot,
      count: ledger.journal.count(),
      entries: ledger.journal.getEntries(Number(raw)),
    });
  });

  // ── Clock ──────────────────────────────────────────────────────
  app.get("/clock", async (_req, reply) => {
    return reply.send({
      block: clock.current().toString(),
      mode: clock instanceof ManualClock ? "manual" : "wall",
    });
  });

  app.post("/clock/advance", async (req, reply) => {
    const body = parse(ClockAdvanceRequest, req.body);
    if (!body.ok) return reply.status(422).send({ error: "invalid_request", detail: body.detail });
    const caller = callerFrom(req.headers["x-caller"]);
    if (!caller) return reply.status(401).send(MISSING_CALLER);
    if (!ledger.access.isAdmin(caller)) return reply.status(403).send({ error: "unauthorized" });
    if (!(clock instanceof ManualClock)) {
      return reply.status(409).send({ error: "clock_not_manual" });
    }
    return reply.send({ block: clock.advance(BigInt(body.value.blocks)).toString() });
  });

  // ── Health ─────────────────────────────────────────────────────
  app.get("/health", async (_req, reply) => {
    const report = ledger.audit();
    return reply.status(report.ok ? 200 : 503).send({
      status: report.ok ? "ok" : "degraded",
      block: clock.current().toString(),
      entries: ledger.journal.count(),
    });
  });

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  logger.info(
    {
      port: config.port,
      admin: `${config.admin.slice(0, 12)}…`,
      clock: config.clock,
      snapshotPath: config.snapshotPath || "(none)",
      snapshotIntervalMs: config.snapshotIntervalMs,
    },
    "ledger config",
  );

  const restored = config.snapshotPath ? await loadSnapshot(config.snapshotPath) : null;
  const ledger = restored
    ? Ledger.fromSnapshot(restored, { admin: config.admin, logger })
    : new Ledger({ admin: config.admin, logger });
  if (restored) {
    logger.info(
      { block: restored.block.toString(), accounts: restored.accounts.length, root: ledger.stateRoot() },
      "snapshot restored",
    );
  }

  const app = await buildApp({ config, ledger, logger }).catch((err: unknown) => {
    logger.fatal({ err }, "startup failed");
    process.exit(1);
  });

  // Register hooks before listen (Fastify 5 forbids addHook after listen)
  if (config.snapshotPath) {
    const scheduler = createSnapshotScheduler(ledger, {
      path: config.snapshotPath,
      intervalMs: config.snapshotIntervalMs > 0 ? config.snapshotIntervalMs : undefined,
      onSave: (result) => {
        app.log.info({ root: result.root, entries: result.entries }, "snapshot written");
      },
      onError: (err) => {
        app.log.error({ err }, "snapshot error");
      },
    });

    app.addHook("onClose", async () => {
      scheduler.stop();
      await scheduler.flush();
    });

    if (config.snapshotIntervalMs > 0) scheduler.start();
  }

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}

/**
 * CLI command tests against an in-process ledger node.
 *
 * fetch is stubbed to route into Fastify inject, so every command runs
 * its real request/response path without a network.
 *
 * Tests: end-to-end operator flow, local validation before any request,
 * error propagation, endpoint rotation, journal verification.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { pino } from "pino";
import { buildApp } from "@tithe/ledger/server";
import { Ledger, ManualClock } from "@tithe/ledger";
import type { CliConfig } from "../src/lib/config.js";
import { LedgerHttpError } from "../src/lib/http.js";
import { registerCommand, accountCommand } from "../src/commands/account.js";
import { mintCommand, supplyCommand } from "../src/commands/supply.js";
import { transferCommand } from "../src/commands/transfer.js";
import { toggleCommand, redistributeCommand, poolCommand } from "../src/commands/redistribution.js";
import { auditCommand, verifyCommand } from "../src/commands/audit.js";
import { clockCommand } from "../src/commands/clock.js";

// ── Helpers ────────────────────────────────────────────────────────

const ADMIN = "ad".repeat(32);
const A = "aa".repeat(32);
const B = "bb".repeat(32);
const NODE = "http://ledger.test";
const DOWN = "http://down.test";

let app: Awaited<ReturnType<typeof buildApp>>;
let fetchMock: ReturnType<typeof routeFetch>;

function as(caller: string | undefined, ledgers: string[] = [NODE]): CliConfig {
  return { ledger: ledgers[0] ?? NODE, ledgers, caller };
}

/** fetch → app.inject; DOWN refuses connections. */
function routeFetch() {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    if (url.origin === DOWN) throw new TypeError("fetch failed");

    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const res = await app.inject({
      method: init?.method === "POST" ? "POST" : "GET",
      url: url.pathname + url.search,
      headers,
      payload: typeof init?.body === "string" ? init.body : undefined,
    });
    return new Response(res.body, {
      status: res.statusCode,
      headers: { "content-type": "application/json" },
    });
  });
}

beforeEach(async () => {
  const logger = pino({ level: "silent" });
  app = await buildApp({
    config: {
      port: 0,
      host: "127.0.0.1",
      admin: ADMIN,
      clock: "manual",
      genesisTimestampMs: 0,
      blockIntervalMs: 600_000,
      snapshotPath: "",
      snapshotIntervalMs: 0,
      logLevel: "silent",
    },
    ledger: new Ledger({ admin: ADMIN, logger }),
    clock: new ManualClock(),
    logger,
  });
  fetchMock = routeFetch();
  vi.stubGlobal("fetch", fetchMock);
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(async () => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
  await app.close();
});

// ── Operator flow ──────────────────────────────────────────────────

describe("operator flow", () => {
  it("register → mint → transfer → redistribute → verify", async () => {
    const registered = await registerCommand(undefined, as(A));
    expect(registered.id).toBe(A);
    expect(registered.participation_score).toBe("5000");

    await registerCommand(B, as(ADMIN));
    await mintCommand(A, "10000", as(ADMIN));
    expect(await clockCommand(as(ADMIN), { advance: "500" })).toBe("500");

    const sent = await transferCommand(B, "1000", as(A));
    expect(sent.fee).toBe("20");
    expect(sent.net).toBe("980");
    expect(sent.sender_balance).toBe("9000");

    expect(await toggleCommand("on", as(ADMIN))).toBe(true);
    const paid = await redistributeCommand([A], as(ADMIN));
    expect(paid).toEqual({ payouts: ["14"], redistribution_pool: "6" });

    const account = await accountCommand(A, as(undefined));
    expect(account.balance).toBe("9014");
    expect(account.participation_score).toBe("5150");
    expect(account.last_claim_block).toBe("500");

    expect(await poolCommand(as(undefined))).toBe("6");
    expect(await supplyCommand(as(undefined))).toBe("10000");
    expect((await auditCommand(as(undefined))).ok).toBe(true);

    const verified = await verifyCommand(as(undefined));
    expect(verified.ok).toBe(true);
    expect(verified.entries).toBe(6);
    expect(verified.localRoot).toBe(verified.nodeRoot);
  });

  it("sends the caller header on mutations", async () => {
    await registerCommand(undefined, as(A));
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${NODE}/accounts/${A}/register`);
    expect(new Headers(init?.headers).get("x-caller")).toBe(A);
  });
});

// ── Local validation ───────────────────────────────────────────────

describe("validation before any request", () => {
  it("mutations need a caller", async () => {
    await expect(transferCommand(B, "1", as(undefined))).rejects.toThrow("No caller configured");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("ids must be hex", async () => {
    await expect(transferCommand("xyz", "1", as(A))).rejects.toThrow(
      "Invalid recipient: must be 64-char hex. Got: xyz",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("amounts must be integers", async () => {
    await expect(mintCommand(A, "1.5", as(ADMIN))).rejects.toThrow(
      "Invalid amount: must be a non-negative integer. Got: 1.5",
    );
    await expect(mintCommand(A, "-3", as(ADMIN))).rejects.toThrow("Invalid amount");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("batches are capped at ten", async () => {
    const ids = Array.from({ length: 11 }, () => A);
    await expect(redistributeCommand(ids, as(ADMIN))).rejects.toThrow(
      "At most 10 beneficiaries per batch. Got: 11",
    );
  });

  it("toggle takes on|off", async () => {
    await expect(toggleCommand("yes", as(ADMIN))).rejects.toThrow("Expected on|off. Got: yes");
  });
});

// ── Node errors ────────────────────────────────────────────────────

describe("node errors", () => {
  it("surface status and ledger error code", async () => {
    await registerCommand(undefined, as(A));
    await registerCommand(B, as(ADMIN));

    const err = await transferCommand(B, "1", as(A)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LedgerHttpError);
    if (!(err instanceof LedgerHttpError)) return;
    expect(err.status).toBe(409);
    expect(err.code).toBe("insufficient_balance");
    expect(err.message).toBe('POST /transfer → 409: {"error":"insufficient_balance"}');
  });

  it("non-admin mint is refused", async () => {
    await registerCommand(undefined, as(A));
    await expect(mintCommand(A, "5", as(A))).rejects.toMatchObject({
      status: 403,
      code: "unauthorized",
    });
  });
});

// ── Rotation ───────────────────────────────────────────────────────

describe("endpoint rotation", () => {
  it("skips unreachable nodes", async () => {
    expect(await supplyCommand(as(undefined, [DOWN, NODE]))).toBe("0");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("fails when every node is unreachable", async () => {
    await expect(supplyCommand(as(undefined, [DOWN, DOWN]))).rejects.toThrow(
      "All 2 endpoint(s) unreachable",
    );
  });

  it("does not retry a node that answered", async () => {
    await expect(
      transferCommand(B, "1", as(A, [NODE, DOWN])),
    ).rejects.toMatchObject({ status: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

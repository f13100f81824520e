/**
 * Ledger engine — balances, fee pool, participation scores, payouts.
 *
 * Every mutating operation:
 *   1. checks all of its preconditions against an overlay of the store,
 *   2. applies its effects to the overlay,
 *   3. commits the overlay and journals itself only if nothing failed.
 * A rejected operation therefore has no observable side effect.
 *
 * The block height is an explicit argument (OpContext), never ambient.
 */

import { pino, type Logger } from "pino";
import {
  MAX_BATCH_BENEFICIARIES,
  splitFee,
  transitionScore,
  claimBoost,
  applyScoreDelta,
  accrueHoldings,
  baseShare,
  assessBeneficiary,
  newAccount,
  snapshotRoot,
  ok,
  fail,
  type AccountId,
  type AccountState,
  type GlobalState,
  type LedgerResult,
  type LedgerSnapshot,
  type StateRoot,
} from "@tithe/rules";
import { MemoryLedgerStore, type LedgerStore } from "../store/ledger-store.js";
import { OverlayStore } from "../store/overlay-store.js";
import { Journal } from "../event-log/writer.js";
import {
  REGISTER_EVENT,
  MINT_EVENT,
  TRANSFER_EVENT,
  TOGGLE_EVENT,
  REDISTRIBUTE_EVENT,
} from "../event-log/schemas.js";
import { createAccessPolicy, type AccessPolicy } from "./access.js";
import { auditStore, type AuditReport } from "./audit.js";

// ── Types ──────────────────────────────────────────────────────────

export interface OpContext {
  /** Authenticated identity invoking the operation. */
  caller: AccountId;
  /** Current block height, supplied by the host. */
  block: bigint;
}

export interface LedgerOptions {
  admin: AccountId;
  store?: LedgerStore;
  journal?: Journal;
  logger?: Logger;
  /** Highest block already applied to `store` (restored snapshots). */
  height?: bigint;
}

export interface MintReceipt {
  balance: bigint;
  totalSupply: bigint;
}

export interface TransferReceipt {
  fee: bigint;
  net: bigint;
  senderBalance: bigint;
  recipientBalance: bigint;
  pool: bigint;
}

type Op = "register" | "mint" | "transfer" | "toggle" | "redistribute";

// ── Engine ─────────────────────────────────────────────────────────

export class Ledger {
  readonly store: LedgerStore;
  readonly journal: Journal;
  readonly access: AccessPolicy;
  private readonly log: Logger;
  private _height: bigint;

  constructor(options: LedgerOptions) {
    this.store = options.store ?? new MemoryLedgerStore();
    this.journal = options.journal ?? new Journal();
    this.access = createAccessPolicy(options.admin);
    this.log = options.logger ?? pino({ level: "silent" });
    this._height = options.height ?? 0n;
  }

  static fromSnapshot(
    snapshot: LedgerSnapshot,
    options: Omit<LedgerOptions, "store" | "journal" | "height">,
  ): Ledger {
    const store = MemoryLedgerStore.fromSnapshot(snapshot);
    const report = auditStore(store);
    if (!report.ok) {
      throw new Error(`Snapshot violates ledger invariants: ${report.violations.join("; ")}`);
    }
    return new Ledger({
      ...options,
      store,
      journal: new Journal(snapshotRoot(snapshot)),
      height: snapshot.block,
    });
  }

  /** Highest block any committed operation ran at. */
  get height(): bigint {
    return this._height;
  }

  // ── Registration ─────────────────────────────────────────────────

  register(ctx: OpContext, account: AccountId): LedgerResult<AccountState> {
    const result = this.run("register", ctx, (tx) => {
      if (!this.access.canManage(ctx.caller, account)) return fail("unauthorized");
      if (tx.getAccount(account)) return fail("already_registered");

      const record = newAccount(ctx.block);
      const g = tx.getGlobals();
      tx.putAccount(account, record);
      tx.putGlobals({
        ...g,
        totalParticipationScore: g.totalParticipationScore + record.participationScore,
        registeredCount: g.registeredCount + 1n,
      });
      return ok(record);
    });

    if (result.ok) {
      this.journal.append({
        type: REGISTER_EVENT,
        block: ctx.block.toString(),
        caller: ctx.caller,
        payload: { account },
      });
      this.log.info({ op: "register", block: ctx.block.toString(), account }, "account registered");
    }
    return result;
  }

  // ── Supply ───────────────────────────────────────────────────────

  mint(ctx: OpContext, amount: bigint, recipient: AccountId): LedgerResult<MintReceipt> {
    const result = this.run("mint", ctx, (tx) => {
      if (!this.access.isAdmin(ctx.caller)) return fail("unauthorized");
      if (amount <= 0n) return fail("invalid_amount");
      const account = tx.getAccount(recipient);
      if (!account) return fail("not_registered");

      const g = tx.getGlobals();
      const balance = account.balance + amount;
      const totalSupply = g.totalSupply + amount;
      tx.putAccount(recipient, { ...account, balance });
      tx.putGlobals({ ...g, totalSupply });
      return ok({ balance, totalSupply });
    });

    if (result.ok) {
      this.journal.append({
        type: MINT_EVENT,
        block: ctx.block.toString(),
        caller: ctx.caller,
        payload: { recipient, amount: amount.toString() },
      });
      this.log.info(
        {
          op: "mint",
          block: ctx.block.toString(),
          recipient,
          amount: amount.toString(),
          totalSupply: result.value.totalSupply.toString(),
        },
        "minted",
      );
    }
    return result;
  }

  // ── Transfer ─────────────────────────────────────────────────────

  /**
   * Move `amount` from sender to recipient; 2% of it funds the pool.
   *
   * Order of effects matters: holdings accrue on the pre-transfer
   * balances, scores transition against the pre-transfer activity block,
   * and only then does last_activity_block advance.
   */
  transfer(
    ctx: OpContext,
    amount: bigint,
    sender: AccountId,
    recipient: AccountId,
  ): LedgerResult<TransferReceipt> {
    const result = this.run("transfer", ctx, (tx) => {
      if (ctx.caller !== sender) return fail("unauthorized");
      if (amount <= 0n) return fail("invalid_amount");
      if (sender === recipient) return fail("self_transfer");
      const from = tx.getAccount(sender);
      if (!from) return fail("not_registered");
      const to = tx.getAccount(recipient);
      if (!to) return fail("not_registered");
      if (from.balance < amount) return fail("insufficient_balance");

      const { fee, net } = splitFee(amount);
      const fromScore = transitionScore(from.participationScore, from.lastActivityBlock, ctx.block);
      const toScore = transitionScore(to.participationScore, to.lastActivityBlock, ctx.block);

      const nextFrom: AccountState = {
        ...from,
        cumulativeHoldings: accrueHoldings(
          from.cumulativeHoldings,
          from.balance,
          from.lastActivityBlock,
          ctx.block,
        ),
        balance: from.balance - amount,
        participationScore: fromScore.score,
        lastActivityBlock: ctx.block,
      };
      const nextTo: AccountState = {
        ...to,
        cumulativeHoldings: accrueHoldings(
          to.cumulativeHoldings,
          to.balance,
          to.lastActivityBlock,
          ctx.block,
        ),
        balance: to.balance + net,
        participationScore: toScore.score,
        lastActivityBlock: ctx.block,
      };

      const g = tx.getGlobals();
      const pool = g.redistributionPool + fee;
      tx.putAccount(sender, nextFrom);
      tx.putAccount(recipient, nextTo);
      tx.putGlobals({
        ...g,
        redistributionPool: pool,
        totalParticipationScore: applyScoreDelta(
          applyScoreDelta(g.totalParticipationScore, fromScore),
          toScore,
        ),
      });

      return ok({
        fee,
        net,
        senderBalance: nextFrom.balance,
        recipientBalance: nextTo.balance,
        pool,
      });
    });

    if (result.ok) {
      this.journal.append({
        type: TRANSFER_EVENT,
        block: ctx.block.toString(),
        caller: ctx.caller,
        payload: {
          sender,
          recipient,
          amount: amount.toString(),
          fee: result.value.fee.toString(),
        },
      });
      this.log.info(
        {
          op: "transfer",
          block: ctx.block.toString(),
          sender,
          recipient,
          amount: amount.toString(),
          fee: result.value.fee.toString(),
        },
        "transferred",
      );
    }
    return result;
  }

  // ── Redistribution ───────────────────────────────────────────────

  setRedistributionActive(ctx: OpContext, active: boolean): LedgerResult<boolean> {
    const result = this.run("toggle", ctx, (tx) => {
      if (!this.access.isAdmin(ctx.caller)) return fail("unauthorized");
      tx.putGlobals({ ...tx.getGlobals(), redistributionActive: active });
      return ok(active);
    });

    if (result.ok) {
      this.journal.append({
        type: TOGGLE_EVENT,
        block: ctx.block.toString(),
        caller: ctx.caller,
        payload: { active },
      });
      this.log.info({ op: "toggle", block: ctx.block.toString(), active }, "redistribution toggled");
    }
    return result;
  }

  /**
   * Pay out the pool to up to 10 beneficiaries, in the order given.
   *
   * Each beneficiary is assessed against the pool and score total left by
   * the ones before it, so order changes the outcome. Unregistered and
   * ineligible beneficiaries get 0 and are not touched.
   *
   * A payout larger than the remaining pool aborts the whole batch with
   * `pool_exhausted`; payouts are never clamped.
   */
  executeAlgorithmicRedistribution(
    ctx: OpContext,
    beneficiaries: readonly AccountId[],
  ): LedgerResult<bigint[]> {
    const result = this.run("redistribute", ctx, (tx) => {
      if (!this.access.isAdmin(ctx.caller)) return fail("unauthorized");
      if (beneficiaries.length > MAX_BATCH_BENEFICIARIES) return fail("batch_too_large");
      const start = tx.getGlobals();
      if (!start.redistributionActive) return fail("redistribution_locked");
      if (start.redistributionPool <= 0n) return fail("no_rewards");

      const payouts: bigint[] = [];
      for (const id of beneficiaries) {
        const account = tx.getAccount(id);
        if (!account) {
          payouts.push(0n);
          continue;
        }

        const g = tx.getGlobals();
        const assessment = assessBeneficiary({
          balance: account.balance,
          score: account.participationScore,
          lastActivityBlock: account.lastActivityBlock,
          lastClaimBlock: account.lastClaimBlock,
          pool: g.redistributionPool,
          totalSupply: g.totalSupply,
          totalScore: g.totalParticipationScore,
          currentBlock: ctx.block,
        });
        if (!assessment.eligible) {
          payouts.push(0n);
          continue;
        }
        if (assessment.payout > g.redistributionPool) {
          this.log.warn(
            {
              op: "redistribute",
              block: ctx.block.toString(),
              beneficiary: id,
              payout: assessment.payout.toString(),
              pool: g.redistributionPool.toString(),
            },
            "payout exceeds remaining pool",
          );
          return fail("pool_exhausted");
        }

        const boost = claimBoost(account.participationScore);
        tx.putAccount(id, {
          ...account,
          balance: account.balance + assessment.payout,
          lastClaimBlock: ctx.block,
          participationScore: boost.score,
        });
        tx.putGlobals({
          ...g,
          redistributionPool: g.redistributionPool - assessment.payout,
          totalParticipationScore: applyScoreDelta(g.totalParticipationScore, boost),
        });
        payouts.push(assessment.payout);
      }
      return ok(payouts);
    });

    if (result.ok) {
      this.journal.append({
        type: REDISTRIBUTE_EVENT,
        block: ctx.block.toString(),
        caller: ctx.caller,
        payload: {
          beneficiaries: [...beneficiaries],
          payouts: result.value.map((p) => p.toString()),
        },
      });
      this.log.info(
        {
          op: "redistribute",
          block: ctx.block.toString(),
          beneficiaries: beneficiaries.length,
          paid: result.value.reduce((sum, p) => sum + p, 0n).toString(),
          pool: this.store.getGlobals().redistributionPool.toString(),
        },
        "redistribution executed",
      );
    }
    return result;
  }

  // ── Queries (no mutation, unregistered → zero values) ────────────

  getAccount(id: AccountId): AccountState | undefined {
    return this.store.getAccount(id);
  }

  isRegistered(id: AccountId): boolean {
    return this.store.getAccount(id) !== undefined;
  }

  getBalance(id: AccountId): bigint {
    return this.store.getAccount(id)?.balance ?? 0n;
  }

  getParticipationScore(id: AccountId): bigint {
    return this.store.getAccount(id)?.participationScore ?? 0n;
  }

  getRedistributionPool(): bigint {
    return this.store.getGlobals().redistributionPool;
  }

  getTotalSupply(): bigint {
    return this.store.getGlobals().totalSupply;
  }

  getGlobals(): GlobalState {
    return this.store.getGlobals();
  }

  /** Base share the account could claim right now (before multipliers). */
  getPendingRewards(id: AccountId): bigint {
    const account = this.store.getAccount(id);
    if (!account) return 0n;
    const g = this.store.getGlobals();
    return baseShare({
      pool: g.redistributionPool,
      balance: account.balance,
      score: account.participationScore,
      totalSupply: g.totalSupply,
      totalScore: g.totalParticipationScore,
    });
  }

  snapshot(): LedgerSnapshot {
    return {
      block: this._height,
      globals: this.store.getGlobals(),
      accounts: this.store.listAccounts().map(([id, state]) => ({ id, ...state })),
    };
  }

  stateRoot(): StateRoot {
    return snapshotRoot(this.snapshot());
  }

  audit(): AuditReport {
    return auditStore(this.store);
  }

  // ── Internals ────────────────────────────────────────────────────

  private run<T>(
    op: Op,
    ctx: OpContext,
    body: (tx: OverlayStore) => LedgerResult<T>,
  ): LedgerResult<T> {
    if (ctx.block < this._height) {
      throw new Error(`Block height moved backwards: ${ctx.block} < ${this._height}`);
    }

    const tx = new OverlayStore(this.store);
    const result = body(tx);
    if (!result.ok) {
      this.log.debug(
        { op, block: ctx.block.toString(), caller: ctx.caller, error: result.error },
        "operation rejected",
      );
      return result;
    }

    tx.commit();
    this._height = ctx.block;
    return result;
  }
}

import { randomUUID } from "crypto";
import type { Account, Outcome, SettlementRecord, State, Transaction, TransactionType } from "./types.js";
import type { FileStore } from "./storage/fileStore.js";
import { GameError, InvariantViolation } from "./errors.js";
import { logger } from "./logger.js";
import { withLock, withLocks } from "./locking.js";
import { claimKey } from "./idempotency.js";
import { systemClock, toIso, type Clock } from "./time.js";

export type SettleRequest = {
  sessionId: string;
  outcome: Outcome;
  playerA: string;
  playerB: string;
  amountA: number;
  amountB: number;
};

const log = logger.child({ component: "ledger" });

function balanceKey(userId: string) {
  return `balance:${userId}`;
}

function assertAmount(amount: number) {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new RangeError(`Ledger amounts must be positive integers, got ${amount}`);
  }
}

export function winnerOf(outcome: Outcome): "a" | "b" | undefined {
  if (outcome === "WinA" || outcome === "ForfeitB") return "a";
  if (outcome === "WinB" || outcome === "ForfeitA") return "b";
  return undefined;
}

function ensureAccount(state: State, userId: string, at: string): Account {
  const existing = state.accounts[userId];
  if (existing) return existing;
  const created: Account = { userId, available: 0, held: 0, createdAt: at, updatedAt: at };
  state.accounts[userId] = created;
  return created;
}

function journal(
  state: State,
  account: Account,
  type: TransactionType,
  amount: number,
  at: string,
  opts: { refId?: string; idemKey?: string } = {}
): Transaction {
  account.updatedAt = at;
  const tx: Transaction = {
    txId: randomUUID(),
    userId: account.userId,
    type,
    amount,
    availableAfter: account.available,
    heldAfter: account.held,
    refId: opts.refId,
    idemKey: opts.idemKey,
    createdAt: at,
  };
  state.transactions.push(tx);
  return tx;
}

/**
 * Sole owner of balances. Each operation runs under the affected accounts' locks
 * and lands in a single store mutation, so a failed check leaves nothing behind.
 */
export class Ledger {
  constructor(
    private readonly store: FileStore,
    private readonly clock: Clock = systemClock
  ) {}

  getAccount(userId: string): Account {
    const acc = this.store.get().accounts[userId];
    if (acc) return { ...acc };
    const at = toIso(this.clock());
    return { userId, available: 0, held: 0, createdAt: at, updatedAt: at };
  }

  /** Journal entries for one user, newest first. */
  history(userId: string, limit = 10): Transaction[] {
    const mine = this.store.get().transactions.filter((t) => t.userId === userId);
    return mine.slice(-limit).reverse().map((t) => ({ ...t }));
  }

  /** Credit confirmed external funds. Replays of the same `idemKey` are no-ops. */
  async fund(userId: string, amount: number, opts: { idemKey: string; refId?: string }): Promise<Transaction | undefined> {
    assertAmount(amount);
    return withLock(balanceKey(userId), () =>
      this.store.update((s) => {
        const now = this.clock();
        const claim = claimKey(s, `fund:${opts.idemKey}`, { now, fingerprint: `${userId}:${amount}` });
        if (claim.status === "duplicate") {
          log.debug("Duplicate deposit ignored", { userId, idemKey: opts.idemKey });
          return undefined;
        }
        if (claim.status === "conflict") {
          throw new InvariantViolation("IdempotencyConflict", "Deposit key reused with different details", {
            userId,
            idemKey: opts.idemKey,
          });
        }
        const at = toIso(now);
        const acc = ensureAccount(s, userId, at);
        acc.available += amount;
        const tx = journal(s, acc, "deposit", amount, at, { refId: opts.refId, idemKey: opts.idemKey });
        log.info("Funded", { userId, amount, availableAfter: acc.available });
        return tx;
      })
    );
  }

  /** Debit available funds for a withdrawal. Held stakes are never touched. */
  async defund(userId: string, amount: number, opts: { idemKey: string; refId?: string }): Promise<Transaction | undefined> {
    assertAmount(amount);
    return withLock(balanceKey(userId), () =>
      this.store.update((s) => {
        const acc = s.accounts[userId];
        if (!acc || acc.available < amount) {
          throw new GameError("InsufficientFunds", `Available balance is below ${amount}`);
        }
        const now = this.clock();
        const claim = claimKey(s, `defund:${opts.idemKey}`, { now, fingerprint: `${userId}:${amount}` });
        if (claim.status === "duplicate") return undefined;
        if (claim.status === "conflict") {
          throw new InvariantViolation("IdempotencyConflict", "Withdrawal key reused with different details", {
            userId,
            idemKey: opts.idemKey,
          });
        }
        const at = toIso(now);
        acc.available -= amount;
        const tx = journal(s, acc, "withdrawal", -amount, at, { refId: opts.refId, idemKey: opts.idemKey });
        log.info("Defunded", { userId, amount, availableAfter: acc.available });
        return tx;
      })
    );
  }

  async hold(userId: string, amount: number, refId?: string): Promise<Transaction> {
    assertAmount(amount);
    return withLock(balanceKey(userId), () =>
      this.store.update((s) => {
        const acc = s.accounts[userId];
        if (!acc || acc.available < amount) {
          throw new GameError("InsufficientFunds", `Available balance is below ${amount}`);
        }
        const at = toIso(this.clock());
        acc.available -= amount;
        acc.held += amount;
        return journal(s, acc, "hold", amount, at, { refId });
      })
    );
  }

  /** Holds `amount` from both accounts, or from neither. */
  async holdBoth(userA: string, userB: string, amount: number, refId: string): Promise<void> {
    assertAmount(amount);
    if (userA === userB) throw new RangeError("holdBoth needs two distinct accounts");
    await withLocks([balanceKey(userA), balanceKey(userB)], () =>
      this.store.update((s) => {
        const a = s.accounts[userA];
        const b = s.accounts[userB];
        if (!a || a.available < amount) {
          throw new GameError("InsufficientFunds", `${userA} cannot cover a stake of ${amount}`);
        }
        if (!b || b.available < amount) {
          throw new GameError("InsufficientFunds", `${userB} cannot cover a stake of ${amount}`);
        }
        const at = toIso(this.clock());
        for (const acc of [a, b]) {
          acc.available -= amount;
          acc.held += amount;
          journal(s, acc, "hold", amount, at, { refId });
        }
        log.info("Stakes held", { userA, userB, amount, refId });
      })
    );
  }

  async release(userId: string, amount: number, refId?: string): Promise<Transaction> {
    assertAmount(amount);
    return withLock(balanceKey(userId), () =>
      this.store.update((s) => {
        const acc = s.accounts[userId];
        if (!acc || acc.held < amount) {
          const violation = new InvariantViolation("InvalidHoldState", "Release exceeds held balance", {
            userId,
            amount,
            held: acc?.held ?? 0,
          });
          log.error("Release refused", { ...violation.ctx });
          throw violation;
        }
        const at = toIso(this.clock());
        acc.held -= amount;
        acc.available += amount;
        return journal(s, acc, "release", amount, at, { refId });
      })
    );
  }

  /**
   * Resolves a session's stakes in one step: both holds released, pot to the
   * winner or each stake back on a tie. Keyed by sessionId: an identical replay
   * returns the stored record, a different outcome is refused.
   */
  async settle(req: SettleRequest): Promise<SettlementRecord> {
    const { sessionId, outcome, playerA, playerB, amountA, amountB } = req;
    assertAmount(amountA);
    assertAmount(amountB);

    return withLocks([balanceKey(playerA), balanceKey(playerB)], () =>
      this.store.update((s) => {
        const prior = s.settlements[sessionId];
        if (prior) {
          if (prior.outcome === outcome) {
            log.info("Settlement replay ignored", { sessionId, outcome });
            return { ...prior };
          }
          const violation = new InvariantViolation("SettlementConflict", "Session already settled differently", {
            sessionId,
            settled: prior.outcome,
            requested: outcome,
          });
          log.error("Settlement conflict", { ...violation.ctx });
          throw violation;
        }

        const a = s.accounts[playerA];
        const b = s.accounts[playerB];
        if (!a || !b || a.held < amountA || b.held < amountB) {
          const violation = new InvariantViolation("InvalidHoldState", "Held balance does not cover the stakes", {
            sessionId,
            heldA: a?.held ?? 0,
            heldB: b?.held ?? 0,
            amountA,
            amountB,
          });
          log.error("Settlement refused", { ...violation.ctx });
          throw violation;
        }

        const at = toIso(this.clock());
        const refId = `session:${sessionId}`;
        a.held -= amountA;
        b.held -= amountB;

        const seat = winnerOf(outcome);
        let payoutTo: string | undefined;
        let amountTransferred = 0;
        if (seat === undefined) {
          a.available += amountA;
          b.available += amountB;
          journal(s, a, "refund", amountA, at, { refId });
          journal(s, b, "refund", amountB, at, { refId });
        } else {
          const winner = seat === "a" ? a : b;
          const loser = seat === "a" ? b : a;
          const lost = seat === "a" ? amountB : amountA;
          amountTransferred = amountA + amountB;
          winner.available += amountTransferred;
          payoutTo = winner.userId;
          journal(s, winner, "payout", amountTransferred, at, { refId });
          journal(s, loser, "loss", -lost, at, { refId });
        }

        const record: SettlementRecord = {
          sessionId,
          outcome,
          playerA,
          playerB,
          amountTransferred,
          payoutTo,
          createdAt: at,
        };
        s.settlements[sessionId] = record;
        log.info("Settled", { sessionId, outcome, payoutTo, amountTransferred });
        return { ...record };
      })
    );
  }
}

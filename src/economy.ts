import type { Ledger } from "./ledger.js";
import type { Transaction } from "./types.js";
import { GameError } from "./errors.js";
import { errMessage, logger } from "./logger.js";

export type ConfirmedDeposit = {
    id: string;
    userId: string;
    amount: number;
};

/**
 * The deposit pipeline as seen from here: it reports deposits that are confirmed
 * upstream. Address generation, webhooks and chain watching live elsewhere.
 */
export interface FundingSource {
    confirmedDeposits(userId: string): Promise<ConfirmedDeposit[]>;
}

const log = logger.child({ component: "economy" });

/**
 * Credits every confirmed deposit for the users, once per deposit id. An
 * unreachable source is logged and skipped; the holds that follow then decide
 * on the balance already confirmed.
 */
export async function syncFunding(ledger: Ledger, source: FundingSource | undefined, userIds: string[]): Promise<number> {
    if (!source) return 0;
    let credited = 0;
    for (const userId of userIds) {
        let deposits: ConfirmedDeposit[];
        try {
            deposits = await source.confirmedDeposits(userId);
        } catch (e) {
            log.warn("Funding source unavailable", { userId, error: errMessage(e) });
            continue;
        }
        for (const d of deposits) {
            if (d.userId !== userId || !Number.isInteger(d.amount) || d.amount <= 0) {
                log.warn("Ignoring malformed deposit", { userId, depositId: d.id });
                continue;
            }
            const tx = await ledger.fund(userId, d.amount, { idemKey: `deposit:${d.id}`, refId: d.id });
            if (tx) credited++;
        }
    }
    return credited;
}

export function getBalance(ledger: Ledger, userId: string): { available: number; held: number } {
    const acc = ledger.getAccount(userId);
    return { available: acc.available, held: acc.held };
}

export function canCover(ledger: Ledger, userId: string, stake: number): { ok: boolean; available: number; reason?: string } {
    const { available } = getBalance(ledger, userId);
    if (available < stake) {
        return { ok: false, available, reason: `You have ${available} available, the stake is ${stake}.` };
    }
    return { ok: true, available };
}

/** A manual balance change made by an operator, keyed by the request that asked for it. */
export type Adjustment = {
    operatorId: string;
    targetId: string;
    amount: number;
    requestId: string;
};

function requireOperator(operators: readonly string[], userId: string) {
    if (!operators.includes(userId)) throw new GameError("NotOperator", "Only operators can change balances");
}

/**
 * Credits funds received outside the bot. Returns undefined when the same
 * request was already applied.
 */
export async function creditByOperator(ledger: Ledger, operators: readonly string[], adj: Adjustment): Promise<Transaction | undefined> {
    requireOperator(operators, adj.operatorId);
    const tx = await ledger.fund(adj.targetId, adj.amount, { idemKey: `operator:${adj.requestId}`, refId: `operator:${adj.operatorId}` });
    if (tx) log.info("Operator credit", { operatorId: adj.operatorId, userId: adj.targetId, amount: adj.amount });
    return tx;
}

/** Debits available funds paid out outside the bot. Held stakes stay untouched. */
export async function debitByOperator(ledger: Ledger, operators: readonly string[], adj: Adjustment): Promise<Transaction | undefined> {
    requireOperator(operators, adj.operatorId);
    const tx = await ledger.defund(adj.targetId, adj.amount, { idemKey: `operator:${adj.requestId}`, refId: `operator:${adj.operatorId}` });
    if (tx) log.info("Operator debit", { operatorId: adj.operatorId, userId: adj.targetId, amount: adj.amount });
    return tx;
}

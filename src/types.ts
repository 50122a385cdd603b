import type { BoardState, GameKind, Seat } from "./games/index.js";

export type Account = {
    userId: string;
    available: number;
    held: number;
    createdAt: string;
    updatedAt: string;
};

export type TransactionType =
| "deposit"
| "withdrawal"
| "hold"
| "release"
| "payout"
| "loss"
| "refund";

export type Transaction = {
    txId: string;
    userId: string;
    type: TransactionType;
    amount: number;
    availableAfter: number;
    heldAfter: number;
    refId?: string;
    idemKey?: string;
    createdAt: string;
};

export type InvitationStatus = "pending" | "accepted" | "declined" | "expired";

export type Invitation = {
    id: string;
    challengerId: string;
    challengedId: string;
    kind: GameKind;
    stake: number;
    status: InvitationStatus;
    reason?: string;
    sessionId?: string;
    /** Transport routing hint, e.g. the Slack channel the challenge was posted in. */
    channel?: string;
    createdAt: string;
    expiresAt: string;
    resolvedAt?: string;
};

export type SessionStatus = "active" | "completed" | "forfeited" | "tied";

export type Outcome = "WinA" | "WinB" | "Tie" | "ForfeitA" | "ForfeitB";

export type Session = {
    id: string;
    invitationId: string;
    playerA: string;
    playerB: string;
    kind: GameKind;
    stake: number;
    seed: number;
    board: BoardState;
    turnOwner: Seat;
    status: SessionStatus;
    turnCount: number;
    maxTurns: number;
    channel?: string;
    createdAt: string;
    lastActivityAt: string;
    endedAt?: string;
    outcome?: Outcome;
};

export type MoveLogEntry = {
    seq: number;
    sessionId: string;
    actorId: string;
    seat: Seat;
    command: string;
    turn: number;
    at: string;
};

export type SettlementRecord = {
    sessionId: string;
    outcome: Outcome;
    playerA: string;
    playerB: string;
    amountTransferred: number;
    payoutTo?: string;
    createdAt: string;
};

export type IdempotencyEntry = {
    key: string;
    fingerprint?: string;
    createdAt: string;
    ttlMs?: number;
};

export type State = {
    version: number;
    accounts: Record<string, Account>;
    transactions: Transaction[];
    invitations: Record<string, Invitation>;
    sessions: Record<string, Session>;
    moves: MoveLogEntry[];
    settlements: Record<string, SettlementRecord>;
    idempotency: Record<string, IdempotencyEntry>;
    createdAt: string;
    updatedAt: string;
};

import { randomInt, randomUUID } from "crypto";
import type { FileStore } from "./storage/fileStore.js";
import type { Ledger } from "./ledger.js";
import type { Invitation, MoveLogEntry, Outcome, Session, SettlementRecord } from "./types.js";
import { GameError } from "./errors.js";
import { GameEvents } from "./events.js";
import {
    applyMove,
    initialBoard,
    maxTurnsFor,
    otherSeat,
    type BoardState,
    type MoveResult,
    type Seat,
    type Winner,
} from "./games/index.js";
import { logger } from "./logger.js";
import { withLock } from "./locking.js";
import { secondsBetween, systemClock, toIso, type Clock } from "./time.js";

export type MoveReport = {
    session: Session;
    result: MoveResult;
    settlement?: SettlementRecord;
};

export type SessionManagerOptions = {
    clock?: Clock;
    events?: GameEvents;
    /** Board seed source; defaults to a random 32-bit value. */
    seed?: () => number;
};

const log = logger.child({ component: "sessions" });

function sessionKey(id: string) {
    return `session:${id}`;
}

export function seatOf(session: Session, userId: string): Seat | undefined {
    if (userId === session.playerA) return "a";
    if (userId === session.playerB) return "b";
    return undefined;
}

export function playerAt(session: Session, seat: Seat): string {
    return seat === "a" ? session.playerA : session.playerB;
}

// callers never share the stored object; the board is nested
function snapshot(session: Session): Session {
    return structuredClone(session);
}

function outcomeFor(winner: Winner): Outcome {
    if (winner === "a") return "WinA";
    if (winner === "b") return "WinB";
    return "Tie";
}

/**
 * Owns every live game: creation from an accepted invitation, move routing,
 * forfeits and the single settlement at the end. All mutation of one session
 * happens under that session's lock.
 */
export class SessionManager {
    private readonly clock: Clock;
    private readonly events: GameEvents;
    private readonly seed: () => number;

    constructor(
        private readonly store: FileStore,
        private readonly ledger: Ledger,
        opts: SessionManagerOptions = {}
    ) {
        this.clock = opts.clock ?? systemClock;
        this.events = opts.events ?? new GameEvents();
        this.seed = opts.seed ?? (() => randomInt(0x100000000));
    }

    get(sessionId: string): Session | undefined {
        const s = this.store.get().sessions[sessionId];
        return s ? snapshot(s) : undefined;
    }

    listActive(): Session[] {
        return Object.values(this.store.get().sessions)
            .filter((s) => s.status === "active")
            .map(snapshot);
    }

    activeFor(userId: string): Session[] {
        return this.listActive().filter((s) => seatOf(s, userId) !== undefined);
    }

    movesOf(sessionId: string): MoveLogEntry[] {
        return this.store.get().moves.filter((m) => m.sessionId === sessionId).map((m) => ({ ...m }));
    }

    /** Called once the invitation's stakes are held. The challenger moves first. */
    async create(invitation: Invitation): Promise<Session> {
        const now = toIso(this.clock());
        const seed = this.seed();
        const session: Session = {
            id: randomUUID(),
            invitationId: invitation.id,
            playerA: invitation.challengerId,
            playerB: invitation.challengedId,
            kind: invitation.kind,
            stake: invitation.stake,
            seed,
            board: initialBoard(invitation.kind, seed),
            turnOwner: "a",
            status: "active",
            turnCount: 0,
            maxTurns: maxTurnsFor(invitation.kind),
            channel: invitation.channel,
            createdAt: now,
            lastActivityAt: now,
        };

        await this.store.update((s) => {
            s.sessions[session.id] = session;
        });

        log.info("Session started", {
            sessionId: session.id,
            kind: session.kind,
            playerA: session.playerA,
            playerB: session.playerB,
            stake: session.stake,
        });
        this.events.emit("session.started", snapshot(session));
        return snapshot(session);
    }

    async submitMove(sessionId: string, actorId: string, command: string): Promise<MoveReport> {
        return withLock(sessionKey(sessionId), async () => {
            const current = this.store.get().sessions[sessionId];
            if (!current) throw new GameError("SessionNotFound", "No such game");
            if (current.status !== "active") throw new GameError("SessionNotActive", "This game has already ended");
            const seat = seatOf(current, actorId);
            if (!seat) throw new GameError("UnknownActor", "You are not playing in this game");

            // throws NotYourTurn / IllegalMove before anything is written
            const { board, result } = applyMove(current.board, seat, command);
            const at = toIso(this.clock());

            const { session, move } = await this.store.update((s) => {
                const sess = s.sessions[sessionId];
                const move: MoveLogEntry = {
                    seq: s.moves.length + 1,
                    sessionId,
                    actorId,
                    seat,
                    command: command.trim().toLowerCase(),
                    turn: sess.turnCount + 1,
                    at,
                };
                s.moves.push(move);
                sess.board = board;
                sess.turnCount += 1;
                sess.lastActivityAt = at;
                if (result.status === "continue") {
                    sess.turnOwner = otherSeat(sess.turnOwner);
                } else {
                    sess.status = result.winner === "tie" ? "tied" : "completed";
                    sess.outcome = outcomeFor(result.winner);
                    sess.endedAt = at;
                }
                return { session: snapshot(sess), move: { ...move } };
            });

            log.debug("Move applied", { sessionId, actorId, command: move.command, turn: move.turn, status: session.status });
            this.events.emit("session.moved", session, move);

            if (result.status === "continue") return { session, result };
            const settlement = await this.settleSession(session);
            return { session: this.get(sessionId) ?? session, result, settlement };
        });
    }

    /** Ends an active game as a loss for `loserId`. Already-ended games are left alone. */
    async forfeit(sessionId: string, loserId: string): Promise<SettlementRecord | undefined> {
        return withLock(sessionKey(sessionId), () => this.forfeitLocked(sessionId, (s) => seatOf(s, loserId)));
    }

    /**
     * Forfeits the seat that owns the turn, but only if the session is still
     * active and still idle once the lock is held.
     */
    async forfeitIdle(sessionId: string, idleLimitSec: number): Promise<SettlementRecord | undefined> {
        return withLock(sessionKey(sessionId), async () => {
            const current = this.store.get().sessions[sessionId];
            if (!current || current.status !== "active") return undefined;
            if (secondsBetween(current.lastActivityAt, this.clock()) <= idleLimitSec) return undefined;
            return this.forfeitLocked(sessionId, (s) => s.turnOwner);
        });
    }

    private async forfeitLocked(
        sessionId: string,
        pickLoser: (s: Session) => Seat | undefined
    ): Promise<SettlementRecord | undefined> {
        const current = this.store.get().sessions[sessionId];
        if (!current) throw new GameError("SessionNotFound", "No such game");
        if (current.status !== "active") {
            log.warn("Forfeit on an ended session ignored", { sessionId, status: current.status });
            return undefined;
        }
        const loser = pickLoser(current);
        if (!loser) throw new GameError("UnknownActor", "That player is not in this game");

        const at = toIso(this.clock());
        const session = await this.store.update((s) => {
            const sess = s.sessions[sessionId];
            sess.status = "forfeited";
            sess.outcome = loser === "a" ? "ForfeitA" : "ForfeitB";
            sess.endedAt = at;
            return snapshot(sess);
        });

        log.info("Session forfeited", { sessionId, loser: playerAt(session, loser), idleSince: session.lastActivityAt });
        return this.settleSession(session);
    }

    private async settleSession(session: Session): Promise<SettlementRecord> {
        if (!session.outcome) throw new Error(`Session ${session.id} has no outcome to settle`);
        const settlement = await this.ledger.settle({
            sessionId: session.id,
            outcome: session.outcome,
            playerA: session.playerA,
            playerB: session.playerB,
            amountA: session.stake,
            amountB: session.stake,
        });
        this.events.emit("session.ended", snapshot(session), settlement);
        return settlement;
    }

    /** Rebuilds the board from the seed and the move log. */
    replay(sessionId: string): BoardState {
        const session = this.store.get().sessions[sessionId];
        if (!session) throw new GameError("SessionNotFound", "No such game");
        let board = initialBoard(session.kind, session.seed);
        for (const m of this.movesOf(sessionId)) {
            board = applyMove(board, m.seat, m.command).board;
        }
        return board;
    }

    /** Ended sessions with no settlement record yet. */
    listUnsettled(): Session[] {
        const { sessions, settlements } = this.store.get();
        return Object.values(sessions)
            .filter((s) => s.status !== "active" && !settlements[s.id])
            .map(snapshot);
    }

    /**
     * Settles an ended session whose settlement failed or was cut short by a
     * crash. Returns undefined when it is still active or already settled.
     */
    async settleEnded(sessionId: string): Promise<SettlementRecord | undefined> {
        return withLock(sessionKey(sessionId), async () => {
            const current = this.store.get().sessions[sessionId];
            if (!current || current.status === "active") return undefined;
            if (this.store.get().settlements[sessionId]) return undefined;
            const settlement = await this.settleSession(snapshot(current));
            log.warn("Settled an ended session late", { sessionId, outcome: current.outcome });
            return settlement;
        });
    }

    /** Startup pass over ended sessions that lost their settlement. Returns how many were settled. */
    async recover(): Promise<number> {
        let settled = 0;
        for (const s of this.listUnsettled()) {
            if (await this.settleEnded(s.id)) settled++;
        }
        return settled;
    }
}

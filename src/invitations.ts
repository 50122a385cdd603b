import { randomUUID } from "crypto";
import type { FileStore } from "./storage/fileStore.js";
import type { Ledger } from "./ledger.js";
import type { SessionManager } from "./sessions.js";
import type { Invitation, InvitationStatus, Session } from "./types.js";
import type { GameKind } from "./games/index.js";
import { CONFIG } from "./config.js";
import { GameError, isGameError } from "./errors.js";
import { GameEvents } from "./events.js";
import { syncFunding, type FundingSource } from "./economy.js";
import { errMessage, logger } from "./logger.js";
import { withLock } from "./locking.js";
import { isPast, systemClock, toIso, type Clock } from "./time.js";

export type InvitationBrokerOptions = {
    clock?: Clock;
    events?: GameEvents;
    funding?: FundingSource;
    minStake?: number;
    maxStake?: number;
    ttlSec?: number;
};

const log = logger.child({ component: "invitations" });

function inviteKey(id: string) {
    return `invitation:${id}`;
}

export class InvitationBroker {
    private readonly clock: Clock;
    private readonly events: GameEvents;
    private readonly funding?: FundingSource;
    private readonly minStake: number;
    private readonly maxStake: number;
    private readonly ttlSec: number;

    constructor(
        private readonly store: FileStore,
        private readonly ledger: Ledger,
        private readonly sessions: SessionManager,
        opts: InvitationBrokerOptions = {}
    ) {
        this.clock = opts.clock ?? systemClock;
        this.events = opts.events ?? new GameEvents();
        this.funding = opts.funding;
        this.minStake = opts.minStake ?? CONFIG.minStake;
        this.maxStake = opts.maxStake ?? CONFIG.maxStake;
        this.ttlSec = opts.ttlSec ?? CONFIG.inviteTtlSec;
    }

    get(id: string): Invitation | undefined {
        const inv = this.store.get().invitations[id];
        return inv ? { ...inv } : undefined;
    }

    /** Pending invitations addressed to the user that can still be accepted. */
    listPendingFor(userId: string): Invitation[] {
        const now = this.clock();
        return Object.values(this.store.get().invitations)
            .filter((i) => i.challengedId === userId && i.status === "pending" && !isPast(i.expiresAt, now))
            .map((i) => ({ ...i }));
    }

    listPending(): Invitation[] {
        return Object.values(this.store.get().invitations)
            .filter((i) => i.status === "pending")
            .map((i) => ({ ...i }));
    }

    async create(
        challengerId: string,
        challengedId: string,
        kind: GameKind,
        stake: number,
        meta: { channel?: string } = {}
    ): Promise<Invitation> {
        if (!Number.isInteger(stake) || stake < this.minStake || stake > this.maxStake) {
            throw new GameError("InvalidStake", `Stake must be a whole amount between ${this.minStake} and ${this.maxStake}`);
        }
        if (challengerId === challengedId) throw new GameError("SelfChallenge", "You cannot challenge yourself");

        return withLock(`pair:${challengerId}:${challengedId}`, async () => {
            const now = this.clock();
            const open = Object.values(this.store.get().invitations).find(
                (i) =>
                    i.challengerId === challengerId &&
                    i.challengedId === challengedId &&
                    i.status === "pending" &&
                    !isPast(i.expiresAt, now)
            );
            if (open) throw new GameError("DuplicatePending", "You already have an open challenge to this player");

            const rec: Invitation = {
                id: randomUUID(),
                challengerId,
                challengedId,
                kind,
                stake,
                status: "pending",
                channel: meta.channel,
                createdAt: toIso(now),
                expiresAt: toIso(now.plus({ seconds: this.ttlSec })),
            };
            await this.store.update((s) => {
                s.invitations[rec.id] = rec;
            });

            log.info("Invitation created", { id: rec.id, challengerId, challengedId, kind, stake });
            const snapshot = { ...rec };
            this.events.emit("invitation.created", snapshot);
            return snapshot;
        });
    }

    /**
     * Holds both stakes and opens the session. A failed hold declines the
     * invitation with reason InsufficientFunds; nothing else changes.
     */
    async accept(id: string, actorId: string): Promise<{ invitation: Invitation; session: Session }> {
        return withLock(inviteKey(id), async () => {
            const inv = this.requirePendingFor(id, actorId);
            if (isPast(inv.expiresAt, this.clock())) {
                await this.markExpired(id);
                throw new GameError("Expired", "This challenge has expired");
            }

            await syncFunding(this.ledger, this.funding, [inv.challengerId, inv.challengedId]);

            try {
                await this.ledger.holdBoth(inv.challengerId, inv.challengedId, inv.stake, `invitation:${id}`);
            } catch (e) {
                if (isGameError(e, "InsufficientFunds")) {
                    const declined = await this.resolve(id, "declined", "InsufficientFunds");
                    log.info("Invitation declined for funds", { id, error: e.message });
                    this.events.emit("invitation.declined", declined);
                }
                throw e;
            }

            let session: Session;
            try {
                session = await this.sessions.create(inv);
            } catch (e) {
                log.error("Session creation failed; releasing stakes", { id, error: errMessage(e) });
                await this.ledger.release(inv.challengerId, inv.stake, `invitation:${id}`);
                await this.ledger.release(inv.challengedId, inv.stake, `invitation:${id}`);
                throw e;
            }

            const invitation = await this.store.update((s) => {
                const r = s.invitations[id];
                r.status = "accepted";
                r.sessionId = session.id;
                r.resolvedAt = toIso(this.clock());
                return { ...r };
            });

            log.info("Invitation accepted", { id, sessionId: session.id });
            this.events.emit("invitation.accepted", invitation, session);
            return { invitation, session };
        });
    }

    /** Any pending invitation can be turned down, including one the sweep has not expired yet. */
    async decline(id: string, actorId: string): Promise<Invitation> {
        return withLock(inviteKey(id), async () => {
            this.requirePendingFor(id, actorId);
            const declined = await this.resolve(id, "declined");
            log.info("Invitation declined", { id, actorId });
            this.events.emit("invitation.declined", declined);
            return declined;
        });
    }

    /** Marks a pending invitation past its deadline as expired. No funds are held yet. */
    async expire(id: string): Promise<Invitation | undefined> {
        return withLock(inviteKey(id), async () => {
            const inv = this.store.get().invitations[id];
            if (!inv || inv.status !== "pending" || !isPast(inv.expiresAt, this.clock())) return undefined;
            return this.markExpired(id);
        });
    }

    private requirePendingFor(id: string, actorId: string): Invitation {
        const inv = this.store.get().invitations[id];
        if (!inv) throw new GameError("InvitationNotFound", "Challenge no longer exists");
        if (inv.challengedId !== actorId) throw new GameError("NotRecipient", "Only the challenged player can answer this");
        if (inv.status !== "pending") throw new GameError("AlreadyResolved", `Challenge is already ${inv.status}`);
        return { ...inv };
    }

    private async markExpired(id: string): Promise<Invitation> {
        const expired = await this.resolve(id, "expired");
        log.info("Invitation expired", { id });
        this.events.emit("invitation.expired", expired);
        return expired;
    }

    private async resolve(id: string, status: Exclude<InvitationStatus, "pending">, reason?: string): Promise<Invitation> {
        return this.store.update((s) => {
            const r = s.invitations[id];
            r.status = status;
            r.reason = reason;
            r.resolvedAt = toIso(this.clock());
            return { ...r };
        });
    }
}

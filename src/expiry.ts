import type { FileStore } from "./storage/fileStore.js";
import type { InvitationBroker } from "./invitations.js";
import type { SessionManager } from "./sessions.js";
import { CONFIG } from "./config.js";
import { pruneExpired } from "./idempotency.js";
import { errMessage, logger } from "./logger.js";
import { scheduleEvery, type ScheduledJob } from "./scheduler.js";
import { isPast, secondsBetween, systemClock, type Clock } from "./time.js";

export type ExpirySchedulerOptions = {
    clock?: Clock;
    idleTimeoutSec?: number;
    intervalMs?: number;
};

export type SweepReport = {
    expiredInvitations: number;
    forfeitedSessions: number;
    settledSessions: number;
    prunedKeys: number;
};

const log = logger.child({ component: "expiry" });

/**
 * Timed sweep: settles ended games still missing a settlement, expires stale
 * invitations and forfeits idle sessions. Each item is re-checked under its own
 * lock, so a sweep racing a move never forfeits a game that just became active
 * again. Anything that fails is retried next sweep.
 */
export class ExpiryScheduler {
    private readonly clock: Clock;
    private readonly idleTimeoutSec: number;
    private readonly intervalMs: number;
    private job?: ScheduledJob;

    constructor(
        private readonly store: FileStore,
        private readonly invitations: InvitationBroker,
        private readonly sessions: SessionManager,
        opts: ExpirySchedulerOptions = {}
    ) {
        this.clock = opts.clock ?? systemClock;
        this.idleTimeoutSec = opts.idleTimeoutSec ?? CONFIG.idleTimeoutSec;
        this.intervalMs = opts.intervalMs ?? CONFIG.sweepIntervalMs;
    }

    async sweep(): Promise<SweepReport> {
        const now = this.clock();
        const report: SweepReport = { expiredInvitations: 0, forfeitedSessions: 0, settledSessions: 0, prunedKeys: 0 };

        // left behind by a settle that failed in an earlier sweep or move
        for (const s of this.sessions.listUnsettled()) {
            try {
                if (await this.sessions.settleEnded(s.id)) report.settledSessions++;
            } catch (e) {
                log.error("Late settlement failed", { sessionId: s.id, error: errMessage(e) });
            }
        }

        for (const inv of this.invitations.listPending()) {
            if (!isPast(inv.expiresAt, now)) continue;
            try {
                if (await this.invitations.expire(inv.id)) report.expiredInvitations++;
            } catch (e) {
                log.error("Invitation expiry failed", { id: inv.id, error: errMessage(e) });
            }
        }

        for (const s of this.sessions.listActive()) {
            if (secondsBetween(s.lastActivityAt, now) <= this.idleTimeoutSec) continue;
            try {
                if (await this.sessions.forfeitIdle(s.id, this.idleTimeoutSec)) report.forfeitedSessions++;
            } catch (e) {
                log.error("Idle forfeit failed", { sessionId: s.id, error: errMessage(e) });
            }
        }

        report.prunedKeys = pruneExpired(this.store.get(), now);
        if (report.prunedKeys > 0) await this.store.save();

        if (report.expiredInvitations || report.forfeitedSessions || report.settledSessions) log.info("Sweep done", report);
        return report;
    }

    start() {
        if (this.job) return;
        this.job = scheduleEvery("expiry-sweep", this.intervalMs, async () => {
            await this.sweep();
        });
    }

    stop() {
        this.job?.stop();
        this.job = undefined;
    }
}

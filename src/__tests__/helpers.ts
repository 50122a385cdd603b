import { DateTime } from "luxon";
import { FileStore } from "../storage/fileStore.js";
import { GameEvents } from "../events.js";
import { Ledger } from "../ledger.js";
import { SessionManager } from "../sessions.js";
import { InvitationBroker } from "../invitations.js";
import { ExpiryScheduler } from "../expiry.js";
import type { FundingSource } from "../economy.js";
import type { GameKind } from "../games/index.js";
import type { Clock } from "../time.js";

export const START = "2026-03-01T12:00:00.000Z";

export function manualClock(startIso = START) {
    let now = DateTime.fromISO(startIso, { zone: "utc" });
    const clock: Clock = () => now;
    return {
        clock,
        advance(seconds: number) {
            now = now.plus({ seconds });
        },
    };
}

export async function makeArcade(opts: { seed?: number; funding?: FundingSource } = {}) {
    const store = new FileStore();
    await store.init();
    const { clock, advance } = manualClock();
    const events = new GameEvents();
    const ledger = new Ledger(store, clock);
    const sessions = new SessionManager(store, ledger, { clock, events, seed: () => opts.seed ?? 7 });
    const invitations = new InvitationBroker(store, ledger, sessions, {
        clock,
        events,
        funding: opts.funding,
        minStake: 1,
        maxStake: 1000,
        ttlSec: 60,
    });
    const expiry = new ExpiryScheduler(store, invitations, sessions, { clock, idleTimeoutSec: 300, intervalMs: 5000 });
    return { store, clock, advance, events, ledger, sessions, invitations, expiry };
}

export type Arcade = Awaited<ReturnType<typeof makeArcade>>;

/** Funds both players and runs a challenge through to an active session. */
export async function startDuel(arcade: Arcade, kind: GameKind, stake: number, funds = 100) {
    await arcade.ledger.fund("UA", funds, { idemKey: "seed-UA" });
    await arcade.ledger.fund("UB", funds, { idemKey: "seed-UB" });
    const inv = await arcade.invitations.create("UA", "UB", kind, stake);
    const { session } = await arcade.invitations.accept(inv.id, "UB");
    return session;
}

export function totalFunds(store: FileStore): number {
    return Object.values(store.get().accounts).reduce((sum, a) => sum + a.available + a.held, 0);
}

/** Lets queued event listeners run. */
export function flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

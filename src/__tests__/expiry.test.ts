import { afterEach, describe, expect, it, vi } from "vitest";
import { makeArcade, startDuel } from "./helpers.js";

describe("ExpiryScheduler", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("forfeits the player who let the clock run out", async () => {
        const arcade = await makeArcade();
        const session = await startDuel(arcade, "survival", 20);
        await arcade.sessions.submitMove(session.id, "UA", "tick");

        arcade.advance(300);
        expect(await arcade.expiry.sweep()).toMatchObject({ forfeitedSessions: 0 });

        arcade.advance(1);
        const report = await arcade.expiry.sweep();

        expect(report.forfeitedSessions).toBe(1);
        expect(arcade.sessions.get(session.id)).toMatchObject({ status: "forfeited", outcome: "ForfeitB" });
        expect(arcade.ledger.getAccount("UA")).toMatchObject({ available: 120, held: 0 });
        expect(arcade.ledger.getAccount("UB")).toMatchObject({ available: 80, held: 0 });
    });

    it("retries a settlement that failed on an earlier sweep", async () => {
        const arcade = await makeArcade();
        const session = await startDuel(arcade, "survival", 20);
        vi.spyOn(arcade.ledger, "settle").mockRejectedValueOnce(new Error("disk full"));
        arcade.advance(301);

        expect(await arcade.expiry.sweep()).toMatchObject({ forfeitedSessions: 0, settledSessions: 0 });
        expect(arcade.sessions.get(session.id)).toMatchObject({ status: "forfeited", outcome: "ForfeitA" });
        expect(arcade.store.get().settlements[session.id]).toBeUndefined();
        expect(arcade.ledger.getAccount("UA")).toMatchObject({ available: 80, held: 20 });

        expect(await arcade.expiry.sweep()).toMatchObject({ forfeitedSessions: 0, settledSessions: 1 });
        expect(arcade.store.get().settlements[session.id]).toMatchObject({ outcome: "ForfeitA", payoutTo: "UB" });
        expect(arcade.ledger.getAccount("UA")).toMatchObject({ available: 80, held: 0 });
        expect(arcade.ledger.getAccount("UB")).toMatchObject({ available: 120, held: 0 });

        expect((await arcade.expiry.sweep()).settledSessions).toBe(0);
    });

    it("counts idle time from the last move", async () => {
        const arcade = await makeArcade();
        const session = await startDuel(arcade, "paddle_ball", 5);
        arcade.advance(200);
        await arcade.sessions.submitMove(session.id, "UA", "tick");
        arcade.advance(200);

        expect((await arcade.expiry.sweep()).forfeitedSessions).toBe(0);
        expect(arcade.sessions.get(session.id)?.status).toBe("active");
    });

    it("expires invitations past their deadline", async () => {
        const arcade = await makeArcade();
        const stale = await arcade.invitations.create("UA", "UB", "puzzle", 5);
        arcade.advance(30);
        const fresh = await arcade.invitations.create("UC", "UB", "puzzle", 5);
        arcade.advance(31);

        const report = await arcade.expiry.sweep();

        expect(report.expiredInvitations).toBe(1);
        expect(arcade.invitations.get(stale.id)?.status).toBe("expired");
        expect(arcade.invitations.get(fresh.id)?.status).toBe("pending");
    });

    it("prunes lapsed idempotency keys", async () => {
        const arcade = await makeArcade();
        await arcade.store.update((s) => {
            s.idempotency["slack:old"] = { key: "slack:old", createdAt: "2026-03-01T11:00:00.000Z", ttlMs: 60_000 };
            s.idempotency["fund:kept"] = { key: "fund:kept", createdAt: "2026-03-01T11:00:00.000Z" };
        });

        expect((await arcade.expiry.sweep()).prunedKeys).toBe(1);
        expect(Object.keys(arcade.store.get().idempotency)).toEqual(["fund:kept"]);
    });

    it("sweeps on an interval until stopped", async () => {
        vi.useFakeTimers();
        const arcade = await makeArcade();
        const sweep = vi.spyOn(arcade.expiry, "sweep");

        arcade.expiry.start();
        await vi.advanceTimersByTimeAsync(5000);
        expect(sweep).toHaveBeenCalledTimes(1);
        await vi.advanceTimersByTimeAsync(5000);
        expect(sweep).toHaveBeenCalledTimes(2);

        arcade.expiry.stop();
        await vi.advanceTimersByTimeAsync(20_000);
        expect(sweep).toHaveBeenCalledTimes(2);
    });
});

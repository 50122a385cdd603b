import { describe, expect, it, vi } from "vitest";
import { GameEvents } from "../events.js";
import { initialBoard } from "../games/index.js";
import { flush } from "./helpers.js";

describe("GameEvents", () => {
    it("delivers events after the emitter returns and isolates failing listeners", async () => {
        const events = new GameEvents();
        const seen: string[] = [];
        events.on("invitation.expired", () => {
            throw new Error("listener broke");
        });
        const off = events.on("invitation.expired", (inv) => {
            seen.push(inv.id);
        });
        const inv = {
            id: "i1",
            challengerId: "UA",
            challengedId: "UB",
            kind: "puzzle" as const,
            stake: 1,
            status: "expired" as const,
            createdAt: "2026-03-01T12:00:00.000Z",
            expiresAt: "2026-03-01T12:01:00.000Z",
        };

        events.emit("invitation.expired", inv);
        expect(seen).toEqual([]);
        await flush();
        expect(seen).toEqual(["i1"]);

        off();
        events.emit("invitation.expired", inv);
        await flush();
        expect(seen).toEqual(["i1"]);
    });

    it("passes every argument through", async () => {
        const events = new GameEvents();
        const listener = vi.fn();
        events.on("session.started", listener);
        const session = {
            id: "s1",
            invitationId: "i1",
            playerA: "UA",
            playerB: "UB",
            kind: "survival" as const,
            stake: 5,
            seed: 1,
            board: initialBoard("survival", 1),
            turnOwner: "a" as const,
            status: "active" as const,
            turnCount: 0,
            maxTurns: 200,
            createdAt: "2026-03-01T12:00:00.000Z",
            lastActivityAt: "2026-03-01T12:00:00.000Z",
        };
        events.emit("session.started", session);
        await flush();
        expect(listener).toHaveBeenCalledWith(session);
    });
});

import { describe, expect, it } from "vitest";
import {
    describeError,
    parseAdjustArgs,
    parseChallengeArgs,
    parseIdArg,
    parseMoveArgs,
    parseUserMention,
    pickSession,
    CHALLENGE_USAGE,
} from "../commands.js";
import { GameError, InvariantViolation } from "../errors.js";
import { challengeText, gamesText, helpText, outcomeText, statusText, transactionsText } from "../render.js";
import { makeArcade, startDuel } from "./helpers.js";

describe("command parsing", () => {
    it("reads a challenge", () => {
        expect(parseChallengeArgs("<@U123ABC|sam> snake 25")).toEqual({ ok: true, opponentId: "U123ABC", kind: "survival", stake: 25 });
        expect(parseChallengeArgs("<@U9> pong 3")).toMatchObject({ ok: true, kind: "paddle_ball" });
        expect(parseChallengeArgs("<@U9> blocks 3")).toMatchObject({ ok: true, kind: "puzzle" });
    });

    it("explains a malformed challenge", () => {
        expect(parseChallengeArgs("")).toEqual({ ok: false, error: CHALLENGE_USAGE });
        expect(parseChallengeArgs("bob puzzle 5")).toEqual({ ok: false, error: "First argument must be an @mention" });
        expect(parseChallengeArgs("<@U9> chess 5")).toEqual({ ok: false, error: "Game must be one of: puzzle, survival, paddle" });
        expect(parseChallengeArgs("<@U9> puzzle 1.5")).toEqual({ ok: false, error: "Stake must be a positive whole number" });
    });

    it("reads moves and ids", () => {
        expect(parseMoveArgs(" LEFT ")).toEqual({ ok: true, command: "left", sessionId: undefined });
        expect(parseMoveArgs("drop abc123")).toEqual({ ok: true, command: "drop", sessionId: "abc123" });
        expect(parseMoveArgs("").ok).toBe(false);
        expect(parseIdArg("inv-1", "usage")).toEqual({ ok: true, id: "inv-1" });
        expect(parseIdArg("a b", "usage")).toEqual({ ok: false, error: "usage" });
        expect(parseUserMention("hi <@W42>")).toBe("W42");
    });

    it("reads operator adjustments", () => {
        expect(parseAdjustArgs("<@U1> 50", "usage")).toEqual({ ok: true, userId: "U1", amount: 50 });
        expect(parseAdjustArgs("<@U1>", "usage")).toEqual({ ok: false, error: "usage" });
        expect(parseAdjustArgs("bob 5", "usage")).toEqual({ ok: false, error: "First argument must be an @mention" });
        expect(parseAdjustArgs("<@U1> -3", "usage")).toEqual({ ok: false, error: "Amount must be a positive whole number" });
    });

    it("maps errors to reply text", () => {
        expect(describeError(new GameError("NotYourTurn"))).toBe("Hold on, it's your opponent's turn.");
        expect(describeError(new GameError("SelfChallenge", "You cannot challenge yourself"))).toBe("You cannot challenge yourself");
        expect(describeError(new InvariantViolation("SettlementConflict", "x"))).toMatch(/^Something went wrong on our side/);
        expect(describeError(new Error("disk full"))).toBe("Something went wrong. Please try again.");
    });
});

describe("session targeting and rendering", () => {
    it("picks the only game, or the named one", async () => {
        const arcade = await makeArcade();
        const session = await startDuel(arcade, "survival", 10);
        const active = arcade.sessions.activeFor("UA");

        expect(pickSession(active)).toEqual({ ok: true, session });
        expect(pickSession(active, session.id.slice(0, 8))).toEqual({ ok: true, session });
        expect(pickSession(active, "zzz").ok).toBe(false);
        expect(pickSession([])).toEqual({ ok: false, error: "You have no active game." });
    });

    it("describes challenges and results", async () => {
        const arcade = await makeArcade();
        const inv = await arcade.invitations.create("UA", "UB", "paddle_ball", 12);
        expect(challengeText(inv)).toBe("<@UA> challenged <@UB> to *Paddle Ball* for *12*.");
        expect(statusText([], [])).toBe("No active games or pending challenges.");

        await arcade.ledger.fund("UA", 50, { idemKey: "a" });
        await arcade.ledger.fund("UB", 50, { idemKey: "b" });
        const { session } = await arcade.invitations.accept(inv.id, "UB");
        const settlement = await arcade.sessions.forfeit(session.id, "UB");
        const ended = arcade.sessions.get(session.id);
        if (!settlement || !ended) throw new Error("expected a settled session");

        expect(outcomeText(ended, settlement)).toBe("<@UB> ran out of time. <@UA> wins *24*.");
    });

    it("lists the ledger journal", async () => {
        const arcade = await makeArcade();
        expect(transactionsText(arcade.ledger.history("UA"))).toBe("No transactions yet.");

        const session = await startDuel(arcade, "survival", 10);
        await arcade.sessions.forfeit(session.id, "UA");

        expect(transactionsText(arcade.ledger.history("UA")).split("\n")).toEqual([
            "2026-03-01 12:00 Stake lost -10 (available 90, held 0)",
            "2026-03-01 12:00 Stake held +10 (available 90, held 10)",
            "2026-03-01 12:00 Deposit +100 (available 100, held 0)",
        ]);
    });

    it("lists games and commands", () => {
        const games = gamesText(1, 1000).split("\n");
        expect(games).toHaveLength(5);
        expect(games[3]).toBe(
            "*Paddle Ball* (`paddle`): Return the ball with your paddle. First to 11 wins. Moves: up, down, tick. Ends after 500 moves at most."
        );
        expect(games[4]).toBe("Stakes from 1 to 1000. Start one with `/challenge @user <game> <stake>`.");

        expect(helpText().split("\n")).toHaveLength(7);
        expect(helpText()).not.toContain("/fund");
        expect(helpText(true).split("\n").at(-1)).toBe("`/withdraw @user <amount>` debit funds paid out");
    });
});

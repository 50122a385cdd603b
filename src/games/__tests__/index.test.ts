import { describe, expect, it } from "vitest";
import { applyMove, commandsFor, initialBoard, maxTurnsFor, renderBoard, winnerOf } from "../index.js";
import { isGameError } from "../../errors.js";

describe("board dispatch", () => {
    it("normalises command case and whitespace", () => {
        const board = initialBoard("survival", 3);
        const { board: next, result } = applyMove(board, "a", "  UP ");
        expect(result).toEqual({ status: "continue" });
        expect(next.kind === "survival" && next.snakes.a.direction).toBe("up");
    });

    it("rejects commands from another game", () => {
        const board = initialBoard("paddle_ball", 3);
        let caught: unknown;
        try {
            applyMove(board, "a", "rotate");
        } catch (e) {
            caught = e;
        }
        expect(isGameError(caught, "IllegalMove")).toBe(true);
    });

    it("exposes per-game limits and commands", () => {
        expect(maxTurnsFor("puzzle")).toBe(400);
        expect(maxTurnsFor("survival")).toBe(200);
        expect(maxTurnsFor("paddle_ball")).toBe(500);
        expect(commandsFor("paddle_ball")).toEqual(["up", "down", "tick"]);
    });

    it("builds the same board from the same seed", () => {
        expect(initialBoard("puzzle", 21)).toEqual(initialBoard("puzzle", 21));
        expect(renderBoard(initialBoard("survival", 21))).toBe(renderBoard(initialBoard("survival", 21)));
        expect(winnerOf(initialBoard("puzzle", 21))).toBeUndefined();
    });
});

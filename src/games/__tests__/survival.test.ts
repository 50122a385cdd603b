import { describe, expect, it } from "vitest";
import { survivalEngine, SURVIVAL_SIZE, type Snake, type SurvivalState } from "../survival.js";
import { isGameError } from "../../errors.js";

function snake(body: Array<[number, number]>, direction: Snake["direction"], score = 0): Snake {
    return { body: body.map(([r, c]) => ({ r, c })), direction, score, alive: true };
}

describe("survival engine", () => {
    it("starts the snakes facing each other with food on the board", () => {
        const s = survivalEngine.initialize({ seed: 1 });
        expect(s.snakes.a.body[0]).toEqual({ r: 7, c: 2 });
        expect(s.snakes.b.body[0]).toEqual({ r: 7, c: SURVIVAL_SIZE - 3 });
        expect(s.snakes.a.direction).toBe("right");
        expect(s.snakes.b.direction).toBe("left");
        expect(s.food).toHaveLength(2);
    });

    it("only advances once both players have moved", () => {
        const s0 = survivalEngine.initialize({ seed: 1 });
        const s1 = survivalEngine.applyMove(s0, "a", "tick").state;
        expect(s1.snakes.a.body[0]).toEqual({ r: 7, c: 2 });

        const s2 = survivalEngine.applyMove(s1, "b", "tick").state;
        expect(s2.snakes.a.body[0]).toEqual({ r: 7, c: 3 });
        expect(s2.snakes.b.body[0]).toEqual({ r: 7, c: 11 });
        expect(s2.moves).toBe(2);
    });

    it("rejects reversing into its own neck", () => {
        const s0 = survivalEngine.initialize({ seed: 1 });
        let caught: unknown;
        try {
            survivalEngine.applyMove(s0, "a", "left");
        } catch (e) {
            caught = e;
        }
        expect(isGameError(caught, "IllegalMove")).toBe(true);
    });

    it("refuses b before a has moved", () => {
        const s0 = survivalEngine.initialize({ seed: 1 });
        expect(() => survivalEngine.applyMove(s0, "b", "tick")).toThrowError(/not your turn/);
    });

    it("ends the game when a snake leaves the grid", () => {
        let state = survivalEngine.initialize({ seed: 1 });
        while (!survivalEngine.isTerminal(state)) {
            state = survivalEngine.applyMove(state, "a", "up").state;
            state = survivalEngine.applyMove(state, "b", "tick").state;
        }
        expect(state.moves).toBe(16);
        expect(state.snakes.a.alive).toBe(false);
        expect(state.snakes.b.alive).toBe(true);
        expect(survivalEngine.winner(state)).toBe("b");
    });

    it("kills both snakes on a head-on collision", () => {
        const start: SurvivalState = {
            ...survivalEngine.initialize({ seed: 1 }),
            snakes: {
                a: snake([[7, 6], [7, 5], [7, 4]], "right"),
                b: snake([[7, 8], [7, 9], [7, 10]], "left"),
            },
            food: [],
        };
        const s1 = survivalEngine.applyMove(start, "a", "tick").state;
        const { state, result } = survivalEngine.applyMove(s1, "b", "tick");
        expect(state.snakes.a.alive).toBe(false);
        expect(state.snakes.b.alive).toBe(false);
        expect(result).toEqual({ status: "terminal", winner: "tie" });
    });

    it("grows and scores on food", () => {
        const start: SurvivalState = {
            ...survivalEngine.initialize({ seed: 1 }),
            food: [{ r: 7, c: 3 }],
        };
        const s1 = survivalEngine.applyMove(start, "a", "tick").state;
        const s2 = survivalEngine.applyMove(s1, "b", "tick").state;
        expect(s2.snakes.a.score).toBe(10);
        expect(s2.snakes.a.body).toHaveLength(4);
        expect(s2.food).toHaveLength(1);
        expect(s2.food[0]).not.toEqual({ r: 7, c: 3 });
    });

    it("compares scores at the move cap", () => {
        const base = survivalEngine.initialize({ seed: 1 });
        const start: SurvivalState = {
            ...base,
            moves: 198,
            food: [],
            snakes: { a: { ...base.snakes.a, score: 20 }, b: base.snakes.b },
        };
        const s1 = survivalEngine.applyMove(start, "a", "tick").state;
        expect(s1.winner).toBeUndefined();
        const { result } = survivalEngine.applyMove(s1, "b", "tick");
        expect(result).toEqual({ status: "terminal", winner: "a" });
    });

    it("ties at the cap on equal scores", () => {
        const start: SurvivalState = { ...survivalEngine.initialize({ seed: 1 }), moves: 198, food: [] };
        const s1 = survivalEngine.applyMove(start, "a", "tick").state;
        const { result } = survivalEngine.applyMove(s1, "b", "tick");
        expect(result).toEqual({ status: "terminal", winner: "tie" });
    });
});

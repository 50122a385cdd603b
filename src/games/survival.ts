import { GameError } from "../errors.js";
import { nextInt } from "./random.js";
import {
    assertCanMove,
    byScore,
    otherSeat,
    resultOf,
    type GameEngine,
    type Seat,
    type TurnState,
    type Winner,
} from "./types.js";

export const SURVIVAL_SIZE = 15;
const MAX_TURNS = 200;
const FOOD_POINTS = 10;
const FOOD_ON_BOARD = 2;
const FOOD_ATTEMPTS = 50;

export type Direction = "up" | "down" | "left" | "right";
export type SurvivalCommand = Direction | "tick";

export type Point = { r: number; c: number };

export type Snake = {
    /** Head first. */
    body: Point[];
    direction: Direction;
    score: number;
    alive: boolean;
};

export type SurvivalState = TurnState & {
    kind: "survival";
    rng: number;
    snakes: Record<Seat, Snake>;
    food: Point[];
};

const OPPOSITE: Record<Direction, Direction> = { up: "down", down: "up", left: "right", right: "left" };

const STEP: Record<Direction, Point> = {
    up: { r: -1, c: 0 },
    down: { r: 1, c: 0 },
    left: { r: 0, c: -1 },
    right: { r: 0, c: 1 },
};

function same(p: Point, q: Point): boolean {
    return p.r === q.r && p.c === q.c;
}

function inBounds(p: Point): boolean {
    return p.r >= 0 && p.r < SURVIVAL_SIZE && p.c >= 0 && p.c < SURVIVAL_SIZE;
}

function occupied(p: Point, snakes: Record<Seat, Snake>, food: readonly Point[]): boolean {
    return snakes.a.body.some((q) => same(p, q)) || snakes.b.body.some((q) => same(p, q)) || food.some((q) => same(p, q));
}

function spawnFood(rng: number, snakes: Record<Seat, Snake>, food: Point[]): { rng: number; food: Point[] } {
    let state = rng;
    for (let i = 0; i < FOOD_ATTEMPTS; i++) {
        const r = nextInt(state, SURVIVAL_SIZE);
        const c = nextInt(r.state, SURVIVAL_SIZE);
        state = c.state;
        const p = { r: r.value, c: c.value };
        if (!occupied(p, snakes, food)) return { rng: state, food: [...food, p] };
    }
    return { rng: state, food };
}

function headOf(snake: Snake): Point {
    return snake.body[0];
}

/** Both snakes step together; collisions are judged against the bodies before the step. */
function advance(state: SurvivalState): SurvivalState {
    const { snakes } = state;
    const heads: Partial<Record<Seat, Point>> = {};
    for (const seat of ["a", "b"] as const) {
        const s = snakes[seat];
        if (!s.alive) continue;
        const step = STEP[s.direction];
        heads[seat] = { r: headOf(s).r + step.r, c: headOf(s).c + step.c };
    }

    const crashed = (seat: Seat): boolean => {
        const head = heads[seat];
        if (!head) return false;
        if (!inBounds(head)) return true;
        if (snakes.a.body.some((q) => same(q, head)) || snakes.b.body.some((q) => same(q, head))) return true;
        const other = heads[otherSeat(seat)];
        return other !== undefined && same(other, head);
    };
    const dead = { a: crashed("a"), b: crashed("b") };

    let food = state.food;
    let rng = state.rng;
    const next: Record<Seat, Snake> = { a: snakes.a, b: snakes.b };
    const eaten: Seat[] = [];

    for (const seat of ["a", "b"] as const) {
        const head = heads[seat];
        if (!head) continue;
        const s = snakes[seat];
        if (dead[seat]) {
            next[seat] = { ...s, alive: false };
            continue;
        }
        const ate = food.some((f) => same(f, head));
        if (ate) {
            food = food.filter((f) => !same(f, head));
            eaten.push(seat);
        }
        next[seat] = {
            ...s,
            body: ate ? [head, ...s.body] : [head, ...s.body.slice(0, -1)],
            score: s.score + (ate ? FOOD_POINTS : 0),
        };
    }

    for (let i = 0; i < eaten.length; i++) {
        const spawned = spawnFood(rng, next, food);
        rng = spawned.rng;
        food = spawned.food;
    }

    return { ...state, snakes: next, food, rng };
}

function decide(state: SurvivalState): Winner | undefined {
    const { a, b } = state.snakes;
    if (!a.alive && !b.alive) return byScore(a.score, b.score);
    if (!a.alive) return "b";
    if (!b.alive) return "a";
    if (state.moves >= MAX_TURNS) return byScore(a.score, b.score);
    return undefined;
}

function startSnake(row: number, cols: number[], direction: Direction): Snake {
    return { body: cols.map((c) => ({ r: row, c })), direction, score: 0, alive: true };
}

export const survivalEngine: GameEngine<SurvivalState, SurvivalCommand> = {
    kind: "survival",
    commands: ["up", "down", "left", "right", "tick"],
    maxTurns: MAX_TURNS,

    initialize({ seed }) {
        const mid = Math.floor(SURVIVAL_SIZE / 2);
        const snakes: Record<Seat, Snake> = {
            a: startSnake(mid, [2, 1, 0], "right"),
            b: startSnake(mid, [SURVIVAL_SIZE - 3, SURVIVAL_SIZE - 2, SURVIVAL_SIZE - 1], "left"),
        };
        let rng = seed >>> 0;
        let food: Point[] = [];
        for (let i = 0; i < FOOD_ON_BOARD; i++) {
            const spawned = spawnFood(rng, snakes, food);
            rng = spawned.rng;
            food = spawned.food;
        }
        return { kind: "survival", turn: "a", moves: 0, rng, snakes, food };
    },

    applyMove(state, actor, command) {
        assertCanMove(state, actor);
        const snake = state.snakes[actor];
        let direction = snake.direction;
        if (command !== "tick") {
            if (command === OPPOSITE[snake.direction]) {
                throw new GameError("IllegalMove", `Cannot reverse from ${snake.direction} to ${command}`);
            }
            direction = command;
        }

        let next: SurvivalState = {
            ...state,
            snakes: { ...state.snakes, [actor]: { ...snake, direction } },
            moves: state.moves + 1,
            turn: otherSeat(actor),
        };
        // b closes the round
        if (actor === "b") next = advance(next);
        next = { ...next, winner: decide(next) };
        return { state: next, result: resultOf(next) };
    },

    isTerminal(state) {
        return state.winner !== undefined;
    },

    winner(state) {
        return state.winner;
    },

    render(state) {
        const grid = Array.from({ length: SURVIVAL_SIZE }, () => Array.from({ length: SURVIVAL_SIZE }, () => "."));
        for (const f of state.food) grid[f.r][f.c] = "*";
        for (const seat of ["a", "b"] as const) {
            const s = state.snakes[seat];
            if (!s.alive) continue;
            s.body.forEach((p, i) => {
                if (inBounds(p)) grid[p.r][p.c] = i === 0 ? seat.toUpperCase() : seat;
            });
        }
        const header = `A ${state.snakes.a.score} pts${state.snakes.a.alive ? "" : " (out)"}   B ${state.snakes.b.score} pts${state.snakes.b.alive ? "" : " (out)"}   turn ${state.moves}/${MAX_TURNS}`;
        return [header, ...grid.map((row) => row.join(""))].join("\n");
    },
};

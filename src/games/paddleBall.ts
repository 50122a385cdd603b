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

export const FIELD_WIDTH = 20;
export const FIELD_HEIGHT = 10;
export const PADDLE_HEIGHT = 3;
export const WINNING_SCORE = 11;
const MAX_TURNS = 500;

export type PaddleCommand = "up" | "down" | "tick";

export type Ball = { x: number; y: number; vx: number; vy: number };

export type PaddleState = TurnState & {
    kind: "paddle_ball";
    rng: number;
    /** Top row of each paddle. a sits at x = 1, b at x = FIELD_WIDTH - 2. */
    paddles: Record<Seat, number>;
    ball: Ball;
    scores: Record<Seat, number>;
    rally: number;
};

function serve(rng: number): { rng: number; ball: Ball } {
    const dx = nextInt(rng, 2);
    const dy = nextInt(dx.state, 3);
    return {
        rng: dy.state,
        ball: {
            x: Math.floor(FIELD_WIDTH / 2),
            y: Math.floor(FIELD_HEIGHT / 2),
            vx: dx.value === 0 ? -1 : 1,
            vy: dy.value - 1,
        },
    };
}

function covers(paddleTop: number, y: number): boolean {
    return y >= paddleTop && y < paddleTop + PADDLE_HEIGHT;
}

/** One ball step: wall bounce, paddle return, or a point for the far side. */
export function stepBall(state: PaddleState): PaddleState {
    const { ball, paddles } = state;
    let nx = ball.x + ball.vx;
    let ny = ball.y + ball.vy;
    let vy = ball.vy;

    if (ny <= 0) {
        ny = 0;
        vy = Math.abs(vy);
    } else if (ny >= FIELD_HEIGHT - 1) {
        ny = FIELD_HEIGHT - 1;
        vy = -Math.abs(vy);
    }

    if (nx <= 1 && ball.vx < 0 && covers(paddles.a, ny)) {
        const center = paddles.a + Math.floor(PADDLE_HEIGHT / 2);
        return { ...state, ball: { x: 2, y: ny, vx: 1, vy: ny - center }, rally: state.rally + 1 };
    }
    if (nx >= FIELD_WIDTH - 2 && ball.vx > 0 && covers(paddles.b, ny)) {
        const center = paddles.b + Math.floor(PADDLE_HEIGHT / 2);
        return { ...state, ball: { x: FIELD_WIDTH - 3, y: ny, vx: -1, vy: ny - center }, rally: state.rally + 1 };
    }

    const scorer: Seat | undefined = nx <= 0 ? "b" : nx >= FIELD_WIDTH - 1 ? "a" : undefined;
    if (scorer) {
        const served = serve(state.rng);
        return {
            ...state,
            rng: served.rng,
            ball: served.ball,
            scores: { ...state.scores, [scorer]: state.scores[scorer] + 1 },
            rally: 0,
        };
    }

    return { ...state, ball: { x: nx, y: ny, vx: ball.vx, vy } };
}

function decide(state: PaddleState): Winner | undefined {
    const { a, b } = state.scores;
    if (a >= WINNING_SCORE) return "a";
    if (b >= WINNING_SCORE) return "b";
    if (state.moves >= MAX_TURNS) return byScore(a, b);
    return undefined;
}

export const paddleBallEngine: GameEngine<PaddleState, PaddleCommand> = {
    kind: "paddle_ball",
    commands: ["up", "down", "tick"],
    maxTurns: MAX_TURNS,

    initialize({ seed }) {
        const served = serve(seed >>> 0);
        const start = Math.floor(FIELD_HEIGHT / 2) - 1;
        return {
            kind: "paddle_ball",
            turn: "a",
            moves: 0,
            rng: served.rng,
            paddles: { a: start, b: start },
            ball: served.ball,
            scores: { a: 0, b: 0 },
            rally: 0,
        };
    },

    applyMove(state, actor, command) {
        assertCanMove(state, actor);
        let top = state.paddles[actor];
        if (command !== "tick") {
            top += command === "up" ? -1 : 1;
            if (top < 0 || top > FIELD_HEIGHT - PADDLE_HEIGHT) {
                throw new GameError("IllegalMove", `Paddle cannot move ${command} any further`);
            }
        }

        let next = stepBall({
            ...state,
            paddles: { ...state.paddles, [actor]: top },
            moves: state.moves + 1,
            turn: otherSeat(actor),
        });
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
        const rows: string[] = [];
        for (let y = 0; y < FIELD_HEIGHT; y++) {
            let line = "";
            for (let x = 0; x < FIELD_WIDTH; x++) {
                if (x === state.ball.x && y === state.ball.y) line += "o";
                else if (x === 1 && covers(state.paddles.a, y)) line += "|";
                else if (x === FIELD_WIDTH - 2 && covers(state.paddles.b, y)) line += "|";
                else if (x === Math.floor(FIELD_WIDTH / 2)) line += ":";
                else line += " ";
            }
            rows.push(`[${line}]`);
        }
        return [`A ${state.scores.a} - ${state.scores.b} B   turn ${state.moves}/${MAX_TURNS}`, ...rows].join("\n");
    },
};

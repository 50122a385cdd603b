import { GameError } from "../errors.js";

export type GameKind = "puzzle" | "survival" | "paddle_ball";

/** a = challenger (moves first), b = challenged. */
export type Seat = "a" | "b";

export type Winner = Seat | "tie";

export type MoveResult =
| { status: "continue" }
| { status: "terminal"; winner: Winner };

export type EngineConfig = {
    seed: number;
};

/** Fields every board carries so turn ownership is checked the same way everywhere. */
export type TurnState = {
    turn: Seat;
    moves: number;
    winner?: Winner;
};

export interface GameEngine<S extends TurnState & { kind: GameKind }, C extends string> {
    readonly kind: S["kind"];
    readonly commands: readonly C[];
    readonly maxTurns: number;
    initialize(config: EngineConfig): S;
    /** Pure: the input board is left untouched, on success and on failure. */
    applyMove(state: S, actor: Seat, command: C): { state: S; result: MoveResult };
    isTerminal(state: S): boolean;
    winner(state: S): Winner | undefined;
    render(state: S): string;
}

export function otherSeat(seat: Seat): Seat {
    return seat === "a" ? "b" : "a";
}

export function assertCanMove(state: TurnState, actor: Seat) {
    if (state.winner !== undefined) throw new GameError("IllegalMove", "The game is already over");
    if (state.turn !== actor) throw new GameError("NotYourTurn", "It is not your turn");
}

export function byScore(a: number, b: number): Winner {
    if (a > b) return "a";
    if (b > a) return "b";
    return "tie";
}

export function resultOf(state: TurnState): MoveResult {
    return state.winner === undefined
        ? { status: "continue" }
        : { status: "terminal", winner: state.winner };
}

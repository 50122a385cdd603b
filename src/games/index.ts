import { GameError } from "../errors.js";
import { paddleBallEngine, type PaddleState } from "./paddleBall.js";
import { puzzleEngine, type PuzzleState } from "./puzzle.js";
import { survivalEngine, type SurvivalState } from "./survival.js";
import type { GameKind, MoveResult, Seat, Winner } from "./types.js";

export type { GameKind, MoveResult, Seat, Winner } from "./types.js";
export { otherSeat } from "./types.js";

/** Board snapshot stored on a session. Opaque to everything but this module. */
export type BoardState = PuzzleState | SurvivalState | PaddleState;

export const GAME_LABELS: Record<GameKind, string> = {
    puzzle: "Block Drop",
    survival: "Survival",
    paddle_ball: "Paddle Ball",
};

function parseCommand<C extends string>(commands: readonly C[], raw: string): C {
    const wanted = raw.trim().toLowerCase();
    const found = commands.find((c) => c === wanted);
    if (found === undefined) {
        throw new GameError("IllegalMove", `Unknown command "${raw}". Try one of: ${commands.join(", ")}`);
    }
    return found;
}

export function initialBoard(kind: GameKind, seed: number): BoardState {
    switch (kind) {
        case "puzzle":
            return puzzleEngine.initialize({ seed });
        case "survival":
            return survivalEngine.initialize({ seed });
        case "paddle_ball":
            return paddleBallEngine.initialize({ seed });
    }
}

export function applyMove(board: BoardState, actor: Seat, command: string): { board: BoardState; result: MoveResult } {
    switch (board.kind) {
        case "puzzle": {
            const out = puzzleEngine.applyMove(board, actor, parseCommand(puzzleEngine.commands, command));
            return { board: out.state, result: out.result };
        }
        case "survival": {
            const out = survivalEngine.applyMove(board, actor, parseCommand(survivalEngine.commands, command));
            return { board: out.state, result: out.result };
        }
        case "paddle_ball": {
            const out = paddleBallEngine.applyMove(board, actor, parseCommand(paddleBallEngine.commands, command));
            return { board: out.state, result: out.result };
        }
    }
}

export function isTerminal(board: BoardState): boolean {
    switch (board.kind) {
        case "puzzle":
            return puzzleEngine.isTerminal(board);
        case "survival":
            return survivalEngine.isTerminal(board);
        case "paddle_ball":
            return paddleBallEngine.isTerminal(board);
    }
}

export function winnerOf(board: BoardState): Winner | undefined {
    switch (board.kind) {
        case "puzzle":
            return puzzleEngine.winner(board);
        case "survival":
            return survivalEngine.winner(board);
        case "paddle_ball":
            return paddleBallEngine.winner(board);
    }
}

export function renderBoard(board: BoardState): string {
    switch (board.kind) {
        case "puzzle":
            return puzzleEngine.render(board);
        case "survival":
            return survivalEngine.render(board);
        case "paddle_ball":
            return paddleBallEngine.render(board);
    }
}

export function maxTurnsFor(kind: GameKind): number {
    switch (kind) {
        case "puzzle":
            return puzzleEngine.maxTurns;
        case "survival":
            return survivalEngine.maxTurns;
        case "paddle_ball":
            return paddleBallEngine.maxTurns;
    }
}

export function commandsFor(kind: GameKind): readonly string[] {
    switch (kind) {
        case "puzzle":
            return puzzleEngine.commands;
        case "survival":
            return survivalEngine.commands;
        case "paddle_ball":
            return paddleBallEngine.commands;
    }
}

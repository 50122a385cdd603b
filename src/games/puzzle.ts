import { GameError } from "../errors.js";
import { intAt } from "./random.js";
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

export const PUZZLE_WIDTH = 10;
export const PUZZLE_HEIGHT = 20;
const SPAWN_COL = 3;
const MAX_TURNS = 400;
const EMPTY = ".";

export type PieceType = "I" | "O" | "T" | "S" | "Z" | "J" | "L";
export type PuzzleCommand = "left" | "right" | "down" | "rotate" | "drop";

const PIECE_TYPES: readonly PieceType[] = ["I", "O", "T", "S", "Z", "J", "L"];

// 4x4 boxes, one entry per rotation
const SHAPES: Record<PieceType, readonly (readonly string[])[]> = {
    I: [
        ["....", "####", "....", "...."],
        ["..#.", "..#.", "..#.", "..#."],
    ],
    O: [
        ["....", ".##.", ".##.", "...."],
    ],
    T: [
        ["....", ".#..", "###.", "...."],
        ["....", ".#..", ".##.", ".#.."],
        ["....", "....", "###.", ".#.."],
        ["....", ".#..", "##..", ".#.."],
    ],
    S: [
        ["....", ".##.", "##..", "...."],
        ["....", ".#..", ".##.", "..#."],
    ],
    Z: [
        ["....", "##..", ".##.", "...."],
        ["....", "..#.", ".##.", ".#.."],
    ],
    J: [
        ["....", ".#..", ".#..", "##.."],
        ["....", "....", "#...", "###."],
        ["....", ".##.", ".#..", ".#.."],
        ["....", "....", "###.", "..#."],
    ],
    L: [
        ["....", ".#..", ".#..", ".##."],
        ["....", "....", "###.", "#..."],
        ["....", "##..", ".#..", ".#.."],
        ["....", "....", "..#.", "###."],
    ],
};

const LINE_SCORES = [0, 40, 100, 300, 1200];

export type PuzzleBoard = {
    rows: string[];
    piece: PieceType;
    rotation: number;
    row: number;
    col: number;
    /** Position in the shared piece sequence; both players draw the same pieces. */
    pieceIndex: number;
    score: number;
    lines: number;
    level: number;
    toppedOut: boolean;
};

export type PuzzleState = TurnState & {
    kind: "puzzle";
    seed: number;
    boards: Record<Seat, PuzzleBoard>;
};

export function pieceAt(seed: number, index: number): PieceType {
    return PIECE_TYPES[intAt(seed, index, PIECE_TYPES.length)];
}

function shapeOf(piece: PieceType, rotation: number): readonly string[] {
    const shapes = SHAPES[piece];
    return shapes[rotation % shapes.length];
}

function cellsOf(piece: PieceType, rotation: number, row: number, col: number): Array<[number, number]> {
    const out: Array<[number, number]> = [];
    shapeOf(piece, rotation).forEach((line, i) => {
        for (let j = 0; j < line.length; j++) {
            if (line[j] === "#") out.push([row + i, col + j]);
        }
    });
    return out;
}

function fits(rows: readonly string[], piece: PieceType, rotation: number, row: number, col: number): boolean {
    return cellsOf(piece, rotation, row, col).every(([r, c]) =>
        r >= 0 && r < PUZZLE_HEIGHT && c >= 0 && c < PUZZLE_WIDTH && rows[r][c] === EMPTY
    );
}

function emptyRow(): string {
    return EMPTY.repeat(PUZZLE_WIDTH);
}

export function lineScore(cleared: number, level: number): number {
    return (LINE_SCORES[cleared] ?? 0) * (level + 1);
}

function newBoard(seed: number): PuzzleBoard {
    return {
        rows: Array.from({ length: PUZZLE_HEIGHT }, emptyRow),
        piece: pieceAt(seed, 0),
        rotation: 0,
        row: 0,
        col: SPAWN_COL,
        pieceIndex: 0,
        score: 0,
        lines: 0,
        level: 1,
        toppedOut: false,
    };
}

function lock(board: PuzzleBoard, seed: number): PuzzleBoard {
    const rows = [...board.rows];
    for (const [r, c] of cellsOf(board.piece, board.rotation, board.row, board.col)) {
        rows[r] = rows[r].slice(0, c) + board.piece + rows[r].slice(c + 1);
    }

    const kept = rows.filter((r) => r.includes(EMPTY));
    const cleared = PUZZLE_HEIGHT - kept.length;
    const settled = [...Array.from({ length: cleared }, emptyRow), ...kept];

    const lines = board.lines + cleared;
    const pieceIndex = board.pieceIndex + 1;
    const piece = pieceAt(seed, pieceIndex);

    return {
        rows: settled,
        piece,
        rotation: 0,
        row: 0,
        col: SPAWN_COL,
        pieceIndex,
        score: board.score + lineScore(cleared, board.level),
        lines,
        level: Math.floor(lines / 10) + 1,
        toppedOut: !fits(settled, piece, 0, 0, SPAWN_COL),
    };
}

function moveBoard(board: PuzzleBoard, command: PuzzleCommand, seed: number): PuzzleBoard {
    if (board.toppedOut) throw new GameError("IllegalMove", "Your stack has reached the top");
    const { rows, piece, rotation, row, col } = board;

    switch (command) {
        case "left":
        case "right": {
            const next = col + (command === "left" ? -1 : 1);
            if (!fits(rows, piece, rotation, row, next)) throw new GameError("IllegalMove", `Cannot move ${command}`);
            return { ...board, col: next };
        }
        case "rotate": {
            const next = (rotation + 1) % SHAPES[piece].length;
            if (!fits(rows, piece, next, row, col)) throw new GameError("IllegalMove", "Cannot rotate here");
            return { ...board, rotation: next };
        }
        case "down":
            if (fits(rows, piece, rotation, row + 1, col)) return { ...board, row: row + 1 };
            return lock(board, seed);
        case "drop": {
            let landed = row;
            while (fits(rows, piece, rotation, landed + 1, col)) landed++;
            return lock({ ...board, row: landed }, seed);
        }
    }
}

/**
 * A round is a's move then b's. A top-out is only judged once the round closes,
 * so two top-outs in the same round tie.
 */
function decide(boards: Record<Seat, PuzzleBoard>, actor: Seat, moves: number, maxTurns: number): Winner | undefined {
    const capped = moves >= maxTurns;
    if (actor === "b" || capped) {
        if (boards.a.toppedOut && boards.b.toppedOut) return "tie";
        if (boards.a.toppedOut) return "b";
        if (boards.b.toppedOut) return "a";
    }
    if (capped) return byScore(boards.a.score, boards.b.score);
    return undefined;
}

function renderBoard(board: PuzzleBoard): string[] {
    const live = new Set(
        board.toppedOut ? [] : cellsOf(board.piece, board.rotation, board.row, board.col).map(([r, c]) => `${r}:${c}`)
    );
    return board.rows.map((line, r) =>
        "|" + [...line].map((cell, c) => (live.has(`${r}:${c}`) ? "@" : cell === EMPTY ? " " : "#")).join("") + "|"
    );
}

export const puzzleEngine: GameEngine<PuzzleState, PuzzleCommand> = {
    kind: "puzzle",
    commands: ["left", "right", "down", "rotate", "drop"],
    maxTurns: MAX_TURNS,

    initialize({ seed }) {
        return {
            kind: "puzzle",
            seed,
            turn: "a",
            moves: 0,
            boards: { a: newBoard(seed), b: newBoard(seed) },
        };
    },

    applyMove(state, actor, command) {
        assertCanMove(state, actor);
        const boards = { ...state.boards, [actor]: moveBoard(state.boards[actor], command, state.seed) };
        const moves = state.moves + 1;
        const next: PuzzleState = {
            ...state,
            boards,
            moves,
            turn: otherSeat(actor),
            winner: decide(boards, actor, moves, MAX_TURNS),
        };
        return { state: next, result: resultOf(next) };
    },

    isTerminal(state) {
        return state.winner !== undefined;
    },

    winner(state) {
        return state.winner;
    },

    render(state) {
        const a = renderBoard(state.boards.a);
        const b = renderBoard(state.boards.b);
        const header = `A ${state.boards.a.score} pts (${state.boards.a.lines} lines)   B ${state.boards.b.score} pts (${state.boards.b.lines} lines)`;
        return [header, ...a.map((line, i) => `${line}  ${b[i]}`)].join("\n");
    },
};

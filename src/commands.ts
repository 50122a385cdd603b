import { GameError, InvariantViolation, type GameErrorCode } from "./errors.js";
import type { GameKind } from "./games/index.js";
import type { Session } from "./types.js";

type ParseErr = { ok: false; error: string };

export type ChallengeParse = { ok: true; opponentId: string; kind: GameKind; stake: number } | ParseErr;
export type MoveParse = { ok: true; command: string; sessionId?: string } | ParseErr;
export type IdParse = { ok: true; id: string } | ParseErr;
export type AdjustParse = { ok: true; userId: string; amount: number } | ParseErr;

const GAME_ALIASES: Record<string, GameKind> = {
    puzzle: "puzzle",
    blocks: "puzzle",
    survival: "survival",
    snake: "survival",
    paddle: "paddle_ball",
    paddle_ball: "paddle_ball",
    pong: "paddle_ball",
};

export const CHALLENGE_USAGE = "Usage: /challenge @user <puzzle|survival|paddle> <stake>";
export const MOVE_USAGE = "Usage: /move <command> [game id]";

export function parseUserMention(text: string): string | null {
    const m = text.match(/<@([UW][A-Z0-9]+)(?:\|[^>]+)?>/i);
    return m ? m[1] : null;
}

function words(txt: string | undefined): string[] {
    return (txt || "").trim().split(/\s+/).filter(Boolean);
}

export function parseChallengeArgs(txt: string | undefined): ChallengeParse {
    const parts = words(txt);
    if (parts.length < 3) return { ok: false, error: CHALLENGE_USAGE };

    const opponentId = parseUserMention(parts[0]);
    if (!opponentId) return { ok: false, error: "First argument must be an @mention" };

    const kind = GAME_ALIASES[parts[1].toLowerCase()];
    if (!kind) return { ok: false, error: "Game must be one of: puzzle, survival, paddle" };

    const stake = Number(parts[2]);
    if (!Number.isInteger(stake) || stake <= 0) return { ok: false, error: "Stake must be a positive whole number" };

    return { ok: true, opponentId, kind, stake };
}

export function parseMoveArgs(txt: string | undefined): MoveParse {
    const parts = words(txt);
    if (parts.length === 0 || parts.length > 2) return { ok: false, error: MOVE_USAGE };
    return { ok: true, command: parts[0].toLowerCase(), sessionId: parts[1] };
}

export function parseIdArg(txt: string | undefined, usage: string): IdParse {
    const parts = words(txt);
    if (parts.length !== 1) return { ok: false, error: usage };
    return { ok: true, id: parts[0] };
}

/** `/fund @user 50` and `/withdraw @user 50`. */
export function parseAdjustArgs(txt: string | undefined, usage: string): AdjustParse {
    const parts = words(txt);
    if (parts.length !== 2) return { ok: false, error: usage };
    const userId = parseUserMention(parts[0]);
    if (!userId) return { ok: false, error: "First argument must be an @mention" };
    const amount = Number(parts[1]);
    if (!Number.isInteger(amount) || amount <= 0) return { ok: false, error: "Amount must be a positive whole number" };
    return { ok: true, userId, amount };
}

/** Picks the game a `/move` targets: the named one, else the sender's only active game. */
export function pickSession(active: Session[], sessionId?: string): { ok: true; session: Session } | ParseErr {
    if (sessionId) {
        const exact = active.find((s) => s.id === sessionId);
        if (exact) return { ok: true, session: exact };
        const byPrefix = active.filter((s) => s.id.startsWith(sessionId));
        if (byPrefix.length === 1) return { ok: true, session: byPrefix[0] };
        return { ok: false, error: `No single active game of yours matches \`${sessionId}\`` };
    }
    if (active.length === 0) return { ok: false, error: "You have no active game." };
    if (active.length > 1) {
        const ids = active.map((s) => `\`${s.id}\``).join(", ");
        return { ok: false, error: `You are in several games; add the game id: ${ids}` };
    }
    return { ok: true, session: active[0] };
}

const FRIENDLY:Partial<Record<GameErrorCode, string>> = {
    NotYourTurn: "Hold on, it's your opponent's turn.",
    InsufficientFunds: "Not enough available balance to cover the stake.",
    Expired: "That challenge has expired.",
    SessionNotActive: "That game is already over.",
};

/** Text shown to the sender of a failed command. */
export function describeError(e: unknown): string {
    if (e instanceof GameError) return FRIENDLY[e.code] ?? e.message;
    if (e instanceof InvariantViolation) return "Something went wrong on our side. Your funds are safe; an operator has been alerted.";
    return "Something went wrong. Please try again.";
}

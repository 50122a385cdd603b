export type GameErrorCode =
| "IllegalMove"
| "NotYourTurn"
| "InvalidStake"
| "SelfChallenge"
| "DuplicatePending"
| "InsufficientFunds"
| "NotRecipient"
| "AlreadyResolved"
| "Expired"
| "SessionNotActive"
| "UnknownActor"
| "InvitationNotFound"
| "SessionNotFound"
| "NotOperator";

export type InvariantCode = "SettlementConflict" | "InvalidHoldState" | "IdempotencyConflict";

/** Expected failure caused by the sender's input; never leaves state changed. */
export class GameError extends Error {
    readonly code: GameErrorCode;

    constructor(code: GameErrorCode, message?: string) {
        super(message ?? code);
        this.name = "GameError";
        this.code = code;
    }
}

/** A caller or logic bug. The operation is refused rather than guessed at. */
export class InvariantViolation extends Error {
    readonly code: InvariantCode;
    readonly ctx: Record<string, unknown>;

    constructor(code: InvariantCode, message: string, ctx: Record<string, unknown> = {}) {
        super(message);
        this.name = "InvariantViolation";
        this.code = code;
        this.ctx = ctx;
    }
}

export function isGameError(e: unknown, code?: GameErrorCode): e is GameError {
    return e instanceof GameError && (code === undefined || e.code === code);
}

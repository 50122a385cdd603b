import type { LogLevel } from "./config.js";

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
    currentLevel = level;
}

export function log(level: LogLevel, msg: string, ctx: Record<string, unknown> = {}) {
    if (LEVELS[level] < LEVELS[currentLevel]) return;
    const line = JSON.stringify({
        t: new Date().toISOString(),
        level,
        msg,
        ...ctx,
    });
    if (level === "error") console.error(line);
    else console.log(line);
}

export type Logger = {
    debug: (m: string, c?: Record<string, unknown>) => void;
    info: (m: string, c?: Record<string, unknown>) => void;
    warn: (m: string, c?: Record<string, unknown>) => void;
    error: (m: string, c?: Record<string, unknown>) => void;
    child: (bound: Record<string, unknown>) => Logger;
};

function makeLogger(bound: Record<string, unknown>): Logger {
    return {
        debug: (m, c) => log("debug", m, { ...bound, ...c }),
        info: (m, c) => log("info", m, { ...bound, ...c }),
        warn: (m, c) => log("warn", m, { ...bound, ...c }),
        error: (m, c) => log("error", m, { ...bound, ...c }),
        child: (more) => makeLogger({ ...bound, ...more }),
    };
}

export const logger = makeLogger({});

/** Best-effort message extraction for log context. */
export function errMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

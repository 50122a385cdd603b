import "dotenv/config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export function intFromEnv(name: string, fallback: number, min = 0): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min) {
        throw new Error(`${name} must be an integer of at least ${min}, got "${raw}"`);
    }
    return n;
}

function logLevelFromEnv(): LogLevel {
    const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
    if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return raw;
    return "info";
}

export const DATA_DIR = process.env.DATA_DIR || "./data";
export const STATE_FILE = process.env.STATE_FILE || "state.json";
export const LOG_LEVEL = logLevelFromEnv();

// stakes are in minor units (e.g. cents)
export const MIN_STAKE = intFromEnv("MIN_STAKE", 1, 1);
export const MAX_STAKE = intFromEnv("MAX_STAKE", 1000, MIN_STAKE);

export const INVITE_TTL_SEC = intFromEnv("INVITE_TTL_SEC", 60);
export const IDLE_TIMEOUT_SEC = intFromEnv("IDLE_TIMEOUT_SEC", 300);
export const SWEEP_INTERVAL_MS = intFromEnv("SWEEP_INTERVAL_MS", 5000);

// Slack user ids allowed to credit and debit balances by hand
export const OPERATOR_IDS = (process.env.OPERATOR_USER_IDS || "")
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);

export const CONFIG = {
    dataDir: DATA_DIR,
    stateFile: STATE_FILE,
    logLevel: LOG_LEVEL,
    minStake: MIN_STAKE,
    maxStake: MAX_STAKE,
    inviteTtlSec: INVITE_TTL_SEC,
    idleTimeoutSec: IDLE_TIMEOUT_SEC,
    sweepIntervalMs: SWEEP_INTERVAL_MS,
    operatorIds: OPERATOR_IDS,
    slack: {
        botToken: process.env.SLACK_BOT_TOKEN,
        appToken: process.env.SLACK_APP_TOKEN,
        signingSecret: process.env.SLACK_SIGNING_SECRET,
        port: intFromEnv("PORT", 3000),
    },
} as const;

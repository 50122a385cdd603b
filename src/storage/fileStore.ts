import { promises as fs } from "fs";
import * as path from "path";
import type { State } from "../types.js";
import { logger } from "../logger.js";
import { withLock } from "../locking.js";

export const STATE_VERSION = 1;

export const DEFAULT_STATE = (): State => ({
    version: STATE_VERSION,
    accounts: {},
    transactions: [],
    invitations: {},
    sessions: {},
    moves: [],
    settlements: {},
    idempotency: {},
    createdAt: new Date().toISOString(),
    updatedAt: new Date().toISOString(),
});

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Whole-state JSON store. Every mutation runs synchronously against the in-memory
 * state and is then flushed with a tmp-file + rename. Without a file path the
 * store stays in memory (tests, dry runs).
 */
export class FileStore {
    private state: State = DEFAULT_STATE();
    private readonly filePath?: string;

    constructor(filePath?: string) {
        this.filePath = filePath;
    }

    async init() {
        if (!this.filePath) return;
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        try {
            const raw = await fs.readFile(this.filePath, "utf8");
            const loaded = JSON.parse(raw) as State;
            if (loaded.version !== STATE_VERSION) {
                throw new Error(`Unsupported state version ${loaded.version} in ${this.filePath}`);
            }
            this.state = { ...DEFAULT_STATE(), ...loaded };
            logger.info("State loaded", { file: this.filePath });
        } catch (e) {
            if (!isMissingFile(e)) throw e;
            logger.warn("No existing state; creating new", { file: this.filePath });
            await this.save();
        }
    }

    get(): State {
        return this.state;
    }

    async save() {
        this.state.updatedAt = new Date().toISOString();
        const filePath = this.filePath;
        if (!filePath) return;
        const snapshot = JSON.stringify(this.state, null, 2);
        // rename order must match write order
        await withLock(`store:${filePath}`, async () => {
            const tmp = filePath + ".tmp";
            await fs.writeFile(tmp, snapshot, "utf8");
            await fs.rename(tmp, filePath);
        });
        logger.debug("State saved", { file: filePath });
    }

    /** Applies the mutator atomically (it must not await) and persists the result. */
    async update<T>(mutator: (s: State) => T): Promise<T> {
        const result = mutator(this.state);
        await this.save();
        return result;
    }
}

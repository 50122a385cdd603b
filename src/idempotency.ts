import type { DateTime } from "luxon";
import type { FileStore } from "./storage/fileStore.js";
import type { IdempotencyEntry, State } from "./types.js";
import { logger } from "./logger.js";
import { withLock } from "./locking.js";
import { fromIso, toIso } from "./time.js";

export type Claim =
| { status: "claimed" }
| { status: "duplicate"; entry: IdempotencyEntry }
| { status: "conflict"; entry: IdempotencyEntry };

function isLive(entry: IdempotencyEntry, now: DateTime): boolean {
  if (typeof entry.ttlMs !== "number") return true;
  return now.toMillis() <= fromIso(entry.createdAt).toMillis() + entry.ttlMs;
}

/**
 * Claims `key` inside a store mutator. A live entry with the same fingerprint is a
 * duplicate; with a different one it is a conflict. Neither writes anything.
 */
export function claimKey(
  state: State,
  key: string,
  opts: { now: DateTime; fingerprint?: string; ttlMs?: number }
): Claim {
  const existing = state.idempotency[key];
  if (existing && isLive(existing, opts.now)) {
    return existing.fingerprint === opts.fingerprint
      ? { status: "duplicate", entry: existing }
      : { status: "conflict", entry: existing };
  }
  state.idempotency[key] = {
    key,
    fingerprint: opts.fingerprint,
    createdAt: toIso(opts.now),
    ttlMs: opts.ttlMs,
  };
  return { status: "claimed" };
}

/** Run an operation only once per key (until TTL expiration, if provided). */
export async function runOnce<T>(
  store: FileStore,
  key: string,
  fn: () => Promise<T>,
  opts: { now: DateTime; ttlMs?: number }
): Promise<{ ok: true; value: T } | { ok: false }> {
  return withLock(`idem:${key}`, async () => {
    const existing = store.get().idempotency[key];
    if (existing && isLive(existing, opts.now)) {
      logger.debug("Idempotent skip", { key });
      return { ok: false };
    }

    const value = await fn();

    await store.update((s) => {
      s.idempotency[key] = { key, createdAt: toIso(opts.now), ttlMs: opts.ttlMs };
    });
    return { ok: true, value };
  });
}

/** Drops entries whose TTL has lapsed; permanent keys stay. Returns how many went. */
export function pruneExpired(state: State, now: DateTime): number {
  let removed = 0;
  for (const [key, entry] of Object.entries(state.idempotency)) {
    if (!isLive(entry, now)) {
      delete state.idempotency[key];
      removed++;
    }
  }
  return removed;
}

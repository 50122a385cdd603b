// In-process async lock per key.
// NOTE: a multi-process deployment needs a distributed lock instead.
const tails = new Map<string, Promise<void>>();

export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = tails.get(key) ?? Promise.resolve();
  let release: () => void = () => {};
  const held = new Promise<void>((res) => {
    release = res;
  });
  const tail = prev.then(() => held);
  tails.set(key, tail);

  await prev;
  try {
    return await fn();
  } finally {
    release();
    if (tails.get(key) === tail) tails.delete(key);
  }
}

/** Takes several locks in a stable order so two callers never wait on each other crosswise. */
export async function withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
  const ordered = [...new Set(keys)].sort();
  const run = (i: number): Promise<T> =>
    i === ordered.length ? fn() : withLock(ordered[i], () => run(i + 1));
  return run(0);
}

// mulberry32. The generator state lives in the board so replays are exact.

export function nextRandom(state: number): { value: number; state: number } {
    const next = (state + 0x6d2b79f5) >>> 0;
    let t = next;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const value = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return { value, state: next };
}

export function nextInt(state: number, maxExclusive: number): { value: number; state: number } {
    const r = nextRandom(state);
    return { value: Math.floor(r.value * maxExclusive), state: r.state };
}

/** Stateless draw: the n-th value of a sequence keyed by seed. */
export function intAt(seed: number, index: number, maxExclusive: number): number {
    const mixed = (seed ^ Math.imul(index + 1, 0x9e3779b1)) >>> 0;
    return nextInt(mixed, maxExclusive).value;
}

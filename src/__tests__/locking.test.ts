import { describe, expect, it } from "vitest";
import { withLock, withLocks } from "../locking.js";

function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

describe("withLock", () => {
    it("runs holders of the same key one after another", async () => {
        const order: string[] = [];
        const job = (name: string) =>
            withLock("k", async () => {
                order.push(`${name}:start`);
                await tick();
                order.push(`${name}:end`);
            });

        await Promise.all([job("one"), job("two"), job("three")]);

        expect(order).toEqual(["one:start", "one:end", "two:start", "two:end", "three:start", "three:end"]);
    });

    it("does not block other keys", async () => {
        const order: string[] = [];
        await Promise.all([
            withLock("x", async () => {
                await tick();
                order.push("x");
            }),
            withLock("y", async () => {
                order.push("y");
            }),
        ]);
        expect(order).toEqual(["y", "x"]);
    });

    it("releases the lock when the holder throws", async () => {
        await expect(withLock("boom", async () => Promise.reject(new Error("nope")))).rejects.toThrow("nope");
        await expect(withLock("boom", async () => "next")).resolves.toBe("next");
    });

    it("takes multiple keys without crosswise waits", async () => {
        const done = await Promise.all([
            withLocks(["p", "q"], async () => {
                await tick();
                return 1;
            }),
            withLocks(["q", "p"], async () => 2),
            withLocks(["p", "p"], async () => 3),
        ]);
        expect(done).toEqual([1, 2, 3]);
    });
});

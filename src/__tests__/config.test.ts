import { afterEach, describe, expect, it, vi } from "vitest";
import { intFromEnv } from "../config.js";

describe("intFromEnv", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("falls back when the variable is unset or blank", () => {
        vi.stubEnv("MIN_STAKE", "  ");
        expect(intFromEnv("MIN_STAKE", 1, 1)).toBe(1);
        expect(intFromEnv("ARCADE_UNSET_FOR_TEST", 7)).toBe(7);
    });

    it("refuses a zero minimum stake", () => {
        vi.stubEnv("MIN_STAKE", "0");
        expect(() => intFromEnv("MIN_STAKE", 1, 1)).toThrowError('MIN_STAKE must be an integer of at least 1, got "0"');
    });

    it("reads whole numbers at or above the floor", () => {
        vi.stubEnv("MAX_STAKE", "250");
        expect(intFromEnv("MAX_STAKE", 1000, 1)).toBe(250);
        vi.stubEnv("MAX_STAKE", "2.5");
        expect(() => intFromEnv("MAX_STAKE", 1000, 1)).toThrowError(/MAX_STAKE/);
    });
});

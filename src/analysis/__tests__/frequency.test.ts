import { describe, it, expect } from "vitest";
import { difference, rankByDifference, isCharacteristicOfA } from "../frequency";
import { EmptyInputError } from "../../errors";

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
}

describe("difference", () => {
    it("computes relative frequency in A minus relative frequency in B", () => {
        const diffs = difference(["x", "x", "y"], ["x", "y", "y"]);

        expect(diffs.size).toBe(2);
        expect(diffs.get("x")).toBeCloseTo(1 / 3, 10);
        expect(diffs.get("y")).toBeCloseTo(-1 / 3, 10);
    });

    it("treats a word missing from one corpus as count zero", () => {
        const diffs = difference(["a", "b"], ["b", "c", "c", "c"]);

        expect(diffs.get("a")).toBe(0.5);
        expect(diffs.get("b")).toBe(0.5 - 0.25);
        expect(diffs.get("c")).toBe(-0.75);
    });

    it("covers exactly the union vocabulary", () => {
        const diffs = difference(["a", "b", "a"], ["c", "b"]);

        expect([...diffs.keys()].sort()).toEqual(["a", "b", "c"]);
    });

    it("keeps every value within [-1, 1]", () => {
        const diffs = difference(["only", "only", "only"], ["other"]);

        expect(diffs.get("only")).toBe(1);
        expect(diffs.get("other")).toBe(-1);
        for (const value of diffs.values()) {
            expect(value).toBeGreaterThanOrEqual(-1);
            expect(value).toBeLessThanOrEqual(1);
        }
    });

    it("gives exactly zero for identical relative frequencies", () => {
        const diffs = difference(["a", "b"], ["a", "b", "a", "b"]);

        expect(diffs.get("a")).toBe(0);
        expect(diffs.get("b")).toBe(0);
    });

    it("signals empty input for either corpus", () => {
        expect(() => difference([], ["a"])).toThrow(EmptyInputError);
        expect(() => difference(["a"], [])).toThrow(EmptyInputError);

        const err = captureError(() => difference(["a"], []));
        expect(err).toBeInstanceOf(EmptyInputError);
        expect(err).toMatchObject({ corpus: "B", code: "EMPTY_INPUT" });
    });
});

describe("isCharacteristicOfA", () => {
    it("assigns non-positive differences to A", () => {
        expect(isCharacteristicOfA(-0.2)).toBe(true);
        expect(isCharacteristicOfA(0)).toBe(true);
        expect(isCharacteristicOfA(1e-12)).toBe(false);
    });
});

describe("rankByDifference", () => {
    const diffs = new Map<string, number>([
        ["alpha", -0.3],
        ["beta", 0.2],
        ["gamma", 0],
        ["delta", -0.3],
        ["epsilon", 0.5],
    ]);

    it("orders the A side ascending and the B side descending", () => {
        const ranking = rankByDifference(diffs);

        expect(ranking.characteristicOfA.map(r => r.word)).toEqual(["alpha", "delta", "gamma"]);
        expect(ranking.characteristicOfB.map(r => r.word)).toEqual(["epsilon", "beta"]);
    });

    it("truncates each side to topK", () => {
        const ranking = rankByDifference(diffs, 1);

        expect(ranking.characteristicOfA).toEqual([{ word: "alpha", difference: -0.3 }]);
        expect(ranking.characteristicOfB).toEqual([{ word: "epsilon", difference: 0.5 }]);
    });
});

import { describe, it, expect } from "vitest";
import { mannWhitneyU, exactUCounts } from "../mann-whitney";
import { DegenerateSampleError } from "../../errors";

describe("exactUCounts", () => {
    it("matches the Gaussian binomial coefficients", () => {
        expect([...exactUCounts(2, 2)]).toEqual([1, 1, 2, 1, 1]);
        expect([...exactUCounts(3, 3)]).toEqual([1, 1, 2, 3, 3, 3, 3, 2, 1, 1]);
    });

    it("is the same for swapped sample sizes", () => {
        expect([...exactUCounts(2, 5)]).toEqual([...exactUCounts(5, 2)]);
    });

    it("sums to the number of arrangements", () => {
        const total = exactUCounts(4, 6).reduce((sum, c) => sum + c, 0);
        expect(total).toBe(210); // C(10, 4)
    });
});

describe("mannWhitneyU", () => {
    describe("exact method", () => {
        it("gives p = 0.1 for completely separated samples of three", () => {
            const result = mannWhitneyU([1, 2, 3], [4, 5, 6]);

            expect(result.method).toBe("exact");
            expect(result.statistic).toBe(0);
            expect(result.pValue).toBeCloseTo(0.1, 12);
        });

        it("reports U for the first sample", () => {
            const result = mannWhitneyU([4, 5, 6], [1, 2, 3]);

            expect(result.statistic).toBe(9);
            expect(result.pValue).toBeCloseTo(0.1, 12);
        });

        it("handles unequal sample sizes", () => {
            const result = mannWhitneyU([1, 2], [3]);

            expect(result.statistic).toBe(0);
            expect(result.pValue).toBeCloseTo(2 / 3, 12);
        });

        it("clips the doubled p-value at 1", () => {
            const result = mannWhitneyU([1], [0]);

            expect(result.statistic).toBe(1);
            expect(result.pValue).toBe(1);
        });

        it("supports one-sided alternatives", () => {
            expect(mannWhitneyU([1, 2, 3], [4, 5, 6], "less").pValue).toBeCloseTo(0.05, 12);
            expect(mannWhitneyU([1, 2, 3], [4, 5, 6], "greater").pValue).toBe(1);
            expect(mannWhitneyU([4, 5, 6], [1, 2, 3], "greater").pValue).toBeCloseTo(0.05, 12);
        });
    });

    describe("asymptotic method", () => {
        it("uses the tie-corrected normal approximation when values tie", () => {
            // Per-chunk counts of "x" in [x, x, y] vs [x, y, y] with one-token chunks
            const result = mannWhitneyU([1, 1, 0], [1, 0, 0]);

            expect(result.method).toBe("asymptotic");
            expect(result.statistic).toBe(6);
            expect(result.pValue).toBeCloseTo(0.619257, 5);
        });

        it("is used for large samples without ties", () => {
            const a = Array.from({ length: 10 }, (_, i) => i + 1);
            const b = Array.from({ length: 10 }, (_, i) => i + 11);

            const result = mannWhitneyU(a, b);

            expect(result.method).toBe("asymptotic");
            expect(result.statistic).toBe(0);
            expect(result.pValue).toBeCloseTo(1.826718e-4, 8);
        });

        it("returns p = 1 when the samples sit at the mean rank", () => {
            const result = mannWhitneyU([0, 1, 0, 1], [1, 0, 1, 0]);

            expect(result.statistic).toBe(8);
            expect(result.pValue).toBe(1);
        });

        it("orders stronger separation below weaker separation", () => {
            const strong = mannWhitneyU([5, 6, 5, 7, 6, 5, 6, 7, 5, 6], [0, 0, 1, 0, 0, 1, 0, 0, 0, 1]);
            const weak = mannWhitneyU([1, 2, 1, 0, 2, 1, 1, 0, 2, 1], [0, 1, 1, 0, 0, 1, 0, 1, 0, 1]);

            expect(strong.pValue).toBeLessThan(weak.pValue);
        });
    });

    describe("degenerate and invalid input", () => {
        it("throws DegenerateSampleError when every value is identical", () => {
            expect(() => mannWhitneyU([0, 0, 0], [0, 0])).toThrow(DegenerateSampleError);
            expect(() => mannWhitneyU([1], [1])).toThrow(DegenerateSampleError);
        });

        it("rejects empty samples", () => {
            expect(() => mannWhitneyU([], [1, 2])).toThrow(RangeError);
            expect(() => mannWhitneyU([1, 2], [])).toThrow(RangeError);
        });

        it("rejects non-finite values", () => {
            expect(() => mannWhitneyU([1, Number.NaN], [1, 2])).toThrow(RangeError);
            expect(() => mannWhitneyU([1, 2], [Infinity])).toThrow(RangeError);
        });
    });
});

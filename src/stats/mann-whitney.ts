import type { Alternative, RankSumResult } from "../types";
import { DegenerateSampleError } from "../errors";
import { normalSf } from "./normal";

/** Exact null distribution is used when a sample is at most this large and there are no ties */
const EXACT_MAX_SAMPLE_SIZE = 8;

interface RankSummary {
    /** Sum of (average) ranks held by the first sample */
    rankSumA: number;
    /** Sum of t^3 - t over every group of t tied values */
    tieTerm: number;
    hasTies: boolean;
}

function validateSample(sample: readonly number[], name: string): void {
    if (sample.length === 0) {
        throw new RangeError(`${name} is empty`);
    }
    if (!sample.every(Number.isFinite)) {
        throw new RangeError(`${name} contains a non-finite value`);
    }
}

/**
 * Rank the pooled samples, giving tied values the mean of the ranks they span
 */
function rankPooled(sampleA: readonly number[], sampleB: readonly number[]): RankSummary {
    const pooled = [
        ...sampleA.map(value => ({ value, fromA: true })),
        ...sampleB.map(value => ({ value, fromA: false })),
    ].sort((x, y) => x.value - y.value);

    let rankSumA = 0;
    let tieTerm = 0;
    let i = 0;
    while (i < pooled.length) {
        let j = i;
        while (j + 1 < pooled.length && pooled[j + 1]?.value === pooled[i]?.value) {
            j++;
        }
        // Positions i..j share ranks i+1..j+1
        const averageRank = (i + j) / 2 + 1;
        const groupSize = j - i + 1;
        for (let k = i; k <= j; k++) {
            if (pooled[k]?.fromA) rankSumA += averageRank;
        }
        tieTerm += groupSize ** 3 - groupSize;
        i = j + 1;
    }

    return { rankSumA, tieTerm, hasTies: tieTerm > 0 };
}

/**
 * Number of arrangements of n1 + n2 distinct values giving each U in 0..n1*n2.
 * Builds f(i, j, u) = f(i, j - 1, u) + f(i - 1, j, u - j) column by column;
 * additions only, so far-tail counts stay exact up to double precision.
 */
export function exactUCounts(n1: number, n2: number): Float64Array {
    const m = Math.min(n1, n2);
    const n = Math.max(n1, n2);
    const rows: Float64Array[] = [];
    for (let i = 0; i <= m; i++) {
        const row = new Float64Array(m * n + 1);
        row[0] = 1; // j = 0: a single arrangement with U = 0
        rows.push(row);
    }

    for (let j = 1; j <= n; j++) {
        for (let i = 1; i <= m; i++) {
            const row = rows[i];
            const previous = rows[i - 1];
            if (row === undefined || previous === undefined) continue;
            // Descending so row[u] still holds f(i, j - 1, u) when read
            for (let u = i * j; u >= j; u--) {
                row[u] = (row[u] ?? 0) + (previous[u - j] ?? 0);
            }
        }
    }

    return rows[m] ?? new Float64Array([1]);
}

/**
 * P(U >= u) under the null hypothesis with no ties
 */
function exactSf(u: number, n1: number, n2: number): number {
    const counts = exactUCounts(n1, n2);
    let total = 0;
    let tail = 0;
    for (let k = 0; k < counts.length; k++) {
        const c = counts[k] ?? 0;
        total += c;
        if (k >= u) tail += c;
    }
    return tail / total;
}

/**
 * Mann-Whitney U test for two independent samples of possibly unequal size.
 *
 * The returned statistic is U for sampleA. The p-value comes from the exact
 * null distribution when either sample has at most 8 values and no value is
 * tied; otherwise from the normal approximation with tie and continuity
 * corrections.
 */
export function mannWhitneyU(
    sampleA: readonly number[],
    sampleB: readonly number[],
    alternative: Alternative = "two-sided"
): RankSumResult {
    validateSample(sampleA, "sampleA");
    validateSample(sampleB, "sampleB");

    const n1 = sampleA.length;
    const n2 = sampleB.length;
    const { rankSumA, tieTerm, hasTies } = rankPooled(sampleA, sampleB);

    const uA = rankSumA - (n1 * (n1 + 1)) / 2;
    const uB = n1 * n2 - uA;

    let u: number;
    if (alternative === "greater") {
        u = uA;
    } else if (alternative === "less") {
        u = uB;
    } else {
        u = Math.max(uA, uB);
    }

    const useExact = Math.min(n1, n2) <= EXACT_MAX_SAMPLE_SIZE && !hasTies;

    let pValue: number;
    if (useExact) {
        pValue = exactSf(Math.round(u), n1, n2);
    } else {
        const n = n1 + n2;
        const variance = ((n1 * n2) / 12) * ((n + 1) - tieTerm / (n * (n - 1)));
        if (variance <= 0) {
            throw new DegenerateSampleError();
        }
        const mean = (n1 * n2) / 2;
        const z = (u - mean - 0.5) / Math.sqrt(variance);
        pValue = normalSf(z);
    }

    if (alternative === "two-sided") {
        pValue *= 2;
    }

    return {
        statistic: uA,
        pValue: Math.min(Math.max(pValue, 0), 1),
        method: useExact ? "exact" : "asymptotic",
    };
}

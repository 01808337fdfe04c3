import type { DifferenceRanking, DifferenceRecord, TokenSequence } from "../types";
import { countTokens } from "../preprocessing/tokenize";
import { EmptyInputError } from "../errors";
import { compareWords } from "../utils/shared";

/**
 * Relative frequency in A minus relative frequency in B, for every word of
 * the union vocabulary. Values lie in [-1, 1].
 */
export function difference(tokensA: TokenSequence, tokensB: TokenSequence): Map<string, number> {
    if (tokensA.length === 0) throw new EmptyInputError("A");
    if (tokensB.length === 0) throw new EmptyInputError("B");

    const countsA = countTokens(tokensA);
    const countsB = countTokens(tokensB);
    const lenA = tokensA.length;
    const lenB = tokensB.length;

    const diffs = new Map<string, number>();
    for (const [word, count] of countsA) {
        diffs.set(word, count / lenA - (countsB.get(word) ?? 0) / lenB);
    }
    for (const [word, count] of countsB) {
        if (!countsA.has(word)) {
            diffs.set(word, -count / lenB);
        }
    }
    return diffs;
}

/**
 * Does a difference place the word with corpus A?
 * Exact zero goes to A; the significance engine uses the same rule.
 */
export function isCharacteristicOfA(diff: number): boolean {
    return diff <= 0;
}

/**
 * Rank the plain frequency signal: the A side ascending by difference, the
 * B side descending, ties broken by word. Optionally keep only the first topK.
 */
export function rankByDifference(diffs: ReadonlyMap<string, number>, topK?: number): DifferenceRanking {
    const a: DifferenceRecord[] = [];
    const b: DifferenceRecord[] = [];

    for (const [word, diff] of diffs) {
        (isCharacteristicOfA(diff) ? a : b).push({ word, difference: diff });
    }

    a.sort((x, y) => x.difference - y.difference || compareWords(x.word, y.word));
    b.sort((x, y) => y.difference - x.difference || compareWords(x.word, y.word));

    return {
        characteristicOfA: topK === undefined ? a : a.slice(0, topK),
        characteristicOfB: topK === undefined ? b : b.slice(0, topK),
    };
}

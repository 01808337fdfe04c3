import type { CountTable, TokenSequence } from "../types";
import { countTokens } from "../preprocessing/tokenize";

/** Window size used when the caller does not pick one */
export const DEFAULT_CHUNK_LENGTH = 500;

/**
 * Partition tokens into consecutive, non-overlapping windows of chunkLength
 * tokens and reduce each window to a count table. The last window holds the
 * remainder, so a sequence of length L yields ceil(L / chunkLength) chunks.
 */
export function chunk(tokens: TokenSequence, chunkLength: number = DEFAULT_CHUNK_LENGTH): CountTable[] {
    if (!Number.isInteger(chunkLength) || chunkLength < 1) {
        throw new RangeError(`chunkLength must be a positive integer, got ${chunkLength}`);
    }

    const chunks: CountTable[] = [];
    for (let start = 0; start < tokens.length; start += chunkLength) {
        chunks.push(countTokens(tokens.slice(start, start + chunkLength)));
    }
    return chunks;
}

/**
 * Count of a word in each chunk, in chunk order (0 where absent)
 */
export function sampleFor(word: string, chunks: readonly CountTable[]): number[] {
    return chunks.map(table => table.get(word) ?? 0);
}

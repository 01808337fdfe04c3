import { stemmer } from "stemmer";
import type { CountTable, TokenSequence } from "../types";

// Common English stop words, removed only when asked for
const STOP_WORDS = new Set([
    "a", "an", "and", "are", "as", "at", "be", "by", "for", "from",
    "has", "he", "in", "is", "it", "its", "of", "on", "that", "the",
    "to", "was", "were", "will", "with", "this", "but", "they",
    "have", "had", "what", "when", "where", "who", "which", "why", "how",
    "all", "each", "every", "both", "few", "more", "most", "other", "some",
    "such", "no", "nor", "not", "only", "own", "same", "so", "than", "too",
    "very", "can", "just", "should", "now", "or", "if", "then", "else",
    "been", "being", "do", "does", "did", "doing", "would", "could", "might",
    "must", "shall", "may", "about", "above", "after", "again", "against",
    "below", "between", "into", "through", "during", "before", "under",
    "over", "out", "up", "down", "off", "once", "here", "there", "any",
    "your", "you", "we", "our", "us", "i", "me", "my", "myself", "him",
    "her", "them", "their", "his", "she", "itself",
]);

export interface TokenizeOptions {
    lowercase?: boolean;
    stripPunctuation?: boolean;
    removeStopWords?: boolean;
    applyStemming?: boolean;
    minLength?: number;
}

/**
 * Split text into word tokens.
 * Defaults keep every word: no stop-word removal, no stemming.
 */
export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
    const {
        lowercase = true,
        stripPunctuation = true,
        removeStopWords = false,
        applyStemming = false,
        minLength = 1,
    } = options;

    let normalized = lowercase ? text.toLowerCase() : text;
    if (stripPunctuation) {
        // Keep intra-word apostrophes and hyphens ("don't", "well-known")
        normalized = normalized
            .replace(/[^\p{L}\p{M}\p{N}\s'-]/gu, " ")
            .replace(/(^|\s)['-]+|['-]+(?=\s|$)/gu, "$1");
    }

    let tokens = normalized.split(/\s+/).filter(t => t.length >= minLength);

    if (removeStopWords) {
        tokens = tokens.filter(t => !STOP_WORDS.has(t.toLowerCase()));
    }

    if (applyStemming) {
        tokens = tokens.map(stemmer);
    }

    return tokens;
}

/**
 * Build a count table from tokens
 */
export function countTokens(tokens: Iterable<string>): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}

/**
 * Sum count tables into one
 */
export function mergeCounts(tables: readonly CountTable[]): Map<string, number> {
    const merged = new Map<string, number>();
    for (const table of tables) {
        for (const [token, count] of table) {
            merged.set(token, (merged.get(token) ?? 0) + count);
        }
    }
    return merged;
}

/**
 * Distinct tokens of both sequences, in first-seen order (A before B)
 */
export function unionVocabulary(tokensA: TokenSequence, tokensB: TokenSequence): Set<string> {
    return new Set([...tokensA, ...tokensB]);
}

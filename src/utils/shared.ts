/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Sorting utilities
// =============================================================================

/**
 * Code-unit order of two words; independent of locale so output is stable
 * across machines
 */
export function compareWords(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Interface for items that can be sorted by p-value with word tie-breaking
 */
export interface PValued {
    word: string;
    pValue: number;
}

/**
 * Sort items by pValue ascending with deterministic tie-break by word
 * Returns a new sorted array (does not mutate input)
 */
export function sortByPValueAsc<T extends PValued>(items: readonly T[]): T[] {
    return [...items].sort((a, b) => {
        const d = a.pValue - b.pValue;
        if (d !== 0) return d;
        return compareWords(a.word, b.word);
    });
}

// =============================================================================
// Number formatting
// =============================================================================

/**
 * Format a p-value for display: fixed notation down to 1e-3, exponent form below
 */
export function formatPValue(p: number): string {
    if (p === 0) return "0";
    if (p < 0.001) return p.toExponential(2);
    return p.toFixed(4);
}

/**
 * Format a signed frequency difference with an explicit sign
 */
export function formatDifference(diff: number, digits: number = 5): string {
    const fixed = Math.abs(diff).toFixed(digits);
    if (diff > 0) return `+${fixed}`;
    if (diff < 0) return `-${fixed}`;
    return fixed;
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

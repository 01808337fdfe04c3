/** Words and punctuation in document order, as produced by an external tokenizer */
export type TokenSequence = readonly string[];

/** Token -> occurrence count; a missing entry means 0 */
export type CountTable = ReadonlyMap<string, number>;

export type CorpusLabel = "A" | "B";

export type Alternative = "two-sided" | "less" | "greater";

export interface RankSumResult {
    statistic: number;
    pValue: number;
    method: "exact" | "asymptotic";
}

/**
 * Two-sample rank-sum test. Throws DegenerateSampleError when the samples
 * carry no rank information (every pooled value identical).
 */
export type RankSumTest = (
    sampleA: readonly number[],
    sampleB: readonly number[],
    alternative?: Alternative
) => RankSumResult;

export type ScoreStatus =
    | "ok"            // Collaborator returned a usable p-value
    | "degenerate"    // Samples indistinguishable, p-value set to 1
    | "failed";       // Collaborator threw or returned garbage, p-value set to 1

export interface ScoreRecord {
    word: string;
    pValue: number;
    /** U statistic for corpus A, NaN when the test did not produce one */
    statistic: number;
    /** Relative frequency in A minus relative frequency in B */
    difference: number;
    status: ScoreStatus;
}

export interface WordDiagnostic {
    word: string;
    kind: "degenerate_sample" | "collaborator_failure";
    message: string;
}

export interface BurstyAnalysis {
    characteristicOfA: ScoreRecord[];
    characteristicOfB: ScoreRecord[];
    diagnostics: WordDiagnostic[];
    chunkCountA: number;
    chunkCountB: number;
    vocabularySize: number;
}

export interface DifferenceRecord {
    word: string;
    difference: number;
}

export interface DifferenceRanking {
    characteristicOfA: DifferenceRecord[];
    characteristicOfB: DifferenceRecord[];
}

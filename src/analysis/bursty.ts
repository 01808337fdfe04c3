import type {
    BurstyAnalysis,
    CountTable,
    RankSumTest,
    ScoreRecord,
    TokenSequence,
    WordDiagnostic,
} from "../types";
import { chunk, sampleFor, DEFAULT_CHUNK_LENGTH } from "./chunker";
import { difference, isCharacteristicOfA } from "./frequency";
import { mannWhitneyU } from "../stats/mann-whitney";
import { unionVocabulary } from "../preprocessing/tokenize";
import { CollaboratorFailureError, DegenerateSampleError, EmptyInputError } from "../errors";
import { compareWords, sortByPValueAsc } from "../utils/shared";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface AnalyzeOptions {
    chunkLength?: number;
    /** Swap in any conforming two-sample rank-sum test */
    rankSumTest?: RankSumTest;
    /** Frequency differences already computed for the same two corpora */
    differences?: ReadonlyMap<string, number>;
}

interface WordScore {
    pValue: number;
    statistic: number;
    status: ScoreRecord["status"];
    diagnostic?: WordDiagnostic;
}

/**
 * Run the rank-sum test for one word. Never throws: a degenerate sample or a
 * collaborator failure becomes p = 1 plus a diagnostic.
 */
function scoreWord(
    word: string,
    chunksA: readonly CountTable[],
    chunksB: readonly CountTable[],
    test: RankSumTest
): WordScore {
    const sampleA = sampleFor(word, chunksA);
    const sampleB = sampleFor(word, chunksB);

    try {
        const { statistic, pValue } = test(sampleA, sampleB, "two-sided");
        if (!Number.isFinite(pValue) || pValue < 0 || pValue > 1) {
            throw new RangeError(`p-value out of range: ${pValue}`);
        }
        return { pValue, statistic, status: "ok" };
    } catch (err) {
        if (err instanceof DegenerateSampleError) {
            return {
                pValue: 1,
                statistic: Number.NaN,
                status: "degenerate",
                diagnostic: { word, kind: "degenerate_sample", message: err.message },
            };
        }
        const failure = new CollaboratorFailureError(word, err);
        return {
            pValue: 1,
            statistic: Number.NaN,
            status: "failed",
            diagnostic: { word, kind: "collaborator_failure", message: failure.message },
        };
    }
}

/**
 * Find the words that distinguish two corpora, accounting for burstiness.
 *
 * Each corpus is cut into windows of chunkLength tokens; for every word the
 * per-window counts of A and B form two samples compared with a two-sided
 * rank-sum test. Words are then split by the sign of their frequency
 * difference (diff <= 0 to A, diff > 0 to B) and each side is ranked by
 * ascending p-value, ties broken by word.
 *
 * Throws EmptyInputError before any work when either corpus is empty; no
 * other error escapes.
 */
export function analyze(
    tokensA: TokenSequence,
    tokensB: TokenSequence,
    options: AnalyzeOptions = {}
): BurstyAnalysis {
    const { chunkLength = DEFAULT_CHUNK_LENGTH, rankSumTest = mannWhitneyU } = options;

    if (tokensA.length === 0) throw new EmptyInputError("A");
    if (tokensB.length === 0) throw new EmptyInputError("B");

    const chunksA = chunk(tokensA, chunkLength);
    const chunksB = chunk(tokensB, chunkLength);
    const vocabulary = unionVocabulary(tokensA, tokensB);

    // Word-keyed so the loop order carries no meaning; the final sort fixes it
    const scores = new Map<string, WordScore>();
    for (const word of vocabulary) {
        scores.set(word, scoreWord(word, chunksA, chunksB, rankSumTest));
    }

    const diffs = options.differences ?? difference(tokensA, tokensB);

    const groupA: ScoreRecord[] = [];
    const groupB: ScoreRecord[] = [];
    const diagnostics: WordDiagnostic[] = [];

    for (const [word, score] of scores) {
        const diff = diffs.get(word) ?? 0;
        const record: ScoreRecord = {
            word,
            pValue: score.pValue,
            statistic: score.statistic,
            difference: diff,
            status: score.status,
        };
        (isCharacteristicOfA(diff) ? groupA : groupB).push(record);

        if (score.diagnostic) {
            diagnostics.push(score.diagnostic);
            if (score.status === "failed") {
                logger.debug(score.diagnostic.message);
            }
        }
    }

    diagnostics.sort((x, y) => compareWords(x.word, y.word));

    return {
        characteristicOfA: sortByPValueAsc(groupA),
        characteristicOfB: sortByPValueAsc(groupB),
        diagnostics,
        chunkCountA: chunksA.length,
        chunkCountB: chunksB.length,
        vocabularySize: vocabulary.size,
    };
}

/**
 * Keep the first topK records of each side
 */
export function topResults(analysis: BurstyAnalysis, topK: number): BurstyAnalysis {
    return {
        ...analysis,
        characteristicOfA: analysis.characteristicOfA.slice(0, topK),
        characteristicOfB: analysis.characteristicOfB.slice(0, topK),
    };
}

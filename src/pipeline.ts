import type { DifferenceRecord, ScoreRecord, TokenSequence, WordDiagnostic } from "./types";
import { analyze, topResults, type AnalyzeOptions } from "./analysis/bursty";
import { difference, rankByDifference } from "./analysis/frequency";
import { tokenize } from "./preprocessing/tokenize";
import { loadConfig, type AnalysisConfigInput } from "./config";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

export interface ContrastOptions {
    labelA?: string;
    labelB?: string;
    config?: AnalysisConfigInput;
    rankSumTest?: AnalyzeOptions["rankSumTest"];
}

export interface CorpusSide {
    label: string;
    tokenCount: number;
    chunkCount: number;
    /** Most significant words on this side of the split, ascending by p-value */
    significant: ScoreRecord[];
    /** Largest frequency differences on this side of the split */
    frequent: DifferenceRecord[];
}

export interface ContrastReport {
    chunkLength: number;
    topK: number;
    vocabularySize: number;
    a: CorpusSide;
    b: CorpusSide;
    diagnostics: WordDiagnostic[];
}

function contrast(
    tokensA: TokenSequence,
    tokensB: TokenSequence,
    options: ContrastOptions
): ContrastReport {
    const config = loadConfig(options.config);
    const { labelA = "A", labelB = "B" } = options;

    logger.debug(`Comparing ${tokensA.length} tokens (${labelA}) with ${tokensB.length} tokens (${labelB})`);

    const differences = logger.time("Frequency difference", () => difference(tokensA, tokensB));
    const analysis = logger.time("Bursty analysis", () =>
        analyze(tokensA, tokensB, {
            chunkLength: config.chunkLength,
            differences,
            ...(options.rankSumTest !== undefined && { rankSumTest: options.rankSumTest }),
        })
    );
    const top = topResults(analysis, config.topK);
    const byDifference = logger.time("Rank by difference", () => rankByDifference(differences, config.topK));

    if (analysis.diagnostics.length > 0) {
        logger.debug(`${analysis.diagnostics.length} words fell back to p = 1`);
    }

    return {
        chunkLength: config.chunkLength,
        topK: config.topK,
        vocabularySize: analysis.vocabularySize,
        a: {
            label: labelA,
            tokenCount: tokensA.length,
            chunkCount: analysis.chunkCountA,
            significant: top.characteristicOfA,
            frequent: byDifference.characteristicOfA,
        },
        b: {
            label: labelB,
            tokenCount: tokensB.length,
            chunkCount: analysis.chunkCountB,
            significant: top.characteristicOfB,
            frequent: byDifference.characteristicOfB,
        },
        diagnostics: analysis.diagnostics,
    };
}

/**
 * Compare two tokenized corpora: the bursty significance ranking plus the
 * plain frequency-difference ranking, each truncated to topK per side.
 * Stage timings recorded by an earlier run are discarded.
 */
export function compareCorpora(
    tokensA: TokenSequence,
    tokensB: TokenSequence,
    options: ContrastOptions = {}
): ContrastReport {
    logger.clearTimings();
    return contrast(tokensA, tokensB, options);
}

/**
 * Tokenize two raw texts with the configured tokenizer, then compare them
 */
export function compareTexts(textA: string, textB: string, options: ContrastOptions = {}): ContrastReport {
    logger.clearTimings();
    const { tokenizer } = loadConfig(options.config);
    const tokensA = logger.time("Tokenize A", () => tokenize(textA, tokenizer));
    const tokensB = logger.time("Tokenize B", () => tokenize(textB, tokenizer));
    return contrast(tokensA, tokensB, options);
}

export { analyze, topResults, type AnalyzeOptions } from "./analysis/bursty";
export { chunk, sampleFor, DEFAULT_CHUNK_LENGTH } from "./analysis/chunker";
export { difference, rankByDifference, isCharacteristicOfA } from "./analysis/frequency";
export { mannWhitneyU, exactUCounts } from "./stats/mann-whitney";
export { erfc, normalSf } from "./stats/normal";
export { tokenize, countTokens, mergeCounts, unionVocabulary, type TokenizeOptions } from "./preprocessing/tokenize";
export { htmlToText } from "./preprocessing/strip";
export {
    compareCorpora,
    compareTexts,
    type ContrastOptions,
    type ContrastReport,
    type CorpusSide,
} from "./pipeline";
export { formatReport } from "./output/report";
export {
    loadConfig,
    AnalysisConfigSchema,
    TokenizerConfigSchema,
    type AnalysisConfig,
    type AnalysisConfigInput,
} from "./config";
export {
    BurstyKeywordsError,
    EmptyInputError,
    DegenerateSampleError,
    CollaboratorFailureError,
    ConfigError,
    type ErrorCode,
} from "./errors";
export type * from "./types";

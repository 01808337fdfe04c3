import type { CorpusLabel } from "./types";

export type ErrorCode =
    | "EMPTY_INPUT"
    | "DEGENERATE_SAMPLE"
    | "COLLABORATOR_FAILURE"
    | "INVALID_CONFIG";

export class BurstyKeywordsError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Raised before any computation when a corpus has no tokens:
 * relative frequency is undefined for a zero-length corpus
 */
export class EmptyInputError extends BurstyKeywordsError {
    readonly corpus: CorpusLabel;

    constructor(corpus: CorpusLabel) {
        super("EMPTY_INPUT", `Corpus ${corpus} has no tokens`);
        this.corpus = corpus;
    }
}

/** Both samples hold one repeated value, so the rank-sum variance is zero */
export class DegenerateSampleError extends BurstyKeywordsError {
    constructor(message: string = "All numbers are identical in the pooled samples") {
        super("DEGENERATE_SAMPLE", message);
    }
}

export class CollaboratorFailureError extends BurstyKeywordsError {
    readonly word: string;

    constructor(word: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super("COLLABORATOR_FAILURE", `Rank-sum test failed for "${word}": ${detail}`);
        this.word = word;
        this.cause = cause;
    }
}

export class ConfigError extends BurstyKeywordsError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`);
        this.issues = issues;
    }
}

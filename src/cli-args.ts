import type { AnalysisConfigInput } from "./config";

export interface CompareArgs {
    fileA: string;
    fileB: string;
    labelA?: string;
    labelB?: string;
    html: boolean;
    json: boolean;
    timing: boolean;
    debug: boolean;
    config: AnalysisConfigInput;
}

function parseInteger(flag: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new Error(`${flag} expects an integer, got "${value}"`);
    }
    return parsed;
}

/**
 * Parse arguments of the compare command
 */
export function parseCompareArgs(args: string[]): CompareArgs {
    const files: string[] = [];
    const tokenizer: NonNullable<AnalysisConfigInput["tokenizer"]> = {};
    const config: AnalysisConfigInput = { tokenizer };
    const parsed: Omit<CompareArgs, "fileA" | "fileB" | "config"> = {
        html: false,
        json: false,
        timing: false,
        debug: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if (arg === undefined) continue;

        if (arg === "--label-a" && nextArg !== undefined) {
            parsed.labelA = nextArg;
            i++;
        } else if (arg === "--label-b" && nextArg !== undefined) {
            parsed.labelB = nextArg;
            i++;
        } else if (arg === "--chunk" && nextArg !== undefined) {
            config.chunkLength = parseInteger(arg, nextArg);
            i++;
        } else if (arg === "--top" && nextArg !== undefined) {
            config.topK = parseInteger(arg, nextArg);
            i++;
        } else if (arg === "--html") {
            parsed.html = true;
        } else if (arg === "--stem") {
            tokenizer.applyStemming = true;
        } else if (arg === "--stop-words") {
            tokenizer.removeStopWords = true;
        } else if (arg === "--json") {
            parsed.json = true;
        } else if (arg === "--timing" || arg === "-t") {
            parsed.timing = true;
        } else if (arg === "--debug") {
            parsed.debug = true;
        } else if (arg.startsWith("-")) {
            throw new Error(`Unknown option: ${arg}`);
        } else {
            files.push(arg);
        }
    }

    const [fileA, fileB] = files;
    if (fileA === undefined || fileB === undefined || files.length > 2) {
        throw new Error("compare requires exactly two files");
    }

    return { ...parsed, fileA, fileB, config };
}

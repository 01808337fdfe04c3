import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_CHUNK_LENGTH } from "./analysis/chunker";

export const TokenizerConfigSchema = z.object({
    lowercase: z.boolean().default(true),
    stripPunctuation: z.boolean().default(true),
    removeStopWords: z.boolean().default(false),
    applyStemming: z.boolean().default(false),
    minLength: z.number().int().min(1).default(1),
});

export const AnalysisConfigSchema = z.object({
    chunkLength: z.number().int().positive().default(DEFAULT_CHUNK_LENGTH),
    topK: z.number().int().positive().default(10),
    tokenizer: TokenizerConfigSchema.default({}),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

/** Environment variables read by loadConfig */
export const ENV_CHUNK_LENGTH = "BURSTY_CHUNK_LENGTH";
export const ENV_TOP_K = "BURSTY_TOP_K";

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return undefined;
    return Number(raw);
}

/**
 * Resolve the analysis configuration: explicit overrides win over
 * environment variables, which win over defaults
 */
export function loadConfig(
    overrides: AnalysisConfigInput = {},
    env: NodeJS.ProcessEnv = process.env
): AnalysisConfig {
    const chunkLength = readNumber(env, ENV_CHUNK_LENGTH);
    const topK = readNumber(env, ENV_TOP_K);

    const parsed = AnalysisConfigSchema.safeParse({
        ...(chunkLength !== undefined && { chunkLength }),
        ...(topK !== undefined && { topK }),
        ...overrides,
    });

    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
        );
    }
    return parsed.data;
}

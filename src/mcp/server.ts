/**
 * MCP server exposing the corpus comparison as a tool
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { compareTexts } from "../pipeline";
import { formatReport } from "../output/report";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export const COMPARE_TOOL_NAME = "bursty_compare_corpora";

export const compareToolShape = {
    textA: z.string().min(1).describe("Full text of the first corpus"),
    textB: z.string().min(1).describe("Full text of the second corpus"),
    labelA: z.string().optional().describe("Name of the first corpus (default: A)"),
    labelB: z.string().optional().describe("Name of the second corpus (default: B)"),
    chunkLength: z.number().int().positive().optional().describe("Tokens per chunk (default: 500)"),
    topK: z.number().int().positive().optional().describe("Words listed per side (default: 10)"),
};

const compareToolSchema = z.object(compareToolShape);

export type CompareToolArgs = z.infer<typeof compareToolSchema>;

/**
 * Run a comparison for the tool and render it as text.
 * Errors come back as text with isError set, so the client sees why.
 */
export function runCompareTool(args: CompareToolArgs): { content: Array<{ type: "text"; text: string }>; isError?: boolean } {
    try {
        const report = compareTexts(args.textA, args.textB, {
            ...(args.labelA !== undefined && { labelA: args.labelA }),
            ...(args.labelB !== undefined && { labelB: args.labelB }),
            config: {
                ...(args.chunkLength !== undefined && { chunkLength: args.chunkLength }),
                ...(args.topK !== undefined && { topK: args.topK }),
            },
        });
        return { content: [{ type: "text", text: formatReport(report) }] };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`${COMPARE_TOOL_NAME} failed: ${message}`);
        return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
    }
}

export function createServer(): McpServer {
    const server = new McpServer({
        name: "bursty_keywords",
        version: "1.0.0",
    });

    server.tool(
        COMPARE_TOOL_NAME,
        `Compare two bodies of text and list the words most characteristic of each.

Each text is tokenized, cut into chunks of fixed size, and every word's per-chunk counts are compared with a Mann-Whitney rank-sum test, so words that appear in a single burst rank below words used steadily throughout.

RETURNS: For each corpus, the top words ordered by ascending p-value with their relative-frequency difference, plus the words with the largest raw frequency difference.`,
        compareToolShape,
        async (args) => runCompareTool(args)
    );

    return server;
}

/**
 * Start the server on stdio. Info logging is silenced: stdout belongs to the transport.
 */
export async function startServer(): Promise<void> {
    logger.setQuiet(true);
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
}

#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { compareTexts, type ContrastOptions } from "./pipeline";
import { formatReport } from "./output/report";
import { htmlToText } from "./preprocessing/strip";
import { startServer } from "./mcp/server";
import { BurstyKeywordsError } from "./errors";
import { parseCompareArgs } from "./cli-args";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
bursty-keywords - Find the words that distinguish two corpora

Cuts each corpus into fixed-size chunks, compares per-chunk word counts
with a Mann-Whitney rank-sum test, and lists the most significant words
on each side alongside the plain relative-frequency difference.

COMMANDS:
  compare <fileA> <fileB> [options]   Compare two text (or HTML) files
    --label-a <name>     Name shown for the first corpus (default: file name)
    --label-b <name>     Name shown for the second corpus (default: file name)
    --chunk <n>          Tokens per chunk (default: 500, env BURSTY_CHUNK_LENGTH)
    --top <k>            Words listed per side (default: 10, env BURSTY_TOP_K)
    --html               Treat inputs as HTML and extract their text
    --stem               Apply Porter stemming to tokens
    --stop-words         Drop common English stop words
    --json               Print the report as JSON
    --timing, -t         Show stage timing breakdown
    --debug              Show debug information

  mcp                    Start the MCP server (called by MCP clients)
  help, --help           Show this help message

EXAMPLES:
  bursty-keywords compare left.txt right.txt
  bursty-keywords compare a.html b.html --html --label-a Labour --label-b Tory --top 20
  BURSTY_CHUNK_LENGTH=250 bursty-keywords compare a.txt b.txt --json
`;

function readCorpus(filePath: string, html: boolean): string {
    if (!fs.existsSync(filePath)) {
        throw new Error(`File not found: ${filePath}`);
    }
    const content = fs.readFileSync(filePath, "utf8");
    return html ? htmlToText(content) : content;
}

function runCompare(args: string[]): void {
    const parsed = parseCompareArgs(args);

    logger.setDebugEnabled(parsed.debug);
    logger.setQuiet(parsed.json);
    if (parsed.timing) {
        logger.setTimingEnabled(true);
    }

    logger.log(`Reading ${parsed.fileA} and ${parsed.fileB}`);
    const textA = readCorpus(parsed.fileA, parsed.html);
    const textB = readCorpus(parsed.fileB, parsed.html);

    const options: ContrastOptions = {
        labelA: parsed.labelA ?? path.basename(parsed.fileA),
        labelB: parsed.labelB ?? path.basename(parsed.fileB),
        config: parsed.config,
    };
    const report = compareTexts(textA, textB, options);

    if (parsed.timing) {
        logger.printTimings();
    }

    if (parsed.json) {
        console.log(JSON.stringify(report, null, 2));
    } else {
        console.log("\n" + formatReport(report));
    }
}

async function main(): Promise<void> {
    // Filter out standalone "--" which npm run passes through
    const args = process.argv.slice(2).filter((a) => a !== "--");
    const command = args[0];

    switch (command) {
        case "compare":
            runCompare(args.slice(1));
            break;

        case "mcp":
            await startServer();
            break;

        case "help":
        case "--help":
        case "-h":
        case undefined:
            console.log(HELP_TEXT);
            break;

        default:
            logger.error(`Unknown command: ${command}`);
            console.log(HELP_TEXT);
            process.exit(1);
    }
}

main().catch((err: unknown) => {
    if (err instanceof BurstyKeywordsError) {
        logger.error(`${err.code}: ${err.message}`);
    } else {
        logger.error(err instanceof Error ? err.message : String(err));
    }
    process.exit(1);
});

import type { ContrastReport, CorpusSide } from "../pipeline";
import { formatDifference, formatPValue, truncateText } from "../utils/shared";

const RULE = "=".repeat(60);

/**
 * Group A holds words with diff <= 0, group B words with diff > 0; the
 * heading names the rule rather than a corpus
 */
function formatSide(group: string, rule: string, side: CorpusSide, lines: string[]): void {
    lines.push(`--- Group ${group} (diff ${rule}) ---`);
    lines.push(`  ${side.label}: ${side.tokenCount} tokens, ${side.chunkCount} chunks`);

    if (side.significant.length === 0) {
        lines.push("  (no words)");
    }
    for (let i = 0; i < side.significant.length; i++) {
        const record = side.significant[i];
        if (record === undefined) continue;
        const rank = String(i + 1).padStart(3);
        const flag = record.status === "ok" ? "" : ` [${record.status}]`;
        lines.push(
            `${rank}. ${record.word.padEnd(20)} p=${formatPValue(record.pValue).padEnd(9)} diff=${formatDifference(record.difference)}${flag}`
        );
    }

    if (side.frequent.length > 0) {
        lines.push("");
        lines.push(`  By frequency difference: ${side.frequent.map(r => r.word).join(", ")}`);
    }
    lines.push("");
}

/**
 * Format a contrast report for display
 */
export function formatReport(report: ContrastReport): string {
    const lines: string[] = [];

    lines.push(RULE);
    lines.push(`${report.a.label} vs ${report.b.label}`);
    lines.push(`Chunk length: ${report.chunkLength}, vocabulary: ${report.vocabularySize}, top ${report.topK} per side`);
    lines.push(`diff = relative frequency in ${report.a.label} minus relative frequency in ${report.b.label}`);
    lines.push(RULE);
    lines.push("");

    formatSide("A", "<= 0", report.a, lines);
    formatSide("B", "> 0", report.b, lines);

    if (report.diagnostics.length > 0) {
        lines.push(`--- Diagnostics (${report.diagnostics.length}) ---`);
        for (const d of report.diagnostics) {
            lines.push(`  ${d.word}: ${d.kind}: ${truncateText(d.message, 120)}`);
        }
        lines.push("");
    }

    lines.push(RULE);
    return lines.join("\n");
}

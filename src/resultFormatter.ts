export type ConfidenceBand = "excellent" | "good" | "decent" | "weak";

/** A ranked result as shown to a reader. */
export interface FormattableResult {
    text: string;
    score: number;
}

/** Percentage confidence of a score in `[0, 1]`. */
export function confidence(score: number): number {
    return Math.round(score * 100);
}

export function confidenceBand(percent: number): ConfidenceBand {
    if (percent >= 80) return "excellent";
    if (percent >= 60) return "good";
    if (percent >= 40) return "decent";
    return "weak";
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Wraps each case-insensitive occurrence of every query word in `**`.
 * Returns the text unchanged if highlighting fails.
 */
export function highlightQuery(text: string, query: string): string {
    try {
        const words = query.split(/\s+/).filter(word => word.length > 0);
        if (words.length === 0) return text;
        // One alternation, longest first, so a word inside another is not wrapped twice.
        const alternation = [...new Set(words)]
            .sort((a, b) => b.length - a.length)
            .map(escapeRegExp)
            .join("|");
        return text.replace(new RegExp(`(${alternation})`, "gi"), "**$1**");
    } catch (error) {
        console.warn(`Highlighting failed: ${error instanceof Error ? error.message : String(error)}`);
        return text;
    }
}

/** A backtick fence longer than any backtick run inside the text. */
function codeFence(text: string): string {
    const longestRun = (text.match(/`+/g) ?? []).reduce((max, run) => Math.max(max, run.length), 0);
    return "`".repeat(Math.max(3, longestRun + 1));
}

const RULE = "=".repeat(80);
const DIVIDER = "-".repeat(80);

function timestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, "0");
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatExportText(
    results: readonly FormattableResult[],
    query: string,
    fileNames: readonly string[],
    generatedAt: Date = new Date()
): string {
    const lines = [
        RULE,
        "PASSAGE FINDER - SEARCH RESULTS",
        RULE,
        `Query: ${query}`,
        `Results: ${results.length}`,
        `Files: ${fileNames.join(", ")}`,
        `Generated: ${timestamp(generatedAt)}`,
        RULE,
        "",
    ];

    results.forEach((result, i) => {
        lines.push(
            `RESULT ${i + 1}`,
            `Confidence: ${confidence(result.score)}%`,
            `Score: ${result.score.toFixed(4)}`,
            DIVIDER,
            result.text,
            DIVIDER,
            ""
        );
    });

    return lines.join("\n");
}

export function formatExportMarkdown(
    results: readonly FormattableResult[],
    query: string,
    fileNames: readonly string[],
    generatedAt: Date = new Date()
): string {
    const lines = [
        "# Search Results",
        `**Query:** \`${query}\``,
        `**Results:** ${results.length}`,
        `**Files:** ${fileNames.join(", ")}`,
        `**Generated:** ${timestamp(generatedAt)}`,
        "",
    ];

    results.forEach((result, i) => {
        const fence = codeFence(result.text);
        lines.push(
            `## Result ${i + 1}`,
            `- **Confidence:** ${confidence(result.score)}%`,
            `- **Score:** ${result.score.toFixed(4)}`,
            "",
            fence,
            result.text,
            fence,
            ""
        );
    });

    return lines.join("\n");
}

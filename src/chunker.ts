import type { Chunk } from "./chunk.js";
import { validateChunking } from "./finderConfig.js";

const SENTENCE_TERMINALS = new Set([".", "!", "?"]);
/** Fraction of the chunk size a sentence break may shorten a window to. */
const MIN_BREAK_FRACTION = 0.7;
/** Furthest distance, in characters, to look back for a sentence break. */
const MAX_BREAK_LOOKBACK = 50;

/** Collapses every run of whitespace to a single space and trims both ends. */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Splits text into overlapping chunks, preferring to end each chunk just after
 * a sentence-terminal character.
 *
 * Offsets on the returned chunks refer to the whitespace-normalized text, see
 * {@link normalizeWhitespace}.
 * @param text Document text, possibly containing page markers.
 * @param size Target chunk length in characters.
 * @param overlap Characters shared by consecutive windows.
 * @returns Chunks in document order; empty for blank input.
 * @throws InvalidConfigError if size or overlap are out of range.
 */
export function chunkText(text: string, size: number, overlap: number): Chunk[] {
    validateChunking(size, overlap);
    if (!text || !text.trim()) {
        return [];
    }

    const normalized = normalizeWhitespace(text);
    const length = normalized.length;
    const chunks: Chunk[] = [];
    let start = 0;
    let previousEnd = 0;

    while (start < length) {
        let end = Math.min(start + size, length);

        if (end < length) {
            // Breaks at or before the previous end are ignored so `end` strictly increases.
            const floor = Math.max(
                start + Math.floor(size * MIN_BREAK_FRACTION),
                end - MAX_BREAK_LOOKBACK,
                previousEnd - 1
            );
            for (let pos = end; pos > floor; pos--) {
                if (SENTENCE_TERMINALS.has(normalized[pos] ?? "")) {
                    end = pos + 1;
                    break;
                }
            }
        }

        const chunk = normalized.slice(start, end).trim();
        if (chunk) {
            chunks.push({ text: chunk, start, end });
        }

        if (end >= length) {
            break;
        }
        previousEnd = end;
        // A sentence break can pull `end` back far enough that the overlap would
        // rewind past the current start; always move forward.
        start = Math.max(end - overlap, start + 1);
    }

    console.log(`Created ${chunks.length} chunks from ${length} characters (size ${size}, overlap ${overlap}).`);
    return chunks;
}

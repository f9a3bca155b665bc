import { normalizeWhitespace } from "./chunker.js";

export interface PageMarker {
    /** Character offset of the marker in the scanned text. */
    offset: number;
    page: number;
}

export interface EstimatePageOptions {
    /**
     * When the chunk text is not found literally, search the whitespace-normalized
     * full text instead. Chunks are cut from normalized text, so this usually matches.
     */
    normalizedFallback?: boolean;
}

const PAGE_MARKER = /\[PAGE (\d+)\]/g;

/**
 * Finds every `[PAGE n]` marker in reading order.
 * @throws Error if a marker's number cannot be represented as a safe integer.
 */
export function findPageMarkers(text: string): PageMarker[] {
    const markers: PageMarker[] = [];
    for (const match of text.matchAll(PAGE_MARKER)) {
        const page = Number.parseInt(match[1] ?? "", 10);
        if (!Number.isSafeInteger(page)) {
            throw new Error(`Malformed page marker "${match[0]}" at offset ${match.index}.`);
        }
        markers.push({ offset: match.index ?? 0, page });
    }
    return markers;
}

/** Page of the marker interval containing `position`; 1 before the first marker. */
export function pageAt(markers: readonly PageMarker[], position: number): number {
    let page = 1;
    for (const marker of markers) {
        if (marker.offset > position) break;
        page = marker.page;
    }
    return page;
}

function locate(chunkText: string, text: string): number | undefined {
    const markers = findPageMarkers(text);
    if (markers.length === 0) return undefined;
    const position = text.indexOf(chunkText);
    return position < 0 ? undefined : pageAt(markers, position);
}

/**
 * Estimates the source page of a chunk from the page markers in the text it
 * was cut from. Returns 1 whenever the page cannot be determined.
 */
export function estimatePage(chunkText: string, fullText: string, options: EstimatePageOptions = {}): number {
    try {
        const page = locate(chunkText, fullText);
        if (page !== undefined || !options.normalizedFallback) {
            return page ?? 1;
        }
        return locate(chunkText, normalizeWhitespace(fullText)) ?? 1;
    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        console.warn(`Could not estimate page, defaulting to 1: ${errorMessage}`);
        return 1;
    }
}

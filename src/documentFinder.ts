import { chunkText } from "./chunker.js";
import { buildIndex, type ChunkIndex } from "./chunkIndex.js";
import type { LoadedDocument } from "./documentLoader.js";
import type { EmbeddingProvider } from "./embeddingService.js";
import { EmptyQueryError } from "./errors.js";
import { DEFAULT_FINDER_CONFIG, type FinderConfig, validateChunking, validateFinderConfig, validateResultCount } from "./finderConfig.js";
import { HybridRanker, type ScoredResult } from "./hybridRanker.js";
import { estimatePage } from "./pageLocator.js";
import { confidence, confidenceBand, type ConfidenceBand } from "./resultFormatter.js";

/** A search result annotated for display. */
export interface FinderResult extends ScoredResult {
    /** 1-based position in the result list. */
    rank: number;
    confidence: number;
    band: ConfidenceBand;
    /** Estimated source page, 1 when unknown. */
    page: number;
    /** Name of the document the chunk starts in, if it could be located. */
    source?: string;
}

interface DocumentSpan {
    name: string;
    start: number;
    end: number;
}

/**
 * Combines a batch of documents into one searchable text and keeps a hybrid
 * index over it. The index is built lazily and rebuilt from scratch whenever
 * the documents or the chunking parameters change.
 */
export class DocumentFinder {
    private config: FinderConfig;
    private ranker: HybridRanker;
    private fullText = "";
    private spans: DocumentSpan[] = [];
    private index: ChunkIndex | undefined;
    private indexedEmpty = false;
    /** Bumped on every invalidation; a build started under an older value is discarded. */
    private generation = 0;
    private pendingBuild: Promise<void> | undefined;

    constructor(private readonly provider: EmbeddingProvider, config: Partial<FinderConfig> = {}) {
        this.config = { ...DEFAULT_FINDER_CONFIG, ...config };
        validateFinderConfig(this.config);
        this.ranker = new HybridRanker(provider, this.config);
    }

    get text(): string {
        return this.fullText;
    }

    /** Names of the documents that contributed text. */
    get fileNames(): string[] {
        return this.spans.map(span => span.name);
    }

    get currentIndex(): ChunkIndex | undefined {
        return this.index;
    }

    /**
     * Replaces the document set. Documents with no text (failed extraction)
     * are skipped. Each document's text is followed by a newline.
     */
    setDocuments(documents: readonly LoadedDocument[]): void {
        let fullText = "";
        const spans: DocumentSpan[] = [];

        for (const document of documents) {
            if (!document.text) {
                console.warn(`Skipping ${document.name}: no extractable text.`);
                continue;
            }
            spans.push({ name: document.name, start: fullText.length, end: fullText.length + document.text.length });
            fullText += document.text + "\n";
        }

        this.fullText = fullText;
        this.spans = spans;
        this.invalidate();
        console.log(`Using ${fullText.length} chars from ${spans.length} file(s).`);
    }

    /** Changes chunking parameters; the index is dropped only if a value changed. */
    setChunking(chunkSize: number, overlap: number): void {
        validateChunking(chunkSize, overlap);
        if (chunkSize === this.config.chunkSize && overlap === this.config.overlap) {
            return;
        }
        this.config = { ...this.config, chunkSize, overlap };
        this.invalidate();
    }

    /**
     * Returns the current index, building it if needed. Concurrent callers
     * share one build; a build overtaken by a document or chunking change is
     * discarded and the index is built again from the current inputs.
     * @returns undefined when the documents produce no chunks.
     */
    async ensureIndex(): Promise<ChunkIndex | undefined> {
        while (!this.index && !this.indexedEmpty) {
            if (!this.pendingBuild) {
                const build: Promise<void> = this.buildIndexFor(this.generation).finally(() => {
                    if (this.pendingBuild === build) {
                        this.pendingBuild = undefined;
                    }
                });
                this.pendingBuild = build;
            }
            await this.pendingBuild;
        }
        return this.index;
    }

    private async buildIndexFor(generation: number): Promise<void> {
        const chunks = chunkText(this.fullText, this.config.chunkSize, this.config.overlap);
        if (chunks.length === 0) {
            console.warn("No content to index.");
            this.indexedEmpty = true;
            return;
        }

        const index = await buildIndex(chunks, this.provider);
        if (generation !== this.generation) {
            console.log("Documents or chunking changed during indexing; discarding the outdated index.");
            return;
        }
        this.index = index;
        console.log(`Index ready (${chunks.length} chunks).`);
    }

    /**
     * Searches the current documents.
     * @param k Number of results, defaults to the configured result count.
     * @throws EmptyQueryError if the query is blank.
     */
    async search(query: string, k: number = this.config.resultCount): Promise<FinderResult[]> {
        if (!query || !query.trim()) {
            throw new EmptyQueryError();
        }
        validateResultCount(k);

        const index = await this.ensureIndex();
        if (!index) {
            return [];
        }

        const results = await this.ranker.search(query, index, k);
        return results.map((result, i) => {
            const percent = confidence(result.score);
            return {
                ...result,
                rank: i + 1,
                confidence: percent,
                band: confidenceBand(percent),
                page: estimatePage(result.text, this.fullText, { normalizedFallback: true }),
                source: this.sourceOf(result.text),
            };
        });
    }

    private sourceOf(text: string): string | undefined {
        if (this.spans.length === 1) {
            return this.spans[0]?.name;
        }
        const position = this.fullText.indexOf(text);
        if (position < 0) {
            return undefined;
        }
        return this.spans.find(span => position >= span.start && position < span.end)?.name;
    }

    private invalidate(): void {
        this.generation++;
        this.index = undefined;
        this.indexedEmpty = false;
        this.pendingBuild = undefined;
    }
}

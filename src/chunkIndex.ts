import type { Chunk } from "./chunk.js";
import type { EmbeddingProvider } from "./embeddingService.js";
import { EmptyIndexError } from "./errors.js";
import { LexicalIndex } from "./lexicalIndex.js";
import { SemanticIndex } from "./semanticIndex.js";

/**
 * Dense and sparse indexes over one chunk list, aligned by array position.
 * Built once and never mutated; a configuration change means a new index.
 */
export interface ChunkIndex {
    readonly chunks: readonly Chunk[];
    readonly semantic: SemanticIndex;
    readonly lexical: LexicalIndex;
    /** Embedding length fixed at build time. */
    readonly dimensions: number;
    readonly buildTimeMs: number;
}

/**
 * Embeds every chunk and collects its term statistics.
 * @throws EmptyIndexError when `chunks` is empty.
 */
export async function buildIndex(chunks: readonly Chunk[], provider: EmbeddingProvider): Promise<ChunkIndex> {
    if (chunks.length === 0) {
        throw new EmptyIndexError();
    }

    console.log(`Building index for ${chunks.length} chunks...`);
    const startedAt = Date.now();
    const texts = chunks.map(chunk => chunk.text);

    const embeddings = await provider.embedTexts(texts);
    if (embeddings.length !== chunks.length) {
        throw new Error(`Embedding provider returned ${embeddings.length} vectors for ${chunks.length} chunks.`);
    }
    const semantic = SemanticIndex.build(embeddings);
    const lexical = LexicalIndex.build(texts);

    const buildTimeMs = Date.now() - startedAt;
    console.log(`Index built in ${(buildTimeMs / 1000).toFixed(2)}s (${semantic.dimensions} dimensions).`);

    return {
        chunks,
        semantic,
        lexical,
        dimensions: semantic.dimensions,
        buildTimeMs,
    };
}

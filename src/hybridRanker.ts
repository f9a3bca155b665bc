import type { Chunk } from "./chunk.js";
import type { ChunkIndex } from "./chunkIndex.js";
import type { EmbeddingProvider } from "./embeddingService.js";
import { EmptyQueryError } from "./errors.js";
import { DEFAULT_FINDER_CONFIG, validateResultCount, validateWeights } from "./finderConfig.js";
import { tokenize } from "./lexicalIndex.js";

export interface FusionWeights {
    semanticWeight: number;
    lexicalWeight: number;
}

export interface ScoredResult {
    text: string;
    /** Fused, boosted score in `[0, 1]`. */
    score: number;
    /** Position of the chunk in the index. */
    chunkIndex: number;
}

/** Candidate pool size as a multiple of k; the definition boost only applies inside the pool. */
export const CANDIDATE_POOL_FACTOR = 3;
export const DEFINITION_BOOST = 1.3;
/** Results must score strictly above this. */
export const MIN_RELEVANCE = 0.1;

const DEFAULT_WEIGHTS: FusionWeights = {
    semanticWeight: DEFAULT_FINDER_CONFIG.semanticWeight,
    lexicalWeight: DEFAULT_FINDER_CONFIG.lexicalWeight,
};

/**
 * True when the text reads like a definition of the query, e.g. contains
 * "{query} is" or "definition of {query}". Matching is case-insensitive and
 * uses the query verbatim.
 */
export function isDefinitionChunk(text: string, query: string): boolean {
    const haystack = text.toLowerCase();
    const q = query.toLowerCase();
    const patterns = [
        `${q} is`,
        `definition of ${q}`,
        `what is ${q}`,
        `${q} refers to`,
        `${q} means`,
        `${q}:`,
    ];
    return patterns.some(pattern => haystack.includes(pattern));
}

/** Divides every score by the maximum when the maximum is positive. */
export function normalizeByMax(scores: readonly number[]): number[] {
    const max = scores.reduce((acc, score) => Math.max(acc, score), 0);
    return max > 0 ? scores.map(score => score / max) : scores.map(() => 0);
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

interface Candidate {
    text: string;
    chunkIndex: number;
    /** Fused score before clamping; weights summing above 1 can push it past 1. */
    rankScore: number;
}

const byRankThenPosition = (a: Candidate, b: Candidate): number =>
    b.rankScore - a.rankScore || a.chunkIndex - b.chunkIndex;

/**
 * Fuses per-chunk semantic and lexical scores and returns the best `k` chunks.
 * Ordering uses the unclamped fused score; only the reported score is clamped
 * to `[0, 1]`. Equal scores keep chunk order.
 * @param semanticScores Cosine similarity per chunk.
 * @param lexicalScores Raw BM25 score per chunk.
 */
export function rankChunks(
    query: string,
    chunks: readonly Chunk[],
    semanticScores: readonly number[],
    lexicalScores: readonly number[],
    k: number,
    weights: FusionWeights = DEFAULT_WEIGHTS
): ScoredResult[] {
    const lexical = normalizeByMax(lexicalScores);

    const fused: Candidate[] = chunks.map((chunk, i) => ({
        text: chunk.text,
        chunkIndex: i,
        rankScore: weights.semanticWeight * (semanticScores[i] ?? 0) + weights.lexicalWeight * (lexical[i] ?? 0),
    }));

    const candidates = fused.sort(byRankThenPosition).slice(0, k * CANDIDATE_POOL_FACTOR);

    return candidates
        .map(candidate => isDefinitionChunk(candidate.text, query)
            ? { ...candidate, rankScore: Math.max(candidate.rankScore, Math.min(candidate.rankScore * DEFINITION_BOOST, 1)) }
            : candidate)
        .filter(candidate => candidate.rankScore > MIN_RELEVANCE)
        .sort(byRankThenPosition)
        .slice(0, k)
        .map(({ text, chunkIndex, rankScore }) => ({ text, score: clamp01(rankScore), chunkIndex }));
}

/**
 * Hybrid semantic + BM25 search over a built {@link ChunkIndex}.
 * Holds the embedding provider used for queries; it must be the same model
 * that embedded the chunks.
 */
export class HybridRanker {
    private readonly weights: FusionWeights;

    constructor(private readonly provider: EmbeddingProvider, weights: Partial<FusionWeights> = {}) {
        this.weights = { ...DEFAULT_WEIGHTS, ...weights };
        validateWeights(this.weights.semanticWeight, this.weights.lexicalWeight);
    }

    /**
     * @throws EmptyQueryError if the query is blank.
     * @returns At most `k` results by descending score; empty for an empty index.
     */
    async search(query: string, index: ChunkIndex, k: number = DEFAULT_FINDER_CONFIG.resultCount): Promise<ScoredResult[]> {
        if (!query || !query.trim()) {
            throw new EmptyQueryError();
        }
        validateResultCount(k);
        if (index.chunks.length === 0) {
            return [];
        }

        console.log(`Searching: '${query}'`);
        const startedAt = Date.now();

        const [queryVector] = await this.provider.embedTexts([query]);
        if (!queryVector) {
            throw new Error("Embedding provider returned no vector for the query.");
        }
        const semanticScores = index.semantic.similarities(queryVector);
        const lexicalScores = index.lexical.score(tokenize(query));

        const results = rankChunks(query, index.chunks, semanticScores, lexicalScores, k, this.weights);

        console.log(`Found ${results.length} results in ${((Date.now() - startedAt) / 1000).toFixed(3)}s`);
        console.log(`Scores: [${results.map(result => result.score.toFixed(2)).join(", ")}]`);
        return results;
    }
}

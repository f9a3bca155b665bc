import { InvalidConfigError } from "./errors.js";

/**
 * Parameters that control chunking and ranking.
 * Any change to `chunkSize` or `overlap` invalidates a built index.
 */
export interface FinderConfig {
    /** Target chunk length in characters. */
    chunkSize: number;
    /** Characters shared between consecutive chunks. Must be below `chunkSize`. */
    overlap: number;
    /** Number of results returned by a search. */
    resultCount: number;
    /** Weight of the cosine similarity in the fused score. */
    semanticWeight: number;
    /** Weight of the normalized BM25 score in the fused score. */
    lexicalWeight: number;
}

export const DEFAULT_FINDER_CONFIG: FinderConfig = {
    chunkSize: 500,
    overlap: 150,
    resultCount: 5,
    semanticWeight: 0.7,
    lexicalWeight: 0.3,
};

export function validateChunking(chunkSize: number, overlap: number): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new InvalidConfigError(`Chunk size must be a positive integer, got ${chunkSize}.`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new InvalidConfigError(`Overlap must be a non-negative integer, got ${overlap}.`);
    }
    if (overlap >= chunkSize) {
        throw new InvalidConfigError(`Overlap (${overlap}) must be smaller than chunk size (${chunkSize}).`);
    }
}

export function validateResultCount(k: number): void {
    if (!Number.isInteger(k) || k < 1) {
        throw new InvalidConfigError(`Result count must be an integer of at least 1, got ${k}.`);
    }
}

export function validateWeights(semanticWeight: number, lexicalWeight: number): void {
    for (const [name, value] of [["Semantic weight", semanticWeight], ["Lexical weight", lexicalWeight]] as const) {
        if (!Number.isFinite(value) || value < 0) {
            throw new InvalidConfigError(`${name} must be a non-negative number, got ${value}.`);
        }
    }
}

export function validateFinderConfig(config: FinderConfig): void {
    validateChunking(config.chunkSize, config.overlap);
    validateResultCount(config.resultCount);
    validateWeights(config.semanticWeight, config.lexicalWeight);
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const value = Number(raw);
    if (isNaN(value)) {
        throw new InvalidConfigError(`${name} must be a number, got "${raw}".`);
    }
    return value;
}

/**
 * Reads the finder configuration from environment variables, falling back to
 * {@link DEFAULT_FINDER_CONFIG} for anything unset.
 * @throws InvalidConfigError if a variable is not numeric or out of range.
 */
export function loadFinderConfig(env: NodeJS.ProcessEnv = process.env): FinderConfig {
    const config: FinderConfig = {
        chunkSize: readNumber(env, "CHUNK_SIZE", DEFAULT_FINDER_CONFIG.chunkSize),
        overlap: readNumber(env, "CHUNK_OVERLAP", DEFAULT_FINDER_CONFIG.overlap),
        resultCount: readNumber(env, "RESULT_COUNT", DEFAULT_FINDER_CONFIG.resultCount),
        semanticWeight: readNumber(env, "SEMANTIC_WEIGHT", DEFAULT_FINDER_CONFIG.semanticWeight),
        lexicalWeight: readNumber(env, "LEXICAL_WEIGHT", DEFAULT_FINDER_CONFIG.lexicalWeight),
    };
    validateFinderConfig(config);

    if (config.chunkSize < 300 || config.chunkSize > 1500) {
        console.warn(`CHUNK_SIZE ${config.chunkSize} is outside the recommended range 300-1500.`);
    }
    if (config.overlap > 200) {
        console.warn(`CHUNK_OVERLAP ${config.overlap} is above the recommended maximum of 200.`);
    }
    if (config.resultCount > 10) {
        console.warn(`RESULT_COUNT ${config.resultCount} is above the recommended maximum of 10.`);
    }
    return config;
}

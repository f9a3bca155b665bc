export type { Chunk } from "./chunk.js";
export { chunkText, normalizeWhitespace } from "./chunker.js";
export { buildIndex, type ChunkIndex } from "./chunkIndex.js";
export { DocumentFinder, type FinderResult } from "./documentFinder.js";
export { DocumentLoader, type LoadedDocument, type TextExtractor } from "./documentLoader.js";
export { EmbeddingService, type EmbeddingProvider } from "./embeddingService.js";
export { DimensionMismatchError, EmptyIndexError, EmptyQueryError, ExtractionError, InvalidConfigError } from "./errors.js";
export { DEFAULT_FINDER_CONFIG, loadFinderConfig, validateFinderConfig, type FinderConfig } from "./finderConfig.js";
export { HybridRanker, isDefinitionChunk, rankChunks, type FusionWeights, type ScoredResult } from "./hybridRanker.js";
export { LexicalIndex, tokenize } from "./lexicalIndex.js";
export { estimatePage, findPageMarkers } from "./pageLocator.js";
export { confidence, confidenceBand, formatExportMarkdown, formatExportText, highlightQuery } from "./resultFormatter.js";
export { retry } from "./retry.js";
export { SemanticIndex, l2Normalize } from "./semanticIndex.js";

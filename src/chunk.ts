/**
 * Represents a single chunk of text cut from the normalized document text.
 */
export interface Chunk {
  /** The trimmed text content of the chunk. Never empty. */
  text: string;
  /** Start offset of the chunk window in the normalized text (inclusive). */
  start: number;
  /** End offset of the chunk window in the normalized text (exclusive). */
  end: number;
}

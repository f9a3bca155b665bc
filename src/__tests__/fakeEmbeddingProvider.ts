import type { EmbeddingProvider } from "../embeddingService.js";

function fnv1a(word: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Deterministic bag-of-words embeddings: each lowercase alphanumeric word adds
 * one to a hashed bucket. Exact texts can be pinned to fixed vectors.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(
    private readonly dimensions: number = 64,
    private readonly pinned: Record<string, number[]> = {}
  ) {}

  embed(text: string): number[] {
    const pinned = this.pinned[text];
    if (pinned) return [...pinned];

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const bucket = fnv1a(word) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    return vector;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(text => this.embed(text));
  }
}

/** Lowercases text and splits it on whitespace. No stemming, no stop words. */
export function tokenize(text: string): string[] {
    return text.toLowerCase().split(/\s+/).filter(token => token.length > 0);
}

export interface Bm25Options {
    /** Term frequency saturation. */
    k1: number;
    /** Strength of document length normalization, 0 to 1. */
    b: number;
    /** Fraction of the average idf used in place of a negative idf. */
    epsilon: number;
}

export const DEFAULT_BM25_OPTIONS: Bm25Options = {
    k1: 1.5,
    b: 0.75,
    epsilon: 0.25,
};

/**
 * BM25 (Okapi) statistics over a fixed collection of chunks.
 * Each chunk is one document of the corpus; positions match the chunk order.
 */
export class LexicalIndex {
    private readonly idf = new Map<string, number>();
    private readonly averageLength: number;

    private constructor(
        private readonly termFrequencies: Map<string, number>[],
        private readonly lengths: number[],
        private readonly options: Bm25Options
    ) {
        const totalLength = lengths.reduce((sum, length) => sum + length, 0);
        this.averageLength = lengths.length > 0 ? totalLength / lengths.length : 0;
        this.computeIdf();
    }

    /**
     * Tokenizes every chunk text and collects term and document frequencies.
     * @param texts Chunk texts in chunk order.
     */
    static build(texts: readonly string[], options: Partial<Bm25Options> = {}): LexicalIndex {
        const termFrequencies: Map<string, number>[] = [];
        const lengths: number[] = [];

        for (const text of texts) {
            const tokens = tokenize(text);
            const frequencies = new Map<string, number>();
            for (const token of tokens) {
                frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
            }
            termFrequencies.push(frequencies);
            lengths.push(tokens.length);
        }

        return new LexicalIndex(termFrequencies, lengths, { ...DEFAULT_BM25_OPTIONS, ...options });
    }

    get size(): number {
        return this.termFrequencies.length;
    }

    /** Inverse document frequency of a term, or 0 when the term is not in the corpus. */
    idfOf(term: string): number {
        return this.idf.get(term) ?? 0;
    }

    /**
     * Raw BM25 score of every chunk for the given query tokens.
     * Scores are unbounded; repeated query tokens count once per occurrence.
     */
    score(queryTokens: readonly string[]): number[] {
        const { k1, b } = this.options;
        const scores = new Array<number>(this.size).fill(0);

        for (const token of queryTokens) {
            const idf = this.idf.get(token);
            if (idf === undefined) continue;

            for (let i = 0; i < this.size; i++) {
                const tf = this.termFrequencies[i]?.get(token) ?? 0;
                if (tf === 0) continue;
                const length = this.lengths[i] ?? 0;
                const norm = this.averageLength > 0 ? length / this.averageLength : 0;
                scores[i] = (scores[i] ?? 0) + idf * (tf * (k1 + 1)) / (tf + k1 * (1 - b + b * norm));
            }
        }
        return scores;
    }

    private computeIdf(): void {
        const documentFrequency = new Map<string, number>();
        for (const frequencies of this.termFrequencies) {
            for (const term of frequencies.keys()) {
                documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
            }
        }

        const corpusSize = this.termFrequencies.length;
        const negative: string[] = [];
        let idfSum = 0;

        for (const [term, df] of documentFrequency) {
            const idf = Math.log((corpusSize - df + 0.5) / (df + 0.5));
            this.idf.set(term, idf);
            idfSum += idf;
            if (idf < 0) negative.push(term);
        }

        // Terms present in more than half the chunks would score negatively; floor
        // them at a small share of the average idf instead.
        const averageIdf = documentFrequency.size > 0 ? idfSum / documentFrequency.size : 0;
        const floor = this.options.epsilon * averageIdf;
        for (const term of negative) {
            this.idf.set(term, floor);
        }
    }
}

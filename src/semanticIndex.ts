import { DimensionMismatchError } from "./errors.js";

const NORM_EPSILON = 1e-10;

/**
 * Returns a copy of the vector divided by its L2 norm plus a small epsilon,
 * so an all-zero vector stays all-zero instead of producing NaN.
 */
export function l2Normalize(vector: readonly number[]): number[] {
    let sumOfSquares = 0;
    for (const value of vector) sumOfSquares += value * value;
    const divisor = Math.sqrt(sumOfSquares) + NORM_EPSILON;
    return vector.map(value => value / divisor);
}

export function dot(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
    return sum;
}

/**
 * Unit-normalized chunk embeddings. A dot product against a normalized query
 * vector is the cosine similarity.
 */
export class SemanticIndex {
    private constructor(
        private readonly vectors: number[][],
        readonly dimensions: number
    ) {}

    /**
     * @param vectors Embeddings in chunk order, all of the same length.
     * @throws DimensionMismatchError if the vectors differ in length.
     */
    static build(vectors: readonly (readonly number[])[]): SemanticIndex {
        const dimensions = vectors[0]?.length ?? 0;
        const normalized = vectors.map(vector => {
            if (vector.length !== dimensions) {
                throw new DimensionMismatchError(dimensions, vector.length);
            }
            return l2Normalize(vector);
        });
        return new SemanticIndex(normalized, dimensions);
    }

    get size(): number {
        return this.vectors.length;
    }

    /** Cosine similarity of the query embedding against every chunk, in `[-1, 1]`. */
    similarities(queryVector: readonly number[]): number[] {
        if (this.size > 0 && queryVector.length !== this.dimensions) {
            throw new DimensionMismatchError(this.dimensions, queryVector.length);
        }
        const query = l2Normalize(queryVector);
        return this.vectors.map(vector => dot(vector, query));
    }
}

import { APICallError, type EmbeddingModel, embedMany } from "ai";
import { retry, sleep } from "./retry.js";
import type { RetryOptions } from "./retryOptions.js";

/**
 * Turns texts into fixed-length vectors. Implementations must return one
 * vector per input text, in input order, all of the same length.
 */
export interface EmbeddingProvider {
    embedTexts(texts: string[]): Promise<number[][]>;
}

/**
 * Embedding provider backed by an AI SDK embedding model.
 * Handles batching, delays, and retries for API calls.
 */
export class EmbeddingService implements EmbeddingProvider {
    /**
     * @param embeddingModel The AI SDK embedding model instance, loaded once and shared.
     * @param batchSize The number of texts to embed in a single API call.
     * @param apiDelayMs Delay in milliseconds between consecutive batch API calls.
     * @param retryOptions Configuration for retrying failed API calls.
     */
    constructor(
        private embeddingModel: EmbeddingModel<string>,
        private batchSize: number = 96,
        private apiDelayMs: number = 1000,
        private retryOptions: Partial<RetryOptions> = { maxRetries: 3, initialDelay: 1000 }
    ) {
        if (!Number.isInteger(batchSize) || batchSize <= 0) {
            throw new Error(`Embedding batch size must be a positive integer, got ${batchSize}.`);
        }
    }

    /**
     * Generates embeddings for an array of text strings.
     * @returns One embedding vector per text, in input order.
     */
    async embedTexts(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const totalBatches = Math.ceil(texts.length / this.batchSize);
        console.log(`Embedding ${texts.length} texts in ${totalBatches} batch(es) of up to ${this.batchSize}...`);
        const allEmbeddings: number[][] = [];

        for (let i = 0; i < texts.length; i += this.batchSize) {
            const batchTexts = texts.slice(i, i + this.batchSize);
            const batchNumber = Math.floor(i / this.batchSize) + 1;

            try {
                const batchEmbeddings = await retry(async () => {
                    const { embeddings } = await embedMany({
                        model: this.embeddingModel,
                        values: batchTexts,
                    });

                    if (embeddings.length !== batchTexts.length) {
                        throw new Error(`Embedding count mismatch in batch: expected ${batchTexts.length}, got ${embeddings.length}`);
                    }
                    return embeddings;
                }, {
                    shouldRetry: error => !(APICallError.isInstance(error) && !error.isRetryable),
                    ...this.retryOptions,
                    onRetry: (error, attempt) => {
                        console.warn(`Retry attempt ${attempt} for embedding batch ${batchNumber}/${totalBatches}: ${error.message}`);
                    }
                });

                allEmbeddings.push(...batchEmbeddings);
            } catch (error) {
                const errorMessage = error instanceof Error ? error.message : String(error);
                console.error(`Embedding batch ${batchNumber}/${totalBatches} failed: ${errorMessage}. Aborting.`);
                throw error;
            }

            if (this.apiDelayMs > 0 && i + this.batchSize < texts.length) {
                await sleep(this.apiDelayMs);
            }
        }

        if (allEmbeddings.length !== texts.length) {
            throw new Error(`Expected ${texts.length} embeddings, but received ${allEmbeddings.length}.`);
        }
        return allEmbeddings;
    }
}

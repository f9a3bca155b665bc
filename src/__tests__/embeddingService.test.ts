import { APICallError, type EmbeddingModel } from "ai";
import { describe, expect, it } from "vitest";
import { EmbeddingService } from "../embeddingService.js";

type DoEmbed = EmbeddingModel<string>["doEmbed"];

/** In-process embedding model that records the batches it receives. */
function fakeModel(doEmbed?: DoEmbed): { model: EmbeddingModel<string>; batches: string[][] } {
  const batches: string[][] = [];
  const model: EmbeddingModel<string> = {
    specificationVersion: "v1",
    provider: "test",
    modelId: "test-embedding",
    maxEmbeddingsPerCall: 100,
    supportsParallelCalls: false,
    doEmbed: async options => {
      batches.push([...options.values]);
      if (doEmbed) return doEmbed(options);
      return { embeddings: options.values.map(value => [value.length, 1]) };
    },
  };
  return { model, batches };
}

const NO_WAIT = { maxRetries: 3, initialDelay: 0, onRetry: () => {} };

describe("EmbeddingService", () => {
  it("embeds texts in batches, keeping input order", async () => {
    const { model, batches } = fakeModel();
    const service = new EmbeddingService(model, 2, 0, NO_WAIT);

    const embeddings = await service.embedTexts(["a", "bb", "ccc", "dddd", "eeeee"]);

    expect(batches).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
    expect(embeddings).toEqual([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1]]);
  });

  it("returns nothing for no texts without calling the model", async () => {
    const { model, batches } = fakeModel();
    await expect(new EmbeddingService(model, 2, 0, NO_WAIT).embedTexts([])).resolves.toEqual([]);
    expect(batches).toEqual([]);
  });

  it("retries a batch after a transient failure", async () => {
    let failures = 1;
    const { model, batches } = fakeModel(async options => {
      if (failures-- > 0) throw new Error("connection reset");
      return { embeddings: options.values.map(() => [0.5, 0.5]) };
    });

    const embeddings = await new EmbeddingService(model, 10, 0, NO_WAIT).embedTexts(["x"]);

    expect(embeddings).toEqual([[0.5, 0.5]]);
    expect(batches).toHaveLength(2);
  });

  it("does not retry a non-retryable API error", async () => {
    const { model, batches } = fakeModel(async () => {
      throw new APICallError({
        message: "bad request",
        url: "http://localhost/embeddings",
        requestBodyValues: {},
        statusCode: 400,
        isRetryable: false,
      });
    });

    await expect(new EmbeddingService(model, 10, 0, NO_WAIT).embedTexts(["x"])).rejects.toThrow("bad request");
    expect(batches).toHaveLength(1);
  });

  it("fails when the model returns the wrong number of embeddings", async () => {
    const { model } = fakeModel(async () => ({ embeddings: [[1, 0]] }));
    await expect(new EmbeddingService(model, 10, 0, NO_WAIT).embedTexts(["x", "y"]))
      .rejects.toThrow("Embedding count mismatch in batch: expected 2, got 1");
  });

  it("rejects a non-positive batch size", () => {
    const { model } = fakeModel();
    expect(() => new EmbeddingService(model, 0)).toThrow("Embedding batch size must be a positive integer, got 0.");
  });
});

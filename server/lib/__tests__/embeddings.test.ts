import { describe, it, expect } from "@jest/globals";
import { OpenAIEmbedder, type EmbeddingsApi } from "../embeddings";
import { EmbeddingProviderError } from "../errors";

type CreateBody = Parameters<EmbeddingsApi["create"]>[0];
type CreateResult = Awaited<ReturnType<EmbeddingsApi["create"]>>;

class FakeEmbeddingsApi implements EmbeddingsApi {
  bodies: CreateBody[] = [];

  constructor(private readonly respond: (body: CreateBody) => CreateResult | Promise<CreateResult>) {}

  async create(body: CreateBody): Promise<CreateResult> {
    this.bodies.push(body);
    return this.respond(body);
  }
}

/** Vector [position in batch, text length, 0], returned in reverse order. */
function reversed(body: CreateBody): CreateResult {
  return {
    data: body.input.map((text, index) => ({ index, embedding: [index, text.length, 0] })).reverse(),
  };
}

describe("OpenAIEmbedder", () => {
  const options = { apiKey: "test-key", model: "test-model", dimensions: 3, batchSize: 2 };

  it("should split input into batches and keep input order", async () => {
    const api = new FakeEmbeddingsApi(reversed);
    const embedder = new OpenAIEmbedder(options, api);

    const vectors = await embedder.embedBatch(["a", "bb", "ccc"]);

    expect(api.bodies).toEqual([
      { model: "test-model", input: ["a", "bb"], dimensions: 3 },
      { model: "test-model", input: ["ccc"], dimensions: 3 },
    ]);
    expect(vectors).toEqual([
      [0, 1, 0],
      [1, 2, 0],
      [0, 3, 0],
    ]);
  });

  it("should not call the API for empty input", async () => {
    const api = new FakeEmbeddingsApi(reversed);

    expect(await new OpenAIEmbedder(options, api).embedBatch([])).toEqual([]);
    expect(api.bodies).toHaveLength(0);
  });

  it("should fail the whole call when a batch comes back short", async () => {
    const api = new FakeEmbeddingsApi((body) => ({
      data: body.input.length > 1 ? [{ index: 0, embedding: [1, 1, 1] }] : reversed(body).data,
    }));

    await expect(new OpenAIEmbedder(options, api).embedBatch(["a", "b", "c"])).rejects.toThrow(
      new EmbeddingProviderError("Embedding provider returned 1 vectors for 2 inputs"),
    );
  });

  it("should reject vectors of the wrong dimension", async () => {
    const api = new FakeEmbeddingsApi(() => ({ data: [{ index: 0, embedding: [1, 2] }] }));

    await expect(new OpenAIEmbedder(options, api).embedBatch(["a"])).rejects.toThrow(
      "Expected 3-dimensional embeddings, got 2",
    );
  });

  it("should wrap API errors with the batch number", async () => {
    const api = new FakeEmbeddingsApi((body) => {
      if (body.input.includes("c")) throw new Error("rate limited");
      return reversed(body);
    });

    const result = new OpenAIEmbedder(options, api).embedBatch(["a", "b", "c"]);

    await expect(result).rejects.toBeInstanceOf(EmbeddingProviderError);
    await expect(result).rejects.toThrow("Embedding request failed for batch 2: rate limited");
  });

  it("should pass cancellation through unwrapped", async () => {
    const controller = new AbortController();
    const api = new FakeEmbeddingsApi(() => {
      controller.abort();
      const error = new Error("Request was aborted.");
      error.name = "APIUserAbortError";
      throw error;
    });

    await expect(new OpenAIEmbedder(options, api).embedBatch(["a"], controller.signal)).rejects.toMatchObject({
      name: "APIUserAbortError",
    });
  });
});

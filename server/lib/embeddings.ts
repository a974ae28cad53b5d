import OpenAI from "openai";
import { EmbeddingProviderError, errorMessage, isAbortError } from "./errors";
import { createLogger } from "./log";

const logger = createLogger("embeddings");

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  /**
   * Embed `texts` as one logical call. The result lines up with the input
   * positionally; any failed sub-batch fails the whole call.
   */
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}

/** The slice of the OpenAI client this module talks to. */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[]; dimensions?: number },
    options?: { signal?: AbortSignal },
  ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
}

export interface OpenAIEmbedderOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  dimensions?: number;
  batchSize?: number;
  maxRetries?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly batchSize: number;
  private readonly api: EmbeddingsApi;

  constructor(options: OpenAIEmbedderOptions, api?: EmbeddingsApi) {
    this.model = options.model ?? "text-embedding-3-small";
    this.dimensions = options.dimensions ?? 1536;
    this.batchSize = options.batchSize ?? 100;
    this.api =
      api ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        maxRetries: options.maxRetries ?? 3,
      }).embeddings;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];

    // Process in batches to stay under the provider's per-request input limit
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);

      let response: Awaited<ReturnType<EmbeddingsApi["create"]>>;
      try {
        response = await this.api.create(
          { model: this.model, input: batch, dimensions: this.dimensions },
          { signal },
        );
      } catch (error) {
        if (isAbortError(error, signal)) throw error;
        throw new EmbeddingProviderError(
          `Embedding request failed for batch ${i / this.batchSize + 1}: ${errorMessage(error)}`,
          { cause: error },
        );
      }

      if (response.data.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Embedding provider returned ${response.data.length} vectors for ${batch.length} inputs`,
        );
      }

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) {
        if (item.embedding.length !== this.dimensions) {
          throw new EmbeddingProviderError(
            `Expected ${this.dimensions}-dimensional embeddings, got ${item.embedding.length}`,
          );
        }
        vectors.push(item.embedding);
      }
    }

    logger.debug(`Generated ${vectors.length} embeddings with ${this.model}`);
    return vectors;
  }
}

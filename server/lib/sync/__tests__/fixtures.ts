import { createHash } from "crypto";
import type { Embedder } from "../../embeddings";
import { EmbeddingProviderError, throwIfAborted } from "../../errors";
import { TextExtractionService } from "../../extraction/textExtractionService";
import { plainTextExtractor } from "../../extraction/plainText";
import { MemStorage } from "../../../memStorage";
import type { IndexerDeps } from "../types";

/** Deterministic embedder: each vector is derived from the SHA-256 of the text. */
export class HashEmbedder implements Embedder {
  readonly model = "hash-test";
  readonly dimensions = 8;
  calls: string[][] = [];
  failOn: string | null = null;
  beforeEmbed: (() => void) | null = null;

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    this.beforeEmbed?.();
    throwIfAborted(signal);
    this.calls.push([...texts]);
    if (this.failOn !== null) {
      const marker = this.failOn;
      if (texts.some((t) => t.includes(marker))) {
        throw new EmbeddingProviderError("embedding service rejected the batch");
      }
    }
    return texts.map((text) => {
      const digest = createHash("sha256").update(text).digest();
      return Array.from(digest.subarray(0, this.dimensions), (b) => b / 255);
    });
  }
}

export function createTestDeps() {
  const store = new MemStorage();
  const embedder = new HashEmbedder();
  const extraction = new TextExtractionService([plainTextExtractor]);
  const deps: IndexerDeps = { store, embedder, extraction };
  return { store, embedder, extraction, deps };
}

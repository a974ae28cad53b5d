import { describe, it, expect, beforeEach } from "@jest/globals";
import { runIndexer } from "../engine";
import { createSnapshot } from "../../providers/configuration";
import { MemoryProvider } from "../../providers/memory";
import {
  DocumentNotFoundError,
  ProviderUnavailableError,
  StoreUnavailableError,
} from "../../errors";
import { createTestDeps, type HashEmbedder } from "./fixtures";
import type { MemStorage } from "../../../memStorage";
import type { IndexerDeps, IndexerOptions } from "../types";
import { TextExtractionService } from "../../extraction/textExtractionService";
import { plainTextExtractor } from "../../extraction/plainText";
import type { TextExtractor } from "../../extraction/types";

const options: Partial<IndexerOptions> = {
  chunking: { chunkSize: 10, overlap: 0 },
  documentConcurrency: 1,
};

function key(provider: MemoryProvider, docId: string) {
  return { docId, providerType: provider.providerType, providerName: provider.providerName };
}

describe("runIndexer", () => {
  let store: MemStorage;
  let embedder: HashEmbedder;
  let deps: IndexerDeps;
  let provider: MemoryProvider;

  beforeEach(() => {
    ({ store, embedder, deps } = createTestDeps());
    provider = new MemoryProvider("docs");
  });

  it("should index new documents and report counts", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "hello world", etag: "1" })
      .put({ documentId: "b", filename: "b.txt", content: "short", etag: "1" });

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.status).toBe("completed");
    expect(report.exitCode).toBe(0);
    expect(report.providers).toEqual([
      {
        providerType: "memory",
        providerName: "docs",
        listed: 2,
        indexed: 2,
        unchanged: 0,
        notFound: 0,
        removed: 0,
        failed: 0,
        chunks: 3,
      },
    ]);
    expect((await store.getChunks(key(provider, "a"))).map((c) => c.text)).toEqual(["hello worl", "d"]);
    expect((await store.getTrackedDocuments("memory", "docs")).map((t) => t.etag).sort()).toEqual(["1", "1"]);
  });

  it("should skip unchanged documents on the next run", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "hello world", etag: "1" });

    await runIndexer(createSnapshot([provider]), deps, options);
    const callsAfterFirst = embedder.calls.length;
    const downloadsAfterFirst = provider.downloadCalls.length;
    const chunksAfterFirst = store.allChunks().length;
    const second = await runIndexer(createSnapshot([provider]), deps, options);

    expect(second.providers[0]).toMatchObject({ listed: 1, indexed: 0, unchanged: 1, chunks: 0 });
    expect(embedder.calls).toHaveLength(callsAfterFirst);
    expect(provider.downloadCalls).toHaveLength(downloadsAfterFirst);
    expect(chunksAfterFirst).toBe(2);
    expect(store.allChunks()).toHaveLength(chunksAfterFirst);
    expect(await store.getTrackedDocuments("memory", "docs")).toHaveLength(1);
  });

  it("should re-index documents that carry no change markers every run", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "hello" });

    await runIndexer(createSnapshot([provider]), deps, options);
    const second = await runIndexer(createSnapshot([provider]), deps, options);

    expect(second.providers[0]).toMatchObject({ indexed: 1, unchanged: 0 });
  });

  it("should replace the whole chunk set when a document shrinks", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "x".repeat(50), etag: "1" });
    await runIndexer(createSnapshot([provider]), deps, options);
    expect(await store.getChunks(key(provider, "a"))).toHaveLength(5);

    provider.put({ documentId: "a", filename: "a.txt", content: "y".repeat(30), etag: "2" });
    await runIndexer(createSnapshot([provider]), deps, options);

    const chunks = await store.getChunks(key(provider, "a"));
    expect(chunks.map((c) => c.chunkNum)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.text === "y".repeat(10))).toBe(true);
    expect(chunks[2].metadata).toEqual({ etag: "2", relativePath: "a.txt", charStart: 20, charEnd: 30 });
  });

  it("should remove documents that disappeared from the listing", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "keep me", etag: "1" })
      .put({ documentId: "b", filename: "b.txt", content: "delete me", etag: "1" });
    await runIndexer(createSnapshot([provider]), deps, options);

    provider.remove("b");
    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.providers[0]).toMatchObject({ removed: 1, unchanged: 1 });
    expect(await store.getChunks(key(provider, "b"))).toEqual([]);
    expect((await store.getTrackedDocuments("memory", "docs")).map((t) => t.docId)).toEqual(["a"]);
  });

  it("should keep orphans when cleanup is disabled", async () => {
    provider.put({ documentId: "b", filename: "b.txt", content: "delete me", etag: "1" });
    await runIndexer(createSnapshot([provider]), deps, options);

    provider.remove("b");
    const report = await runIndexer(createSnapshot([provider]), deps, { ...options, cleanupOrphans: false });

    expect(report.providers[0].removed).toBe(0);
    expect(await store.getChunks(key(provider, "b"))).toHaveLength(1);
  });

  it("should isolate a failing document and keep its previous state", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "first version", etag: "1" })
      .put({ documentId: "b", filename: "b.txt", content: "other", etag: "1" });
    await runIndexer(createSnapshot([provider]), deps, options);
    const before = await store.getChunks(key(provider, "a"));

    provider
      .put({ documentId: "a", filename: "a.txt", content: "second version", etag: "2" })
      .put({ documentId: "b", filename: "b.txt", content: "other, edited", etag: "2" })
      .failDownload("a", new ProviderUnavailableError("connection reset"));
    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.exitCode).toBe(0);
    expect(report.providers[0]).toMatchObject({ indexed: 1, failed: 1 });
    expect(report.failures).toEqual([
      {
        providerType: "memory",
        providerName: "docs",
        documentId: "a",
        filename: "a.txt",
        stage: "download",
        kind: "provider_unavailable",
        message: "connection reset",
      },
    ]);
    expect(await store.getChunks(key(provider, "a"))).toEqual(before);
    const tracked = await store.getTrackedDocuments("memory", "docs");
    expect(tracked.find((t) => t.docId === "a")?.etag).toBe("1");
    expect(tracked.find((t) => t.docId === "b")?.etag).toBe("2");
  });

  it("should isolate an extraction failure between two healthy documents", async () => {
    const broken: TextExtractor = {
      name: "broken",
      supportedExtensions: [".bad"],
      async extractText() {
        throw new Error("corrupt file");
      },
    };
    const isolated: IndexerDeps = {
      ...deps,
      extraction: new TextExtractionService([plainTextExtractor, broken]),
    };
    provider
      .put({ documentId: "a", filename: "a.txt", content: "first", etag: "1" })
      .put({ documentId: "b", filename: "b.bad", content: "second", etag: "1" })
      .put({ documentId: "c", filename: "c.txt", content: "third", etag: "1" });

    const report = await runIndexer(createSnapshot([provider]), isolated, options);

    expect(report.status).toBe("completed");
    expect(report.providers[0]).toMatchObject({ listed: 3, indexed: 2, failed: 1 });
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ documentId: "b", stage: "extract", kind: "extraction_failed" });
    expect((await store.getChunks(key(provider, "a"))).map((c) => c.text)).toEqual(["first"]);
    expect((await store.getChunks(key(provider, "c"))).map((c) => c.text)).toEqual(["third"]);
    expect((await store.getTrackedDocuments("memory", "docs")).map((t) => t.docId).sort()).toEqual(["a", "c"]);
  });

  it("should fail the run when the chunking settings are invalid", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "hello", etag: "1" })
      .put({ documentId: "b", filename: "b.txt", content: "world", etag: "1" });

    const report = await runIndexer(createSnapshot([provider]), deps, {
      ...options,
      chunking: { chunkSize: 10, overlap: 10 },
    });

    expect(report.status).toBe("failed");
    expect(report.exitCode).toBe(1);
    expect(report.error).toBe("Overlap (10) must be less than chunk size (10)");
    expect(report.failures).toEqual([]);
    expect(provider.listCalls).toBe(0);
    expect(store.allChunks()).toEqual([]);
  });

  it("should retry a failed document on the next run", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" })
      .failDownload("a", new ProviderUnavailableError("timeout"));
    await runIndexer(createSnapshot([provider]), deps, options);

    provider.clearFailures();
    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.providers[0]).toMatchObject({ indexed: 1, failed: 0 });
  });

  it("should record embedding failures at the embed stage", async () => {
    embedder.failOn = "POISON";
    provider
      .put({ documentId: "a", filename: "a.txt", content: "POISON", etag: "1" })
      .put({ documentId: "b", filename: "b.txt", content: "fine", etag: "1" });

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.failures.map((f) => [f.documentId, f.stage, f.kind])).toEqual([
      ["a", "embed", "embedding_provider_error"],
    ]);
    expect(report.providers[0].indexed).toBe(1);
  });

  it("should record unsupported formats at the extract stage", async () => {
    provider.put({ documentId: "img", filename: "photo.bin", content: "binary", etag: "1" });

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({
      stage: "extract",
      kind: "unsupported_format",
      message: "Unsupported file type: .bin (photo.bin)",
    });
  });

  it("should count documents that vanished before download as not found", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" })
      .failDownload("a", new DocumentNotFoundError("a"));

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.providers[0]).toMatchObject({ notFound: 1, failed: 0, indexed: 0 });
    expect(report.failures).toEqual([]);
  });

  it("should track empty documents with zero chunks", async () => {
    provider.put({ documentId: "e", filename: "empty.txt", content: "   \n ", etag: "1" });

    const first = await runIndexer(createSnapshot([provider]), deps, options);
    const second = await runIndexer(createSnapshot([provider]), deps, options);

    expect(first.providers[0]).toMatchObject({ indexed: 1, chunks: 0 });
    expect(second.providers[0]).toMatchObject({ unchanged: 1, indexed: 0 });
    expect(embedder.calls).toEqual([]);
  });

  it("should continue with the next provider when one fails to list", async () => {
    const broken = new MemoryProvider("broken").failListing(new ProviderUnavailableError("bucket unreachable"));
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });

    const report = await runIndexer(createSnapshot([broken, provider]), deps, options);

    expect(report.exitCode).toBe(0);
    expect(report.providers[0]).toMatchObject({ providerName: "broken", error: "bucket unreachable" });
    expect(report.providers[1]).toMatchObject({ providerName: "docs", indexed: 1 });
  });

  it("should not touch tracked state of a provider whose listing failed", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });
    await runIndexer(createSnapshot([provider]), deps, options);

    provider.failListing(new ProviderUnavailableError("down"));
    await runIndexer(createSnapshot([provider]), deps, options);

    expect(await store.getTrackedDocuments("memory", "docs")).toHaveLength(1);
  });

  it("should stop with exit code 1 when the store is unreachable", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });
    store.failWith = new StoreUnavailableError("connection refused");

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.status).toBe("failed");
    expect(report.exitCode).toBe(1);
    expect(report.error).toBe("connection refused");
  });

  it("should report cancellation with exit code 130 when aborted before start", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });
    const controller = new AbortController();
    controller.abort();

    const report = await runIndexer(createSnapshot([provider]), deps, options, controller.signal);

    expect(report.status).toBe("cancelled");
    expect(report.exitCode).toBe(130);
    expect(report.providers).toEqual([]);
  });

  it("should not count documents aborted mid-flight as failures", async () => {
    provider
      .put({ documentId: "a", filename: "a.txt", content: "first", etag: "1" })
      .put({ documentId: "b", filename: "b.txt", content: "second", etag: "1" });
    const controller = new AbortController();
    embedder.beforeEmbed = () => controller.abort();

    const report = await runIndexer(createSnapshot([provider]), deps, options, controller.signal);

    expect(report.exitCode).toBe(130);
    expect(report.providers[0]).toMatchObject({ indexed: 0, failed: 0 });
    expect(provider.downloadCalls).toEqual(["a"]);
    expect(await store.getTrackedDocuments("memory", "docs")).toEqual([]);
  });

  it("should complete with no enabled providers", async () => {
    provider.enabled = false;

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report).toMatchObject({ status: "completed", exitCode: 0, providers: [] });
    expect(provider.listCalls).toBe(0);
  });

  it("should cap the number of indexed documents with maxFiles", async () => {
    for (const id of ["a", "b", "c"]) {
      provider.put({ documentId: id, filename: `${id}.txt`, content: id, etag: "1" });
    }

    const report = await runIndexer(createSnapshot([provider]), deps, { ...options, maxFiles: 2 });

    expect(report.providers[0]).toMatchObject({ listed: 3, indexed: 2 });
  });

  it("should re-index everything when a full reindex is forced", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });
    await runIndexer(createSnapshot([provider]), deps, options);

    const report = await runIndexer(createSnapshot([provider]), deps, { ...options, forceFullReindex: true });

    expect(report.providers[0]).toMatchObject({ indexed: 1, unchanged: 0 });
  });

  it("should collapse duplicate ids in a listing", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });
    const [doc] = await provider.listDocuments();
    provider.overrideListing([doc, doc]);

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    expect(report.providers[0]).toMatchObject({ listed: 1, indexed: 1 });
    expect(provider.downloadCalls).toEqual(["a"]);
  });

  it("should persist the run report and stamp the provider", async () => {
    provider.put({ documentId: "a", filename: "a.txt", content: "content", etag: "1" });

    const report = await runIndexer(createSnapshot([provider]), deps, options);

    const [run] = await store.getRecentRuns(1);
    expect(run).toMatchObject({ id: report.runId, status: "completed", exitCode: 0 });
    const [registered] = await store.getProviders();
    expect(registered.lastSyncAt).toBeInstanceOf(Date);
  });
});

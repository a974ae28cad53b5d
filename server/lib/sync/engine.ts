import { randomUUID } from "crypto";
import type { ConfigurationSnapshot } from "../providers/configuration";
import type { DocumentProvider, ProviderDocument } from "../providers/types";
import type { ChunkWrite, DocumentKey } from "../../storage";
import { assertChunkingOptions, chunkText, estimateTokens } from "../chunker";
import { diffDocuments } from "./diff";
import { runPool } from "./pool";
import {
  DocumentNotFoundError,
  IndexerError,
  StoreUnavailableError,
  errorMessage,
  isAbortError,
  throwIfAborted,
} from "../errors";
import { createLogger } from "../log";
import {
  DEFAULT_INDEXER_OPTIONS,
  EXIT_CODES,
  type DocumentFailure,
  type FailureStage,
  type IndexRunReport,
  type IndexerDeps,
  type IndexerOptions,
  type ProviderRunSummary,
  type RunStatus,
  type RunTotals,
} from "./types";

const logger = createLogger("sync");

interface RunContext {
  deps: IndexerDeps;
  options: IndexerOptions;
  signal?: AbortSignal;
  failures: DocumentFailure[];
}

function emptySummary(provider: DocumentProvider): ProviderRunSummary {
  return {
    providerType: provider.providerType,
    providerName: provider.providerName,
    listed: 0,
    indexed: 0,
    unchanged: 0,
    notFound: 0,
    removed: 0,
    failed: 0,
    chunks: 0,
  };
}

function totalsOf(summaries: ProviderRunSummary[]): RunTotals {
  const totals: RunTotals = {
    providers: summaries.length,
    listed: 0,
    indexed: 0,
    unchanged: 0,
    notFound: 0,
    removed: 0,
    failed: 0,
    chunks: 0,
  };
  for (const s of summaries) {
    totals.listed += s.listed;
    totals.indexed += s.indexed;
    totals.unchanged += s.unchanged;
    totals.notFound += s.notFound;
    totals.removed += s.removed;
    totals.failed += s.failed;
    totals.chunks += s.chunks;
  }
  return totals;
}

function keyOf(doc: ProviderDocument): DocumentKey {
  return { docId: doc.documentId, providerType: doc.providerType, providerName: doc.providerName };
}

function recordFailure(
  ctx: RunContext,
  summary: ProviderRunSummary,
  doc: { documentId: string; filename: string },
  stage: FailureStage,
  error: unknown,
) {
  summary.failed++;
  ctx.failures.push({
    providerType: summary.providerType,
    providerName: summary.providerName,
    documentId: doc.documentId,
    filename: doc.filename,
    stage,
    kind: error instanceof IndexerError ? error.kind : "unknown",
    message: errorMessage(error),
  });
  logger.error(
    `Failed to process ${doc.filename} (${doc.documentId}) from ${summary.providerType}/${summary.providerName} at stage '${stage}'`,
    error,
  );
}

/**
 * Download, extract, chunk, embed and store one document. Errors are
 * recorded against the document and never escape, except the ones that
 * end the run: cancellation and an unreachable store.
 */
async function processDocument(
  ctx: RunContext,
  provider: DocumentProvider,
  doc: ProviderDocument,
  summary: ProviderRunSummary,
): Promise<void> {
  const { store, embedder, extraction } = ctx.deps;
  const { signal } = ctx;
  let stage: FailureStage = "download";

  try {
    throwIfAborted(signal);
    const stream = await provider.downloadDocument(doc.documentId, signal);

    stage = "extract";
    const text = await extraction.extract(stream, doc.filename, signal);

    stage = "chunk";
    const chunks = Array.from(chunkText(text, ctx.options.chunking));

    stage = "embed";
    const embeddings = chunks.length > 0 ? await embedder.embedBatch(chunks.map((c) => c.text), signal) : [];

    stage = "store";
    throwIfAborted(signal);
    const lastModified = doc.lastModified?.toISOString();
    const writes: ChunkWrite[] = chunks.map((chunk, i) => ({
      chunkNum: chunk.chunkNum,
      text: chunk.text,
      charStart: chunk.charStart,
      charEnd: chunk.charEnd,
      tokenEstimate: estimateTokens(chunk.text),
      embedding: embeddings[i],
      metadata: {
        etag: doc.etag,
        lastModified,
        relativePath: doc.relativePath,
        mimeType: doc.mimeType,
        charStart: chunk.charStart,
        charEnd: chunk.charEnd,
      },
    }));

    await store.upsertChunks(keyOf(doc), doc.filename, writes);
    await store.upsertTracking({
      ...keyOf(doc),
      filename: doc.filename,
      etag: doc.etag ?? null,
      lastModified: doc.lastModified ?? null,
      relativePath: doc.relativePath ?? null,
      indexedAt: new Date(),
    });

    summary.indexed++;
    summary.chunks += writes.length;
    logger.info(`Indexed ${doc.filename} from ${summary.providerType}/${summary.providerName}: ${writes.length} chunks`);
  } catch (error) {
    if (isAbortError(error, signal)) return;
    if (error instanceof StoreUnavailableError) throw error;
    if (error instanceof DocumentNotFoundError) {
      summary.notFound++;
      logger.warn(`Document ${doc.filename} (${doc.documentId}) disappeared before download, skipping`);
      return;
    }
    recordFailure(ctx, summary, doc, stage, error);
  }
}

async function removeOrphans(
  ctx: RunContext,
  orphans: { docId: string; filename: string; providerType: string; providerName: string }[],
  summary: ProviderRunSummary,
) {
  const { store } = ctx.deps;
  for (const orphan of orphans) {
    throwIfAborted(ctx.signal);
    try {
      await store.deleteChunks(orphan);
      await store.deleteTracking(orphan);
      summary.removed++;
      logger.info(`Removed ${orphan.filename} (${orphan.docId}), no longer present in ${summary.providerName}`);
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      recordFailure(ctx, summary, { documentId: orphan.docId, filename: orphan.filename }, "cleanup", error);
    }
  }
}

async function syncProvider(ctx: RunContext, provider: DocumentProvider, summary: ProviderRunSummary) {
  const { store } = ctx.deps;
  const { options, signal } = ctx;
  const label = `${provider.providerType}/${provider.providerName}`;

  try {
    const metadata = await provider.getMetadata(signal);
    await store.registerProvider(metadata);

    if (options.forceFullReindex) {
      const removed = await store.deleteAllProviderDocuments(provider.providerType, provider.providerName);
      logger.info(`Full reindex requested for ${label}: cleared ${removed} tracked documents`);
    }

    const remote = await provider.listDocuments(signal);
    const tracked = await store.getTrackedDocuments(provider.providerType, provider.providerName);
    const plan = diffDocuments(remote, tracked);

    for (const id of plan.duplicates) {
      logger.warn(`Duplicate document id ${id} in listing from ${label}, keeping the first`);
    }

    summary.listed = plan.toIndex.length + plan.unchanged.length;
    summary.unchanged = plan.unchanged.length;

    let toIndex = plan.toIndex;
    if (options.maxFiles !== undefined && toIndex.length > options.maxFiles) {
      logger.info(`Limiting ${label} to ${options.maxFiles} of ${toIndex.length} changed documents`);
      toIndex = toIndex.slice(0, options.maxFiles);
    }

    logger.info(
      `${label}: ${summary.listed} listed, ${toIndex.length} to index, ${plan.unchanged.length} unchanged, ${plan.toRemove.length} orphaned`,
    );

    await runPool(toIndex, options.documentConcurrency, (doc) => processDocument(ctx, provider, doc, summary), signal);
    throwIfAborted(signal);

    if (options.cleanupOrphans) {
      await removeOrphans(ctx, plan.toRemove, summary);
    }

    await store.markProviderSynced(provider.providerType, provider.providerName, new Date());
  } catch (error) {
    if (isAbortError(error, signal)) throw error;
    if (error instanceof StoreUnavailableError) throw error;
    summary.error = errorMessage(error);
    logger.error(`Provider ${label} failed`, error);
  }
}

/**
 * One indexing pass over every enabled provider in the snapshot. Providers
 * run one after another; documents inside a provider go through a bounded
 * pool. The report is persisted before returning.
 */
export async function runIndexer(
  snapshot: Pick<ConfigurationSnapshot, "providers">,
  deps: IndexerDeps,
  options: Partial<IndexerOptions> & { runId?: string } = {},
  signal?: AbortSignal,
): Promise<IndexRunReport> {
  const { runId = randomUUID(), ...indexerOptions } = options;
  const startedAt = new Date();
  const ctx: RunContext = {
    deps,
    options: { ...DEFAULT_INDEXER_OPTIONS, ...indexerOptions },
    signal,
    failures: [],
  };
  const summaries: ProviderRunSummary[] = [];
  let fatal: unknown = null;

  const enabled = snapshot.providers.filter((p) => p.enabled);
  logger.info(`Run ${runId} starting with ${enabled.length} enabled provider(s)`);

  try {
    // Bad chunking settings would fail every document; end the run instead
    assertChunkingOptions(ctx.options.chunking);
    for (const { provider } of enabled) {
      if (signal?.aborted) break;
      const summary = emptySummary(provider);
      summaries.push(summary);
      await syncProvider(ctx, provider, summary);
    }
  } catch (error) {
    if (!isAbortError(error, signal)) {
      fatal = error;
      logger.error(`Run ${runId} aborted by fatal error`, error);
    }
  }

  const status: RunStatus = fatal ? "failed" : signal?.aborted ? "cancelled" : "completed";
  const finishedAt = new Date();
  const report: IndexRunReport = {
    runId,
    startedAt,
    finishedAt,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    status,
    exitCode: EXIT_CODES[status],
    providers: summaries,
    totals: totalsOf(summaries),
    failures: ctx.failures,
    ...(fatal ? { error: errorMessage(fatal) } : {}),
  };

  const t = report.totals;
  logger.info(
    `Run ${runId} ${status} in ${report.durationMs}ms: ${t.indexed} indexed, ${t.unchanged} unchanged, ` +
      `${t.removed} removed, ${t.notFound} not found, ${t.failed} failed, ${t.chunks} chunks`,
  );

  try {
    await deps.store.recordRun({
      id: runId,
      status,
      exitCode: report.exitCode,
      startedAt,
      finishedAt,
      durationMs: report.durationMs,
      reportJson: report,
      error: report.error ?? null,
    });
  } catch (error) {
    logger.error(`Failed to persist report for run ${runId}`, error);
  }

  return report;
}

/** Report for a run that could not start, e.g. because provider settings failed to load. */
export function failedRunReport(runId: string, startedAt: Date, error: unknown): IndexRunReport {
  const finishedAt = new Date();
  return {
    runId,
    startedAt,
    finishedAt,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    status: "failed",
    exitCode: EXIT_CODES.failed,
    providers: [],
    totals: totalsOf([]),
    failures: [],
    error: errorMessage(error),
  };
}

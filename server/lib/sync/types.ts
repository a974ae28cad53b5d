import type { IndexerErrorKind } from "../errors";
import type { IStorage } from "../../storage";
import type { Embedder } from "../embeddings";
import type { TextExtractionService } from "../extraction/textExtractionService";
import type { ChunkingOptions } from "../chunker";

export type RunStatus = "completed" | "failed" | "cancelled";

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  cancelled: 130,
} as const satisfies Record<RunStatus, number>;

export type FailureStage = "list" | "download" | "extract" | "chunk" | "embed" | "store" | "cleanup";

export interface DocumentFailure {
  providerType: string;
  providerName: string;
  documentId: string;
  filename: string;
  stage: FailureStage;
  kind: IndexerErrorKind | "unknown";
  message: string;
}

export interface ProviderRunSummary {
  providerType: string;
  providerName: string;
  listed: number;
  indexed: number;
  unchanged: number;
  notFound: number;
  removed: number;
  failed: number;
  chunks: number;
  /** Set when the provider pass itself failed (listing, tracked state). */
  error?: string;
}

export interface RunTotals {
  providers: number;
  listed: number;
  indexed: number;
  unchanged: number;
  notFound: number;
  removed: number;
  failed: number;
  chunks: number;
}

export interface IndexRunReport {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  status: RunStatus;
  exitCode: number;
  providers: ProviderRunSummary[];
  totals: RunTotals;
  failures: DocumentFailure[];
  /** Message of the fatal error, when status is "failed". */
  error?: string;
}

export interface IndexerOptions {
  chunking: ChunkingOptions;
  documentConcurrency: number;
  maxFiles?: number;
  forceFullReindex: boolean;
  cleanupOrphans: boolean;
}

export const DEFAULT_INDEXER_OPTIONS: IndexerOptions = {
  chunking: { chunkSize: 1000, overlap: 200 },
  documentConcurrency: 2,
  forceFullReindex: false,
  cleanupOrphans: true,
};

export interface IndexerDeps {
  store: IStorage;
  embedder: Embedder;
  extraction: TextExtractionService;
}

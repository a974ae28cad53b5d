import { and, desc, eq, gte, sql } from "drizzle-orm";
import {
  docsChunks,
  docsFiles,
  indexerRuns,
  providers,
  providerSettings,
  type ChunkMetadata,
  type DocsChunk,
  type DocsFile,
  type IndexerRunRecord,
  type InsertDocsFile,
  type InsertIndexerRun,
  type ProviderRecord,
  type ProviderSettingsRecord,
} from "@shared/schema";
import type { Database } from "./db";
import type { ProviderMetadata } from "./lib/providers/types";
import { StoreError, StoreUnavailableError, errorCode, errorMessage } from "./lib/errors";
import { createLogger } from "./lib/log";

const logger = createLogger("storage");

export interface DocumentKey {
  docId: string;
  providerType: string;
  providerName: string;
}

export interface ChunkWrite {
  chunkNum: number;
  text: string;
  charStart: number;
  charEnd: number;
  tokenEstimate: number;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface ProviderSettingsStore {
  listProviderSettings(): Promise<ProviderSettingsRecord[]>;
  getProviderSettings(providerType: string, providerName: string): Promise<ProviderSettingsRecord | undefined>;
  upsertProviderSettings(providerType: string, providerName: string, settings: Record<string, unknown>): Promise<ProviderSettingsRecord>;
  /** Inserts unless a row with the same key exists. Returns whether a row was written. */
  insertProviderSettingsIfMissing(providerType: string, providerName: string, settings: Record<string, unknown>): Promise<boolean>;
  deleteProviderSettings(providerType: string, providerName: string): Promise<boolean>;
}

export interface IStorage extends ProviderSettingsStore {
  // Tracking
  getTrackedDocuments(providerType: string, providerName: string): Promise<DocsFile[]>;
  upsertTracking(record: InsertDocsFile): Promise<void>;
  deleteTracking(key: DocumentKey): Promise<void>;

  // Chunks
  /** Replaces the document's whole chunk set in one transaction. */
  upsertChunks(key: DocumentKey, filename: string, chunks: ChunkWrite[]): Promise<void>;
  getChunks(key: DocumentKey): Promise<DocsChunk[]>;
  deleteChunks(key: DocumentKey): Promise<void>;
  deleteAllProviderDocuments(providerType: string, providerName: string): Promise<number>;

  // Providers
  registerProvider(metadata: ProviderMetadata): Promise<void>;
  markProviderSynced(providerType: string, providerName: string, at: Date): Promise<void>;
  getProviders(): Promise<ProviderRecord[]>;

  // Runs
  recordRun(run: InsertIndexerRun): Promise<IndexerRunRecord>;
  getRecentRuns(limit?: number): Promise<IndexerRunRecord[]>;
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57P03", // cannot_connect_now
  "53300", // too_many_connections
]);

/** True for failures where the database itself is unreachable, not a single bad statement. */
export function isConnectionError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; current && depth < 5; depth++) {
    const code = errorCode(current);
    if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) return true;
    if (current instanceof Error && /connection terminated|connection refused/i.test(current.message)) return true;
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

export function toStoreError(operation: string, error: unknown): StoreError | StoreUnavailableError {
  if (error instanceof StoreError || error instanceof StoreUnavailableError) return error;
  if (isConnectionError(error)) {
    return new StoreUnavailableError(`Database unavailable during ${operation}: ${errorMessage(error)}`, { cause: error });
  }
  return new StoreError(`Database error during ${operation}: ${errorMessage(error)}`, { cause: error });
}

// Postgres takes at most 65535 bind parameters per statement; a chunk row uses 12
export const CHUNK_INSERT_BATCH_SIZE = 500;

export function sliceBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function documentWhere(key: DocumentKey) {
  return and(
    eq(docsChunks.docId, key.docId),
    eq(docsChunks.providerType, key.providerType),
    eq(docsChunks.providerName, key.providerName),
  );
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const mapped = toStoreError(operation, error);
      logger.error(`${operation} failed`, error);
      throw mapped;
    }
  }

  // Tracking
  getTrackedDocuments(providerType: string, providerName: string): Promise<DocsFile[]> {
    return this.guard("getTrackedDocuments", () =>
      this.db
        .select()
        .from(docsFiles)
        .where(and(eq(docsFiles.providerType, providerType), eq(docsFiles.providerName, providerName))),
    );
  }

  upsertTracking(record: InsertDocsFile): Promise<void> {
    return this.guard("upsertTracking", async () => {
      const indexedAt = record.indexedAt ?? new Date();
      await this.db
        .insert(docsFiles)
        .values({ ...record, indexedAt })
        .onConflictDoUpdate({
          target: [docsFiles.docId, docsFiles.providerType, docsFiles.providerName],
          set: {
            filename: record.filename,
            etag: record.etag ?? null,
            lastModified: record.lastModified ?? null,
            relativePath: record.relativePath ?? null,
            indexedAt,
          },
        });
    });
  }

  deleteTracking(key: DocumentKey): Promise<void> {
    return this.guard("deleteTracking", async () => {
      await this.db
        .delete(docsFiles)
        .where(
          and(
            eq(docsFiles.docId, key.docId),
            eq(docsFiles.providerType, key.providerType),
            eq(docsFiles.providerName, key.providerName),
          ),
        );
    });
  }

  // Chunks
  upsertChunks(key: DocumentKey, filename: string, chunks: ChunkWrite[]): Promise<void> {
    return this.guard("upsertChunks", () =>
      this.db.transaction(async (tx) => {
        const updatedAt = new Date();
        for (const batch of sliceBatches(chunks, CHUNK_INSERT_BATCH_SIZE)) {
          await tx
            .insert(docsChunks)
            .values(
              batch.map((chunk) => ({
                ...key,
                ...chunk,
                filename,
                updatedAt,
              })),
            )
            .onConflictDoUpdate({
              target: [docsChunks.docId, docsChunks.chunkNum, docsChunks.providerType, docsChunks.providerName],
              set: {
                filename: sql`excluded.filename`,
                text: sql`excluded.text`,
                charStart: sql`excluded.char_start`,
                charEnd: sql`excluded.char_end`,
                tokenEstimate: sql`excluded.token_estimate`,
                embedding: sql`excluded.embedding`,
                metadata: sql`excluded.metadata`,
                updatedAt: sql`excluded.updated_at`,
              },
            });
        }

        // Chunks beyond the new count belong to an older, longer version
        await tx.delete(docsChunks).where(and(documentWhere(key), gte(docsChunks.chunkNum, chunks.length)));
      }),
    );
  }

  getChunks(key: DocumentKey): Promise<DocsChunk[]> {
    return this.guard("getChunks", () =>
      this.db.select().from(docsChunks).where(documentWhere(key)).orderBy(docsChunks.chunkNum),
    );
  }

  deleteChunks(key: DocumentKey): Promise<void> {
    return this.guard("deleteChunks", async () => {
      await this.db.delete(docsChunks).where(documentWhere(key));
    });
  }

  deleteAllProviderDocuments(providerType: string, providerName: string): Promise<number> {
    return this.guard("deleteAllProviderDocuments", () =>
      this.db.transaction(async (tx) => {
        await tx
          .delete(docsChunks)
          .where(and(eq(docsChunks.providerType, providerType), eq(docsChunks.providerName, providerName)));
        const removed = await tx
          .delete(docsFiles)
          .where(and(eq(docsFiles.providerType, providerType), eq(docsFiles.providerName, providerName)))
          .returning({ docId: docsFiles.docId });
        return removed.length;
      }),
    );
  }

  // Providers
  registerProvider(metadata: ProviderMetadata): Promise<void> {
    return this.guard("registerProvider", async () => {
      await this.db
        .insert(providers)
        .values({
          providerType: metadata.providerType,
          providerName: metadata.providerName,
          enabled: metadata.enabled,
          metadata: metadata.additionalInfo,
          registeredAt: metadata.registeredAt,
        })
        .onConflictDoUpdate({
          target: [providers.providerType, providers.providerName],
          set: { enabled: metadata.enabled, metadata: metadata.additionalInfo },
        });
    });
  }

  markProviderSynced(providerType: string, providerName: string, at: Date): Promise<void> {
    return this.guard("markProviderSynced", async () => {
      await this.db
        .update(providers)
        .set({ lastSyncAt: at })
        .where(and(eq(providers.providerType, providerType), eq(providers.providerName, providerName)));
    });
  }

  getProviders(): Promise<ProviderRecord[]> {
    return this.guard("getProviders", () =>
      this.db.select().from(providers).orderBy(providers.providerType, providers.providerName),
    );
  }

  // Provider settings
  listProviderSettings(): Promise<ProviderSettingsRecord[]> {
    return this.guard("listProviderSettings", () =>
      this.db
        .select()
        .from(providerSettings)
        .orderBy(providerSettings.providerType, providerSettings.providerName),
    );
  }

  getProviderSettings(providerType: string, providerName: string): Promise<ProviderSettingsRecord | undefined> {
    return this.guard("getProviderSettings", async () => {
      const [row] = await this.db
        .select()
        .from(providerSettings)
        .where(and(eq(providerSettings.providerType, providerType), eq(providerSettings.providerName, providerName)));
      return row;
    });
  }

  upsertProviderSettings(
    providerType: string,
    providerName: string,
    settings: Record<string, unknown>,
  ): Promise<ProviderSettingsRecord> {
    return this.guard("upsertProviderSettings", async () => {
      const updatedAt = new Date();
      const [row] = await this.db
        .insert(providerSettings)
        .values({ providerType, providerName, settings, updatedAt })
        .onConflictDoUpdate({
          target: [providerSettings.providerType, providerSettings.providerName],
          set: { settings, updatedAt },
        })
        .returning();
      return row;
    });
  }

  insertProviderSettingsIfMissing(
    providerType: string,
    providerName: string,
    settings: Record<string, unknown>,
  ): Promise<boolean> {
    return this.guard("insertProviderSettingsIfMissing", async () => {
      const inserted = await this.db
        .insert(providerSettings)
        .values({ providerType, providerName, settings })
        .onConflictDoNothing()
        .returning({ providerName: providerSettings.providerName });
      return inserted.length > 0;
    });
  }

  deleteProviderSettings(providerType: string, providerName: string): Promise<boolean> {
    return this.guard("deleteProviderSettings", async () => {
      const deleted = await this.db
        .delete(providerSettings)
        .where(and(eq(providerSettings.providerType, providerType), eq(providerSettings.providerName, providerName)))
        .returning({ providerName: providerSettings.providerName });
      return deleted.length > 0;
    });
  }

  // Runs
  recordRun(run: InsertIndexerRun): Promise<IndexerRunRecord> {
    return this.guard("recordRun", async () => {
      const [row] = await this.db.insert(indexerRuns).values(run).returning();
      return row;
    });
  }

  getRecentRuns(limit = 20): Promise<IndexerRunRecord[]> {
    return this.guard("getRecentRuns", () =>
      this.db.select().from(indexerRuns).orderBy(desc(indexerRuns.startedAt)).limit(limit),
    );
  }
}

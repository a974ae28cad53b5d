import { randomUUID } from "crypto";
import type {
  DocsChunk,
  DocsFile,
  IndexerRunRecord,
  InsertDocsFile,
  InsertIndexerRun,
  ProviderRecord,
  ProviderSettingsRecord,
} from "@shared/schema";
import type { ChunkWrite, DocumentKey, IStorage } from "./storage";
import type { ProviderMetadata } from "./lib/providers/types";

function docKey(key: DocumentKey): string {
  return JSON.stringify([key.docId, key.providerType, key.providerName]);
}

function providerKey(providerType: string, providerName: string): string {
  return JSON.stringify([providerType, providerName]);
}

/**
 * Process-local IStorage. Chunk replacement happens in a single synchronous
 * step, so readers never observe a half-written chunk set.
 */
export class MemStorage implements IStorage {
  private files = new Map<string, DocsFile>();
  private chunks = new Map<string, DocsChunk[]>();
  private providerRows = new Map<string, ProviderRecord>();
  private settingsRows = new Map<string, ProviderSettingsRecord>();
  private runs: IndexerRunRecord[] = [];

  /** Set to make every call reject with this error, simulating an outage. */
  failWith: Error | null = null;

  private check(): void {
    if (this.failWith) throw this.failWith;
  }

  // Tracking
  async getTrackedDocuments(providerType: string, providerName: string): Promise<DocsFile[]> {
    this.check();
    return Array.from(this.files.values())
      .filter((f) => f.providerType === providerType && f.providerName === providerName)
      .map((f) => ({ ...f }));
  }

  async upsertTracking(record: InsertDocsFile): Promise<void> {
    this.check();
    this.files.set(docKey(record), {
      docId: record.docId,
      providerType: record.providerType,
      providerName: record.providerName,
      filename: record.filename,
      etag: record.etag ?? null,
      lastModified: record.lastModified ?? null,
      relativePath: record.relativePath ?? null,
      indexedAt: record.indexedAt ?? new Date(),
    });
  }

  async deleteTracking(key: DocumentKey): Promise<void> {
    this.check();
    this.files.delete(docKey(key));
  }

  // Chunks
  async upsertChunks(key: DocumentKey, filename: string, chunks: ChunkWrite[]): Promise<void> {
    this.check();
    const updatedAt = new Date();
    const rows = chunks.map((chunk) => ({ ...key, ...chunk, filename, updatedAt }));
    if (rows.length === 0) {
      this.chunks.delete(docKey(key));
    } else {
      this.chunks.set(docKey(key), rows);
    }
  }

  async getChunks(key: DocumentKey): Promise<DocsChunk[]> {
    this.check();
    return [...(this.chunks.get(docKey(key)) ?? [])];
  }

  async deleteChunks(key: DocumentKey): Promise<void> {
    this.check();
    this.chunks.delete(docKey(key));
  }

  async deleteAllProviderDocuments(providerType: string, providerName: string): Promise<number> {
    this.check();
    let removed = 0;
    for (const [key, file] of Array.from(this.files.entries())) {
      if (file.providerType === providerType && file.providerName === providerName) {
        this.files.delete(key);
        removed++;
      }
    }
    for (const [key, rows] of Array.from(this.chunks.entries())) {
      if (rows[0]?.providerType === providerType && rows[0]?.providerName === providerName) {
        this.chunks.delete(key);
      }
    }
    return removed;
  }

  /** Every stored chunk, across providers. */
  allChunks(): DocsChunk[] {
    return Array.from(this.chunks.values()).flat();
  }

  // Providers
  async registerProvider(metadata: ProviderMetadata): Promise<void> {
    this.check();
    const key = providerKey(metadata.providerType, metadata.providerName);
    const existing = this.providerRows.get(key);
    this.providerRows.set(key, {
      providerType: metadata.providerType,
      providerName: metadata.providerName,
      enabled: metadata.enabled,
      metadata: { ...metadata.additionalInfo },
      registeredAt: existing?.registeredAt ?? metadata.registeredAt,
      lastSyncAt: existing?.lastSyncAt ?? null,
    });
  }

  async markProviderSynced(providerType: string, providerName: string, at: Date): Promise<void> {
    this.check();
    const row = this.providerRows.get(providerKey(providerType, providerName));
    if (row) row.lastSyncAt = at;
  }

  async getProviders(): Promise<ProviderRecord[]> {
    this.check();
    return Array.from(this.providerRows.values()).map((row) => ({ ...row }));
  }

  // Provider settings
  async listProviderSettings(): Promise<ProviderSettingsRecord[]> {
    this.check();
    return Array.from(this.settingsRows.values()).map((row) => ({ ...row, settings: { ...row.settings } }));
  }

  async getProviderSettings(providerType: string, providerName: string): Promise<ProviderSettingsRecord | undefined> {
    this.check();
    const row = this.settingsRows.get(providerKey(providerType, providerName));
    return row ? { ...row, settings: { ...row.settings } } : undefined;
  }

  async upsertProviderSettings(
    providerType: string,
    providerName: string,
    settings: Record<string, unknown>,
  ): Promise<ProviderSettingsRecord> {
    this.check();
    const row = { providerType, providerName, settings: { ...settings }, updatedAt: new Date() };
    this.settingsRows.set(providerKey(providerType, providerName), row);
    return { ...row };
  }

  async insertProviderSettingsIfMissing(
    providerType: string,
    providerName: string,
    settings: Record<string, unknown>,
  ): Promise<boolean> {
    this.check();
    const key = providerKey(providerType, providerName);
    if (this.settingsRows.has(key)) return false;
    this.settingsRows.set(key, { providerType, providerName, settings: { ...settings }, updatedAt: new Date() });
    return true;
  }

  async deleteProviderSettings(providerType: string, providerName: string): Promise<boolean> {
    this.check();
    return this.settingsRows.delete(providerKey(providerType, providerName));
  }

  // Runs
  async recordRun(run: InsertIndexerRun): Promise<IndexerRunRecord> {
    this.check();
    const record: IndexerRunRecord = {
      id: run.id ?? randomUUID(),
      status: run.status,
      exitCode: run.exitCode,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      durationMs: run.durationMs,
      reportJson: run.reportJson,
      error: run.error ?? null,
    };
    this.runs.push(record);
    return record;
  }

  async getRecentRuns(limit = 20): Promise<IndexerRunRecord[]> {
    this.check();
    return [...this.runs].sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime()).slice(0, limit);
  }
}

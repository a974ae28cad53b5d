import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  boolean,
  integer,
  jsonb,
  index,
  primaryKey,
  vector,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Column width of docs_chunks.embedding. The bootstrap SQL substitutes the
// configured dimension, so this only types the drizzle column.
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

// One row per remote document that has been indexed at least once
export const docsFiles = pgTable("docs_files", {
  docId: text("doc_id").notNull(),
  providerType: text("provider_type").notNull(),
  providerName: text("provider_name").notNull(),
  filename: text("filename").notNull(),
  etag: text("etag"),
  lastModified: timestamp("last_modified", { withTimezone: true }),
  relativePath: text("relative_path"),
  indexedAt: timestamp("indexed_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  primaryKey({ columns: [table.docId, table.providerType, table.providerName] }),
  index("docs_files_provider_idx").on(table.providerType, table.providerName),
]);

export const docsChunks = pgTable("docs_chunks", {
  docId: text("doc_id").notNull(),
  chunkNum: integer("chunk_num").notNull(),
  providerType: text("provider_type").notNull(),
  providerName: text("provider_name").notNull(),
  filename: text("filename").notNull(),
  text: text("text").notNull(),
  charStart: integer("char_start").notNull(),
  charEnd: integer("char_end").notNull(),
  tokenEstimate: integer("token_estimate").notNull(),
  embedding: vector("embedding", { dimensions: DEFAULT_EMBEDDING_DIMENSIONS }).notNull(),
  metadata: jsonb("metadata").$type<ChunkMetadata>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  primaryKey({ columns: [table.docId, table.chunkNum, table.providerType, table.providerName] }),
  index("docs_chunks_provider_idx").on(table.providerType, table.providerName),
]);

// Providers seen by the indexer, with the diagnostics they reported
export const providers = pgTable("providers", {
  providerType: text("provider_type").notNull(),
  providerName: text("provider_name").notNull(),
  enabled: boolean("enabled").notNull().default(true),
  metadata: jsonb("metadata").$type<Record<string, string>>().notNull().default({}),
  registeredAt: timestamp("registered_at", { withTimezone: true }).defaultNow().notNull(),
  lastSyncAt: timestamp("last_sync_at", { withTimezone: true }),
}, (table) => [
  primaryKey({ columns: [table.providerType, table.providerName] }),
]);

export const providerSettings = pgTable("provider_settings", {
  providerType: text("provider_type").notNull(),
  providerName: text("provider_name").notNull(),
  settings: jsonb("settings").$type<Record<string, unknown>>().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  primaryKey({ columns: [table.providerType, table.providerName] }),
]);

export const indexerRuns = pgTable("indexer_runs", {
  id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
  status: text("status", { enum: ["completed", "failed", "cancelled"] }).notNull(),
  exitCode: integer("exit_code").notNull(),
  startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
  finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
  durationMs: integer("duration_ms").notNull(),
  reportJson: jsonb("report_json").notNull(),
  error: text("error"),
}, (table) => [
  index("indexer_runs_started_at_idx").on(table.startedAt),
]);

export interface ChunkMetadata {
  etag?: string;
  lastModified?: string;
  relativePath?: string;
  mimeType?: string;
  charStart: number;
  charEnd: number;
}

// Insert schemas
export const insertProviderSettingsSchema = createInsertSchema(providerSettings).omit({ updatedAt: true });

// Types
export type DocsFile = typeof docsFiles.$inferSelect;
export type InsertDocsFile = typeof docsFiles.$inferInsert;

export type DocsChunk = typeof docsChunks.$inferSelect;

export type ProviderRecord = typeof providers.$inferSelect;

export type ProviderSettingsRecord = typeof providerSettings.$inferSelect;

export type IndexerRunRecord = typeof indexerRuns.$inferSelect;
export type InsertIndexerRun = typeof indexerRuns.$inferInsert;

// Body accepted by PUT /api/providers/:type/:name
export const providerSettingsBodySchema = z.object({
  settings: z.record(z.unknown()),
});

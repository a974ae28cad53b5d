import "dotenv/config";
import { z } from "zod";
import { InvalidConfigurationError } from "./lib/errors";
import { assertChunkingOptions } from "./lib/chunker";
import type { LogLevel } from "./lib/log";

// Tolerant truthy parsing: 1/true/yes/on, anything else is false.
const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => {
      if (v === undefined || v.trim() === "") return fallback;
      const normalized = v.trim().toLowerCase();
      return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
    });

const envInt = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === "") return fallback;
      const n = Number(v.trim());
      if (!Number.isInteger(n) || n < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be an integer >= ${min}` });
        return z.NEVER;
      }
      return n;
    });

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, "must be set"),
  OPENAI_API_KEY: z.string().trim().min(1, "must be set"),
  OPENAI_BASE_URL: optionalString,
  EMBED_MODEL: optionalString.transform((v) => v ?? "text-embedding-3-small"),
  EMBED_DIMENSIONS: envInt(1536, 1),
  EMBED_BATCH_SIZE: envInt(100, 1),
  CHUNK_SIZE: envInt(1000, 1),
  CHUNK_OVERLAP: envInt(200, 0),
  INDEXER_CONCURRENCY: envInt(2, 1),
  INDEXER_MAX_FILES: optionalString.pipe(
    z
      .string()
      .regex(/^\d+$/, "must be a positive integer")
      .transform(Number)
      .optional(),
  ),
  INDEXER_FORCE_FULL_REINDEX: envBoolean(false),
  INDEXER_CLEANUP_ORPHANS: envBoolean(true),
  INDEXER_INTERVAL_MINUTES: envInt(360, 1),
  INDEXER_RUN_ON_STARTUP: envBoolean(true),
  PROVIDERS_FILE: optionalString,
  ENCRYPTION_KEY: optionalString,
  PORT: envInt(5000, 1),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AppConfig {
  databaseUrl: string;
  openai: {
    apiKey: string;
    baseUrl?: string;
    embedModel: string;
    dimensions: number;
    batchSize: number;
  };
  chunking: {
    chunkSize: number;
    overlap: number;
  };
  indexer: {
    concurrency: number;
    maxFiles?: number;
    forceFullReindex: boolean;
    cleanupOrphans: boolean;
    intervalMinutes: number;
    runOnStartup: boolean;
  };
  providersFile?: string;
  encryptionKey?: string;
  port: number;
  logLevel: LogLevel;
}

/**
 * Validate and shape the process environment. Throws
 * InvalidConfigurationError naming every offending variable at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  const chunking = { chunkSize: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP };
  assertChunkingOptions(chunking);

  return {
    databaseUrl: e.DATABASE_URL,
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      embedModel: e.EMBED_MODEL,
      dimensions: e.EMBED_DIMENSIONS,
      batchSize: e.EMBED_BATCH_SIZE,
    },
    chunking,
    indexer: {
      concurrency: e.INDEXER_CONCURRENCY,
      maxFiles: e.INDEXER_MAX_FILES,
      forceFullReindex: e.INDEXER_FORCE_FULL_REINDEX,
      cleanupOrphans: e.INDEXER_CLEANUP_ORPHANS,
      intervalMinutes: e.INDEXER_INTERVAL_MINUTES,
      runOnStartup: e.INDEXER_RUN_ON_STARTUP,
    },
    providersFile: e.PROVIDERS_FILE,
    encryptionKey: e.ENCRYPTION_KEY,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}

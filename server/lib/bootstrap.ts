import fs from "fs/promises";
import path from "path";
import type pg from "pg";
import { InvalidConfigurationError } from "./errors";
import { toStoreError } from "../storage";
import { createLogger } from "./log";

const logger = createLogger("db");

// Arbitrary, but fixed: every instance must contend on the same key
const SCHEMA_LOCK_KEY = 72_431_905;

export const SCHEMA_FILE = path.resolve(__dirname, "../../sql/schema.sql");

export function renderSchemaSql(template: string, embeddingDimensions: number): string {
  if (!Number.isInteger(embeddingDimensions) || embeddingDimensions <= 0) {
    throw new InvalidConfigurationError(`Embedding dimension must be a positive integer, got ${embeddingDimensions}`);
  }
  return template.split("{{EMBEDDING_DIMENSIONS}}").join(String(embeddingDimensions));
}

/**
 * Creates extensions, tables and indexes if missing. Runs under a session
 * advisory lock so instances starting together apply it one at a time.
 */
export async function bootstrapSchema(pool: pg.Pool, embeddingDimensions: number, schemaFile = SCHEMA_FILE): Promise<void> {
  const ddl = renderSchemaSql(await fs.readFile(schemaFile, "utf8"), embeddingDimensions);

  let client: pg.PoolClient;
  try {
    client = await pool.connect();
  } catch (error) {
    throw toStoreError("bootstrapSchema", error);
  }

  try {
    await client.query("SELECT pg_advisory_lock($1)", [SCHEMA_LOCK_KEY]);
    try {
      await client.query(ddl);
      logger.info(`Schema ready (embedding dimension ${embeddingDimensions})`);
    } finally {
      await client.query("SELECT pg_advisory_unlock($1)", [SCHEMA_LOCK_KEY]);
    }
  } catch (error) {
    throw toStoreError("bootstrapSchema", error);
  } finally {
    client.release();
  }
}

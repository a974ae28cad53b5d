import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { log } from "./lib/log";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DbHandle {
  pool: pg.Pool;
  db: Database;
}

export function createDb(databaseUrl: string): DbHandle {
  // One-time startup log, credentials redacted
  const urlObj = new URL(databaseUrl);
  log(`Connecting to Postgres: ${urlObj.hostname}:${urlObj.port || "5432"}/${urlObj.pathname.slice(1)}`, "db");

  const pool = new Pool({ connectionString: databaseUrl });
  pool.on("error", (err) => {
    log(`Idle client error: ${err.message}`, "db", "error");
  });

  return { pool, db: drizzle(pool, { schema }) };
}

import { promises as fs } from "fs";
import type * as pg from "pg";
import type { Kysely } from "kysely";
import { createDb, createMemoryPool, createPgPool } from "./connection.js";
import type { DB } from "./types.js";

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export interface LedgerOptions {
  /** Postgres connection string; without one the ledger is in memory. */
  databaseUrl?: string;
  schemaPath: string;
  /** Apply the schema to an external database too. In-memory ledgers always get it. */
  autoSchema?: boolean;
}

export interface Ledger {
  pool: pg.Pool;
  db: Kysely<DB>;
  inMemory: boolean;
}

export async function openLedger(options: LedgerOptions): Promise<Ledger> {
  const inMemory = !options.databaseUrl;
  const pool = options.databaseUrl ? createPgPool(options.databaseUrl) : createMemoryPool();
  if (inMemory || (options.autoSchema ?? true)) {
    await applySqlFile(pool, options.schemaPath);
  }
  return { pool, db: createDb(pool), inMemory };
}

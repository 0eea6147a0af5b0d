import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import type pg from "pg";
import { closePool, getPool } from "./pool.js";
import { logger } from "../core/logger.js";
import { config } from "../core/config.js";

// Two levels up from src/db or dist/db.
const MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations/", import.meta.url));

const LEDGER_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

async function pendingMigrations(pool: pg.Pool): Promise<string[]> {
  const applied = await pool.query<{ filename: string }>("SELECT filename FROM schema_migrations");
  const done = new Set(applied.rows.map((r) => r.filename));
  const files = await readdir(MIGRATIONS_DIR);
  return files.filter((f) => f.endsWith(".sql") && !done.has(f)).sort((a, b) => a.localeCompare(b));
}

/** Runs one file and records it, on a single client so BEGIN/COMMIT share a connection. */
async function applyMigration(pool: pg.Pool, filename: string): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, filename), "utf8");
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(sql);
    await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    await client.query("COMMIT");
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  if (!config.databaseUrl) throw new Error("DATABASE_URL is required to run migrations.");
  const pool = getPool();
  await pool.query(LEDGER_DDL);

  const pending = await pendingMigrations(pool);
  if (!pending.length) {
    logger.info("Schema is up to date");
    return;
  }
  for (const filename of pending) {
    logger.info(`Applying ${filename}`);
    await applyMigration(pool, filename);
  }
  logger.info(`Applied ${pending.length} migration(s)`);
}

await migrate()
  .catch((e: unknown) => {
    logger.error("Migration failed", e);
    process.exitCode = 1;
  })
  .finally(closePool);

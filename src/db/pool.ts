import pg from "pg";
import { config } from "../core/config.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;

export function isDatabaseEnabled(): boolean {
  return Boolean(config.databaseUrl);
}

/** Created on first use, so code paths that never touch Postgres run without DATABASE_URL. */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.mustGetEnv("DATABASE_URL")
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}

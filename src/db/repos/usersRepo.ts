import { getPool } from "../pool.js";
import type { UserRow } from "../types.js";

export async function getOrCreateUserByTelegramId(telegramId: number): Promise<UserRow> {
  const pool = getPool();
  const existing = await pool.query<UserRow>("SELECT * FROM users WHERE telegram_id = $1 LIMIT 1", [telegramId]);
  const found = existing.rows[0];
  if (found) return found;

  const created = await pool.query<UserRow>(
    "INSERT INTO users (telegram_id) VALUES ($1) ON CONFLICT (telegram_id) DO UPDATE SET telegram_id = EXCLUDED.telegram_id RETURNING *",
    [telegramId]
  );
  const row = created.rows[0];
  if (!row) throw new Error(`failed to create user ${telegramId}`);
  return row;
}

import { Pool } from "pg";
import type { AppConfig } from "./config";
import type { Logger } from "./logger";

export const ITEMS_TABLE = "to_do_items";

// ─── Database Pool ────────────────────────────────────────
// Single-row statements resolve fast, so a small pool goes a long way.
export function createPool(config: Pick<AppConfig, "DATABASE_URL" | "DB_POOL_MAX">, logger: Logger): Pool {
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    max: config.DB_POOL_MAX,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
}

// ─── Schema ───────────────────────────────────────────────
// Creates the items table when absent; existing tables are left as they are.
export async function migrate(pool: Pool): Promise<void> {
  await pool.query(
    `CREATE TABLE IF NOT EXISTS ${ITEMS_TABLE} (
       id          SERIAL PRIMARY KEY,
       title       TEXT NOT NULL,
       description TEXT NOT NULL DEFAULT '',
       status      TEXT NOT NULL DEFAULT 'open',
       created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
       updated_at  TIMESTAMPTZ
     )`,
  );
}

/** Opens the pool, checks the database answers, and brings the schema up. */
export async function connect(
  config: Pick<AppConfig, "DATABASE_URL" | "DB_POOL_MAX">,
  logger: Logger,
): Promise<Pool> {
  const pool = createPool(config, logger);
  try {
    await pool.query("SELECT 1");
    await migrate(pool);
  } catch (err) {
    await pool.end().catch((endErr: unknown) =>
      logger.warn({ err: endErr }, "Pool close after failed connect"),
    );
    throw err;
  }
  return pool;
}

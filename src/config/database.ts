/**
 * PostgreSQL connection pool.
 * The pool is created once at startup from DATABASE_URL and shared by the
 * SQL-backed stores through the application context.
 */

import { Pool } from "pg";
import type { EnvConfig } from "./env";
import { logger } from "./logger";

/**
 * The slice of the pg client API the stores rely on. `Pool` satisfies it;
 * tests pass an in-process recorder instead.
 */
interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/**
 * Create the connection pool.
 * - max: 10 connections
 * - idleTimeoutMillis: 30 seconds
 * - connectionTimeoutMillis: 5 seconds (fail fast if the DB is unreachable)
 */
function createPool(config: Pick<EnvConfig, "DATABASE_URL">): Pool {
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => {
    logger.error("database", "Unexpected error on idle client", { error: err.message });
  });

  return pool;
}

/**
 * Run `SELECT 1` through the pool.
 * Returns false (and logs) instead of throwing when the database is unreachable.
 */
async function testConnection(pool: Pool): Promise<boolean> {
  try {
    await pool.query("SELECT 1");
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("database", "Connection test failed", { error: message });
    return false;
  }
}

async function closePool(pool: Pool): Promise<void> {
  logger.info("database", "Closing connection pool...");
  await pool.end();
  logger.info("database", "Connection pool closed.");
}

export { createPool, testConnection, closePool };
export type { Queryable };

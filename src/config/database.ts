/**
 * PostgreSQL connection pool.
 *
 * The pool is created on first use so that processes running with the
 * in-memory store (STORE_PROVIDER=memory, tests) never open a connection.
 */

import { Pool } from "pg";
import { env } from "./env";
import { logger } from "./logger";

let pool: Pool | null = null;

/**
 * Shared pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30 seconds
 * - connectionTimeoutMillis: 5 seconds (fail fast if DB is unreachable)
 */
function getPool(): Pool {
  if (pool === null) {
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      max: 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });

    // Unexpected disconnects of idle clients
    pool.on("error", (err) => {
      logger.error("database", "Unexpected error on idle client", { error: err.message });
    });
  }
  return pool;
}

/**
 * Close all connections. No-op when the pool was never created.
 */
async function closePool(): Promise<void> {
  if (pool === null) {
    return;
  }
  logger.info("database", "Closing connection pool...");
  const current = pool;
  pool = null;
  await current.end();
  logger.info("database", "Connection pool closed.");
}

export { getPool, closePool };

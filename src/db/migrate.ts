/**
 * SQL migration runner.
 *
 * Tracks applied migrations in a `schema_migrations` table.
 * Migrations are .sql files in the migrations/ directory, named with a numeric
 * prefix (e.g., 001_create_pastes.sql). Files ending in .down.sql are ignored
 * during forward migration and used only for rollback.
 *
 * Usage:
 *   npm run migrate          # Run all pending UP migrations
 *   npm run migrate:down     # Rollback the most recent migration
 *   npm run migrate:status   # Show applied migrations
 */

import * as fs from "fs";
import * as path from "path";
import dotenv from "dotenv";

// Load environment variables before importing database config
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

import { getPool, closePool } from "../config/database";
import { logger, errorMessage } from "../config/logger";

const MIGRATIONS_DIR = path.resolve(__dirname, "migrations");

const log = logger.child("migrate");

// --------------------------------------------------------------------------
// Schema migrations tracking table
// --------------------------------------------------------------------------

async function ensureMigrationsTable(): Promise<void> {
  await getPool().query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id          SERIAL       PRIMARY KEY,
      filename    VARCHAR(255) NOT NULL UNIQUE,
      applied_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(): Promise<string[]> {
  const result = await getPool().query<{ filename: string }>(
    "SELECT filename FROM schema_migrations ORDER BY id ASC"
  );
  return result.rows.map((row) => row.filename);
}

// --------------------------------------------------------------------------
// Discover migration files
// --------------------------------------------------------------------------

function getUpMigrationFiles(): string[] {
  if (!fs.existsSync(MIGRATIONS_DIR)) {
    throw new Error(`Migrations directory not found: ${MIGRATIONS_DIR}`);
  }

  return fs
    .readdirSync(MIGRATIONS_DIR)
    .filter((f) => f.endsWith(".sql") && !f.endsWith(".down.sql"))
    .sort();
}

function getDownFile(upFile: string): string {
  // 001_create_pastes.sql -> 001_create_pastes.down.sql
  return upFile.replace(/\.sql$/, ".down.sql");
}

/**
 * Run a migration script and its schema_migrations bookkeeping in one
 * transaction. Rolls back and rethrows on failure.
 */
async function runInTransaction(
  sql: string,
  bookkeeping: string,
  filename: string
): Promise<void> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    await client.query(sql);
    await client.query(bookkeeping, [filename]);
    await client.query("COMMIT");
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

// --------------------------------------------------------------------------
// Migration commands
// --------------------------------------------------------------------------

async function migrateUp(): Promise<void> {
  await ensureMigrationsTable();

  const applied = await getAppliedMigrations();
  const pending = getUpMigrationFiles().filter((f) => !applied.includes(f));

  if (pending.length === 0) {
    log.info("All migrations are up to date.");
    return;
  }

  log.info(`${pending.length} pending migration(s) to apply.`);

  for (const file of pending) {
    const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), "utf-8");
    log.info(`Applying: ${file} ...`);
    await runInTransaction(sql, "INSERT INTO schema_migrations (filename) VALUES ($1)", file);
    log.info(`Applied: ${file}`);
  }

  log.info("All migrations applied successfully.");
}

async function migrateDown(): Promise<void> {
  await ensureMigrationsTable();

  const applied = await getAppliedMigrations();
  const lastApplied = applied[applied.length - 1];

  if (lastApplied === undefined) {
    log.info("No migrations to rollback.");
    return;
  }

  const downFile = getDownFile(lastApplied);
  const downPath = path.join(MIGRATIONS_DIR, downFile);

  if (!fs.existsSync(downPath)) {
    throw new Error(`Down migration not found: ${downFile}`);
  }

  log.info(`Rolling back: ${lastApplied} ...`);
  await runInTransaction(
    fs.readFileSync(downPath, "utf-8"),
    "DELETE FROM schema_migrations WHERE filename = $1",
    lastApplied
  );
  log.info(`Rolled back: ${lastApplied}`);
}

async function migrateStatus(): Promise<void> {
  await ensureMigrationsTable();

  const applied = await getAppliedMigrations();
  const allFiles = getUpMigrationFiles();

  if (allFiles.length === 0) {
    log.info("No migration files found.");
    return;
  }

  for (const file of allFiles) {
    log.info(`[${applied.includes(file) ? "APPLIED" : "PENDING"}] ${file}`);
  }
}

// --------------------------------------------------------------------------
// CLI entry point
// --------------------------------------------------------------------------

async function main(): Promise<void> {
  const command = process.argv[2] || "up";

  try {
    switch (command) {
      case "up":
        await migrateUp();
        break;
      case "down":
        await migrateDown();
        break;
      case "status":
        await migrateStatus();
        break;
      default:
        throw new Error(`Unknown command: ${command}. Usage: migrate [up|down|status]`);
    }
  } finally {
    await closePool();
  }
}

main().catch((err: unknown) => {
  log.error("Migration failed", { error: errorMessage(err) });
  process.exit(1);
});

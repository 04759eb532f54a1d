import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { logger } from "../logger.js";

import type { Connection } from "./connection.js";

// Resolves to <root>/sql from both src/db and dist/db
const SCHEMA_PATH = fileURLToPath(
  new URL("../../sql/intel-schema.sql", import.meta.url)
);

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Apply sql/intel-schema.sql in a single transaction
 */
export async function runMigration(
  connection: Connection,
  options?: { fresh?: boolean }
): Promise<void> {
  const client = await connection.pool.connect();

  try {
    await client.query("BEGIN");

    if (options?.fresh === true) {
      logger.info("Dropping existing tables (--fresh mode)...");
      await client.query(
        "DROP TABLE IF EXISTS relationships, event_tickets, indicators, events CASCADE"
      );
    }

    const schema = readFileSync(SCHEMA_PATH, "utf8");
    logger.info("Running schema migration...");
    await client.query(schema);
    await client.query("COMMIT");

    logger.info("Schema migration completed successfully");
  } catch (error) {
    await client.query("ROLLBACK");
    logger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Check if the schema exists (has the events table)
 */
export async function hasSchema(connection: Connection): Promise<boolean> {
  const result = await connection.pool.query<{ exists: boolean }>(`
    SELECT EXISTS (
      SELECT 1 FROM information_schema.tables
      WHERE table_schema = 'public' AND table_name = 'events'
    ) AS exists
  `);
  return result.rows[0]?.exists === true;
}

export interface TableStat {
  table_name: string;
  row_count: string;
}

/**
 * Get table statistics
 */
export async function getTableStats(connection: Connection): Promise<TableStat[]> {
  const result = await connection.pool.query<TableStat>(`
    SELECT
      relname as table_name,
      n_live_tup::bigint as row_count
    FROM pg_stat_user_tables
    WHERE schemaname = 'public'
    ORDER BY relname
  `);
  return result.rows;
}

import { Kysely, PostgresDialect, sql, type RawBuilder } from "kysely";
import pg from "pg";

import { storeLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool } = pg;

/**
 * Bind a string array as a PostgreSQL TEXT[] value
 */
export function textArray(values: string[]): RawBuilder<string[]> {
  return sql<string[]>`${values}::TEXT[]`;
}

// ============================================================================
// Connection
// ============================================================================

export interface Connection {
  db: Kysely<Database>;
  pool: pg.Pool;
  url: string;
}

export function createConnection(databaseUrl: string): Connection {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 5, // Imports run sequentially; a few connections suffice
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Connection timeout
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return { db, pool, url: databaseUrl };
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(connection: Connection): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(connection.db);
    return true;
  } catch (error) {
    storeLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Close the database connection
 */
export async function closeConnection(connection: Connection): Promise<void> {
  try {
    // db.destroy() already closes the pool
    await connection.db.destroy();
    storeLogger.debug("Database connection closed");
  } catch (error) {
    storeLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Database URL for display, with password masked
 */
export function maskDatabaseUrl(databaseUrl: string): string {
  const url = new URL(databaseUrl);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

/**
 * Get pool statistics
 */
export function getPoolStats(connection: Connection): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: connection.pool.totalCount,
    idleCount: connection.pool.idleCount,
    waitingCount: connection.pool.waitingCount,
  };
}

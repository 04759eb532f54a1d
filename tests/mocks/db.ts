/**
 * Kysely Database Mock Utilities
 *
 * Chainable stand-ins for the Kysely query builders the store uses, so the
 * store can be unit tested without a database.
 */

import { vi } from "vitest";

import type { Database } from "../../src/db/types.js";
import type { Kysely } from "kysely";

/**
 * Creates a mock select query builder that returns specified data
 */
export function createMockSelectBuilder<T>(data: T[]) {
  return {
    select: vi.fn().mockReturnThis(),
    selectAll: vi.fn().mockReturnThis(),
    where: vi.fn().mockReturnThis(),
    whereRef: vi.fn().mockReturnThis(),
    orderBy: vi.fn().mockReturnThis(),
    limit: vi.fn().mockReturnThis(),
    innerJoin: vi.fn().mockReturnThis(),
    execute: vi.fn().mockResolvedValue(data),
    executeTakeFirst: vi.fn().mockResolvedValue(data[0]),
    executeTakeFirstOrThrow: vi.fn().mockImplementation(() => {
      if (data.length === 0) {
        return Promise.reject(new Error("no result"));
      }
      return Promise.resolve(data[0]);
    }),
  };
}

export type MockSelectBuilder = ReturnType<typeof createMockSelectBuilder>;

/**
 * Creates a mock insert query builder; `returned` is what RETURNING yields
 * (undefined models an ON CONFLICT DO NOTHING that skipped the row)
 */
export function createMockInsertBuilder(returned?: unknown) {
  return {
    values: vi.fn().mockReturnThis(),
    onConflict: vi.fn().mockReturnThis(),
    returning: vi.fn().mockReturnThis(),
    execute: vi.fn().mockResolvedValue(returned !== undefined ? [returned] : []),
    executeTakeFirst: vi.fn().mockResolvedValue(returned),
    executeTakeFirstOrThrow: vi.fn().mockImplementation(() => {
      if (returned === undefined) {
        return Promise.reject(new Error("no result"));
      }
      return Promise.resolve(returned);
    }),
  };
}

export type MockInsertBuilder = ReturnType<typeof createMockInsertBuilder>;

type TableBuilders = Record<
  string,
  { select?: MockSelectBuilder; insert?: MockInsertBuilder }
>;

/**
 * Creates a mock Kysely database instance
 */
export function createMockDb() {
  const tableBuilders: TableBuilders = {};

  const getSelectBuilder = (table: string): MockSelectBuilder => {
    const entry = (tableBuilders[table] ??= {});
    entry.select ??= createMockSelectBuilder<unknown>([]);
    return entry.select;
  };

  const getInsertBuilder = (table: string): MockInsertBuilder => {
    const entry = (tableBuilders[table] ??= {});
    entry.insert ??= createMockInsertBuilder();
    return entry.insert;
  };

  const db = {
    selectFrom: vi.fn().mockImplementation(getSelectBuilder),
    insertInto: vi.fn().mockImplementation(getInsertBuilder),
    tableBuilders,
    getSelectBuilder,
    getInsertBuilder,
  };

  return db as unknown as MockDb;
}

export type MockDb = Kysely<Database> & {
  tableBuilders: TableBuilders;
  getSelectBuilder: (table: string) => MockSelectBuilder;
  getInsertBuilder: (table: string) => MockInsertBuilder;
};

/**
 * Helper to setup rows returned by selects on a table
 */
export function setupMockTable<T>(
  db: MockDb,
  tableName: string,
  data: T[]
): MockSelectBuilder {
  const builder = createMockSelectBuilder<unknown>(data);
  (db.tableBuilders[tableName] ??= {}).select = builder;
  return builder;
}

/**
 * Helper to setup what an insert into a table returns
 */
export function setupMockInsert(
  db: MockDb,
  tableName: string,
  returned?: unknown
): MockInsertBuilder {
  const builder = createMockInsertBuilder(returned);
  (db.tableBuilders[tableName] ??= {}).insert = builder;
  return builder;
}

import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  checkConnection,
  closeConnection,
  createConnection,
  getPoolStats,
  maskDatabaseUrl,
} from "../../db/connection.js";
import { getTableStats, hasSchema, runMigration } from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";

import type { Connection } from "../../db/connection.js";
import type { Command } from "commander";

interface DbCommandOptions {
  dev?: boolean;
  config?: string;
}

function openConnection(options: DbCommandOptions): Connection {
  const config = loadConfig({
    configPath: options.config,
    dev: options.dev,
    requireFeed: false,
  });
  return createConnection(config.store.databaseUrl);
}

async function printTableStats(connection: Connection): Promise<void> {
  const stats = await getTableStats(connection);
  if (stats.length > 0) {
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${row.row_count} rows`);
    }
  }
}

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Store database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the store schema from sql/intel-schema.sql")
    .option("--fresh", "Drop all store tables first (destructive!)")
    .option("--dev", "Use the development store (DEV_DATABASE_URL)")
    .option("-c, --config <path>", "Configuration file (env format)")
    .action(async (options: DbCommandOptions & { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();
      let connection: Connection | undefined;

      try {
        connection = openConnection(options);
        await runMigration(connection, { fresh: options.fresh });
        spinner.succeed("Migration completed successfully");
        await printTableStats(connection);
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        if (connection !== undefined) {
          await closeConnection(connection);
        }
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .option("--dev", "Use the development store (DEV_DATABASE_URL)")
    .option("-c, --config <path>", "Configuration file (env format)")
    .action(async (options: DbCommandOptions) => {
      const spinner = ora("Checking database connection...").start();
      let connection: Connection | undefined;

      try {
        connection = openConnection(options);
        const connected = await checkConnection(connection);
        console.log(`\nDatabase URL: ${maskDatabaseUrl(connection.url)}`);

        if (!connected) {
          spinner.fail("Database connection failed");
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");

        const poolStats = getPoolStats(connection);
        console.log("\nPool statistics:");
        console.log(`  Total connections: ${String(poolStats.totalCount)}`);
        console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
        console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);

        if (await hasSchema(connection)) {
          await printTableStats(connection);
        } else {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        if (connection !== undefined) {
          await closeConnection(connection);
        }
      }
    });
}

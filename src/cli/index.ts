#!/usr/bin/env node

/**
 * pulse-sync CLI
 *
 * Imports subscribed threat-intelligence pulses into the intelligence store.
 */

import { Command } from "commander";
import ora from "ora";

import { registerDbCommand } from "./commands/db.js";
import { registerFeedCommand } from "./commands/feed.js";
import { registerSyncCommand } from "./commands/sync.js";
import { displayImportsTable } from "./utils/display.js";
import { createStore, parsePositiveInteger } from "./utils/runtime.js";
import { loadConfig } from "../config.js";
import { closeConnection, createConnection } from "../db/connection.js";
import { errorMessage } from "../errors.js";

import type { Connection } from "../db/connection.js";

const program = new Command();

program
  .name("pulse-sync")
  .description("Synchronize subscribed threat-intelligence pulses into the intelligence store")
  .version("0.1.0");

registerSyncCommand(program);
registerFeedCommand(program);
registerDbCommand(program);

// Recently imported pulses, newest first
program
  .command("status")
  .description("Show recently imported pulses")
  .option("-n, --limit <count>", "Number of imports to show", parsePositiveInteger, 25)
  .option("--dev", "Use the development store (DEV_DATABASE_URL)")
  .option("-c, --config <path>", "Configuration file (env format)")
  .action(async (options: { limit: number; dev?: boolean; config?: string }) => {
    const spinner = ora("Loading imports...").start();
    let connection: Connection | undefined;

    try {
      const config = loadConfig({
        configPath: options.config,
        dev: options.dev,
        requireFeed: false,
      });
      connection = createConnection(config.store.databaseUrl);

      const imports = await createStore(config, connection.db).listImports(options.limit);
      if (imports.length === 0) {
        spinner.info("No pulses imported yet");
      } else {
        spinner.succeed(`${String(imports.length)} most recent imports`);
        displayImportsTable(imports);
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

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();

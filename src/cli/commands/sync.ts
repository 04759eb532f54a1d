import ora from "ora";

import { loadConfig } from "../../config.js";
import { closeConnection, createConnection, maskDatabaseUrl } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { loadVocabulary } from "../../services/sync/index.js";
import { displaySyncSummary } from "../utils/display.js";
import { createSyncOrchestrator, parsePositiveInteger } from "../utils/runtime.js";

import type { Connection } from "../../db/connection.js";
import type { Command } from "commander";

// ============================================================================
// Sync Command
// ============================================================================

interface SyncCommandOptions {
  dev?: boolean;
  days?: number;
  config?: string;
  vocabulary?: string;
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Import subscribed pulses that are not yet in the store")
    .option("--dev", "Use the development store (DEV_DATABASE_URL)")
    .option(
      "-d, --days <days>",
      "Maximum age of a pulse in days",
      parsePositiveInteger
    )
    .option("-c, --config <path>", "Configuration file (env format)")
    .option("--vocabulary <path>", "Indicator vocabulary file (JSON)")
    .addHelpText(
      "after",
      `
A pulse is imported at most once: each imported pulse gets a ticket on its
event, and pulses with a ticket are skipped. Run it on a schedule; pulses that
failed are attempted again on the next run.

Exit status is 1 when any pulse failed to import.`
    )
    .action(async (options: SyncCommandOptions) => {
      const spinner = ora("Loading configuration...").start();
      let connection: Connection | undefined;

      try {
        const config = loadConfig({
          configPath: options.config,
          dev: options.dev,
          vocabularyPath: options.vocabulary,
        });
        const vocabulary = loadVocabulary(config.vocabularyPath);

        connection = createConnection(config.store.databaseUrl);
        spinner.info(
          `Store: ${maskDatabaseUrl(config.store.databaseUrl)} (${config.store.environment})`
        );

        const orchestrator = createSyncOrchestrator(config, vocabulary, connection.db);
        orchestrator.setProgressCallback((progress) => {
          spinner.text = `Importing pulses: ${String(progress.current)}/${String(progress.total)} (${progress.currentItem ?? ""})`;
        });

        spinner.start("Fetching subscribed pulses...");
        const summary = await orchestrator.run({ maxAgeDays: options.days });

        if (summary.failed > 0) {
          spinner.warn(
            `Imported ${String(summary.newlyImported)} pulses, ${String(summary.failed)} failed`
          );
          process.exitCode = 1;
        } else {
          spinner.succeed(`Imported ${String(summary.newlyImported)} pulses`);
        }

        displaySyncSummary(summary);
      } catch (error) {
        spinner.fail(`Sync aborted: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        if (connection !== undefined) {
          await closeConnection(connection);
        }
      }
    });
}

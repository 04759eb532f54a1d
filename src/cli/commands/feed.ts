import ora from "ora";

import { loadConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import { cutoffFor } from "../../services/sync/index.js";
import { displayCollection, displayCollectionsTable } from "../utils/display.js";
import { createFeedClient, parsePositiveInteger } from "../utils/runtime.js";

import type { Command } from "commander";

// ============================================================================
// Feed Commands
// ============================================================================

export function registerFeedCommand(program: Command): void {
  const feed = program
    .command("feed")
    .description("Inspect subscribed pulses without importing them");

  // feed list
  feed
    .command("list")
    .description("List subscribed pulses")
    .option("-d, --days <days>", "Maximum age of a pulse in days", parsePositiveInteger)
    .option("-c, --config <path>", "Configuration file (env format)")
    .action(async (options: { days?: number; config?: string }) => {
      const spinner = ora("Fetching subscribed pulses...").start();

      try {
        const config = loadConfig({ configPath: options.config });
        const since =
          options.days !== undefined ? cutoffFor(new Date(), options.days) : undefined;
        const { collections, rejected } =
          await createFeedClient(config).listSubscribedCollections(since);

        spinner.succeed(`Found ${String(collections.length)} pulses`);
        if (collections.length > 0) {
          displayCollectionsTable(collections);
        }
        if (rejected.length > 0) {
          console.log(`\n${String(rejected.length)} unreadable pulses:`);
          for (const rejection of rejected) {
            console.log(`  ${rejection.collectionId ?? "(no id)"}: ${rejection.reason}`);
          }
        }
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // feed show <id>
  feed
    .command("show <id>")
    .description("Show one pulse and its indicator types")
    .option("-c, --config <path>", "Configuration file (env format)")
    .action(async (id: string, options: { config?: string }) => {
      const spinner = ora(`Fetching pulse ${id}...`).start();

      try {
        const config = loadConfig({ configPath: options.config });
        const collection = await createFeedClient(config).getCollection(id);
        spinner.stop();
        displayCollection(collection);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}

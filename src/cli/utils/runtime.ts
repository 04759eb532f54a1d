/**
 * Wiring shared by the CLI commands
 */

import { InvalidArgumentError } from "commander";

import { OtxFeedClient } from "../../feed/client.js";
import {
  CollectionImporter,
  ImportLedger,
  IndicatorTranslator,
  SyncOrchestrator,
} from "../../services/sync/index.js";
import { PostgresIntelStore } from "../../store/postgres-store.js";

import type { AppConfig } from "../../config.js";
import type { Database } from "../../db/types.js";
import type { Vocabulary } from "../../services/sync/index.js";
import type { FeedClient } from "../../types/index.js";
import type { Kysely } from "kysely";

export function createFeedClient(config: AppConfig): FeedClient {
  return new OtxFeedClient(config.feed);
}

export function createStore(
  config: AppConfig,
  db: Kysely<Database>
): PostgresIntelStore {
  return new PostgresIntelStore(db, { source: config.store.source });
}

export function createSyncOrchestrator(
  config: AppConfig,
  vocabulary: Vocabulary,
  db: Kysely<Database>
): SyncOrchestrator {
  const store = createStore(config, db);
  return new SyncOrchestrator(
    createFeedClient(config),
    new ImportLedger(store),
    new CollectionImporter(store, new IndicatorTranslator(vocabulary))
  );
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

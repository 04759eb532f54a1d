import {
  FeedUnavailableError,
  LedgerAmbiguousError,
  errorMessage,
  isRetryable,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { CollectionImporter } from "./importer.js";
import type { ImportLedger } from "./ledger.js";
import type {
  FeedClient,
  SubscribedListing,
  SyncSummary,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncRunOptions {
  /** Only pulses modified within this many days; absent means no bound */
  maxAgeDays?: number;
}

export interface SyncProgress {
  phase: string;
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

const DAY_MS = 24 * 60 * 60 * 1000;

export function cutoffFor(now: Date, maxAgeDays: number): Date {
  return new Date(now.getTime() - maxAgeDays * DAY_MS);
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private onProgress?: ProgressCallback;
  private running = false;

  constructor(
    private readonly feed: FeedClient,
    private readonly ledger: ImportLedger,
    private readonly importer: CollectionImporter,
    private readonly now: () => Date = () => new Date()
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Import every subscribed collection not yet in the store.
   *
   * Collections are processed one at a time: a ticket must never become
   * visible before the edges it vouches for.
   */
  async run(options: SyncRunOptions = {}): Promise<SyncSummary> {
    if (this.running) {
      throw new Error("A sync run is already in progress");
    }
    this.running = true;

    try {
      return await this.runSequential(options);
    } finally {
      this.running = false;
    }
  }

  private async fetchCandidates(maxAgeDays?: number): Promise<SubscribedListing> {
    const cutoff =
      maxAgeDays !== undefined ? cutoffFor(this.now(), maxAgeDays) : undefined;

    if (cutoff !== undefined) {
      syncLogger.info(
        { maxAgeDays, cutoff: cutoff.toISOString() },
        "Searching for pulses modified within age bound"
      );
    }

    let listing: SubscribedListing;
    try {
      listing = await this.feed.listSubscribedCollections(cutoff);
    } catch (error) {
      syncLogger.error({ error: errorMessage(error) }, "Feed unreachable");
      if (error instanceof FeedUnavailableError) {
        throw error;
      }
      throw new FeedUnavailableError(
        `Could not list subscribed pulses: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }

    // The feed may ignore modified_since; enforce the bound here as well
    if (cutoff === undefined) {
      return listing;
    }
    return {
      collections: listing.collections.filter(
        (c) => c.modifiedAt.getTime() >= cutoff.getTime()
      ),
      rejected: listing.rejected,
    };
  }

  private async runSequential(options: SyncRunOptions): Promise<SyncSummary> {
    const summary: SyncSummary = {
      candidates: 0,
      alreadyImported: 0,
      newlyImported: 0,
      failed: 0,
      ledgerErrors: 0,
      indicatorsCreated: 0,
      indicatorsReused: 0,
      indicatorsSkipped: 0,
      indicatorsFailed: 0,
      edgesCreated: 0,
      errors: [],
      startedAt: this.now(),
      finishedAt: this.now(),
    };

    const { collections: candidates, rejected } = await this.fetchCandidates(
      options.maxAgeDays
    );
    summary.candidates = candidates.length + rejected.length;
    syncLogger.info(
      { candidates: candidates.length, rejected: rejected.length },
      "Candidate pulses fetched"
    );

    // Unreadable records count as failed imports
    for (const rejection of rejected) {
      summary.failed++;
      summary.errors.push({
        collectionId: rejection.collectionId,
        message: `Unreadable pulse: ${rejection.reason}`,
        retryable: false,
      });
    }

    for (const [index, collection] of candidates.entries()) {
      this.onProgress?.({
        phase: "pulses",
        current: index + 1,
        total: candidates.length,
        currentItem: collection.title,
      });

      const log = syncLogger.child({ collectionId: collection.id });
      log.info({ title: collection.title }, "Found pulse");

      try {
        if (await this.ledger.hasImported(collection.id)) {
          summary.alreadyImported++;
          log.info("Pulse already imported");
          continue;
        }
      } catch (error) {
        const ambiguous = new LedgerAmbiguousError(collection.id, {
          cause: error,
        });
        summary.ledgerErrors++;
        summary.errors.push({
          collectionId: collection.id,
          message: ambiguous.message,
          retryable: ambiguous.retryable,
        });
        log.warn({ error: errorMessage(error) }, "Ledger check failed, skipping");
        continue;
      }

      try {
        const result = await this.importer.import(collection);
        summary.indicatorsCreated += result.indicatorsCreated;
        summary.indicatorsReused += result.indicatorsReused;
        summary.indicatorsSkipped += result.indicatorsSkipped;
        summary.indicatorsFailed += result.indicatorsFailed;
        summary.edgesCreated += result.edgesCreated;

        await this.ledger.recordImported(collection.id, result.eventId);
        summary.newlyImported++;
      } catch (error) {
        summary.failed++;
        summary.errors.push({
          collectionId: collection.id,
          message: errorMessage(error),
          retryable: isRetryable(error),
        });
        log.error({ error: errorMessage(error) }, "Pulse import failed");
      }
    }

    summary.finishedAt = this.now();
    syncLogger.info(
      {
        candidates: summary.candidates,
        alreadyImported: summary.alreadyImported,
        newlyImported: summary.newlyImported,
        failed: summary.failed,
        ledgerErrors: summary.ledgerErrors,
      },
      "Sync run finished"
    );

    return summary;
  }
}

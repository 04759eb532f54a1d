import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { IndicatorTranslator } from "./translator.js";
import type {
  CanonicalIndicator,
  Collection,
  EventDraft,
  ImportResult,
  IntelStore,
  RawIndicator,
} from "../../types/index.js";

export const NO_DESCRIPTION = "No description given.";
export const NO_REFERENCE = "No reference documented";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Drop repeated (type, value) pairs, keeping first-seen order
 */
export function uniqueIndicators<T extends RawIndicator | CanonicalIndicator>(
  indicators: readonly T[]
): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const indicator of indicators) {
    const key = JSON.stringify([indicator.type, indicator.value]);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(indicator);
    }
  }

  return unique;
}

export function buildEventDraft(collection: Collection): EventDraft {
  return {
    title: collection.title,
    description:
      collection.description.trim() === "" ? NO_DESCRIPTION : collection.description,
    reference: collection.references[0] ?? NO_REFERENCE,
    tags: collection.tags,
    sourceCollectionId: collection.id,
    sourceCreatedAt: collection.createdAt,
  };
}

// ============================================================================
// Collection Importer
// ============================================================================

/**
 * Turns one fetched collection into an event, its indicators and the edges
 * between them. Writing the ticket is left to the caller (see ImportLedger).
 */
export class CollectionImporter {
  constructor(
    private readonly store: IntelStore,
    private readonly translator: IndicatorTranslator
  ) {}

  /**
   * Throws only when the event itself cannot be created; per-indicator store
   * errors are counted in the result.
   */
  async import(collection: Collection): Promise<ImportResult> {
    const log = syncLogger.child({ collectionId: collection.id });

    const eventId = await this.store.createEvent(buildEventDraft(collection));
    log.info({ eventId, title: collection.title }, "Event created");

    const result: ImportResult = {
      collectionId: collection.id,
      eventId,
      indicatorsCreated: 0,
      indicatorsReused: 0,
      indicatorsSkipped: 0,
      indicatorsFailed: 0,
      edgesCreated: 0,
      skippedTypes: [],
      errors: [],
    };

    const translated: CanonicalIndicator[] = [];
    const skippedTypes = new Set<string>();

    for (const raw of uniqueIndicators(collection.indicators)) {
      const outcome = this.translator.translate(raw.type, raw.value);
      if (outcome.ok) {
        translated.push(outcome.indicator);
      } else {
        result.indicatorsSkipped++;
        skippedTypes.add(outcome.failure.rawType);
        log.debug({ failure: outcome.failure }, "Indicator skipped");
      }
    }
    result.skippedTypes = [...skippedTypes];

    if (skippedTypes.size > 0) {
      log.warn(
        { skipped: result.indicatorsSkipped, types: result.skippedTypes },
        "Unsupported indicator types skipped"
      );
    }

    for (const indicator of uniqueIndicators(translated)) {
      try {
        const { id, created } = await this.store.findOrCreateIndicator(indicator);
        const linked = await this.store.linkEventToIndicator(eventId, id);

        // An indicator is counted exactly once: created, reused or failed
        if (created) {
          result.indicatorsCreated++;
        } else {
          result.indicatorsReused++;
        }
        if (linked) {
          result.edgesCreated++;
        }
      } catch (error) {
        result.indicatorsFailed++;
        result.errors.push(
          `${indicator.type} ${indicator.value}: ${errorMessage(error)}`
        );
        log.error(
          { indicator, error: errorMessage(error) },
          "Failed to store indicator"
        );
      }
    }

    log.info(
      {
        eventId,
        created: result.indicatorsCreated,
        reused: result.indicatorsReused,
        skipped: result.indicatorsSkipped,
        failed: result.indicatorsFailed,
        edges: result.edgesCreated,
      },
      "Collection imported"
    );

    return result;
  }
}

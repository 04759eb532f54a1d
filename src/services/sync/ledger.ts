/**
 * Import Ledger - answers "was this collection already imported?"
 *
 * The store's tickets are the source of truth; this class is a write-through
 * cache over them. Only positive answers are cached, so a collection that was
 * imported by another process is still found by the live query.
 */

import { syncLogger } from "../../logger.js";

import type { EventId, IntelStore } from "../../types/index.js";

export class ImportLedger {
  private readonly imported = new Set<string>();

  constructor(
    private readonly store: IntelStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Store errors propagate unchanged; callers must not read a failure as
   * "not imported".
   */
  async hasImported(collectionId: string): Promise<boolean> {
    if (this.imported.has(collectionId)) {
      return true;
    }

    const exists = await this.store.ticketExists(collectionId);
    if (exists) {
      this.imported.add(collectionId);
    }
    return exists;
  }

  /**
   * Attach the proof-of-import ticket. Call only once the event and all of
   * its relationships exist.
   */
  async recordImported(collectionId: string, eventId: EventId): Promise<void> {
    await this.store.attachTicket(eventId, {
      ticketNumber: collectionId,
      date: this.now(),
    });
    this.imported.add(collectionId);
    syncLogger.debug({ collectionId, eventId }, "Ticket attached");
  }
}

/**
 * PostgreSQL-backed intelligence store.
 *
 * Indicators are unique per (type, value) and shared between events; edges
 * and tickets are unique too, so every write here is safe to repeat.
 */

import { textArray } from "../db/connection.js";
import { toStoreError } from "../errors.js";
import { storeLogger } from "../logger.js";

import type { Database } from "../db/types.js";
import type {
  CanonicalIndicator,
  EventDraft,
  EventId,
  ImportedEventSummary,
  IndicatorId,
  IndicatorLookup,
  IntelStore,
  Ticket,
} from "../types/index.js";
import type { Kysely } from "kysely";

export const EVENT_TYPE = "Intel Sharing";
export const IMPORT_METHOD = "pulse-sync";

export const RELATIONSHIP = {
  type: "Related To",
  confidence: "high",
  reason: "Related during automatic feed import",
} as const;

export interface PostgresStoreOptions {
  /** Source name stamped on every event and indicator */
  source: string;
}

export class PostgresIntelStore implements IntelStore {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly options: PostgresStoreOptions
  ) {}

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const storeError = toStoreError(operation, error);
      storeLogger.error(
        { operation, code: storeError.code, error: storeError.message },
        "Store operation failed"
      );
      throw storeError;
    }
  }

  async createEvent(draft: EventDraft): Promise<EventId> {
    return this.guard("createEvent", async () => {
      const row = await this.db
        .insertInto("events")
        .values({
          title: draft.title,
          description: draft.description,
          event_type: EVENT_TYPE,
          source: this.options.source,
          reference: draft.reference,
          method: IMPORT_METHOD,
          bucket_list: textArray(draft.tags),
          source_collection_id: draft.sourceCollectionId,
          source_created_at: draft.sourceCreatedAt ?? null,
        })
        .returning("id")
        .executeTakeFirstOrThrow();

      storeLogger.debug({ eventId: row.id, title: draft.title }, "Event inserted");
      return row.id;
    });
  }

  async findOrCreateIndicator(
    indicator: CanonicalIndicator
  ): Promise<IndicatorLookup> {
    return this.guard("findOrCreateIndicator", async () => {
      const inserted = await this.db
        .insertInto("indicators")
        .values({
          indicator_type: indicator.type,
          value: indicator.value,
          source: this.options.source,
        })
        .onConflict((oc) => oc.columns(["indicator_type", "value"]).doNothing())
        .returning("id")
        .executeTakeFirst();

      if (inserted !== undefined) {
        return { id: inserted.id, created: true };
      }

      const existing = await this.db
        .selectFrom("indicators")
        .select("id")
        .where("indicator_type", "=", indicator.type)
        .where("value", "=", indicator.value)
        .executeTakeFirstOrThrow();

      return { id: existing.id, created: false };
    });
  }

  async linkEventToIndicator(
    eventId: EventId,
    indicatorId: IndicatorId
  ): Promise<boolean> {
    return this.guard("linkEventToIndicator", async () => {
      const inserted = await this.db
        .insertInto("relationships")
        .values({
          event_id: eventId,
          indicator_id: indicatorId,
          rel_type: RELATIONSHIP.type,
          rel_confidence: RELATIONSHIP.confidence,
          rel_reason: RELATIONSHIP.reason,
        })
        .onConflict((oc) => oc.columns(["event_id", "indicator_id"]).doNothing())
        .returning("id")
        .executeTakeFirst();

      return inserted !== undefined;
    });
  }

  async ticketExists(collectionId: string): Promise<boolean> {
    return this.guard("ticketExists", async () => {
      const row = await this.db
        .selectFrom("event_tickets")
        .select("id")
        .where("ticket_number", "=", collectionId)
        .executeTakeFirst();

      return row !== undefined;
    });
  }

  async attachTicket(eventId: EventId, ticket: Ticket): Promise<void> {
    await this.guard("attachTicket", async () => {
      await this.db
        .insertInto("event_tickets")
        .values({
          event_id: eventId,
          ticket_number: ticket.ticketNumber,
          ticket_date: ticket.date,
        })
        .execute();
    });
  }

  async listImports(limit: number): Promise<ImportedEventSummary[]> {
    return this.guard("listImports", async () => {
      const rows = await this.db
        .selectFrom("event_tickets as t")
        .innerJoin("events as e", "e.id", "t.event_id")
        .select((eb) => [
          "e.id as event_id",
          "e.title",
          "t.ticket_number",
          "t.ticket_date",
          eb
            .selectFrom("relationships as r")
            .whereRef("r.event_id", "=", "e.id")
            .select((sub) => sub.fn.countAll<string>().as("n"))
            .as("indicator_count"),
        ])
        .orderBy("t.ticket_date", "desc")
        .limit(limit)
        .execute();

      return rows.map((row) => ({
        eventId: row.event_id,
        ticketNumber: row.ticket_number,
        title: row.title,
        indicatorCount: Number(row.indicator_count ?? 0),
        importedAt: row.ticket_date,
      }));
    });
  }
}

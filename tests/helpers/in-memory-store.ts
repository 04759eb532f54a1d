/**
 * In-process IntelStore with the same uniqueness rules as the PostgreSQL
 * schema: one indicator per (type, value), one edge per pair, one ticket per
 * ticket number.
 */

import { StoreRejectedError } from "../../src/errors.js";

import type {
  CanonicalIndicator,
  EventDraft,
  EventId,
  ImportedEventSummary,
  IndicatorId,
  IndicatorLookup,
  IntelStore,
  Ticket,
} from "../../src/types/index.js";

interface StoredIndicator extends CanonicalIndicator {
  id: IndicatorId;
}

export class InMemoryIntelStore implements IntelStore {
  readonly events = new Map<EventId, EventDraft>();
  readonly indicators = new Map<string, StoredIndicator>();
  readonly edges = new Set<string>();
  readonly tickets = new Map<string, { eventId: EventId; date: Date }>();
  private nextId = 1;

  async createEvent(draft: EventDraft): Promise<EventId> {
    const id = String(this.nextId++);
    this.events.set(id, draft);
    return id;
  }

  async findOrCreateIndicator(
    indicator: CanonicalIndicator
  ): Promise<IndicatorLookup> {
    const key = `${indicator.type}|${indicator.value}`;
    const existing = this.indicators.get(key);
    if (existing !== undefined) {
      return { id: existing.id, created: false };
    }
    const id = String(this.nextId++);
    this.indicators.set(key, { ...indicator, id });
    return { id, created: true };
  }

  async linkEventToIndicator(
    eventId: EventId,
    indicatorId: IndicatorId
  ): Promise<boolean> {
    const key = `${eventId}->${indicatorId}`;
    if (this.edges.has(key)) {
      return false;
    }
    this.edges.add(key);
    return true;
  }

  async ticketExists(collectionId: string): Promise<boolean> {
    return this.tickets.has(collectionId);
  }

  async attachTicket(eventId: EventId, ticket: Ticket): Promise<void> {
    if (this.tickets.has(ticket.ticketNumber)) {
      throw new StoreRejectedError(
        "attachTicket",
        `duplicate ticket ${ticket.ticketNumber}`
      );
    }
    this.tickets.set(ticket.ticketNumber, { eventId, date: ticket.date });
  }

  async listImports(limit: number): Promise<ImportedEventSummary[]> {
    return [...this.tickets.entries()].slice(0, limit).map(([number, t]) => ({
      eventId: t.eventId,
      ticketNumber: number,
      title: this.events.get(t.eventId)?.title ?? "",
      indicatorCount: this.edgesOf(t.eventId).length,
      importedAt: t.date,
    }));
  }

  /** Indicators linked to an event, as (type, value) pairs */
  edgesOf(eventId: EventId): CanonicalIndicator[] {
    const byId = new Map(
      [...this.indicators.values()].map((i) => [i.id, i] as const)
    );
    return [...this.edges]
      .filter((edge) => edge.startsWith(`${eventId}->`))
      .map((edge) => byId.get(edge.slice(eventId.length + 2)))
      .filter((i): i is StoredIndicator => i !== undefined)
      .map(({ type, value }) => ({ type, value }));
  }

  snapshot(): {
    events: [EventId, EventDraft][];
    indicators: StoredIndicator[];
    edges: string[];
    tickets: [string, { eventId: EventId; date: Date }][];
  } {
    return {
      events: [...this.events.entries()],
      indicators: [...this.indicators.values()],
      edges: [...this.edges],
      tickets: [...this.tickets.entries()],
    };
  }
}

import type { Generated } from "kysely";

// ============================================================================
// Table Types (matching sql/intel-schema.sql)
// ============================================================================

// BIGSERIAL / BIGINT columns come back from pg as strings

export interface EventsTable {
  id: Generated<string>;
  title: string;
  description: string;
  event_type: string;
  source: string;
  reference: string;
  method: string;
  bucket_list: string[];
  source_collection_id: string;
  source_created_at: Date | null;
  created_at: Generated<Date>;
}

export interface EventTicketsTable {
  id: Generated<string>;
  event_id: string;
  ticket_number: string;
  ticket_date: Date;
  created_at: Generated<Date>;
}

export interface IndicatorsTable {
  id: Generated<string>;
  indicator_type: string;
  value: string;
  source: string;
  created_at: Generated<Date>;
}

export interface RelationshipsTable {
  id: Generated<string>;
  event_id: string;
  indicator_id: string;
  rel_type: string;
  rel_confidence: string;
  rel_reason: string;
  rel_date: Generated<Date>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  events: EventsTable;
  event_tickets: EventTicketsTable;
  indicators: IndicatorsTable;
  relationships: RelationshipsTable;
}

// Pulse sync domain types

// =====================
// Feed Types
// =====================

/**
 * Indicator exactly as the feed reports it
 */
export interface RawIndicator {
  type: string;
  value: string;
}

/**
 * A subscribed pulse, immutable once fetched
 */
export interface Collection {
  id: string;
  title: string;
  description: string;
  modifiedAt: Date;
  createdAt?: Date;
  author?: string;
  indicators: RawIndicator[];
  tags: string[];
  references: string[];
}

// =====================
// Translation Types
// =====================

/**
 * Indicator expressed in the store's type vocabulary
 */
export interface CanonicalIndicator {
  type: string;
  value: string;
}

export type TranslationFailureReason = "unmapped" | "unsupported" | "empty-value";

export interface TranslationFailure {
  rawType: string;
  rawValue: string;
  reason: TranslationFailureReason;
}

export type TranslationResult =
  | { ok: true; indicator: CanonicalIndicator }
  | { ok: false; failure: TranslationFailure };

// =====================
// Store Types
// =====================

export type EventId = string;
export type IndicatorId = string;

/**
 * Proof that a collection was imported, attached to its event
 */
export interface Ticket {
  ticketNumber: string;
  date: Date;
}

export interface EventDraft {
  title: string;
  description: string;
  reference: string;
  tags: string[];
  sourceCollectionId: string;
  sourceCreatedAt?: Date;
}

export interface IndicatorLookup {
  id: IndicatorId;
  created: boolean;
}

export interface ImportedEventSummary {
  eventId: EventId;
  ticketNumber: string;
  title: string;
  indicatorCount: number;
  importedAt: Date;
}

/**
 * Relationship-oriented intelligence store
 */
export interface IntelStore {
  createEvent(draft: EventDraft): Promise<EventId>;
  findOrCreateIndicator(indicator: CanonicalIndicator): Promise<IndicatorLookup>;
  /** Resolves true when a new edge was created, false when it already existed */
  linkEventToIndicator(
    eventId: EventId,
    indicatorId: IndicatorId
  ): Promise<boolean>;
  ticketExists(collectionId: string): Promise<boolean>;
  attachTicket(eventId: EventId, ticket: Ticket): Promise<void>;
  listImports(limit: number): Promise<ImportedEventSummary[]>;
}

/**
 * A pulse the feed returned that could not be read as a collection
 */
export interface FeedRejection {
  /** Absent when the record carried no usable id */
  collectionId?: string;
  reason: string;
}

export interface SubscribedListing {
  collections: Collection[];
  rejected: FeedRejection[];
}

/**
 * Source of subscribed collections
 */
export interface FeedClient {
  listSubscribedCollections(modifiedSince?: Date): Promise<SubscribedListing>;
  getCollection(id: string): Promise<Collection>;
}

// =====================
// Result Types
// =====================

export interface ImportResult {
  collectionId: string;
  eventId: EventId;
  indicatorsCreated: number;
  indicatorsReused: number;
  indicatorsSkipped: number;
  indicatorsFailed: number;
  edgesCreated: number;
  /** Distinct raw types that failed translation */
  skippedTypes: string[];
  errors: string[];
}

export interface SyncIssue {
  /** Absent for feed records that carried no usable id */
  collectionId?: string;
  message: string;
  /** False when the next scheduled run will hit the same failure */
  retryable: boolean;
}

export interface SyncSummary {
  candidates: number;
  alreadyImported: number;
  newlyImported: number;
  failed: number;
  ledgerErrors: number;
  indicatorsCreated: number;
  indicatorsReused: number;
  indicatorsSkipped: number;
  indicatorsFailed: number;
  edgesCreated: number;
  errors: SyncIssue[];
  startedAt: Date;
  finishedAt: Date;
}

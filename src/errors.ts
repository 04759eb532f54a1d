/**
 * Error taxonomy for the sync engine.
 *
 * Store and feed errors carry a `retryable` flag: a retryable failure is left
 * for the next scheduled run, a non-retryable one needs someone to look at it.
 */

// ============================================================================
// Store Errors
// ============================================================================

export class StoreUnavailableError extends Error {
  code = "STORE_UNAVAILABLE" as const;
  retryable = true;
  operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreUnavailableError";
    this.operation = operation;
  }
}

export class StoreRejectedError extends Error {
  code = "STORE_REJECTED" as const;
  retryable = false;
  operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreRejectedError";
    this.operation = operation;
  }
}

export type StoreError = StoreUnavailableError | StoreRejectedError;

export function isStoreError(error: unknown): error is StoreError {
  return (
    error instanceof StoreUnavailableError ||
    error instanceof StoreRejectedError
  );
}

// ============================================================================
// Ledger / Feed / Config Errors
// ============================================================================

export class LedgerAmbiguousError extends Error {
  code = "LEDGER_AMBIGUOUS" as const;
  retryable = true;
  collectionId: string;

  constructor(collectionId: string, options?: ErrorOptions) {
    super(
      `Could not determine whether collection ${collectionId} was already imported`,
      options
    );
    this.name = "LedgerAmbiguousError";
    this.collectionId = collectionId;
  }
}

export class FeedUnavailableError extends Error {
  code = "FEED_UNAVAILABLE" as const;
  retryable = true;
  status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "FeedUnavailableError";
    this.status = status;
  }
}

/**
 * One feed record (a pulse) that does not match the expected shape. The feed
 * keeps serving it, so retrying will not help.
 */
export class FeedRecordError extends Error {
  code = "FEED_RECORD_INVALID" as const;
  retryable = false;

  constructor(message: string) {
    super(message);
    this.name = "FeedRecordError";
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  retryable = false;
  details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "ConfigError";
    this.details = details;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `retryable` flag of a classified error. Unclassified errors are
 * not retryable: nothing says the next run will see anything different.
 */
export function isRetryable(error: unknown): boolean {
  return (
    error instanceof Error &&
    "retryable" in error &&
    error.retryable === true
  );
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Classify a raw driver error as StoreUnavailable or StoreRejected.
 *
 * SQLSTATE class 22 (data exception) and 23 (integrity constraint violation)
 * are rejections. Everything else (ECONNREFUSED, class 08, 57P01, ...) counts
 * as the store being unavailable.
 */
export function toStoreError(operation: string, error: unknown): StoreError {
  if (isStoreError(error)) {
    return error;
  }

  const message = `${operation} failed: ${errorMessage(error)}`;
  const code = errorCode(error);

  if (code !== undefined && (code.startsWith("22") || code.startsWith("23"))) {
    return new StoreRejectedError(operation, message, { cause: error });
  }

  return new StoreUnavailableError(operation, message, { cause: error });
}

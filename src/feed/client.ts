import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ProxyAgent, type Dispatcher } from "undici";

import { FeedRecordError, FeedUnavailableError, errorMessage } from "../errors.js";
import { feedLogger } from "../logger.js";
import {
  FeedIndicatorSchema,
  FeedPulsePageSchema,
  FeedPulseSchema,
  type FeedIndicator,
  type FeedPulse,
  type FeedPulsePage,
} from "../types/feed.js";

import type { TSchema, Static } from "@sinclair/typebox";
import type {
  Collection,
  FeedClient,
  FeedRejection,
  SubscribedListing,
} from "../types/index.js";

export interface FeedClientOptions {
  baseUrl: string;
  apiKey: string;
  pageSize: number;
  rateLimitMs: number;
  timeoutMs: number;
  /** HTTP(S) proxy for every feed request */
  proxyUrl?: string;
}

/**
 * Parse a feed timestamp. The feed omits the zone designator on UTC values
 * and sends microseconds, e.g. "2024-03-05T12:34:56.789000".
 */
export function parseFeedTimestamp(value: string): Date {
  let normalized = value.trim().replace(" ", "T");
  normalized = normalized.replace(/(\.\d{3})\d+/, "$1");
  if (!/(Z|[+-]\d{2}:?\d{2})$/i.test(normalized)) {
    normalized += "Z";
  }

  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new FeedRecordError(`Invalid timestamp in feed: ${value}`);
  }
  return date;
}

/**
 * Build the first-page URL for the subscribed pulses listing.
 *
 * The feed returns only a handful of pulses when no limit is given, so a page
 * size is always sent.
 */
export function buildSubscribedUrl(
  baseUrl: string,
  pageSize: number,
  modifiedSince?: Date
): string {
  const params = new URLSearchParams();
  if (modifiedSince !== undefined) {
    params.set("modified_since", modifiedSince.toISOString());
  }
  params.set("limit", String(pageSize));
  params.set("page", "1");
  return `${baseUrl}/pulses/subscribed?${params.toString()}`;
}

function isFeedIndicator(value: unknown): value is FeedIndicator {
  return Value.Check(FeedIndicatorSchema, value);
}

/**
 * Indicators that are not a (type, indicator) string pair are dropped
 */
export function toCollection(pulse: FeedPulse): Collection {
  const createdAt =
    pulse.created !== undefined && pulse.created !== null
      ? parseFeedTimestamp(pulse.created)
      : undefined;

  return {
    id: pulse.id,
    title: pulse.name,
    description: pulse.description ?? "",
    modifiedAt: parseFeedTimestamp(pulse.modified),
    createdAt,
    author: pulse.author_name ?? undefined,
    indicators: (pulse.indicators ?? []).filter(isFeedIndicator).map((i) => ({
      type: i.type,
      value: i.indicator,
    })),
    tags: pulse.tags ?? [],
    references: pulse.references ?? [],
  };
}

export type PulseReading =
  | { ok: true; collection: Collection; droppedIndicators: number }
  | { ok: false; rejection: FeedRejection };

function pulseIdOf(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "id" in data) {
    return typeof data.id === "string" && data.id !== "" ? data.id : undefined;
  }
  return undefined;
}

/**
 * Read one pulse record from a feed response
 */
export function readPulse(data: unknown): PulseReading {
  const collectionId = pulseIdOf(data);

  if (!Value.Check(FeedPulseSchema, data)) {
    const first = Value.Errors(FeedPulseSchema, data).First();
    const reason =
      first !== undefined ? `${first.path}: ${first.message}` : "unknown";
    return { ok: false, rejection: { collectionId, reason } };
  }

  try {
    const collection = toCollection(data);
    const droppedIndicators =
      (data.indicators?.length ?? 0) - collection.indicators.length;
    return { ok: true, collection, droppedIndicators };
  } catch (error) {
    if (error instanceof FeedRecordError) {
      return { ok: false, rejection: { collectionId, reason: error.message } };
    }
    throw error;
  }
}

/**
 * HTTP client for the subscribed pulse feed
 */
export class OtxFeedClient implements FeedClient {
  private lastRequestTime = 0;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(private readonly options: FeedClientOptions) {
    this.dispatcher =
      options.proxyUrl !== undefined ? new ProxyAgent(options.proxyUrl) : undefined;
  }

  private async rateLimitedFetch(url: string): Promise<Response> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (elapsed < this.options.rateLimitMs) {
      const waitTime = this.options.rateLimitMs - elapsed;
      feedLogger.debug({ waitTime }, "Rate limiting: waiting before request");
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }

    this.lastRequestTime = Date.now();
    feedLogger.debug({ url }, "Sending request to feed");

    const startTime = performance.now();
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "X-OTX-API-KEY": this.options.apiKey },
        signal: AbortSignal.timeout(this.options.timeoutMs),
        ...(this.dispatcher !== undefined ? { dispatcher: this.dispatcher } : {}),
      });
    } catch (error) {
      feedLogger.error({ url, error: errorMessage(error) }, "Feed request failed");
      throw new FeedUnavailableError(
        `Feed request failed: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }
    const duration = Math.round(performance.now() - startTime);

    feedLogger.debug(
      {
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from feed"
    );

    return response;
  }

  private async getValidated<T extends TSchema>(
    url: string,
    schema: T,
    what: string
  ): Promise<Static<T>> {
    const response = await this.rateLimitedFetch(url);
    if (!response.ok) {
      feedLogger.error(
        { url, status: response.status, statusText: response.statusText },
        `Failed to fetch ${what}`
      );
      throw new FeedUnavailableError(
        `Failed to fetch ${what}: ${String(response.status)} ${response.statusText}`,
        response.status
      );
    }

    const data: unknown = await response.json();
    if (!Value.Check(schema, data)) {
      const first = Value.Errors(schema, data).First();
      const detail =
        first !== undefined ? `${first.path}: ${first.message}` : "unknown";
      feedLogger.error({ url, detail }, `Malformed ${what} response`);
      throw new FeedUnavailableError(`Malformed ${what} response (${detail})`);
    }
    return data;
  }

  /**
   * Fetch every subscribed pulse, following pagination to the end.
   * Records that cannot be read are returned as rejections next to the
   * readable ones.
   * @param modifiedSince - only pulses modified at or after this instant
   */
  async listSubscribedCollections(
    modifiedSince?: Date
  ): Promise<SubscribedListing> {
    const listing: SubscribedListing = { collections: [], rejected: [] };
    const visited = new Set<string>();
    let url: string | null = buildSubscribedUrl(
      this.options.baseUrl,
      this.options.pageSize,
      modifiedSince
    );

    feedLogger.info(
      { modifiedSince: modifiedSince?.toISOString() },
      "Fetching subscribed pulses"
    );

    while (url !== null && !visited.has(url)) {
      visited.add(url);
      const page: FeedPulsePage = await this.getValidated(url, FeedPulsePageSchema, "pulse page");

      for (const record of page.results) {
        const reading = readPulse(record);
        if (!reading.ok) {
          feedLogger.warn(reading.rejection, "Unreadable pulse in feed");
          listing.rejected.push(reading.rejection);
          continue;
        }
        if (reading.droppedIndicators > 0) {
          feedLogger.warn(
            {
              collectionId: reading.collection.id,
              dropped: reading.droppedIndicators,
            },
            "Malformed indicators dropped"
          );
        }
        listing.collections.push(reading.collection);
      }

      feedLogger.debug(
        { pageResults: page.results.length, total: listing.collections.length },
        "Fetched pulse page"
      );
      url = page.next ?? null;
    }

    feedLogger.info(
      {
        count: listing.collections.length,
        rejected: listing.rejected.length,
      },
      "Fetched subscribed pulses"
    );
    return listing;
  }

  async getCollection(id: string): Promise<Collection> {
    const url = `${this.options.baseUrl}/pulses/${encodeURIComponent(id)}`;
    feedLogger.info({ collectionId: id }, "Fetching pulse");
    const data = await this.getValidated(url, Type.Unknown(), "pulse");

    const reading = readPulse(data);
    if (!reading.ok) {
      throw new FeedRecordError(
        `Malformed pulse ${id}: ${reading.rejection.reason}`
      );
    }
    return reading.collection;
  }
}

/**
 * TypeBox schemas for the pulse feed API responses
 */

import { Type, type Static } from "@sinclair/typebox";

// Only the fields the sync reads are declared; extra fields pass through.
// Page entries and pulse indicators are validated one record at a time.

export const FeedIndicatorSchema = Type.Object({
  type: Type.String(),
  indicator: Type.String(),
});

export type FeedIndicator = Static<typeof FeedIndicatorSchema>;

export const FeedPulseSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  modified: Type.String(),
  created: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  author_name: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  tags: Type.Optional(Type.Array(Type.String())),
  references: Type.Optional(Type.Array(Type.String())),
  // Entries are checked one by one against FeedIndicatorSchema
  indicators: Type.Optional(Type.Array(Type.Unknown())),
});

export type FeedPulse = Static<typeof FeedPulseSchema>;

export const FeedPulsePageSchema = Type.Object({
  // Entries are checked one by one against FeedPulseSchema
  results: Type.Array(Type.Unknown()),
  next: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  count: Type.Optional(Type.Number()),
});

export type FeedPulsePage = Static<typeof FeedPulsePageSchema>;

/**
 * Vocabulary table - maps feed indicator types onto the store's canonical
 * type enumeration, plus per-type value normalization rules.
 *
 * Loaded once at startup and treated as immutable for the run.
 */

import { readFileSync } from "node:fs";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "../../errors.js";

// ============================================================================
// Schema
// ============================================================================

export const NormalizationRuleSchema = Type.Union([
  Type.Literal("trim"),
  Type.Literal("lowercase"),
  Type.Literal("uppercase"),
  Type.Literal("collapse-whitespace"),
]);

export type NormalizationRule = Static<typeof NormalizationRuleSchema>;

export const VocabularyFileSchema = Type.Object({
  canonicalTypes: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  mappings: Type.Record(
    Type.String(),
    Type.Union([Type.String({ minLength: 1 }), Type.Null()])
  ),
  normalization: Type.Optional(
    Type.Record(Type.String(), Type.Array(NormalizationRuleSchema))
  ),
});

export type VocabularyFile = Static<typeof VocabularyFileSchema>;

// ============================================================================
// Vocabulary
// ============================================================================

export interface Vocabulary {
  readonly canonicalTypes: ReadonlySet<string>;
  /** Source type -> canonical type; null marks a known but unsupported type */
  readonly mappings: ReadonlyMap<string, string | null>;
  readonly normalization: ReadonlyMap<string, readonly NormalizationRule[]>;
}

/**
 * Build a Vocabulary from already-parsed data, checking that every mapping
 * target and normalization key is a declared canonical type.
 */
export function createVocabulary(data: unknown): Vocabulary {
  if (!Value.Check(VocabularyFileSchema, data)) {
    const details = [...Value.Errors(VocabularyFileSchema, data)].map(
      (e) => `${e.path || "/"}: ${e.message}`
    );
    throw new ConfigError("Invalid vocabulary", details);
  }

  const canonicalTypes = new Set(data.canonicalTypes);
  const problems: string[] = [];

  for (const [source, target] of Object.entries(data.mappings)) {
    if (target !== null && !canonicalTypes.has(target)) {
      problems.push(`mapping "${source}" targets unknown type "${target}"`);
    }
  }

  const normalization = new Map<string, readonly NormalizationRule[]>();
  for (const [type, rules] of Object.entries(data.normalization ?? {})) {
    if (!canonicalTypes.has(type)) {
      problems.push(`normalization rules for unknown type "${type}"`);
    }
    normalization.set(type, rules);
  }

  if (problems.length > 0) {
    throw new ConfigError("Invalid vocabulary", problems);
  }

  return {
    canonicalTypes,
    mappings: new Map(Object.entries(data.mappings)),
    normalization,
  };
}

export function loadVocabulary(path: string): Vocabulary {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read vocabulary file ${path}`, [
      errorMessage(error),
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Vocabulary file ${path} is not valid JSON`, [
      errorMessage(error),
    ]);
  }

  return createVocabulary(data);
}

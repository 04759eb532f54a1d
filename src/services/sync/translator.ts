import type { NormalizationRule, Vocabulary } from "./vocabulary.js";
import type { TranslationResult } from "../../types/index.js";

function applyRule(value: string, rule: NormalizationRule): string {
  switch (rule) {
    case "trim":
      return value.trim();
    case "lowercase":
      return value.toLowerCase();
    case "uppercase":
      return value.toUpperCase();
    case "collapse-whitespace":
      return value.replace(/\s+/g, " ");
  }
}

/**
 * Maps feed-native indicators onto the store's canonical vocabulary.
 * Pure: the result depends only on the arguments and the injected table.
 */
export class IndicatorTranslator {
  constructor(private readonly vocabulary: Vocabulary) {}

  translate(rawType: string, rawValue: string): TranslationResult {
    const trimmed = rawValue.trim();
    if (trimmed === "") {
      return { ok: false, failure: { rawType, rawValue, reason: "empty-value" } };
    }

    const canonicalType = this.vocabulary.mappings.get(rawType);
    if (canonicalType === undefined) {
      return { ok: false, failure: { rawType, rawValue, reason: "unmapped" } };
    }
    if (canonicalType === null) {
      return { ok: false, failure: { rawType, rawValue, reason: "unsupported" } };
    }

    const rules = this.vocabulary.normalization.get(canonicalType) ?? [];
    const value = rules.reduce(applyRule, trimmed);

    return { ok: true, indicator: { type: canonicalType, value } };
  }
}

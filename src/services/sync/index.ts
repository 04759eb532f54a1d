// Sync Services - Re-exports
export { CollectionImporter, buildEventDraft, uniqueIndicators } from "./importer.js";
export { ImportLedger } from "./ledger.js";
export { SyncOrchestrator, cutoffFor } from "./orchestrator.js";
export type { SyncProgress, SyncRunOptions } from "./orchestrator.js";
export { IndicatorTranslator } from "./translator.js";
export { createVocabulary, loadVocabulary } from "./vocabulary.js";
export type { NormalizationRule, Vocabulary } from "./vocabulary.js";

export { ScoreCombiner, DEFAULT_METRICS, type WeightedMetric } from "./combiner.js";
export { toWireDecision, wireDecisionToJson, type MatchDecision, type StandardizationResult } from "./decision.js";
export {
  DocumentProcessor,
  DEFAULT_DOCUMENT_FIELDS,
  classify,
  type DocumentFields,
  type DocumentNode,
  type ProcessOptions,
  type ProcessResult,
} from "./document-processor.js";
export { ConfigurationError, isConfigurationError, type ConfigurationErrorCode } from "./errors.js";
export {
  FuzzyMatcher,
  type FuzzyMatcherOptions,
  type MatchCandidate,
  type ScoreBreakdown,
} from "./fuzzy-matcher.js";
export { cleanSnapshot, type CleanOptions, type CleanReport, type MergedRecord } from "./maintenance.js";
export * from "./metrics.js";
export { createNormalizer, normalize, type Normalizer } from "./normalizer.js";
export {
  Registry,
  SessionLog,
  fromSnapshotRecord,
  toSnapshotRecord,
  type CanonicalEntry,
} from "./registry.js";
export {
  TeamStandardizer,
  DEFAULT_AUTO_ADD_THRESHOLD,
  DEFAULT_MATCH_THRESHOLD,
  validateThresholds,
  type AddTeamOptions,
  type AddTeamResult,
  type Logger,
  type StandardizeOptions,
  type StandardizerOptions,
} from "./standardizer.js";
export { cleanTeamName, isBlank, makeEntryKey, normalizeKeyPart } from "./team-name-utils.js";
export { DEFAULT_VOCABULARY, type NormalizerVocabulary } from "./vocabulary.js";

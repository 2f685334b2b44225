/**
 * @tradebreak/reconciler — Trade normalization, matching and break classification.
 *
 * Pipeline:
 *   raw batches → normalizeBatch → TradeMatcher.match → BreakClassifier.classify
 *
 * Pure and synchronous: no I/O, no logging, no clocks (callers pass `now`).
 */

// Configuration
export {
  DEFAULT_MATCHER_CONFIG,
  DEFAULT_CLASSIFIER_CONFIG,
  MatcherConfigError,
  resolveMatcherConfig,
  resolveClassifierConfig,
  totalWeight,
} from "./config.js";
export type {
  MatcherConfig,
  ClassifierConfig,
  SeverityThresholds,
} from "./config.js";

// Normalizer
export {
  FIELD_ALIASES,
  normalizeBatch,
  normalizeCounterparty,
  normalizeSymbol,
  normalizeSide,
  rawExternalRef,
  toCalendarDate,
} from "./normalizer.js";
export type { NormalizeOptions, NormalizedBatch } from "./normalizer.js";

// Scoring
export { scorePair, relativeDifference, daysBetween, roundTo } from "./scoring.js";
export {
  counterpartySimilarity,
  editRatio,
  tokenSetRatio,
  tokenSortRatio,
} from "./similarity.js";

// Candidates & assignment
export { blockingKey, generateCandidates } from "./candidates.js";
export type { CandidateSet } from "./candidates.js";
export { assignGreedy, compareCandidates } from "./assignment.js";

// Matcher
export { TradeMatcher } from "./trade-matcher.js";

// Classifier
export {
  BreakClassifier,
  bucketSeverity,
  raiseSeverity,
  notionalOf,
} from "./break-classifier.js";
export type { ClassificationContext } from "./break-classifier.js";

// Identity
export { BREAK_ID_PREFIX, computeBreakIdentity, sortRefs } from "./identity.js";
export type { BreakIdentity } from "./identity.js";

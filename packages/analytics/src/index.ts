/**
 * @tradebreak/analytics — Read-side analytics over breaks and runs.
 *
 * - Root-cause patterns over resolved breaks
 * - Reporting projections (open breaks, aging, run history, summary)
 * - Feature engineering and the prediction adapter contract
 * - Logistic model scorer loaded from a JSON artifact
 *
 * Everything here is read-only with respect to breaks and runs.
 */

// Root cause
export { analyzeRootCauses, DEFAULT_TOP_N } from "./root-cause.js";
export type {
  RootCauseOptions,
  RootCausePattern,
  RootCauseSummary,
  ResolutionTimes,
  OwnerCount,
} from "./root-cause.js";

// Reporting
export {
  AGING_BUCKETS,
  agingBucket,
  agingBuckets,
  openBreaks,
  runHistory,
  summary,
} from "./reporting.js";
export type {
  AgingBucket,
  AgingReport,
  BucketCounts,
  ReconciliationSummary,
} from "./reporting.js";

// Features
export {
  buildFeatureVector,
  categoryVolatility,
  recordsSeen,
  PRIOR_BREAK_RATE,
  DEFAULT_FEATURE_WINDOW,
} from "./features.js";
export type { PendingReconciliation } from "./features.js";

// Prediction
export {
  PredictionAdapter,
  PredictionTimeoutError,
  DEFAULT_PREDICTION_TIMEOUT_MS,
  riskLevelFor,
  withTimeout,
} from "./prediction-adapter.js";
export type { BreakScorer, PredictionAdapterOptions } from "./prediction-adapter.js";
export {
  LogisticModelScorer,
  ModelArtifactError,
  ModelArtifactSchema,
  loadModelArtifact,
  parseModelArtifact,
} from "./logistic-scorer.js";
export type { ModelArtifact } from "./logistic-scorer.js";

// Statistics
export { median, percentile, coefficientOfVariation } from "./stats.js";

/**
 * @tradebreak/types — Shared domain types for the reconciliation stack.
 *
 * These types are used across all packages:
 * - Canonical trade records and per-record validation issues
 * - Match outcomes (closed tagged variant)
 * - Breaks and escalation events
 * - Reconciliation runs
 * - Prediction contract
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards narrow at boundaries; meaning lives in consuming code
 */

// Trade types
export type {
  SourceId,
  Side,
  TradeRecord,
  TradeRef,
  RecordSide,
  RecordIssue,
  RecordIssueCode,
} from "./trade.js";

// Match types
export type {
  ComparedField,
  FieldDiff,
  ScoreBreakdown,
  MatchCandidatePair,
  MatchConfidence,
  MatchedPair,
  MatchOutcome,
  MatchOutcomeKind,
  MatchSummary,
  MatchResult,
} from "./match.js";

// Break types
export type {
  Break,
  BreakKind,
  BreakCategory,
  BreakSeverity,
  BreakStatus,
  BreakRiskScore,
  EscalationEvent,
} from "./break.js";

// Run types
export type {
  ReconciliationRun,
  RunCounts,
  RunStatus,
  RunTrigger,
} from "./run.js";

// Prediction types
export type {
  FeatureVector,
  PredictionResult,
  RiskLevel,
} from "./prediction.js";

// Runtime guards
export {
  SIDES,
  BREAK_STATUSES,
  BREAK_SEVERITIES,
  BREAK_CATEGORIES,
  isCalendarDate,
  isSide,
  isTradeRecord,
  isBreakStatus,
  isBreakSeverity,
  isBreakCategory,
  isOpenStatus,
  severityRank,
} from "./guards.js";

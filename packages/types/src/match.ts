/**
 * Match Types
 *
 * Output of one matching pass between source A and source B.
 *
 * Invariant: every valid input record lands in exactly one outcome;
 * every invalid input record lands in `rejected` and nowhere else.
 */

import type { RecordIssue, TradeRecord } from "./trade.js";

/**
 * Fields compared beyond the symbol/side gate.
 */
export type ComparedField =
  | "quantity"
  | "price"
  | "settlement_date"
  | "currency"
  | "counterparty";

/**
 * A difference observed between the two records of a pair.
 */
export interface FieldDiff {
  readonly field: ComparedField;
  readonly valueA: string | number | null;
  readonly valueB: string | number | null;

  /**
   * Relative difference (fraction of A's value) for quantity and price,
   * whole days for settlement date, 1 for a currency difference,
   * 1 − name similarity for counterparty.
   */
  readonly deviation: number;

  /** Whether the difference is beyond the configured tolerance */
  readonly exceedsTolerance: boolean;
}

/**
 * Per-field similarity components, each in [0, 1].
 */
export interface ScoreBreakdown {
  readonly symbol: number;
  readonly quantity: number;
  readonly price: number;
  readonly settlementDate: number;
  /** Present only when at least one side names a counterparty */
  readonly counterparty?: number | undefined;
}

/**
 * A scored candidate pair. Transient: produced and consumed within one pass.
 */
export interface MatchCandidatePair {
  readonly a: TradeRecord;
  readonly b: TradeRecord;
  /** Weighted score in [0, 1] */
  readonly score: number;
  readonly breakdown: ScoreBreakdown;
  readonly fieldDiffs: readonly FieldDiff[];
}

export type MatchConfidence = "full" | "low";

/**
 * A committed pair.
 */
export interface MatchedPair extends MatchCandidatePair {
  readonly confidence: MatchConfidence;
}

/**
 * Where a record ended up.
 */
export type MatchOutcome =
  | { readonly kind: "Matched"; readonly pair: MatchedPair }
  | { readonly kind: "UnmatchedA"; readonly record: TradeRecord }
  | { readonly kind: "UnmatchedB"; readonly record: TradeRecord };

export type MatchOutcomeKind = MatchOutcome["kind"];

export interface MatchSummary {
  readonly totalA: number;
  readonly totalB: number;
  readonly matched: number;
  readonly lowConfidence: number;
  readonly unmatchedA: number;
  readonly unmatchedB: number;
  readonly rejectedA: number;
  readonly rejectedB: number;
  /** Candidate pairs that were scored */
  readonly candidatesScored: number;
}

/**
 * Full result of one matching pass.
 */
export interface MatchResult {
  /** Matched pairs in commit order, then unmatched A, then unmatched B */
  readonly outcomes: readonly MatchOutcome[];
  readonly rejected: readonly RecordIssue[];
  readonly summary: MatchSummary;
}

/**
 * Break Classifier
 *
 * Turns one MatchResult into Break drafts (status Open, version 0).
 *
 * - Each unmatched record → MissingCounterpart, severity by notional
 * - Each low-confidence pair with a field beyond tolerance → FieldMismatch,
 *   severity by deviation; several such fields → "combination"
 * - Full-confidence pairs and within-tolerance pairs → nothing
 *
 * The classifier only creates. Deduplication against breaks that already
 * exist happens in the store, keyed by the content-derived id.
 */

import { BREAK_SEVERITIES, severityRank } from "@tradebreak/types";
import type {
  Break,
  BreakCategory,
  BreakSeverity,
  FieldDiff,
  MatchResult,
  MatchedPair,
  SourceId,
  TradeRecord,
  TradeRef,
} from "@tradebreak/types";
import { resolveClassifierConfig } from "./config.js";
import type { ClassifierConfig, SeverityThresholds } from "./config.js";
import { computeBreakIdentity } from "./identity.js";
import { roundTo } from "./scoring.js";

export interface ClassificationContext {
  readonly runId: string;
  readonly tradeDate: string;
  readonly source1: SourceId;
  readonly source2: SourceId;
  /** ISO-8601 creation timestamp */
  readonly now: string;
}

// =============================================================================
// Severity helpers
// =============================================================================

export function bucketSeverity(value: number, thresholds: SeverityThresholds): BreakSeverity {
  if (value >= thresholds.critical) return "Critical";
  if (value >= thresholds.high) return "High";
  if (value >= thresholds.medium) return "Medium";
  return "Low";
}

/**
 * One level up, capped at Critical.
 */
export function raiseSeverity(severity: BreakSeverity): BreakSeverity {
  const next = Math.min(severityRank(severity) + 1, BREAK_SEVERITIES.length - 1);
  return BREAK_SEVERITIES[next] ?? "Critical";
}

export function notionalOf(record: TradeRecord): number {
  return roundTo(Math.abs(record.quantity * record.price), 8);
}

// =============================================================================
// Classifier
// =============================================================================

export class BreakClassifier {
  readonly config: ClassifierConfig;

  constructor(overrides: Partial<ClassifierConfig> = {}) {
    this.config = resolveClassifierConfig(overrides);
  }

  classify(result: MatchResult, context: ClassificationContext): readonly Break[] {
    const drafts: Break[] = [];

    for (const outcome of result.outcomes) {
      switch (outcome.kind) {
        case "Matched": {
          const draft = this.classifyPair(outcome.pair, context);
          if (draft) drafts.push(draft);
          break;
        }
        case "UnmatchedA":
        case "UnmatchedB":
          drafts.push(this.classifyMissing(outcome.record, context));
          break;
      }
    }

    return drafts;
  }

  /**
   * Severity of a single out-of-tolerance field.
   */
  fieldSeverity(diff: FieldDiff): BreakSeverity {
    switch (diff.field) {
      case "price":
      case "quantity":
        return bucketSeverity(diff.deviation * 10_000, this.config.deviationBpsThresholds);
      case "settlement_date":
        return bucketSeverity(diff.deviation, this.config.settlementDayThresholds);
      case "currency":
        return "High";
      case "counterparty":
        return "Medium";
    }
  }

  private classifyMissing(record: TradeRecord, context: ClassificationContext): Break {
    const notional = notionalOf(record);
    return draft(context, {
      kind: "MissingCounterpart",
      category: "missing_counterpart",
      severity: bucketSeverity(notional, this.config.notionalThresholds),
      sourceRefs: [refOf(record)],
      matchScore: null,
      mismatchMagnitude: 1,
      notional,
      fieldDiffs: [],
    });
  }

  private classifyPair(pair: MatchedPair, context: ClassificationContext): Break | undefined {
    if (pair.confidence === "full") return undefined;

    const exceeded = pair.fieldDiffs.filter((d) => d.exceedsTolerance);
    const first = exceeded[0];
    if (first === undefined) return undefined;

    let category: BreakCategory;
    let severity: BreakSeverity;
    if (exceeded.length === 1) {
      category = first.field;
      severity = this.fieldSeverity(first);
    } else {
      category = "combination";
      const highest = exceeded
        .map((d) => this.fieldSeverity(d))
        .reduce<BreakSeverity>((max, s) => (severityRank(s) > severityRank(max) ? s : max), "Low");
      severity = raiseSeverity(highest);
    }

    return draft(context, {
      kind: "FieldMismatch",
      category,
      severity,
      sourceRefs: [refOf(pair.a), refOf(pair.b)],
      matchScore: pair.score,
      mismatchMagnitude: roundTo(1 - pair.score, 9),
      notional: notionalOf(pair.a),
      fieldDiffs: pair.fieldDiffs,
    });
  }
}

// =============================================================================
// Draft construction
// =============================================================================

type DraftContent = Pick<
  Break,
  | "kind"
  | "category"
  | "severity"
  | "sourceRefs"
  | "matchScore"
  | "mismatchMagnitude"
  | "notional"
  | "fieldDiffs"
>;

function refOf(record: TradeRecord): TradeRef {
  return { sourceId: record.sourceId, externalRef: record.externalRef };
}

function draft(context: ClassificationContext, content: DraftContent): Break {
  const { id, identityKey } = computeBreakIdentity(content.category, content.sourceRefs);
  return {
    id,
    identityKey,
    runId: context.runId,
    ...content,
    status: "Open",
    owner: null,
    escalationLevel: 0,
    slaDeadline: null,
    createdAt: context.now,
    routedAt: null,
    acknowledgedAt: null,
    resolvedAt: null,
    closedAt: null,
    resolutionReason: null,
    autoRemediated: false,
    tradeDate: context.tradeDate,
    source1: context.source1,
    source2: context.source2,
    riskScore: null,
    version: 0,
  };
}

/**
 * Trade Matcher
 *
 * Pairs two sources' records for one trade date.
 *
 * Strategy:
 * 1. Validate each side; malformed records and repeated refs are rejected
 *    individually and take no further part
 * 2. Generate candidates by blocking key and score them
 * 3. Commit pairs greedily, best score first
 * 4. Everything left over is unmatched, in input order
 *
 * Invariant: every valid record lands in exactly one outcome, every
 * invalid record in `rejected` only.
 */

import { isTradeRecord } from "@tradebreak/types";
import type {
  MatchOutcome,
  MatchResult,
  RecordIssue,
  RecordSide,
  TradeRecord,
} from "@tradebreak/types";
import { resolveMatcherConfig } from "./config.js";
import type { MatcherConfig } from "./config.js";
import { generateCandidates } from "./candidates.js";
import { assignGreedy } from "./assignment.js";

interface ValidatedSide {
  readonly records: readonly TradeRecord[];
  readonly issues: readonly RecordIssue[];
}

export class TradeMatcher {
  readonly config: MatcherConfig;

  /**
   * @throws MatcherConfigError when the merged configuration is invalid
   */
  constructor(overrides: Partial<MatcherConfig> = {}) {
    this.config = resolveMatcherConfig(overrides);
  }

  match(recordsA: readonly unknown[], recordsB: readonly unknown[]): MatchResult {
    const sideA = validateSide("A", recordsA);
    const sideB = validateSide("B", recordsB);

    const { candidates, scored } = generateCandidates(sideA.records, sideB.records, this.config);
    const committed = assignGreedy(candidates, this.config);

    const pairedA = new Set<string>();
    const pairedB = new Set<string>();
    const outcomes: MatchOutcome[] = [];

    for (const pair of committed) {
      pairedA.add(pair.a.externalRef);
      pairedB.add(pair.b.externalRef);
      outcomes.push({ kind: "Matched", pair });
    }

    const unmatchedA = sideA.records.filter((r) => !pairedA.has(r.externalRef));
    const unmatchedB = sideB.records.filter((r) => !pairedB.has(r.externalRef));
    for (const record of unmatchedA) outcomes.push({ kind: "UnmatchedA", record });
    for (const record of unmatchedB) outcomes.push({ kind: "UnmatchedB", record });

    return {
      outcomes,
      rejected: [...sideA.issues, ...sideB.issues],
      summary: {
        totalA: recordsA.length,
        totalB: recordsB.length,
        matched: committed.length,
        lowConfidence: committed.filter((p) => p.confidence === "low").length,
        unmatchedA: unmatchedA.length,
        unmatchedB: unmatchedB.length,
        rejectedA: sideA.issues.length,
        rejectedB: sideB.issues.length,
        candidatesScored: scored,
      },
    };
  }
}

function validateSide(side: RecordSide, input: readonly unknown[]): ValidatedSide {
  const records: TradeRecord[] = [];
  const issues: RecordIssue[] = [];
  const seen = new Set<string>();

  input.forEach((value, index) => {
    if (!isTradeRecord(value)) {
      issues.push({
        side,
        index,
        code: "INVALID_FIELD",
        message: "Record failed trade record validation",
      });
      return;
    }
    if (seen.has(value.externalRef)) {
      issues.push({
        side,
        index,
        externalRef: value.externalRef,
        code: "DUPLICATE_REF",
        message: `Duplicate externalRef "${value.externalRef}"`,
      });
      return;
    }
    seen.add(value.externalRef);
    records.push(value);
  });

  return { records, issues };
}

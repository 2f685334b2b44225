/**
 * Greedy Assignment
 *
 * Commits candidate pairs best-first so that every record is used at
 * most once. Ordering is total (score, then A ref, then B ref) so the
 * same inputs always commit the same pairs in the same order.
 */

import type { MatchCandidatePair, MatchedPair } from "@tradebreak/types";
import type { MatcherConfig } from "./config.js";

function compareRefs(x: string, y: string): number {
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

/**
 * Score descending, then A externalRef ascending, then B externalRef
 * ascending (code-point order).
 */
export function compareCandidates(x: MatchCandidatePair, y: MatchCandidatePair): number {
  if (x.score !== y.score) return y.score - x.score;
  return compareRefs(x.a.externalRef, y.a.externalRef) || compareRefs(x.b.externalRef, y.b.externalRef);
}

export function assignGreedy(
  candidates: readonly MatchCandidatePair[],
  config: Pick<MatcherConfig, "matchThreshold" | "reviewThreshold">,
): readonly MatchedPair[] {
  const ordered = [...candidates]
    .filter((c) => c.score >= config.reviewThreshold)
    .sort(compareCandidates);

  const usedA = new Set<string>();
  const usedB = new Set<string>();
  const committed: MatchedPair[] = [];

  for (const candidate of ordered) {
    if (usedA.has(candidate.a.externalRef) || usedB.has(candidate.b.externalRef)) continue;
    usedA.add(candidate.a.externalRef);
    usedB.add(candidate.b.externalRef);
    committed.push({
      ...candidate,
      confidence: candidate.score >= config.matchThreshold ? "full" : "low",
    });
  }

  return committed;
}

/**
 * Feature Engineering
 *
 * Summarizes recent history for one source pair into the FeatureVector
 * the prediction model scores.
 */

import type {
  Break,
  BreakCategory,
  FeatureVector,
  ReconciliationRun,
  SourceId,
} from "@tradebreak/types";
import { coefficientOfVariation, compareText, mean, round } from "./stats.js";

/** Assumed break rate for a source pair with no history */
export const PRIOR_BREAK_RATE = 0.5;

export const DEFAULT_FEATURE_WINDOW = 20;

export interface PendingReconciliation {
  readonly source1: SourceId;
  readonly source2: SourceId;
  /** Records about to be reconciled (both sides) */
  readonly volume: number;
}

/**
 * Records a completed run looked at: both records of every pair plus
 * every unmatched and rejected record.
 */
export function recordsSeen(run: ReconciliationRun): number {
  const c = run.counts;
  return c.matched * 2 + c.unmatchedA + c.unmatchedB + c.rejectedA + c.rejectedB;
}

/**
 * Mean, over the categories that broke in `runs`, of the coefficient of
 * variation of that category's per-run break count. Breaks are attributed
 * to the run that created them. 0 with fewer than two runs.
 */
export function categoryVolatility(
  runs: readonly ReconciliationRun[],
  breaks: readonly Break[],
): number {
  if (runs.length < 2) return 0;
  const slot = new Map(runs.map((r, i) => [r.id, i]));
  const perCategory = new Map<BreakCategory, number[]>();
  for (const brk of breaks) {
    const i = slot.get(brk.runId);
    if (i === undefined) continue;
    const counts = perCategory.get(brk.category) ?? runs.map(() => 0);
    counts[i] = (counts[i] ?? 0) + 1;
    perCategory.set(brk.category, counts);
  }
  if (perCategory.size === 0) return 0;
  return mean([...perCategory.values()].map(coefficientOfVariation));
}

/**
 * @param breaks Breaks of the source pair; those from runs outside the
 *   window are ignored
 */
export function buildFeatureVector(
  history: readonly ReconciliationRun[],
  breaks: readonly Break[],
  pending: PendingReconciliation,
  window: number = DEFAULT_FEATURE_WINDOW,
): FeatureVector {
  const recent = history
    .filter(
      (r) =>
        r.status === "completed" &&
        r.source1 === pending.source1 &&
        r.source2 === pending.source2,
    )
    .sort((x, y) => compareText(y.finishedAt ?? y.queuedAt, x.finishedAt ?? x.queuedAt))
    .slice(0, window);

  const seen = recent.reduce((n, r) => n + recordsSeen(r), 0);
  const created = recent.reduce((n, r) => n + r.counts.breaksCreated, 0);

  return {
    historicalBreakRate: seen === 0 ? PRIOR_BREAK_RATE : round(Math.min(1, created / seen), 6),
    volume: pending.volume,
    categoryVolatility: round(categoryVolatility(recent, breaks), 6),
    recentRunCount: recent.length,
  };
}

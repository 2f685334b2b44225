/**
 * Reporting Projections
 *
 * Pure views over breaks and runs for the query surface. Rendering
 * (dashboards, exports) is left to consumers.
 */

import { isOpenStatus } from "@tradebreak/types";
import type { Break, BreakSeverity, ReconciliationRun, RunStatus } from "@tradebreak/types";
import { compareText, round } from "./stats.js";

const MS_PER_MINUTE = 60_000;

// =============================================================================
// Open breaks
// =============================================================================

/**
 * Breaks still needing attention, oldest first.
 */
export function openBreaks(breaks: readonly Break[]): readonly Break[] {
  return breaks
    .filter((b) => isOpenStatus(b.status))
    .sort((x, y) => compareText(x.createdAt, y.createdAt) || compareText(x.id, y.id));
}

// =============================================================================
// Aging
// =============================================================================

export type AgingBucket = "lt_1h" | "1h_4h" | "4h_24h" | "1d_3d" | "gt_3d";

export const AGING_BUCKETS: readonly AgingBucket[] = ["lt_1h", "1h_4h", "4h_24h", "1d_3d", "gt_3d"];

export type BucketCounts = Readonly<Record<AgingBucket, number>>;

export interface AgingReport {
  readonly asOf: string;
  readonly total: number;
  readonly overdue: number;
  readonly buckets: BucketCounts;
  readonly bySeverity: Readonly<Record<BreakSeverity, BucketCounts>>;
}

export function agingBucket(ageMinutes: number): AgingBucket {
  if (ageMinutes < 60) return "lt_1h";
  if (ageMinutes < 240) return "1h_4h";
  if (ageMinutes < 1440) return "4h_24h";
  if (ageMinutes < 4320) return "1d_3d";
  return "gt_3d";
}

function emptyBuckets(): Record<AgingBucket, number> {
  return { lt_1h: 0, "1h_4h": 0, "4h_24h": 0, "1d_3d": 0, gt_3d: 0 };
}

export function agingBuckets(breaks: readonly Break[], now: Date): AgingReport {
  const nowMs = now.getTime();
  const buckets = emptyBuckets();
  const bySeverity: Record<BreakSeverity, Record<AgingBucket, number>> = {
    Low: emptyBuckets(),
    Medium: emptyBuckets(),
    High: emptyBuckets(),
    Critical: emptyBuckets(),
  };
  let total = 0;
  let overdue = 0;

  for (const brk of breaks) {
    if (!isOpenStatus(brk.status)) continue;
    total++;
    const bucket = agingBucket((nowMs - Date.parse(brk.createdAt)) / MS_PER_MINUTE);
    buckets[bucket]++;
    bySeverity[brk.severity][bucket]++;
    if (brk.slaDeadline !== null && nowMs > Date.parse(brk.slaDeadline)) overdue++;
  }

  return { asOf: now.toISOString(), total, overdue, buckets, bySeverity };
}

// =============================================================================
// Runs
// =============================================================================

/**
 * Most recent runs first.
 */
export function runHistory(
  runs: readonly ReconciliationRun[],
  limit = 20,
): readonly ReconciliationRun[] {
  return [...runs]
    .sort((x, y) => compareText(y.queuedAt, x.queuedAt) || compareText(y.id, x.id))
    .slice(0, limit);
}

// =============================================================================
// Summary
// =============================================================================

export interface ReconciliationSummary {
  readonly breaks: {
    readonly total: number;
    readonly open: number;
    readonly resolved: number;
    readonly closed: number;
    readonly autoRemediated: number;
    readonly bySeverity: Readonly<Record<BreakSeverity, number>>;
  };
  readonly runs: Readonly<Record<RunStatus, number>> & { readonly total: number };
  /**
   * matched·2 / (matched·2 + unmatched + rejected) over completed runs,
   * 4 decimals; null when no records were seen.
   */
  readonly matchRate: number | null;
}

export function summary(
  breaks: readonly Break[],
  runs: readonly ReconciliationRun[],
): ReconciliationSummary {
  const bySeverity: Record<BreakSeverity, number> = { Low: 0, Medium: 0, High: 0, Critical: 0 };
  let open = 0;
  let resolved = 0;
  let closed = 0;
  let autoRemediated = 0;

  for (const brk of breaks) {
    bySeverity[brk.severity]++;
    if (brk.status === "Resolved") resolved++;
    else if (brk.status === "Closed") closed++;
    else open++;
    if (brk.autoRemediated) autoRemediated++;
  }

  const runCounts: Record<RunStatus, number> = {
    queued: 0,
    running: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
  };
  let matchedRecords = 0;
  let otherRecords = 0;
  for (const run of runs) {
    runCounts[run.status]++;
    if (run.status !== "completed") continue;
    matchedRecords += run.counts.matched * 2;
    otherRecords +=
      run.counts.unmatchedA + run.counts.unmatchedB + run.counts.rejectedA + run.counts.rejectedB;
  }

  const seen = matchedRecords + otherRecords;
  return {
    breaks: { total: breaks.length, open, resolved, closed, autoRemediated, bySeverity },
    runs: { ...runCounts, total: runs.length },
    matchRate: seen === 0 ? null : round(matchedRecords / seen, 4),
  };
}

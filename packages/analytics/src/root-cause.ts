/**
 * Root-Cause Analyzer
 *
 * Groups resolved breaks into recurring patterns so operations can see
 * which (category, source pair) combinations keep breaking and how long
 * they take to clear. Read-only.
 */

import type { Break, BreakCategory, EscalationEvent, SourceId } from "@tradebreak/types";
import { compareText, median, percentile, round } from "./stats.js";

const MS_PER_MINUTE = 60_000;

export interface RootCauseOptions {
  /** Inclusive lower bound on resolvedAt */
  readonly from?: string | undefined;
  /** Inclusive upper bound on resolvedAt */
  readonly to?: string | undefined;
  /** Patterns and owners returned (default 10) */
  readonly topN?: number | undefined;
}

export interface ResolutionTimes {
  readonly min: number | null;
  readonly median: number | null;
  readonly p95: number | null;
}

export interface RootCausePattern {
  readonly category: BreakCategory;
  readonly source1: SourceId;
  readonly source2: SourceId;
  readonly count: number;
  readonly autoRemediated: number;
  readonly escalations: number;
  /** Minutes from creation to resolution */
  readonly resolutionMinutes: ResolutionTimes;
}

export interface OwnerCount {
  readonly owner: string;
  readonly count: number;
}

export interface RootCauseSummary {
  readonly from: string | null;
  readonly to: string | null;
  readonly totalResolved: number;
  readonly patterns: readonly RootCausePattern[];
  readonly topOwners: readonly OwnerCount[];
}

export const DEFAULT_TOP_N = 10;

interface Accumulator {
  readonly category: BreakCategory;
  readonly source1: SourceId;
  readonly source2: SourceId;
  count: number;
  autoRemediated: number;
  escalations: number;
  readonly minutes: number[];
}

export function analyzeRootCauses(
  breaks: readonly Break[],
  escalations: readonly EscalationEvent[],
  options: RootCauseOptions = {},
): RootCauseSummary {
  const topN = options.topN ?? DEFAULT_TOP_N;
  const from = options.from !== undefined ? Date.parse(options.from) : -Infinity;
  const to = options.to !== undefined ? Date.parse(options.to) : Infinity;

  const escalationsByBreak = new Map<string, number>();
  for (const e of escalations) {
    escalationsByBreak.set(e.breakId, (escalationsByBreak.get(e.breakId) ?? 0) + 1);
  }

  const groups = new Map<string, Accumulator>();
  const owners = new Map<string, number>();
  let totalResolved = 0;

  for (const brk of breaks) {
    if (brk.status !== "Resolved" && brk.status !== "Closed") continue;
    if (brk.resolvedAt === null) continue;
    const resolvedAt = Date.parse(brk.resolvedAt);
    if (resolvedAt < from || resolvedAt > to) continue;

    totalResolved++;
    const key = `${brk.category}\u0000${brk.source1}\u0000${brk.source2}`;
    let acc = groups.get(key);
    if (acc === undefined) {
      acc = {
        category: brk.category,
        source1: brk.source1,
        source2: brk.source2,
        count: 0,
        autoRemediated: 0,
        escalations: 0,
        minutes: [],
      };
      groups.set(key, acc);
    }
    acc.count++;
    if (brk.autoRemediated) acc.autoRemediated++;
    acc.escalations += escalationsByBreak.get(brk.id) ?? 0;
    acc.minutes.push((resolvedAt - Date.parse(brk.createdAt)) / MS_PER_MINUTE);

    if (brk.owner !== null) {
      owners.set(brk.owner, (owners.get(brk.owner) ?? 0) + 1);
    }
  }

  const patterns = [...groups.values()]
    .sort(
      (x, y) =>
        y.count - x.count ||
        compareText(x.category, y.category) ||
        compareText(x.source1, y.source1) ||
        compareText(x.source2, y.source2),
    )
    .slice(0, topN)
    .map((acc): RootCausePattern => ({
      category: acc.category,
      source1: acc.source1,
      source2: acc.source2,
      count: acc.count,
      autoRemediated: acc.autoRemediated,
      escalations: acc.escalations,
      resolutionMinutes: {
        min: roundOrNull(acc.minutes.length > 0 ? Math.min(...acc.minutes) : null),
        median: roundOrNull(median(acc.minutes)),
        p95: roundOrNull(percentile(acc.minutes, 95)),
      },
    }));

  const topOwners = [...owners.entries()]
    .map(([owner, count]) => ({ owner, count }))
    .sort((x, y) => y.count - x.count || compareText(x.owner, y.owner))
    .slice(0, topN);

  return {
    from: options.from ?? null,
    to: options.to ?? null,
    totalResolved,
    patterns,
    topOwners,
  };
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round(value, 2);
}

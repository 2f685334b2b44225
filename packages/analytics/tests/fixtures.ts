/**
 * Break and run builders for analytics tests.
 */
import type { Break, ReconciliationRun, RunCounts } from "@tradebreak/types";

let counter = 0;

export function makeBreak(overrides: Partial<Break> = {}): Break {
  counter++;
  const suffix = counter.toString(16).padStart(32, "0");
  return {
    id: `brk_${suffix}`,
    identityKey: `${suffix}${"0".repeat(32)}`,
    runId: "run-1",
    kind: "FieldMismatch",
    category: "price",
    severity: "Medium",
    status: "Open",
    owner: null,
    escalationLevel: 0,
    slaDeadline: null,
    createdAt: "2024-03-15T10:00:00.000Z",
    routedAt: null,
    acknowledgedAt: null,
    resolvedAt: null,
    closedAt: null,
    resolutionReason: null,
    autoRemediated: false,
    sourceRefs: [{ sourceId: "oms", externalRef: `A${counter}` }],
    tradeDate: "2024-03-15",
    source1: "oms",
    source2: "custodian",
    matchScore: 0.8,
    mismatchMagnitude: 0.2,
    notional: 1000,
    fieldDiffs: [],
    riskScore: null,
    version: 0,
    ...overrides,
  };
}

export const ZERO_COUNTS: RunCounts = {
  matched: 0,
  lowConfidence: 0,
  unmatchedA: 0,
  unmatchedB: 0,
  rejectedA: 0,
  rejectedB: 0,
  breaksCreated: 0,
  breaksSuppressed: 0,
  autoRemediated: 0,
};

export function makeRun(
  id: string,
  overrides: Omit<Partial<ReconciliationRun>, "counts"> & { counts?: Partial<RunCounts> } = {},
): ReconciliationRun {
  const { counts, ...rest } = overrides;
  return {
    id,
    tradeDate: "2024-03-15",
    source1: "oms",
    source2: "custodian",
    trigger: "on-demand",
    status: "completed",
    queuedAt: "2024-03-15T18:00:00.000Z",
    startedAt: "2024-03-15T18:00:00.000Z",
    finishedAt: "2024-03-15T18:00:01.000Z",
    prediction: null,
    error: null,
    ...rest,
    counts: { ...ZERO_COUNTS, ...counts },
  };
}

/**
 * Break builders for workflow tests.
 */
import type { Break } from "@tradebreak/types";

export const CREATED_AT = "2024-03-15T18:00:00.000Z";

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
    severity: "High",
    status: "Open",
    owner: null,
    escalationLevel: 0,
    slaDeadline: null,
    createdAt: CREATED_AT,
    routedAt: null,
    acknowledgedAt: null,
    resolvedAt: null,
    closedAt: null,
    resolutionReason: null,
    autoRemediated: false,
    sourceRefs: [
      { sourceId: "oms", externalRef: `A${counter}` },
      { sourceId: "custodian", externalRef: `B${counter}` },
    ],
    tradeDate: "2024-03-15",
    source1: "oms",
    source2: "custodian",
    matchScore: 0.847,
    mismatchMagnitude: 0.153,
    notional: 5000,
    fieldDiffs: [],
    riskScore: null,
    version: 0,
    ...overrides,
  };
}

export function at(iso: string): Date {
  return new Date(iso);
}

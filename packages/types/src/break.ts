/**
 * Break Types
 *
 * A break is one root mismatch between two sources' trade records.
 *
 * Ownership:
 * - The classifier creates breaks (status Open) and never touches them again
 * - The workflow engine owns status, owner, escalation level and SLA deadline
 * - Escalation events are append-only
 */

import type { FieldDiff } from "./match.js";
import type { SourceId, TradeRef } from "./trade.js";

export type BreakKind = "MissingCounterpart" | "FieldMismatch";

export type BreakCategory =
  | "missing_counterpart"
  | "price"
  | "quantity"
  | "settlement_date"
  | "currency"
  | "counterparty"
  | "combination";

export type BreakSeverity = "Low" | "Medium" | "High" | "Critical";

/**
 * Lifecycle states.
 *
 * Open → Routed → InProgress → {Resolved | Escalated} → Closed.
 * Escalated re-enters Routed at a higher level.
 */
export type BreakStatus =
  | "Open"
  | "Routed"
  | "InProgress"
  | "Escalated"
  | "Resolved"
  | "Closed";

/**
 * Risk score attached by the prediction adapter at creation time.
 */
export interface BreakRiskScore {
  readonly probability: number;
  readonly modelId: string;
}

export interface Break {
  /** Equal to the content-derived identity key; stable across runs */
  readonly id: string;

  /** Full hex digest the id was derived from */
  readonly identityKey: string;

  /** Run that first created this break */
  readonly runId: string;

  readonly kind: BreakKind;
  readonly category: BreakCategory;
  readonly severity: BreakSeverity;
  readonly status: BreakStatus;

  /** Current assignee (null until routed) */
  readonly owner: string | null;

  /** 0 until the first escalation */
  readonly escalationLevel: number;

  /** Set on routing; extended on escalation */
  readonly slaDeadline: string | null;

  readonly createdAt: string;
  readonly routedAt: string | null;
  readonly acknowledgedAt: string | null;

  /** Set once, never overwritten */
  readonly resolvedAt: string | null;
  readonly closedAt: string | null;
  readonly resolutionReason: string | null;
  readonly autoRemediated: boolean;

  /** Records the mismatch is about (one for a missing counterpart, two otherwise) */
  readonly sourceRefs: readonly TradeRef[];

  readonly tradeDate: string;
  readonly source1: SourceId;
  readonly source2: SourceId;

  /** Pair score for field mismatches, null for missing counterparts */
  readonly matchScore: number | null;

  /** 1 − score for field mismatches, 1 for missing counterparts */
  readonly mismatchMagnitude: number;

  /** |quantity × price| of the reference record */
  readonly notional: number;

  readonly fieldDiffs: readonly FieldDiff[];

  readonly riskScore: BreakRiskScore | null;

  /** Incremented by the store on every mutation */
  readonly version: number;
}

/**
 * Append-only audit record of one escalation step.
 * At most one event exists per (breakId, fromLevel).
 */
export interface EscalationEvent {
  readonly id: string;
  readonly breakId: string;
  readonly fromLevel: number;
  readonly toLevel: number;
  readonly fromOwner: string | null;
  readonly toOwner: string;
  readonly at: string;
  readonly reason: "sla_breach";
}

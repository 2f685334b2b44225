/**
 * Reconciliation Run Types
 *
 * One record per orchestrated execution. Immutable once it reaches a
 * terminal status (completed, failed, cancelled).
 */

import type { SourceId } from "./trade.js";
import type { PredictionResult } from "./prediction.js";

export type RunStatus = "queued" | "running" | "completed" | "failed" | "cancelled";

export type RunTrigger = "on-demand" | "scheduled";

export interface RunCounts {
  readonly matched: number;
  readonly lowConfidence: number;
  readonly unmatchedA: number;
  readonly unmatchedB: number;
  readonly rejectedA: number;
  readonly rejectedB: number;
  readonly breaksCreated: number;
  readonly breaksSuppressed: number;
  readonly autoRemediated: number;
}

export interface ReconciliationRun {
  readonly id: string;
  readonly tradeDate: string;
  readonly source1: SourceId;
  readonly source2: SourceId;
  readonly trigger: RunTrigger;
  readonly status: RunStatus;
  readonly queuedAt: string;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
  readonly counts: RunCounts;
  /** Prediction consulted for this run, null when no adapter is configured */
  readonly prediction: PredictionResult | null;
  /** Failure or cancellation message */
  readonly error: string | null;
}

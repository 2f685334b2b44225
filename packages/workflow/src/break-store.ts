/**
 * Break Store
 *
 * Persistence boundary for breaks and their escalation trail.
 *
 * Design principles:
 * - Breaks are created once, keyed by their content-derived id
 * - Every mutation is a compare-and-transition on `version`
 * - Escalation events are append-only, at most one per (breakId, fromLevel)
 * - All methods are async; persistence is the only suspension point
 */

import type {
  Break,
  BreakSeverity,
  BreakStatus,
  EscalationEvent,
  SourceId,
} from "@tradebreak/types";

// =============================================================================
// Queries
// =============================================================================

export interface BreakFilter {
  readonly statuses?: readonly BreakStatus[] | undefined;
  readonly severity?: BreakSeverity | undefined;
  readonly owner?: string | undefined;
  readonly source1?: SourceId | undefined;
  readonly source2?: SourceId | undefined;
  readonly tradeDate?: string | undefined;
  /** Only breaks whose SLA deadline is strictly before this instant */
  readonly deadlineBefore?: string | undefined;
}

// =============================================================================
// Results
// =============================================================================

/**
 * A draft whose identity already existed. Informational, never an error.
 */
export interface DuplicateSuppressed {
  readonly id: string;
  readonly existingStatus: BreakStatus;
  /** Run that originally created the existing break */
  readonly existingRunId: string;
}

export interface CreateManyResult {
  readonly created: readonly Break[];
  readonly suppressed: readonly DuplicateSuppressed[];
}

export type TransitionConflictReason = "not_found" | "version_mismatch" | "duplicate_escalation";

export type TransitionResult =
  | { readonly ok: true; readonly break: Break }
  | {
      readonly ok: false;
      readonly reason: TransitionConflictReason;
      /** Stored state at the time of the conflict (absent when not found) */
      readonly current?: Break | undefined;
    };

// =============================================================================
// Interface
// =============================================================================

export interface BreakStore {
  get(id: string): Promise<Break | undefined>;

  /** Matching breaks, oldest first (createdAt, then id) */
  list(filter?: BreakFilter): Promise<readonly Break[]>;

  /** Escalation events in append order, for one break or all */
  listEscalations(breakId?: string): Promise<readonly EscalationEvent[]>;

  /**
   * Insert every draft whose id does not exist yet, as one unit.
   * Existing ids are reported as suppressed and left untouched,
   * whatever their status.
   */
  createManyIfAbsent(drafts: readonly Break[]): Promise<CreateManyResult>;

  /**
   * Replace a break with `next` (stored at expectedVersion + 1) and append
   * `escalation`, only if the stored version equals `expectedVersion` and no
   * escalation exists yet for (breakId, fromLevel).
   */
  compareAndTransition(
    id: string,
    expectedVersion: number,
    next: Break,
    escalation?: EscalationEvent,
  ): Promise<TransitionResult>;
}

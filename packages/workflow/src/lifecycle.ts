/**
 * Break Lifecycle
 *
 *   Open → Routed → InProgress → {Resolved | Escalated} → Closed
 *
 * Escalated re-enters Routed at its new level; the sweep may escalate an
 * Escalated break again. Open/Routed → Resolved is reserved for
 * auto-remediation. Closed is terminal.
 */

import type { Break, BreakStatus } from "@tradebreak/types";
import { StateConflictError } from "./errors.js";

// =============================================================================
// Valid Transitions
// =============================================================================

export const VALID_TRANSITIONS: Record<BreakStatus, readonly BreakStatus[]> = {
  Open: ["Routed", "Resolved"],
  Routed: ["InProgress", "Escalated", "Resolved"],
  InProgress: ["Resolved", "Escalated"],
  Escalated: ["Routed", "Escalated"],
  Resolved: ["Closed"],
  Closed: [],
};

/**
 * Transitions only auto-remediation may take.
 */
const AUTO_ONLY: ReadonlySet<string> = new Set(["Open>Resolved", "Routed>Resolved"]);

/**
 * Who is asking for the transition.
 */
export type TransitionActor = "operator" | "auto-remediation" | "sweep";

export function canTransition(
  from: BreakStatus,
  to: BreakStatus,
  actor: TransitionActor = "operator",
): boolean {
  if (!VALID_TRANSITIONS[from].includes(to)) return false;
  if (AUTO_ONLY.has(`${from}>${to}`)) return actor === "auto-remediation";
  return true;
}

/**
 * @throws StateConflictError when the transition is not allowed for this actor
 */
export function assertTransition(
  brk: Break,
  to: BreakStatus,
  actor: TransitionActor = "operator",
): void {
  if (brk.status === "Closed") {
    throw new StateConflictError(brk.id, brk.status, to, "break is closed");
  }
  if (!canTransition(brk.status, to, actor)) {
    throw new StateConflictError(brk.id, brk.status, to);
  }
}

export function isTerminal(status: BreakStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

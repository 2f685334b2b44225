/**
 * Workflow errors.
 */

import type { BreakStatus } from "@tradebreak/types";

export type WorkflowErrorCode =
  | "BREAK_NOT_FOUND"
  | "VALIDATION_FAILED"
  | "CONCURRENCY_CONFLICT"
  | "STATE_CONFLICT";

export class WorkflowError extends Error {
  public readonly code: WorkflowErrorCode;
  constructor(code: WorkflowErrorCode, message: string) {
    super(message);
    this.name = "WorkflowError";
    this.code = code;
  }
}

/**
 * A transition the lifecycle does not allow. The break is left unchanged.
 */
export class StateConflictError extends WorkflowError {
  public readonly breakId: string;
  public readonly from: BreakStatus;
  public readonly to: BreakStatus;

  constructor(breakId: string, from: BreakStatus, to: BreakStatus, detail?: string) {
    super(
      "STATE_CONFLICT",
      `Break '${breakId}' cannot transition from '${from}' to '${to}'` +
        (detail !== undefined ? `: ${detail}` : ""),
    );
    this.name = "StateConflictError";
    this.breakId = breakId;
    this.from = from;
    this.to = to;
  }
}

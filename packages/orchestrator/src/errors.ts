/**
 * Orchestrator errors.
 *
 * A RunError is fatal to one run only. It carries the run as recorded
 * at the time of failure, when one was recorded.
 */

import type { ReconciliationRun } from "@tradebreak/types";

// =============================================================================
// Run errors
// =============================================================================

export type RunErrorCode =
  | "INVALID_REQUEST"
  | "RUN_FAILED"
  | "RUN_CANCELLED"
  | "RUN_NOT_FOUND"
  | "QUEUE_CLOSED";

export class RunError extends Error {
  public readonly code: RunErrorCode;
  public readonly run: ReconciliationRun | undefined;

  constructor(code: RunErrorCode, message: string, run?: ReconciliationRun) {
    super(message);
    this.name = "RunError";
    this.code = code;
    this.run = run;
  }
}

// =============================================================================
// Run store errors
// =============================================================================

export type RunStoreErrorCode = "RUN_EXISTS" | "RUN_FINALIZED";

export class RunStoreError extends Error {
  public readonly code: RunStoreErrorCode;

  constructor(code: RunStoreErrorCode, message: string) {
    super(message);
    this.name = "RunStoreError";
    this.code = code;
  }
}

// =============================================================================
// Feed errors
// =============================================================================

export type TradeFeedErrorCode = "SOURCE_NOT_LOADED";

export class TradeFeedError extends Error {
  public readonly code: TradeFeedErrorCode;

  constructor(code: TradeFeedErrorCode, message: string) {
    super(message);
    this.name = "TradeFeedError";
    this.code = code;
  }
}

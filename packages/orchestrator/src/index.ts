/**
 * @tradebreak/orchestrator — Runs, queueing and scheduled sweeps.
 *
 * - TradeFeed: where raw records come from (in-memory stand-in included)
 * - RunStore: ReconciliationRun persistence, final once terminal
 * - RunOrchestrator: normalize → match → classify → commit → hand off
 * - RunQueue: bounded-concurrency queued runs with cancellation
 * - SweepScheduler: periodic SLA escalation and auto-close
 */

export { RunError, RunStoreError, TradeFeedError } from "./errors.js";
export type { RunErrorCode, RunStoreErrorCode, TradeFeedErrorCode } from "./errors.js";

export { InMemoryTradeFeed } from "./trade-feed.js";
export type { FeedIngestResult, TradeFeed } from "./trade-feed.js";

export { InMemoryRunStore, TERMINAL_RUN_STATUSES, isTerminalRun } from "./run-store.js";
export type { RunStore, RunListOptions } from "./run-store.js";

export {
  RunOrchestrator,
  ZERO_COUNTS,
  generateRunId,
  queuedRun,
  validateRunRequest,
} from "./run-orchestrator.js";
export type { RunRequest, RunOptions, RunOrchestratorDeps } from "./run-orchestrator.js";

export { RunQueue, DEFAULT_RUN_CONCURRENCY } from "./run-queue.js";
export type { RunQueueOptions } from "./run-queue.js";

export { SweepScheduler, DEFAULT_SWEEP_INTERVAL_MS } from "./sweep-scheduler.js";
export type { SweepSchedulerOptions, SweepTick } from "./sweep-scheduler.js";

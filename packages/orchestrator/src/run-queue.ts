/**
 * Run Queue — queued runs with bounded concurrency.
 *
 * enqueue() records a queued run and returns its id at once; the run
 * executes when a slot frees up. A failing run is logged and never
 * affects the queue or other runs.
 */

import pLimit from "p-limit";
import type { Logger } from "pino";
import { RunError } from "./errors.js";
import { generateRunId, queuedRun, validateRunRequest } from "./run-orchestrator.js";
import type { RunOrchestrator, RunRequest } from "./run-orchestrator.js";
import type { RunStore } from "./run-store.js";

export const DEFAULT_RUN_CONCURRENCY = 2;

export interface RunQueueOptions {
  readonly concurrency?: number | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export class RunQueue {
  private readonly orchestrator: RunOrchestrator;
  private readonly runs: RunStore;
  private readonly logger: Logger;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly controllers = new Map<string, AbortController>();
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  constructor(
    orchestrator: RunOrchestrator,
    runs: RunStore,
    logger: Logger,
    options: RunQueueOptions = {},
  ) {
    this.orchestrator = orchestrator;
    this.runs = runs;
    this.logger = logger;
    this.limit = pLimit(options.concurrency ?? DEFAULT_RUN_CONCURRENCY);
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? generateRunId;
  }

  /**
   * Record a queued run and schedule it.
   *
   * @throws RunError QUEUE_CLOSED after shutdown, INVALID_REQUEST on a bad request
   */
  async enqueue(request: RunRequest): Promise<string> {
    if (this.closed) {
      throw new RunError("QUEUE_CLOSED", "Run queue is shut down");
    }
    validateRunRequest(request);

    const run = await this.runs.create(
      queuedRun(this.generateId(), request, this.clock().toISOString()),
    );
    // shutdown() may have started while the run was being recorded
    if (this.closed) {
      await this.cancelQueued(run.id);
      throw new RunError("QUEUE_CLOSED", "Run queue is shut down");
    }
    const controller = new AbortController();
    this.controllers.set(run.id, controller);

    const task: Promise<void> = this.limit(() => this.execute(run.id, request, controller.signal))
      .finally(() => {
        this.controllers.delete(run.id);
        this.pending.delete(task);
      });
    this.pending.add(task);

    this.logger.info({ runId: run.id, queued: this.limit.pendingCount }, "Run queued");
    return run.id;
  }

  /** False once shutdown has begun */
  get accepting(): boolean {
    return !this.closed;
  }

  /** Runs executing right now */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Runs waiting for a slot */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /**
   * Stop accepting runs, abort in-flight ones, cancel queued ones and
   * wait for everything to settle.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    await Promise.allSettled([...this.pending]);
    this.logger.info("Run queue drained");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private async execute(runId: string, request: RunRequest, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      await this.cancelQueued(runId);
      return;
    }
    try {
      await this.orchestrator.run(request, { runId, signal });
    } catch (err: unknown) {
      if (err instanceof RunError) {
        this.logger.warn({ runId, code: err.code }, "Queued run did not complete");
      } else {
        this.logger.error({ runId, err }, "Queued run crashed");
      }
    }
  }

  private async cancelQueued(runId: string): Promise<void> {
    try {
      const run = await this.runs.get(runId);
      if (run === undefined) return;
      await this.runs.save({
        ...run,
        status: "cancelled",
        finishedAt: this.clock().toISOString(),
        error: "Cancelled before start",
      });
      this.logger.info({ runId }, "Queued run cancelled");
    } catch (err: unknown) {
      this.logger.error({ runId, err }, "Failed to cancel queued run");
    }
  }
}

/**
 * Sweep Scheduler — periodic SLA escalation and auto-close.
 *
 * Every tick calls sweep(now) then closeExpired(now). Ticks may overlap;
 * the engine's compare-and-transition keeps that safe. A failed tick is
 * logged and the schedule carries on.
 */

import type { Logger } from "pino";
import type { CloseExpiredResult, SweepResult, WorkflowEngine } from "@tradebreak/workflow";

export const DEFAULT_SWEEP_INTERVAL_MS = 900_000;

export interface SweepSchedulerOptions {
  readonly intervalMs?: number | undefined;
  readonly clock?: (() => Date) | undefined;
}

export interface SweepTick {
  readonly at: string;
  readonly sweep: SweepResult;
  readonly closed: CloseExpiredResult;
}

export class SweepScheduler {
  private readonly engine: WorkflowEngine;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly inFlight = new Set<Promise<SweepTick | undefined>>();
  private timer: ReturnType<typeof setInterval> | undefined;
  readonly intervalMs: number;

  constructor(engine: WorkflowEngine, logger: Logger, options: SweepSchedulerOptions = {}) {
    this.engine = engine;
    this.logger = logger;
    this.clock = options.clock ?? (() => new Date());
    this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer !== undefined) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.intervalMs }, "Sweep scheduler started");
  }

  /**
   * One sweep + close pass. Resolves undefined when the pass failed.
   */
  tick(): Promise<SweepTick | undefined> {
    const work = this.runOnce();
    this.inFlight.add(work);
    return work.finally(() => {
      this.inFlight.delete(work);
    });
  }

  /** Stop the timer and wait for ticks already running. */
  async stop(): Promise<void> {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await Promise.allSettled([...this.inFlight]);
    this.logger.info("Sweep scheduler stopped");
  }

  private async runOnce(): Promise<SweepTick | undefined> {
    const now = this.clock();
    try {
      const sweep = await this.engine.sweep(now);
      const closed = await this.engine.closeExpired(now);
      this.logger.info({ sweep, closed }, "SLA sweep complete");
      return { at: now.toISOString(), sweep, closed };
    } catch (err: unknown) {
      this.logger.error({ err }, "SLA sweep failed");
      return undefined;
    }
  }
}

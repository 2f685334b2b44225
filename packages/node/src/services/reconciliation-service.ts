/**
 * ReconciliationService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One instance owns one feed, one run store, one
 * break store and the workers that act on them.
 */

import type { Logger } from "pino";
import type {
  Break,
  EscalationEvent,
  FeatureVector,
  PredictionResult,
  ReconciliationRun,
  RunStatus,
  SourceId,
} from "@tradebreak/types";
import { TradeMatcher } from "@tradebreak/reconciler";
import type { MatcherConfig } from "@tradebreak/reconciler";
import {
  InMemoryBreakStore,
  WorkflowEngine,
  DEFAULT_AUTO_REMEDIATION_POLICY,
  validateAutoRemediationPolicy,
} from "@tradebreak/workflow";
import type {
  AutoRemediationPolicy,
  AutoRemediationResult,
  BreakFilter,
  SlaPolicy,
} from "@tradebreak/workflow";
import {
  PredictionAdapter,
  agingBuckets,
  analyzeRootCauses,
  buildFeatureVector,
  runHistory,
  summary,
} from "@tradebreak/analytics";
import type {
  AgingReport,
  PendingReconciliation,
  ReconciliationSummary,
  RootCauseOptions,
  RootCauseSummary,
} from "@tradebreak/analytics";
import {
  InMemoryRunStore,
  InMemoryTradeFeed,
  RunError,
  RunOrchestrator,
  RunQueue,
  SweepScheduler,
} from "@tradebreak/orchestrator";
import type { RunRequest, SweepTick } from "@tradebreak/orchestrator";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconciliationServiceConfig {
  readonly logger: Logger;
  readonly matcher?: Partial<MatcherConfig> | undefined;
  readonly sla?: Partial<SlaPolicy> | undefined;
  readonly autoRemediation?: Partial<AutoRemediationPolicy> | undefined;
  /** Scores new runs' breaks; "no model" when absent */
  readonly prediction?: PredictionAdapter | undefined;
  readonly runConcurrency?: number | undefined;
  readonly sweepIntervalMs?: number | undefined;
  readonly clock?: (() => Date) | undefined;
}

export interface SourceBatchReceipt {
  readonly sourceId: SourceId;
  readonly tradeDate: string;
  readonly accepted: number;
  /** Accepted records that replaced one already held under the same externalRef */
  readonly replaced: number;
  readonly total: number;
}

export interface PredictionResponse {
  readonly features: FeatureVector;
  readonly prediction: PredictionResult;
}

// =============================================================================
// Service
// =============================================================================

export class ReconciliationService {
  readonly feed: InMemoryTradeFeed;
  readonly runs: InMemoryRunStore;
  readonly breaks: InMemoryBreakStore;
  readonly engine: WorkflowEngine;
  readonly prediction: PredictionAdapter;
  readonly orchestrator: RunOrchestrator;
  readonly queue: RunQueue;
  readonly scheduler: SweepScheduler;

  private readonly clock: () => Date;

  /**
   * @throws MatcherConfigError / WorkflowError VALIDATION_FAILED on bad settings
   */
  constructor(config: ReconciliationServiceConfig) {
    this.clock = config.clock ?? (() => new Date());
    const logger = config.logger;

    const matcher = new TradeMatcher(config.matcher);
    const autoRemediation = validateAutoRemediationPolicy(
      { ...DEFAULT_AUTO_REMEDIATION_POLICY, ...config.autoRemediation },
      matcher.config.reviewThreshold,
    );

    this.feed = new InMemoryTradeFeed();
    this.runs = new InMemoryRunStore();
    this.breaks = new InMemoryBreakStore();
    this.engine = new WorkflowEngine(this.breaks, { sla: config.sla, autoRemediation });
    this.prediction = config.prediction ?? new PredictionAdapter();

    this.orchestrator = new RunOrchestrator({
      feed: this.feed,
      runs: this.runs,
      breaks: this.breaks,
      engine: this.engine,
      logger: logger.child({ component: "orchestrator" }),
      matcher,
      prediction: this.prediction.configured ? this.prediction : undefined,
      clock: this.clock,
    });
    this.queue = new RunQueue(this.orchestrator, this.runs, logger.child({ component: "queue" }), {
      concurrency: config.runConcurrency,
      clock: this.clock,
    });
    this.scheduler = new SweepScheduler(this.engine, logger.child({ component: "scheduler" }), {
      intervalMs: config.sweepIntervalMs,
      clock: this.clock,
    });
  }

  // ─── Sources ─────────────────────────────────────────────────────

  ingest(sourceId: SourceId, tradeDate: string, records: readonly unknown[]): SourceBatchReceipt {
    const { replaced, total } = this.feed.ingest(sourceId, tradeDate, records);
    return { sourceId, tradeDate, accepted: records.length, replaced, total };
  }

  // ─── Runs ────────────────────────────────────────────────────────

  runNow(request: RunRequest): Promise<ReconciliationRun> {
    return this.orchestrator.run(request);
  }

  async enqueueRun(request: RunRequest): Promise<{ readonly runId: string }> {
    return { runId: await this.queue.enqueue(request) };
  }

  async getRun(id: string): Promise<ReconciliationRun> {
    const run = await this.runs.get(id);
    if (run === undefined) {
      throw new RunError("RUN_NOT_FOUND", `Run '${id}' not found`);
    }
    return run;
  }

  async listRuns(limit: number, status?: RunStatus): Promise<readonly ReconciliationRun[]> {
    return runHistory(await this.runs.list({ status }), limit);
  }

  // ─── Breaks ──────────────────────────────────────────────────────

  listBreaks(filter?: BreakFilter): Promise<readonly Break[]> {
    return this.engine.list(filter);
  }

  getBreak(id: string): Promise<Break> {
    return this.engine.get(id);
  }

  escalations(id: string): Promise<readonly EscalationEvent[]> {
    return this.engine.escalations(id);
  }

  route(id: string): Promise<Break> {
    return this.engine.route(id, this.clock());
  }

  acknowledge(id: string): Promise<Break> {
    return this.engine.acknowledge(id, this.clock());
  }

  resolve(id: string, reason: string): Promise<Break> {
    return this.engine.resolve(id, reason, this.clock());
  }

  close(id: string): Promise<Break> {
    return this.engine.close(id, this.clock());
  }

  autoRemediate(id: string): Promise<AutoRemediationResult> {
    return this.engine.autoRemediate(id, this.clock());
  }

  // ─── SLA ─────────────────────────────────────────────────────────

  /**
   * One sweep + auto-close pass at `now` (default: the service clock).
   * Unlike a scheduled tick, failures propagate to the caller.
   */
  async sweep(now: Date = this.clock()): Promise<SweepTick> {
    const sweep = await this.engine.sweep(now);
    const closed = await this.engine.closeExpired(now);
    return { at: now.toISOString(), sweep, closed };
  }

  // ─── Reports ─────────────────────────────────────────────────────

  async summary(): Promise<ReconciliationSummary> {
    const [breaks, runs] = await Promise.all([this.breaks.list(), this.runs.list()]);
    return summary(breaks, runs);
  }

  async aging(now: Date = this.clock()): Promise<AgingReport> {
    return agingBuckets(await this.breaks.list(), now);
  }

  async rootCause(options: RootCauseOptions = {}): Promise<RootCauseSummary> {
    const [breaks, escalations] = await Promise.all([
      this.breaks.list(),
      this.breaks.listEscalations(),
    ]);
    return analyzeRootCauses(breaks, escalations, options);
  }

  // ─── Prediction ──────────────────────────────────────────────────

  async predict(features: FeatureVector): Promise<PredictionResponse> {
    return { features, prediction: await this.prediction.score(features) };
  }

  /**
   * Score a pending reconciliation from the source pair's run history.
   */
  async predictPending(pending: PendingReconciliation): Promise<PredictionResponse> {
    const [history, breaks] = await Promise.all([
      this.runs.list({ status: "completed" }),
      this.breaks.list({ source1: pending.source1, source2: pending.source2 }),
    ]);
    return this.predict(buildFeatureVector(history, breaks, pending));
  }

  // ─── Lifecycle ───────────────────────────────────────────────────

  start(): void {
    this.scheduler.start();
  }

  /**
   * Stop the scheduler and drain the run queue.
   */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    await this.queue.shutdown();
  }
}

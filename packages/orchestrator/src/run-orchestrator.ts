/**
 * Run Orchestrator — one reconciliation run, end to end.
 *
 * load both sides → normalize → match → classify → predict → commit → hand off
 *
 * Everything up to the commit is discarded when the run fails or is
 * cancelled: the break store sees the run's drafts as one unit or not at
 * all. After the commit the run always completes; a break whose handoff
 * fails stays Open for explicit routing.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { isCalendarDate } from "@tradebreak/types";
import type {
  Break,
  PredictionResult,
  ReconciliationRun,
  RecordIssue,
  RunCounts,
  RunTrigger,
  SourceId,
} from "@tradebreak/types";
import { BreakClassifier, TradeMatcher, normalizeBatch } from "@tradebreak/reconciler";
import type { BreakStore, WorkflowEngine } from "@tradebreak/workflow";
import { DEFAULT_FEATURE_WINDOW, buildFeatureVector } from "@tradebreak/analytics";
import type { PredictionAdapter } from "@tradebreak/analytics";
import { RunError, RunStoreError } from "./errors.js";
import type { RunStore } from "./run-store.js";
import type { TradeFeed } from "./trade-feed.js";

// =============================================================================
// Types
// =============================================================================

export interface RunRequest {
  readonly tradeDate: string;
  readonly source1: SourceId;
  readonly source2: SourceId;
  readonly trigger?: RunTrigger | undefined;
}

export interface RunOptions {
  /** Id of a run already recorded as queued, or the id to create */
  readonly runId?: string | undefined;
  readonly signal?: AbortSignal | undefined;
}

export interface RunOrchestratorDeps {
  readonly feed: TradeFeed;
  readonly runs: RunStore;
  readonly breaks: BreakStore;
  readonly engine: WorkflowEngine;
  readonly logger: Logger;
  readonly matcher?: TradeMatcher | undefined;
  readonly classifier?: BreakClassifier | undefined;
  /** Consulted once per run when present */
  readonly prediction?: PredictionAdapter | undefined;
  /** Completed runs per source pair the feature vector draws on */
  readonly featureWindow?: number | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export const ZERO_COUNTS: RunCounts = {
  matched: 0,
  lowConfidence: 0,
  unmatchedA: 0,
  unmatchedB: 0,
  rejectedA: 0,
  rejectedB: 0,
  breaksCreated: 0,
  breaksSuppressed: 0,
  autoRemediated: 0,
};

export function generateRunId(): string {
  return `run_${randomUUID()}`;
}

/**
 * A fresh queued run record.
 */
export function queuedRun(id: string, request: RunRequest, queuedAt: string): ReconciliationRun {
  return {
    id,
    tradeDate: request.tradeDate,
    source1: request.source1,
    source2: request.source2,
    trigger: request.trigger ?? "on-demand",
    status: "queued",
    queuedAt,
    startedAt: null,
    finishedAt: null,
    counts: ZERO_COUNTS,
    prediction: null,
    error: null,
  };
}

/**
 * @throws RunError INVALID_REQUEST on a malformed date, an empty source,
 *   or the same source on both sides
 */
export function validateRunRequest(request: RunRequest): void {
  if (!isCalendarDate(request.tradeDate)) {
    throw new RunError("INVALID_REQUEST", `Invalid trade date '${request.tradeDate}'`);
  }
  if (request.source1.trim() === "" || request.source2.trim() === "") {
    throw new RunError("INVALID_REQUEST", "Both sources must be named");
  }
  if (request.source1 === request.source2) {
    throw new RunError("INVALID_REQUEST", "A source cannot be reconciled against itself");
  }
}

// =============================================================================
// Orchestrator
// =============================================================================

export class RunOrchestrator {
  private readonly feed: TradeFeed;
  private readonly runs: RunStore;
  private readonly breaks: BreakStore;
  private readonly engine: WorkflowEngine;
  private readonly logger: Logger;
  private readonly matcher: TradeMatcher;
  private readonly classifier: BreakClassifier;
  private readonly prediction: PredictionAdapter | undefined;
  private readonly featureWindow: number;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(deps: RunOrchestratorDeps) {
    this.feed = deps.feed;
    this.runs = deps.runs;
    this.breaks = deps.breaks;
    this.engine = deps.engine;
    this.logger = deps.logger;
    this.matcher = deps.matcher ?? new TradeMatcher();
    this.classifier = deps.classifier ?? new BreakClassifier();
    this.prediction = deps.prediction;
    this.featureWindow = deps.featureWindow ?? DEFAULT_FEATURE_WINDOW;
    this.clock = deps.clock ?? (() => new Date());
    this.generateId = deps.generateId ?? generateRunId;
  }

  /**
   * Execute one run to completion.
   *
   * @throws RunError RUN_FAILED / RUN_CANCELLED carrying the recorded run
   * @throws RunStoreError RUN_EXISTS when the id belongs to a run that is not queued
   */
  async run(request: RunRequest, options: RunOptions = {}): Promise<ReconciliationRun> {
    validateRunRequest(request);
    const signal = options.signal;
    let run = await this.start(request, options.runId ?? this.generateId());
    const log = this.logger.child({
      runId: run.id,
      tradeDate: run.tradeDate,
      source1: run.source1,
      source2: run.source2,
    });
    log.info({ trigger: run.trigger }, "Run started");

    let counts = ZERO_COUNTS;
    let prediction: PredictionResult | null = null;
    let created: readonly Break[] = [];

    try {
      signal?.throwIfAborted();
      const [rawA, rawB] = await Promise.all([
        this.feed.load(run.source1, run.tradeDate, signal),
        this.feed.load(run.source2, run.tradeDate, signal),
      ]);
      signal?.throwIfAborted();

      const sideA = normalizeBatch(run.source1, rawA, { tradeDate: run.tradeDate, side: "A" });
      const sideB = normalizeBatch(run.source2, rawB, { tradeDate: run.tradeDate, side: "B" });
      logIssues(log, [...sideA.issues, ...sideB.issues]);

      const result = this.matcher.match(sideA.records, sideB.records);
      const summary = result.summary;
      counts = {
        ...counts,
        matched: summary.matched,
        lowConfidence: summary.lowConfidence,
        unmatchedA: summary.unmatchedA,
        unmatchedB: summary.unmatchedB,
        rejectedA: sideA.issues.length + summary.rejectedA,
        rejectedB: sideB.issues.length + summary.rejectedB,
      };

      let drafts = this.classifier.classify(result, {
        runId: run.id,
        tradeDate: run.tradeDate,
        source1: run.source1,
        source2: run.source2,
        now: this.clock().toISOString(),
      });

      if (this.prediction !== undefined) {
        prediction = await this.predict(this.prediction, run, rawA.length + rawB.length);
        if (prediction.status === "scored") {
          const riskScore = { probability: prediction.probability, modelId: prediction.modelId };
          drafts = drafts.map((d) => ({ ...d, riskScore }));
        } else {
          log.warn({ reason: prediction.reason }, "Prediction unavailable");
        }
      }

      signal?.throwIfAborted();
      const committed = await this.breaks.createManyIfAbsent(drafts);
      for (const dup of committed.suppressed) {
        log.info(
          { breakId: dup.id, existingStatus: dup.existingStatus, existingRunId: dup.existingRunId },
          "Duplicate break suppressed",
        );
      }
      created = committed.created;
      counts = {
        ...counts,
        breaksCreated: committed.created.length,
        breaksSuppressed: committed.suppressed.length,
      };
    } catch (err: unknown) {
      const cancelled = signal?.aborted === true;
      const message = cancelled ? "Run cancelled" : errorMessage(err);
      run = await this.runs.save({
        ...run,
        status: cancelled ? "cancelled" : "failed",
        finishedAt: this.clock().toISOString(),
        counts,
        prediction,
        error: message,
      });
      if (cancelled) {
        log.warn("Run cancelled");
        throw new RunError("RUN_CANCELLED", `Run ${run.id} was cancelled`, run);
      }
      log.error({ err }, "Run failed");
      throw new RunError("RUN_FAILED", `Run ${run.id} failed: ${message}`, run);
    }

    const autoRemediated = await this.handoff(log, created);

    run = await this.runs.save({
      ...run,
      status: "completed",
      finishedAt: this.clock().toISOString(),
      counts: { ...counts, autoRemediated },
      prediction,
      error: null,
    });
    log.info({ counts: run.counts }, "Run completed");
    return run;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move a queued run to running, or record a new running run.
   */
  private async start(request: RunRequest, runId: string): Promise<ReconciliationRun> {
    const now = this.clock().toISOString();
    const existing = await this.runs.get(runId);
    if (existing === undefined) {
      return this.runs.create({
        ...queuedRun(runId, request, now),
        status: "running",
        startedAt: now,
      });
    }
    if (existing.status !== "queued") {
      throw new RunStoreError("RUN_EXISTS", `Run '${runId}' is already ${existing.status}`);
    }
    return this.runs.save({ ...existing, status: "running", startedAt: now });
  }

  private async predict(
    adapter: PredictionAdapter,
    run: ReconciliationRun,
    volume: number,
  ): Promise<PredictionResult> {
    const [history, breaks] = await Promise.all([
      this.runs.list({ status: "completed" }),
      this.breaks.list({ source1: run.source1, source2: run.source2 }),
    ]);
    const features = buildFeatureVector(
      history,
      breaks,
      { source1: run.source1, source2: run.source2, volume },
      this.featureWindow,
    );
    return adapter.score(features);
  }

  /**
   * Route or auto-remediate each new break. Returns how many were
   * auto-remediated.
   */
  private async handoff(log: Logger, created: readonly Break[]): Promise<number> {
    const now = this.clock();
    const outcomes = await Promise.allSettled(created.map((b) => this.engine.handoff(b, now)));

    let autoRemediated = 0;
    outcomes.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        if (outcome.value.autoRemediated) autoRemediated++;
        return;
      }
      log.warn(
        { breakId: created[i]?.id, err: outcome.reason },
        "Break handoff failed; left Open",
      );
    });
    return autoRemediated;
  }
}

function logIssues(log: Logger, issues: readonly RecordIssue[]): void {
  if (issues.length === 0) return;
  log.info({ rejected: issues.length }, "Records rejected during normalization");
  for (const issue of issues) {
    log.debug({ issue }, "Record rejected");
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

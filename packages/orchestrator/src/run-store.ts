/**
 * Run Store — persistence for ReconciliationRun records.
 *
 * A run in a terminal status (completed, failed, cancelled) is final:
 * any later save is rejected with RUN_FINALIZED.
 */

import type { ReconciliationRun, RunStatus } from "@tradebreak/types";
import { RunStoreError } from "./errors.js";

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ["completed", "failed", "cancelled"];

export function isTerminalRun(run: ReconciliationRun): boolean {
  return TERMINAL_RUN_STATUSES.includes(run.status);
}

export interface RunListOptions {
  readonly status?: RunStatus | undefined;
  readonly limit?: number | undefined;
}

export interface RunStore {
  /** @throws RunStoreError RUN_EXISTS when the id is taken */
  create(run: ReconciliationRun): Promise<ReconciliationRun>;

  /** Insert or replace. @throws RunStoreError RUN_FINALIZED over a terminal run */
  save(run: ReconciliationRun): Promise<ReconciliationRun>;

  get(id: string): Promise<ReconciliationRun | undefined>;

  /** Most recently queued first */
  list(options?: RunListOptions): Promise<readonly ReconciliationRun[]>;
}

// =============================================================================
// In-memory implementation
// =============================================================================

export class InMemoryRunStore implements RunStore {
  private readonly runs = new Map<string, ReconciliationRun>();

  async create(run: ReconciliationRun): Promise<ReconciliationRun> {
    if (this.runs.has(run.id)) {
      throw new RunStoreError("RUN_EXISTS", `Run '${run.id}' already exists`);
    }
    this.runs.set(run.id, run);
    return run;
  }

  async save(run: ReconciliationRun): Promise<ReconciliationRun> {
    const existing = this.runs.get(run.id);
    if (existing !== undefined && isTerminalRun(existing)) {
      throw new RunStoreError(
        "RUN_FINALIZED",
        `Run '${run.id}' is ${existing.status} and can no longer change`,
      );
    }
    this.runs.set(run.id, run);
    return run;
  }

  async get(id: string): Promise<ReconciliationRun | undefined> {
    return this.runs.get(id);
  }

  async list(options: RunListOptions = {}): Promise<readonly ReconciliationRun[]> {
    const matching = [...this.runs.values()]
      .filter((r) => options.status === undefined || r.status === options.status)
      .sort((x, y) => compareDesc(x.queuedAt, y.queuedAt) || compareDesc(x.id, y.id));
    return options.limit === undefined ? matching : matching.slice(0, options.limit);
  }

  get size(): number {
    return this.runs.size;
  }
}

function compareDesc(x: string, y: string): number {
  if (x === y) return 0;
  return x < y ? 1 : -1;
}

/**
 * In-memory BreakStore implementation.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Short-lived processes and local development
 *
 * Method bodies never await, so each call is atomic with respect to
 * every other call.
 * No durability guarantees.
 */

import type { Break, EscalationEvent } from "@tradebreak/types";
import type {
  BreakFilter,
  BreakStore,
  CreateManyResult,
  DuplicateSuppressed,
  TransitionResult,
} from "./break-store.js";

export class InMemoryBreakStore implements BreakStore {
  private readonly _breaks = new Map<string, Break>();
  private readonly _escalations: EscalationEvent[] = [];
  private readonly _escalationKeys = new Set<string>();

  // ─── Read ───────────────────────────────────────────────────────────

  async get(id: string): Promise<Break | undefined> {
    return this._breaks.get(id);
  }

  async list(filter: BreakFilter = {}): Promise<readonly Break[]> {
    const statuses = filter.statuses !== undefined ? new Set(filter.statuses) : undefined;
    const deadlineBefore =
      filter.deadlineBefore !== undefined ? Date.parse(filter.deadlineBefore) : undefined;

    return [...this._breaks.values()]
      .filter((b) => {
        if (statuses !== undefined && !statuses.has(b.status)) return false;
        if (filter.severity !== undefined && b.severity !== filter.severity) return false;
        if (filter.owner !== undefined && b.owner !== filter.owner) return false;
        if (filter.source1 !== undefined && b.source1 !== filter.source1) return false;
        if (filter.source2 !== undefined && b.source2 !== filter.source2) return false;
        if (filter.tradeDate !== undefined && b.tradeDate !== filter.tradeDate) return false;
        if (deadlineBefore !== undefined) {
          if (b.slaDeadline === null || !(Date.parse(b.slaDeadline) < deadlineBefore)) return false;
        }
        return true;
      })
      .sort(compareByCreation);
  }

  async listEscalations(breakId?: string): Promise<readonly EscalationEvent[]> {
    if (breakId === undefined) return [...this._escalations];
    return this._escalations.filter((e) => e.breakId === breakId);
  }

  // ─── Write ──────────────────────────────────────────────────────────

  async createManyIfAbsent(drafts: readonly Break[]): Promise<CreateManyResult> {
    const created: Break[] = [];
    const suppressed: DuplicateSuppressed[] = [];
    const batch = new Map<string, Break>();

    for (const draft of drafts) {
      const existing = this._breaks.get(draft.id) ?? batch.get(draft.id);
      if (existing !== undefined) {
        suppressed.push({
          id: draft.id,
          existingStatus: existing.status,
          existingRunId: existing.runId,
        });
        continue;
      }
      const stored: Break = { ...draft, version: 0 };
      batch.set(draft.id, stored);
      created.push(stored);
    }

    for (const [id, stored] of batch) {
      this._breaks.set(id, stored);
    }

    return { created, suppressed };
  }

  async compareAndTransition(
    id: string,
    expectedVersion: number,
    next: Break,
    escalation?: EscalationEvent,
  ): Promise<TransitionResult> {
    const current = this._breaks.get(id);
    if (current === undefined) {
      return { ok: false, reason: "not_found" };
    }
    if (current.version !== expectedVersion) {
      return { ok: false, reason: "version_mismatch", current };
    }
    if (escalation !== undefined) {
      const key = escalationKey(escalation);
      if (this._escalationKeys.has(key)) {
        return { ok: false, reason: "duplicate_escalation", current };
      }
      this._escalationKeys.add(key);
      this._escalations.push(escalation);
    }

    const stored: Break = { ...next, id, version: expectedVersion + 1 };
    this._breaks.set(id, stored);
    return { ok: true, break: stored };
  }

  // ─── Diagnostics ────────────────────────────────────────────────────

  /** Number of stored breaks */
  get size(): number {
    return this._breaks.size;
  }
}

function escalationKey(event: EscalationEvent): string {
  return `${event.breakId}#${event.fromLevel}`;
}

function compareByCreation(x: Break, y: Break): number {
  if (x.createdAt !== y.createdAt) return x.createdAt < y.createdAt ? -1 : 1;
  if (x.id !== y.id) return x.id < y.id ? -1 : 1;
  return 0;
}

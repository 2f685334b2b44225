/**
 * Workflow Engine — break lifecycle, routing and SLA escalation.
 *
 * Every operation is a read → validate → compare-and-transition cycle,
 * serialized per break id. A version conflict means someone else (another
 * engine on the same store) changed the break first; the operation fails
 * with CONCURRENCY_CONFLICT and nothing is written.
 *
 * Rules:
 * - Only VALID_TRANSITIONS are taken; anything else is a StateConflictError
 * - resolvedAt is set once and never overwritten
 * - Escalation writes exactly one EscalationEvent per (break, level)
 * - sweep() and closeExpired() hold no state between invocations
 */

import type { Break, BreakStatus, EscalationEvent } from "@tradebreak/types";
import type { BreakFilter, BreakStore } from "./break-store.js";
import { StateConflictError, WorkflowError } from "./errors.js";
import { assertTransition } from "./lifecycle.js";
import { KeyedMutex } from "./keyed-mutex.js";
import {
  DEFAULT_ESCALATION_CHAIN,
  DEFAULT_ESCALATION_FALLBACK,
  DEFAULT_ROUTING_FALLBACK,
  DEFAULT_ROUTING_RULES,
  nextOwner,
  selectOwner,
} from "./routing.js";
import type { RoutingRule } from "./routing.js";
import {
  escalationTier,
  extendedDeadline,
  initialDeadline,
  isCloseDue,
  isOverdue,
  resolveSlaPolicy,
} from "./sla-policy.js";
import type { SlaPolicy } from "./sla-policy.js";
import {
  AUTO_REMEDIATION_OWNER,
  AUTO_REMEDIATION_REASON,
  DEFAULT_AUTO_REMEDIATION_POLICY,
  checkEligibility,
} from "./auto-remediation.js";
import type { AutoRemediationPolicy, RemediationRejection } from "./auto-remediation.js";

// =============================================================================
// Options & results
// =============================================================================

export interface WorkflowEngineOptions {
  readonly routingRules?: readonly RoutingRule[] | undefined;
  readonly routingFallback?: string | undefined;
  readonly escalationChain?: Readonly<Record<string, string>> | undefined;
  readonly escalationFallback?: string | undefined;
  readonly sla?: Partial<SlaPolicy> | undefined;
  readonly autoRemediation?: Partial<AutoRemediationPolicy> | undefined;
}

export type AutoRemediationResult =
  | { readonly outcome: "remediated"; readonly break: Break }
  | { readonly outcome: "rejected"; readonly reason: RemediationRejection };

export type EscalationResult =
  | { readonly outcome: "escalated"; readonly break: Break; readonly event: EscalationEvent }
  | { readonly outcome: "not_due"; readonly break: Break }
  | { readonly outcome: "at_max_level"; readonly break: Break };

export interface SweepResult {
  readonly scanned: number;
  readonly escalated: number;
  readonly skipped: number;
  readonly atMaxLevel: number;
}

export interface CloseExpiredResult {
  readonly scanned: number;
  readonly closed: number;
}

const ESCALATABLE: readonly BreakStatus[] = ["Routed", "InProgress", "Escalated"];

interface Transition {
  readonly next: Break;
  readonly escalation?: EscalationEvent | undefined;
}

type Step<T> =
  | ({ readonly kind: "write"; readonly done: (stored: Break) => T } & Transition)
  | { readonly kind: "keep"; readonly value: T };

// =============================================================================
// Engine
// =============================================================================

export class WorkflowEngine {
  private readonly store: BreakStore;
  private readonly locks = new KeyedMutex();
  private readonly rules: readonly RoutingRule[];
  private readonly routingFallback: string;
  private readonly chain: Readonly<Record<string, string>>;
  private readonly escalationFallback: string;
  readonly sla: SlaPolicy;
  readonly autoRemediation: AutoRemediationPolicy;

  constructor(store: BreakStore, options: WorkflowEngineOptions = {}) {
    this.store = store;
    this.rules = options.routingRules ?? DEFAULT_ROUTING_RULES;
    this.routingFallback = options.routingFallback ?? DEFAULT_ROUTING_FALLBACK;
    this.chain = options.escalationChain ?? DEFAULT_ESCALATION_CHAIN;
    this.escalationFallback = options.escalationFallback ?? DEFAULT_ESCALATION_FALLBACK;
    this.sla = resolveSlaPolicy(options.sla);
    this.autoRemediation = { ...DEFAULT_AUTO_REMEDIATION_POLICY, ...options.autoRemediation };
  }

  // ─── Queries ────────────────────────────────────────────────────────

  async get(id: string): Promise<Break> {
    const brk = await this.store.get(id);
    if (brk === undefined) {
      throw new WorkflowError("BREAK_NOT_FOUND", `Break '${id}' not found`);
    }
    return brk;
  }

  list(filter?: BreakFilter): Promise<readonly Break[]> {
    return this.store.list(filter);
  }

  async escalations(id: string): Promise<readonly EscalationEvent[]> {
    await this.get(id);
    return this.store.listEscalations(id);
  }

  // ─── Operator actions ───────────────────────────────────────────────

  /**
   * Open → Routed assigns an owner and the first SLA deadline.
   * Escalated → Routed keeps level, owner and deadline.
   */
  route(id: string, now: Date = new Date()): Promise<Break> {
    const at = now.toISOString();
    return this.mutate(id, (brk) => {
      assertTransition(brk, "Routed");
      if (brk.status === "Escalated") {
        return { next: { ...brk, status: "Routed", routedAt: at } };
      }
      return {
        next: {
          ...brk,
          status: "Routed",
          owner: selectOwner(brk, this.rules, this.routingFallback),
          slaDeadline: initialDeadline(brk, this.sla),
          routedAt: at,
        },
      };
    });
  }

  acknowledge(id: string, now: Date = new Date()): Promise<Break> {
    const at = now.toISOString();
    return this.mutate(id, (brk) => {
      assertTransition(brk, "InProgress");
      return { next: { ...brk, status: "InProgress", acknowledgedAt: brk.acknowledgedAt ?? at } };
    });
  }

  resolve(id: string, reason: string, now: Date = new Date()): Promise<Break> {
    const trimmed = reason.trim();
    if (trimmed.length === 0) {
      return Promise.reject(
        new WorkflowError("VALIDATION_FAILED", "A resolution reason is required"),
      );
    }
    const at = now.toISOString();
    return this.mutate(id, (brk) => {
      assertTransition(brk, "Resolved");
      return {
        next: {
          ...brk,
          status: "Resolved",
          resolvedAt: brk.resolvedAt ?? at,
          resolutionReason: trimmed,
        },
      };
    });
  }

  close(id: string, now: Date = new Date()): Promise<Break> {
    const at = now.toISOString();
    return this.mutate(id, (brk) => {
      assertTransition(brk, "Closed");
      return { next: { ...brk, status: "Closed", closedAt: at } };
    });
  }

  // ─── System actions ─────────────────────────────────────────────────

  async autoRemediate(id: string, now: Date = new Date()): Promise<AutoRemediationResult> {
    const at = now.toISOString();
    return this.apply<AutoRemediationResult>(id, (brk) => {
      if (brk.status === "Closed") {
        throw new StateConflictError(brk.id, brk.status, "Resolved", "break is closed");
      }
      const eligibility = checkEligibility(brk, this.autoRemediation);
      if (!eligibility.eligible) {
        return { kind: "keep", value: { outcome: "rejected", reason: eligibility.reason } };
      }
      assertTransition(brk, "Resolved", "auto-remediation");
      return {
        kind: "write",
        next: {
          ...brk,
          status: "Resolved",
          owner: AUTO_REMEDIATION_OWNER,
          resolvedAt: brk.resolvedAt ?? at,
          resolutionReason: AUTO_REMEDIATION_REASON,
          autoRemediated: true,
        },
        done: (stored) => ({ outcome: "remediated", break: stored }),
      };
    });
  }

  /**
   * Route a freshly created break, or resolve it outright when policy allows.
   */
  async handoff(brk: Break, now: Date = new Date()): Promise<Break> {
    if (checkEligibility(brk, this.autoRemediation).eligible) {
      const result = await this.autoRemediate(brk.id, now);
      if (result.outcome === "remediated") return result.break;
    }
    return this.route(brk.id, now);
  }

  /**
   * Escalate one break whose deadline has passed.
   *
   * @throws StateConflictError when the break is not Routed, InProgress or Escalated
   */
  escalate(id: string, now: Date = new Date()): Promise<EscalationResult> {
    const at = now.toISOString();
    return this.apply<EscalationResult>(id, (brk) => {
      if (!ESCALATABLE.includes(brk.status)) {
        throw new StateConflictError(brk.id, brk.status, "Escalated");
      }
      if (brk.slaDeadline === null || !isOverdue(brk, at)) {
        return { kind: "keep", value: { outcome: "not_due", break: brk } };
      }
      const tier = escalationTier(brk.escalationLevel, this.sla);
      if (tier === undefined) {
        return { kind: "keep", value: { outcome: "at_max_level", break: brk } };
      }
      assertTransition(brk, "Escalated", "sweep");

      const toOwner = nextOwner(brk.owner, this.chain, this.escalationFallback);
      const event: EscalationEvent = {
        id: `esc_${brk.id.slice(4)}_${brk.escalationLevel}`,
        breakId: brk.id,
        fromLevel: brk.escalationLevel,
        toLevel: brk.escalationLevel + 1,
        fromOwner: brk.owner,
        toOwner,
        at,
        reason: "sla_breach",
      };
      return {
        kind: "write",
        next: {
          ...brk,
          status: "Escalated",
          owner: toOwner,
          escalationLevel: event.toLevel,
          slaDeadline: extendedDeadline(brk.slaDeadline, at, tier),
        },
        escalation: event,
        done: (stored) => ({ outcome: "escalated", break: stored, event }),
      };
    });
  }

  /**
   * Escalate every overdue break. Breaks changed concurrently are counted
   * as skipped; the next sweep sees them again if they are still due.
   */
  async sweep(now: Date = new Date()): Promise<SweepResult> {
    const due = await this.store.list({
      statuses: ESCALATABLE,
      deadlineBefore: now.toISOString(),
    });

    let escalated = 0;
    let skipped = 0;
    let atMaxLevel = 0;

    for (const brk of due) {
      try {
        const result = await this.escalate(brk.id, now);
        if (result.outcome === "escalated") escalated++;
        else if (result.outcome === "at_max_level") atMaxLevel++;
        else skipped++;
      } catch (err) {
        if (isSkippable(err)) {
          skipped++;
          continue;
        }
        throw err;
      }
    }

    return { scanned: due.length, escalated, skipped, atMaxLevel };
  }

  /**
   * Close Resolved breaks whose grace period has passed.
   */
  async closeExpired(now: Date = new Date()): Promise<CloseExpiredResult> {
    const resolved = await this.store.list({ statuses: ["Resolved"] });
    const at = now.toISOString();
    let closed = 0;

    for (const brk of resolved) {
      if (!isCloseDue(brk, at, this.sla)) continue;
      try {
        await this.close(brk.id, now);
        closed++;
      } catch (err) {
        if (!isSkippable(err)) throw err;
      }
    }

    return { scanned: resolved.length, closed };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private mutate(id: string, compute: (current: Break) => Transition): Promise<Break> {
    return this.apply<Break>(id, (current) => ({
      kind: "write",
      ...compute(current),
      done: (stored) => stored,
    }));
  }

  /**
   * Serialized read → decide → compare-and-transition. A "keep" step
   * writes nothing and returns its value as is.
   */
  private apply<T>(id: string, decide: (current: Break) => Step<T>): Promise<T> {
    return this.locks.run(id, async () => {
      const current = await this.get(id);
      const step = decide(current);
      if (step.kind === "keep") return step.value;

      const result = await this.store.compareAndTransition(
        id,
        current.version,
        step.next,
        step.escalation,
      );
      if (!result.ok) {
        if (result.reason === "not_found") {
          throw new WorkflowError("BREAK_NOT_FOUND", `Break '${id}' not found`);
        }
        throw new WorkflowError(
          "CONCURRENCY_CONFLICT",
          `Break '${id}' changed concurrently (${result.reason})`,
        );
      }
      return step.done(result.break);
    });
  }
}

function isSkippable(err: unknown): boolean {
  return (
    err instanceof WorkflowError &&
    (err.code === "CONCURRENCY_CONFLICT" || err.code === "STATE_CONFLICT")
  );
}

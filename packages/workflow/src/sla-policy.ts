/**
 * SLA Policy
 *
 * Pure time arithmetic for routing deadlines, escalation deadlines and
 * the close grace period. All instants are ISO-8601 strings.
 */

import type { Break, BreakSeverity } from "@tradebreak/types";
import { WorkflowError } from "./errors.js";

const MS_PER_MINUTE = 60_000;

export interface SlaPolicy {
  /** Minutes from creation to the first deadline, per severity */
  readonly durationMinutes: Readonly<Record<BreakSeverity, number>>;
  /** Deadline extension per escalation level; levels beyond the list are final */
  readonly escalationTierMinutes: readonly number[];
  /** Minutes a Resolved break stays open before it is closed */
  readonly closeGraceMinutes: number;
}

export const DEFAULT_SLA_POLICY: SlaPolicy = {
  durationMinutes: { Critical: 30, High: 120, Medium: 240, Low: 480 },
  escalationTierMinutes: [60, 120, 240],
  closeGraceMinutes: 1440,
};

export function resolveSlaPolicy(overrides: Partial<SlaPolicy> = {}): SlaPolicy {
  const policy: SlaPolicy = { ...DEFAULT_SLA_POLICY, ...overrides };
  const minutes = [
    ...Object.values(policy.durationMinutes),
    ...policy.escalationTierMinutes,
    policy.closeGraceMinutes,
  ];
  if (minutes.some((m) => !Number.isFinite(m) || m <= 0)) {
    throw new WorkflowError("VALIDATION_FAILED", "SLA durations must be positive numbers of minutes");
  }
  return policy;
}

export function addMinutes(instant: string, minutes: number): string {
  return new Date(Date.parse(instant) + minutes * MS_PER_MINUTE).toISOString();
}

export function minutesBetween(from: string, to: string): number {
  return (Date.parse(to) - Date.parse(from)) / MS_PER_MINUTE;
}

/**
 * First deadline: createdAt + duration(severity).
 */
export function initialDeadline(brk: Break, policy: SlaPolicy): string {
  return addMinutes(brk.createdAt, policy.durationMinutes[brk.severity]);
}

export function isOverdue(brk: Break, now: string): boolean {
  return brk.slaDeadline !== null && Date.parse(now) > Date.parse(brk.slaDeadline);
}

/**
 * Tier length for the step from `level` to `level + 1`, or undefined
 * when the break is already at the last tier.
 */
export function escalationTier(level: number, policy: SlaPolicy): number | undefined {
  return policy.escalationTierMinutes[level];
}

/**
 * max(deadline, now) + tier. The result is always after `now`.
 */
export function extendedDeadline(deadline: string, now: string, tierMinutes: number): string {
  const anchor = Date.parse(now) > Date.parse(deadline) ? now : deadline;
  return addMinutes(anchor, tierMinutes);
}

export function isCloseDue(brk: Break, now: string, policy: SlaPolicy): boolean {
  if (brk.status !== "Resolved" || brk.resolvedAt === null) return false;
  return Date.parse(now) > Date.parse(addMinutes(brk.resolvedAt, policy.closeGraceMinutes));
}

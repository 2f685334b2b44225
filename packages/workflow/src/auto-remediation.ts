/**
 * Auto-remediation policy.
 *
 * Small, low-severity economic breaks can be resolved by the system
 * without an operator. The policy decides eligibility; the engine
 * applies the transition.
 */

import type { Break, BreakCategory } from "@tradebreak/types";
import { WorkflowError } from "./errors.js";

export interface AutoRemediationPolicy {
  readonly enabled: boolean;
  readonly categories: readonly BreakCategory[];
  /** Exclusive upper bound on mismatchMagnitude */
  readonly maxMismatch: number;
}

export const DEFAULT_AUTO_REMEDIATION_POLICY: AutoRemediationPolicy = {
  enabled: true,
  categories: ["price", "settlement_date"],
  maxMismatch: 0.2,
};

export const AUTO_REMEDIATION_REASON = "auto-remediated";
export const AUTO_REMEDIATION_OWNER = "system";

export type RemediationRejection =
  | "disabled"
  | "already_remediated"
  | "status_not_eligible"
  | "severity_not_low"
  | "category_not_eligible"
  | "mismatch_too_large";

export type EligibilityResult =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly reason: RemediationRejection };

/**
 * Checks are ordered so the reported reason is the first one that fails.
 */
export function checkEligibility(brk: Break, policy: AutoRemediationPolicy): EligibilityResult {
  if (!policy.enabled) return { eligible: false, reason: "disabled" };
  if (brk.autoRemediated) return { eligible: false, reason: "already_remediated" };
  if (brk.status !== "Open" && brk.status !== "Routed") {
    return { eligible: false, reason: "status_not_eligible" };
  }
  if (brk.severity !== "Low") return { eligible: false, reason: "severity_not_low" };
  if (!policy.categories.includes(brk.category)) {
    return { eligible: false, reason: "category_not_eligible" };
  }
  if (!(brk.mismatchMagnitude < policy.maxMismatch)) {
    return { eligible: false, reason: "mismatch_too_large" };
  }
  return { eligible: true };
}

/**
 * A policy whose ceiling reaches 1 − reviewThreshold would cover pairs the
 * matcher never commits, so it is rejected.
 *
 * @throws WorkflowError VALIDATION_FAILED
 */
export function validateAutoRemediationPolicy(
  policy: AutoRemediationPolicy,
  reviewThreshold: number,
): AutoRemediationPolicy {
  if (!(policy.maxMismatch > 0) || !(policy.maxMismatch < 1 - reviewThreshold)) {
    throw new WorkflowError(
      "VALIDATION_FAILED",
      `Auto-remediation maxMismatch must be in (0, ${1 - reviewThreshold}), got ${policy.maxMismatch}`,
    );
  }
  return policy;
}

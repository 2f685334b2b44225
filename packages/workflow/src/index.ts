/**
 * @tradebreak/workflow — Break lifecycle, routing and SLA escalation.
 *
 * Core components:
 * - BreakStore: persistence boundary with create-if-absent and compare-and-transition
 * - InMemoryBreakStore: reference implementation
 * - WorkflowEngine: route / acknowledge / resolve / close / escalate / auto-remediate
 * - Pure policies: lifecycle, routing, SLA arithmetic, auto-remediation eligibility
 */

// Errors
export { WorkflowError, StateConflictError } from "./errors.js";
export type { WorkflowErrorCode } from "./errors.js";

// Store
export type {
  BreakStore,
  BreakFilter,
  CreateManyResult,
  DuplicateSuppressed,
  TransitionResult,
  TransitionConflictReason,
} from "./break-store.js";
export { InMemoryBreakStore } from "./in-memory-break-store.js";
export { KeyedMutex } from "./keyed-mutex.js";

// Lifecycle
export {
  VALID_TRANSITIONS,
  canTransition,
  assertTransition,
  isTerminal,
} from "./lifecycle.js";
export type { TransitionActor } from "./lifecycle.js";

// Routing
export {
  DEFAULT_ROUTING_RULES,
  DEFAULT_ROUTING_FALLBACK,
  DEFAULT_ESCALATION_CHAIN,
  DEFAULT_ESCALATION_FALLBACK,
  ruleMatches,
  selectOwner,
  nextOwner,
} from "./routing.js";
export type { RoutingRule } from "./routing.js";

// SLA
export {
  DEFAULT_SLA_POLICY,
  resolveSlaPolicy,
  addMinutes,
  minutesBetween,
  initialDeadline,
  isOverdue,
  escalationTier,
  extendedDeadline,
  isCloseDue,
} from "./sla-policy.js";
export type { SlaPolicy } from "./sla-policy.js";

// Auto-remediation
export {
  DEFAULT_AUTO_REMEDIATION_POLICY,
  AUTO_REMEDIATION_REASON,
  AUTO_REMEDIATION_OWNER,
  checkEligibility,
  validateAutoRemediationPolicy,
} from "./auto-remediation.js";
export type {
  AutoRemediationPolicy,
  EligibilityResult,
  RemediationRejection,
} from "./auto-remediation.js";

// Engine
export { WorkflowEngine } from "./workflow-engine.js";
export type {
  WorkflowEngineOptions,
  AutoRemediationResult,
  EscalationResult,
  SweepResult,
  CloseExpiredResult,
} from "./workflow-engine.js";

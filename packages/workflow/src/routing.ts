/**
 * Routing and escalation chain.
 *
 * Rules are evaluated in order; the first match names the owner.
 * The chain maps an owner to the tier above it.
 */

import type {
  Break,
  BreakCategory,
  BreakKind,
  BreakSeverity,
} from "@tradebreak/types";

export interface RoutingRule {
  readonly name: string;
  readonly kinds?: readonly BreakKind[] | undefined;
  readonly categories?: readonly BreakCategory[] | undefined;
  readonly severities?: readonly BreakSeverity[] | undefined;
  readonly owner: string;
}

export const DEFAULT_ROUTING_RULES: readonly RoutingRule[] = [
  { name: "critical", severities: ["Critical"], owner: "senior_ops_manager" },
  { name: "missing-counterpart", kinds: ["MissingCounterpart"], owner: "trade_support_team" },
  { name: "economics", categories: ["price", "quantity"], owner: "ops_analyst" },
  { name: "default", owner: "ops_team" },
];

export const DEFAULT_ROUTING_FALLBACK = "ops_team";

export const DEFAULT_ESCALATION_CHAIN: Readonly<Record<string, string>> = {
  ops_analyst: "senior_ops_manager",
  trade_support_team: "ops_manager",
  ops_team: "ops_manager",
  ops_manager: "head_of_operations",
  senior_ops_manager: "head_of_operations",
};

export const DEFAULT_ESCALATION_FALLBACK = "head_of_operations";

export function ruleMatches(rule: RoutingRule, brk: Break): boolean {
  return (
    (rule.kinds === undefined || rule.kinds.includes(brk.kind)) &&
    (rule.categories === undefined || rule.categories.includes(brk.category)) &&
    (rule.severities === undefined || rule.severities.includes(brk.severity))
  );
}

export function selectOwner(
  brk: Break,
  rules: readonly RoutingRule[] = DEFAULT_ROUTING_RULES,
  fallback: string = DEFAULT_ROUTING_FALLBACK,
): string {
  return rules.find((r) => ruleMatches(r, brk))?.owner ?? fallback;
}

export function nextOwner(
  owner: string | null,
  chain: Readonly<Record<string, string>> = DEFAULT_ESCALATION_CHAIN,
  fallback: string = DEFAULT_ESCALATION_FALLBACK,
): string {
  if (owner === null) return fallback;
  return Object.hasOwn(chain, owner) ? (chain[owner] ?? fallback) : fallback;
}

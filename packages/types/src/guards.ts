/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types. Used at system boundaries
 * (matcher input, API query parameters, deserialized artifacts).
 */

import type { Side, TradeRecord } from "./trade.js";
import type { BreakCategory, BreakSeverity, BreakStatus } from "./break.js";

// =============================================================================
// Shared
// =============================================================================

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * A calendar date in "YYYY-MM-DD" form that actually exists.
 */
export function isCalendarDate(value: unknown): value is string {
  if (typeof value !== "string" || !DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

// =============================================================================
// Trade guards
// =============================================================================

export const SIDES: readonly Side[] = ["BUY", "SELL"];

export function isSide(value: unknown): value is Side {
  return value === "BUY" || value === "SELL";
}

export function isTradeRecord(value: unknown): value is TradeRecord {
  if (value === null || typeof value !== "object") return false;
  const v = new Map<string, unknown>(Object.entries(value));
  const text = (key: string): boolean => {
    const field = v.get(key);
    return typeof field === "string" && field.length > 0;
  };
  const quantity = v.get("quantity");
  const price = v.get("price");
  const settlementDate = v.get("settlementDate");
  const counterparty = v.get("counterparty");
  return (
    text("sourceId") &&
    text("externalRef") &&
    isCalendarDate(v.get("tradeDate")) &&
    text("symbol") &&
    isSide(v.get("side")) &&
    typeof quantity === "number" &&
    Number.isFinite(quantity) &&
    quantity > 0 &&
    typeof price === "number" &&
    Number.isFinite(price) &&
    price >= 0 &&
    text("currency") &&
    (settlementDate === undefined || isCalendarDate(settlementDate)) &&
    (counterparty === undefined || text("counterparty"))
  );
}

// =============================================================================
// Break guards
// =============================================================================

export const BREAK_STATUSES: readonly BreakStatus[] = [
  "Open",
  "Routed",
  "InProgress",
  "Escalated",
  "Resolved",
  "Closed",
];

export const BREAK_SEVERITIES: readonly BreakSeverity[] = [
  "Low",
  "Medium",
  "High",
  "Critical",
];

export const BREAK_CATEGORIES: readonly BreakCategory[] = [
  "missing_counterpart",
  "price",
  "quantity",
  "settlement_date",
  "currency",
  "counterparty",
  "combination",
];

const STATUS_SET = new Set<string>(BREAK_STATUSES);
const SEVERITY_SET = new Set<string>(BREAK_SEVERITIES);
const CATEGORY_SET = new Set<string>(BREAK_CATEGORIES);

export function isBreakStatus(value: unknown): value is BreakStatus {
  return typeof value === "string" && STATUS_SET.has(value);
}

export function isBreakSeverity(value: unknown): value is BreakSeverity {
  return typeof value === "string" && SEVERITY_SET.has(value);
}

export function isBreakCategory(value: unknown): value is BreakCategory {
  return typeof value === "string" && CATEGORY_SET.has(value);
}

/**
 * Resolved and Closed breaks no longer need an owner's attention.
 */
export function isOpenStatus(status: BreakStatus): boolean {
  return status !== "Resolved" && status !== "Closed";
}

/**
 * Rank of a severity, Low = 0 … Critical = 3.
 */
export function severityRank(severity: BreakSeverity): number {
  return BREAK_SEVERITIES.indexOf(severity);
}

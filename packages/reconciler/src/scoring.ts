/**
 * Pair Scoring
 *
 * Weighted similarity between one source-A record and one source-B record.
 *
 * Gate: symbol and side must be equal or the pair is not a candidate.
 * Components (each in [0, 1]):
 * - symbol: 1 once the gate passes
 * - quantity, price: 1 within tolerance, else 0.5 · max(0, 1 − d)
 *   where d is the relative difference against A's value
 * - price: forced to 0 when currencies differ
 * - settlement date: 0.5ⁿ for an offset of n days; 1 when both absent,
 *   0.5 when only one side carries a date
 * - counterparty: name similarity; 0.5 when only one side names one.
 *   Left out of the score, weight included, when neither side does.
 *
 * score = Σ weightᵢ · componentᵢ / Σ weights
 */

import type {
  FieldDiff,
  MatchCandidatePair,
  ScoreBreakdown,
  TradeRecord,
} from "@tradebreak/types";
import { totalWeight } from "./config.js";
import type { MatcherConfig } from "./config.js";
import { counterpartySimilarity } from "./similarity.js";

const MS_PER_DAY = 86_400_000;

/** Absorbs binary float noise at tolerance boundaries */
const EPSILON = 1e-9;

// =============================================================================
// Numeric helpers
// =============================================================================

/**
 * |a − b| relative to |a| (or |b| when a is 0). Equal values give 0.
 */
export function relativeDifference(a: number, b: number): number {
  if (a === b) return 0;
  const ref = a !== 0 ? Math.abs(a) : Math.abs(b);
  return Math.abs(a - b) / ref;
}

/**
 * Whole days between two calendar dates, absolute.
 */
export function daysBetween(a: string, b: string): number {
  const ta = Date.parse(`${a}T00:00:00Z`);
  const tb = Date.parse(`${b}T00:00:00Z`);
  return Math.round(Math.abs(ta - tb) / MS_PER_DAY);
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function outOfTolerance(d: number): number {
  return 0.5 * Math.max(0, 1 - d);
}

// =============================================================================
// Scoring
// =============================================================================

/**
 * Score a pair. Returns undefined when the symbol/side gate fails.
 */
export function scorePair(
  a: TradeRecord,
  b: TradeRecord,
  config: MatcherConfig,
): MatchCandidatePair | undefined {
  if (a.symbol !== b.symbol || a.side !== b.side) return undefined;

  const fieldDiffs: FieldDiff[] = [];

  // ─── Quantity ───
  let quantity = 1;
  if (a.quantity !== b.quantity) {
    const d = relativeDifference(a.quantity, b.quantity);
    const exceeds = d * 100 > config.quantityTolerancePct + EPSILON;
    quantity = exceeds ? outOfTolerance(d) : 1;
    fieldDiffs.push({
      field: "quantity",
      valueA: a.quantity,
      valueB: b.quantity,
      deviation: d,
      exceedsTolerance: exceeds,
    });
  }

  // ─── Price ───
  let price = 1;
  if (a.price !== b.price) {
    const d = relativeDifference(a.price, b.price);
    const exceeds = d * 10_000 > config.priceToleranceBps + EPSILON;
    price = exceeds ? outOfTolerance(d) : 1;
    fieldDiffs.push({
      field: "price",
      valueA: a.price,
      valueB: b.price,
      deviation: d,
      exceedsTolerance: exceeds,
    });
  }

  // ─── Settlement date ───
  let settlementDate = 1;
  if (a.settlementDate !== undefined && b.settlementDate !== undefined) {
    const days = daysBetween(a.settlementDate, b.settlementDate);
    if (days > 0) {
      settlementDate = 0.5 ** days;
      fieldDiffs.push({
        field: "settlement_date",
        valueA: a.settlementDate,
        valueB: b.settlementDate,
        deviation: days,
        exceedsTolerance: days > config.settlementToleranceDays,
      });
    }
  } else if (a.settlementDate !== undefined || b.settlementDate !== undefined) {
    settlementDate = 0.5;
    fieldDiffs.push({
      field: "settlement_date",
      valueA: a.settlementDate ?? null,
      valueB: b.settlementDate ?? null,
      deviation: 1,
      exceedsTolerance: true,
    });
  }

  // ─── Currency ───
  if (a.currency !== b.currency) {
    price = 0;
    fieldDiffs.push({
      field: "currency",
      valueA: a.currency,
      valueB: b.currency,
      deviation: 1,
      exceedsTolerance: true,
    });
  }

  // ─── Counterparty ───
  let counterparty: number | undefined;
  if (a.counterparty !== undefined && b.counterparty !== undefined) {
    counterparty = roundTo(counterpartySimilarity(a.counterparty, b.counterparty), 9);
    if (a.counterparty !== b.counterparty) {
      fieldDiffs.push({
        field: "counterparty",
        valueA: a.counterparty,
        valueB: b.counterparty,
        deviation: roundTo(1 - counterparty, 9),
        exceedsTolerance: counterparty < config.counterpartyMinSimilarity - EPSILON,
      });
    }
  } else if (a.counterparty !== undefined || b.counterparty !== undefined) {
    counterparty = 0.5;
  }

  const breakdown: ScoreBreakdown = {
    symbol: 1,
    quantity,
    price,
    settlementDate,
    ...(counterparty !== undefined ? { counterparty } : {}),
  };
  let weighted =
    config.symbolWeight * breakdown.symbol +
    config.quantityWeight * breakdown.quantity +
    config.priceWeight * breakdown.price +
    config.dateWeight * breakdown.settlementDate;
  let weights = totalWeight(config);
  if (counterparty !== undefined) {
    weighted += config.counterpartyWeight * counterparty;
    weights += config.counterpartyWeight;
  }

  return {
    a,
    b,
    score: roundTo(weighted / weights, 9),
    breakdown,
    fieldDiffs,
  };
}

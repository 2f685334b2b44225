/**
 * Trade Normalizer
 *
 * Turns raw per-source payloads into canonical TradeRecords.
 *
 * Sources disagree on field names (snake_case, camelCase, connector
 * specific aliases) and on encodings (numeric strings, date-times,
 * single-letter sides, exchange-suffixed symbols). The normalizer folds
 * all of them into one shape and validates it with zod.
 *
 * A record that fails becomes a RecordIssue; the rest of the batch
 * is unaffected.
 */

import { z } from "zod";
import { isCalendarDate } from "@tradebreak/types";
import type {
  RecordIssue,
  RecordIssueCode,
  RecordSide,
  SourceId,
  TradeRecord,
} from "@tradebreak/types";

// =============================================================================
// Aliases
// =============================================================================

/**
 * Accepted input keys per canonical field, in lookup order.
 */
export const FIELD_ALIASES = {
  externalRef: ["externalRef", "external_ref", "trade_id", "tradeId", "order_id", "orderId", "id"],
  tradeDate: ["tradeDate", "trade_date", "execution_time", "executionTime"],
  symbol: ["symbol", "ticker"],
  side: ["side"],
  quantity: ["quantity", "qty", "filled_quantity", "filledQuantity"],
  price: ["price", "avg_fill_price", "avgFillPrice"],
  currency: ["currency", "ccy"],
  settlementDate: ["settlementDate", "settlement_date"],
  counterparty: ["counterparty", "counterparty_name", "counterpartyName", "broker"],
} as const;

type CanonicalField = keyof typeof FIELD_ALIASES;

const REQUIRED_FIELDS: readonly CanonicalField[] = [
  "externalRef",
  "tradeDate",
  "symbol",
  "side",
  "quantity",
  "price",
  "currency",
];

// =============================================================================
// Coercion helpers
// =============================================================================

const EXCHANGE_SUFFIX = /\.[A-Z]{1,4}$/;
const DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/;

const LEGAL_FORM = new RegExp(
  `\\b(?:${[
    "INCORPORATED",
    "INC",
    "LLC",
    "LTD",
    "LIMITED",
    "CORPORATION",
    "CORP",
    "CO",
    "LLP",
    "LP",
    "PLC",
    "SA",
    "AG",
    "GMBH",
    "NV",
    "BV",
  ].join("|")})\\b\\.?`,
  "g",
);

/**
 * Upper-case, trim, drop an exchange suffix (".OQ", ".L") and internal spaces.
 */
export function normalizeSymbol(value: string): string {
  return value.trim().toUpperCase().replace(EXCHANGE_SUFFIX, "").replace(/\s+/g, "");
}

/**
 * Upper-case, drop legal-form words ("INC", "LLC", "AG", ...), turn
 * punctuation into spaces and collapse whitespace.
 *
 *   "Goldman Sachs & Co. LLC" → "GOLDMAN SACHS"
 */
export function normalizeCounterparty(value: string): string {
  return value
    .toUpperCase()
    .replace(LEGAL_FORM, " ")
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Map the side spellings sources use onto BUY / SELL.
 * Returns the upper-cased input unchanged when it is not recognized.
 */
export function normalizeSide(value: string): string {
  const upper = value.trim().toUpperCase();
  if (upper === "B" || upper === "BUY") return "BUY";
  if (upper === "S" || upper === "SELL") return "SELL";
  return upper;
}

/**
 * Reduce a date or date-time to its calendar date as written.
 */
export function toCalendarDate(value: unknown): unknown {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? value : value.toISOString().slice(0, 10);
  }
  if (typeof value !== "string") return value;
  const match = DATE_PREFIX.exec(value.trim());
  return match?.[1] ?? value;
}

function toNumber(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    return Number(value.trim());
  }
  return value;
}

function round8(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

// =============================================================================
// Schema
// =============================================================================

const calendarDate = z.preprocess(
  toCalendarDate,
  z.string().refine(isCalendarDate, { message: "Expected a YYYY-MM-DD date" }),
);

const CanonicalTradeSchema = z.object({
  externalRef: z.preprocess(
    (v) => (typeof v === "number" ? String(v) : v),
    z.string().trim().min(1),
  ),
  tradeDate: calendarDate,
  symbol: z
    .string()
    .transform(normalizeSymbol)
    .pipe(z.string().min(1, { message: "Symbol is empty after normalization" })),
  side: z.preprocess(
    (v) => (typeof v === "string" ? normalizeSide(v) : v),
    z.enum(["BUY", "SELL"]),
  ),
  quantity: z.preprocess(toNumber, z.number().finite().positive()).transform(round8),
  price: z.preprocess(toNumber, z.number().finite().nonnegative()).transform(round8),
  currency: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{3}$/, { message: "Expected a three-letter currency code" }),
  settlementDate: calendarDate.optional(),
  counterparty: z.string().transform(normalizeCounterparty).optional(),
});

// =============================================================================
// Batch normalization
// =============================================================================

export interface NormalizeOptions {
  /** When given, records on any other trade date are rejected */
  readonly tradeDate?: string | undefined;
  /** Side label attached to issues (default "A") */
  readonly side?: RecordSide | undefined;
}

export interface NormalizedBatch {
  readonly records: readonly TradeRecord[];
  readonly issues: readonly RecordIssue[];
}

/**
 * Normalize one source's raw batch.
 *
 * Records keep their input order. The first record with a given
 * externalRef wins; later ones are DUPLICATE_REF issues.
 */
export function normalizeBatch(
  sourceId: SourceId,
  raw: readonly unknown[],
  options: NormalizeOptions = {},
): NormalizedBatch {
  const side = options.side ?? "A";
  const records: TradeRecord[] = [];
  const issues: RecordIssue[] = [];
  const seen = new Set<string>();

  raw.forEach((item, index) => {
    const issue = (code: RecordIssueCode, message: string, externalRef?: string): void => {
      issues.push({
        side,
        index,
        ...(externalRef !== undefined ? { externalRef } : {}),
        code,
        message,
      });
    };

    if (item === null || typeof item !== "object" || Array.isArray(item)) {
      issue("INVALID_FIELD", "Record is not an object");
      return;
    }

    const fields = collectFields(item);
    const rawRef = fields.externalRef;
    const refHint = typeof rawRef === "string" || typeof rawRef === "number" ? String(rawRef) : undefined;

    const missing = REQUIRED_FIELDS.filter((f) => fields[f] === undefined);
    if (missing.length > 0) {
      issue("MISSING_FIELD", `Missing required field(s): ${missing.join(", ")}`, refHint);
      return;
    }

    const parsed = CanonicalTradeSchema.safeParse(fields);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const path = first?.path.join(".") ?? "record";
      issue("INVALID_FIELD", `${path}: ${first?.message ?? "invalid value"}`, refHint);
      return;
    }

    const data = parsed.data;
    if (seen.has(data.externalRef)) {
      issue("DUPLICATE_REF", `Duplicate externalRef "${data.externalRef}" in batch`, data.externalRef);
      return;
    }
    if (options.tradeDate !== undefined && data.tradeDate !== options.tradeDate) {
      issue(
        "WRONG_TRADE_DATE",
        `Trade date ${data.tradeDate} does not match run date ${options.tradeDate}`,
        data.externalRef,
      );
      return;
    }

    seen.add(data.externalRef);
    records.push({
      sourceId,
      externalRef: data.externalRef,
      tradeDate: data.tradeDate,
      symbol: data.symbol,
      side: data.side,
      quantity: data.quantity,
      price: data.price,
      currency: data.currency,
      ...(data.settlementDate !== undefined ? { settlementDate: data.settlementDate } : {}),
      ...(data.counterparty ? { counterparty: data.counterparty } : {}),
    });
  });

  return { records, issues };
}

/**
 * The reference a raw record carries under any accepted alias, read the
 * way normalizeBatch reads it. Undefined when there is none.
 */
export function rawExternalRef(item: unknown): string | undefined {
  if (item === null || typeof item !== "object" || Array.isArray(item)) return undefined;
  const ref = collectFields(item).externalRef;
  if (typeof ref === "number") return String(ref);
  if (typeof ref !== "string") return undefined;
  const trimmed = ref.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Pick the first present alias for every canonical field.
 * Null and empty-string values count as absent.
 */
function collectFields(item: object): Record<CanonicalField, unknown> {
  const source = new Map<string, unknown>(Object.entries(item));
  const pick = (aliases: readonly string[]): unknown => {
    for (const key of aliases) {
      const value = source.get(key);
      if (value !== undefined && value !== null && value !== "") return value;
    }
    return undefined;
  };

  return {
    externalRef: pick(FIELD_ALIASES.externalRef),
    tradeDate: pick(FIELD_ALIASES.tradeDate),
    symbol: pick(FIELD_ALIASES.symbol),
    side: pick(FIELD_ALIASES.side),
    quantity: pick(FIELD_ALIASES.quantity),
    price: pick(FIELD_ALIASES.price),
    currency: pick(FIELD_ALIASES.currency),
    settlementDate: pick(FIELD_ALIASES.settlementDate),
    counterparty: pick(FIELD_ALIASES.counterparty),
  };
}

/**
 * Trade Types
 *
 * Canonical trade records as produced by the normalizer.
 *
 * Rules:
 * - A record is immutable once ingested for a run
 * - Identity is (sourceId, externalRef), never the array position
 * - Dates are calendar dates ("YYYY-MM-DD"), no time zone attached
 */

/**
 * Identifier of a reporting system (e.g. "oms", "custodian", "prime_broker").
 */
export type SourceId = string;

/**
 * Trade direction. Normalized from the many spellings sources use.
 */
export type Side = "BUY" | "SELL";

/**
 * A canonical trade record.
 */
export interface TradeRecord {
  /** Reporting system */
  readonly sourceId: SourceId;

  /** The source's own reference for the trade (order id, trade id, ...) */
  readonly externalRef: string;

  /** Trade date, "YYYY-MM-DD" */
  readonly tradeDate: string;

  /** Normalized instrument symbol (upper-case, no exchange suffix) */
  readonly symbol: string;

  readonly side: Side;

  /** Positive quantity */
  readonly quantity: number;

  /** Non-negative execution price */
  readonly price: number;

  /** ISO 4217 currency code, upper-case */
  readonly currency: string;

  /** Contractual settlement date, "YYYY-MM-DD" */
  readonly settlementDate?: string | undefined;

  /** Counterparty name, upper-case with legal-form suffixes removed */
  readonly counterparty?: string | undefined;
}

/**
 * Stable reference to a trade record across runs.
 */
export interface TradeRef {
  readonly sourceId: SourceId;
  readonly externalRef: string;
}

/**
 * Which side of a reconciliation a record came from.
 */
export type RecordSide = "A" | "B";

/**
 * Per-record validation failure codes.
 */
export type RecordIssueCode =
  | "MISSING_FIELD"
  | "INVALID_FIELD"
  | "DUPLICATE_REF"
  | "WRONG_TRADE_DATE";

/**
 * A record rejected at the boundary. Isolated to the offending record;
 * the batch it arrived in continues.
 */
export interface RecordIssue {
  readonly side: RecordSide;
  /** Position of the record in its input batch */
  readonly index: number;
  readonly externalRef?: string | undefined;
  readonly code: RecordIssueCode;
  readonly message: string;
}

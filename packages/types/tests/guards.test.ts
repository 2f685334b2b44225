/**
 * Runtime type guard tests for @tradebreak/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isCalendarDate,
  isSide,
  isTradeRecord,
  isBreakStatus,
  isBreakSeverity,
  isBreakCategory,
  isOpenStatus,
  severityRank,
} from "../src/guards.js";

const validRecord = {
  sourceId: "oms",
  externalRef: "REF1",
  tradeDate: "2024-03-15",
  symbol: "AAPL",
  side: "BUY",
  quantity: 100,
  price: 50,
  currency: "USD",
  settlementDate: "2024-03-19",
};

// =============================================================================
// Date guard
// =============================================================================

describe("isCalendarDate", () => {
  it("accepts a real date", () => {
    expect(isCalendarDate("2024-02-29")).toBe(true);
  });

  it("rejects an impossible date", () => {
    expect(isCalendarDate("2023-02-29")).toBe(false);
    expect(isCalendarDate("2024-13-01")).toBe(false);
  });

  it("rejects date-times and other shapes", () => {
    expect(isCalendarDate("2024-03-15T10:00:00Z")).toBe(false);
    expect(isCalendarDate("15/03/2024")).toBe(false);
    expect(isCalendarDate(20240315)).toBe(false);
  });
});

// =============================================================================
// Trade guards
// =============================================================================

describe("isSide", () => {
  it("accepts BUY and SELL only", () => {
    expect(isSide("BUY")).toBe(true);
    expect(isSide("SELL")).toBe(true);
    expect(isSide("buy")).toBe(false);
    expect(isSide("B")).toBe(false);
  });
});

describe("isTradeRecord", () => {
  it("accepts a valid record", () => {
    expect(isTradeRecord(validRecord)).toBe(true);
  });

  it("accepts a record without settlement date", () => {
    const { settlementDate: _omit, ...rest } = validRecord;
    expect(isTradeRecord(rest)).toBe(true);
  });

  it("rejects null and primitives", () => {
    expect(isTradeRecord(null)).toBe(false);
    expect(isTradeRecord("REF1")).toBe(false);
  });

  it("rejects empty external reference", () => {
    expect(isTradeRecord({ ...validRecord, externalRef: "" })).toBe(false);
  });

  it("rejects zero or negative quantity", () => {
    expect(isTradeRecord({ ...validRecord, quantity: 0 })).toBe(false);
    expect(isTradeRecord({ ...validRecord, quantity: -5 })).toBe(false);
  });

  it("rejects non-finite price", () => {
    expect(isTradeRecord({ ...validRecord, price: Number.NaN })).toBe(false);
    expect(isTradeRecord({ ...validRecord, price: Infinity })).toBe(false);
  });

  it("rejects string quantity", () => {
    expect(isTradeRecord({ ...validRecord, quantity: "100" })).toBe(false);
  });

  it("accepts a named counterparty and rejects an empty one", () => {
    expect(isTradeRecord({ ...validRecord, counterparty: "GOLDMAN SACHS" })).toBe(true);
    expect(isTradeRecord({ ...validRecord, counterparty: "" })).toBe(false);
  });

  it("rejects a malformed settlement date", () => {
    expect(isTradeRecord({ ...validRecord, settlementDate: "soon" })).toBe(false);
  });
});

// =============================================================================
// Break guards
// =============================================================================

describe("break guards", () => {
  it("recognizes lifecycle states", () => {
    expect(isBreakStatus("Escalated")).toBe(true);
    expect(isBreakStatus("escalated")).toBe(false);
  });

  it("recognizes severities", () => {
    expect(isBreakSeverity("Critical")).toBe(true);
    expect(isBreakSeverity("Urgent")).toBe(false);
  });

  it("recognizes categories", () => {
    expect(isBreakCategory("settlement_date")).toBe(true);
    expect(isBreakCategory("counterparty")).toBe(true);
    expect(isBreakCategory("fees")).toBe(false);
  });

  it("treats Resolved and Closed as no longer open", () => {
    expect(isOpenStatus("Open")).toBe(true);
    expect(isOpenStatus("Escalated")).toBe(true);
    expect(isOpenStatus("Resolved")).toBe(false);
    expect(isOpenStatus("Closed")).toBe(false);
  });

  it("ranks severities in ascending order", () => {
    expect(severityRank("Low")).toBe(0);
    expect(severityRank("Medium")).toBe(1);
    expect(severityRank("High")).toBe(2);
    expect(severityRank("Critical")).toBe(3);
  });
});

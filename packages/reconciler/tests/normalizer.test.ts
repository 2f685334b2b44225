/**
 * Normalizer tests
 */
import { describe, it, expect } from "vitest";
import {
  normalizeBatch,
  normalizeCounterparty,
  normalizeSide,
  normalizeSymbol,
  toCalendarDate,
} from "../src/normalizer.js";

describe("normalizeBatch", () => {
  describe("aliases and coercion", () => {
    it("folds snake_case connector fields into a canonical record", () => {
      const { records, issues } = normalizeBatch("oms", [
        {
          trade_id: "T1",
          trade_date: "2024-03-15",
          ticker: " aapl.oq ",
          side: "b",
          qty: "100",
          avg_fill_price: "50.123456789",
          ccy: "usd",
          settlement_date: "2024-03-19",
        },
      ]);

      expect(issues).toEqual([]);
      expect(records).toEqual([
        {
          sourceId: "oms",
          externalRef: "T1",
          tradeDate: "2024-03-15",
          symbol: "AAPL",
          side: "BUY",
          quantity: 100,
          price: 50.12345679,
          currency: "USD",
          settlementDate: "2024-03-19",
        },
      ]);
    });

    it("accepts camelCase fields and reduces date-times to dates", () => {
      const { records } = normalizeBatch("custodian", [
        {
          orderId: "O-9",
          executionTime: "2024-03-15T14:30:00Z",
          symbol: "msft",
          side: "sell",
          filledQuantity: 25,
          avgFillPrice: 410.5,
          currency: "USD",
        },
      ]);

      expect(records).toHaveLength(1);
      expect(records[0]!.tradeDate).toBe("2024-03-15");
      expect(records[0]!.side).toBe("SELL");
      expect(records[0]!.symbol).toBe("MSFT");
      expect(records[0]!.settlementDate).toBeUndefined();
    });

    it("stringifies numeric references", () => {
      const { records } = normalizeBatch("oms", [
        { id: 12345, tradeDate: "2024-03-15", symbol: "IBM", side: "BUY", quantity: 1, price: 0, currency: "USD" },
      ]);
      expect(records[0]!.externalRef).toBe("12345");
      expect(records[0]!.price).toBe(0);
    });

    it("normalizes the counterparty and drops one left empty", () => {
      const base = { tradeDate: "2024-03-15", symbol: "IBM", side: "BUY", quantity: 1, price: 10, currency: "USD" };
      const { records, issues } = normalizeBatch("oms", [
        { ...base, id: "C1", broker: "Barclays Bank PLC" },
        { ...base, id: "C2", counterparty_name: "LLC" },
      ]);
      expect(issues).toEqual([]);
      expect(records[0]!.counterparty).toBe("BARCLAYS BANK");
      expect(records[1]).not.toHaveProperty("counterparty");
    });
  });

  describe("per-record issues", () => {
    const valid = {
      externalRef: "T1",
      tradeDate: "2024-03-15",
      symbol: "AAPL",
      side: "BUY",
      quantity: 100,
      price: 50,
      currency: "USD",
    };

    it("reports missing required fields by name", () => {
      const { price: _omit, ...noPrice } = valid;
      const { records, issues } = normalizeBatch("oms", [noPrice]);
      expect(records).toEqual([]);
      expect(issues).toEqual([
        {
          side: "A",
          index: 0,
          externalRef: "T1",
          code: "MISSING_FIELD",
          message: "Missing required field(s): price",
        },
      ]);
    });

    it("rejects a non-positive quantity as an invalid field", () => {
      const { issues } = normalizeBatch("oms", [{ ...valid, quantity: "-5" }]);
      expect(issues).toHaveLength(1);
      expect(issues[0]!.code).toBe("INVALID_FIELD");
      expect(issues[0]!.message).toMatch(/^quantity: /);
    });

    it("rejects an unknown side", () => {
      const { issues } = normalizeBatch("oms", [{ ...valid, side: "X" }]);
      expect(issues[0]!.code).toBe("INVALID_FIELD");
      expect(issues[0]!.message).toMatch(/^side: /);
    });

    it("rejects an impossible calendar date", () => {
      const { issues } = normalizeBatch("oms", [{ ...valid, tradeDate: "2024-02-30" }]);
      expect(issues[0]!.code).toBe("INVALID_FIELD");
      expect(issues[0]!.message).toMatch(/^tradeDate: /);
    });

    it("rejects non-object entries", () => {
      const { issues } = normalizeBatch("oms", [valid, "garbage"], { side: "B" });
      expect(issues).toEqual([
        { side: "B", index: 1, code: "INVALID_FIELD", message: "Record is not an object" },
      ]);
    });

    it("keeps the first of two records sharing a reference", () => {
      const { records, issues } = normalizeBatch("oms", [valid, { ...valid, quantity: 7 }]);
      expect(records).toHaveLength(1);
      expect(records[0]!.quantity).toBe(100);
      expect(issues[0]!.code).toBe("DUPLICATE_REF");
      expect(issues[0]!.index).toBe(1);
    });

    it("rejects records on another trade date when a run date is given", () => {
      const { records, issues } = normalizeBatch(
        "oms",
        [valid, { ...valid, externalRef: "T2", tradeDate: "2024-03-14" }],
        { tradeDate: "2024-03-15" },
      );
      expect(records.map((r) => r.externalRef)).toEqual(["T1"]);
      expect(issues[0]!.code).toBe("WRONG_TRADE_DATE");
      expect(issues[0]!.externalRef).toBe("T2");
    });

    it("continues past bad records", () => {
      const { records, issues } = normalizeBatch("oms", [
        null,
        valid,
        { ...valid, externalRef: "T2", currency: "dollars" },
        { ...valid, externalRef: "T3" },
      ]);
      expect(records.map((r) => r.externalRef)).toEqual(["T1", "T3"]);
      expect(issues.map((i) => i.index)).toEqual([0, 2]);
    });
  });
});

describe("field helpers", () => {
  it("normalizes symbols", () => {
    expect(normalizeSymbol("vod.l")).toBe("VOD");
    expect(normalizeSymbol(" brk b ")).toBe("BRKB");
    expect(normalizeSymbol("AAPL")).toBe("AAPL");
  });

  it("strips legal forms and punctuation from counterparties", () => {
    expect(normalizeCounterparty("Goldman Sachs & Co. LLC")).toBe("GOLDMAN SACHS");
    expect(normalizeCounterparty("Deutsche Bank AG")).toBe("DEUTSCHE BANK");
    expect(normalizeCounterparty("J.P. Morgan Securities plc")).toBe("J P MORGAN SECURITIES");
    expect(normalizeCounterparty("Acme Company")).toBe("ACME COMPANY");
  });

  it("normalizes sides", () => {
    expect(normalizeSide("s")).toBe("SELL");
    expect(normalizeSide("Buy")).toBe("BUY");
    expect(normalizeSide("short")).toBe("SHORT");
  });

  it("reduces dates", () => {
    expect(toCalendarDate("2024-03-15 09:00:00")).toBe("2024-03-15");
    expect(toCalendarDate(new Date("2024-03-15T09:00:00Z"))).toBe("2024-03-15");
    expect(toCalendarDate("March 15")).toBe("March 15");
  });
});

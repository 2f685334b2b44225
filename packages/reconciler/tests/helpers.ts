/**
 * Shared record builders for reconciler tests.
 */
import type { TradeRecord } from "@tradebreak/types";

export function tradeA(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    sourceId: "oms",
    externalRef: "A1",
    tradeDate: "2024-03-15",
    symbol: "AAPL",
    side: "BUY",
    quantity: 100,
    price: 50,
    currency: "USD",
    settlementDate: "2024-03-19",
    ...overrides,
  };
}

export function tradeB(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return tradeA({ sourceId: "custodian", externalRef: "B1", ...overrides });
}

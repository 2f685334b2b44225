/**
 * Shared fixtures for orchestrator tests.
 */
import pino from "pino";
import type { Logger } from "pino";
import type { Break } from "@tradebreak/types";

export const TRADE_DATE = "2024-03-15";
export const NOW = new Date("2024-03-15T18:00:00.000Z");

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Logger writing JSON lines into `lines`.
 */
export function capturingLogger(lines: Record<string, unknown>[]): Logger {
  return pino(
    { level: "debug" },
    {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  );
}

function trade(ref: string, symbol: string, price: number, extra: Record<string, unknown> = {}) {
  return {
    externalRef: ref,
    tradeDate: TRADE_DATE,
    symbol,
    side: "BUY",
    quantity: 100,
    price,
    currency: "USD",
    settlementDate: "2024-03-19",
    ...extra,
  };
}

/**
 * oms side:
 * - T1 AAPL matches C1 exactly
 * - T2 MSFT vs C2: 200 bps price difference (High)
 * - T3 IBM vs C3: 10 bps price difference (Low, auto-remediable)
 * - T4 TSLA has no counterpart (notional 2000, Low)
 * - T5 is missing most fields
 */
export const OMS_BATCH: readonly unknown[] = [
  trade("T1", "AAPL", 50),
  trade("T2", "MSFT", 50),
  trade("T3", "IBM", 50),
  trade("T4", "TSLA", 200, { quantity: 10 }),
  { externalRef: "T5", symbol: "NFLX" },
];

export const CUSTODIAN_BATCH: readonly unknown[] = [
  trade("C1", "AAPL", 50),
  trade("C2", "MSFT", 51),
  trade("C3", "IBM", 50.05),
];

export function makeBreak(overrides: Partial<Break> = {}): Break {
  return {
    id: "brk_00000000000000000000000000000001",
    identityKey: "0".repeat(63) + "1",
    runId: "run-seed",
    kind: "FieldMismatch",
    category: "price",
    severity: "High",
    status: "Open",
    owner: null,
    escalationLevel: 0,
    slaDeadline: null,
    createdAt: "2024-03-15T12:00:00.000Z",
    routedAt: null,
    acknowledgedAt: null,
    resolvedAt: null,
    closedAt: null,
    resolutionReason: null,
    autoRemediated: false,
    sourceRefs: [
      { sourceId: "oms", externalRef: "X1" },
      { sourceId: "custodian", externalRef: "Y1" },
    ],
    tradeDate: TRADE_DATE,
    source1: "oms",
    source2: "custodian",
    matchScore: 0.847,
    mismatchMagnitude: 0.153,
    notional: 5000,
    fieldDiffs: [],
    riskScore: null,
    version: 0,
    ...overrides,
  };
}

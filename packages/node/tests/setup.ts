/**
 * Test helpers for @tradebreak/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import pino from "pino";
import type { Break } from "@tradebreak/types";
import type { PredictionAdapter } from "@tradebreak/analytics";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { RequestLogEntry } from "../src/middleware/logger.js";
import { ReconciliationService } from "../src/services/reconciliation-service.js";
import type { ReconciliationServiceConfig } from "../src/services/reconciliation-service.js";

export const TRADE_DATE = "2024-03-15";
export const NOW = new Date("2024-03-15T18:00:00.000Z");

export interface TestAppOptions {
  readonly clock?: () => Date;
  readonly prediction?: PredictionAdapter;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly autoRemediation?: ReconciliationServiceConfig["autoRemediation"];
}

/**
 * Create a test app over a fresh service.
 *
 * Uses silent logging and a clock fixed at NOW unless overridden.
 */
export function createTestApp(options: TestAppOptions = {}): AppInstance {
  const service = new ReconciliationService({
    logger: pino({ level: "silent" }),
    clock: options.clock ?? (() => NOW),
    prediction: options.prediction,
    autoRemediation: options.autoRemediation,
  });
  return createApp({ service, logFn: options.logFn });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

// =============================================================================
// Trade batches
// =============================================================================

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
 * - T1 AAPL matches C1 exactly
 * - T2 MSFT vs C2 differs by 200 bps (High, routed to ops_analyst)
 * - T3 IBM vs C3 differs by 10 bps (Low, auto-remediated)
 * - T4 TSLA has no counterpart (Low, routed to trade_support_team)
 * - T5 is missing most fields and is rejected
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

export const RUN_REQUEST = { tradeDate: TRADE_DATE, source1: "oms", source2: "custodian" };

/**
 * Load both batches through the API.
 */
export async function ingestBatches(app: AppInstance["app"]): Promise<void> {
  for (const [sourceId, records] of [
    ["oms", OMS_BATCH],
    ["custodian", CUSTODIAN_BATCH],
  ] as const) {
    const res = await app.request(
      jsonRequest(`/api/v1/sources/${sourceId}/trades`, "POST", { tradeDate: TRADE_DATE, records }),
    );
    if (res.status !== 201) {
      throw new Error(`ingest ${sourceId} failed with ${res.status}`);
    }
  }
}

/**
 * Ingest both batches and complete one run.
 */
export async function seedRun(app: AppInstance["app"]): Promise<string> {
  await ingestBatches(app);
  const res = await app.request(jsonRequest("/api/v1/runs", "POST", RUN_REQUEST));
  const body = (await res.json()) as { data: { id: string } };
  return body.data.id;
}

export function makeBreak(overrides: Partial<Break> = {}): Break {
  return {
    id: "brk_00000000000000000000000000000001",
    identityKey: "0".repeat(63) + "1",
    runId: "run-seed",
    kind: "FieldMismatch",
    category: "price",
    severity: "Low",
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
    matchScore: 0.9,
    mismatchMagnitude: 0.1,
    notional: 5000,
    fieldDiffs: [],
    riskScore: null,
    version: 0,
    ...overrides,
  };
}

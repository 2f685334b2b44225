/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (WorkflowError, RunError, etc.)
 * to appropriate HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { StateConflictError } from "@tradebreak/workflow";
import { RunError } from "@tradebreak/orchestrator";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Lookups
  BREAK_NOT_FOUND: 404,
  RUN_NOT_FOUND: 404,

  // Validation
  VALIDATION_FAILED: 400,
  INVALID_REQUEST: 400,
  INVALID_CONFIG: 400,
  INVALID_ARTIFACT: 400,

  // Conflicts
  CONCURRENCY_CONFLICT: 409,
  STATE_CONFLICT: 409,
  RUN_EXISTS: 409,
  RUN_FINALIZED: 409,

  // Runs
  RUN_FAILED: 502,
  RUN_CANCELLED: 503,
  QUEUE_CLOSED: 503,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorDetails(err: Error): Record<string, unknown> | undefined {
  if (err instanceof StateConflictError) {
    return { breakId: err.breakId, from: err.from, to: err.to };
  }
  if (err instanceof RunError && err.run !== undefined) {
    return { run: err.run };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCode(err);
  const status = code === undefined ? undefined : STATUS_MAP[code];

  if (code === undefined || status === undefined) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message, errorDetails(err)), status);
}

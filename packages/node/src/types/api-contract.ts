/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ReconciliationService } from "../services/reconciliation-service.js";

/**
 * Hono environment type for the reconciliation API.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Run created by this request, for the request log */
    runId: string | undefined;

    /** Service every /api route delegates to */
    service: ReconciliationService;
  };
}

/**
 * Extends AppEnv with the body parsed by validateBody().
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    validatedBody: T;
  };
}

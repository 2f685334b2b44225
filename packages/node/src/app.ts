/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests build the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { ReconciliationService } from "./services/reconciliation-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSourceRoutes } from "./routes/sources.js";
import { createRunRoutes } from "./routes/runs.js";
import { createBreakRoutes } from "./routes/breaks.js";
import { createSlaRoutes } from "./routes/sla.js";
import { createReportRoutes } from "./routes/reports.js";
import { createPredictionRoutes } from "./routes/predictions.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: ReconciliationService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ReconciliationService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/sources", createSourceRoutes());
  app.route("/api/v1/runs", createRunRoutes());
  app.route("/api/v1/breaks", createBreakRoutes());
  app.route("/api/v1/sla", createSlaRoutes());
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/predictions", createPredictionRoutes());

  return { app, service };
}

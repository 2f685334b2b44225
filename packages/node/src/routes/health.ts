/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (SLA scheduler running, queue accepting)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ReconciliationService } from "../services/reconciliation-service.js";

export function createHealthRoutes(service: ReconciliationService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.scheduler.running && service.queue.accepting;
    const body = {
      status: ready ? "ready" : "not_ready",
      scheduler: service.scheduler.running ? "running" : "stopped",
      queue: {
        accepting: service.queue.accepting,
        active: service.queue.activeCount,
        pending: service.queue.pendingCount,
      },
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}

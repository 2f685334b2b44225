/**
 * Reporting routes.
 *
 * GET /api/v1/reports/summary     — Break and run totals, match rate
 * GET /api/v1/reports/aging       — Open breaks by age bucket and severity
 * GET /api/v1/reports/root-cause  — Recurring patterns among resolved breaks
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AgingQuerySchema, RootCauseQuerySchema } from "../types/dto.js";
import { formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/summary", async (c) => {
    return c.json({ data: await c.get("service").summary() });
  });

  routes.get("/aging", async (c) => {
    const query = AgingQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }
    const { now } = query.data;
    const report = await c.get("service").aging(now === undefined ? undefined : new Date(now));
    return c.json({ data: report });
  });

  routes.get("/root-cause", async (c) => {
    const query = RootCauseQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }
    return c.json({ data: await c.get("service").rootCause(query.data) });
  });

  return routes;
}

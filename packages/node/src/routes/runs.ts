/**
 * Reconciliation run routes.
 *
 * POST /api/v1/runs        — Run now and return the finished run
 * POST /api/v1/runs/queue  — Queue a run and return its id
 * GET  /api/v1/runs        — Run history, most recent first
 * GET  /api/v1/runs/:id    — Get a single run
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListRunsQuerySchema, RunRequestSchema } from "../types/dto.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createRunRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RunRequestSchema), async (c) => {
    const run = await c.get("service").runNow(c.get("validatedBody"));
    c.set("runId", run.id);
    return c.json({ data: run }, 201);
  });

  routes.post("/queue", validateBody(RunRequestSchema), async (c) => {
    const queued = await c.get("service").enqueueRun(c.get("validatedBody"));
    c.set("runId", queued.runId);
    return c.json({ data: queued }, 202);
  });

  routes.get("/", async (c) => {
    const query = ListRunsQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }
    const runs = await c.get("service").listRuns(query.data.limit, query.data.status);
    return c.json({ data: runs });
  });

  routes.get("/:id", async (c) => {
    const run = await c.get("service").getRun(c.req.param("id"));
    return c.json({ data: run });
  });

  return routes;
}

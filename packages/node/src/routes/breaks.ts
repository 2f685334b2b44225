/**
 * Break workflow routes.
 *
 * GET  /api/v1/breaks                     — List breaks (filters, cursor pagination)
 * GET  /api/v1/breaks/:id                 — Get a single break
 * GET  /api/v1/breaks/:id/escalations     — Escalation trail, oldest first
 * POST /api/v1/breaks/:id/route           — Assign an owner and SLA deadline
 * POST /api/v1/breaks/:id/acknowledge     — Owner starts work
 * POST /api/v1/breaks/:id/resolve         — Resolve with a reason
 * POST /api/v1/breaks/:id/close           — Close a resolved break
 * POST /api/v1/breaks/:id/auto-remediate  — Resolve under the remediation policy
 */

import { Hono } from "hono";
import type { Break } from "@tradebreak/types";
import type { AppEnv } from "../types/api-contract.js";
import { ListBreaksQuerySchema, ResolveBreakSchema } from "../types/dto.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

const CURSOR_FIELD = "createdAt|id";

function cursorValue(brk: Break): string {
  return `${brk.createdAt}|${brk.id}`;
}

export function createBreakRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const queryResult = ListBreaksQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const breaks = await c.get("service").listBreaks({
      statuses: query.status,
      severity: query.severity,
      owner: query.owner,
      source1: query.source1,
      source2: query.source2,
      tradeDate: query.tradeDate,
    });

    // Oldest first for stable pagination
    const sorted = [...breaks].sort((a, b) => {
      const x = cursorValue(a);
      const y = cursorValue(b);
      return x < y ? -1 : x > y ? 1 : 0;
    });

    return c.json(
      paginate(sorted, { cursor: query.cursor, limit: query.limit }, cursorValue, CURSOR_FIELD),
    );
  });

  routes.get("/:id", async (c) => {
    const brk = await c.get("service").getBreak(c.req.param("id"));
    return c.json({ data: brk });
  });

  routes.get("/:id/escalations", async (c) => {
    const events = await c.get("service").escalations(c.req.param("id"));
    return c.json({ data: events });
  });

  routes.post("/:id/route", async (c) => {
    const brk = await c.get("service").route(c.req.param("id"));
    return c.json({ data: brk });
  });

  routes.post("/:id/acknowledge", async (c) => {
    const brk = await c.get("service").acknowledge(c.req.param("id"));
    return c.json({ data: brk });
  });

  routes.post("/:id/resolve", validateBody(ResolveBreakSchema), async (c) => {
    const { reason } = c.get("validatedBody");
    const brk = await c.get("service").resolve(c.req.param("id"), reason);
    return c.json({ data: brk });
  });

  routes.post("/:id/close", async (c) => {
    const brk = await c.get("service").close(c.req.param("id"));
    return c.json({ data: brk });
  });

  routes.post("/:id/auto-remediate", async (c) => {
    const result = await c.get("service").autoRemediate(c.req.param("id"));
    return c.json({ data: result });
  });

  return routes;
}

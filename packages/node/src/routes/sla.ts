/**
 * SLA routes.
 *
 * POST /api/v1/sla/sweep — Run one escalation sweep and auto-close pass
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SweepSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createSlaRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/sweep", validateBody(SweepSchema), async (c) => {
    const { now } = c.get("validatedBody");
    const tick = await c.get("service").sweep(now === undefined ? undefined : new Date(now));
    return c.json({ data: tick });
  });

  return routes;
}

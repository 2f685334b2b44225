/**
 * Source batch routes.
 *
 * POST /api/v1/sources/:sourceId/trades — Load a raw batch into the trade feed
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IngestTradesSchema, SourceIdSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createSourceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:sourceId/trades", validateBody(IngestTradesSchema), (c) => {
    const sourceId = SourceIdSchema.safeParse(c.req.param("sourceId"));
    if (!sourceId.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid source id"), 400);
    }
    const body = c.get("validatedBody");
    const receipt = c.get("service").ingest(sourceId.data, body.tradeDate, body.records);
    return c.json({ data: receipt }, 201);
  });

  return routes;
}

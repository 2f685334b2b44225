/**
 * Prediction routes.
 *
 * POST /api/v1/predictions — Score a feature vector, or a pending
 *                            reconciliation from its run history
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PredictionRequestSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createPredictionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(PredictionRequestSchema), async (c) => {
    const body = c.get("validatedBody");
    const service = c.get("service");
    const result =
      "features" in body ? await service.predict(body.features) : await service.predictPending(body);
    return c.json({ data: result });
  });

  return routes;
}

/**
 * Request logging middleware.
 *
 * Hands one entry per request to the supplied sink; main.ts points
 * it at the pino root logger. Entries carry the run, break or source
 * the request touched so a run's HTTP trail can be pulled from the logs
 * by id.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly runId?: string | undefined;
  readonly breakId?: string | undefined;
  readonly sourceId?: string | undefined;
}

type Subject = Pick<RequestLogEntry, "runId" | "breakId" | "sourceId">;

// /api/v1/<collection>/<id>[/...]; "queue" is a runs action, not an id
const SUBJECT_PATH = /^\/api\/v1\/(runs|breaks|sources)\/([^/]+)/;

function subjectOf(c: Context<AppEnv>): Subject {
  // Set by handlers that create a run; the id is not in the path
  const created = c.get("runId");
  if (created !== undefined) return { runId: created };

  const match = SUBJECT_PATH.exec(c.req.path);
  const collection = match?.[1];
  const id = match?.[2];
  if (id === undefined) return {};
  const decoded = decodeURIComponent(id);
  switch (collection) {
    case "runs":
      return decoded === "queue" ? {} : { runId: decoded };
    case "breaks":
      return { breakId: decoded };
    case "sources":
      return { sourceId: decoded };
    default:
      return {};
  }
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      ...subjectOf(c),
    });
  };
}

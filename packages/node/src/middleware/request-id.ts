/**
 * Request ID middleware.
 *
 * Keeps a caller's X-Request-Id when it is a plain token, otherwise
 * issues a `req_`-prefixed one, and echoes it on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

export const REQUEST_ID_PREFIX = "req_";

// Ids end up in log lines; no whitespace or control characters
const CLIENT_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function generateRequestId(): string {
  return `${REQUEST_ID_PREFIX}${randomUUID().replace(/-/g, "")}`;
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && CLIENT_REQUEST_ID.test(incoming) ? incoming : generateRequestId();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}

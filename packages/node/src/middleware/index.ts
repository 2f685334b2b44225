/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export {
  generateRequestId,
  requestIdMiddleware,
  REQUEST_ID_HEADER,
  REQUEST_ID_PREFIX,
} from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";

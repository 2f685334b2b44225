/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createSourceRoutes } from "./sources.js";
export { createRunRoutes } from "./runs.js";
export { createBreakRoutes } from "./breaks.js";
export { createSlaRoutes } from "./sla.js";
export { createReportRoutes } from "./reports.js";
export { createPredictionRoutes } from "./predictions.js";

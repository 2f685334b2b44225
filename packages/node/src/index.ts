/**
 * @tradebreak/node — HTTP surface for the reconciliation engine.
 */

export { ReconciliationService } from "./services/reconciliation-service.js";
export type {
  ReconciliationServiceConfig,
  SourceBatchReceipt,
  PredictionResponse,
} from "./services/reconciliation-service.js";
export { loadPredictionAdapter } from "./services/prediction.js";
export type { PredictionSettings } from "./services/prediction.js";
export {
  loadConfig,
  ConfigSchema,
  matcherConfigFrom,
  slaPolicyFrom,
  autoRemediationFrom,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

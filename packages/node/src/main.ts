/**
 * @tradebreak/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server
 * and the SLA scheduler, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import {
  autoRemediationFrom,
  loadConfig,
  matcherConfigFrom,
  slaPolicyFrom,
} from "./config.js";
import { createApp } from "./app.js";
import { ReconciliationService } from "./services/reconciliation-service.js";
import { loadPredictionAdapter } from "./services/prediction.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const prediction = await loadPredictionAdapter(
    { modelPath: config.MODEL_PATH, timeoutMs: config.PREDICTION_TIMEOUT_MS },
    logger.child({ component: "prediction" }),
  );

  const service = new ReconciliationService({
    logger,
    matcher: matcherConfigFrom(config),
    sla: slaPolicyFrom(config),
    autoRemediation: autoRemediationFrom(config),
    prediction,
    runConcurrency: config.RUN_CONCURRENCY,
    sweepIntervalMs: config.SWEEP_INTERVAL_MS,
  });

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });
  service.start();

  logger.info(
    { port: config.PORT, host: config.HOST, sweepIntervalMs: config.SWEEP_INTERVAL_MS },
    "Reconciliation node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

/**
 * Builds the prediction adapter from configuration.
 */

import type { Logger } from "pino";
import {
  LogisticModelScorer,
  PredictionAdapter,
  loadModelArtifact,
} from "@tradebreak/analytics";

export interface PredictionSettings {
  readonly modelPath?: string | undefined;
  readonly timeoutMs: number;
}

/**
 * No path, or a path with no file behind it, gives an adapter that
 * answers "no model".
 *
 * @throws ModelArtifactError when the file exists but is not a valid artifact
 */
export async function loadPredictionAdapter(
  settings: PredictionSettings,
  logger: Logger,
): Promise<PredictionAdapter> {
  const options = { timeoutMs: settings.timeoutMs };
  if (settings.modelPath === undefined) {
    logger.info("No MODEL_PATH configured; predictions unavailable");
    return new PredictionAdapter(undefined, options);
  }

  const artifact = await loadModelArtifact(settings.modelPath);
  if (artifact === undefined) {
    logger.warn({ modelPath: settings.modelPath }, "Model artifact not found; predictions unavailable");
    return new PredictionAdapter(undefined, options);
  }

  logger.info({ modelId: artifact.modelId, modelPath: settings.modelPath }, "Model loaded");
  return new PredictionAdapter(new LogisticModelScorer(artifact), options);
}

/**
 * Logistic Model Scorer
 *
 * Scores a FeatureVector with a logistic regression trained elsewhere.
 * The model ships as a JSON artifact:
 *
 *   { "modelId": "...", "intercept": -2.1, "coefficients": { "historicalBreakRate": 3.2, ... } }
 *
 * Missing coefficients count as 0.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { FeatureVector } from "@tradebreak/types";
import type { BreakScorer } from "./prediction-adapter.js";

export class ModelArtifactError extends Error {
  public readonly code = "INVALID_ARTIFACT" as const;
  constructor(message: string) {
    super(message);
    this.name = "ModelArtifactError";
  }
}

const coefficient = z.number().finite().default(0);

export const ModelArtifactSchema = z.object({
  modelId: z.string().min(1),
  intercept: z.number().finite(),
  coefficients: z
    .object({
      historicalBreakRate: coefficient,
      volume: coefficient,
      categoryVolatility: coefficient,
      recentRunCount: coefficient,
    })
    .strict(),
});

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

/**
 * @throws ModelArtifactError when the value does not describe a model
 */
export function parseModelArtifact(value: unknown): ModelArtifact {
  const parsed = ModelArtifactSchema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ModelArtifactError(
      `Invalid model artifact at ${first?.path.join(".") || "root"}: ${first?.message ?? "unknown"}`,
    );
  }
  return parsed.data;
}

/**
 * Load an artifact from disk. A missing file means "no model" and yields
 * undefined; anything else unreadable is an error.
 */
export async function loadModelArtifact(path: string): Promise<ModelArtifact | undefined> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ModelArtifactError(`Model artifact ${path} is not valid JSON: ${message}`);
  }
  return parseModelArtifact(json);
}

export class LogisticModelScorer implements BreakScorer {
  readonly modelId: string;
  private readonly artifact: ModelArtifact;

  constructor(artifact: ModelArtifact) {
    this.artifact = artifact;
    this.modelId = artifact.modelId;
  }

  score(features: FeatureVector): number {
    const w = this.artifact.coefficients;
    const logit =
      this.artifact.intercept +
      w.historicalBreakRate * features.historicalBreakRate +
      w.volume * features.volume +
      w.categoryVolatility * features.categoryVolatility +
      w.recentRunCount * features.recentRunCount;
    return 1 / (1 + Math.exp(-logit));
  }
}

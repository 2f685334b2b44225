/**
 * Prediction Adapter
 *
 * Wraps an external break-likelihood model behind a strict contract:
 * - No scorer configured → unavailable ("no-model")
 * - Scorer throws → unavailable, with its message
 * - Scorer exceeds the timeout → unavailable ("timeout")
 * - Non-finite or out-of-range probability → unavailable ("invalid-score")
 *
 * An unavailable result is never turned into a zero score.
 */

import type { FeatureVector, PredictionResult, RiskLevel } from "@tradebreak/types";

export interface BreakScorer {
  readonly modelId: string;
  score(features: FeatureVector): number | Promise<number>;
}

export interface PredictionAdapterOptions {
  /** Default: 2000 */
  readonly timeoutMs?: number | undefined;
}

export const DEFAULT_PREDICTION_TIMEOUT_MS = 2000;

export class PredictionTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Scorer did not answer within ${timeoutMs}ms`);
    this.name = "PredictionTimeoutError";
  }
}

export function riskLevelFor(probability: number): RiskLevel {
  if (probability >= 0.8) return "critical";
  if (probability >= 0.6) return "high";
  if (probability >= 0.4) return "medium";
  return "low";
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PredictionTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

export class PredictionAdapter {
  private readonly scorer: BreakScorer | undefined;
  readonly timeoutMs: number;

  constructor(scorer?: BreakScorer, options: PredictionAdapterOptions = {}) {
    this.scorer = scorer;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PREDICTION_TIMEOUT_MS;
  }

  get configured(): boolean {
    return this.scorer !== undefined;
  }

  async score(features: FeatureVector): Promise<PredictionResult> {
    const scorer = this.scorer;
    if (scorer === undefined) {
      return { status: "unavailable", reason: "no-model" };
    }

    let probability: number;
    try {
      probability = await withTimeout(
        Promise.resolve().then(() => scorer.score(features)),
        this.timeoutMs,
      );
    } catch (err: unknown) {
      if (err instanceof PredictionTimeoutError) {
        return { status: "unavailable", reason: "timeout" };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { status: "unavailable", reason: `scorer-error: ${message}` };
    }

    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      return { status: "unavailable", reason: "invalid-score" };
    }

    return {
      status: "scored",
      probability,
      modelId: scorer.modelId,
      riskLevel: riskLevelFor(probability),
    };
  }
}

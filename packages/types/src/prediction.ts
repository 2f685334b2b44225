/**
 * Prediction Types
 *
 * Scoring contract with an external break-likelihood model.
 * "No model" is a distinct result, never a zero score.
 */

/**
 * Summary of a pending reconciliation window.
 */
export interface FeatureVector {
  /** Breaks created per record seen over recent runs, in [0, 1] */
  readonly historicalBreakRate: number;
  /** Records in the pending reconciliation */
  readonly volume: number;
  /** Coefficient of variation of per-run break counts */
  readonly categoryVolatility: number;
  /** Completed runs the history was drawn from */
  readonly recentRunCount: number;
}

export type RiskLevel = "low" | "medium" | "high" | "critical";

export type PredictionResult =
  | {
      readonly status: "scored";
      readonly probability: number;
      readonly modelId: string;
      readonly riskLevel: RiskLevel;
    }
  | {
      readonly status: "unavailable";
      readonly reason: string;
    };

/**
 * Matcher and classifier configuration.
 *
 * Weights, tolerances and thresholds are configuration, never constants
 * baked into the algorithm. Everything here is validated once, at
 * construction, so the hot path can trust its inputs.
 */

// =============================================================================
// Error
// =============================================================================

export class MatcherConfigError extends Error {
  public readonly code = "INVALID_CONFIG" as const;
  constructor(message: string) {
    super(message);
    this.name = "MatcherConfigError";
  }
}

// =============================================================================
// Matcher
// =============================================================================

export interface MatcherConfig {
  readonly symbolWeight: number;
  readonly quantityWeight: number;
  readonly priceWeight: number;
  /** Weight of the settlement-date component */
  readonly dateWeight: number;
  /** Counts only for pairs where at least one side names a counterparty */
  readonly counterpartyWeight: number;

  /** Price difference still treated as equal, in basis points of A's price */
  readonly priceToleranceBps: number;
  /** Quantity difference still treated as equal, in percent of A's quantity */
  readonly quantityTolerancePct: number;
  /** Settlement date offset (days) that does not count as exceeding tolerance */
  readonly settlementToleranceDays: number;
  /** Counterparty name similarity, in [0, 1], still treated as the same party */
  readonly counterpartyMinSimilarity: number;

  /** Committed pairs at or above this score are full-confidence matches */
  readonly matchThreshold: number;
  /** Pairs below this score are never committed */
  readonly reviewThreshold: number;
}

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  symbolWeight: 0.25,
  quantityWeight: 0.3,
  priceWeight: 0.3,
  dateWeight: 0.15,
  counterpartyWeight: 0.1,
  priceToleranceBps: 5,
  quantityTolerancePct: 0,
  settlementToleranceDays: 0,
  counterpartyMinSimilarity: 0.85,
  matchThreshold: 0.95,
  reviewThreshold: 0.6,
};

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws MatcherConfigError on negative weights, a zero weight sum,
 *   negative tolerances, or thresholds outside 0 ≤ review ≤ match ≤ 1
 */
export function resolveMatcherConfig(
  overrides: Partial<MatcherConfig> = {},
): MatcherConfig {
  const config: MatcherConfig = { ...DEFAULT_MATCHER_CONFIG, ...overrides };

  const weights = {
    symbolWeight: config.symbolWeight,
    quantityWeight: config.quantityWeight,
    priceWeight: config.priceWeight,
    dateWeight: config.dateWeight,
    counterpartyWeight: config.counterpartyWeight,
  };
  for (const [name, value] of Object.entries(weights)) {
    assertFiniteNonNegative(name, value);
  }
  if (totalWeight(config) <= 0) {
    throw new MatcherConfigError("At least one field weight must be positive");
  }

  assertFiniteNonNegative("priceToleranceBps", config.priceToleranceBps);
  assertFiniteNonNegative("quantityTolerancePct", config.quantityTolerancePct);
  assertFiniteNonNegative("settlementToleranceDays", config.settlementToleranceDays);
  if (!(config.counterpartyMinSimilarity >= 0 && config.counterpartyMinSimilarity <= 1)) {
    throw new MatcherConfigError(
      `counterpartyMinSimilarity must be within [0, 1] (got ${config.counterpartyMinSimilarity})`,
    );
  }

  if (
    !(config.reviewThreshold >= 0) ||
    !(config.matchThreshold <= 1) ||
    config.reviewThreshold > config.matchThreshold
  ) {
    throw new MatcherConfigError(
      `Thresholds must satisfy 0 <= reviewThreshold <= matchThreshold <= 1 ` +
        `(got review=${config.reviewThreshold}, match=${config.matchThreshold})`,
    );
  }

  return config;
}

/**
 * Sum of the weights every pair is scored on. The counterparty weight is
 * added per pair, only when a counterparty is present.
 */
export function totalWeight(config: MatcherConfig): number {
  return config.symbolWeight + config.quantityWeight + config.priceWeight + config.dateWeight;
}

// =============================================================================
// Classifier
// =============================================================================

/**
 * Lower bounds for Medium, High and Critical. Anything below `medium` is Low.
 */
export interface SeverityThresholds {
  readonly medium: number;
  readonly high: number;
  readonly critical: number;
}

export interface ClassifierConfig {
  /** Notional (|quantity × price|) bounds for missing counterparts */
  readonly notionalThresholds: SeverityThresholds;
  /** Price/quantity deviation bounds in basis points */
  readonly deviationBpsThresholds: SeverityThresholds;
  /** Settlement date offset bounds in days */
  readonly settlementDayThresholds: SeverityThresholds;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  notionalThresholds: { medium: 10_000, high: 100_000, critical: 1_000_000 },
  deviationBpsThresholds: { medium: 25, high: 100, critical: 500 },
  settlementDayThresholds: { medium: 2, high: 4, critical: 7 },
};

export function resolveClassifierConfig(
  overrides: Partial<ClassifierConfig> = {},
): ClassifierConfig {
  const config: ClassifierConfig = { ...DEFAULT_CLASSIFIER_CONFIG, ...overrides };
  assertOrdered("notionalThresholds", config.notionalThresholds);
  assertOrdered("deviationBpsThresholds", config.deviationBpsThresholds);
  assertOrdered("settlementDayThresholds", config.settlementDayThresholds);
  return config;
}

// =============================================================================
// Helpers
// =============================================================================

function assertFiniteNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new MatcherConfigError(`${name} must be a finite number >= 0, got ${value}`);
  }
}

function assertOrdered(name: string, t: SeverityThresholds): void {
  assertFiniteNonNegative(`${name}.medium`, t.medium);
  if (!(t.medium <= t.high && t.high <= t.critical)) {
    throw new MatcherConfigError(
      `${name} must satisfy medium <= high <= critical (got ${t.medium}, ${t.high}, ${t.critical})`,
    );
  }
}

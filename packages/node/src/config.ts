/**
 * @tradebreak/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * then maps it onto the option objects of the domain packages.
 */

import { z } from "zod";
import { isBreakCategory } from "@tradebreak/types";
import type { BreakCategory } from "@tradebreak/types";
import type { MatcherConfig } from "@tradebreak/reconciler";
import type { AutoRemediationPolicy, SlaPolicy } from "@tradebreak/workflow";

// =============================================================================
// Field helpers
// =============================================================================

const fraction = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);
const nonNegative = (fallback: number) => z.coerce.number().min(0).default(fallback);
const minutes = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .transform((v) => v === "true")
    .default(fallback);

const minuteList = (fallback: string) =>
  z
    .string()
    .transform((raw, ctx) => {
      const values = raw.split(",").map((s) => Number(s.trim()));
      if (values.some((v) => !Number.isInteger(v) || v < 1)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Expected a comma-separated list of positive whole minutes",
        });
        return z.NEVER;
      }
      return values;
    })
    .default(fallback);

const categoryList = (fallback: string) =>
  z
    .string()
    .transform((raw, ctx) => {
      const categories: BreakCategory[] = [];
      for (const item of raw.split(",").map((s) => s.trim()).filter((s) => s !== "")) {
        if (!isBreakCategory(item)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown break category "${item}"` });
          return z.NEVER;
        }
        categories.push(item);
      }
      return categories;
    })
    .default(fallback);

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Matcher
    MATCH_SYMBOL_WEIGHT: nonNegative(0.25),
    MATCH_QUANTITY_WEIGHT: nonNegative(0.3),
    MATCH_PRICE_WEIGHT: nonNegative(0.3),
    MATCH_DATE_WEIGHT: nonNegative(0.15),
    MATCH_COUNTERPARTY_WEIGHT: nonNegative(0.1),
    PRICE_TOLERANCE_BPS: nonNegative(5),
    QUANTITY_TOLERANCE_PCT: nonNegative(0),
    SETTLEMENT_TOLERANCE_DAYS: nonNegative(0),
    COUNTERPARTY_MIN_SIMILARITY: fraction(0.85),
    MATCH_THRESHOLD: fraction(0.95),
    REVIEW_THRESHOLD: fraction(0.6),

    // SLA
    SLA_CRITICAL_MINUTES: minutes(30),
    SLA_HIGH_MINUTES: minutes(120),
    SLA_MEDIUM_MINUTES: minutes(240),
    SLA_LOW_MINUTES: minutes(480),
    ESCALATION_TIER_MINUTES: minuteList("60,120,240"),
    CLOSE_GRACE_MINUTES: minutes(1440),

    // Auto-remediation
    AUTO_REMEDIATION_ENABLED: booleanFlag("true"),
    AUTO_REMEDIATION_CATEGORIES: categoryList("price,settlement_date"),
    AUTO_REMEDIATION_MAX_MISMATCH: z.coerce.number().gt(0).lt(1).default(0.2),

    // Scheduling
    SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(900000),
    RUN_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(2),

    // Prediction
    MODEL_PATH: z.string().min(1).optional(),
    PREDICTION_TIMEOUT_MS: z.coerce.number().int().min(1).default(2000),
  })
  .superRefine((config, ctx) => {
    if (config.REVIEW_THRESHOLD > config.MATCH_THRESHOLD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REVIEW_THRESHOLD"],
        message: "REVIEW_THRESHOLD must not exceed MATCH_THRESHOLD",
      });
    }
    if (!(config.AUTO_REMEDIATION_MAX_MISMATCH < 1 - config.REVIEW_THRESHOLD)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AUTO_REMEDIATION_MAX_MISMATCH"],
        message: "AUTO_REMEDIATION_MAX_MISMATCH must be below 1 - REVIEW_THRESHOLD",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Domain option mapping
// =============================================================================

export function matcherConfigFrom(config: AppConfig): MatcherConfig {
  return {
    symbolWeight: config.MATCH_SYMBOL_WEIGHT,
    quantityWeight: config.MATCH_QUANTITY_WEIGHT,
    priceWeight: config.MATCH_PRICE_WEIGHT,
    dateWeight: config.MATCH_DATE_WEIGHT,
    counterpartyWeight: config.MATCH_COUNTERPARTY_WEIGHT,
    priceToleranceBps: config.PRICE_TOLERANCE_BPS,
    quantityTolerancePct: config.QUANTITY_TOLERANCE_PCT,
    settlementToleranceDays: config.SETTLEMENT_TOLERANCE_DAYS,
    counterpartyMinSimilarity: config.COUNTERPARTY_MIN_SIMILARITY,
    matchThreshold: config.MATCH_THRESHOLD,
    reviewThreshold: config.REVIEW_THRESHOLD,
  };
}

export function slaPolicyFrom(config: AppConfig): SlaPolicy {
  return {
    durationMinutes: {
      Critical: config.SLA_CRITICAL_MINUTES,
      High: config.SLA_HIGH_MINUTES,
      Medium: config.SLA_MEDIUM_MINUTES,
      Low: config.SLA_LOW_MINUTES,
    },
    escalationTierMinutes: config.ESCALATION_TIER_MINUTES,
    closeGraceMinutes: config.CLOSE_GRACE_MINUTES,
  };
}

export function autoRemediationFrom(config: AppConfig): AutoRemediationPolicy {
  return {
    enabled: config.AUTO_REMEDIATION_ENABLED,
    categories: config.AUTO_REMEDIATION_CATEGORIES,
    maxMismatch: config.AUTO_REMEDIATION_MAX_MISMATCH,
  };
}

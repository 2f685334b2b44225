/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import { isBreakSeverity, isBreakStatus, isCalendarDate } from "@tradebreak/types";
import type { BreakStatus } from "@tradebreak/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const CalendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: "Expected a calendar date (YYYY-MM-DD)" });

export const SourceIdSchema = z.string().trim().min(1).max(64);

export const InstantSchema = z.string().datetime({ offset: true });

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const RunStatusSchema = z.enum(["queued", "running", "completed", "failed", "cancelled"]);

// =============================================================================
// Source DTOs
// =============================================================================

export const IngestTradesSchema = z.object({
  tradeDate: CalendarDateSchema,
  /** May be empty: the source reported no trades for the date */
  records: z.array(z.unknown()).max(50_000),
});

export type IngestTradesDto = z.infer<typeof IngestTradesSchema>;

// =============================================================================
// Run DTOs
// =============================================================================

export const RunRequestSchema = z.object({
  tradeDate: CalendarDateSchema,
  source1: SourceIdSchema,
  source2: SourceIdSchema,
  trigger: z.enum(["on-demand", "scheduled"]).optional(),
});

export type RunRequestDto = z.infer<typeof RunRequestSchema>;

export const ListRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  status: RunStatusSchema.optional(),
});

export type ListRunsQuery = z.infer<typeof ListRunsQuerySchema>;

// =============================================================================
// Break DTOs
// =============================================================================

/** Comma-separated list, e.g. ?status=Open,Routed */
const StatusListSchema = z.string().transform((raw, ctx) => {
  const statuses: BreakStatus[] = [];
  for (const item of raw.split(",").map((s) => s.trim()).filter((s) => s !== "")) {
    if (!isBreakStatus(item)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown break status "${item}"` });
      return z.NEVER;
    }
    statuses.push(item);
  }
  return statuses;
});

export const ListBreaksQuerySchema = PaginationQuerySchema.extend({
  status: StatusListSchema.optional(),
  severity: z.string().refine(isBreakSeverity, { message: "Unknown severity" }).optional(),
  owner: z.string().min(1).optional(),
  source1: SourceIdSchema.optional(),
  source2: SourceIdSchema.optional(),
  tradeDate: CalendarDateSchema.optional(),
});

export type ListBreaksQuery = z.infer<typeof ListBreaksQuerySchema>;

export const ResolveBreakSchema = z.object({
  reason: z.string().trim().min(1).max(1024),
});

export type ResolveBreakDto = z.infer<typeof ResolveBreakSchema>;

// =============================================================================
// SLA DTOs
// =============================================================================

export const SweepSchema = z.object({
  now: InstantSchema.optional(),
});

export type SweepDto = z.infer<typeof SweepSchema>;

// =============================================================================
// Report DTOs
// =============================================================================

export const AgingQuerySchema = z.object({
  now: InstantSchema.optional(),
});

export const RootCauseQuerySchema = z.object({
  from: InstantSchema.optional(),
  to: InstantSchema.optional(),
  topN: z.coerce.number().int().min(1).max(100).optional(),
});

export type RootCauseQuery = z.infer<typeof RootCauseQuerySchema>;

// =============================================================================
// Prediction DTOs
// =============================================================================

export const FeatureVectorSchema = z.object({
  historicalBreakRate: z.number().min(0).max(1),
  volume: z.number().int().min(0),
  categoryVolatility: z.number().min(0),
  recentRunCount: z.number().int().min(0),
});

/**
 * Either a ready feature vector, or a pending reconciliation whose
 * features are built from run history.
 */
export const PredictionRequestSchema = z.union([
  z.object({ features: FeatureVectorSchema }),
  z.object({
    source1: SourceIdSchema,
    source2: SourceIdSchema,
    volume: z.number().int().min(0),
  }),
]);

export type PredictionRequestDto = z.infer<typeof PredictionRequestSchema>;

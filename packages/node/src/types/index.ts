/**
 * Type barrel — re-exports all public types from @tradebreak/node.
 */

// DTOs
export {
  CalendarDateSchema,
  SourceIdSchema,
  InstantSchema,
  PaginationQuerySchema,
  RunStatusSchema,
  IngestTradesSchema,
  RunRequestSchema,
  ListRunsQuerySchema,
  ListBreaksQuerySchema,
  ResolveBreakSchema,
  SweepSchema,
  AgingQuerySchema,
  RootCauseQuerySchema,
  FeatureVectorSchema,
  PredictionRequestSchema,
} from "./dto.js";
export type {
  IngestTradesDto,
  RunRequestDto,
  ListRunsQuery,
  ListBreaksQuery,
  ResolveBreakDto,
  SweepDto,
  RootCauseQuery,
  PredictionRequestDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  DecodedCursor,
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";

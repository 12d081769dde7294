/**
 * Type barrel — re-exports all public types from @trustnet/node.
 */

// DTOs
export {
  ParticipantIdSchema,
  AmountSchema,
  PaginationQuerySchema,
  CreateTrustLineSchema,
  UpdateQualitySchema,
  SetRipplingSchema,
  UpdateLimitsSchema,
  SettleSchema,
  ListTrustLinesQuerySchema,
  SendPaymentSchema,
  RipplePaymentSchema,
  FreezeSchema,
  AuditQuerySchema,
  toTrustLineDto,
} from "./dto.js";
export type {
  CreateTrustLineDto,
  UpdateQualityDto,
  SetRipplingDto,
  UpdateLimitsDto,
  SettleDto,
  ListTrustLinesQuery,
  SendPaymentDto,
  RipplePaymentDto,
  FreezeDto,
  AuditQuery,
  TrustLineDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export type {
  AuthMethod,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

/**
 * Type barrel — re-exports all public types from @cliffline/node.
 */

// DTOs
export {
  BaseUnitsSchema,
  CreateScheduleSchema,
  LifecycleSchema,
  FundReserveSchema,
  ClaimSchema,
  ClaimableQuerySchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  toScheduleResponse,
  toStatusChangeResponse,
  toClaimResponse,
  toFundingResponse,
} from "./dto.js";
export type {
  CreateScheduleDto,
  LifecycleDto,
  FundReserveDto,
  ClaimDto,
  ClaimableQuery,
  ListEventsQuery,
  ListStreamEventsQuery,
  ScheduleResponse,
  StatusChangeResponse,
  ClaimResponse,
  FundingResponse,
  ManagerResponse,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

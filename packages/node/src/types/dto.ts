/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts cross the wire as decimal strings of base units; every bigint
 * in a response is rendered the same way.
 */

import { z } from "zod";
import { parseBaseUnits } from "@cliffline/ledger";
import type { VestingSchedule } from "@cliffline/types";
import type {
  ClaimResult,
  FundingResult,
  ManagerInfo,
  ScheduleView,
  StatusChange,
} from "@cliffline/vesting";

// =============================================================================
// Shared Schemas
// =============================================================================

export const BaseUnitsSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer amount in base units")
  .transform((v) => parseBaseUnits(v));

const PageLimitSchema = z.coerce.number().int().min(1).max(100).default(20);

// =============================================================================
// Vesting DTOs
// =============================================================================

export const CreateScheduleSchema = z.object({
  beneficiary: z.string(),
  totalAmount: BaseUnitsSchema,
  startTime: z.number(),
  cliffDuration: z.number(),
  totalDuration: z.number(),
});

export type CreateScheduleDto = z.infer<typeof CreateScheduleSchema>;

export const LifecycleSchema = z.object({
  beneficiary: z.string(),
});

export type LifecycleDto = z.infer<typeof LifecycleSchema>;

export const FundReserveSchema = z.object({
  amount: BaseUnitsSchema,
});

export type FundReserveDto = z.infer<typeof FundReserveSchema>;

export const ClaimSchema = z.object({
  owner: z.string().optional(),
});

export type ClaimDto = z.infer<typeof ClaimSchema>;

export const ClaimableQuerySchema = z.object({
  at: z.coerce.number().int().min(0).optional(),
});

export type ClaimableQuery = z.infer<typeof ClaimableQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: PageLimitSchema,
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = z.object({
  fromVersion: z.coerce.number().int().min(1).optional(),
  limit: PageLimitSchema,
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface ScheduleResponse {
  readonly index: number;
  readonly owner: string;
  readonly beneficiary: string;
  readonly totalAmount: string;
  readonly claimedAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly totalDuration: number;
  readonly status: VestingSchedule["status"];
}

export function toScheduleResponse(view: ScheduleView): ScheduleResponse {
  const s = view.schedule;
  return {
    index: view.index,
    owner: s.owner,
    beneficiary: s.beneficiary,
    totalAmount: s.totalAmount.toString(),
    claimedAmount: s.claimedAmount.toString(),
    startTime: s.startTime,
    cliffDuration: s.cliffDuration,
    totalDuration: s.totalDuration,
    status: s.status,
  };
}

export interface StatusChangeResponse extends ScheduleResponse {
  readonly changed: boolean;
}

export function toStatusChangeResponse(change: StatusChange): StatusChangeResponse {
  return { ...toScheduleResponse(change), changed: change.changed };
}

export interface ClaimResponse {
  readonly owner: string;
  readonly beneficiary: string;
  readonly amount: string;
  readonly timestamp: number;
  readonly settlements: readonly { readonly index: number; readonly amount: string }[];
}

export function toClaimResponse(result: ClaimResult): ClaimResponse {
  return {
    owner: result.owner,
    beneficiary: result.beneficiary,
    amount: result.amount.toString(),
    timestamp: result.timestamp,
    settlements: result.settlements.map((s) => ({
      index: s.index,
      amount: s.amount.toString(),
    })),
  };
}

export interface FundingResponse {
  readonly owner: string;
  readonly from: string;
  readonly reserveAccount: string;
  readonly amount: string;
}

export function toFundingResponse(result: FundingResult): FundingResponse {
  return { ...result, amount: result.amount.toString() };
}

export interface ManagerResponse extends ManagerInfo {
  readonly reserveBalance: string;
}

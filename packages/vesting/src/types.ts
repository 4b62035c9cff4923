/**
 * Vesting Types
 *
 * Errors, collaborator interfaces and result shapes for the vesting core.
 * Schedules themselves live in @cliffline/types.
 */

import type {
  Address,
  DomainEvent,
  ScheduleRecord,
  VestingSchedule,
} from "@cliffline/types";
import type { TokenParcel } from "@cliffline/ledger";

// =============================================================================
// Errors
// =============================================================================

export type VestingErrorCode =
  | "MANAGER_NOT_FOUND"
  | "ALREADY_INITIALIZED"
  | "INVALID_VESTING_PARAMS"
  | "INVALID_BENEFICIARY"
  | "NOT_OWNER"
  | "SCHEDULE_NOT_FOUND"
  | "NO_CLAIMABLE_AMOUNT"
  | "INVALID_SNAPSHOT";

export class VestingError extends Error {
  public readonly code: VestingErrorCode;
  constructor(code: VestingErrorCode, message: string) {
    super(message);
    this.name = "VestingError";
    this.code = code;
  }
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Moves tokens between ledger accounts.
 * Implemented by TokenLedger.
 */
export interface AssetTransfer {
  /** Fails without side effects if `account` holds less than `amount`. */
  withdraw(account: string, amount: bigint): TokenParcel;

  /** Credits a withdrawn parcel. Each parcel is accepted once. */
  deposit(account: string, parcel: TokenParcel): void;
}

/**
 * Source of the current time in whole seconds since the epoch.
 * Successive calls never go backwards.
 */
export interface Clock {
  now(): number;
}

/**
 * Receives committed domain events.
 * Implemented by InMemoryEventStore.
 */
export interface EventSink {
  append(streamId: string, events: readonly DomainEvent[]): void;
}

export interface VestingDependencies {
  readonly assets: AssetTransfer;
  readonly clock: Clock;
  readonly events?: EventSink | undefined;
}

// =============================================================================
// Requests
// =============================================================================

export interface CreateScheduleRequest {
  /** Manager to add the schedule to. Defaults to the caller. */
  readonly owner?: Address | undefined;
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly totalDuration: number;
}

/**
 * Addresses one schedule for pause/resume.
 */
export interface ScheduleRef {
  /** Defaults to the caller. */
  readonly owner?: Address | undefined;
  readonly beneficiary: Address;
  readonly index: number;
}

// =============================================================================
// Results
// =============================================================================

export interface ManagerInfo {
  readonly owner: Address;
  readonly reserveAccount: string;
  readonly scheduleCount: number;
}

export interface ScheduleView {
  readonly index: number;
  readonly schedule: VestingSchedule;
}

export interface Settlement {
  readonly index: number;
  readonly amount: bigint;
}

export interface ClaimResult {
  readonly owner: Address;
  readonly beneficiary: Address;
  readonly amount: bigint;
  /** Seconds since the epoch at which vesting was evaluated */
  readonly timestamp: number;
  readonly settlements: readonly Settlement[];
}

export interface StatusChange extends ScheduleView {
  /** False when the schedule was already in the target state */
  readonly changed: boolean;
}

export interface FundingResult {
  readonly owner: Address;
  readonly from: Address;
  readonly reserveAccount: string;
  readonly amount: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface ManagerSnapshot {
  readonly owner: Address;
  readonly schedules: readonly ScheduleRecord[];
}

export interface VestingSnapshot {
  readonly version: 1;
  readonly managers: readonly ManagerSnapshot[];
  readonly createdAt: string;
}

/**
 * Vesting Types
 *
 * A vesting schedule is one grant of tokens from an owner to a
 * beneficiary, released along a cliff-then-linear curve.
 *
 * Rules:
 * - All fields except claimedAmount and status are fixed at creation
 * - claimedAmount never decreases and never exceeds totalAmount
 * - Amounts are bigint base units; times are whole seconds since the epoch
 */

import type { Address } from "./address.js";

/**
 * Lifecycle of a schedule.
 *
 * - active: tokens vest and can be claimed
 * - paused: frozen by the owner; nothing is claimable until resumed
 * - completed: the whole grant has been claimed (terminal)
 */
export type ScheduleStatus = "active" | "paused" | "completed";

/**
 * One vesting grant.
 */
export interface VestingSchedule {
  /** Address of the Manager that holds this schedule */
  readonly owner: Address;

  /** Address entitled to claim */
  readonly beneficiary: Address;

  /** Grant size in base units (> 0) */
  readonly totalAmount: bigint;

  /** Vesting start, seconds since the epoch */
  readonly startTime: number;

  /** Seconds after startTime before anything vests */
  readonly cliffDuration: number;

  /** Seconds after startTime at which the grant is fully vested */
  readonly totalDuration: number;

  /** Base units already released to the beneficiary */
  readonly claimedAmount: bigint;

  readonly status: ScheduleStatus;
}

/**
 * JSON-safe form of a schedule. Amounts are decimal strings.
 */
export interface ScheduleRecord {
  readonly owner: Address;
  readonly beneficiary: Address;
  readonly totalAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly totalDuration: number;
  readonly claimedAmount: string;
  readonly status: ScheduleStatus;
}

/**
 * Schedule records.
 *
 * Schedules are immutable values. Every change produces a new record, so a
 * staged copy of a Manager can be thrown away without undoing anything.
 */

import {
  isAddress,
  isNullAddress,
  isScheduleRecord,
  normalizeAddress,
} from "@cliffline/types";
import type {
  Address,
  ScheduleRecord,
  ScheduleStatus,
  VestingSchedule,
} from "@cliffline/types";
import { VestingError } from "./types.js";

export interface ScheduleTerms {
  readonly beneficiary: Address;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly totalDuration: number;
}

/**
 * A fresh, active schedule with nothing claimed.
 */
export function newSchedule(owner: Address, terms: ScheduleTerms): VestingSchedule {
  return {
    owner: normalizeAddress(owner),
    beneficiary: normalizeAddress(terms.beneficiary),
    totalAmount: terms.totalAmount,
    startTime: terms.startTime,
    cliffDuration: terms.cliffDuration,
    totalDuration: terms.totalDuration,
    claimedAmount: 0n,
    status: "active",
  };
}

export function isActive(schedule: VestingSchedule): boolean {
  return schedule.status === "active";
}

/**
 * Tokens not yet released to the beneficiary.
 */
export function remainingAmount(schedule: VestingSchedule): bigint {
  return schedule.totalAmount - schedule.claimedAmount;
}

/**
 * Record a release of `amount`. A schedule whose whole grant has been
 * claimed becomes completed.
 */
export function withClaim(schedule: VestingSchedule, amount: bigint): VestingSchedule {
  if (amount <= 0n || amount > remainingAmount(schedule)) {
    throw new VestingError(
      "INVALID_VESTING_PARAMS",
      `Cannot release ${amount} from a schedule with ${remainingAmount(schedule)} remaining`,
    );
  }
  const claimedAmount = schedule.claimedAmount + amount;
  return {
    ...schedule,
    claimedAmount,
    status: claimedAmount === schedule.totalAmount ? "completed" : schedule.status,
  };
}

export function withStatus(schedule: VestingSchedule, status: ScheduleStatus): VestingSchedule {
  return status === schedule.status ? schedule : { ...schedule, status };
}

// =============================================================================
// Invariants
// =============================================================================

/**
 * Describe the first broken invariant, or undefined when the schedule is
 * well-formed.
 */
export function scheduleViolation(schedule: VestingSchedule): string | undefined {
  if (schedule.totalAmount <= 0n) {
    return `totalAmount must be positive, got ${schedule.totalAmount}`;
  }
  if (schedule.cliffDuration > schedule.totalDuration) {
    return `cliffDuration ${schedule.cliffDuration} exceeds totalDuration ${schedule.totalDuration}`;
  }
  if (schedule.claimedAmount < 0n || schedule.claimedAmount > schedule.totalAmount) {
    return `claimedAmount ${schedule.claimedAmount} is outside 0..${schedule.totalAmount}`;
  }
  if (!isAddress(schedule.beneficiary) || isNullAddress(schedule.beneficiary)) {
    return `beneficiary "${schedule.beneficiary}" is not a valid address`;
  }
  const fullyClaimed = schedule.claimedAmount === schedule.totalAmount;
  if (fullyClaimed !== (schedule.status === "completed")) {
    return `status "${schedule.status}" does not match claimedAmount ${schedule.claimedAmount} of ${schedule.totalAmount}`;
  }
  return undefined;
}

// =============================================================================
// Serialization
// =============================================================================

export function toRecord(schedule: VestingSchedule): ScheduleRecord {
  return {
    ...schedule,
    totalAmount: schedule.totalAmount.toString(),
    claimedAmount: schedule.claimedAmount.toString(),
  };
}

/**
 * Parse and check a stored schedule.
 * Throws INVALID_SNAPSHOT if the record is malformed or inconsistent.
 */
export function fromRecord(record: unknown): VestingSchedule {
  if (!isScheduleRecord(record)) {
    throw new VestingError("INVALID_SNAPSHOT", "Malformed schedule record");
  }

  const schedule: VestingSchedule = {
    ...record,
    owner: normalizeAddress(record.owner),
    beneficiary: normalizeAddress(record.beneficiary),
    totalAmount: BigInt(record.totalAmount),
    claimedAmount: BigInt(record.claimedAmount),
  };

  const violation = scheduleViolation(schedule);
  if (violation !== undefined) {
    throw new VestingError("INVALID_SNAPSHOT", `Invalid schedule record: ${violation}`);
  }
  return schedule;
}

/**
 * Lifecycle / Authorization Guard
 *
 * Precondition checks shared by the vesting operations. Each check throws a
 * VestingError and runs before anything is staged, so a failed operation
 * never leaves a partial change behind.
 */

import { isAddress, isNullAddress, normalizeAddress, sameAddress } from "@cliffline/types";
import type { Address, ScheduleStatus, VestingSchedule } from "@cliffline/types";
import type { VestingManager } from "./manager.js";
import type { CreateScheduleRequest } from "./types.js";
import { VestingError } from "./types.js";

// =============================================================================
// Managers and ownership
// =============================================================================

export function requireManager(
  managers: ReadonlyMap<Address, VestingManager>,
  owner: Address,
): VestingManager {
  const manager = managers.get(owner);
  if (manager === undefined) {
    throw new VestingError("MANAGER_NOT_FOUND", `No vesting manager for ${owner}`);
  }
  return manager;
}

export function requireNoManager(
  managers: ReadonlyMap<Address, VestingManager>,
  owner: Address,
): void {
  if (managers.has(owner)) {
    throw new VestingError("ALREADY_INITIALIZED", `Vesting manager for ${owner} already exists`);
  }
}

export function requireOwner(manager: VestingManager, caller: Address): void {
  if (!sameAddress(manager.owner, caller)) {
    throw new VestingError(
      "NOT_OWNER",
      `${caller} is not the owner of the vesting manager for ${manager.owner}`,
    );
  }
}

// =============================================================================
// Schedule parameters
// =============================================================================

function assertSeconds(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new VestingError(
      "INVALID_VESTING_PARAMS",
      `${field} must be a non-negative integer number of seconds, got ${String(value)}`,
    );
  }
}

/**
 * Time fields, then cliff ≤ duration, then a positive amount.
 */
export function validateTerms(request: CreateScheduleRequest): void {
  assertSeconds(request.startTime, "startTime");
  assertSeconds(request.cliffDuration, "cliffDuration");
  assertSeconds(request.totalDuration, "totalDuration");
  if (!Number.isSafeInteger(request.startTime + request.totalDuration)) {
    throw new VestingError("INVALID_VESTING_PARAMS", "Vesting ends beyond the representable time range");
  }

  if (request.cliffDuration > request.totalDuration) {
    throw new VestingError(
      "INVALID_VESTING_PARAMS",
      `Cliff duration ${request.cliffDuration} exceeds total duration ${request.totalDuration}`,
    );
  }

  validatePositiveAmount(request.totalAmount, "Total amount");
}

export function validatePositiveAmount(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new VestingError("INVALID_VESTING_PARAMS", `${label} must be positive, got ${amount}`);
  }
}

/**
 * Returns the normalized beneficiary.
 */
export function validateBeneficiary(beneficiary: unknown): Address {
  if (!isAddress(beneficiary) || isNullAddress(beneficiary)) {
    throw new VestingError(
      "INVALID_BENEFICIARY",
      `Beneficiary must be a non-null address, got "${String(beneficiary)}"`,
    );
  }
  return normalizeAddress(beneficiary);
}

// =============================================================================
// Schedule lookup
// =============================================================================

export function requireSchedule(manager: VestingManager, index: number): VestingSchedule {
  const schedule = Number.isInteger(index) ? manager.at(index) : undefined;
  if (schedule === undefined) {
    throw new VestingError(
      "SCHEDULE_NOT_FOUND",
      `Manager ${manager.owner} has no schedule at index ${String(index)} (size ${manager.size})`,
    );
  }
  return schedule;
}

export function requireBeneficiary(
  schedule: VestingSchedule,
  beneficiary: Address,
  index: number,
): void {
  if (schedule.beneficiary !== normalizeAddress(beneficiary)) {
    throw new VestingError(
      "INVALID_BENEFICIARY",
      `Schedule ${index} is not granted to ${beneficiary}`,
    );
  }
}

// =============================================================================
// Status transitions
// =============================================================================

export type LifecycleAction = "pause" | "resume";

/**
 * Target status per action. Completed is terminal; a request that would
 * leave the status unchanged is a no-op, not an error.
 */
const TRANSITIONS: Record<LifecycleAction, Record<ScheduleStatus, ScheduleStatus>> = {
  pause: { active: "paused", paused: "paused", completed: "completed" },
  resume: { active: "active", paused: "active", completed: "completed" },
};

export function nextStatus(current: ScheduleStatus, action: LifecycleAction): ScheduleStatus {
  return TRANSITIONS[action][current];
}

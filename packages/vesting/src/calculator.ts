/**
 * Vesting Calculator — cliff, then linear release.
 *
 * Pure functions of a schedule and a timestamp. Amounts are bigint and the
 * multiplication happens before the division, so nothing is lost to
 * intermediate rounding.
 */

import type { VestingSchedule } from "@cliffline/types";

/** First second at which anything can vest. */
export function cliffEnd(schedule: VestingSchedule): number {
  return schedule.startTime + schedule.cliffDuration;
}

/** First second at which the whole grant has vested. */
export function vestingEnd(schedule: VestingSchedule): number {
  return schedule.startTime + schedule.totalDuration;
}

/**
 * Cumulative amount released by the curve at `now`, ignoring status and
 * prior claims.
 */
export function releasedAmount(schedule: VestingSchedule, now: number): bigint {
  if (now < cliffEnd(schedule)) {
    return 0n;
  }
  const elapsed = now - schedule.startTime;
  if (elapsed >= schedule.totalDuration) {
    return schedule.totalAmount;
  }
  return (BigInt(elapsed) * schedule.totalAmount) / BigInt(schedule.totalDuration);
}

/**
 * Amount the beneficiary could claim from this schedule at `now`.
 *
 * Zero for paused and completed schedules and before the cliff. Never
 * negative, never more than what is left unclaimed.
 */
export function vestedAmount(schedule: VestingSchedule, now: number): bigint {
  if (schedule.status !== "active") {
    return 0n;
  }
  if (now < cliffEnd(schedule)) {
    return 0n;
  }

  const elapsed = now - schedule.startTime;
  if (elapsed >= schedule.totalDuration) {
    return schedule.totalAmount - schedule.claimedAmount;
  }

  const claimable = releasedAmount(schedule, now) - schedule.claimedAmount;
  return claimable > 0n ? claimable : 0n;
}

/**
 * Vesting Manager — the schedules granted by one owner.
 *
 * Rules:
 * - Schedules are append-only; an index, once assigned, names the same
 *   schedule forever
 * - A schedule's beneficiary never changes
 * - Lookups by beneficiary go through an index instead of a full scan
 */

import { normalizeAddress } from "@cliffline/types";
import type { Address, VestingSchedule } from "@cliffline/types";
import type { ScheduleView } from "./types.js";
import { VestingError } from "./types.js";

export class VestingManager {
  readonly owner: Address;
  private readonly _schedules: VestingSchedule[] = [];
  private readonly _byBeneficiary: Map<Address, number[]> = new Map();

  constructor(owner: Address, schedules: readonly VestingSchedule[] = []) {
    this.owner = normalizeAddress(owner);
    for (const schedule of schedules) {
      this.append(schedule);
    }
  }

  get size(): number {
    return this._schedules.length;
  }

  /**
   * Add a schedule and return its index.
   */
  append(schedule: VestingSchedule): number {
    const index = this._schedules.length;
    this._schedules.push(schedule);

    const key = normalizeAddress(schedule.beneficiary);
    const indices = this._byBeneficiary.get(key);
    if (indices === undefined) {
      this._byBeneficiary.set(key, [index]);
    } else {
      indices.push(index);
    }
    return index;
  }

  at(index: number): VestingSchedule | undefined {
    return this._schedules[index];
  }

  /**
   * Swap in a new version of an existing schedule.
   * The beneficiary must be unchanged so the index stays valid.
   */
  replace(index: number, schedule: VestingSchedule): void {
    const current = this._schedules[index];
    if (current === undefined) {
      throw new VestingError(
        "SCHEDULE_NOT_FOUND",
        `Manager ${this.owner} has no schedule at index ${index}`,
      );
    }
    if (normalizeAddress(current.beneficiary) !== normalizeAddress(schedule.beneficiary)) {
      throw new VestingError(
        "INVALID_BENEFICIARY",
        `Schedule ${index} belongs to ${current.beneficiary}, not ${schedule.beneficiary}`,
      );
    }
    this._schedules[index] = schedule;
  }

  /**
   * Indices of every schedule granted to `beneficiary`, ascending.
   */
  indicesFor(beneficiary: Address): readonly number[] {
    return [...(this._byBeneficiary.get(normalizeAddress(beneficiary)) ?? [])];
  }

  schedulesFor(beneficiary: Address): readonly ScheduleView[] {
    const views: ScheduleView[] = [];
    for (const index of this._byBeneficiary.get(normalizeAddress(beneficiary)) ?? []) {
      const schedule = this._schedules[index];
      if (schedule !== undefined) {
        views.push({ index, schedule });
      }
    }
    return views;
  }

  schedules(): readonly VestingSchedule[] {
    return [...this._schedules];
  }

  /**
   * Independent copy. Schedules are immutable values, so sharing them
   * between the copies is safe.
   */
  clone(): VestingManager {
    return new VestingManager(this.owner, this._schedules);
  }
}

/**
 * VestingLedger — the top-level vesting facade.
 *
 * Holds one Manager per owner and runs every operation as a single
 * transaction:
 * - initialize() — Create the caller's Manager
 * - createSchedule() — Grant tokens to a beneficiary
 * - claim() — Release everything vested to the caller
 * - pause() / resume() — Owner-controlled lifecycle
 * - fundReserve() — Move tokens into the account claims are paid from
 * - listSchedules() / claimableAmount() — Read-only queries
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Callers are addresses the outer layer has already authenticated.
 */

import { VESTING_EVENTS } from "@cliffline/event-store";
import { normalizeAddress } from "@cliffline/types";
import type { Address, VestingSchedule } from "@cliffline/types";
import { vestedAmount } from "./calculator.js";
import {
  nextStatus,
  requireBeneficiary,
  requireManager,
  requireNoManager,
  requireOwner,
  requireSchedule,
  validateBeneficiary,
  validatePositiveAmount,
  validateTerms,
} from "./guard.js";
import type { LifecycleAction } from "./guard.js";
import { VestingManager } from "./manager.js";
import { fromRecord, newSchedule, toRecord, withStatus } from "./schedule.js";
import { payoutEffect, settleSchedules } from "./settlement.js";
import { ManagerTransaction } from "./transaction.js";
import type {
  AssetTransfer,
  ClaimResult,
  Clock,
  CreateScheduleRequest,
  EventSink,
  FundingResult,
  ManagerInfo,
  ScheduleRef,
  ScheduleView,
  StatusChange,
  VestingDependencies,
  VestingSnapshot,
} from "./types.js";
import { VestingError } from "./types.js";

/**
 * Ledger account that a Manager's claims are paid from.
 */
export function reserveAccount(owner: Address): string {
  return `reserve:${normalizeAddress(owner)}`;
}

export class VestingLedger {
  private readonly _managers: Map<Address, VestingManager> = new Map();
  private readonly _assets: AssetTransfer;
  private readonly _clock: Clock;
  private readonly _events: EventSink | undefined;

  constructor(deps: VestingDependencies) {
    this._assets = deps.assets;
    this._clock = deps.clock;
    this._events = deps.events;
  }

  // ─── Managers ────────────────────────────────────────────────────────

  initialize(caller: Address): ManagerInfo {
    const owner = normalizeAddress(caller);
    requireNoManager(this._managers, owner);

    const tx = this._begin(owner, owner, this._clock.now());
    tx.emit(VESTING_EVENTS.MANAGER_INITIALIZED, { owner });
    tx.commit();

    return { owner, reserveAccount: reserveAccount(owner), scheduleCount: 0 };
  }

  hasManager(owner: Address): boolean {
    return this._managers.has(normalizeAddress(owner));
  }

  owners(): readonly Address[] {
    return [...this._managers.keys()];
  }

  reserveAccount(owner: Address): string {
    return reserveAccount(owner);
  }

  // ─── Schedules ───────────────────────────────────────────────────────

  /**
   * Grant a new schedule. Checks, in order: the Manager exists, the terms
   * are valid, the beneficiary is valid, the caller owns the Manager.
   */
  createSchedule(caller: Address, request: CreateScheduleRequest): ScheduleView {
    const owner = normalizeAddress(request.owner ?? caller);
    const manager = requireManager(this._managers, owner);
    validateTerms(request);
    const beneficiary = validateBeneficiary(request.beneficiary);
    requireOwner(manager, caller);

    const schedule = newSchedule(owner, { ...request, beneficiary });
    const tx = this._begin(owner, normalizeAddress(caller), this._clock.now(), manager);
    const index = tx.manager.append(schedule);
    tx.emit(VESTING_EVENTS.SCHEDULE_CREATED, {
      owner,
      beneficiary,
      index,
      amount: schedule.totalAmount.toString(),
      startTime: schedule.startTime,
      cliffDuration: schedule.cliffDuration,
      totalDuration: schedule.totalDuration,
    });
    tx.commit();

    return { index, schedule };
  }

  listSchedules(owner: Address): readonly ScheduleView[] {
    const manager = requireManager(this._managers, normalizeAddress(owner));
    return manager.schedules().map((schedule, index) => ({ index, schedule }));
  }

  getSchedule(owner: Address, index: number): VestingSchedule {
    const manager = requireManager(this._managers, normalizeAddress(owner));
    return requireSchedule(manager, index);
  }

  // ─── Claims ──────────────────────────────────────────────────────────

  /**
   * Release everything vested to `caller` on `owner`'s Manager.
   *
   * Fails with NO_CLAIMABLE_AMOUNT when nothing is due. If paying out of
   * the reserve or recording the claim fails, no schedule changes and no
   * tokens move.
   */
  claim(caller: Address, owner: Address = caller): ClaimResult {
    const now = this._clock.now();
    const beneficiary = normalizeAddress(caller);
    const managerOwner = normalizeAddress(owner);
    const manager = requireManager(this._managers, managerOwner);

    const tx = this._begin(managerOwner, beneficiary, now, manager);
    const { settlements, total } = settleSchedules(tx.manager, beneficiary, now);
    if (total === 0n) {
      throw new VestingError(
        "NO_CLAIMABLE_AMOUNT",
        `Nothing is claimable for ${beneficiary} from ${managerOwner} at ${now}`,
      );
    }

    tx.emit(VESTING_EVENTS.CLAIMED, {
      owner: managerOwner,
      beneficiary,
      amount: total.toString(),
      timestamp: now,
      settlements: settlements.map((s) => ({ index: s.index, amount: s.amount.toString() })),
    });
    tx.commit(payoutEffect(this._assets, reserveAccount(managerOwner), beneficiary, total));

    return { owner: managerOwner, beneficiary, amount: total, timestamp: now, settlements };
  }

  claimableAmount(beneficiary: Address, owner: Address): bigint {
    return this.claimableAmountAt(beneficiary, owner, this._clock.now());
  }

  /**
   * Claimable total at an explicit timestamp (seconds since the epoch).
   */
  claimableAmountAt(beneficiary: Address, owner: Address, timestamp: number): bigint {
    const manager = requireManager(this._managers, normalizeAddress(owner));
    if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
      throw new VestingError(
        "INVALID_VESTING_PARAMS",
        `timestamp must be a non-negative integer number of seconds, got ${String(timestamp)}`,
      );
    }

    let total = 0n;
    for (const { schedule } of manager.schedulesFor(beneficiary)) {
      total += vestedAmount(schedule, timestamp);
    }
    return total;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  pause(caller: Address, ref: ScheduleRef): StatusChange {
    return this._transition(caller, ref, "pause");
  }

  resume(caller: Address, ref: ScheduleRef): StatusChange {
    return this._transition(caller, ref, "resume");
  }

  // ─── Reserve ─────────────────────────────────────────────────────────

  /**
   * Move `amount` from the caller's account into the Manager's reserve.
   */
  fundReserve(caller: Address, amount: bigint, owner: Address = caller): FundingResult {
    const from = normalizeAddress(caller);
    const managerOwner = normalizeAddress(owner);
    const manager = requireManager(this._managers, managerOwner);
    requireOwner(manager, from);
    validatePositiveAmount(amount, "Reserve funding");

    const account = reserveAccount(managerOwner);
    const tx = this._begin(managerOwner, from, this._clock.now(), manager);
    tx.emit(VESTING_EVENTS.RESERVE_FUNDED, {
      owner: managerOwner,
      from,
      amount: amount.toString(),
    });
    tx.commit(payoutEffect(this._assets, from, account, amount));

    return { owner: managerOwner, from, reserveAccount: account, amount };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): VestingSnapshot {
    return {
      version: 1,
      managers: [...this._managers.values()].map((m) => ({
        owner: m.owner,
        schedules: m.schedules().map(toRecord),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore Managers from a snapshot, rebuilding their beneficiary indexes.
   */
  static fromSnapshot(snapshot: VestingSnapshot, deps: VestingDependencies): VestingLedger {
    if (snapshot.version !== 1) {
      throw new VestingError(
        "INVALID_SNAPSHOT",
        `Unsupported vesting snapshot version ${String(snapshot.version)}`,
      );
    }

    const ledger = new VestingLedger(deps);
    for (const entry of snapshot.managers) {
      const owner = normalizeAddress(entry.owner);
      if (ledger._managers.has(owner)) {
        throw new VestingError("INVALID_SNAPSHOT", `Duplicate manager ${owner} in snapshot`);
      }

      const schedules = entry.schedules.map((record, index) => {
        const schedule = fromRecord(record);
        if (schedule.owner !== owner) {
          throw new VestingError(
            "INVALID_SNAPSHOT",
            `Schedule ${index} of manager ${owner} names owner ${schedule.owner}`,
          );
        }
        return schedule;
      });
      ledger._managers.set(owner, new VestingManager(owner, schedules));
    }
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _begin(
    owner: Address,
    actor: Address,
    now: number,
    base?: VestingManager,
  ): ManagerTransaction {
    return new ManagerTransaction(this._managers, this._events, { owner, actor, now, base });
  }

  private _transition(
    caller: Address,
    ref: ScheduleRef,
    action: LifecycleAction,
  ): StatusChange {
    const owner = normalizeAddress(ref.owner ?? caller);
    const manager = requireManager(this._managers, owner);
    requireOwner(manager, caller);
    const schedule = requireSchedule(manager, ref.index);
    requireBeneficiary(schedule, ref.beneficiary, ref.index);

    const target = nextStatus(schedule.status, action);
    if (target === schedule.status) {
      return { index: ref.index, schedule, changed: false };
    }

    const updated = withStatus(schedule, target);
    const tx = this._begin(owner, normalizeAddress(caller), this._clock.now(), manager);
    tx.manager.replace(ref.index, updated);
    tx.emit(
      action === "pause" ? VESTING_EVENTS.SCHEDULE_PAUSED : VESTING_EVENTS.SCHEDULE_RESUMED,
      { owner, beneficiary: updated.beneficiary, index: ref.index },
    );
    tx.commit();

    return { index: ref.index, schedule: updated, changed: true };
  }
}

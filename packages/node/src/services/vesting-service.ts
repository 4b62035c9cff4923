/**
 * VestingService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One token ledger, one event store and one vesting
 * ledger live for the lifetime of the process.
 */

import { TokenLedger } from "@cliffline/ledger";
import { InMemoryEventStore } from "@cliffline/event-store";
import type {
  StoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventStoreIntegrityResult,
} from "@cliffline/event-store";
import { normalizeAddress } from "@cliffline/types";
import type { Address, VestingSchedule } from "@cliffline/types";
import { SystemClock, VestingLedger } from "@cliffline/vesting";
import type {
  ClaimResult,
  Clock,
  CreateScheduleRequest,
  FundingResult,
  ManagerInfo,
  ScheduleRef,
  ScheduleView,
  StatusChange,
} from "@cliffline/vesting";

// =============================================================================
// Configuration
// =============================================================================

export interface GenesisAllocation {
  readonly address: Address;
  readonly amount: bigint;
}

export interface VestingServiceConfig {
  readonly symbol: string;
  readonly decimals: number;
  /** Defaults to the system clock */
  readonly clock?: Clock | undefined;
  /** Balances minted when the service starts */
  readonly allocations?: readonly GenesisAllocation[] | undefined;
}

export interface AccountView {
  readonly address: Address;
  readonly balance: bigint;
  readonly symbol: string;
  readonly decimals: number;
}

// =============================================================================
// Service
// =============================================================================

export class VestingService {
  readonly tokens: TokenLedger;
  readonly eventStore: InMemoryEventStore;
  readonly vesting: VestingLedger;
  readonly clock: Clock;

  private _ready = false;

  constructor(config: VestingServiceConfig) {
    this.clock = config.clock ?? new SystemClock();
    this.tokens = new TokenLedger(config.symbol, config.decimals);
    this.eventStore = new InMemoryEventStore();
    this.vesting = new VestingLedger({
      assets: this.tokens,
      clock: this.clock,
      events: this.eventStore,
    });

    for (const { address, amount } of config.allocations ?? []) {
      this.tokens.mint(normalizeAddress(address), amount);
    }

    this._ready = true;
  }

  // ─── Managers ──────────────────────────────────────────────────────

  initialize(caller: Address): ManagerInfo {
    return this.vesting.initialize(caller);
  }

  getManager(owner: Address): ManagerInfo {
    const scheduleCount = this.vesting.listSchedules(owner).length;
    const normalized = normalizeAddress(owner);
    return {
      owner: normalized,
      reserveAccount: this.vesting.reserveAccount(normalized),
      scheduleCount,
    };
  }

  fundReserve(caller: Address, owner: Address, amount: bigint): FundingResult {
    return this.vesting.fundReserve(caller, amount, owner);
  }

  // ─── Schedules ─────────────────────────────────────────────────────

  createSchedule(caller: Address, request: CreateScheduleRequest): ScheduleView {
    return this.vesting.createSchedule(caller, request);
  }

  listSchedules(owner: Address): readonly ScheduleView[] {
    return this.vesting.listSchedules(owner);
  }

  getSchedule(owner: Address, index: number): VestingSchedule {
    return this.vesting.getSchedule(owner, index);
  }

  pause(caller: Address, ref: ScheduleRef): StatusChange {
    return this.vesting.pause(caller, ref);
  }

  resume(caller: Address, ref: ScheduleRef): StatusChange {
    return this.vesting.resume(caller, ref);
  }

  // ─── Claims ────────────────────────────────────────────────────────

  claim(caller: Address, owner?: Address): ClaimResult {
    return this.vesting.claim(caller, owner ?? caller);
  }

  claimableAmount(beneficiary: Address, owner: Address, at?: number): bigint {
    return at === undefined
      ? this.vesting.claimableAmount(beneficiary, owner)
      : this.vesting.claimableAmountAt(beneficiary, owner, at);
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  account(address: Address): AccountView {
    const normalized = normalizeAddress(address);
    return {
      address: normalized,
      balance: this.tokens.balanceOf(normalized),
      symbol: this.tokens.symbol,
      decimals: this.tokens.decimals,
    };
  }

  reserveBalance(owner: Address): bigint {
    return this.tokens.balanceOf(this.vesting.reserveAccount(owner));
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(
    streamId: string,
    options?: ReadOptions,
  ): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health ────────────────────────────────────────────────────────

  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}

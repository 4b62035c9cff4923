/**
 * Manager transactions.
 *
 * An operation stages a copy of the Manager it touches, buffers the events
 * it wants to emit and names at most one token movement. `commit()` moves
 * the tokens, appends the events, and only then swaps the staged copy in.
 * If the append fails the movement is reversed, so an operation either
 * lands whole or leaves no trace.
 */

import { randomUUID } from "node:crypto";
import { validateVestingPayload, vestingStreamId } from "@cliffline/event-store";
import type { VestingEventType } from "@cliffline/event-store";
import type { Address, DomainEvent } from "@cliffline/types";
import { MAX_CLOCK_SECONDS } from "./clock.js";
import { VestingManager } from "./manager.js";
import type { EventSink } from "./types.js";
import { VestingError } from "./types.js";

export interface TransactionOptions {
  readonly owner: Address;
  readonly actor: Address;
  /** Seconds since the epoch, sampled once for the whole operation */
  readonly now: number;
  /** Manager to stage a copy of; omitted when the operation creates it */
  readonly base?: VestingManager | undefined;
}

/**
 * A change outside the Manager registry, applied during commit.
 * `revert` must undo exactly what `apply` did.
 */
export interface Effect {
  apply(): void;
  revert(): void;
}

export class ManagerTransaction {
  readonly owner: Address;
  readonly actor: Address;
  readonly now: number;
  readonly correlationId: string = randomUUID();

  /** The staged copy. Mutate this, never the live Manager. */
  readonly manager: VestingManager;

  private readonly _registry: Map<Address, VestingManager>;
  private readonly _sink: EventSink | undefined;
  private readonly _timestamp: string;
  private readonly _events: DomainEvent[] = [];
  private _committed = false;

  constructor(
    registry: Map<Address, VestingManager>,
    sink: EventSink | undefined,
    options: TransactionOptions,
  ) {
    if (!Number.isSafeInteger(options.now) || options.now < 0 || options.now > MAX_CLOCK_SECONDS) {
      throw new VestingError(
        "INVALID_VESTING_PARAMS",
        `Clock time ${String(options.now)} is outside the representable time range`,
      );
    }
    this._registry = registry;
    this._sink = sink;
    this.owner = options.owner;
    this.actor = options.actor;
    this.now = options.now;
    this._timestamp = new Date(options.now * 1000).toISOString();
    this.manager = options.base !== undefined
      ? options.base.clone()
      : new VestingManager(options.owner);
  }

  /**
   * Buffer an event. Nothing is emitted until commit.
   */
  emit(type: VestingEventType, payload: Readonly<Record<string, unknown>>): void {
    if (!validateVestingPayload(type, payload)) {
      throw new Error(`Malformed ${type} payload`);
    }
    this._events.push({
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this._timestamp,
        actor: this.actor,
        correlationId: this.correlationId,
        source: "vesting",
      },
      payload,
    });
  }

  /**
   * Apply `effect`, append the buffered events, then publish the staged
   * Manager. Returns the events that were appended.
   */
  commit(effect?: Effect): readonly DomainEvent[] {
    if (this._committed) {
      throw new Error(`Transaction ${this.correlationId} was already committed`);
    }

    effect?.apply();
    if (this._sink !== undefined && this._events.length > 0) {
      try {
        this._sink.append(vestingStreamId(this.owner), this._events);
      } catch (error) {
        effect?.revert();
        throw error;
      }
    }

    this._committed = true;
    this._registry.set(this.owner, this.manager);
    return [...this._events];
  }
}

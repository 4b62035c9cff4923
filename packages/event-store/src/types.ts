/**
 * @cliffline/event-store — Core types.
 *
 * Each Manager writes to its own stream; every stream also lands in one
 * global log that is hash-chained end to end. Nothing is ever updated or
 * removed.
 */

import type { DomainEvent } from "@cliffline/types";

/**
 * A DomainEvent with its place in the log.
 */
export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;
  /** 1-based, contiguous within the stream */
  readonly version: number;
  /** 1-based, contiguous across all streams */
  readonly globalPosition: number;
  /** Wall-clock time the store accepted the event */
  readonly appendedAt: string;
  /** SHA-256 over the canonical content and `previousHash` */
  readonly hash: string;
  /** Hash of the preceding event in the global log, or GENESIS_HASH */
  readonly previousHash: string;
}

export type StoredEventContent = Omit<StoredEvent, "hash" | "previousHash">;

export interface ReadOptions {
  /** First version to return. Default: 1 */
  readonly fromVersion?: number | undefined;
  readonly maxCount?: number | undefined;
}

export interface ReadAllOptions {
  /** First global position to return. Default: 1 */
  readonly fromPosition?: number | undefined;
  readonly maxCount?: number | undefined;
}

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

export interface EventStore {
  /**
   * Append to a stream. Either every event is stored or none is.
   *
   * @throws EventStoreError on an empty batch or an event that is not a
   *   well-formed vesting event
   */
  append(streamId: string, events: readonly DomainEvent[]): readonly StoredEvent[];

  /** Events of one stream in version order; empty for an unknown stream. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  streamExists(streamId: string): boolean;

  /** Position of the last stored event, 0 when empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_EVENT"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}

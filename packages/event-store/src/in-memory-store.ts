/**
 * In-memory event store.
 *
 * Keeps the global log as one array and indexes it per stream. Appends
 * are checked against the vesting event catalog before anything is
 * written. State lives only as long as the process.
 */

import { isDomainEvent } from "@cliffline/types";
import type { DomainEvent } from "@cliffline/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { validateVestingPayload } from "./vesting-events.js";

function take(events: readonly StoredEvent[], maxCount: number | undefined): readonly StoredEvent[] {
  return maxCount === undefined ? events : events.slice(0, Math.max(maxCount, 0));
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: StoredEvent[] = [];
  private readonly _streams = new Map<string, StoredEvent[]>();
  private _head: string = GENESIS_HASH;

  append(streamId: string, events: readonly DomainEvent[]): readonly StoredEvent[] {
    requireStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    events.forEach((event, i) => {
      if (!isDomainEvent(event) || !validateVestingPayload(event.type, event.payload)) {
        throw new EventStoreError(
          "INVALID_EVENT",
          `Event ${i} of the batch for "${streamId}" is not a well-formed vesting event`,
          streamId,
        );
      }
    });

    const stream = this._streams.get(streamId) ?? [];
    const appendedAt = new Date().toISOString();
    let head = this._head;
    const stored = events.map((event, i): StoredEvent => {
      const content = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: stream.length + i + 1,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const previousHash = head;
      head = computeEventHash(content, previousHash);
      return { ...content, hash: head, previousHash };
    });

    stream.push(...stored);
    this._streams.set(streamId, stream);
    this._log.push(...stored);
    this._head = head;
    return stored;
  }

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    requireStreamId(streamId);
    const fromVersion = options?.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be a positive integer, got ${fromVersion}`,
        streamId,
      );
    }
    const stream = this._streams.get(streamId) ?? [];
    return take(stream.slice(fromVersion - 1), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = Math.max(options?.fromPosition ?? 1, 1);
    return take(this._log.slice(fromPosition - 1), options?.maxCount);
  }

  streamExists(streamId: string): boolean {
    return this._streams.has(streamId);
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }
}

function requireStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

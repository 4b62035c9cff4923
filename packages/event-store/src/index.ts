/**
 * @cliffline/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, validating each append against the vesting catalog
 * - SHA-256 hash chain over canonicalized events
 * - Vesting domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  StoredEventContent,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Vesting domain events
export {
  VESTING_EVENTS,
  isVestingEventType,
  validateVestingPayload,
  vestingStreamId,
} from "./vesting-events.js";
export type {
  VestingEventType,
  ManagerInitializedPayload,
  ScheduleCreatedPayload,
  ClaimSettlement,
  VestingClaimedPayload,
  SchedulePausedPayload,
  ScheduleResumedPayload,
  ReserveFundedPayload,
} from "./vesting-events.js";

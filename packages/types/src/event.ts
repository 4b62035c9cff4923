/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change in Cliffline is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address (or subsystem) that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string | undefined;

  /** ID for grouping events written by one operation */
  readonly correlationId: string;

  /** Which Cliffline subsystem emitted this event */
  readonly source: "vesting" | "ledger" | "node";
}

/**
 * A domain event in the Cliffline system.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vesting.schedule.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}

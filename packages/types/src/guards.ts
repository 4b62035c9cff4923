/**
 * Runtime Type Guards
 *
 * Narrowing functions for Cliffline domain types.
 * Used at system boundaries (API inputs, snapshots, stored events).
 */

import { isAddress } from "./address.js";
import type { ScheduleRecord, ScheduleStatus } from "./vesting.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Vesting guards
// =============================================================================

const SCHEDULE_STATUSES = new Set<string>(["active", "paused", "completed"]);

export function isScheduleStatus(value: unknown): value is ScheduleStatus {
  return typeof value === "string" && SCHEDULE_STATUSES.has(value);
}

function isSeconds(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isUnsignedString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isScheduleRecord(value: unknown): value is ScheduleRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddress(v.owner) &&
    isAddress(v.beneficiary) &&
    isUnsignedString(v.totalAmount) &&
    isSeconds(v.startTime) &&
    isSeconds(v.cliffDuration) &&
    isSeconds(v.totalDuration) &&
    isUnsignedString(v.claimedAmount) &&
    isScheduleStatus(v.status)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vesting", "ledger", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

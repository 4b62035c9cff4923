/**
 * @cliffline/types — Shared domain types for the Cliffline stack.
 *
 * These types are used across all Cliffline packages:
 * - Account addresses
 * - Vesting schedules
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Address types
export type { Address } from "./address.js";
export {
  isAddress,
  isNullAddress,
  normalizeAddress,
  sameAddress,
} from "./address.js";

// Vesting types
export type {
  ScheduleStatus,
  VestingSchedule,
  ScheduleRecord,
} from "./vesting.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isScheduleStatus,
  isScheduleRecord,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";

/**
 * @cliffline/event-store — Vesting Domain Event Definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 * Examples:
 * - vesting.schedule.created
 * - vesting.claimed
 *
 * Each event type defines:
 * - A payload interface (what data the event carries)
 * - A payload guard, checked when an event is buffered and again on append
 *
 * Amounts are decimal strings of base units so payloads stay JSON-safe
 * and canonicalizable.
 */

// =============================================================================
// Payloads
// =============================================================================

export interface ManagerInitializedPayload {
  readonly owner: string;
}

export interface ScheduleCreatedPayload {
  readonly owner: string;
  readonly beneficiary: string;
  readonly index: number;
  readonly amount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly totalDuration: number;
}

export interface ClaimSettlement {
  readonly index: number;
  readonly amount: string;
}

export interface VestingClaimedPayload {
  readonly owner: string;
  readonly beneficiary: string;
  readonly amount: string;
  /** Seconds since the epoch at which the claim was evaluated */
  readonly timestamp: number;
  readonly settlements: readonly ClaimSettlement[];
}

export interface SchedulePausedPayload {
  readonly owner: string;
  readonly beneficiary: string;
  readonly index: number;
}

export type ScheduleResumedPayload = SchedulePausedPayload;

export interface ReserveFundedPayload {
  readonly owner: string;
  readonly from: string;
  readonly amount: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

/**
 * All known vesting event types as constants.
 * Use these instead of string literals for type safety.
 */
export const VESTING_EVENTS = {
  MANAGER_INITIALIZED: "vesting.manager.initialized",
  SCHEDULE_CREATED: "vesting.schedule.created",
  CLAIMED: "vesting.claimed",
  SCHEDULE_PAUSED: "vesting.schedule.paused",
  SCHEDULE_RESUMED: "vesting.schedule.resumed",
  RESERVE_FUNDED: "vesting.reserve.funded",
} as const;

export type VestingEventType =
  (typeof VESTING_EVENTS)[keyof typeof VESTING_EVENTS];

// =============================================================================
// Payload Guards
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

function isSettlement(v: unknown): v is ClaimSettlement {
  return isObject(v) && hasNumber(v, "index") && hasString(v, "amount");
}

const PAYLOAD_GUARDS: Readonly<Record<VestingEventType, (p: unknown) => boolean>> = {
  [VESTING_EVENTS.MANAGER_INITIALIZED]: (p) => isObject(p) && hasString(p, "owner"),
  [VESTING_EVENTS.SCHEDULE_CREATED]: (p) =>
    isObject(p) &&
    hasString(p, "owner") &&
    hasString(p, "beneficiary") &&
    hasNumber(p, "index") &&
    hasString(p, "amount"),
  [VESTING_EVENTS.CLAIMED]: (p) =>
    isObject(p) &&
    hasString(p, "owner") &&
    hasString(p, "beneficiary") &&
    hasString(p, "amount") &&
    Array.isArray(p.settlements) &&
    p.settlements.every(isSettlement),
  [VESTING_EVENTS.SCHEDULE_PAUSED]: (p) =>
    isObject(p) && hasString(p, "owner") && hasNumber(p, "index"),
  [VESTING_EVENTS.SCHEDULE_RESUMED]: (p) =>
    isObject(p) && hasString(p, "owner") && hasNumber(p, "index"),
  [VESTING_EVENTS.RESERVE_FUNDED]: (p) =>
    isObject(p) && hasString(p, "owner") && hasString(p, "amount"),
};

const KNOWN_TYPES = new Set<string>(Object.values(VESTING_EVENTS));

export function isVestingEventType(type: string): type is VestingEventType {
  return KNOWN_TYPES.has(type);
}

/**
 * Check that a payload has the shape registered for its event type.
 * Unknown types never validate.
 */
export function validateVestingPayload(type: string, payload: unknown): boolean {
  if (!isVestingEventType(type)) return false;
  return PAYLOAD_GUARDS[type](payload);
}

/**
 * Stream that holds every event for one Manager.
 */
export function vestingStreamId(owner: string): string {
  return `vesting:${owner}`;
}

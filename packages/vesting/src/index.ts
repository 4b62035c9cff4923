/**
 * @cliffline/vesting — Cliff-then-linear token vesting.
 *
 * Provides:
 * - VestingLedger: one Manager per owner, transactional operations
 * - Vesting Calculator (pure functions)
 * - Claim settlement against an injected asset ledger
 * - Lifecycle/authorization guards
 * - Clocks for production and tests
 *
 * @packageDocumentation
 */

// Facade
export { VestingLedger, reserveAccount } from "./vesting-ledger.js";

// Manager & transactions
export { VestingManager } from "./manager.js";
export { ManagerTransaction } from "./transaction.js";
export type { TransactionOptions, Effect } from "./transaction.js";

// Calculator
export { vestedAmount, releasedAmount, cliffEnd, vestingEnd } from "./calculator.js";

// Schedules
export {
  newSchedule,
  isActive,
  remainingAmount,
  withClaim,
  withStatus,
  scheduleViolation,
  toRecord,
  fromRecord,
} from "./schedule.js";
export type { ScheduleTerms } from "./schedule.js";

// Settlement
export { settleSchedules, payoutEffect } from "./settlement.js";
export type { SettlementPlan } from "./settlement.js";

// Guards
export {
  requireManager,
  requireNoManager,
  requireOwner,
  requireSchedule,
  requireBeneficiary,
  validateTerms,
  validateBeneficiary,
  validatePositiveAmount,
  nextStatus,
} from "./guard.js";
export type { LifecycleAction } from "./guard.js";

// Clocks
export { SystemClock, ManualClock, MAX_CLOCK_SECONDS } from "./clock.js";

// Types
export type {
  VestingErrorCode,
  AssetTransfer,
  Clock,
  EventSink,
  VestingDependencies,
  CreateScheduleRequest,
  ScheduleRef,
  ManagerInfo,
  ScheduleView,
  Settlement,
  ClaimResult,
  StatusChange,
  FundingResult,
  ManagerSnapshot,
  VestingSnapshot,
} from "./types.js";
export { VestingError } from "./types.js";

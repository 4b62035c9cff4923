/**
 * @cliffline/ledger — Internal types for the token ledger.
 *
 * Rules:
 * - All types are readonly
 * - Journal movements are never modified once recorded
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// ─── Parcels ─────────────────────────────────────────────────────────────

/**
 * Tokens taken out of one account and not yet put into another.
 *
 * A parcel is produced by `withdraw()` and consumed by `deposit()`.
 * Each parcel can be deposited exactly once.
 */
export interface TokenParcel {
  readonly id: string;
  /** Account the tokens were withdrawn from */
  readonly from: string;
  readonly amount: bigint;
}

// ─── Journal ─────────────────────────────────────────────────────────────

/** Kind of balance movement recorded in the journal. */
export type MovementKind = "mint" | "withdraw" | "deposit";

/**
 * A single balance movement. The journal is append-only.
 */
export interface LedgerMovement {
  /** 1-based position in the journal */
  readonly sequence: number;
  readonly kind: MovementKind;
  readonly account: string;
  readonly amount: bigint;
  /** Parcel that carried the tokens (withdraw/deposit only) */
  readonly parcelId?: string | undefined;
  readonly timestamp: string;
}

/**
 * Balance of a single account.
 */
export interface AccountBalance {
  readonly account: string;
  readonly balance: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "PARCEL_SPENT"
  | "UNKNOWN_PARCEL"
  | "PARCEL_OUTSTANDING"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the token ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * JSON-safe form of a journal movement.
 */
export interface MovementRecord {
  readonly sequence: number;
  readonly kind: MovementKind;
  readonly account: string;
  readonly amount: string;
  readonly parcelId?: string | undefined;
  readonly timestamp: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Amounts are decimal strings of base units.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string;
  readonly balances: readonly { readonly account: string; readonly balance: string }[];
  readonly journal: readonly MovementRecord[];
  readonly createdAt: string;
}

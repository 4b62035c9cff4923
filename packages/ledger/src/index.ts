/**
 * @cliffline/ledger — Fungible token ledger.
 *
 * A pure TypeScript token ledger with zero runtime dependencies.
 * Enforces conservation of supply:
 * - Only mint() creates tokens
 * - withdraw() produces a single-use parcel; deposit() consumes it
 * - Balances never go negative
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - The movement journal is append-only
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Core engine
export { TokenLedger } from "./token-ledger.js";

// Balance book
export { BalanceBook } from "./accounts.js";

// Unit conversion
export {
  parseBaseUnits,
  formatUnits,
  assertPositive,
} from "./units.js";

// Types
export type {
  TokenParcel,
  MovementKind,
  LedgerMovement,
  AccountBalance,
  LedgerErrorCode,
  MovementRecord,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";

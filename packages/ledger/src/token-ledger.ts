/**
 * @cliffline/ledger — Core TokenLedger class.
 *
 * A single fungible token with an append-only movement journal.
 *
 * API surface:
 * - mint() — Create new supply in an account (the only supply change)
 * - withdraw() — Take tokens out of an account as a single-use parcel
 * - deposit() — Put a parcel into an account
 * - balanceOf() / totalSupply() / outstanding() — Queries
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Invariant: sum of balances + outstanding parcels = total supply.
 */

import { BalanceBook, assertAccountId } from "./accounts.js";
import { assertPositive } from "./units.js";
import type {
  AccountBalance,
  LedgerMovement,
  LedgerSnapshot,
  MovementKind,
  TokenParcel,
} from "./types.js";
import { LedgerError } from "./types.js";

export class TokenLedger {
  readonly symbol: string;
  readonly decimals: number;

  private readonly _book: BalanceBook = new BalanceBook();
  private readonly _journal: LedgerMovement[] = [];
  private readonly _outstanding: Map<string, TokenParcel> = new Map();
  private readonly _spent: Set<string> = new Set();
  private _supply = 0n;
  private _nextParcel = 1;

  constructor(symbol: string, decimals: number) {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
      throw new LedgerError("INVALID_AMOUNT", `Token decimals must be an integer in 0..18, got ${String(decimals)}`);
    }
    this.symbol = symbol;
    this.decimals = decimals;
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  /**
   * Create `amount` new tokens in `account`.
   */
  mint(account: string, amount: bigint): void {
    assertAccountId(account);
    assertPositive(amount, "mint");

    this._book.credit(account, amount);
    this._supply += amount;
    this._record("mint", account, amount);
  }

  // ─── Movement ────────────────────────────────────────────────────────

  /**
   * Withdraw `amount` from `account`.
   *
   * The returned parcel must be passed to `deposit()`; until then the
   * tokens are counted as outstanding.
   *
   * Throws INSUFFICIENT_BALANCE without changing any state if the
   * account holds less than `amount`.
   */
  withdraw(account: string, amount: bigint): TokenParcel {
    assertAccountId(account);
    assertPositive(amount, "withdraw");

    this._book.debit(account, amount);

    const parcel: TokenParcel = {
      id: `parcel-${String(this._nextParcel++)}`,
      from: account,
      amount,
    };
    this._outstanding.set(parcel.id, parcel);
    this._record("withdraw", account, amount, parcel.id);
    return parcel;
  }

  /**
   * Deposit a parcel into `account`. Each parcel is accepted once.
   */
  deposit(account: string, parcel: TokenParcel): void {
    assertAccountId(account);

    const held = this._outstanding.get(parcel.id);
    if (held === undefined) {
      if (this._spent.has(parcel.id)) {
        throw new LedgerError("PARCEL_SPENT", `Parcel "${parcel.id}" was already deposited`);
      }
      throw new LedgerError("UNKNOWN_PARCEL", `Parcel "${parcel.id}" was not issued by this ledger`);
    }

    this._outstanding.delete(held.id);
    this._spent.add(held.id);
    this._book.credit(account, held.amount);
    this._record("deposit", account, held.amount, held.id);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: string): bigint {
    return this._book.get(account);
  }

  balances(): readonly AccountBalance[] {
    return this._book.getAll();
  }

  totalSupply(): bigint {
    return this._supply;
  }

  /**
   * Tokens withdrawn but not yet deposited.
   */
  outstanding(): bigint {
    let sum = 0n;
    for (const parcel of this._outstanding.values()) {
      sum += parcel.amount;
    }
    return sum;
  }

  /**
   * Whether balances plus outstanding parcels equal the minted supply.
   */
  isConserved(): boolean {
    return this._book.total() + this.outstanding() === this._supply;
  }

  journal(account?: string): readonly LedgerMovement[] {
    if (account === undefined) {
      return [...this._journal];
    }
    return this._journal.filter((m) => m.account === account);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot. Fails while parcels are outstanding.
   */
  snapshot(): LedgerSnapshot {
    if (this._outstanding.size > 0) {
      throw new LedgerError(
        "PARCEL_OUTSTANDING",
        `Cannot snapshot with ${String(this._outstanding.size)} outstanding parcel(s)`,
      );
    }

    return {
      version: 1,
      symbol: this.symbol,
      decimals: this.decimals,
      totalSupply: this._supply.toString(),
      balances: this._book.getAll().map((b) => ({
        account: b.account,
        balance: b.balance.toString(),
      })),
      journal: this._journal.map((m) => ({ ...m, amount: m.amount.toString() })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Verifies that the restored balances add up to the recorded supply.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): TokenLedger {
    const ledger = new TokenLedger(snapshot.symbol, snapshot.decimals);

    for (const { account, balance } of snapshot.balances) {
      const value = BigInt(balance);
      if (value > 0n) {
        ledger._book.credit(account, value);
      }
    }
    ledger._supply = BigInt(snapshot.totalSupply);

    for (const m of snapshot.journal) {
      ledger._journal.push({ ...m, amount: BigInt(m.amount) });
      if (m.parcelId !== undefined) {
        ledger._spent.add(m.parcelId);
      }
    }
    ledger._nextParcel = ledger._spent.size + 1;

    if (!ledger.isConserved()) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot balances do not add up to total supply ${snapshot.totalSupply}`,
      );
    }

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _record(
    kind: MovementKind,
    account: string,
    amount: bigint,
    parcelId?: string,
  ): void {
    this._journal.push({
      sequence: this._journal.length + 1,
      kind,
      account,
      amount,
      parcelId,
      timestamp: new Date().toISOString(),
    });
  }
}

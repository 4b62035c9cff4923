/**
 * @cliffline/ledger — Balance book.
 *
 * Holds the current balance of every account that has ever received
 * tokens. Accounts open implicitly on first credit and are never removed.
 *
 * Rules:
 * - Balances never go negative
 * - Account IDs are non-empty strings
 */

import type { AccountBalance } from "./types.js";
import { LedgerError } from "./types.js";

export class BalanceBook {
  private readonly _balances: Map<string, bigint> = new Map();

  /**
   * Current balance of an account (0n for unknown accounts).
   */
  get(account: string): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /**
   * Check if an account has ever been credited.
   */
  has(account: string): boolean {
    return this._balances.has(account);
  }

  /**
   * Increase an account's balance.
   */
  credit(account: string, amount: bigint): void {
    assertAccountId(account);
    this._balances.set(account, this.get(account) + amount);
  }

  /**
   * Decrease an account's balance.
   * Throws if the account holds less than `amount`.
   */
  debit(account: string, amount: bigint): void {
    assertAccountId(account);
    const current = this.get(account);
    if (current < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${account}" holds ${current.toString()}, cannot withdraw ${amount.toString()}`,
      );
    }
    this._balances.set(account, current - amount);
  }

  /**
   * Sum of all balances.
   */
  total(): bigint {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return sum;
  }

  /**
   * All accounts with their balances, in the order they were opened.
   */
  getAll(): readonly AccountBalance[] {
    return [...this._balances].map(([account, balance]) => ({ account, balance }));
  }

  get count(): number {
    return this._balances.size;
  }
}

/**
 * Assert an account ID is usable. Throws if empty or blank.
 */
export function assertAccountId(account: string): void {
  if (account.trim() === "") {
    throw new LedgerError("INVALID_ACCOUNT", "Account ID must be a non-empty string");
  }
}

/**
 * Claim Settlement Engine
 *
 * Settles every claimable schedule of one beneficiary against a staged
 * Manager, then pays the total out of the Manager's reserve.
 */

import type { Address } from "@cliffline/types";
import { vestedAmount } from "./calculator.js";
import type { VestingManager } from "./manager.js";
import { withClaim } from "./schedule.js";
import type { Effect } from "./transaction.js";
import type { AssetTransfer, Settlement } from "./types.js";

export interface SettlementPlan {
  readonly settlements: readonly Settlement[];
  readonly total: bigint;
}

/**
 * Release whatever has vested at `now` on each of the beneficiary's active
 * schedules, in index order. Mutates the (staged) Manager it is given.
 */
export function settleSchedules(
  manager: VestingManager,
  beneficiary: Address,
  now: number,
): SettlementPlan {
  const settlements: Settlement[] = [];
  let total = 0n;

  for (const { index, schedule } of manager.schedulesFor(beneficiary)) {
    if (schedule.status !== "active") continue;

    const amount = vestedAmount(schedule, now);
    if (amount === 0n) continue;

    manager.replace(index, withClaim(schedule, amount));
    settlements.push({ index, amount });
    total += amount;
  }

  return { settlements, total };
}

/**
 * Move `amount` from one account to another through the asset ledger.
 *
 * If the deposit fails the parcel goes back to `from`, so the ledger ends
 * where it started.
 */
export function payout(
  assets: AssetTransfer,
  from: string,
  to: string,
  amount: bigint,
): void {
  const parcel = assets.withdraw(from, amount);
  try {
    assets.deposit(to, parcel);
  } catch (error) {
    assets.deposit(from, parcel);
    throw error;
  }
}

/**
 * A payout as a transaction effect. Reverting sends the same amount back.
 */
export function payoutEffect(
  assets: AssetTransfer,
  from: string,
  to: string,
  amount: bigint,
): Effect {
  return {
    apply: () => payout(assets, from, to, amount),
    revert: () => payout(assets, to, from, amount),
  };
}

/**
 * Property-Based Tests for @cliffline/vesting
 *
 * 1. The released curve never decreases over time
 * 2. Nothing vests before the cliff; everything has vested at the end
 * 3. Any sequence of claims pays out at most the grant, and exactly the
 *    grant once vesting has ended
 * 4. Claims conserve tokens between the reserve and the beneficiary
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { TokenLedger } from "@cliffline/ledger";
import type { VestingSchedule } from "@cliffline/types";
import { releasedAmount, vestedAmount } from "../src/calculator.js";
import { ManualClock } from "../src/clock.js";
import { VestingError } from "../src/types.js";
import { VestingLedger } from "../src/vesting-ledger.js";

// =============================================================================
// Arbitraries
// =============================================================================

const T = 1_000_000;

const arbTerms = fc
  .record({
    totalAmount: fc.bigInt({ min: 1n, max: 10n ** 24n }),
    totalDuration: fc.integer({ min: 0, max: 10_000_000 }),
    cliffFraction: fc.double({ min: 0, max: 1, noNaN: true }),
  })
  .map(({ totalAmount, totalDuration, cliffFraction }) => ({
    totalAmount,
    totalDuration,
    cliffDuration: Math.floor(totalDuration * cliffFraction),
    startTime: T,
  }));

function activeSchedule(terms: {
  totalAmount: bigint;
  totalDuration: number;
  cliffDuration: number;
  startTime: number;
}): VestingSchedule {
  return {
    owner: "0xf00d",
    beneficiary: "0xa11ce",
    ...terms,
    claimedAmount: 0n,
    status: "active",
  };
}

// =============================================================================
// Calculator
// =============================================================================

describe("property: calculator", () => {
  it("the released amount never decreases", () => {
    fc.assert(
      fc.property(
        arbTerms,
        fc.integer({ min: 0, max: 20_000_000 }),
        fc.integer({ min: 0, max: 20_000_000 }),
        (terms, a, b) => {
          const s = activeSchedule(terms);
          const [early, late] = a <= b ? [a, b] : [b, a];
          expect(releasedAmount(s, early) <= releasedAmount(s, late)).toBe(true);
        },
      ),
    );
  });

  it("nothing before the cliff, everything at the end", () => {
    fc.assert(
      fc.property(arbTerms, fc.nat({ max: 10_000_000 }), (terms, offset) => {
        const s = activeSchedule(terms);
        if (terms.cliffDuration > 0) {
          const beforeCliff = T + (offset % terms.cliffDuration);
          expect(vestedAmount(s, beforeCliff)).toBe(0n);
        }
        expect(vestedAmount(s, T + terms.totalDuration + offset)).toBe(terms.totalAmount);
      }),
    );
  });

  it("never exceeds what remains unclaimed", () => {
    fc.assert(
      fc.property(arbTerms, fc.nat({ max: 20_000_000 }), fc.double({ min: 0, max: 1, noNaN: true }), (terms, offset, claimedFraction) => {
        const claimedAmount = (terms.totalAmount * BigInt(Math.floor(claimedFraction * 1000))) / 1000n;
        const s: VestingSchedule = {
          ...activeSchedule(terms),
          claimedAmount,
          status: claimedAmount === terms.totalAmount ? "completed" : "active",
        };
        const v = vestedAmount(s, T + offset);
        expect(v >= 0n).toBe(true);
        expect(v <= terms.totalAmount - claimedAmount).toBe(true);
      }),
    );
  });
});

// =============================================================================
// Claims
// =============================================================================

describe("property: claims", () => {
  it("total paid out never exceeds the grant and reaches it after the end", () => {
    fc.assert(
      fc.property(
        arbTerms,
        fc.array(fc.nat({ max: 2_000_000 }), { maxLength: 12 }),
        (terms, steps) => {
          const clock = new ManualClock(T);
          const tokens = new TokenLedger("VEST", 0);
          const vesting = new VestingLedger({ assets: tokens, clock });
          tokens.mint("0xf00d", terms.totalAmount);
          vesting.initialize("0xf00d");
          vesting.fundReserve("0xf00d", terms.totalAmount);
          vesting.createSchedule("0xf00d", { beneficiary: "0xa11ce", ...terms });

          const tryClaim = (): void => {
            try {
              vesting.claim("0xa11ce", "0xf00d");
            } catch (e) {
              expect(e).toBeInstanceOf(VestingError);
              expect((e as VestingError).code).toBe("NO_CLAIMABLE_AMOUNT");
            }
          };

          for (const step of steps) {
            clock.advance(step);
            tryClaim();
            expect(tokens.balanceOf("0xa11ce") <= terms.totalAmount).toBe(true);
            expect(tokens.balanceOf("0xa11ce") + tokens.balanceOf("reserve:0xf00d")).toBe(
              terms.totalAmount,
            );
          }

          clock.set(Math.max(clock.now(), T + terms.totalDuration));
          tryClaim();
          expect(tokens.balanceOf("0xa11ce")).toBe(terms.totalAmount);
          expect(vesting.getSchedule("0xf00d", 0).status).toBe("completed");
          expect(tokens.isConserved()).toBe(true);
        },
      ),
      { numRuns: 100 },
    );
  });
});

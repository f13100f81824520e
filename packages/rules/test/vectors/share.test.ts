/**
 * Golden test vectors — base share (60% balance / 40% score).
 */

import { describe, it, expect } from "vitest";
import { baseShare } from "../../src/share.js";
import { accrueHoldings } from "../../src/holdings.js";

describe("base share", () => {
  it("sole holder with the whole score gets the whole pool", () => {
    expect(
      baseShare({ pool: 1000n, balance: 500n, score: 5000n, totalSupply: 500n, totalScore: 5000n }),
    ).toBe(1000n);
  });

  it("splits by balance and score independently", () => {
    // balance half: 1000 × 60 × 250 / (100 × 1000) = 150
    // score half:   1000 × 40 × 2500 / (100 × 10000) = 100
    expect(
      baseShare({ pool: 1000n, balance: 250n, score: 2500n, totalSupply: 1000n, totalScore: 10_000n }),
    ).toBe(250n);
  });

  it("the two halves truncate separately", () => {
    // 7 × 60 × 1 / (100 × 3) = 1.4 → 1
    // 7 × 40 × 1 / (100 × 3) = 0.93 → 0
    expect(baseShare({ pool: 7n, balance: 1n, score: 1n, totalSupply: 3n, totalScore: 3n })).toBe(1n);
  });

  it("zero balance → zero share", () => {
    expect(
      baseShare({ pool: 1000n, balance: 0n, score: 5000n, totalSupply: 100n, totalScore: 5000n }),
    ).toBe(0n);
  });

  it("zero totals → zero share", () => {
    expect(
      baseShare({ pool: 1000n, balance: 10n, score: 0n, totalSupply: 100n, totalScore: 0n }),
    ).toBe(0n);
    expect(
      baseShare({ pool: 1000n, balance: 10n, score: 10n, totalSupply: 0n, totalScore: 10n }),
    ).toBe(0n);
  });
});

describe("cumulative holdings", () => {
  it("charges the pre-update balance for the elapsed blocks", () => {
    expect(accrueHoldings(0n, 1000n, 10n, 110n)).toBe(100_000n);
    expect(accrueHoldings(100_000n, 980n, 110n, 120n)).toBe(109_800n);
  });

  it("no elapsed blocks → unchanged", () => {
    expect(accrueHoldings(42n, 1000n, 50n, 50n)).toBe(42n);
  });
});

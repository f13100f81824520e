/**
 * Golden test vectors — time multiplier, velocity bonus, eligibility.
 */

import { describe, it, expect } from "vitest";
import {
  timeMultiplier,
  velocityBonus,
  adjustedShare,
  eligibilityThreshold,
  isRedistributionEligible,
  assessBeneficiary,
} from "../../src/redistribution.js";

describe("time multiplier", () => {
  it("below the minimum hold → 1.0×", () => {
    expect(timeMultiplier(0n)).toBe(10_000n);
    expect(timeMultiplier(143n)).toBe(10_000n);
  });

  it("at the minimum hold the ramp starts", () => {
    // 144 × 10000 / 1440 = 1000
    expect(timeMultiplier(144n)).toBe(11_000n);
  });

  it("ramps linearly and truncates", () => {
    // 500 × 10000 / 1440 = 3472.2 → 3472
    expect(timeMultiplier(500n)).toBe(13_472n);
  });

  it("reaches 2.0× exactly at 10 × the minimum hold", () => {
    expect(timeMultiplier(1439n)).toBe(19_993n);
    expect(timeMultiplier(1440n)).toBe(20_000n);
  });

  it("stays capped beyond", () => {
    expect(timeMultiplier(100_000n)).toBe(20_000n);
  });
});

describe("velocity bonus", () => {
  it("15% while the last claim is under two holding periods old", () => {
    expect(velocityBonus(0n)).toBe(1500n);
    expect(velocityBonus(287n)).toBe(1500n);
  });

  it("none from two periods on", () => {
    expect(velocityBonus(288n)).toBe(0n);
  });
});

describe("adjusted share", () => {
  it("no multiplier, no bonus → base", () => {
    expect(adjustedShare(1000n, 10_000n, 0n)).toBe(1000n);
  });

  it("2.0× with bonus → 2.3× base", () => {
    expect(adjustedShare(1000n, 20_000n, 1500n)).toBe(2300n);
  });

  it("truncates", () => {
    // 7 × 11000 × 11500 / 10^8 = 8.855 → 8
    expect(adjustedShare(7n, 11_000n, 1500n)).toBe(8n);
  });
});

describe("eligibility", () => {
  it("threshold is 0.1% of supply, truncated", () => {
    expect(eligibilityThreshold(1_000_000n)).toBe(1000n);
    expect(eligibilityThreshold(999n)).toBe(0n);
  });

  it("needs all three conditions", () => {
    const base = { balance: 1000n, totalSupply: 1_000_000n, adjusted: 5n, blocksSinceClaim: 144n };
    expect(isRedistributionEligible(base)).toBe(true);
    expect(isRedistributionEligible({ ...base, balance: 999n })).toBe(false);
    expect(isRedistributionEligible({ ...base, adjusted: 0n })).toBe(false);
    expect(isRedistributionEligible({ ...base, blocksSinceClaim: 143n })).toBe(false);
  });
});

describe("assessBeneficiary", () => {
  it("combines every step", () => {
    // base: 1000 × 60 × 600 / (100 × 1000) = 360 ; 1000 × 40 × 5000 / (100 × 10000) = 200 → 560
    // held 1440 → 20000 ; since claim 200 → +1500
    // adjusted = 560 × 20000 × 11500 / 10^8 = 1288
    const a = assessBeneficiary({
      balance: 600n,
      score: 5000n,
      lastActivityBlock: 0n,
      lastClaimBlock: 1240n,
      pool: 1000n,
      totalSupply: 1000n,
      totalScore: 10_000n,
      currentBlock: 1440n,
    });
    expect(a).toEqual({
      blocksHeld: 1440n,
      blocksSinceClaim: 200n,
      multiplier: 20_000n,
      bonus: 1500n,
      base: 560n,
      adjusted: 1288n,
      eligible: true,
      payout: 1288n,
    });
  });

  it("ineligible → payout 0 but adjusted still reported", () => {
    const a = assessBeneficiary({
      balance: 600n,
      score: 5000n,
      lastActivityBlock: 0n,
      lastClaimBlock: 100n,
      pool: 1000n,
      totalSupply: 1000n,
      totalScore: 10_000n,
      currentBlock: 200n,
    });
    // since claim = 100 < 144
    expect(a.eligible).toBe(false);
    expect(a.payout).toBe(0n);
    expect(a.adjusted).toBeGreaterThan(0n);
  });
});

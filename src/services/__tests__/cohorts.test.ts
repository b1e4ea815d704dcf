import { describe, it, expect } from "vitest";
import { classifyCohort, type WalletProfile } from "../cohorts.ts";

function profile(overrides: Partial<WalletProfile> = {}): WalletProfile {
  return {
    sampleMarkets: 3,
    avgTradeSize: 50,
    churn: 0.5,
    persistence: 0.5,
    specialization: 0.2,
    timingEdge: 0,
    roi: 0.2,
    brier: 0.3,
    ...overrides,
  };
}

const SIGNAL = { churn: 0, confidence: 0.1 };

describe("Cohort Classification", () => {
  it("should fall through to generalist_flow", () => {
    expect(classifyCohort(profile(), SIGNAL)).toBe("generalist_flow");
  });

  it("should check churn before anything else", () => {
    const churner = profile({ churn: 0.7, timingEdge: 0.5, sampleMarkets: 10, avgTradeSize: 500 });
    expect(classifyCohort(churner, SIGNAL)).toBe("noise_churner");
  });

  it("should require enough markets for timing_specialist", () => {
    const timing = profile({ timingEdge: 0.3, churn: 0.4 });
    expect(classifyCohort({ ...timing, sampleMarkets: 5 }, SIGNAL)).toBe("timing_specialist");
    expect(classifyCohort({ ...timing, sampleMarkets: 4 }, SIGNAL)).toBe("generalist_flow");
  });

  it("should classify persistent specialists as informed_accumulator", () => {
    const informed = profile({ persistence: 0.8, specialization: 0.5, sampleMarkets: 6 });
    expect(classifyCohort(informed, SIGNAL)).toBe("informed_accumulator");
  });

  it("should classify large low-churn traders as whale_conviction", () => {
    expect(classifyCohort(profile({ avgTradeSize: 250, churn: 0.4 }), SIGNAL)).toBe(
      "whale_conviction",
    );
  });

  it("should classify accurate specialists as category_specialist", () => {
    expect(classifyCohort(profile({ brier: 0.15, specialization: 0.45 }), SIGNAL)).toBe(
      "category_specialist",
    );
  });

  it("should classify flat low-churn traders as maker_arb", () => {
    expect(classifyCohort(profile({ churn: 0.2, roi: 0.01 }), SIGNAL)).toBe("maker_arb");
  });

  describe("without a profile", () => {
    it("should use the signal's churn and confidence", () => {
      expect(classifyCohort(undefined, { churn: 0.8, confidence: 0.9 })).toBe("noise_churner");
      expect(classifyCohort(undefined, { churn: 0.1, confidence: 0.6 })).toBe(
        "informed_accumulator",
      );
      expect(classifyCohort(undefined, { churn: 0.1, confidence: 0.3 })).toBe("generalist_flow");
    });
  });
});

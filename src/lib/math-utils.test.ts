import { describe, it, expect } from "vitest";
import {
  brierScore,
  chunk,
  clamp,
  clampProbability,
  concentration,
  hoursBetween,
  logLoss,
  mean,
  minDate,
  round,
  topByAbs,
} from "./math-utils.ts";

describe("math-utils", () => {
  it("should measure signed hours between instants", () => {
    const a = new Date("2025-01-01T00:00:00Z");
    const b = new Date("2025-01-01T06:00:00Z");
    expect(hoursBetween(a, b)).toBe(6);
    expect(hoursBetween(b, a)).toBe(-6);
    expect(minDate(a, b)).toBe(a);
  });

  it("should clamp and round", () => {
    expect(clamp(15, 0, 10)).toBe(10);
    expect(clampProbability(0)).toBe(0.001);
    expect(clampProbability(1)).toBe(0.999);
    expect(round(0.1234567, 6)).toBe(0.123457);
    expect(mean([])).toBe(0);
  });

  it("should keep log-loss finite at certainty", () => {
    expect(logLoss(0, 1)).toBeCloseTo(-Math.log(0.001), 12);
    expect(logLoss(0.5, 1)).toBeCloseTo(Math.LN2, 12);
    expect(brierScore(0.7, 1)).toBeCloseTo(0.09, 12);
  });

  it("should score concentration from 1 (one bucket) to 0 (uniform)", () => {
    expect(concentration([10])).toBe(1);
    expect(concentration([])).toBe(1);
    expect(concentration([5, 0, 5])).toBeCloseTo(0, 12);
  });

  it("should chunk and rank by absolute value", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(topByAbs([1, -3, 2, 3], (x) => x, 3)).toEqual([-3, 3, 2]);
  });
});

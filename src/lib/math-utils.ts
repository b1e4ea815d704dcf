/**
 * @fileoverview Math utilities and array helpers for the SmartCrowd engine.
 * Provides clamping, rounding, scoring rules and small array operations.
 */

import { PROB_CEILING, PROB_FLOOR } from "../config/constants.ts";

// ============================================================================
// TIME CONSTANTS
// ============================================================================

/** Milliseconds per hour (60 * 60 * 1000) */
export const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Hours elapsed from `from` to `to` (negative when `to` is earlier).
 *
 * @example
 * hoursBetween(new Date("2025-01-01T00:00:00Z"), new Date("2025-01-01T06:00:00Z")) // returns 6
 */
export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR;
}

/** The earlier of two instants. */
export function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}

// ============================================================================
// STATISTICAL FUNCTIONS
// ============================================================================

/**
 * Calculates the sum of an array of numbers.
 *
 * @example
 * sum([1, 2, 3]) // returns 6
 */
export function sum(values: readonly number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Clamps a value between a minimum and maximum.
 *
 * @example
 * clamp(5, 0, 10) // returns 5
 * clamp(-5, 0, 10) // returns 0
 * clamp(15, 0, 10) // returns 10
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Clamps to [0, 1]. */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Clamps a probability to [0.001, 0.999] so log-loss stays finite.
 *
 * @example
 * clampProbability(1) // returns 0.999
 */
export function clampProbability(value: number): number {
  return clamp(value, PROB_FLOOR, PROB_CEILING);
}

/**
 * Rounds a number to a specified number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 * round(2.5, 0) // returns 3
 */
export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

// ============================================================================
// SCORING RULES
// ============================================================================

/**
 * Squared error of a probability forecast against a binary outcome.
 *
 * @example
 * brierScore(0.7, 1) // returns 0.09 (within float precision)
 */
export function brierScore(prob: number, outcome: number): number {
  return (prob - outcome) ** 2;
}

/**
 * Negative log-likelihood of a binary outcome, with the probability
 * clamped to [0.001, 0.999].
 *
 * @example
 * logLoss(0.5, 1) // returns ln 2 ≈ 0.6931
 */
export function logLoss(prob: number, outcome: number): number {
  const p = clampProbability(prob);
  return -(outcome * Math.log(p) + (1 - outcome) * Math.log(1 - p));
}

/**
 * One minus the normalized Shannon entropy of a count distribution.
 * A single non-empty bucket (or none) scores 1.0; a uniform spread scores 0.0.
 *
 * @example
 * concentration([10]) // returns 1
 * concentration([5, 5]) // returns 0
 */
export function concentration(counts: readonly number[]): number {
  const nonEmpty = counts.filter((c) => c > 0);
  const total = sum(nonEmpty);
  if (total === 0 || nonEmpty.length <= 1) return 1;

  let entropy = 0;
  for (const c of nonEmpty) {
    const p = c / total;
    entropy -= p * Math.log(p);
  }
  return 1 - entropy / Math.log(nonEmpty.length);
}

// ============================================================================
// ARRAY HELPERS
// ============================================================================

/**
 * Chunks an array into smaller arrays of specified size.
 *
 * @example
 * chunk([1, 2, 3, 4, 5], 2) // returns [[1, 2], [3, 4], [5]]
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Sorts items by the absolute value of a numeric key, largest first, and keeps
 * the first `limit`. The sort is stable, so ties keep their input order.
 *
 * @example
 * topByAbs([{ v: 1 }, { v: -3 }, { v: 2 }], (x) => x.v, 2) // returns [{ v: -3 }, { v: 2 }]
 */
export function topByAbs<T>(
  items: readonly T[],
  key: (item: T) => number,
  limit: number,
): T[] {
  return [...items]
    .sort((a, b) => Math.abs(key(b)) - Math.abs(key(a)))
    .slice(0, limit);
}

/**
 * Wallet Cohort Classification
 *
 * Labels each contributing wallet with a behavioural cohort from its global
 * metric profile. Rules are an ordered list and the first match wins, so a
 * new cohort is added by inserting a rule at the intended priority.
 */

import type { WalletMetricRow } from "./store.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Cohort =
  | "noise_churner"
  | "timing_specialist"
  | "informed_accumulator"
  | "whale_conviction"
  | "category_specialist"
  | "maker_arb"
  | "generalist_flow";

/** Subset of a wallet's (ALL, ALL) metric row used for classification */
export type WalletProfile = Pick<
  WalletMetricRow,
  | "sampleMarkets"
  | "avgTradeSize"
  | "churn"
  | "persistence"
  | "specialization"
  | "timingEdge"
  | "roi"
  | "brier"
>;

/** What is known about a wallet from the current snapshot alone */
export interface SignalTraits {
  churn: number;
  confidence: number;
}

interface CohortRule<T> {
  cohort: Cohort;
  matches: (value: T) => boolean;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export const PROFILE_RULES: ReadonlyArray<CohortRule<WalletProfile>> = [
  { cohort: "noise_churner", matches: (p) => p.churn > 0.65 },
  {
    cohort: "timing_specialist",
    matches: (p) => p.timingEdge > 0.22 && p.churn < 0.45 && p.sampleMarkets >= 5,
  },
  {
    cohort: "informed_accumulator",
    matches: (p) => p.persistence > 0.72 && p.specialization > 0.45 && p.sampleMarkets >= 6,
  },
  { cohort: "whale_conviction", matches: (p) => p.avgTradeSize > 200 && p.churn < 0.5 },
  { cohort: "category_specialist", matches: (p) => p.brier < 0.2 && p.specialization > 0.4 },
  { cohort: "maker_arb", matches: (p) => p.churn < 0.35 && Math.abs(p.roi) < 0.04 },
];

/** Used when a wallet has no resolved-market history */
export const SIGNAL_RULES: ReadonlyArray<CohortRule<SignalTraits>> = [
  { cohort: "noise_churner", matches: (s) => s.churn > 0.65 },
  { cohort: "informed_accumulator", matches: (s) => s.confidence > 0.55 },
];

const FALLBACK_COHORT: Cohort = "generalist_flow";

function firstMatch<T>(rules: ReadonlyArray<CohortRule<T>>, value: T): Cohort {
  return rules.find((rule) => rule.matches(value))?.cohort ?? FALLBACK_COHORT;
}

export function classifyCohort(
  profile: WalletProfile | undefined,
  signal: SignalTraits,
): Cohort {
  return profile ? firstMatch(PROFILE_RULES, profile) : firstMatch(SIGNAL_RULES, signal);
}

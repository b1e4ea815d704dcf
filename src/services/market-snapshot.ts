/**
 * Market Snapshot Aggregator
 *
 * Fuses the live beliefs of every wallet trading a market into one
 * crowd-signal probability, weighted by each wallet's trust weight and the
 * confidence of its current signal, and compares it with the market's own
 * implied probability.
 *
 * Besides the estimate, a snapshot carries:
 * - Disagreement (weighted RMS belief dispersion)
 * - Participation quality (effective wallet count from the Herfindahl index)
 * - Integrity risk (concentration + churn)
 * - Top drivers, cohort summary and flip conditions for explanation
 *
 * The aggregator is a pure function of the trade log, the weight tables and
 * the snapshot instant, so backtests can replay it exactly.
 */

import { env } from "../config/env.ts";
import {
  ANTI_NOISE_FLOOR,
  ANTI_NOISE_PER_CHURN,
  COHORT_SUMMARY_LIMIT,
  DIAGNOSTIC_DECIMALS,
  INTEGRITY_CHURN_SHARE,
  INTEGRITY_CONCENTRATION_SHARE,
  INTEGRITY_CONFIDENCE_DRAG,
  PARTICIPATION_FULL_WALLETS,
  SIGNAL_SUPPORT_SCALE,
  THIN_SAMPLE_PENALTY,
  THIN_SAMPLE_WALLETS,
  TOP_DRIVERS_LIMIT,
  UNCERTAINTY_DISCOUNT_FLOOR,
  UNCERTAINTY_DISCOUNT_RATE,
  WALLET_COUNT_FULL,
} from "../config/constants.ts";
import { UnknownMarketError } from "../lib/errors.ts";
import { clamp01, clampProbability, round, topByAbs } from "../lib/math-utils.ts";
import {
  groupTradesByWallet,
  impliedYesPrice,
  inferBelief,
  isWellFormedTrade,
  type BeliefSignal,
} from "./beliefs.ts";
import { classifyCohort, type Cohort, type WalletProfile } from "./cohorts.ts";
import type { SmartCrowdStore, TradeRow } from "./store.ts";
import { logger } from "./structured-logger.ts";
import { horizonBucket, normalizeCategory } from "./wallet-metrics.ts";
import {
  indexWalletWeights,
  resolveWalletWeight,
  type ResolvedWeight,
  type WalletWeightIndex,
} from "./wallet-weights.ts";

const SERVICE = "market-snapshot";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TopDriver {
  wallet: string;
  belief: number;
  confidence: number;
  /** Trust weight before the signal's own confidence is applied */
  weight: number;
  /** effective_weight × (belief − market_prob) */
  contribution: number;
}

export interface CohortSummaryEntry {
  cohort: Cohort;
  walletCount: number;
  /** Share of total effective weight */
  weightShare: number;
  avgBelief: number;
  avgConfidence: number;
  netContribution: number;
}

export type FlipCondition =
  | {
      condition: "signal_aligned_with_market";
      detail: string;
    }
  | {
      condition: "trusted_no_flow_needed" | "trusted_yes_flow_needed";
      detail: string;
      /** Approximate extra effective weight at belief 0 or 1 to reach market_prob */
      requiredEffectiveWeight: number;
    }
  | {
      condition: "lead_cohort_reversal";
      detail: string;
      leadCohort: Cohort;
      leadCohortNetContribution: number;
    };

export interface SnapshotDiagnostics {
  totalEffectiveWeight: number;
  walletCount: number;
  confidence: number;
  disagreement: number;
  integrityRisk: number;
}

export interface SnapshotExplanation {
  summary: string;
  diagnostics: SnapshotDiagnostics | null;
  evidence: {
    topCohorts: CohortSummaryEntry[];
    flipConditions: FlipCondition[];
  } | null;
}

export interface MarketSnapshot {
  marketId: string;
  /** ISO-8601 UTC */
  snapshotTime: string;
  marketProb: number;
  /** Crowd-signal estimate */
  aggregateProb: number;
  /** aggregateProb − marketProb */
  divergence: number;
  confidence: number;
  disagreement: number;
  participationQuality: number;
  integrityRisk: number;
  activeWallets: number;
  topDrivers: TopDriver[];
  cohortSummary: CohortSummaryEntry[];
  flipConditions: FlipCondition[];
  explanation: SnapshotExplanation;
}

/** One wallet's influence on the aggregate */
export interface WalletContribution {
  wallet: string;
  belief: number;
  confidence: number;
  churn: number;
  trustWeight: number;
  /** trustWeight × confidence */
  effectiveWeight: number;
}

export interface SnapshotInput {
  marketId: string;
  snapshotTime: Date;
  marketProb: number;
  /** Normalized market category */
  category: string;
  /** Horizon bucket of the snapshot instant relative to market close */
  horizonBucket: string;
  /** Each wallet's trades at or before the snapshot instant */
  walletTrades: ReadonlyMap<string, readonly TradeRow[]>;
  weights: WalletWeightIndex;
  /** Global metric profiles by wallet (missing = no resolved history) */
  profiles: ReadonlyMap<string, WalletProfile>;
  halfLifeHours?: number;
}

export interface BuildSnapshotOptions {
  /** Defaults to now */
  snapshotTime?: Date;
  /** Upsert the result (default true); backtest replay passes false */
  persist?: boolean;
  halfLifeHours?: number;
}

// ---------------------------------------------------------------------------
// Wallet weighting
// ---------------------------------------------------------------------------

/**
 * Combine a wallet's stored trust weight with its current signal. Unstable
 * traders are dampened again here (anti-noise) and uncertain weights are
 * discounted.
 */
export function walletContribution(
  wallet: string,
  signal: BeliefSignal,
  resolved: Pick<ResolvedWeight, "weight" | "uncertainty">,
): WalletContribution {
  const antiNoise =
    Math.max(ANTI_NOISE_FLOOR, 1 - ANTI_NOISE_PER_CHURN * signal.churn) *
    (0.85 + 0.3 * signal.persistence);
  const uncertaintyDiscount = Math.max(
    UNCERTAINTY_DISCOUNT_FLOOR,
    1 - UNCERTAINTY_DISCOUNT_RATE * resolved.uncertainty,
  );
  const trustWeight = resolved.weight * antiNoise * uncertaintyDiscount;
  return {
    wallet,
    belief: signal.belief,
    confidence: signal.confidence,
    churn: signal.churn,
    trustWeight,
    effectiveWeight: trustWeight * signal.confidence,
  };
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export function buildTopDrivers(
  contributions: readonly WalletContribution[],
  marketProb: number,
): TopDriver[] {
  const drivers = contributions.map((c) => ({
    wallet: c.wallet,
    belief: round(c.belief, DIAGNOSTIC_DECIMALS),
    confidence: round(c.confidence, DIAGNOSTIC_DECIMALS),
    weight: round(c.trustWeight, DIAGNOSTIC_DECIMALS),
    contribution: round(c.effectiveWeight * (c.belief - marketProb), DIAGNOSTIC_DECIMALS),
  }));
  return topByAbs(drivers, (d) => d.contribution, TOP_DRIVERS_LIMIT);
}

export function buildCohortSummary(
  contributions: readonly WalletContribution[],
  profiles: ReadonlyMap<string, WalletProfile>,
  marketProb: number,
  totalWeight: number,
): CohortSummaryEntry[] {
  const accum = new Map<
    Cohort,
    { wallets: Set<string>; weight: number; beliefMass: number; confidenceMass: number; net: number }
  >();

  for (const c of contributions) {
    const cohort = classifyCohort(profiles.get(c.wallet), c);
    const entry = accum.get(cohort) ?? {
      wallets: new Set<string>(),
      weight: 0,
      beliefMass: 0,
      confidenceMass: 0,
      net: 0,
    };
    entry.wallets.add(c.wallet);
    entry.weight += c.effectiveWeight;
    entry.beliefMass += c.effectiveWeight * c.belief;
    entry.confidenceMass += c.effectiveWeight * c.confidence;
    entry.net += c.effectiveWeight * (c.belief - marketProb);
    accum.set(cohort, entry);
  }

  const summary = [...accum.entries()].map(([cohort, e]) => ({
    cohort,
    walletCount: e.wallets.size,
    weightShare: round(e.weight / Math.max(totalWeight, 1e-9), DIAGNOSTIC_DECIMALS),
    avgBelief: round(e.beliefMass / Math.max(e.weight, 1e-9), DIAGNOSTIC_DECIMALS),
    avgConfidence: round(e.confidenceMass / Math.max(e.weight, 1e-9), DIAGNOSTIC_DECIMALS),
    netContribution: round(e.net, DIAGNOSTIC_DECIMALS),
  }));
  return topByAbs(summary, (s) => s.netContribution, COHORT_SUMMARY_LIMIT);
}

/**
 * How much opposing effective weight at maximal conviction would pull the
 * aggregate back to the market price, plus the lead cohort whose reversal
 * would compress the divergence most.
 *
 * Adding weight w at belief 0 moves the aggregate to D·p / (D + w); solving
 * for market price m gives w = D·(p − m) / m (symmetrically with 1 − m for
 * YES flow). This treats the added wallet as a single extreme vote, so it is
 * an approximation, not a bound.
 */
export function buildFlipConditions(
  marketProb: number,
  aggregateProb: number,
  totalWeight: number,
  cohortSummary: readonly CohortSummaryEntry[],
): FlipCondition[] {
  const divergence = aggregateProb - marketProb;
  if (Math.abs(divergence) < 1e-12 || totalWeight <= 0) {
    return [
      {
        condition: "signal_aligned_with_market",
        detail: "Crowd signal is currently aligned with the market implied probability.",
      },
    ];
  }

  const conditions: FlipCondition[] = [];
  if (divergence > 0) {
    const needed = (totalWeight * (aggregateProb - marketProb)) / marketProb;
    conditions.push({
      condition: "trusted_no_flow_needed",
      detail:
        `Approximately ${needed.toFixed(3)} additional effective NO-side weight at extreme ` +
        "conviction is needed to cross below market.",
      requiredEffectiveWeight: Math.max(0, needed),
    });
  } else {
    const needed = (totalWeight * (marketProb - aggregateProb)) / (1 - marketProb);
    conditions.push({
      condition: "trusted_yes_flow_needed",
      detail:
        `Approximately ${needed.toFixed(3)} additional effective YES-side weight at extreme ` +
        "conviction is needed to cross above market.",
      requiredEffectiveWeight: Math.max(0, needed),
    });
  }

  const lead = cohortSummary[0];
  if (lead) {
    conditions.push({
      condition: "lead_cohort_reversal",
      detail:
        `If leading cohort '${lead.cohort}' reverses direction or halves conviction, ` +
        "the crowd-signal divergence would compress materially.",
      leadCohort: lead.cohort,
      leadCohortNetContribution: lead.netContribution,
    });
  }
  return conditions;
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

function zeroSignalSnapshot(marketId: string, snapshotTime: Date, marketProb: number): MarketSnapshot {
  return {
    marketId,
    snapshotTime: snapshotTime.toISOString(),
    marketProb,
    aggregateProb: marketProb,
    divergence: 0,
    confidence: 0,
    disagreement: 0,
    participationQuality: 0,
    integrityRisk: 1,
    activeWallets: 0,
    topDrivers: [],
    cohortSummary: [],
    flipConditions: [],
    explanation: {
      summary: "No qualifying trusted wallets with confidence above zero for this snapshot.",
      diagnostics: null,
      evidence: null,
    },
  };
}

/**
 * Aggregate already-loaded trades, weights and profiles into a snapshot.
 */
export function aggregateMarketSnapshot(input: SnapshotInput): MarketSnapshot {
  const { marketId, snapshotTime, marketProb } = input;
  const halfLife = input.halfLifeHours ?? env.SMARTCROWD_HALF_LIFE_HOURS;

  const contributions: WalletContribution[] = [];
  for (const [wallet, trades] of input.walletTrades) {
    const signal = inferBelief(trades, snapshotTime, halfLife);
    if (signal.confidence <= 0) continue;
    const resolved = resolveWalletWeight(input.weights, wallet, input.category, input.horizonBucket);
    const contribution = walletContribution(wallet, signal, resolved);
    if (contribution.effectiveWeight <= 0) continue;
    contributions.push(contribution);
  }

  if (contributions.length === 0) {
    return zeroSignalSnapshot(marketId, snapshotTime, marketProb);
  }

  const totalWeight = contributions.reduce((acc, c) => acc + c.effectiveWeight, 0);
  const aggregateProb = clampProbability(
    contributions.reduce((acc, c) => acc + c.effectiveWeight * c.belief, 0) /
      Math.max(totalWeight, 1e-9),
  );

  const shares = contributions.map((c) => c.effectiveWeight / totalWeight);
  const disagreement = Math.sqrt(
    contributions.reduce((acc, c, i) => acc + (shares[i] ?? 0) * (c.belief - aggregateProb) ** 2, 0),
  );
  const herfindahl = shares.reduce((acc, s) => acc + s * s, 0);
  const participationQuality = clamp01(1 / Math.max(herfindahl, 1e-9) / PARTICIPATION_FULL_WALLETS);

  const avgChurn = contributions.reduce((acc, c, i) => acc + (shares[i] ?? 0) * c.churn, 0);
  const integrityRisk = clamp01(
    INTEGRITY_CONCENTRATION_SHARE * herfindahl + INTEGRITY_CHURN_SHARE * avgChurn,
  );

  const signalSupport = totalWeight / (totalWeight + SIGNAL_SUPPORT_SCALE);
  const agreement = Math.max(0, 1 - disagreement);
  const walletCountFactor = Math.min(1, contributions.length / WALLET_COUNT_FULL);
  let confidence = clamp01(
    signalSupport * agreement * walletCountFactor * (1 - INTEGRITY_CONFIDENCE_DRAG * integrityRisk),
  );
  if (contributions.length < THIN_SAMPLE_WALLETS) {
    confidence *= THIN_SAMPLE_PENALTY;
  }

  const divergence = aggregateProb - marketProb;
  const topDrivers = buildTopDrivers(contributions, marketProb);
  const cohortSummary = buildCohortSummary(contributions, input.profiles, marketProb, totalWeight);
  const flipConditions = buildFlipConditions(marketProb, aggregateProb, totalWeight, cohortSummary);

  const leaning = divergence > 0 ? "YES-leaning" : divergence < 0 ? "NO-leaning" : "neutral";

  return {
    marketId,
    snapshotTime: snapshotTime.toISOString(),
    marketProb,
    aggregateProb,
    divergence,
    confidence,
    disagreement,
    participationQuality,
    integrityRisk,
    activeWallets: contributions.length,
    topDrivers,
    cohortSummary,
    flipConditions,
    explanation: {
      summary:
        `Crowd signal is ${aggregateProb.toFixed(3)} vs market ${marketProb.toFixed(3)} (${leaning}), ` +
        `confidence ${confidence.toFixed(2)}, disagreement ${disagreement.toFixed(3)}, ` +
        `integrity risk ${integrityRisk.toFixed(3)}.`,
      diagnostics: {
        totalEffectiveWeight: round(totalWeight, DIAGNOSTIC_DECIMALS),
        walletCount: contributions.length,
        confidence: round(confidence, DIAGNOSTIC_DECIMALS),
        disagreement: round(disagreement, DIAGNOSTIC_DECIMALS),
        integrityRisk: round(integrityRisk, DIAGNOSTIC_DECIMALS),
      },
      evidence: {
        topCohorts: cohortSummary,
        flipConditions,
      },
    },
  };
}

/**
 * Market-implied YES probability from the latest well-formed trade, or 0.5
 * before the first trade. `trades` must be time-ordered.
 */
export function marketProbFromTrades(trades: readonly TradeRow[]): number {
  const latest = trades.filter(isWellFormedTrade).at(-1);
  return latest ? impliedYesPrice(latest.side, latest.price) : 0.5;
}

/**
 * Build (and by default persist) the snapshot of one market at one instant.
 *
 * @throws UnknownMarketError when the market is not in the store
 */
export async function buildMarketSnapshot(
  store: SmartCrowdStore,
  marketId: string,
  options: BuildSnapshotOptions = {},
): Promise<MarketSnapshot> {
  const snapshotTime = options.snapshotTime ?? new Date();
  const persist = options.persist ?? true;

  const market = await store.getMarket(marketId);
  if (!market) {
    throw new UnknownMarketError(marketId);
  }

  const trades = await store.getMarketTrades(marketId, snapshotTime);
  const walletTrades = groupTradesByWallet(trades);
  const wallets = [...walletTrades.keys()];

  const [weightRows, profileRows] = await Promise.all([
    store.getWalletWeights(wallets),
    store.getWalletProfiles(wallets),
  ]);

  const snapshot = aggregateMarketSnapshot({
    marketId,
    snapshotTime,
    marketProb: marketProbFromTrades(trades),
    category: normalizeCategory(market.category),
    horizonBucket: horizonBucket(market.endTime, snapshotTime),
    walletTrades,
    weights: indexWalletWeights(weightRows),
    profiles: new Map(profileRows.map((row) => [row.wallet, row])),
    halfLifeHours: options.halfLifeHours,
  });

  if (persist) {
    await store.upsertSnapshot(snapshot);
  }

  logger.debug(SERVICE, "Snapshot built", {
    marketId,
    snapshotTime: snapshot.snapshotTime,
    activeWallets: snapshot.activeWallets,
    divergence: snapshot.divergence,
    persisted: persist,
  });
  return snapshot;
}

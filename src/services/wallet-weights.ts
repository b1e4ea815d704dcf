/**
 * Wallet Trust Weighting
 *
 * Converts wallet accuracy metrics into a bounded trust multiplier plus an
 * uncertainty per (wallet, category, horizon).
 *
 * Edge is measured against a constant 0.5 forecaster (Brier 0.25). Narrow
 * groupings are shrunk toward the wallet's global edge with an
 * empirical-Bayes weight support / (support + prior), then four bounded
 * style adjustments are multiplied in.
 *
 * At lookup time a weight is resolved through an explicit ordered list of
 * fallback keys: exact → category-only → horizon-only → global → cold start.
 */

import {
  ALL,
  BASE_WEIGHT_MAX,
  BASE_WEIGHT_MIN,
  CALIBRATION_PENALTY_FLOOR,
  CHANCE_BRIER,
  COLD_START_UNCERTAINTY,
  COLD_START_WEIGHT,
  GLOBAL_PRIOR_STRENGTH,
  LOCAL_PRIOR_STRENGTH,
  STYLE_PENALTY_FLOOR,
  STYLE_PENALTY_PER_CHURN,
  WEIGHT_MAX,
  WEIGHT_MIN,
} from "../config/constants.ts";
import { clamp, clamp01 } from "../lib/math-utils.ts";
import type {
  SmartCrowdStore,
  WalletKey,
  WalletMetricRow,
  WalletWeightRow,
} from "./store.ts";
import { logger, timeOperation } from "./structured-logger.ts";

const SERVICE = "wallet-weights";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResolvedWeight {
  weight: number;
  uncertainty: number;
  /** Which fallback level produced the weight */
  source: WeightSource;
}

export type WeightSource = "exact" | "category" | "horizon" | "global" | "cold_start";

/** Weight rows indexed by their (wallet, category, horizon) key */
export type WalletWeightIndex = ReadonlyMap<string, WalletWeightRow>;

// ---------------------------------------------------------------------------
// Weight computation
// ---------------------------------------------------------------------------

export function isGlobalKey(key: WalletKey): boolean {
  return key.category === ALL && key.horizonBucket === ALL;
}

/**
 * Trust weight and uncertainty for one metric row, given the wallet's global
 * edge (0 when the wallet has no global row).
 */
export function weightFromMetric(
  metric: WalletMetricRow,
  globalEdge: number,
): { weight: number; uncertainty: number } {
  const support = metric.sampleMarkets;
  const localEdge = CHANCE_BRIER - metric.brier;
  const priorStrength = isGlobalKey(metric) ? GLOBAL_PRIOR_STRENGTH : LOCAL_PRIOR_STRENGTH;
  const shrink = support / (support + priorStrength);
  const blendedEdge = shrink * localEdge + (1 - shrink) * globalEdge;

  const baseWeight = clamp(1 + blendedEdge / CHANCE_BRIER, BASE_WEIGHT_MIN, BASE_WEIGHT_MAX);
  const churn = clamp01(metric.churn);
  const persistence = clamp01(metric.persistence);
  const calibrationError = clamp01(metric.calibrationError);
  const specialization = clamp01(metric.specialization);

  const stylePenalty = Math.max(STYLE_PENALTY_FLOOR, 1 - STYLE_PENALTY_PER_CHURN * churn);
  const persistenceBoost = 0.85 + 0.3 * persistence;
  const calibrationPenalty = Math.max(CALIBRATION_PENALTY_FLOOR, 1 - calibrationError);
  const specializationBoost = 0.9 + 0.2 * specialization;

  const weight = clamp(
    baseWeight * stylePenalty * persistenceBoost * calibrationPenalty * specializationBoost,
    WEIGHT_MIN,
    WEIGHT_MAX,
  );
  const uncertainty = clamp01((1 / Math.sqrt(support + 1)) * 0.9 + calibrationError * 0.4);
  return { weight, uncertainty };
}

/**
 * Derive one weight row per metric row. Rows without support are dropped.
 */
export function computeWalletWeights(
  metrics: readonly WalletMetricRow[],
  updatedAt: Date = new Date(),
): WalletWeightRow[] {
  const globalEdges = new Map<string, number>();
  for (const metric of metrics) {
    if (isGlobalKey(metric)) {
      globalEdges.set(metric.wallet, CHANCE_BRIER - metric.brier);
    }
  }

  const rows: WalletWeightRow[] = [];
  for (const metric of metrics) {
    if (metric.sampleMarkets <= 0) continue;
    const { weight, uncertainty } = weightFromMetric(metric, globalEdges.get(metric.wallet) ?? 0);
    rows.push({
      wallet: metric.wallet,
      category: metric.category,
      horizonBucket: metric.horizonBucket,
      weight,
      uncertainty,
      support: metric.sampleMarkets,
      updatedAt,
    });
  }
  return rows;
}

/**
 * Rebuild the wallet_weights table from the current wallet_metrics table.
 */
export async function recomputeWalletWeights(
  store: SmartCrowdStore,
  options: { now?: Date } = {},
): Promise<{ rowsWritten: number }> {
  return timeOperation(SERVICE, "recomputeWalletWeights", async () => {
    const metrics = await store.listWalletMetrics();
    const rows = computeWalletWeights(metrics, options.now ?? new Date());
    await store.replaceWalletWeights(rows);

    logger.info(SERVICE, "Wallet weights recomputed", {
      metricRows: metrics.length,
      rowsWritten: rows.length,
    });
    return { rowsWritten: rows.length };
  });
}

// ---------------------------------------------------------------------------
// Cascading lookup
// ---------------------------------------------------------------------------

export function walletKeyId(key: WalletKey): string {
  return `${key.wallet}\u0000${key.category}\u0000${key.horizonBucket}`;
}

export function indexWalletWeights(rows: readonly WalletWeightRow[]): WalletWeightIndex {
  return new Map(rows.map((row) => [walletKeyId(row), row]));
}

/**
 * Fallback keys in the order they are tried.
 */
export function weightLookupKeys(
  wallet: string,
  category: string,
  horizonBucket: string,
): Array<{ source: Exclude<WeightSource, "cold_start">; key: WalletKey }> {
  return [
    { source: "exact", key: { wallet, category, horizonBucket } },
    { source: "category", key: { wallet, category, horizonBucket: ALL } },
    { source: "horizon", key: { wallet, category: ALL, horizonBucket } },
    { source: "global", key: { wallet, category: ALL, horizonBucket: ALL } },
  ];
}

/**
 * Resolve a wallet's weight for a market context. A wallet with no weight
 * rows at all gets the cold-start default (weight 1, uncertainty 1).
 */
export function resolveWalletWeight(
  index: WalletWeightIndex,
  wallet: string,
  category: string,
  horizonBucket: string,
): ResolvedWeight {
  for (const { source, key } of weightLookupKeys(wallet, category, horizonBucket)) {
    const row = index.get(walletKeyId(key));
    if (row) {
      return { weight: row.weight, uncertainty: row.uncertainty, source };
    }
  }
  return {
    weight: COLD_START_WEIGHT,
    uncertainty: COLD_START_UNCERTAINTY,
    source: "cold_start",
  };
}

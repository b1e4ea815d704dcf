/**
 * Snapshot Pipeline
 *
 * Orchestrates a full refresh: wallet metrics → wallet weights → one
 * snapshot per market, optionally followed by a historical backfill
 * of evenly spaced snapshots per market.
 *
 * Each stage reads what the previous stage committed, so a failure leaves
 * the earlier stages' tables intact and the run can simply be repeated.
 */

import { env } from "../config/env.ts";
import { minDate } from "../lib/math-utils.ts";
import { buildMarketSnapshot } from "./market-snapshot.ts";
import type { ScreenerRow, SmartCrowdStore } from "./store.ts";
import { logger, timeOperation } from "./structured-logger.ts";
import { recomputeWalletMetrics } from "./wallet-metrics.ts";
import { recomputeWalletWeights } from "./wallet-weights.ts";

const SERVICE = "pipeline";

export interface SnapshotPassOptions {
  /** Defaults to now */
  snapshotTime?: Date;
  /** Also snapshot markets that already have an outcome */
  includeResolved?: boolean;
  halfLifeHours?: number;
}

export interface BackfillOptions {
  /** Snapshots per market */
  points: number;
  includeResolved?: boolean;
  now?: Date;
  halfLifeHours?: number;
}

export interface PipelineOptions {
  snapshotTime?: Date;
  includeResolvedSnapshots?: boolean;
  backfillPoints?: number;
  halfLifeHours?: number;
}

export interface PipelineResult {
  walletMetricsWritten: number;
  walletWeightsWritten: number;
  snapshotsWritten: number;
  backfillSnapshotsWritten?: number;
}

/**
 * Snapshot every market (open markets only unless `includeResolved`), all at
 * the same instant. A market without trades gets a zero-signal row.
 */
export async function buildSnapshotsForAllMarkets(
  store: SmartCrowdStore,
  options: SnapshotPassOptions = {},
): Promise<{ snapshotsWritten: number }> {
  const snapshotTime = options.snapshotTime ?? new Date();
  const marketIds = await store.listSnapshotMarketIds(options.includeResolved ?? false);

  let written = 0;
  for (const marketId of marketIds) {
    await buildMarketSnapshot(store, marketId, {
      snapshotTime,
      persist: true,
      halfLifeHours: options.halfLifeHours,
    });
    written++;
  }

  logger.info(SERVICE, "Snapshot pass complete", {
    snapshotTime: snapshotTime.toISOString(),
    snapshotsWritten: written,
  });
  return { snapshotsWritten: written };
}

/**
 * Evenly spaced instants from `start` to `end`, both included. A single
 * point lands on `end`.
 */
export function backfillTimes(start: Date, end: Date, points: number): Date[] {
  if (points <= 0 || end.getTime() < start.getTime()) return [];
  if (points === 1) return [end];
  const step = (end.getTime() - start.getTime()) / (points - 1);
  return Array.from({ length: points }, (_, i) => new Date(start.getTime() + Math.round(step * i)));
}

/**
 * Write `points` historical snapshots per market between its first trade and
 * the earlier of its close and `now`. Instants that collide (a market whose
 * trading spans less than `points` milliseconds) are written once.
 */
export async function backfillMarketSnapshots(
  store: SmartCrowdStore,
  options: BackfillOptions,
): Promise<{ backfillSnapshotsWritten: number }> {
  const now = options.now ?? new Date();
  const marketIds = await store.listSnapshotMarketIds(options.includeResolved ?? false);

  let written = 0;
  for (const marketId of marketIds) {
    const market = await store.getMarket(marketId);
    if (!market) continue;
    const end = minDate(now, market.endTime);
    const firstTrade = await store.getFirstTradeTime(marketId, end);
    if (!firstTrade) continue;

    const seen = new Set<number>();
    for (const snapshotTime of backfillTimes(firstTrade, end, options.points)) {
      if (seen.has(snapshotTime.getTime())) continue;
      seen.add(snapshotTime.getTime());
      await buildMarketSnapshot(store, marketId, {
        snapshotTime,
        persist: true,
        halfLifeHours: options.halfLifeHours,
      });
      written++;
    }
  }

  logger.info(SERVICE, "Snapshot backfill complete", {
    points: options.points,
    markets: marketIds.length,
    backfillSnapshotsWritten: written,
  });
  return { backfillSnapshotsWritten: written };
}

/**
 * Full refresh. Backfill runs only when `backfillPoints` is positive.
 */
export async function recomputePipeline(
  store: SmartCrowdStore,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  return timeOperation(SERVICE, "recomputePipeline", async () => {
    const now = new Date();
    const snapshotTime = options.snapshotTime ?? now;
    const includeResolved = options.includeResolvedSnapshots ?? false;
    const backfillPoints = options.backfillPoints ?? env.SMARTCROWD_BACKFILL_POINTS;

    const metrics = await recomputeWalletMetrics(store, {
      halfLifeHours: options.halfLifeHours,
      now,
    });
    const weights = await recomputeWalletWeights(store, { now });
    const snapshots = await buildSnapshotsForAllMarkets(store, {
      snapshotTime,
      includeResolved,
      halfLifeHours: options.halfLifeHours,
    });

    const result: PipelineResult = {
      walletMetricsWritten: metrics.rowsWritten,
      walletWeightsWritten: weights.rowsWritten,
      snapshotsWritten: snapshots.snapshotsWritten,
    };

    if (backfillPoints > 0) {
      const backfill = await backfillMarketSnapshots(store, {
        points: backfillPoints,
        includeResolved,
        now: snapshotTime,
        halfLifeHours: options.halfLifeHours,
      });
      result.backfillSnapshotsWritten = backfill.backfillSnapshotsWritten;
    }
    return result;
  });
}

/**
 * Newest snapshot per market ordered by |divergence|, for screening.
 */
export async function latestScreenerRows(
  store: SmartCrowdStore,
  options: { limit?: number; minConfidence?: number } = {},
): Promise<ScreenerRow[]> {
  return store.latestScreenerRows(options.limit ?? 25, options.minConfidence ?? 0);
}


/**
 * Backtest Evaluator
 *
 * Replays the snapshot aggregator at a fixed number of hours before each
 * resolved market closes and scores both the crowd signal and the market
 * price against the realized outcome.
 *
 * Produces:
 * - Brier and log-loss for both series and the Brier improvement
 * - 10-bin calibration tables for both series
 * - Edge buckets by |divergence| with win rates
 * - The most divergent individual cases
 *
 * A sweep repeats the evaluation for every integer cutoff hour and stops at
 * the first hour with no eligible markets.
 */

import { randomUUID } from "node:crypto";
import { env } from "../config/env.ts";
import { CALIBRATION_BINS, TOP_DIVERGENCE_CASES } from "../config/constants.ts";
import {
  brierScore,
  hoursBetween,
  logLoss,
  mean,
  minDate,
  MS_PER_HOUR,
  round,
  topByAbs,
} from "../lib/math-utils.ts";
import { buildMarketSnapshot } from "./market-snapshot.ts";
import type { ResolvedMarket, SmartCrowdStore } from "./store.ts";
import { logger, timeOperation, withContext } from "./structured-logger.ts";

const SERVICE = "backtest";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One resolved market evaluated at one cutoff */
export interface BacktestRecord {
  marketId: string;
  /** ISO-8601 UTC */
  cutoffTime: string;
  marketProb: number;
  aggregateProb: number;
  outcome: 0 | 1;
  confidence: number;
  divergence: number;
  disagreement: number;
  integrityRisk: number;
  activeWallets: number;
}

export interface CalibrationBin {
  bin: number;
  count: number;
  avgProb: number | null;
  empirical: number | null;
}

export type EdgeBucketLabel = "0-2%" | "2-5%" | "5-10%" | "10%+";

export interface EdgeBucket {
  bucket: EdgeBucketLabel;
  count: number;
  /** Mean of (market abs error − crowd abs error) */
  avgEdge: number;
  /** Share of markets where the crowd signal's abs error was strictly lower */
  winRate: number;
}

export type CaseWinner = "crowd" | "market" | "tie";

export interface DivergenceCase extends BacktestRecord {
  aggregateAbsError: number;
  marketAbsError: number;
  winner: CaseWinner;
}

interface ReportHeader {
  runId: string;
  cutoffHours: number;
  /** ISO-8601 UTC */
  evaluatedAt: string;
}

export interface CompleteBacktestReport extends ReportHeader {
  status: "complete";
  totalMarkets: number;
  aggregateBrier: number;
  marketBrier: number;
  /** marketBrier − aggregateBrier; positive means the crowd signal did better */
  brierImprovement: number;
  logLoss: { market: number; aggregate: number };
  calibration: { market: CalibrationBin[]; aggregate: CalibrationBin[] };
  edgeBuckets: EdgeBucket[];
  topDivergenceCases: DivergenceCase[];
}

export interface EmptyBacktestReport extends ReportHeader {
  status: "empty";
  totalMarkets: 0;
  note: string;
}

export type BacktestReport = CompleteBacktestReport | EmptyBacktestReport;

export type SweepHour =
  | { cutoffHours: number; totalMarkets: 0 }
  | {
      cutoffHours: number;
      totalMarkets: number;
      aggregateBrier: number;
      marketBrier: number;
      brierImprovement: number;
      /** Improvement relative to the market's Brier, in percent */
      brierImprovementPct: number;
      edgeBuckets: EdgeBucket[];
    };

export interface BacktestSweep {
  runId: string;
  maxHours: number;
  evaluatedAt: string;
  totalResolvedMarkets: number;
  hoursEvaluated: number;
  hourlyResults: SweepHour[];
}

export interface BacktestOptions {
  runId?: string;
  /** Evaluation clock; defaults to now */
  now?: Date;
}

const EDGE_BUCKETS: ReadonlyArray<{ low: number; high: number; label: EdgeBucketLabel }> = [
  { low: 0.0, high: 0.02, label: "0-2%" },
  { low: 0.02, high: 0.05, label: "2-5%" },
  { low: 0.05, high: 0.1, label: "5-10%" },
  { low: 0.1, high: 1.01, label: "10%+" },
];

// ---------------------------------------------------------------------------
// Scoring helpers
// ---------------------------------------------------------------------------

/**
 * Group forecasts into equal-width probability bins. Bin index is
 * floor(p × bins), with p = 1 folded into the top bin. Empty bins report
 * null averages.
 */
export function calibrationBins(
  probs: readonly number[],
  outcomes: readonly number[],
  bins: number = CALIBRATION_BINS,
): CalibrationBin[] {
  const grouped: Array<{ probSum: number; outcomeSum: number; count: number }> = Array.from(
    { length: bins },
    () => ({ probSum: 0, outcomeSum: 0, count: 0 }),
  );
  probs.forEach((p, i) => {
    const idx = Math.max(0, Math.min(bins - 1, Math.floor(p * bins)));
    const bin = grouped[idx];
    if (!bin) return;
    bin.probSum += p;
    bin.outcomeSum += outcomes[i] ?? 0;
    bin.count++;
  });
  return grouped.map((g, bin) => ({
    bin,
    count: g.count,
    avgProb: g.count === 0 ? null : g.probSum / g.count,
    empirical: g.count === 0 ? null : g.outcomeSum / g.count,
  }));
}

function absErrors(record: BacktestRecord): { aggregate: number; market: number } {
  return {
    aggregate: Math.abs(record.aggregateProb - record.outcome),
    market: Math.abs(record.marketProb - record.outcome),
  };
}

/**
 * Partition records by |divergence| into the fixed edge buckets. Each bucket
 * is half-open [low, high).
 */
export function edgeBucketStats(records: readonly BacktestRecord[]): EdgeBucket[] {
  return EDGE_BUCKETS.map(({ low, high, label }) => {
    const subset = records.filter((r) => {
      const size = Math.abs(r.divergence);
      return size >= low && size < high;
    });
    if (subset.length === 0) {
      return { bucket: label, count: 0, avgEdge: 0, winRate: 0 };
    }
    let wins = 0;
    let edge = 0;
    for (const record of subset) {
      const err = absErrors(record);
      edge += err.market - err.aggregate;
      if (err.aggregate < err.market) wins++;
    }
    return {
      bucket: label,
      count: subset.length,
      avgEdge: edge / subset.length,
      winRate: wins / subset.length,
    };
  });
}

function divergenceCase(record: BacktestRecord): DivergenceCase {
  const err = absErrors(record);
  const winner: CaseWinner =
    err.aggregate < err.market ? "crowd" : err.aggregate > err.market ? "market" : "tie";
  return { ...record, aggregateAbsError: err.aggregate, marketAbsError: err.market, winner };
}

function brierPair(records: readonly BacktestRecord[]): { aggregate: number; market: number } {
  return {
    aggregate: mean(records.map((r) => brierScore(r.aggregateProb, r.outcome))),
    market: mean(records.map((r) => brierScore(r.marketProb, r.outcome))),
  };
}

/**
 * Build the report for one run from its evaluated records.
 */
export function summarizeBacktest(
  records: readonly BacktestRecord[],
  cutoffHours: number,
  runId: string,
  evaluatedAt: Date,
): BacktestReport {
  const header = { runId, cutoffHours, evaluatedAt: evaluatedAt.toISOString() };
  if (records.length === 0) {
    return {
      ...header,
      status: "empty",
      totalMarkets: 0,
      note: "No eligible resolved markets with data before cutoff.",
    };
  }

  const outcomes = records.map((r) => r.outcome);
  const aggregateProbs = records.map((r) => r.aggregateProb);
  const marketProbs = records.map((r) => r.marketProb);
  const brier = brierPair(records);

  return {
    ...header,
    status: "complete",
    totalMarkets: records.length,
    aggregateBrier: brier.aggregate,
    marketBrier: brier.market,
    brierImprovement: brier.market - brier.aggregate,
    logLoss: {
      market: mean(records.map((r) => logLoss(r.marketProb, r.outcome))),
      aggregate: mean(records.map((r) => logLoss(r.aggregateProb, r.outcome))),
    },
    calibration: {
      market: calibrationBins(marketProbs, outcomes),
      aggregate: calibrationBins(aggregateProbs, outcomes),
    },
    edgeBuckets: edgeBucketStats(records),
    topDivergenceCases: topByAbs(records, (r) => r.divergence, TOP_DIVERGENCE_CASES).map(
      divergenceCase,
    ),
  };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate one resolved market `cutoffHours` before it closed. Returns null
 * when the market has no trade at or before the cutoff, or when its trading
 * window is shorter than `cutoffHours`.
 */
export async function evaluateMarketAtCutoff(
  store: SmartCrowdStore,
  resolved: ResolvedMarket,
  cutoffHours: number,
  now: Date,
): Promise<BacktestRecord | null> {
  const { market, outcome } = resolved;
  const close = minDate(market.endTime, outcome.resolutionTime);
  const cutoff = minDate(new Date(close.getTime() - cutoffHours * MS_PER_HOUR), now);

  const firstTrade = await store.getFirstTradeTime(market.id, cutoff);
  if (!firstTrade) return null;
  if (hoursBetween(firstTrade, close) < cutoffHours) return null;

  const snapshot = await buildMarketSnapshot(store, market.id, {
    snapshotTime: cutoff,
    persist: false,
  });
  return {
    marketId: market.id,
    cutoffTime: cutoff.toISOString(),
    marketProb: snapshot.marketProb,
    aggregateProb: snapshot.aggregateProb,
    outcome: outcome.resolvedOutcome,
    confidence: snapshot.confidence,
    divergence: snapshot.divergence,
    disagreement: snapshot.disagreement,
    integrityRisk: snapshot.integrityRisk,
    activeWallets: snapshot.activeWallets,
  };
}

async function evaluateAll(
  store: SmartCrowdStore,
  resolved: readonly ResolvedMarket[],
  cutoffHours: number,
  now: Date,
): Promise<BacktestRecord[]> {
  const records: BacktestRecord[] = [];
  for (const market of resolved) {
    const record = await evaluateMarketAtCutoff(store, market, cutoffHours, now);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Evaluate every resolved market at one cutoff and persist the records and
 * report, replacing any earlier run with the same id.
 */
export async function runBacktest(
  store: SmartCrowdStore,
  cutoffHours: number = env.SMARTCROWD_BACKTEST_CUTOFF_HOURS,
  options: BacktestOptions = {},
): Promise<BacktestReport> {
  const runId = options.runId ?? randomUUID().replaceAll("-", "");
  const now = options.now ?? new Date();

  return withContext({ runId }, () => timeOperation(SERVICE, "runBacktest", async () => {
    const resolved = await store.listResolvedMarkets();
    const records = await evaluateAll(store, resolved, cutoffHours, now);
    const report = summarizeBacktest(records, cutoffHours, runId, now);
    await store.saveBacktestRun(runId, records, report);

    logger.info(SERVICE, "Backtest complete", {
      cutoffHours,
      resolvedMarkets: resolved.length,
      eligibleMarkets: records.length,
      brierImprovement: report.status === "complete" ? report.brierImprovement : null,
    });
    return report;
  }));
}

/**
 * Run the evaluation for every integer cutoff from 1 to `maxHours`. The
 * first hour with no eligible markets is reported with `totalMarkets: 0`
 * and ends the sweep. Sweeps are not persisted.
 */
export async function runBacktestSweep(
  store: SmartCrowdStore,
  maxHours: number = env.SMARTCROWD_SWEEP_MAX_HOURS,
  options: { now?: Date } = {},
): Promise<BacktestSweep> {
  const runId = randomUUID().replaceAll("-", "");
  const now = options.now ?? new Date();

  return withContext({ runId }, () => timeOperation(SERVICE, "runBacktestSweep", async () => {
    const resolved = await store.listResolvedMarkets();
    const hourlyResults: SweepHour[] = [];

    for (let hours = 1; hours <= maxHours; hours++) {
      const records = await evaluateAll(store, resolved, hours, now);
      if (records.length === 0) {
        hourlyResults.push({ cutoffHours: hours, totalMarkets: 0 });
        break;
      }
      const brier = brierPair(records);
      const improvement = brier.market - brier.aggregate;
      const improvementPct = brier.market > 0 ? (improvement / brier.market) * 100 : 0;
      hourlyResults.push({
        cutoffHours: hours,
        totalMarkets: records.length,
        aggregateBrier: round(brier.aggregate, 6),
        marketBrier: round(brier.market, 6),
        brierImprovement: round(improvement, 6),
        brierImprovementPct: round(improvementPct, 2),
        edgeBuckets: edgeBucketStats(records),
      });
    }

    logger.info(SERVICE, "Backtest sweep complete", {
      maxHours,
      resolvedMarkets: resolved.length,
      hoursEvaluated: hourlyResults.length,
    });
    return {
      runId,
      maxHours,
      evaluatedAt: now.toISOString(),
      totalResolvedMarkets: resolved.length,
      hoursEvaluated: hourlyResults.length,
      hourlyResults,
    };
  }));
}

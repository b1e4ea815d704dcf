/**
 * Wallet Performance Metrics
 *
 * Scores every wallet's belief on every resolved market against the realized
 * outcome and aggregates accuracy and trading-style statistics into four
 * groupings per wallet:
 *
 *   (wallet, ALL, ALL)  (wallet, category, ALL)
 *   (wallet, ALL, horizon)  (wallet, category, horizon)
 *
 * This is a full recompute: the metrics table is replaced in one transaction
 * on every pass. Resolved markets are streamed from the store one at a time.
 */

import { env } from "../config/env.ts";
import {
  ALL,
  HORIZON_INTRADAY_HOURS,
  HORIZON_MEDIUM_HOURS,
  HORIZON_SHORT_HOURS,
  TIMING_NOISE_THRESHOLD,
  UNKNOWN_CATEGORY,
} from "../config/constants.ts";
import {
  brierScore,
  concentration,
  hoursBetween,
  logLoss,
  minDate,
} from "../lib/math-utils.ts";
import {
  groupTradesByWallet,
  impliedYesPrice,
  inferBelief,
  isWellFormedTrade,
  yesDirection,
} from "./beliefs.ts";
import type {
  ResolvedMarketTrades,
  SmartCrowdStore,
  TradeRow,
  WalletMetricRow,
} from "./store.ts";
import { logger, timeOperation } from "./structured-logger.ts";

const SERVICE = "wallet-metrics";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HorizonBucket = "intraday" | "short" | "medium" | "long";

interface MetricAccum {
  marketCount: number;
  tradeCount: number;
  sumBrier: number;
  sumLogLoss: number;
  sumBelief: number;
  sumOutcome: number;
  sumTradeSize: number;
  sumChurn: number;
  sumPersistence: number;
  sumTimingEdge: number;
  sumPnl: number;
  sumCost: number;
}

/** Everything a single (market, wallet) pair contributes to its groupings */
export interface WalletMarketScore {
  wallet: string;
  category: string;
  horizon: HorizonBucket;
  tradeCount: number;
  totalSize: number;
  belief: number;
  outcome: 0 | 1;
  brier: number;
  logLoss: number;
  churn: number;
  persistence: number;
  timingEdge: number;
  pnl: number;
  cost: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Bucket the time between a reference instant and market close.
 * Boundaries are inclusive: exactly 24h is still intraday.
 */
export function horizonBucket(endTime: Date, refTime: Date): HorizonBucket {
  const hours = hoursBetween(refTime, endTime);
  if (hours <= HORIZON_INTRADAY_HOURS) return "intraday";
  if (hours <= HORIZON_SHORT_HOURS) return "short";
  if (hours <= HORIZON_MEDIUM_HOURS) return "medium";
  return "long";
}

export function normalizeCategory(category: string | null | undefined): string {
  const trimmed = (category ?? "").trim();
  return trimmed ? trimmed.toLowerCase() : UNKNOWN_CATEGORY;
}

/**
 * Implied YES price of the last trade at or before resolution, or null when
 * the market never traded before resolving. `trades` must be time-ordered.
 */
export function finalYesPrice(trades: readonly TradeRow[], resolutionTime: Date): number | null {
  let finalYes: number | null = null;
  for (const trade of trades) {
    if (trade.ts.getTime() <= resolutionTime.getTime()) {
      finalYes = impliedYesPrice(trade.side, trade.price);
    }
  }
  return finalYes;
}

/**
 * Fraction of trades whose direction anticipated the move to the final
 * price, rescaled from [0, 1] to [-1, 1]. Moves within the noise threshold
 * are ignored; 0 when nothing qualifies.
 */
export function timingEdge(trades: readonly TradeRow[], finalYes: number | null): number {
  if (finalYes === null) return 0;
  let hits = 0;
  let counted = 0;
  for (const trade of trades) {
    const move = finalYes - impliedYesPrice(trade.side, trade.price);
    if (Math.abs(move) > TIMING_NOISE_THRESHOLD) {
      counted++;
      if (yesDirection(trade.side, trade.action) * move > 0) hits++;
    }
  }
  return counted === 0 ? 0 : (2 * hits) / counted - 1;
}

/**
 * Mark-to-resolution P&L: a YES token is worth the outcome, a NO token one
 * minus the outcome. Cost is the notional paid or received.
 */
export function markToResolution(
  trades: readonly TradeRow[],
  outcome: 0 | 1,
): { pnl: number; cost: number } {
  let pnl = 0;
  let cost = 0;
  for (const trade of trades) {
    const tokenValue = trade.side === "YES" ? outcome : 1 - outcome;
    pnl += trade.action === "BUY"
      ? (tokenValue - trade.price) * trade.size
      : (trade.price - tokenValue) * trade.size;
    cost += Math.max(trade.price * trade.size, 1e-9);
  }
  return { pnl, cost };
}

/**
 * Score one wallet on one resolved market. `trades` is that wallet's
 * time-ordered trades on the market.
 */
export function scoreWalletMarket(
  group: ResolvedMarketTrades,
  wallet: string,
  trades: readonly TradeRow[],
  finalYes: number | null,
  halfLifeHours: number,
): WalletMarketScore | null {
  const first = trades[0];
  if (!first) return null;

  const { market, outcome } = group;
  const cutoff = minDate(market.endTime, outcome.resolutionTime);
  const signal = inferBelief(trades, cutoff, halfLifeHours);
  const result = outcome.resolvedOutcome;
  const { pnl, cost } = markToResolution(trades, result);

  return {
    wallet,
    category: normalizeCategory(market.category),
    horizon: horizonBucket(market.endTime, first.ts),
    tradeCount: trades.length,
    totalSize: trades.reduce((acc, t) => acc + t.size, 0),
    belief: signal.belief,
    outcome: result,
    brier: brierScore(signal.belief, result),
    logLoss: logLoss(signal.belief, result),
    churn: signal.churn,
    persistence: signal.persistence,
    timingEdge: timingEdge(trades, finalYes),
    pnl,
    cost,
  };
}

function emptyAccum(): MetricAccum {
  return {
    marketCount: 0,
    tradeCount: 0,
    sumBrier: 0,
    sumLogLoss: 0,
    sumBelief: 0,
    sumOutcome: 0,
    sumTradeSize: 0,
    sumChurn: 0,
    sumPersistence: 0,
    sumTimingEdge: 0,
    sumPnl: 0,
    sumCost: 0,
  };
}

// ---------------------------------------------------------------------------
// Accumulator
// ---------------------------------------------------------------------------

/**
 * Streaming aggregator: feed resolved markets one by one with `addMarket`,
 * then call `finish` once. Memory is bounded by wallets × groupings, not by
 * the number of trades.
 */
export class WalletMetricsAccumulator {
  private readonly accums = new Map<string, { key: [string, string, string]; accum: MetricAccum }>();
  private readonly categoryTrades = new Map<string, Map<string, number>>();
  private marketsSeen = 0;

  constructor(private readonly halfLifeHours: number = env.SMARTCROWD_HALF_LIFE_HOURS) {}

  get marketCount(): number {
    return this.marketsSeen;
  }

  addMarket(group: ResolvedMarketTrades): void {
    this.marketsSeen++;
    const trades = group.trades.filter(isWellFormedTrade);
    const finalYes = finalYesPrice(trades, group.outcome.resolutionTime);

    for (const [wallet, walletTrades] of groupTradesByWallet(trades)) {
      const score = scoreWalletMarket(group, wallet, walletTrades, finalYes, this.halfLifeHours);
      if (!score) continue;
      this.addScore(score);
    }
  }

  addScore(score: WalletMarketScore): void {
    const counts = this.categoryTrades.get(score.wallet) ?? new Map<string, number>();
    counts.set(score.category, (counts.get(score.category) ?? 0) + score.tradeCount);
    this.categoryTrades.set(score.wallet, counts);

    const keys: Array<[string, string, string]> = [
      [score.wallet, ALL, ALL],
      [score.wallet, score.category, ALL],
      [score.wallet, ALL, score.horizon],
      [score.wallet, score.category, score.horizon],
    ];
    for (const key of keys) {
      const id = key.join("\u0000");
      let entry = this.accums.get(id);
      if (!entry) {
        entry = { key, accum: emptyAccum() };
        this.accums.set(id, entry);
      }
      const a = entry.accum;
      a.marketCount++;
      a.tradeCount += score.tradeCount;
      a.sumBrier += score.brier;
      a.sumLogLoss += score.logLoss;
      a.sumBelief += score.belief;
      a.sumOutcome += score.outcome;
      a.sumTradeSize += score.totalSize;
      a.sumChurn += score.churn;
      a.sumPersistence += score.persistence;
      a.sumTimingEdge += score.timingEdge;
      a.sumPnl += score.pnl;
      a.sumCost += score.cost;
    }
  }

  /** Specialization of a wallet across categories by trade count */
  specialization(wallet: string): number {
    const counts = this.categoryTrades.get(wallet);
    if (!counts) return 0;
    return concentration([...counts.values()]);
  }

  finish(updatedAt: Date): WalletMetricRow[] {
    const rows: WalletMetricRow[] = [];
    for (const { key, accum: a } of this.accums.values()) {
      if (a.marketCount === 0 || a.tradeCount === 0) continue;
      const [wallet, category, horizonBucketKey] = key;
      const n = a.marketCount;
      rows.push({
        wallet,
        category,
        horizonBucket: horizonBucketKey,
        sampleMarkets: n,
        sampleTrades: a.tradeCount,
        brier: a.sumBrier / n,
        logLoss: a.sumLogLoss / n,
        roi: a.sumPnl / Math.max(a.sumCost, 1e-9),
        calibrationError: Math.abs(a.sumBelief / n - a.sumOutcome / n),
        avgTradeSize: a.sumTradeSize / a.tradeCount,
        churn: a.sumChurn / n,
        persistence: a.sumPersistence / n,
        specialization: this.specialization(wallet),
        timingEdge: a.sumTimingEdge / n,
        updatedAt,
      });
    }
    return rows;
  }
}

// ---------------------------------------------------------------------------
// Recompute
// ---------------------------------------------------------------------------

/**
 * Rebuild the wallet_metrics table from every resolved market.
 */
export async function recomputeWalletMetrics(
  store: SmartCrowdStore,
  options: { halfLifeHours?: number; now?: Date } = {},
): Promise<{ rowsWritten: number }> {
  return timeOperation(SERVICE, "recomputeWalletMetrics", async () => {
    const accumulator = new WalletMetricsAccumulator(
      options.halfLifeHours ?? env.SMARTCROWD_HALF_LIFE_HOURS,
    );
    for await (const group of store.streamResolvedMarkets()) {
      accumulator.addMarket(group);
    }

    const rows = accumulator.finish(options.now ?? new Date());
    await store.replaceWalletMetrics(rows);

    logger.info(SERVICE, "Wallet metrics recomputed", {
      resolvedMarkets: accumulator.marketCount,
      rowsWritten: rows.length,
    });
    return { rowsWritten: rows.length };
  });
}

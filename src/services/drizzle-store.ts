/**
 * Drizzle Store
 *
 * PostgreSQL implementation of the SmartCrowdStore contract on Drizzle ORM.
 * Whole-table replaces and backtest-run writes each run in one transaction,
 * so readers never observe a half-rewritten table.
 */

import { and, asc, desc, eq, gte, inArray, isNull, lte, sql } from "drizzle-orm";
import { ALL } from "../config/constants.ts";
import type { Database } from "../db/index.ts";
import {
  backtestReports,
  marketBacktests,
  marketSnapshots,
  markets,
  outcomes,
  trades,
  walletMetrics,
  walletWeights,
} from "../db/schema/index.ts";
import { chunk } from "../lib/math-utils.ts";
import type { BacktestRecord, BacktestReport } from "./backtest.ts";
import { assertValidTrade } from "./beliefs.ts";
import type { MarketSnapshot } from "./market-snapshot.ts";
import type {
  MarketRow,
  ResolvedMarket,
  ResolvedMarketTrades,
  ScreenerRow,
  SmartCrowdStore,
  TradeRow,
  WalletMetricRow,
  WalletWeightRow,
} from "./store.ts";

/** Rows per multi-row INSERT */
const INSERT_BATCH_SIZE = 500;

type SnapshotRow = typeof marketSnapshots.$inferSelect;

function toOutcome(value: number): 0 | 1 {
  return value === 1 ? 1 : 0;
}

function snapshotFromRow(row: SnapshotRow): MarketSnapshot {
  return {
    marketId: row.marketId,
    snapshotTime: row.snapshotTime.toISOString(),
    marketProb: row.marketProb,
    aggregateProb: row.aggregateProb,
    divergence: row.divergence,
    confidence: row.confidence,
    disagreement: row.disagreement,
    participationQuality: row.participationQuality,
    integrityRisk: row.integrityRisk,
    activeWallets: row.activeWallets,
    topDrivers: row.topDrivers,
    cohortSummary: row.cohortSummary,
    flipConditions: row.flipConditions,
    explanation: row.explanation,
  };
}

export class DrizzleStore implements SmartCrowdStore {
  constructor(private readonly db: Database) {}

  // -------------------------------------------------------------------------
  // Markets and trades
  // -------------------------------------------------------------------------

  async getMarket(marketId: string): Promise<MarketRow | null> {
    const rows = await this.db
      .select({
        id: markets.id,
        question: markets.question,
        category: markets.category,
        endTime: markets.endTime,
        liquidity: markets.liquidity,
      })
      .from(markets)
      .where(eq(markets.id, marketId))
      .limit(1);
    return rows[0] ?? null;
  }

  async getMarketTrades(marketId: string, until: Date): Promise<TradeRow[]> {
    return this.tradesFor(marketId, until);
  }

  async getFirstTradeTime(marketId: string, until: Date): Promise<Date | null> {
    const rows = await this.db
      .select({ ts: trades.ts })
      .from(trades)
      .where(and(eq(trades.marketId, marketId), lte(trades.ts, until)))
      .orderBy(asc(trades.ts))
      .limit(1);
    return rows[0]?.ts ?? null;
  }

  async listResolvedMarkets(): Promise<ResolvedMarket[]> {
    const rows = await this.db
      .select({ market: markets, outcome: outcomes })
      .from(markets)
      .innerJoin(outcomes, eq(outcomes.marketId, markets.id))
      .orderBy(asc(markets.id));

    return rows.map(({ market, outcome }) => ({
      market: {
        id: market.id,
        question: market.question,
        category: market.category,
        endTime: market.endTime,
        liquidity: market.liquidity,
      },
      outcome: {
        marketId: outcome.marketId,
        resolvedOutcome: toOutcome(outcome.resolvedOutcome),
        resolutionTime: outcome.resolutionTime,
      },
    }));
  }

  async listSnapshotMarketIds(includeResolved: boolean): Promise<string[]> {
    const rows = await this.db
      .select({ marketId: markets.id })
      .from(markets)
      .leftJoin(outcomes, eq(outcomes.marketId, markets.id))
      .where(includeResolved ? undefined : isNull(outcomes.marketId))
      .orderBy(asc(markets.id));
    return rows.map((row) => row.marketId);
  }

  async *streamResolvedMarkets(): AsyncIterable<ResolvedMarketTrades> {
    for (const resolved of await this.listResolvedMarkets()) {
      yield { ...resolved, trades: await this.tradesFor(resolved.market.id) };
    }
  }

  /**
   * Ingestion-boundary write. Every row is validated first; a malformed row
   * aborts the whole batch with InputDataError.
   */
  async insertTrades(rows: readonly TradeRow[]): Promise<number> {
    rows.forEach(assertValidTrade);
    const values = rows.map((row) => ({
      marketId: row.marketId,
      wallet: row.wallet.toLowerCase(),
      ts: row.ts,
      side: row.side,
      action: row.action,
      price: row.price,
      size: row.size,
    }));
    await this.db.transaction(async (tx) => {
      for (const batch of chunk(values, INSERT_BATCH_SIZE)) {
        await tx.insert(trades).values(batch);
      }
    });
    return values.length;
  }

  private async tradesFor(marketId: string, until?: Date): Promise<TradeRow[]> {
    const where = until
      ? and(eq(trades.marketId, marketId), lte(trades.ts, until))
      : eq(trades.marketId, marketId);
    return this.db
      .select({
        id: trades.id,
        marketId: trades.marketId,
        wallet: trades.wallet,
        ts: trades.ts,
        side: trades.side,
        action: trades.action,
        price: trades.price,
        size: trades.size,
      })
      .from(trades)
      .where(where)
      .orderBy(asc(trades.ts), asc(trades.id));
  }

  // -------------------------------------------------------------------------
  // Wallet tables
  // -------------------------------------------------------------------------

  async listWalletMetrics(): Promise<WalletMetricRow[]> {
    return this.db.select().from(walletMetrics);
  }

  async replaceWalletMetrics(rows: readonly WalletMetricRow[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(walletMetrics);
      for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
        await tx.insert(walletMetrics).values(batch);
      }
    });
  }

  async getWalletProfiles(wallets: readonly string[]): Promise<WalletMetricRow[]> {
    if (wallets.length === 0) return [];
    return this.db
      .select()
      .from(walletMetrics)
      .where(
        and(
          inArray(walletMetrics.wallet, [...wallets]),
          eq(walletMetrics.category, ALL),
          eq(walletMetrics.horizonBucket, ALL),
        ),
      );
  }

  async getWalletWeights(wallets: readonly string[]): Promise<WalletWeightRow[]> {
    if (wallets.length === 0) return [];
    return this.db
      .select()
      .from(walletWeights)
      .where(inArray(walletWeights.wallet, [...wallets]));
  }

  async replaceWalletWeights(rows: readonly WalletWeightRow[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(walletWeights);
      for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
        await tx.insert(walletWeights).values(batch);
      }
    });
  }

  // -------------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------------

  async upsertSnapshot(snapshot: MarketSnapshot): Promise<void> {
    const values = { ...snapshot, snapshotTime: new Date(snapshot.snapshotTime) };
    const { marketId: _marketId, snapshotTime: _snapshotTime, ...set } = values;
    await this.db
      .insert(marketSnapshots)
      .values(values)
      .onConflictDoUpdate({
        target: [marketSnapshots.marketId, marketSnapshots.snapshotTime],
        set,
      });
  }

  async latestScreenerRows(limit: number, minConfidence: number): Promise<ScreenerRow[]> {
    const latest = this.db
      .selectDistinctOn([marketSnapshots.marketId])
      .from(marketSnapshots)
      .orderBy(asc(marketSnapshots.marketId), desc(marketSnapshots.snapshotTime))
      .as("latest");

    const rows = await this.db
      .select({
        snapshot: {
          marketId: latest.marketId,
          snapshotTime: latest.snapshotTime,
          marketProb: latest.marketProb,
          aggregateProb: latest.aggregateProb,
          divergence: latest.divergence,
          confidence: latest.confidence,
          disagreement: latest.disagreement,
          participationQuality: latest.participationQuality,
          integrityRisk: latest.integrityRisk,
          activeWallets: latest.activeWallets,
          topDrivers: latest.topDrivers,
          cohortSummary: latest.cohortSummary,
          flipConditions: latest.flipConditions,
          explanation: latest.explanation,
        },
        question: markets.question,
        category: markets.category,
        endTime: markets.endTime,
      })
      .from(latest)
      .innerJoin(markets, eq(markets.id, latest.marketId))
      .where(gte(latest.confidence, minConfidence))
      .orderBy(desc(sql`abs(${latest.divergence})`), asc(latest.marketId))
      .limit(limit);

    return rows.map((row) => ({
      ...snapshotFromRow(row.snapshot),
      question: row.question,
      category: row.category,
      endTime: row.endTime,
    }));
  }

  // -------------------------------------------------------------------------
  // Backtests
  // -------------------------------------------------------------------------

  async saveBacktestRun(
    runId: string,
    records: readonly BacktestRecord[],
    report: BacktestReport,
  ): Promise<void> {
    const rows = records.map((record) => ({
      ...record,
      runId,
      cutoffTime: new Date(record.cutoffTime),
    }));
    const generatedAt = new Date(report.evaluatedAt);

    await this.db.transaction(async (tx) => {
      await tx.delete(marketBacktests).where(eq(marketBacktests.runId, runId));
      for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
        await tx.insert(marketBacktests).values(batch);
      }
      await tx
        .insert(backtestReports)
        .values({ runId, generatedAt, summary: report })
        .onConflictDoUpdate({
          target: backtestReports.runId,
          set: { generatedAt, summary: report },
        });
    });
  }
}

/**
 * SmartCrowd Store Contract
 *
 * The tabular store the engine reads trades, markets and outcomes from and
 * writes wallet tables, snapshots and backtests to. Every engine operation
 * takes a store explicitly; nothing in the engine holds process-wide state.
 *
 * Write semantics:
 *   - Wallet metrics / weights: whole-table replace, atomic
 *   - Snapshots: upsert by (marketId, snapshotTime)
 *   - Backtest runs: replace every row for the runId, atomic
 */

import type { BacktestRecord, BacktestReport } from "./backtest.ts";
import type { MarketSnapshot } from "./market-snapshot.ts";

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export type TradeSide = "YES" | "NO";
export type TradeAction = "BUY" | "SELL";

export interface TradeRow {
  /** Store-assigned ID; orders trades that share a timestamp */
  id?: number;
  marketId: string;
  /** Lower-cased wallet address */
  wallet: string;
  ts: Date;
  side: TradeSide;
  action: TradeAction;
  /** Fill price of the traded token */
  price: number;
  size: number;
}

export interface MarketRow {
  id: string;
  question: string;
  category: string;
  endTime: Date;
  liquidity: number;
}

export interface OutcomeRow {
  marketId: string;
  resolvedOutcome: 0 | 1;
  resolutionTime: Date;
}

export interface ResolvedMarket {
  market: MarketRow;
  outcome: OutcomeRow;
}

/** One resolved market with every trade on it, ordered by (ts, id) */
export interface ResolvedMarketTrades extends ResolvedMarket {
  trades: TradeRow[];
}

/** Grouping key shared by wallet metrics and wallet weights */
export interface WalletKey {
  wallet: string;
  /** Lower-cased category or "ALL" */
  category: string;
  /** Horizon bucket or "ALL" */
  horizonBucket: string;
}

export interface WalletMetricRow extends WalletKey {
  sampleMarkets: number;
  sampleTrades: number;
  brier: number;
  logLoss: number;
  roi: number;
  calibrationError: number;
  avgTradeSize: number;
  churn: number;
  persistence: number;
  specialization: number;
  timingEdge: number;
  updatedAt: Date;
}

export interface WalletWeightRow extends WalletKey {
  weight: number;
  uncertainty: number;
  support: number;
  updatedAt: Date;
}

/** Latest snapshot of a market joined with its market row */
export interface ScreenerRow extends MarketSnapshot {
  question: string;
  category: string;
  endTime: Date;
}

// ---------------------------------------------------------------------------
// Store interface
// ---------------------------------------------------------------------------

export interface SmartCrowdStore {
  getMarket(marketId: string): Promise<MarketRow | null>;

  /** Trades on a market at or before `until`, ordered by (ts, id) */
  getMarketTrades(marketId: string, until: Date): Promise<TradeRow[]>;

  /** Timestamp of the earliest trade at or before `until` */
  getFirstTradeTime(marketId: string, until: Date): Promise<Date | null>;

  listResolvedMarkets(): Promise<ResolvedMarket[]>;

  /** Every market id, ascending; resolved markets only on request */
  listSnapshotMarketIds(includeResolved: boolean): Promise<string[]>;

  /**
   * Yields resolved markets one at a time together with their trades, so a
   * full recompute never holds the whole trade log in memory.
   */
  streamResolvedMarkets(): AsyncIterable<ResolvedMarketTrades>;

  listWalletMetrics(): Promise<WalletMetricRow[]>;
  replaceWalletMetrics(rows: readonly WalletMetricRow[]): Promise<void>;

  /** Global (ALL, ALL) metric rows for the given wallets */
  getWalletProfiles(wallets: readonly string[]): Promise<WalletMetricRow[]>;

  /** Every weight row (any grouping) for the given wallets */
  getWalletWeights(wallets: readonly string[]): Promise<WalletWeightRow[]>;
  replaceWalletWeights(rows: readonly WalletWeightRow[]): Promise<void>;

  upsertSnapshot(snapshot: MarketSnapshot): Promise<void>;

  /** Newest snapshot per market with confidence ≥ minConfidence, by |divergence| desc */
  latestScreenerRows(limit: number, minConfidence: number): Promise<ScreenerRow[]>;

  saveBacktestRun(
    runId: string,
    records: readonly BacktestRecord[],
    report: BacktestReport,
  ): Promise<void>;
}

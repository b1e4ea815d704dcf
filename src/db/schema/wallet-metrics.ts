/**
 * Wallet Scoring Schema
 *
 * Both tables are rewritten in full by each recompute pass and keyed by
 * (wallet, category, horizon_bucket), where category and horizon_bucket may
 * hold the literal "ALL" wildcard.
 *
 * Tables:
 *   wallet_metrics: Accuracy and trading-style statistics per grouping
 *   wallet_weights: Shrinkage-adjusted trust weight per grouping
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  primaryKey,
} from "drizzle-orm/pg-core";

// ---------------------------------------------------------------------------
// wallet_metrics
// ---------------------------------------------------------------------------

export const walletMetrics = pgTable(
  "wallet_metrics",
  {
    wallet: text("wallet").notNull(),
    category: text("category").notNull(),
    horizonBucket: text("horizon_bucket").notNull(),

    /** Resolved markets backing this row */
    sampleMarkets: integer("sample_markets").notNull(),
    sampleTrades: integer("sample_trades").notNull(),

    brier: doublePrecision("brier").notNull(),
    logLoss: doublePrecision("log_loss").notNull(),
    roi: doublePrecision("roi").notNull(),
    calibrationError: doublePrecision("calibration_error").notNull(),
    avgTradeSize: doublePrecision("avg_trade_size").notNull(),
    churn: doublePrecision("churn").notNull(),
    persistence: doublePrecision("persistence").notNull(),
    specialization: doublePrecision("specialization").notNull(),

    /** Fraction of trades that anticipated the late price move, rescaled to [-1, 1] */
    timingEdge: doublePrecision("timing_edge").notNull(),

    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.wallet, table.category, table.horizonBucket] }),
  ],
);

// ---------------------------------------------------------------------------
// wallet_weights
// ---------------------------------------------------------------------------

export const walletWeights = pgTable(
  "wallet_weights",
  {
    wallet: text("wallet").notNull(),
    category: text("category").notNull(),
    horizonBucket: text("horizon_bucket").notNull(),

    /** Trust multiplier in [0.10, 4.00] */
    weight: doublePrecision("weight").notNull(),

    /** [0, 1]; higher for thin or poorly calibrated samples */
    uncertainty: doublePrecision("uncertainty").notNull(),

    /** sample_markets of the metric row this weight came from */
    support: integer("support").notNull(),

    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.wallet, table.category, table.horizonBucket] }),
  ],
);

/**
 * Market Data Schema
 *
 * Normalized market, trade and outcome rows. These tables are written by the
 * ingestion pipeline and only read by the engine.
 *
 * Tables:
 *   markets: Binary prediction-market questions
 *   trades: Individual wallet fills (immutable)
 *   outcomes: Resolution of a market (one row per resolved market)
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

// ---------------------------------------------------------------------------
// markets
// ---------------------------------------------------------------------------

export const markets = pgTable("markets", {
  /** Provider market identifier */
  id: text("id").primaryKey(),

  question: text("question").notNull().default(""),

  /** Scheduled close of trading */
  endTime: timestamp("end_time", { withTimezone: true, mode: "date" }).notNull(),

  /** Free-form category label (lower-cased by the engine; "unknown" when blank) */
  category: text("category").notNull().default("unknown"),

  liquidity: doublePrecision("liquidity").notNull().default(0),

  resolutionSource: text("resolution_source").notNull().default(""),

  createdAt: timestamp("created_at", { withTimezone: true, mode: "date" })
    .defaultNow()
    .notNull(),
});

// ---------------------------------------------------------------------------
// trades
// ---------------------------------------------------------------------------

export const trades = pgTable(
  "trades",
  {
    /** Auto-generated ID; breaks ties between trades sharing a timestamp */
    id: integer("id").primaryKey().generatedAlwaysAsIdentity(),

    /** Provider fill ID (idempotency key for ingestion) */
    externalId: text("external_id").unique(),

    marketId: text("market_id")
      .references(() => markets.id, { onDelete: "cascade" })
      .notNull(),

    /** Wallet address, lower-cased */
    wallet: text("wallet").notNull(),

    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),

    /** Outcome token traded: 'YES' or 'NO' */
    side: text("side", { enum: ["YES", "NO"] }).notNull(),

    /** 'BUY' or 'SELL' */
    action: text("action", { enum: ["BUY", "SELL"] }).notNull().default("BUY"),

    /** Fill price of the traded token, in [0, 1] */
    price: doublePrecision("price").notNull(),

    /** Token quantity, > 0 */
    size: doublePrecision("size").notNull(),
  },
  (table) => [
    index("idx_trades_market_ts").on(table.marketId, table.ts),
    index("idx_trades_wallet_ts").on(table.wallet, table.ts),
  ],
);

// ---------------------------------------------------------------------------
// outcomes
// ---------------------------------------------------------------------------

export const outcomes = pgTable("outcomes", {
  marketId: text("market_id")
    .primaryKey()
    .references(() => markets.id, { onDelete: "cascade" }),

  /** 1 = resolved YES, 0 = resolved NO */
  resolvedOutcome: integer("resolved_outcome").notNull(),

  resolutionTime: timestamp("resolution_time", {
    withTimezone: true,
    mode: "date",
  }).notNull(),
});

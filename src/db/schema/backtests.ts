/**
 * Backtest Schema
 *
 * Write-once per run_id: re-running a backtest under the same run_id
 * replaces every row for that id.
 *
 * Tables:
 *   market_backtests: One evaluated market per run
 *   backtest_reports: Aggregate report per run
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  index,
  primaryKey,
} from "drizzle-orm/pg-core";
import type { BacktestReport } from "../../services/backtest.ts";

export const marketBacktests = pgTable(
  "market_backtests",
  {
    runId: text("run_id").notNull(),
    marketId: text("market_id").notNull(),
    cutoffTime: timestamp("cutoff_time", { withTimezone: true, mode: "date" }).notNull(),
    marketProb: doublePrecision("market_prob").notNull(),
    aggregateProb: doublePrecision("aggregate_prob").notNull(),
    /** Realized binary outcome */
    outcome: integer("outcome").notNull(),
    confidence: doublePrecision("confidence").notNull(),
    divergence: doublePrecision("divergence").notNull(),
    disagreement: doublePrecision("disagreement").notNull(),
    integrityRisk: doublePrecision("integrity_risk").notNull(),
    activeWallets: integer("active_wallets").notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.runId, table.marketId] }),
    index("idx_market_backtests_run").on(table.runId),
  ],
);

export const backtestReports = pgTable("backtest_reports", {
  runId: text("run_id").primaryKey(),
  generatedAt: timestamp("generated_at", { withTimezone: true, mode: "date" }).notNull(),
  summary: jsonb("summary").$type<BacktestReport>().notNull(),
});

/**
 * Market Snapshot Schema
 *
 * Append-only time series of crowd-signal estimates. At most one row per
 * (market_id, snapshot_time); re-snapshotting the same instant overwrites it.
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  primaryKey,
} from "drizzle-orm/pg-core";
import { markets } from "./markets.ts";
import type {
  CohortSummaryEntry,
  FlipCondition,
  SnapshotExplanation,
  TopDriver,
} from "../../services/market-snapshot.ts";

export const marketSnapshots = pgTable(
  "market_snapshots",
  {
    marketId: text("market_id")
      .references(() => markets.id, { onDelete: "cascade" })
      .notNull(),
    snapshotTime: timestamp("snapshot_time", { withTimezone: true, mode: "date" }).notNull(),

    /** Last observed market-implied YES price at/before snapshot_time */
    marketProb: doublePrecision("market_prob").notNull(),

    /** Crowd-signal estimate */
    aggregateProb: doublePrecision("aggregate_prob").notNull(),

    /** aggregate_prob − market_prob */
    divergence: doublePrecision("divergence").notNull(),

    confidence: doublePrecision("confidence").notNull(),
    disagreement: doublePrecision("disagreement").notNull(),
    participationQuality: doublePrecision("participation_quality").notNull(),
    integrityRisk: doublePrecision("integrity_risk").notNull(),
    activeWallets: integer("active_wallets").notNull(),

    topDrivers: jsonb("top_drivers").$type<TopDriver[]>().notNull(),
    cohortSummary: jsonb("cohort_summary").$type<CohortSummaryEntry[]>().notNull(),
    flipConditions: jsonb("flip_conditions").$type<FlipCondition[]>().notNull(),
    explanation: jsonb("explanation").$type<SnapshotExplanation>().notNull(),
  },
  (table) => [primaryKey({ columns: [table.marketId, table.snapshotTime] })],
);

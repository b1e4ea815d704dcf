/**
 * Wallet Performance Metrics Tests
 */

import { describe, it, expect } from "vitest";
import {
  WalletMetricsAccumulator,
  finalYesPrice,
  horizonBucket,
  markToResolution,
  normalizeCategory,
  recomputeWalletMetrics,
  timingEdge,
} from "../wallet-metrics.ts";
import type { ResolvedMarketTrades, TradeRow } from "../store.ts";
import { MemoryStore, hoursFrom } from "./memory-store.ts";

const T0 = new Date("2025-03-01T00:00:00Z");
const UPDATED_AT = new Date("2025-04-01T00:00:00Z");

function trade(overrides: Partial<TradeRow> = {}): TradeRow {
  return {
    id: 1,
    marketId: "m-1",
    wallet: "0xaaa",
    ts: T0,
    side: "YES",
    action: "BUY",
    price: 0.6,
    size: 4,
    ...overrides,
  };
}

function resolvedMarket(
  id: string,
  category: string,
  trades: TradeRow[],
  outcome: 0 | 1 = 1,
): ResolvedMarketTrades {
  const endTime = hoursFrom(T0, 10);
  return {
    market: { id, question: id, category, endTime, liquidity: 0 },
    outcome: { marketId: id, resolvedOutcome: outcome, resolutionTime: endTime },
    trades: trades.map((t) => ({ ...t, marketId: id })),
  };
}

describe("Wallet Performance Metrics", () => {
  describe("horizonBucket", () => {
    it("should treat bucket boundaries as inclusive", () => {
      expect(horizonBucket(hoursFrom(T0, 24), T0)).toBe("intraday");
      expect(horizonBucket(hoursFrom(T0, 25), T0)).toBe("short");
      expect(horizonBucket(hoursFrom(T0, 168), T0)).toBe("short");
      expect(horizonBucket(hoursFrom(T0, 720), T0)).toBe("medium");
      expect(horizonBucket(hoursFrom(T0, 721), T0)).toBe("long");
    });
  });

  describe("normalizeCategory", () => {
    it("should lower-case and trim", () => {
      expect(normalizeCategory("  Sports ")).toBe("sports");
    });

    it("should fall back to unknown for blank values", () => {
      expect(normalizeCategory("")).toBe("unknown");
      expect(normalizeCategory(null)).toBe("unknown");
    });
  });

  describe("finalYesPrice", () => {
    it("should use the last trade at or before resolution", () => {
      const trades = [
        trade({ id: 1, price: 0.4 }),
        trade({ id: 2, ts: hoursFrom(T0, 1), side: "NO", price: 0.25 }),
        trade({ id: 3, ts: hoursFrom(T0, 5), price: 0.9 }),
      ];
      expect(finalYesPrice(trades, hoursFrom(T0, 2))).toBeCloseTo(0.75, 12);
    });

    it("should be null when nothing traded before resolution", () => {
      expect(finalYesPrice([trade({ ts: hoursFrom(T0, 5) })], T0)).toBeNull();
    });
  });

  describe("timingEdge", () => {
    it("should rescale the hit rate to [-1, 1] and ignore small moves", () => {
      const trades = [
        trade({ id: 1, price: 0.4 }), // YES buy before a rise: hit
        trade({ id: 2, side: "NO", price: 0.3 }), // NO buy before a rise: miss
        trade({ id: 3, price: 0.898 }), // within the noise threshold
      ];
      expect(timingEdge(trades, 0.9)).toBe(0);
      expect(timingEdge(trades.slice(0, 1), 0.9)).toBe(1);
      expect(timingEdge(trades.slice(1, 2), 0.9)).toBe(-1);
    });

    it("should be 0 without a final price", () => {
      expect(timingEdge([trade()], null)).toBe(0);
    });
  });

  describe("markToResolution", () => {
    it("should value YES tokens at the outcome and NO tokens at its complement", () => {
      const result = markToResolution(
        [trade({ price: 0.4, size: 10 }), trade({ side: "NO", action: "SELL", price: 0.7, size: 10 })],
        1,
      );
      // (1 − 0.4)·10 + (0.7 − 0)·10
      expect(result.pnl).toBeCloseTo(13, 9);
      expect(result.cost).toBeCloseTo(11, 9);
    });
  });

  describe("WalletMetricsAccumulator", () => {
    it("should write four groupings for a single scored market", () => {
      const acc = new WalletMetricsAccumulator(48);
      acc.addMarket(resolvedMarket("m-1", "Politics", [trade()]));
      const rows = acc.finish(UPDATED_AT);

      expect(acc.marketCount).toBe(1);
      expect(rows.map((r) => [r.category, r.horizonBucket]).sort()).toEqual([
        ["ALL", "ALL"],
        ["ALL", "intraday"],
        ["politics", "ALL"],
        ["politics", "intraday"],
      ]);

      const global = rows.find((r) => r.category === "ALL" && r.horizonBucket === "ALL");
      expect(global).toMatchObject({
        wallet: "0xaaa",
        sampleMarkets: 1,
        sampleTrades: 1,
        avgTradeSize: 4,
        churn: 0,
        persistence: 1,
        specialization: 1,
        timingEdge: 0,
        updatedAt: UPDATED_AT,
      });
      expect(global?.brier).toBeCloseTo(0.04, 12);
      expect(global?.calibrationError).toBeCloseTo(0.2, 12);
      // pnl (1 − 0.6)·4 over cost 0.6·4
      expect(global?.roi).toBeCloseTo(1.6 / 2.4, 12);
    });

    it("should measure specialization by trade counts across categories", () => {
      const acc = new WalletMetricsAccumulator(48);
      acc.addMarket(resolvedMarket("m-1", "politics", [trade({ id: 1 }), trade({ id: 2 })]));
      acc.addMarket(resolvedMarket("m-2", "sports", [trade({ id: 3 }), trade({ id: 4 })]));
      expect(acc.specialization("0xaaa")).toBeCloseTo(0, 12);

      acc.addMarket(resolvedMarket("m-3", "sports", [trade({ id: 5 }), trade({ id: 6 })]));
      const expected = 1 - -((1 / 3) * Math.log(1 / 3) + (2 / 3) * Math.log(2 / 3)) / Math.log(2);
      expect(acc.specialization("0xaaa")).toBeCloseTo(expected, 12);
    });

    it("should skip malformed rows when scoring", () => {
      const acc = new WalletMetricsAccumulator(48);
      acc.addMarket(
        resolvedMarket("m-1", "politics", [trade({ id: 1 }), trade({ id: 2, wallet: "0xbad", size: 0 })]),
      );
      const wallets = new Set(acc.finish(UPDATED_AT).map((r) => r.wallet));
      expect([...wallets]).toEqual(["0xaaa"]);
    });

    it("should average metrics over markets in a grouping", () => {
      const acc = new WalletMetricsAccumulator(48);
      acc.addMarket(resolvedMarket("m-1", "politics", [trade({ id: 1 })], 1));
      acc.addMarket(resolvedMarket("m-2", "politics", [trade({ id: 2 })], 0));
      const global = acc.finish(UPDATED_AT).find((r) => r.category === "ALL" && r.horizonBucket === "ALL");

      // beliefs 0.8 and 0.8 against outcomes 1 and 0
      expect(global?.sampleMarkets).toBe(2);
      expect(global?.brier).toBeCloseTo((0.04 + 0.64) / 2, 12);
      expect(global?.calibrationError).toBeCloseTo(0.3, 12);
    });
  });

  describe("recomputeWalletMetrics", () => {
    it("should replace the metrics table from resolved markets only", async () => {
      const store = new MemoryStore()
        .addMarket({ id: "resolved", endTime: hoursFrom(T0, 10) })
        .addMarket({ id: "open", endTime: hoursFrom(T0, 500) })
        .addOutcome({ marketId: "resolved", resolvedOutcome: 1, resolutionTime: hoursFrom(T0, 10) })
        .addTrade({ ...trade(), marketId: "resolved", wallet: "0xaaa" })
        .addTrade({ ...trade(), marketId: "resolved", wallet: "0xbbb" })
        .addTrade({ ...trade(), marketId: "open", wallet: "0xccc" });
      store.walletMetrics = [
        {
          wallet: "0xstale",
          category: "ALL",
          horizonBucket: "ALL",
          sampleMarkets: 1,
          sampleTrades: 1,
          brier: 0,
          logLoss: 0,
          roi: 0,
          calibrationError: 0,
          avgTradeSize: 1,
          churn: 0,
          persistence: 1,
          specialization: 1,
          timingEdge: 0,
          updatedAt: T0,
        },
      ];

      const result = await recomputeWalletMetrics(store, { halfLifeHours: 48, now: UPDATED_AT });

      expect(result).toEqual({ rowsWritten: 8 });
      expect(new Set(store.walletMetrics.map((r) => r.wallet))).toEqual(new Set(["0xaaa", "0xbbb"]));
    });
  });
});

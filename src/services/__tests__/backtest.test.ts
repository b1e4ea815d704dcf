/**
 * Backtest Evaluator Tests
 *
 * - Calibration bins and edge buckets
 * - Report summary (complete and empty)
 * - Cutoff eligibility and the "now" clamp
 * - Persisted runs and the cutoff sweep
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  calibrationBins,
  edgeBucketStats,
  evaluateMarketAtCutoff,
  runBacktest,
  runBacktestSweep,
  summarizeBacktest,
  type BacktestRecord,
} from "../backtest.ts";
import type { ResolvedMarket } from "../store.ts";
import {
  configureLogger,
  getLoggerConfig,
  getRecentLogs,
  logger,
  resetLoggerStats,
} from "../structured-logger.ts";
import { MemoryStore, hoursFrom } from "./memory-store.ts";

const T0 = new Date("2025-03-01T00:00:00Z");
const NOW = hoursFrom(T0, 1000);

function record(overrides: Partial<BacktestRecord>): BacktestRecord {
  return {
    marketId: "m-1",
    cutoffTime: T0.toISOString(),
    marketProb: 0.5,
    aggregateProb: 0.5,
    outcome: 1,
    confidence: 0.1,
    divergence: 0,
    disagreement: 0,
    integrityRisk: 0.5,
    activeWallets: 1,
    ...overrides,
  };
}

/** Resolved market closing `closeHours` after T0 with one YES buy at `firstTradeHours` */
function seedResolved(
  store: MemoryStore,
  id: string,
  closeHours: number,
  firstTradeHours: number,
  outcome: 0 | 1 = 1,
): ResolvedMarket {
  const endTime = hoursFrom(T0, closeHours);
  store
    .addMarket({ id, endTime })
    .addOutcome({ marketId: id, resolvedOutcome: outcome, resolutionTime: endTime })
    .addTrade({
      marketId: id,
      wallet: "0xaaa",
      ts: hoursFrom(T0, firstTradeHours),
      side: "YES",
      action: "BUY",
      price: 0.6,
      size: 4,
    });
  return {
    market: { id, question: id, category: "politics", endTime, liquidity: 0 },
    outcome: { marketId: id, resolvedOutcome: outcome, resolutionTime: endTime },
  };
}

describe("Backtest Evaluator", () => {
  describe("calibrationBins", () => {
    it("should put 20 forecasts of 0.70 with 14 YES in bin 7", () => {
      const probs = Array.from({ length: 20 }, () => 0.7);
      const outcomes = Array.from({ length: 20 }, (_, i) => (i < 14 ? 1 : 0));
      const bins = calibrationBins(probs, outcomes);

      expect(bins).toHaveLength(10);
      expect(bins[7]?.count).toBe(20);
      expect(bins[7]?.avgProb).toBeCloseTo(0.7, 10);
      expect(bins[7]?.empirical).toBeCloseTo(0.7, 10);
      expect(bins[6]).toEqual({ bin: 6, count: 0, avgProb: null, empirical: null });
    });

    it("should fold a probability of 1 into the top bin", () => {
      const bins = calibrationBins([1, 0], [1, 0]);
      expect(bins[9]?.count).toBe(1);
      expect(bins[0]?.count).toBe(1);
    });
  });

  describe("edgeBucketStats", () => {
    it("should partition by |divergence| and score win rates", () => {
      const buckets = edgeBucketStats([
        record({ divergence: 0.01, aggregateProb: 0.6, marketProb: 0.59, outcome: 1 }),
        record({ divergence: -0.03, aggregateProb: 0.47, marketProb: 0.5, outcome: 1 }),
        record({ divergence: 0.2, aggregateProb: 0.7, marketProb: 0.5, outcome: 0 }),
        record({ divergence: -0.2, aggregateProb: 0.3, marketProb: 0.5, outcome: 0 }),
      ]);

      expect(buckets.map((b) => [b.bucket, b.count])).toEqual([
        ["0-2%", 1],
        ["2-5%", 1],
        ["5-10%", 0],
        ["10%+", 2],
      ]);
      expect(buckets[0]?.winRate).toBe(1);
      expect(buckets[0]?.avgEdge).toBeCloseTo(0.01, 10);
      expect(buckets[1]?.winRate).toBe(0);
      expect(buckets[1]?.avgEdge).toBeCloseTo(-0.03, 10);
      expect(buckets[2]).toEqual({ bucket: "5-10%", count: 0, avgEdge: 0, winRate: 0 });
      expect(buckets[3]?.winRate).toBe(0.5);
      expect(buckets[3]?.avgEdge).toBeCloseTo(0, 10);
    });

    it("should treat bucket bounds as half-open", () => {
      const buckets = edgeBucketStats([record({ divergence: 0.02 })]);
      expect(buckets[1]?.count).toBe(1);
    });

    it("should not count ties as wins", () => {
      const [bucket] = edgeBucketStats([record({ divergence: 0, aggregateProb: 0.5, marketProb: 0.5 })]);
      expect(bucket?.winRate).toBe(0);
    });
  });

  describe("summarizeBacktest", () => {
    it("should return an empty report with a note", () => {
      expect(summarizeBacktest([], 1, "run-1", T0)).toEqual({
        runId: "run-1",
        cutoffHours: 1,
        evaluatedAt: T0.toISOString(),
        status: "empty",
        totalMarkets: 0,
        note: "No eligible resolved markets with data before cutoff.",
      });
    });

    it("should score both series and label the top divergence cases", () => {
      const report = summarizeBacktest(
        [
          record({ marketId: "a", aggregateProb: 0.8, marketProb: 0.6, divergence: 0.2, outcome: 1 }),
          record({ marketId: "b", aggregateProb: 0.4, marketProb: 0.45, divergence: -0.05, outcome: 1 }),
          record({ marketId: "c", aggregateProb: 0.5, marketProb: 0.5, divergence: 0, outcome: 0 }),
        ],
        6,
        "run-2",
        T0,
      );
      if (report.status !== "complete") throw new Error("expected a complete report");

      expect(report.totalMarkets).toBe(3);
      expect(report.aggregateBrier).toBeCloseTo((0.04 + 0.36 + 0.25) / 3, 10);
      expect(report.marketBrier).toBeCloseTo((0.16 + 0.3025 + 0.25) / 3, 10);
      expect(report.brierImprovement).toBeCloseTo(report.marketBrier - report.aggregateBrier, 12);
      expect(report.calibration.aggregate[8]?.count).toBe(1);
      expect(report.calibration.market[6]?.count).toBe(1);
      expect(report.topDivergenceCases.map((c) => [c.marketId, c.winner])).toEqual([
        ["a", "crowd"],
        ["b", "market"],
        ["c", "tie"],
      ]);
      expect(report.topDivergenceCases[0]?.aggregateAbsError).toBeCloseTo(0.2, 10);
    });
  });

  describe("evaluateMarketAtCutoff", () => {
    it("should exclude a market whose first trade is after the cutoff", async () => {
      const store = new MemoryStore();
      // resolves at +24h, first trade 6h before resolution, cutoff 12h
      const market = seedResolved(store, "m-late", 24, 18);
      expect(await evaluateMarketAtCutoff(store, market, 12, NOW)).toBeNull();
    });

    it("should replay the aggregator at the cutoff", async () => {
      const store = new MemoryStore();
      const market = seedResolved(store, "m-1", 48, 0);
      const result = await evaluateMarketAtCutoff(store, market, 12, NOW);

      expect(result).toMatchObject({
        marketId: "m-1",
        cutoffTime: hoursFrom(T0, 36).toISOString(),
        outcome: 1,
        activeWallets: 1,
      });
      expect(result?.marketProb).toBeCloseTo(0.6, 12);
      expect(result?.aggregateProb).toBeCloseTo(0.8, 12);
      expect(store.snapshots.size).toBe(0);
    });

    it("should clamp the cutoff to now", async () => {
      const store = new MemoryStore();
      const market = seedResolved(store, "m-1", 100, 0);
      const result = await evaluateMarketAtCutoff(store, market, 1, hoursFrom(T0, 50));
      expect(result?.cutoffTime).toBe(hoursFrom(T0, 50).toISOString());
    });
  });

  describe("runBacktest", () => {
    it("should persist records and report under the run id", async () => {
      const store = new MemoryStore();
      seedResolved(store, "m-1", 48, 0, 1);
      seedResolved(store, "m-2", 48, 47.5, 0);

      const report = await runBacktest(store, 1, { runId: "test-run", now: NOW });

      expect(report.status).toBe("complete");
      expect(report.totalMarkets).toBe(1);
      expect(store.backtestRecords.get("test-run")?.map((r) => r.marketId)).toEqual(["m-1"]);
      expect(store.backtestReports.get("test-run")).toEqual(report);
    });

    it("should replace an earlier run with the same id", async () => {
      const store = new MemoryStore();
      seedResolved(store, "m-1", 48, 0);
      await runBacktest(store, 1, { runId: "test-run", now: NOW });
      await runBacktest(store, 100, { runId: "test-run", now: NOW });

      expect(store.backtestRecords.get("test-run")).toEqual([]);
      expect(store.backtestReports.get("test-run")?.status).toBe("empty");
    });

    describe("concurrent runs", () => {
      const initialLogger = getLoggerConfig();

      afterEach(() => {
        configureLogger(initialLogger);
        vi.restoreAllMocks();
      });

      it("should tag each run's logs with its own id and leave none behind", async () => {
        resetLoggerStats();
        configureLogger({ minLevel: "INFO" });
        vi.spyOn(console, "log").mockImplementation(() => {});
        const store = new MemoryStore();
        seedResolved(store, "m-1", 48, 0);

        await Promise.all([
          runBacktest(store, 1, { runId: "run-A", now: NOW }),
          runBacktest(store, 2, { runId: "run-B", now: NOW }),
        ]);
        logger.info("backtest", "after both runs");

        const complete = getRecentLogs({ service: "backtest" }).filter(
          (l) => l.message === "Backtest complete",
        );
        expect(complete.map((l) => [l.runId, l.data?.cutoffHours]).sort()).toEqual([
          ["run-A", 1],
          ["run-B", 2],
        ]);
        expect(getRecentLogs()[0]?.message).toBe("after both runs");
        expect(getRecentLogs()[0]?.runId).toBeUndefined();
      });
    });

    it("should generate a run id when none is given", async () => {
      const report = await runBacktest(new MemoryStore(), 1, { now: NOW });
      expect(report.runId).toMatch(/^[0-9a-f]{32}$/);
    });
  });

  describe("runBacktestSweep", () => {
    it("should stop after the first hour with no eligible markets", async () => {
      const store = new MemoryStore();
      seedResolved(store, "m-1", 3, 0);

      const sweep = await runBacktestSweep(store, 10, { now: NOW });

      expect(sweep.totalResolvedMarkets).toBe(1);
      expect(sweep.hoursEvaluated).toBe(4);
      expect(sweep.hourlyResults.map((h) => [h.cutoffHours, h.totalMarkets])).toEqual([
        [1, 1],
        [2, 1],
        [3, 1],
        [4, 0],
      ]);
      expect(sweep.hourlyResults[0]).toMatchObject({
        aggregateBrier: 0.04,
        marketBrier: 0.16,
        brierImprovement: 0.12,
        brierImprovementPct: 75,
      });
    });

    it("should end at maxHours when every hour has data", async () => {
      const store = new MemoryStore();
      seedResolved(store, "m-1", 3, 0);
      const sweep = await runBacktestSweep(store, 2, { now: NOW });
      expect(sweep.hourlyResults.map((h) => h.cutoffHours)).toEqual([1, 2]);
    });
  });
});

#!/usr/bin/env node
/**
 * SmartCrowd CLI
 *
 * Runs one engine job against the configured database and prints the result
 * as JSON. Meant for cron and manual runs.
 *
 * Usage:
 *   npm run smartcrowd -- recompute [--at <iso>] [--include-resolved] [--backfill <n>]
 *   npm run smartcrowd -- snapshot --market <id> [--at <iso>]
 *   npm run smartcrowd -- backtest [--cutoff-hours <n>] [--run-id <id>]
 *   npm run smartcrowd -- sweep [--max-hours <n>]
 */

import { createDb } from "../db/index.ts";
import { errorMessage, toError } from "../lib/errors.ts";
import { runBacktest, runBacktestSweep } from "../services/backtest.ts";
import { DrizzleStore } from "../services/drizzle-store.ts";
import { buildMarketSnapshot } from "../services/market-snapshot.ts";
import { recomputePipeline } from "../services/pipeline.ts";
import { logger } from "../services/structured-logger.ts";
import { parseCliArgs, type CliFlags } from "./args.ts";

const SERVICE = "cli";

async function run(store: DrizzleStore, flags: CliFlags): Promise<unknown> {
  switch (flags.command) {
    case "recompute":
      return recomputePipeline(store, {
        snapshotTime: flags.at,
        includeResolvedSnapshots: flags.includeResolved,
        backfillPoints: flags.backfill,
      });
    case "snapshot":
      if (!flags.market) {
        throw new Error("snapshot requires --market");
      }
      return buildMarketSnapshot(store, flags.market, {
        snapshotTime: flags.at,
        persist: true,
      });
    case "backtest":
      return runBacktest(store, flags.cutoffHours, { runId: flags.runId });
    case "sweep":
      return runBacktestSweep(store, flags.maxHours);
  }
}

async function main(): Promise<void> {
  const flags = parseCliArgs(process.argv.slice(2));
  const handle = createDb();
  try {
    const result = await run(new DrizzleStore(handle.db), flags);
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await handle.close();
  }
}

main().catch((err: unknown) => {
  logger.fatal(SERVICE, errorMessage(err), toError(err));
  process.exitCode = 1;
});

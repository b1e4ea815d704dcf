/**
 * Command-line flag parsing for the SmartCrowd CLI. Numeric flags fall back
 * to the environment defaults.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { env } from "../config/env.ts";

const COMMANDS = ["recompute", "snapshot", "backtest", "sweep"] as const;

const flagsSchema = z.object({
  command: z.enum(COMMANDS),
  market: z.string().min(1).optional(),
  at: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))
    .optional(),
  cutoffHours: z.coerce.number().positive().default(env.SMARTCROWD_BACKTEST_CUTOFF_HOURS),
  maxHours: z.coerce.number().int().positive().default(env.SMARTCROWD_SWEEP_MAX_HOURS),
  runId: z.string().min(1).optional(),
  includeResolved: z.boolean().default(false),
  backfill: z.coerce.number().int().min(0).default(env.SMARTCROWD_BACKFILL_POINTS),
});

export type CliFlags = z.infer<typeof flagsSchema>;

export function usage(): string {
  return [
    "Usage: smartcrowd <command> [flags]",
    "",
    "Commands:",
    "  recompute   wallet metrics, weights and snapshots for every open market",
    "  snapshot    snapshot one market (--market required)",
    "  backtest    evaluate resolved markets at one cutoff",
    "  sweep       backtest every cutoff hour from 1 to --max-hours",
    "",
    "Flags:",
    "  --market <id>  --at <iso>  --cutoff-hours <n>  --max-hours <n>",
    "  --run-id <id>  --include-resolved  --backfill <n>",
  ].join("\n");
}

export function parseCliArgs(argv: readonly string[]): CliFlags {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      market: { type: "string" },
      at: { type: "string" },
      "cutoff-hours": { type: "string" },
      "max-hours": { type: "string" },
      "run-id": { type: "string" },
      "include-resolved": { type: "boolean" },
      backfill: { type: "string" },
    },
  });

  const parsed = flagsSchema.safeParse({
    command: positionals[0],
    market: values.market,
    at: values.at,
    cutoffHours: values["cutoff-hours"],
    maxHours: values["max-hours"],
    runId: values["run-id"],
    includeResolved: values["include-resolved"],
    backfill: values.backfill,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid arguments:\n${issues}\n\n${usage()}`);
  }
  return parsed.data;
}

import { z } from "zod";

const envSchema = z.object({
  // Only the CLI and scheduled jobs need a database; the pure engine does not
  DATABASE_URL: z.string().default(""),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Overrides the logger's environment-based minimum level
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "FATAL"]).optional(),

  // Belief inference recency decay
  SMARTCROWD_HALF_LIFE_HOURS: z.coerce.number().positive().default(48),

  // Backtest defaults
  SMARTCROWD_BACKTEST_CUTOFF_HOURS: z.coerce.number().positive().default(1),
  SMARTCROWD_SWEEP_MAX_HOURS: z.coerce.number().int().positive().default(168),

  // Historical snapshot points written per market by the pipeline (0 = off)
  SMARTCROWD_BACKFILL_POINTS: z.coerce.number().int().min(0).default(0),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}

export const env = loadEnv();

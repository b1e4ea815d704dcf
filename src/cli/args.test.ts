import { describe, it, expect } from "vitest";
import { parseCliArgs } from "./args.ts";

describe("parseCliArgs", () => {
  it("should parse a snapshot command with a market and instant", () => {
    const flags = parseCliArgs(["snapshot", "--market", "m-1", "--at", "2025-03-01T12:00:00Z"]);
    expect(flags.command).toBe("snapshot");
    expect(flags.market).toBe("m-1");
    expect(flags.at).toEqual(new Date("2025-03-01T12:00:00Z"));
  });

  it("should coerce numeric flags", () => {
    const flags = parseCliArgs(["backtest", "--cutoff-hours", "6", "--run-id", "test-run"]);
    expect(flags.cutoffHours).toBe(6);
    expect(flags.runId).toBe("test-run");
  });

  it("should default boolean and backfill flags", () => {
    const flags = parseCliArgs(["recompute", "--include-resolved", "--backfill", "4"]);
    expect(flags.includeResolved).toBe(true);
    expect(flags.backfill).toBe(4);
    expect(parseCliArgs(["recompute"]).includeResolved).toBe(false);
  });

  it("should reject unknown commands and bad numbers", () => {
    expect(() => parseCliArgs(["explode"])).toThrow(/^Invalid arguments:/);
    expect(() => parseCliArgs(["sweep", "--max-hours", "0"])).toThrow(/maxHours/);
    expect(() => parseCliArgs(["snapshot", "--at", "yesterday"])).toThrow(/at:/);
  });
});

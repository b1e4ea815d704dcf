export * from "./markets.ts";
export * from "./wallet-metrics.ts";
export * from "./snapshots.ts";
export * from "./backtests.ts";

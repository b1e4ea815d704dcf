/**
 * Wallet Belief Inference
 *
 * Reads one wallet's trades on one market as of a cutoff and turns them into
 * an implied YES probability plus a confidence in that reading.
 *
 * Each trade casts a "vote": buying YES (or selling NO) pulls the vote toward
 * 1, the opposite toward 0, scaled by how extreme the traded price was.
 * Votes are weighted by sqrt(size), an exponential recency decay and a boost
 * for consecutive same-direction trades. Direction reversals count as churn,
 * which lowers confidence.
 *
 * Signals are never cached: recency depends on the caller's as-of instant.
 */

import { env } from "../config/env.ts";
import {
  SAMPLE_SUPPORT_FLOOR,
  SAMPLE_SUPPORT_TRADES,
  SIGNAL_MASS_SCALE,
  STREAK_BOOST_MAX_STEPS,
  STREAK_BOOST_PER_TRADE,
} from "../config/constants.ts";
import { InputDataError } from "../lib/errors.ts";
import { clamp01, clampProbability, hoursBetween } from "../lib/math-utils.ts";
import type { TradeAction, TradeRow, TradeSide } from "./store.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BeliefSignal {
  /** Implied YES probability in [0.001, 0.999] */
  belief: number;
  /** [0, 1]; 0 means the signal carries no weight */
  confidence: number;
  /** Trades considered (at or before the cutoff, well-formed) */
  tradeCount: number;
  /** Fraction of consecutive trades that reversed direction */
  churn: number;
  /** 1 − churn */
  persistence: number;
  avgSize: number;
  /** Weight-averaged YES direction in [-1, 1] */
  netDirection: number;
}

/** Direction of a trade's effect on YES exposure */
export type YesDirection = 1 | -1;

function neutralSignal(): BeliefSignal {
  return {
    belief: 0.5,
    confidence: 0,
    tradeCount: 0,
    churn: 1,
    persistence: 0,
    avgSize: 0,
    netDirection: 0,
  };
}

// ---------------------------------------------------------------------------
// Trade primitives
// ---------------------------------------------------------------------------

/**
 * YES-implied price of a fill: the price itself for YES tokens, its
 * complement for NO tokens, clamped to [0.001, 0.999].
 */
export function impliedYesPrice(side: TradeSide, price: number): number {
  return clampProbability(side === "YES" ? price : 1 - price);
}

/**
 * Buying YES or selling NO increases YES exposure (+1); the other two
 * combinations decrease it (−1).
 */
export function yesDirection(side: TradeSide, action: TradeAction): YesDirection {
  const actionSign: YesDirection = action === "BUY" ? 1 : -1;
  return side === "YES" ? actionSign : actionSign === 1 ? -1 : 1;
}

/**
 * Exponential decay factor for a trade `ageHours` old.
 *
 * @example
 * recencyFactor(96, 48) // 0.25
 */
export function recencyFactor(ageHours: number, halfLifeHours: number): number {
  return Math.exp((-Math.LN2 * Math.max(0, ageHours)) / Math.max(halfLifeHours, 1e-6));
}

export function isWellFormedTrade(trade: TradeRow): boolean {
  return (
    Number.isFinite(trade.price) &&
    trade.price >= 0 &&
    trade.price <= 1 &&
    Number.isFinite(trade.size) &&
    trade.size > 0 &&
    !Number.isNaN(trade.ts.getTime()) &&
    (trade.side === "YES" || trade.side === "NO") &&
    (trade.action === "BUY" || trade.action === "SELL")
  );
}

/**
 * Ingestion-boundary validation. Throws InputDataError for a malformed row.
 */
export function assertValidTrade(trade: TradeRow): void {
  if (!isWellFormedTrade(trade)) {
    throw new InputDataError(
      `Malformed trade on ${trade.marketId} by ${trade.wallet}: ` +
        `side=${trade.side} action=${trade.action} price=${trade.price} size=${trade.size}`,
    );
  }
}

/**
 * Group trades by wallet, preserving each wallet's input order. Wallet keys
 * come back sorted so that downstream aggregation is order-independent.
 */
export function groupTradesByWallet(trades: readonly TradeRow[]): Map<string, TradeRow[]> {
  const grouped = new Map<string, TradeRow[]>();
  for (const trade of trades) {
    const list = grouped.get(trade.wallet);
    if (list) {
      list.push(trade);
    } else {
      grouped.set(trade.wallet, [trade]);
    }
  }
  return new Map([...grouped.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function byTime(a: TradeRow, b: TradeRow): number {
  const diff = a.ts.getTime() - b.ts.getTime();
  if (diff !== 0) return diff;
  return (a.id ?? 0) - (b.id ?? 0);
}

// ---------------------------------------------------------------------------
// Inference
// ---------------------------------------------------------------------------

/**
 * Infer a wallet's belief on one market from its trades as of `asOf`
 * (defaults to the wallet's latest trade).
 *
 * Trades after the cutoff and malformed rows are ignored. With nothing left,
 * returns the neutral signal {belief 0.5, confidence 0, churn 1, persistence 0}.
 */
export function inferBelief(
  trades: readonly TradeRow[],
  asOf?: Date,
  halfLifeHours: number = env.SMARTCROWD_HALF_LIFE_HOURS,
): BeliefSignal {
  const ordered = trades.filter(isWellFormedTrade).sort(byTime);
  const last = ordered.at(-1);
  if (!last) return neutralSignal();

  const cutoff = asOf ?? last.ts;

  let weightedBelief = 0;
  let totalWeight = 0;
  let weightedDirection = 0;
  let flips = 0;
  let prevDirection: YesDirection | null = null;
  let streak = 0;
  let sizeTotal = 0;
  let considered = 0;

  for (const trade of ordered) {
    if (trade.ts.getTime() > cutoff.getTime()) continue;

    const direction = yesDirection(trade.side, trade.action);
    const yesPx = impliedYesPrice(trade.side, trade.price);
    const vote = direction > 0 ? (yesPx + 1) / 2 : yesPx / 2;

    const recency = recencyFactor(hoursBetween(trade.ts, cutoff), halfLifeHours);
    const sizeWeight = Math.sqrt(trade.size);

    if (prevDirection === null || prevDirection !== direction) {
      if (prevDirection !== null) flips++;
      streak = 1;
    } else {
      streak++;
    }
    prevDirection = direction;

    const persistenceBoost =
      1 + STREAK_BOOST_PER_TRADE * Math.min(streak - 1, STREAK_BOOST_MAX_STEPS);
    const weight = sizeWeight * recency * persistenceBoost;

    weightedBelief += weight * vote;
    totalWeight += weight;
    weightedDirection += weight * direction;
    sizeTotal += trade.size;
    considered++;
  }

  if (considered === 0 || totalWeight <= 0) return neutralSignal();

  const churn = flips / Math.max(1, considered - 1);
  const persistence = 1 - churn;
  const signalMass = totalWeight / (totalWeight + SIGNAL_MASS_SCALE);
  const sampleSupport =
    SAMPLE_SUPPORT_FLOOR +
    (1 - SAMPLE_SUPPORT_FLOOR) * Math.min(1, considered / SAMPLE_SUPPORT_TRADES);

  return {
    belief: clampProbability(weightedBelief / totalWeight),
    confidence: clamp01(signalMass * sampleSupport * (0.5 + 0.5 * persistence)),
    tradeCount: considered,
    churn,
    persistence,
    avgSize: sizeTotal / considered,
    netDirection: weightedDirection / totalWeight,
  };
}

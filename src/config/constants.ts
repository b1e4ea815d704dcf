// ---------------------------------------------------------------------------
// Probability bounds
// ---------------------------------------------------------------------------

/** Lower clamp for any belief or aggregate probability */
export const PROB_FLOOR = 0.001;

/** Upper clamp for any belief or aggregate probability */
export const PROB_CEILING = 0.999;

/** Wildcard used for the category / horizon dimensions of wallet tables */
export const ALL = "ALL";

/** Category assigned to markets that arrive without one */
export const UNKNOWN_CATEGORY = "unknown";

// ---------------------------------------------------------------------------
// Belief inference
// ---------------------------------------------------------------------------

/** Extra weight per consecutive same-direction trade */
export const STREAK_BOOST_PER_TRADE = 0.12;

/** Streak length (minus one) after which the boost stops growing: 1 + 0.12 × 4 = +48% */
export const STREAK_BOOST_MAX_STEPS = 4;

/** Total trade weight at which signal mass reaches one half */
export const SIGNAL_MASS_SCALE = 6.0;

/** Trade count at which sample support saturates */
export const SAMPLE_SUPPORT_TRADES = 6;

/** Sample support for a single trade before it ramps toward 1 */
export const SAMPLE_SUPPORT_FLOOR = 0.3;

// ---------------------------------------------------------------------------
// Wallet metrics
// ---------------------------------------------------------------------------

/** Late-market price moves smaller than this are noise for timing edge */
export const TIMING_NOISE_THRESHOLD = 0.005;

/** Horizon bucket upper bounds in hours */
export const HORIZON_INTRADAY_HOURS = 24;
export const HORIZON_SHORT_HOURS = 7 * 24;
export const HORIZON_MEDIUM_HOURS = 30 * 24;

// ---------------------------------------------------------------------------
// Wallet weights
// ---------------------------------------------------------------------------

/**
 * Brier score of a constant 0.5 forecaster. Edge = 0.25 − brier, so a
 * positive edge means better than chance.
 */
export const CHANCE_BRIER = 0.25;

/** Empirical-Bayes prior strength for the (ALL, ALL) grouping */
export const GLOBAL_PRIOR_STRENGTH = 22;

/** Empirical-Bayes prior strength for category and horizon groupings */
export const LOCAL_PRIOR_STRENGTH = 12;

export const BASE_WEIGHT_MIN = 0.2;
export const BASE_WEIGHT_MAX = 3.0;

/** Final trust weight bounds */
export const WEIGHT_MIN = 0.1;
export const WEIGHT_MAX = 4.0;

export const STYLE_PENALTY_FLOOR = 0.45;
export const STYLE_PENALTY_PER_CHURN = 0.6;
export const CALIBRATION_PENALTY_FLOOR = 0.5;

/** Weight returned for wallets with no recorded weight row */
export const COLD_START_WEIGHT = 1.0;
export const COLD_START_UNCERTAINTY = 1.0;

// ---------------------------------------------------------------------------
// Snapshot aggregation
// ---------------------------------------------------------------------------

export const ANTI_NOISE_FLOOR = 0.4;
export const ANTI_NOISE_PER_CHURN = 0.55;
export const UNCERTAINTY_DISCOUNT_FLOOR = 0.4;
export const UNCERTAINTY_DISCOUNT_RATE = 0.3;

/** Effective wallet count that maps to full participation quality */
export const PARTICIPATION_FULL_WALLETS = 12;

/** Total effective weight at which signal support reaches one half */
export const SIGNAL_SUPPORT_SCALE = 10;

/** Wallet count at which the wallet-count confidence factor saturates */
export const WALLET_COUNT_FULL = 15;

/** Fewer contributing wallets than this triggers the thin-sample penalty */
export const THIN_SAMPLE_WALLETS = 3;
export const THIN_SAMPLE_PENALTY = 0.6;

export const INTEGRITY_CONCENTRATION_SHARE = 0.55;
export const INTEGRITY_CHURN_SHARE = 0.45;
export const INTEGRITY_CONFIDENCE_DRAG = 0.7;

/** Ranked list lengths kept in snapshot diagnostics */
export const TOP_DRIVERS_LIMIT = 8;
export const COHORT_SUMMARY_LIMIT = 8;

/** Decimal places kept for values inside JSON diagnostics */
export const DIAGNOSTIC_DECIMALS = 6;

// ---------------------------------------------------------------------------
// Backtest
// ---------------------------------------------------------------------------

export const CALIBRATION_BINS = 10;

/** Number of highest-divergence cases kept in a report */
export const TOP_DIVERGENCE_CASES = 8;

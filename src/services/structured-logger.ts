/**
 * Structured Logging
 *
 * JSON logging with context propagation for the recompute, snapshot and
 * backtest passes. Replaces ad-hoc console.log calls with structured events
 * that can be queried and filtered.
 *
 * Features:
 * - JSON structured logs in production, one-line pretty logs elsewhere
 * - Log levels: DEBUG, INFO, WARN, ERROR, FATAL
 * - Context propagation (runId, marketId) via withContext
 * - Operation timing with automatic error logging
 * - Ring buffer for recent logs (in-memory access)
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { env } from "../config/env.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface LogContext {
  /** Backtest or pipeline run ID (if applicable) */
  runId?: string;
  /** Market being processed (if applicable) */
  marketId?: string;
}

export interface StructuredLogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Service/module that generated the log */
  service: string;
  message: string;
  /** Duration in ms (for timing events) */
  durationMs?: number;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;
  /** Whether to output as JSON */
  jsonOutput: boolean;
  /** Whether to include stack traces in errors */
  includeStackTraces: boolean;
  /** Maximum number of logs to keep in memory ring buffer */
  ringBufferSize: number;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  errorsLogged: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const isProduction = env.NODE_ENV === "production";

function defaultMinLevel(): LogLevel {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === "test") return "WARN";
  return isProduction ? "INFO" : "DEBUG";
}

const config: LoggerConfig = {
  minLevel: defaultMinLevel(),
  jsonOutput: isProduction,
  includeStackTraces: !isProduction,
  ringBufferSize: 500,
};

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const ringBuffer: StructuredLogEntry[] = [];

let stats: LoggerStats = emptyStats();

const contextStorage = new AsyncLocalStorage<LogContext>();

function emptyStats(): LoggerStats {
  return {
    totalLogs: 0,
    logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    errorsLogged: 0,
  };
}

// ---------------------------------------------------------------------------
// Context Management
// ---------------------------------------------------------------------------

/**
 * Execute a function with a specific logging context, merged over the
 * enclosing one. The context follows the function's async call chain only,
 * so concurrent runs each see their own.
 */
export function withContext<T>(
  ctx: LogContext,
  fn: () => Promise<T>,
): Promise<T> {
  return contextStorage.run({ ...contextStorage.getStore(), ...ctx }, fn);
}

function currentContext(): LogContext {
  return contextStorage.getStore() ?? {};
}

// ---------------------------------------------------------------------------
// Core Logging
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
  durationMs?: number,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[config.minLevel]) {
    return;
  }

  const context = currentContext();
  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...context,
    durationMs,
    data,
  };

  if (error) {
    entry.error = {
      message: error.message,
      name: error.name,
      stack: config.includeStackTraces ? error.stack : undefined,
    };
    stats.errorsLogged++;
  }

  stats.totalLogs++;
  stats.logsByLevel[level]++;

  ringBuffer.push(entry);
  if (ringBuffer.length > config.ringBufferSize) {
    ringBuffer.splice(0, ringBuffer.length - config.ringBufferSize);
  }

  let output: string;
  if (config.jsonOutput) {
    output = JSON.stringify(entry);
  } else {
    const prefix = `[${level}][${service}]`;
    const contextStr = context.runId
      ? ` (run:${context.runId.slice(0, 12)})`
      : "";
    const timing = durationMs !== undefined ? ` ${durationMs}ms` : "";
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    const errorStr = error ? ` ERROR: ${error.message}` : "";
    output = `${prefix}${contextStr} ${message}${timing}${dataStr}${errorStr}`;
  }

  if (level === "ERROR" || level === "FATAL") {
    console.error(output);
  } else if (level === "WARN") {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ---------------------------------------------------------------------------
// Log Level Methods
// ---------------------------------------------------------------------------

export const logger = {
  debug(service: string, message: string, data?: Record<string, unknown>): void {
    log("DEBUG", service, message, data);
  },

  info(service: string, message: string, data?: Record<string, unknown>): void {
    log("INFO", service, message, data);
  },

  warn(service: string, message: string, data?: Record<string, unknown>): void {
    log("WARN", service, message, data);
  },

  error(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("ERROR", service, message, data, error);
  },

  fatal(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("FATAL", service, message, data, error);
  },
};

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Time an async operation. Logs the duration at DEBUG on success and the
 * error at ERROR on failure; the error is rethrown either way.
 */
export async function timeOperation<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log("DEBUG", service, `${operation} completed`, undefined, undefined, Date.now() - start);
    return result;
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    log("ERROR", service, `${operation} failed`, undefined, error, Date.now() - start);
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Query API
// ---------------------------------------------------------------------------

/**
 * Get recent logs from the ring buffer, optionally filtered.
 */
export function getRecentLogs(filters?: {
  level?: LogLevel;
  service?: string;
  runId?: string;
  limit?: number;
}): StructuredLogEntry[] {
  let logs = [...ringBuffer];

  if (filters?.level) {
    const minPriority = LOG_LEVEL_PRIORITY[filters.level];
    logs = logs.filter((l) => LOG_LEVEL_PRIORITY[l.level] >= minPriority);
  }
  if (filters?.service) {
    logs = logs.filter((l) => l.service === filters.service);
  }
  if (filters?.runId) {
    logs = logs.filter((l) => l.runId === filters.runId);
  }

  const limit = filters?.limit ?? 100;
  return logs.slice(-limit).reverse();
}

export function configureLogger(updates: Partial<LoggerConfig>): LoggerConfig {
  Object.assign(config, updates);
  return { ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

export function getLoggerStats(): LoggerStats {
  return { ...stats, logsByLevel: { ...stats.logsByLevel } };
}

/**
 * Reset counters and the ring buffer (used by tests).
 */
export function resetLoggerStats(): void {
  stats = emptyStats();
  ringBuffer.length = 0;
}

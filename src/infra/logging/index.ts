/**
 * Logging Infrastructure
 *
 * Provides a consistent logging interface and formatting helpers for the
 * ledger, the arbitrage scanner and the CLI.
 */

import chalk from "chalk";

/**
 * Logger interface for consistent logging across the application
 */
export interface Logger {
  /** Log informational message */
  info(msg: string): void;

  /** Log warning message */
  warn(msg: string): void;

  /** Log error message */
  error(msg: string): void;

  /** Log debug message (optional) */
  debug?(msg: string): void;
}

/**
 * Log levels for filtering output
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Configuration for creating a logger
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;

  /** Prefix for all log messages */
  prefix?: string;

  /** Whether to include timestamps */
  includeTimestamp?: boolean;
}

/**
 * Create a console-based logger with coloured level tags
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = "info", prefix = "", includeTimestamp = false } = config;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  const formatMessage = (tag: string, msg: string): string => {
    const parts: string[] = [];

    if (includeTimestamp) {
      parts.push(chalk.gray(new Date().toISOString()));
    }

    parts.push(tag);

    if (prefix) {
      parts.push(`[${prefix}]`);
    }

    parts.push(msg);
    return parts.join(" ");
  };

  const shouldLog = (msgLevel: LogLevel): boolean => {
    return LOG_LEVEL_PRIORITY[msgLevel] >= minPriority;
  };

  return {
    debug(msg: string): void {
      if (shouldLog("debug")) {
        console.debug(formatMessage(chalk.gray("[DEBUG]"), msg));
      }
    },

    info(msg: string): void {
      if (shouldLog("info")) {
        console.log(formatMessage(chalk.cyan("[INFO]"), msg));
      }
    },

    warn(msg: string): void {
      if (shouldLog("warn")) {
        console.warn(formatMessage(chalk.yellow("[WARN]"), msg));
      }
    },

    error(msg: string): void {
      if (shouldLog("error")) {
        console.error(formatMessage(chalk.red("[ERROR]"), msg));
      }
    },
  };
}

/**
 * Create a no-op logger that discards all output
 * Useful for testing or when logging should be suppressed
 */
export function createNullLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Format a number as USD currency
 */
export function formatUsd(amount: number): string {
  const sign = amount >= 0 ? "" : "-";
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}

/**
 * Format a price in cents (0-1 decimal to XX¢)
 */
export function formatPriceCents(price: number): string {
  return `${(price * 100).toFixed(0)}¢`;
}

/**
 * Format P&L with an explicit sign
 */
export function formatPnl(pnl: number): string {
  const sign = pnl >= 0 ? "+" : "-";
  return `${sign}$${Math.abs(pnl).toFixed(2)}`;
}

export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`;
}

/**
 * Truncate a string to a maximum length with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength - 3) + "...";
}

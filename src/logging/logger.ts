/**
 * Lightweight logging utility.
 * Writes timestamped, scoped entries to the console and, optionally, a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Receives each formatted entry that passes the level filter.
 */
export type LogSink = (entry: string, level: LogLevel) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name shown in every entry */
  scope?: string;
  /** Enable console output (stderr, so rendered blocks on stdout stay clean) */
  console?: boolean;
  /** Append entries to this file when set */
  logFile?: string;
  /** Extra destination, mainly for tests */
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger sharing this one's destinations under a nested scope. */
  child(scope: string): Logger;
}

/**
 * Format a log entry with timestamp, level, scope, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${scope}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const scope = options.scope ?? "dakota-blocks";
  const useConsole = options.console ?? true;
  const { logFile, sink } = options;

  if (logFile !== undefined) {
    const logDir = dirname(logFile);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
  }

  function log(
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
      return;
    }

    const entry = formatLogEntry(entryLevel, scope, message, context);

    if (useConsole) {
      console.error(entry);
    }

    if (logFile !== undefined) {
      try {
        appendFileSync(logFile, entry + "\n");
      } catch (err) {
        console.error(`Failed to write to log file: ${err}`);
      }
    }

    sink?.(entry, entryLevel);
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (childScope) =>
      createLogger({ ...options, scope: `${scope}:${childScope}` }),
  };
}

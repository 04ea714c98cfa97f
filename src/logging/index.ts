/**
 * Logging utilities.
 */

import { config } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "./logger.js";

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogSink,
} from "./logger.js";

/**
 * Logger configured from the environment (LOG_LEVEL, LOG_FILE).
 */
export function getLogger(scope: string): Logger {
  return createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    scope,
    logFile: config.logFile,
  });
}

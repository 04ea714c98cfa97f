/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, maybeEnv, optionalEnv } from "./env.js";
import { isLogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Log file path; file logging is off when unset */
  readonly logFile: string | undefined;
  /** Application name */
  readonly appName: string;
}

/**
 * Read configuration from the environment.
 * Values are checked by validateConfig(), not here, so that importing
 * this module never throws.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logFile: maybeEnv("LOG_FILE"),
    appName: optionalEnv("APP_NAME", "dakota-blocks"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the configuration. Call at startup to fail fast.
 * Throws ConfigError on the first invalid value.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

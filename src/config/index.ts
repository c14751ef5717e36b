/**
 * Application configuration.
 *
 * Process-level settings (environment, logging) are read at import time and
 * always have defaults. Notion credentials are only resolved when something
 * first needs to talk to the remote database, so a missing token surfaces as
 * a ConfigError on first use rather than at startup.
 */

import { ConfigError, requireEnv, optionalEnv, optionalEnvInt } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

export { ConfigError } from "./env.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Raw LOG_LEVEL value; checked by validateConfig */
  readonly logLevel: string;
  /** Optional log file path; file logging is off when unset */
  readonly logFile: string | undefined;
  /** Application name */
  readonly appName: string;
}

export interface NotionConfig {
  /** Integration token sent as the bearer credential */
  readonly apiKey: string;
  /** Database holding the speaker records */
  readonly databaseId: string;
  /** Per-request timeout passed to the Notion client */
  readonly timeoutMs: number;
}

export const DEFAULT_NOTION_TIMEOUT_MS = 30_000;

function loadConfig(): AppConfig {
  const logFile = optionalEnv("LOG_FILE", "");
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logFile: logFile === "" ? undefined : logFile,
    appName: optionalEnv("APP_NAME", "speaker-tracker"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate process-level configuration and return the effective log level.
 * Call this at startup to fail fast on typos.
 */
export function validateConfig(appConfig: AppConfig = config): LogLevel {
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

  return appConfig.logLevel;
}

/**
 * Resolve the Notion credentials.
 * @throws ConfigError when NOTION_API_KEY or NOTION_DATABASE_ID is missing
 */
export function loadNotionConfig(env: NodeJS.ProcessEnv = process.env): NotionConfig {
  return {
    apiKey: requireEnv("NOTION_API_KEY", env),
    databaseId: requireEnv("NOTION_DATABASE_ID", env),
    timeoutMs: optionalEnvInt("NOTION_TIMEOUT_MS", DEFAULT_NOTION_TIMEOUT_MS, env),
  };
}

/**
 * Lightweight logging utility.
 *
 * Entries carry a timestamp, level and run ID and go to stderr, leaving
 * stdout free for tool output. A log file can be added with `logFile`.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Append entries to this file when set */
  logFile?: string;
  /** Write entries to stderr */
  console?: boolean;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger that adds `context` to every entry it writes */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context, errorReplacer)}`;
  }

  return entry;
}

// Error objects serialize to {} by default.
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const toConsole = options.console ?? true;
  const logFile = options.logFile;
  const bound = options.context ?? {};

  if (logFile !== undefined) {
    const dir = dirname(logFile);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
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

    const merged = context ? { ...bound, ...context } : bound;
    const entry = formatLogEntry(entryLevel, message, merged);

    if (toConsole) {
      process.stderr.write(entry + "\n");
    }

    if (logFile !== undefined) {
      try {
        appendFileSync(logFile, entry + "\n");
      } catch (err) {
        process.stderr.write(`Failed to write to log file: ${String(err)}\n`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (context) => createLogger({ ...options, context: { ...bound, ...context } }),
  };
}

/** Logger that drops everything; the default for library consumers. */
export function createSilentLogger(): Logger {
  return createLogger({ console: false });
}

/**
 * Lightweight logging utility.
 * Writes to stderr and optionally to a log file, with timestamps and run ID.
 * Stdout is left to the data a command produces.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable stderr output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Where console lines go; stderr by default */
  write?: (line: string) => void;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "mibig.log",
  console: true,
  file: false,
  write: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minimum];
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!isLevelEnabled(level, opts.level)) {
      return;
    }

    const entry = formatLogEntry(level, message, context);

    if (opts.console) {
      opts.write(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // the console still gets the entry
        opts.write(`Failed to write to log file: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

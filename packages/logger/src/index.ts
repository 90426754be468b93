/**
 * @hcloud-ts/logger
 *
 * Structured JSON logging with request ids for API call tracing
 */

import { customAlphabet } from "nanoid";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Create a structured logger. Context fields are merged into every entry.
 */
export function createLogger(context: LogContext = {}, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  const emit = (
    level: LogLevel,
    write: (line: string) => void,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
      ...meta,
    };
    write(JSON.stringify(entry));
  };

  return {
    debug: (msg, meta) => emit("debug", (line) => console.debug(line), msg, meta),
    info: (msg, meta) => emit("info", (line) => console.info(line), msg, meta),
    warn: (msg, meta) => emit("warn", (line) => console.warn(line), msg, meta),
    error: (msg, meta) => emit("error", (line) => console.error(line), msg, meta),
    child: (childContext) => createLogger({ ...context, ...childContext }, options),
  };
}

const randomId = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 12);

/**
 * Generate a request id, `req_<12 lowercase alphanumerics>`
 */
export function generateRequestId(): string {
  return `req_${randomId()}`;
}

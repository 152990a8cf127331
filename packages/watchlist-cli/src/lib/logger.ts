// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /**
   * Send every level to stderr. Used when stdout carries command output
   * (JSON results, NDJSON events) that log lines must not interleave with.
   */
  stderrOnly?: boolean;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * Outputs to stdout (info/debug) or stderr (warn/error) unless `stderrOnly`.
 * Supports JSON format for log aggregation systems.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];

  function formatMessage(level: LogLevel, message: string, meta: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();

    if (options.json) {
      const entry: LogEntry = { timestamp, level, message, ...meta };
      return JSON.stringify(entry);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function write(level: LogLevel, line: string): void {
    if (options.stderrOnly || level === "warn" || level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function createLoggerInstance(defaultMeta: Record<string, unknown>): Logger {
    const log = (level: LogLevel, message: string, meta: Record<string, unknown> = {}) => {
      if (LOG_LEVELS[level] < minLevel) return;
      write(level, formatMessage(level, message, { ...defaultMeta, ...meta }));
    };

    return {
      debug: (msg, meta) => log("debug", msg, meta),
      info: (msg, meta) => log("info", msg, meta),
      warn: (msg, meta) => log("warn", msg, meta),
      error: (msg, meta) => log("error", msg, meta),
      child: (childMeta) => createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance({});
}

/**
 * Create a no-op logger that discards all messages.
 * The coordinator's default when no logger is injected.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}

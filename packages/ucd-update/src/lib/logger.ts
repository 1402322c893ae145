// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Clock override, used by tests for stable timestamps */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
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
 * debug/info go to stdout, warn/error to stderr; `json` switches to one JSON object per line.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const now = options.now ?? (() => new Date());

  function format(level: LogLevel, message: string, meta: LogMeta): string {
    const timestamp = now().toISOString();

    if (options.json) {
      const entry: LogEntry = { timestamp, level, message, ...meta };
      return JSON.stringify(entry);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function write(level: LogLevel, message: string, meta: LogMeta): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const line = format(level, message, meta);
    if (level === "warn" || level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function scoped(defaultMeta: LogMeta): Logger {
    return {
      debug: (msg, meta) => write("debug", msg, { ...defaultMeta, ...meta }),
      info: (msg, meta) => write("info", msg, { ...defaultMeta, ...meta }),
      warn: (msg, meta) => write("warn", msg, { ...defaultMeta, ...meta }),
      error: (msg, meta) => write("error", msg, { ...defaultMeta, ...meta }),
      child: (childMeta) => scoped({ ...defaultMeta, ...childMeta }),
    };
  }

  return scoped({});
}

/**
 * Create a logger that discards all messages.
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

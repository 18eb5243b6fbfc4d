export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Logger sharing this one's level, with an extra `[prefix]` on every line */
  child(prefix: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function formatMessage(
  level: LogLevel,
  message: string,
  prefix: string | undefined,
  data?: unknown,
): string {
  const timestamp = formatTimestamp();
  const color = LEVEL_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  const scope = prefix ? ` [${prefix}]` : "";

  let formatted = `${color}[${timestamp}] ${levelStr}${RESET}${scope} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ` ${data.message}`;
    } else if (typeof data === "object") {
      formatted += ` ${JSON.stringify(data, null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

/**
 * Create a logger. Children share the parent's level holder, so
 * changing the level on any of them affects the whole tree.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const state = { level: options.level ?? "info" };
  return build(state, options.prefix);
}

function build(state: { level: LogLevel }, prefix: string | undefined): Logger {
  const shouldLog = (level: LogLevel): boolean =>
    LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[state.level];

  return {
    debug(message, data) {
      if (shouldLog("debug")) {
        console.log(formatMessage("debug", message, prefix, data));
      }
    },
    info(message, data) {
      if (shouldLog("info")) {
        console.log(formatMessage("info", message, prefix, data));
      }
    },
    warn(message, data) {
      if (shouldLog("warn")) {
        console.warn(formatMessage("warn", message, prefix, data));
      }
    },
    error(message, data) {
      if (shouldLog("error")) {
        console.error(formatMessage("error", message, prefix, data));
      }
    },
    child(childPrefix) {
      return build(state, prefix ? `${prefix}/${childPrefix}` : childPrefix);
    },
    setLevel(level) {
      state.level = level;
    },
    getLevel() {
      return state.level;
    },
  };
}

/** Process logger used by the CLI entry points */
export const logger = createLogger({ level: "info" });

export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level);
}

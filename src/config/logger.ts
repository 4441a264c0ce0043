/**
 * Structured logger with level filtering.
 *
 * Production (NODE_ENV=production) writes one JSON object per line; every
 * other environment writes a short human-readable line. The minimum level is
 * "info" until `logger.setLevel` is called with the configured LOG_LEVEL.
 *
 *   logger.info("server", "Listening", { port: 3001 });
 *   logger.error("products", "Insert failed", { error: message });
 */

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

type LogExtra = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

let minimumLevel: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const suffix = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : "";
  return `[${component}] ${level.toUpperCase()} ${message}${suffix}`;
}

function log(level: LogLevel, component: string, message: string, extra?: LogExtra): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minimumLevel]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const line = process.env.NODE_ENV === "production" ? JSON.stringify(entry) : formatPretty(entry);
  SINKS[level](line);
}

const logger = {
  setLevel(level: LogLevel): void {
    minimumLevel = level;
  },

  debug(component: string, message: string, extra?: LogExtra): void {
    log("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: LogExtra): void {
    log("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: LogExtra): void {
    log("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: LogExtra): void {
    log("error", component, message, extra);
  },
};

export { logger, isLogLevel };
export type { LogLevel, LogEntry };

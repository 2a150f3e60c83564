/**
 * Lightweight structured logger.
 *
 * - JSON lines when NODE_ENV=production or LOG_FORMAT=json
 * - Pretty single lines otherwise
 *
 * Log levels (in order of severity): debug < info < warn < error.
 * LOG_LEVEL sets the minimum verbosity (default: "info"). Both variables are
 * read on every call so tests and operators can change them at runtime.
 *
 * Usage:
 *   import { logger } from "../config/logger";
 *   logger.info("server", "Listening", { port: 8080 });
 *   logger.warn("extractor", "Invalid base64 image skipped", { requestId });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

type LogExtra = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Level hierarchy
// ---------------------------------------------------------------------------

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

function getLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function useJson(): boolean {
  const format = (process.env.LOG_FORMAT || "").toLowerCase();
  if (format === "json") return true;
  if (format === "pretty") return false;
  return process.env.NODE_ENV === "production";
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, component, message, ...extra } = entry;
  const extraStr =
    Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `${timestamp} [${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

// ---------------------------------------------------------------------------
// Core log function
// ---------------------------------------------------------------------------

function log(level: LogLevel, component: string, message: string, extra?: LogExtra): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const formatted = useJson() ? JSON.stringify(entry) : formatPretty(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const logger = {
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

  /** True when a message at `level` would be written. */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
  },
};

export { logger };
export type { LogLevel, LogEntry, LogExtra };

/**
 * Structured, component-tagged logger.
 *
 * - Production (NODE_ENV=production): one JSON object per line
 * - Anywhere else: `[component] LEVEL message {extra}`
 *
 * Levels: debug < info < warn < error. LOG_LEVEL sets the minimum (default "info").
 * Paste content and passwords must never be passed as extra fields.
 *
 * Usage:
 *   import { logger } from "../config/logger";
 *   logger.info("pastes", "Paste created", { id });
 *
 *   const log = logger.child("scheduler");
 *   log.warn("Sweep skipped");
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

type LogExtra = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

interface ComponentLogger {
  debug(message: string, extra?: LogExtra): void;
  info(message: string, extra?: LogExtra): void;
  warn(message: string, extra?: LogExtra): void;
  error(message: string, extra?: LogExtra): void;
}

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
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

// Read on every call so tests can flip LOG_LEVEL / NODE_ENV at runtime
function minimumLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr =
    Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

function format(entry: LogEntry): string {
  return process.env.NODE_ENV === "production"
    ? JSON.stringify(entry)
    : formatPretty(entry);
}

// ---------------------------------------------------------------------------
// Core log function
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  component: string,
  message: string,
  extra?: LogExtra
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minimumLevel()]) {
    return;
  }

  const line = format({
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  });

  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/** Message of an unknown thrown value, for the `error` extra field. */
function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
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

  /** Bind a component name once instead of repeating it on every call. */
  child(component: string): ComponentLogger {
    return {
      debug: (message, extra) => log("debug", component, message, extra),
      info: (message, extra) => log("info", component, message, extra),
      warn: (message, extra) => log("warn", component, message, extra),
      error: (message, extra) => log("error", component, message, extra),
    };
  },
};

export { logger, errorMessage };
export type { LogLevel, LogEntry, ComponentLogger };

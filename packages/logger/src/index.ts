/**
 * @waypost/logger - Structured Logging Package
 *
 * Provides consistent structured logging across all Waypost workspaces.
 * Uses pino for JSON logging.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@waypost/logger";
 *
 * // Use default logger
 * logger.info({ entries: 12 }, "Sources loaded");
 *
 * // Create component-specific logger
 * const storeLogger = createLogger("store");
 * storeLogger.error({ err }, "Store open failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "waypost";

// Jest sets NODE_ENV=test; keep test output clean unless LOG_LEVEL asks otherwise.
const LOG_LEVEL = process.env.LOG_LEVEL || (NODE_ENV === "test" ? "silent" : "info");

// ============================================================================
// Logger Factory
// ============================================================================

export interface LoggerOptions {
  /** Overrides LOG_LEVEL for this logger */
  level?: LogLevel | "silent";
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  return pino({
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: NODE_ENV,
    },
  });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger for general use
 */
export const logger = createLogger("main");

// ============================================================================
// Log Level Helpers
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Narrow an arbitrary string (env var, flag) to a known level
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Re-export pino types for consumers
export type { Logger } from "pino";

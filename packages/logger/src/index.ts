/**
 * @shortlink/logger - Structured Logging Package
 *
 * Provides consistent structured logging across all services.
 * Uses pino for JSON logging.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@shortlink/logger";
 *
 * logger.info({ shortcode: "abcd" }, "Link created");
 *
 * const registryLogger = createLogger("registry");
 * registryLogger.warn({ err }, "Click not recorded");
 *
 * logEvent(registryLogger, "URL_CREATED", { shortcode: "abcd" });
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "shortlink";

// ============================================================================
// Logger Factory
// ============================================================================

export interface LoggerOptions {
  /** Overrides LOG_LEVEL for this logger */
  level?: LogLevel;
}

/**
 * Create a logger instance for a specific service/component
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
// Domain Events
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/**
 * Named events emitted by the link service.
 * Each one is logged as `{ event, ...data }` so they can be filtered on.
 */
export type LinkEvent =
  | "URL_CREATED"
  | "URL_REDIRECT"
  | "STATS_ACCESSED"
  | "SHORTCODE_EXISTS"
  | "SHORTCODE_NOT_FOUND"
  | "URL_EXPIRED"
  | "CLICK_RECORD_FAILED";

type EventLevel = "debug" | "info" | "warn" | "error";

export function logEvent(
  log: pino.Logger,
  event: LinkEvent,
  data: Record<string, unknown> = {},
  level: EventLevel = "info"
): void {
  log[level]({ event, ...data }, event);
}

// Re-export pino types for consumers
export type { Logger } from "pino";

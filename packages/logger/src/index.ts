/**
 * @linkcast/logger - Structured Logging Package
 *
 * Provides consistent structured logging across all Linkcast services.
 * Uses pino for high-performance JSON logging.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@linkcast/logger";
 *
 * // Use default logger
 * logger.info({ shortCode: "abc123" }, "Subscriber attached");
 *
 * // Create service-specific logger
 * const hubLogger = createLogger("hub");
 * hubLogger.error({ err }, "Send failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "linkcast";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel | "silent";
  /** Overrides pretty printing (defaults to on in development) */
  pretty?: boolean;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Build the pino options used by every service logger.
 *
 * Exposed separately so Fastify can be configured with the same shape.
 */
export function loggerOptions(name: string, options: LoggerOptions = {}): pino.LoggerOptions {
  const pretty = options.pretty ?? NODE_ENV === "development";

  return {
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: pretty
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
  };
}

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, options?: LoggerOptions): pino.Logger {
  return pino(loggerOptions(name, options));
}

/**
 * Logger that discards everything. Used by tests and tooling.
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger for general use
 */
export const logger = createLogger("main");

// Re-export pino types for consumers
export type { Logger } from "pino";

/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * Fail fast on startup if required vars are missing.
 */

import type { Logger, LogLevel } from "@linkcast/logger";
import type { Config } from "./types.js";

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return defaultValue;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  return defaultValue;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function parseLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? "info";
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing
 */
export function loadConfig(env: Env = process.env): Config {
  return {
    // Server
    port: optionalInt(env, "PORT", 3003),
    host: optional(env, "HOST", "0.0.0.0"),
    env: optional(env, "NODE_ENV", "development"),
    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
    corsOrigin: env.CORS_ORIGIN || undefined,
    maxPayloadBytes: optionalInt(env, "MAX_PAYLOAD_BYTES", 1024 * 1024),

    // Database
    databaseUrl: required(env, "DATABASE_URL"),
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 2000),

    // Redis
    redisUrl: required(env, "REDIS_URL"),
    snapshotCacheTtlSeconds: optionalInt(env, "SNAPSHOT_CACHE_TTL_SECONDS", 10),

    // Hub
    broadcastBufferSize: optionalInt(env, "BROADCAST_BUFFER_SIZE", 1000),
    maxPendingRequests: optionalInt(env, "MAX_PENDING_REQUESTS", 32),
    sendTimeoutMs: optionalInt(env, "SEND_TIMEOUT_MS", 1000),
    readTimeoutMs: optionalInt(env, "READ_TIMEOUT_MS", 60_000),
    keepaliveIntervalMs: optionalInt(env, "KEEPALIVE_INTERVAL_MS", 54_000),
    refreshIntervalMs: optionalInt(env, "REFRESH_INTERVAL_MS", 30_000),
    initialSnapshotDays: optionalInt(env, "INITIAL_SNAPSHOT_DAYS", 30),
    refreshSnapshotDays: optionalInt(env, "REFRESH_SNAPSHOT_DAYS", 1),

    // Ingest
    ingestEnabled: optionalBool(env, "INGEST_ENABLED", true),
  };
}

/**
 * Validate configuration at runtime.
 * Throws on settings the hub cannot run with, warns on suboptimal ones.
 */
export function validateConfig(config: Config, logger: Logger): void {
  if (config.broadcastBufferSize < 1) {
    throw new Error(`BROADCAST_BUFFER_SIZE must be at least 1, got ${config.broadcastBufferSize}`);
  }

  if (config.maxPendingRequests < 1) {
    throw new Error(`MAX_PENDING_REQUESTS must be at least 1, got ${config.maxPendingRequests}`);
  }

  // Clients must see a ping before their read deadline expires
  if (config.keepaliveIntervalMs >= config.readTimeoutMs) {
    logger.warn(
      { keepaliveIntervalMs: config.keepaliveIntervalMs, readTimeoutMs: config.readTimeoutMs },
      "KEEPALIVE_INTERVAL_MS should be shorter than READ_TIMEOUT_MS"
    );
  }

  if (config.sendTimeoutMs > 5000) {
    logger.warn(
      { sendTimeoutMs: config.sendTimeoutMs },
      "SEND_TIMEOUT_MS is high; one slow client can delay a broadcast this long"
    );
  }

  if (config.refreshIntervalMs < 5000) {
    logger.warn(
      { refreshIntervalMs: config.refreshIntervalMs },
      "REFRESH_INTERVAL_MS is short; this may cause high database load"
    );
  }

  for (const [name, days] of [
    ["INITIAL_SNAPSHOT_DAYS", config.initialSnapshotDays],
    ["REFRESH_SNAPSHOT_DAYS", config.refreshSnapshotDays],
  ] as const) {
    if (days < 1 || days > 365) {
      throw new Error(`${name} must be between 1 and 365, got ${days}`);
    }
  }
}

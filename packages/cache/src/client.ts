/**
 * Redis Client Factory
 *
 * Creates and configures Redis client instances using ioredis.
 */

import { Redis } from "ioredis";
import { createLogger } from "@linkcast/logger";

const log = createLogger("redis");

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 3) */
  maxRetries?: number;
}

/**
 * Create a configured Redis client
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeout = 5000,
    commandTimeout = 1000,
    maxRetries = 3,
  } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,

    enableReadyCheck: true,
    enableOfflineQueue: false, // Fail fast when disconnected

    retryStrategy: (times) => {
      if (times > 5) return null; // Stop retrying after 5 attempts
      return Math.min(times * 100, 2000);
    },
  });

  client.on("connect", () => log.info("Connected"));
  client.on("error", (err: Error) => log.warn({ err }, "Redis error"));
  client.on("close", () => log.debug("Connection closed"));

  return client;
}

/**
 * Connection options for BullMQ, which manages its own ioredis connections
 */
export interface RedisConnectionOptions {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db: number;
  tls?: Record<string, never>;
  maxRetriesPerRequest: null;
  enableReadyCheck: boolean;
}

/**
 * Split a redis:// or rediss:// URL into BullMQ connection options
 */
export function redisConnectionOptions(url: string): RedisConnectionOptions {
  const parsed = new URL(url);
  const options: RedisConnectionOptions = {
    host: parsed.hostname || "localhost",
    port: parsed.port ? Number(parsed.port) : 6379,
    db: Number(parsed.pathname.slice(1)) || 0,
    maxRetriesPerRequest: null, // Required for BullMQ workers
    enableReadyCheck: false,
  };

  if (parsed.username) options.username = decodeURIComponent(parsed.username);
  if (parsed.password) options.password = decodeURIComponent(parsed.password);
  if (parsed.protocol === "rediss:") options.tls = {};

  return options;
}

/**
 * Redis Cache Abstraction
 *
 * JSON values under versioned, prefixed keys. Reads never throw: a Redis
 * failure or an unparsable value is a cache miss.
 *
 * Key Schema:
 *   lc:v1:{key}
 */

import { createRedisClient, type RedisClientOptions } from "./client.js";
import type { CacheClient, CacheConfig, RedisLike } from "./types.js";

const DEFAULT_KEY_PREFIX = "lc:v1:";

// Default TTL (seconds)
const DEFAULT_TTL = 60;

/**
 * Redis-based cache implementation
 */
export class RedisCache implements CacheClient {
  private client: RedisLike;
  private keyPrefix: string;
  private defaultTTL: number;

  constructor(client: RedisLike, options: Omit<CacheConfig, "url"> = {}) {
    this.client = client;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.defaultTTL = options.defaultTTL ?? DEFAULT_TTL;
  }

  async get<T>(key: string): Promise<T | null> {
    try {
      const data = await this.client.get(this.key(key));
      if (!data) return null;
      return JSON.parse(data) as T;
    } catch {
      return null;
    }
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    const seconds = ttl ?? this.defaultTTL;
    await this.client.setex(this.key(key), seconds, JSON.stringify(value));
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.client.ping();
      return result === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }

  private key(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}

/**
 * Create a RedisCache instance from configuration
 */
export function createRedisCache(
  options: RedisClientOptions & Omit<CacheConfig, "url">
): RedisCache {
  const client = createRedisClient(options);
  return new RedisCache(client, {
    keyPrefix: options.keyPrefix,
    defaultTTL: options.defaultTTL,
  });
}

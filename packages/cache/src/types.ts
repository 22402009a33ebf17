/**
 * Cache Type Definitions
 */

export interface CacheConfig {
  url: string;
  /** Prepended to every key (default: "lc:v1:") */
  keyPrefix?: string;
  /** Seconds, when `set` is called without a TTL */
  defaultTTL?: number;
}

/**
 * JSON cache as seen by callers. Reads report a miss instead of throwing.
 */
export interface CacheClient {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttl?: number): Promise<void>;
  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}

/**
 * The ioredis commands RedisCache issues; tests substitute an in-memory map
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

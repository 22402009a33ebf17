/**
 * Cache Package Exports
 *
 * Redis-backed JSON cache shared by Linkcast services.
 */

export { RedisCache, createRedisCache } from "./cache.js";
export {
  createRedisClient,
  redisConnectionOptions,
  type RedisClientOptions,
  type RedisConnectionOptions,
} from "./client.js";
export type { CacheClient, CacheConfig, RedisLike } from "./types.js";

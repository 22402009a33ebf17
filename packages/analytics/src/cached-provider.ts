/**
 * Cached Snapshot Provider
 *
 * Read-through Redis cache in front of any SnapshotProvider. Several
 * dashboards subscribing to the same link within a few seconds share one
 * aggregation.
 *
 * Cache key: snapshot:{shortCode}:{windowDays} (under the cache key prefix)
 * Empty results are not cached so a newly created link shows up at once.
 */

import type { CacheClient } from "@linkcast/cache";
import type { Logger } from "@linkcast/logger";
import type { AnalyticsSnapshot } from "@linkcast/shared";
import type { SnapshotProvider } from "./types.js";

export const DEFAULT_SNAPSHOT_TTL_SECONDS = 10;

export interface CachedSnapshotProviderOptions {
  ttlSeconds?: number;
  logger?: Logger;
}

export function snapshotCacheKey(shortCode: string, windowDays: number): string {
  return `snapshot:${shortCode}:${windowDays}`;
}

export class CachedSnapshotProvider implements SnapshotProvider {
  private readonly ttlSeconds: number;
  private readonly logger?: Logger;

  constructor(
    private readonly inner: SnapshotProvider,
    private readonly cache: CacheClient,
    options: CachedSnapshotProviderOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SNAPSHOT_TTL_SECONDS;
    this.logger = options.logger;
  }

  async getSnapshot(shortCode: string, windowDays: number): Promise<AnalyticsSnapshot | null> {
    const key = snapshotCacheKey(shortCode, windowDays);

    // RedisCache.get resolves null on connection errors, so a Redis outage
    // falls through to the database
    const cached = await this.cache.get<AnalyticsSnapshot>(key);
    if (cached) return cached;

    const snapshot = await this.inner.getSnapshot(shortCode, windowDays);
    if (!snapshot) return null;

    try {
      await this.cache.set(key, snapshot, this.ttlSeconds);
    } catch (err) {
      this.logger?.warn({ err, shortCode, windowDays }, "Failed to cache snapshot");
    }

    return snapshot;
  }
}

/**
 * Cached Snapshot Provider Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { RedisCache, type RedisLike } from "@linkcast/cache";
import { createSilentLogger } from "@linkcast/logger";
import { emptySnapshot, type AnalyticsSnapshot } from "@linkcast/shared";
import { CachedSnapshotProvider, snapshotCacheKey } from "../src/cached-provider.js";
import type { SnapshotProvider } from "../src/types.js";

class InMemoryRedis implements RedisLike {
  readonly store = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  failing = false;

  async get(key: string): Promise<string | null> {
    this.assertUp();
    return this.store.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.assertUp();
    this.store.set(key, value);
    this.ttls.set(key, seconds);
    return "OK";
  }

  async ping(): Promise<string> {
    return "PONG";
  }

  async quit(): Promise<string> {
    return "OK";
  }

  private assertUp(): void {
    if (this.failing) throw new Error("Connection is closed.");
  }
}

class CountingProvider implements SnapshotProvider {
  calls = 0;
  result: AnalyticsSnapshot | null;
  error: Error | null = null;

  constructor(result: AnalyticsSnapshot | null) {
    this.result = result;
  }

  async getSnapshot(): Promise<AnalyticsSnapshot | null> {
    this.calls++;
    if (this.error) throw this.error;
    return this.result;
  }
}

const snapshot: AnalyticsSnapshot = {
  ...emptySnapshot("abc123", 30),
  originalUrl: "https://example.com/landing",
  totalClicks: 3,
  uniqueVisitors: 2,
  dailyClicks: [{ date: "2024-05-01", clicks: 3 }],
};

describe("CachedSnapshotProvider", () => {
  let redis: InMemoryRedis;
  let inner: CountingProvider;
  let provider: CachedSnapshotProvider;

  beforeEach(() => {
    redis = new InMemoryRedis();
    inner = new CountingProvider(snapshot);
    provider = new CachedSnapshotProvider(inner, new RedisCache(redis), {
      logger: createSilentLogger(),
    });
  });

  it("should build keys from short code and window", () => {
    expect(snapshotCacheKey("abc123", 30)).toBe("snapshot:abc123:30");
  });

  it("should populate the cache on a miss", async () => {
    expect(await provider.getSnapshot("abc123", 30)).toEqual(snapshot);

    expect(inner.calls).toBe(1);
    expect(redis.ttls.get("lc:v1:snapshot:abc123:30")).toBe(10);
  });

  it("should serve repeated reads from the cache", async () => {
    await provider.getSnapshot("abc123", 30);
    const second = await provider.getSnapshot("abc123", 30);

    expect(second).toEqual(snapshot);
    expect(inner.calls).toBe(1);
  });

  it("should cache each window separately", async () => {
    await provider.getSnapshot("abc123", 30);
    await provider.getSnapshot("abc123", 1);

    expect(inner.calls).toBe(2);
  });

  it("should honor a custom TTL", async () => {
    provider = new CachedSnapshotProvider(inner, new RedisCache(redis), { ttlSeconds: 5 });

    await provider.getSnapshot("abc123", 30);

    expect(redis.ttls.get("lc:v1:snapshot:abc123:30")).toBe(5);
  });

  it("should not cache missing links", async () => {
    inner.result = null;

    expect(await provider.getSnapshot("abc123", 30)).toBeNull();
    expect(await provider.getSnapshot("abc123", 30)).toBeNull();

    expect(inner.calls).toBe(2);
    expect(redis.store.size).toBe(0);
  });

  it("should fall through to the inner provider when Redis is down", async () => {
    redis.failing = true;

    expect(await provider.getSnapshot("abc123", 30)).toEqual(snapshot);
    expect(inner.calls).toBe(1);
  });

  it("should propagate inner provider failures", async () => {
    inner.error = new Error("database unavailable");

    await expect(provider.getSnapshot("abc123", 30)).rejects.toThrow("database unavailable");
  });
});

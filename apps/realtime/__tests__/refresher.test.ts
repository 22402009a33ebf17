import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { createSilentLogger } from "@linkcast/logger";
import { emptySnapshot, type AnalyticsSnapshot } from "@linkcast/shared";
import { PeriodicRefresher, type RefreshTarget } from "../src/refresher.js";
import * as metrics from "../src/metrics.js";
import type { Update } from "../src/types.js";
import { StubSnapshots, deferred, waitFor } from "./helpers.js";

class RecordingTarget implements RefreshTarget {
  topics: string[] = [];
  readonly updates: Update[] = [];

  activeTopics(): string[] {
    return [...this.topics];
  }

  broadcast(update: Update): boolean {
    this.updates.push(update);
    return true;
  }
}

describe("PeriodicRefresher", () => {
  let target: RecordingTarget;
  let snapshots: StubSnapshots;
  let refresher: PeriodicRefresher;

  beforeEach(() => {
    metrics.reset();
    target = new RecordingTarget();
    snapshots = new StubSnapshots();
    refresher = new PeriodicRefresher({ target, snapshots, logger: createSilentLogger() });
  });

  afterEach(() => {
    refresher.stop();
  });

  it("should broadcast a one-day snapshot for every active topic", async () => {
    const snapshot: AnalyticsSnapshot = { ...emptySnapshot("abc123", 1), totalClicks: 5 };
    snapshots.results.set("abc123", snapshot);
    target.topics = ["abc123", "xyz999"];

    await refresher.refreshOnce();

    expect(snapshots.calls).toEqual([
      ["abc123", 1],
      ["xyz999", 1],
    ]);
    const byTopic = new Map(target.updates.map((update) => [update.topic, update]));
    expect(byTopic.get("abc123")?.kind).toBe("analytics_snapshot");
    expect(byTopic.get("abc123")?.payload).toEqual(snapshot);
    expect(byTopic.get("xyz999")?.payload).toEqual(emptySnapshot("xyz999", 1));
  });

  it("should do nothing without subscribers", async () => {
    await refresher.refreshOnce();

    expect(snapshots.calls).toEqual([]);
    expect(target.updates).toEqual([]);
  });

  it("should skip a topic whose fetch fails", async () => {
    snapshots.error = new Error("statement timeout");
    target.topics = ["abc123"];

    await expect(refresher.refreshOnce()).resolves.toBeUndefined();

    expect(target.updates).toEqual([]);
    expect(metrics.counter("snapshot_fetch_failures")).toBe(1);
  });

  it("should not start a second fetch for a topic still in flight", async () => {
    const gate = deferred();
    snapshots.gate = gate.promise;
    target.topics = ["abc123"];

    const first = refresher.refreshOnce();
    await refresher.refreshOnce();
    gate.resolve();
    await first;

    expect(snapshots.calls).toHaveLength(1);
    expect(target.updates).toHaveLength(1);
  });

  it("should tick on its interval until stopped", async () => {
    refresher = new PeriodicRefresher({
      target,
      snapshots,
      logger: createSilentLogger(),
      intervalMs: 20,
      windowDays: 7,
    });
    target.topics = ["abc123"];

    refresher.start();
    refresher.start();
    await waitFor(() => target.updates.length >= 2);
    refresher.stop();

    expect(snapshots.calls[0]).toEqual(["abc123", 7]);
  });
});

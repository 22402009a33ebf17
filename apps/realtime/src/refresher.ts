/**
 * Periodic Refresher
 *
 * Keeps dashboards current when no clicks arrive: on every tick, each
 * watched short code gets a fresh short-window snapshot broadcast as an
 * `analytics_update`.
 *
 * Topics refresh independently; a failed or slow fetch only affects its own
 * topic, and a topic whose previous fetch is still running is skipped.
 */

import type { Logger } from "@linkcast/logger";
import { ANALYTICS_WINDOWS, emptySnapshot } from "@linkcast/shared";
import type { SnapshotProvider } from "@linkcast/analytics";
import { snapshotUpdate } from "./protocol.js";
import * as metrics from "./metrics.js";
import type { Update } from "./types.js";

/**
 * What the refresher needs from the hub
 */
export interface RefreshTarget {
  activeTopics(): string[];
  broadcast(update: Update): boolean;
}

export interface RefresherOptions {
  target: RefreshTarget;
  snapshots: SnapshotProvider;
  logger: Logger;
  /** Tick period (default: 30s) */
  intervalMs?: number;
  /** Snapshot window (default: 1 day) */
  windowDays?: number;
}

export class PeriodicRefresher {
  private readonly target: RefreshTarget;
  private readonly snapshots: SnapshotProvider;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly windowDays: number;
  private readonly inFlight = new Set<string>();
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RefresherOptions) {
    this.target = options.target;
    this.snapshots = options.snapshots;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? 30_000;
    this.windowDays = options.windowDays ?? ANALYTICS_WINDOWS.REFRESH_DAYS;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.refreshOnce();
    }, this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs, windowDays: this.windowDays }, "Refresher started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Run one refresh cycle. Resolves once every topic's fetch settled;
   * never rejects.
   */
  async refreshOnce(): Promise<void> {
    const topics = this.target.activeTopics().filter((topic) => !this.inFlight.has(topic));
    await Promise.allSettled(topics.map((topic) => this.refreshTopic(topic)));
  }

  private async refreshTopic(topic: string): Promise<void> {
    this.inFlight.add(topic);
    try {
      const snapshot = await this.snapshots.getSnapshot(topic, this.windowDays);
      this.target.broadcast(snapshotUpdate(topic, snapshot ?? emptySnapshot(topic, this.windowDays)));
    } catch (err) {
      metrics.increment("snapshot_fetch_failures");
      this.logger.warn({ err, topic, windowDays: this.windowDays }, "Snapshot refresh failed");
    } finally {
      this.inFlight.delete(topic);
    }
  }
}

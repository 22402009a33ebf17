/**
 * Realtime Analytics Hub
 *
 * Fans click, conversion and snapshot updates out to the WebSocket clients
 * subscribed to a short code.
 *
 * Concurrency model:
 * - One control loop owns the connection registry and the subscription
 *   index; nothing else reads or writes them
 * - Everything else (connections, producers, timers) talks to the loop
 *   through the inbox
 * - One broadcast is dispatched at a time and every send is bounded by the
 *   send timeout, so updates for a topic arrive in submission order and a
 *   dead client stalls the loop for at most one timeout
 *
 * Delivery is best-effort:
 * - A full broadcast queue drops the newest update
 * - A client with too many subscribe/unsubscribe requests queued has the
 *   next one dropped
 * - A failed send unregisters the subscriber; nothing is retried
 * - An unsubscribe racing a broadcast for the same topic may or may not see
 *   that update
 */

import type { Logger } from "@linkcast/logger";
import { ANALYTICS_WINDOWS, emptySnapshot, type ConversionEvent } from "@linkcast/shared";
import { enrichClick, type SnapshotProvider } from "@linkcast/analytics";
import { HubInbox } from "./inbox.js";
import { SubscriptionIndex } from "./subscriptions.js";
import { clickUpdate, conversionUpdate, initialSnapshotUpdate } from "./protocol.js";
import { withTimeout } from "./timeout.js";
import * as metrics from "./metrics.js";
import type { ConnectionHandle, HubPort, Update } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface HubOptions {
  snapshots: SnapshotProvider;
  logger: Logger;
  /** Broadcast queue capacity (default: 1000) */
  broadcastBufferSize?: number;
  /** Bound on every send and ping (default: 1000ms) */
  sendTimeoutMs?: number;
  /** Ping period (default: 54s) */
  keepaliveIntervalMs?: number;
  /** Window of the snapshot sent after a subscribe (default: 30 days) */
  initialSnapshotDays?: number;
  /** Subscribe/unsubscribe requests one connection may have queued (default: 32) */
  maxPendingRequests?: number;
}

type ControlRequest =
  | { type: "register"; handle: ConnectionHandle }
  | { type: "unregister"; handle: ConnectionHandle; reason: string }
  | { type: "subscribe"; handle: ConnectionHandle; topic: string }
  | { type: "unsubscribe"; handle: ConnectionHandle; topic: string }
  | { type: "deliver"; handle: ConnectionHandle; subscriptionId: number; update: Update }
  | { type: "keepalive" };

export const HUB_DEFAULTS = {
  BROADCAST_BUFFER_SIZE: 1000,
  SEND_TIMEOUT_MS: 1000,
  KEEPALIVE_INTERVAL_MS: 54_000,
  MAX_PENDING_REQUESTS: 32,
} as const;

// =============================================================================
// Hub
// =============================================================================

export class Hub implements HubPort {
  private readonly inbox: HubInbox<ControlRequest, Update>;
  private readonly registry = new Set<ConnectionHandle>();
  private readonly index = new SubscriptionIndex<ConnectionHandle>();
  /** Handles that were unregistered; they are never re-added */
  private readonly retired = new WeakSet<ConnectionHandle>();
  /** Current subscription id per (handle, topic); stale snapshot deliveries are dropped */
  private readonly subscriptionIds = new WeakMap<ConnectionHandle, Map<string, number>>();
  private lastSubscriptionId = 0;

  private readonly snapshots: SnapshotProvider;
  private readonly logger: Logger;
  private readonly sendTimeoutMs: number;
  private readonly keepaliveIntervalMs: number;
  private readonly initialSnapshotDays: number;

  private loop: Promise<void> | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: HubOptions) {
    this.snapshots = options.snapshots;
    this.logger = options.logger;
    this.sendTimeoutMs = options.sendTimeoutMs ?? HUB_DEFAULTS.SEND_TIMEOUT_MS;
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? HUB_DEFAULTS.KEEPALIVE_INTERVAL_MS;
    this.initialSnapshotDays = options.initialSnapshotDays ?? ANALYTICS_WINDOWS.INITIAL_DAYS;
    this.inbox = new HubInbox(
      options.broadcastBufferSize ?? HUB_DEFAULTS.BROADCAST_BUFFER_SIZE,
      options.maxPendingRequests ?? HUB_DEFAULTS.MAX_PENDING_REQUESTS
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the control loop and the keepalive timer. Idempotent.
   */
  start(): void {
    if (this.loop || this.inbox.isClosed) return;

    this.loop = this.run();
    this.keepaliveTimer = setInterval(() => {
      this.inbox.postControl({ type: "keepalive" });
    }, this.keepaliveIntervalMs);

    this.logger.info(
      {
        broadcastBufferSize: this.inbox.broadcastCapacity,
        maxPendingRequests: this.inbox.requestCapacity,
        sendTimeoutMs: this.sendTimeoutMs,
        keepaliveIntervalMs: this.keepaliveIntervalMs,
      },
      "Hub started"
    );
  }

  /**
   * Stop accepting input, close every registered connection and wait for
   * the control loop to exit. Idempotent.
   */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  get running(): boolean {
    return this.loop !== null && !this.inbox.isClosed;
  }

  // ---------------------------------------------------------------------------
  // Requests (queued for the control loop)
  // ---------------------------------------------------------------------------

  register(handle: ConnectionHandle): void {
    this.inbox.postControl({ type: "register", handle });
  }

  unregister(handle: ConnectionHandle, reason = "disconnected"): void {
    this.inbox.postControl({ type: "unregister", handle, reason });
  }

  subscribe(handle: ConnectionHandle, topic: string): boolean {
    metrics.increment("subscribe_requests");
    return this.offerRequest(handle, { type: "subscribe", handle, topic });
  }

  unsubscribe(handle: ConnectionHandle, topic: string): boolean {
    metrics.increment("unsubscribe_requests");
    return this.offerRequest(handle, { type: "unsubscribe", handle, topic });
  }

  private offerRequest(
    handle: ConnectionHandle,
    request: Extract<ControlRequest, { type: "subscribe" | "unsubscribe" }>
  ): boolean {
    if (this.inbox.offerRequest(handle, request)) return true;
    if (this.inbox.isClosed) return false;

    metrics.increment("client_requests_dropped");
    this.logger.warn(
      {
        connectionId: handle.id,
        request: request.type,
        topic: request.topic,
        limit: this.inbox.requestCapacity,
      },
      "Too many pending requests, request dropped"
    );
    return false;
  }

  /**
   * Queue an update for every subscriber of its topic. Never blocks.
   *
   * @returns false when the update was dropped
   */
  broadcast(update: Update): boolean {
    if (this.inbox.isClosed) {
      this.logger.debug({ topic: update.topic, kind: update.kind }, "Hub stopped, update discarded");
      return false;
    }

    if (!this.inbox.offerBroadcast(update)) {
      metrics.increment("broadcasts_dropped");
      this.logger.warn(
        { topic: update.topic, kind: update.kind, capacity: this.inbox.broadcastCapacity },
        "Broadcast queue full, update dropped"
      );
      return false;
    }

    metrics.increment("broadcasts_accepted");
    return true;
  }

  // ---------------------------------------------------------------------------
  // Producer Entry Points
  // ---------------------------------------------------------------------------

  /**
   * Broadcast a click to the dashboards watching `shortCode`.
   * The raw IP is hashed before it leaves this call.
   */
  broadcastClick(
    shortCode: string,
    ipAddress?: string,
    userAgent?: string,
    referrer?: string,
    country?: string,
    occurredAt?: Date
  ): boolean {
    const click = enrichClick({ shortCode, ipAddress, userAgent, referrer, country, occurredAt });
    return this.broadcast(clickUpdate(shortCode, click));
  }

  broadcastConversion(shortCode: string, conversion: ConversionEvent): boolean {
    return this.broadcast(conversionUpdate(shortCode, conversion));
  }

  // ---------------------------------------------------------------------------
  // Introspection (point-in-time copies)
  // ---------------------------------------------------------------------------

  activeConnectionCount(): number {
    return this.registry.size;
  }

  activeSubscriptionCounts(): Record<string, number> {
    return this.index.counts();
  }

  activeTopics(): string[] {
    return this.index.topics();
  }

  // ===========================================================================
  // Control Loop
  // ===========================================================================

  private async run(): Promise<void> {
    for (;;) {
      const next = await this.inbox.next();
      if (!next) return;

      try {
        if (next.lane === "broadcast") {
          await this.dispatch(next.item);
        } else {
          await this.apply(next.item);
        }
      } catch (err) {
        // A bug in one iteration must not take the loop down
        this.logger.error({ err, lane: next.lane }, "Hub iteration failed");
      }
    }
  }

  private async apply(request: ControlRequest): Promise<void> {
    switch (request.type) {
      case "register":
        this.onRegister(request.handle);
        return;
      case "unregister":
        this.onUnregister(request.handle, request.reason);
        return;
      case "subscribe":
        this.onSubscribe(request.handle, request.topic);
        return;
      case "unsubscribe":
        this.index.unsubscribe(request.handle, request.topic);
        this.subscriptionIds.get(request.handle)?.delete(request.topic);
        return;
      case "deliver":
        // The client may have unsubscribed, or resubscribed, while the snapshot was fetched
        if (
          this.isCurrentSubscription(request.handle, request.update.topic, request.subscriptionId)
        ) {
          await this.sendTo(request.handle, request.update);
        }
        return;
      case "keepalive":
        this.pingAll();
        return;
    }
  }

  private onRegister(handle: ConnectionHandle): void {
    if (this.retired.has(handle) || this.registry.has(handle)) return;

    this.registry.add(handle);
    metrics.increment("connections_opened");
    this.logger.debug(
      { connectionId: handle.id, connections: this.registry.size },
      "Connection registered"
    );
  }

  private onUnregister(handle: ConnectionHandle, reason: string): void {
    this.retired.add(handle);
    if (!this.registry.delete(handle)) return;

    const topics = this.index.unregisterAll(handle);
    this.subscriptionIds.delete(handle);
    handle.close();

    metrics.increment("connections_closed");
    this.logger.debug(
      { connectionId: handle.id, reason, topics: topics.length, connections: this.registry.size },
      "Connection unregistered"
    );
  }

  private onSubscribe(handle: ConnectionHandle, topic: string): void {
    if (!this.registry.has(handle)) return;
    if (!this.index.subscribe(handle, topic)) return;

    const subscriptionId = ++this.lastSubscriptionId;
    let ids = this.subscriptionIds.get(handle);
    if (!ids) {
      ids = new Map();
      this.subscriptionIds.set(handle, ids);
    }
    ids.set(topic, subscriptionId);

    this.logger.debug({ connectionId: handle.id, topic }, "Subscribed");
    void this.fetchInitialSnapshot(handle, topic, subscriptionId);
  }

  private isCurrentSubscription(
    handle: ConnectionHandle,
    topic: string,
    subscriptionId: number
  ): boolean {
    return (
      this.index.has(handle, topic) && this.subscriptionIds.get(handle)?.get(topic) === subscriptionId
    );
  }

  /**
   * Runs outside the loop; the result comes back as a deliver request
   * tagged with the subscription it was fetched for.
   */
  private async fetchInitialSnapshot(
    handle: ConnectionHandle,
    topic: string,
    subscriptionId: number
  ): Promise<void> {
    const windowDays = this.initialSnapshotDays;

    try {
      const snapshot = await this.snapshots.getSnapshot(topic, windowDays);
      const update = initialSnapshotUpdate(topic, snapshot ?? emptySnapshot(topic, windowDays));
      this.inbox.postControl({ type: "deliver", handle, subscriptionId, update });
    } catch (err) {
      metrics.increment("snapshot_fetch_failures");
      this.logger.warn({ err, topic, windowDays }, "Initial snapshot fetch failed");
    }
  }

  private async dispatch(update: Update): Promise<void> {
    const subscribers = this.index.subscribers(update.topic);
    if (subscribers.length === 0) return;

    const start = performance.now();
    await Promise.all(subscribers.map((handle) => this.sendTo(handle, update)));
    metrics.recordFanout(performance.now() - start);
  }

  /**
   * Send one update under the send timeout. Never rejects; a failure
   * queues an unregister instead of mutating state mid-dispatch.
   */
  private async sendTo(handle: ConnectionHandle, update: Update): Promise<void> {
    try {
      await withTimeout(handle.send(update), this.sendTimeoutMs, `send to ${handle.id}`);
      metrics.increment("messages_delivered");
    } catch (err) {
      metrics.increment("send_failures");
      this.logger.debug({ err, connectionId: handle.id, topic: update.topic }, "Send failed");
      this.unregister(handle, "send failed");
    }
  }

  /**
   * Ping every registered connection. Pings settle outside the loop so a
   * dead client does not hold up broadcasts.
   */
  private pingAll(): void {
    for (const handle of this.registry) {
      withTimeout(handle.ping(), this.sendTimeoutMs, `ping ${handle.id}`).catch((err: unknown) => {
        metrics.increment("keepalive_evictions");
        this.logger.debug({ err, connectionId: handle.id }, "Ping failed");
        this.unregister(handle, "keepalive failed");
      });
    }
  }

  // ===========================================================================
  // Shutdown
  // ===========================================================================

  private async shutdown(): Promise<void> {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }

    this.inbox.close();
    await this.loop;

    const closing = this.registry.size;
    for (const handle of this.registry) {
      this.retired.add(handle);
      handle.close();
    }
    this.registry.clear();
    this.index.clear();

    this.logger.info({ closedConnections: closing }, "Hub stopped");
  }
}

/**
 * Realtime Service Types
 */

import type { AnalyticsSnapshot, ConversionEvent, RealtimeClickData } from "@linkcast/shared";
import type { LogLevel } from "@linkcast/logger";

// =============================================================================
// Configuration
// =============================================================================

export interface Config {
  // Server
  port: number;
  host: string;
  env: string;
  logLevel: LogLevel;
  corsOrigin: string | undefined;
  maxPayloadBytes: number;

  // Database
  databaseUrl: string;
  dbTimeoutMs: number;

  // Redis
  redisUrl: string;
  snapshotCacheTtlSeconds: number;

  // Hub
  broadcastBufferSize: number;
  maxPendingRequests: number;
  sendTimeoutMs: number;
  readTimeoutMs: number;
  keepaliveIntervalMs: number;
  refreshIntervalMs: number;
  initialSnapshotDays: number;
  refreshSnapshotDays: number;

  // Ingest
  ingestEnabled: boolean;
}

// =============================================================================
// Updates
// =============================================================================

export type UpdateKind =
  | "click"
  | "conversion"
  | "analytics_snapshot"
  | "initial_snapshot"
  | "ping";

interface UpdateOf<K extends UpdateKind, P> {
  readonly kind: K;
  /** Short code the update belongs to */
  readonly topic: string;
  readonly payload: P;
  readonly timestamp: Date;
}

/**
 * An immutable value fanned out to every subscriber of `topic`
 */
export type Update =
  | UpdateOf<"click", RealtimeClickData>
  | UpdateOf<"conversion", ConversionEvent>
  | UpdateOf<"analytics_snapshot", AnalyticsSnapshot>
  | UpdateOf<"initial_snapshot", AnalyticsSnapshot>
  | UpdateOf<"ping", null>;

// =============================================================================
// Connections
// =============================================================================

/**
 * One client's duplex channel, as seen by the hub.
 *
 * Owned by the transport layer; the hub only references it.
 */
export interface ConnectionHandle {
  readonly id: string;

  /**
   * Write an update to the client. Bounded by the send timeout, never
   * retried.
   */
  send(update: Update): Promise<void>;

  /**
   * Liveness probe, same timeout as `send`.
   */
  ping(): Promise<void>;

  /**
   * Close the transport. Idempotent.
   */
  close(): void;
}

/**
 * Requests a connection can make of the hub. All of them are queued and
 * applied by the hub's control loop.
 */
export interface HubPort {
  register(handle: ConnectionHandle): void;
  unregister(handle: ConnectionHandle): void;
  subscribe(handle: ConnectionHandle, topic: string): void;
  unsubscribe(handle: ConnectionHandle, topic: string): void;
}

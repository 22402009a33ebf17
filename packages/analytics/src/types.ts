/**
 * @linkcast/analytics - TypeScript Type Definitions
 *
 * Types for the analytics collaborator consumed by the realtime hub
 * (snapshots), click enrichment, and the realtime event queue.
 */

import type { AnalyticsSnapshot, ConversionEvent } from "@linkcast/shared";

// =============================================================================
// Snapshot Provider
// =============================================================================

/**
 * Source of aggregated analytics for a short code.
 *
 * Resolves `null` when the link has no analytics (unknown or deleted
 * link); rejects when the underlying store is unavailable.
 */
export interface SnapshotProvider {
  getSnapshot(shortCode: string, windowDays: number): Promise<AnalyticsSnapshot | null>;
}

/**
 * Analytics error for invalid input or store failures
 */
export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_INPUT" | "QUERY_ERROR" | "QUERY_TIMEOUT",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AnalyticsError";
  }
}

// =============================================================================
// Bot Detection
// =============================================================================

/**
 * Result of bot detection analysis
 */
export interface BotDetectionResult {
  isBot: boolean;
  reason?: BotDetectionReason;
  confidence: number; // 0-1
}

export type BotDetectionReason =
  | "user_agent_pattern"
  | "missing_user_agent"
  | "suspicious_user_agent";

// =============================================================================
// Click Enrichment
// =============================================================================

/**
 * Raw click metadata as seen by the click recorder
 */
export interface ClickInput {
  shortCode: string;
  ipAddress?: string;
  userAgent?: string;
  referrer?: string;
  /** ISO country code when the recorder already resolved it */
  country?: string;
  /** Click time, defaults to now */
  occurredAt?: Date;
}

// =============================================================================
// Realtime Event Queue
// =============================================================================

/**
 * BullMQ queue names
 */
export const QUEUE_NAMES = {
  /** Click and conversion events bound for the realtime hub */
  REALTIME_EVENTS: "lc-realtime-events",
} as const;

/**
 * Job payloads on the realtime events queue
 */
export type RealtimeEventJob =
  | { kind: "click"; click: SerializedClickInput }
  | { kind: "conversion"; conversion: ConversionEvent };

/**
 * ClickInput with the timestamp as epoch millis for queue transport
 */
export interface SerializedClickInput extends Omit<ClickInput, "occurredAt"> {
  occurredAt: number;
}

/**
 * Result of publishing an event
 */
export interface PublishResult {
  success: boolean;
  jobId?: string;
  error?: string;
}

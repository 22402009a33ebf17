/**
 * @linkcast/analytics - Analytics Collaborator Package
 *
 * Everything the realtime hub needs to know about clicks:
 *
 * ┌─────────────┐     ┌─────────────┐     ┌─────────────┐
 * │   Click     │────▶│   BullMQ    │────▶│  Realtime   │
 * │  Recorder   │     │   Queue     │     │    Hub      │
 * └─────────────┘     └─────────────┘     └─────────────┘
 *                                                │
 *                           ┌────────────────────┴──────┐
 *                           ▼                           ▼
 *                    ┌─────────────┐             ┌─────────────┐
 *                    │ Redis cache │────miss────▶│ PostgreSQL  │
 *                    │ (snapshots) │             │click_events │
 *                    └─────────────┘             └─────────────┘
 *
 * Usage:
 * ```ts
 * import {
 *   publishClick,          // Producer - emit events to the hub
 *   enrichClick,           // Hub - build the live click payload
 *   PgSnapshotStore,       // Hub - aggregate snapshots
 *   CachedSnapshotProvider,
 * } from "@linkcast/analytics";
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export {
  AnalyticsError,
  QUEUE_NAMES,
  type SnapshotProvider,
  type BotDetectionResult,
  type BotDetectionReason,
  type ClickInput,
  type SerializedClickInput,
  type RealtimeEventJob,
  type PublishResult,
} from "./types.js";

// =============================================================================
// Snapshots
// =============================================================================

export {
  PgSnapshotStore,
  createPgSnapshotStore,
  type QueryablePool,
  type SnapshotStoreOptions,
} from "./snapshot-store.js";
export {
  CachedSnapshotProvider,
  DEFAULT_SNAPSHOT_TTL_SECONDS,
  snapshotCacheKey,
  type CachedSnapshotProviderOptions,
} from "./cached-provider.js";

// =============================================================================
// Click Enrichment
// =============================================================================

export { enrichClick, hashIpAddress, truncate } from "./click.js";
export { detectBot, isKnownBot } from "./bot-detection.js";
export { parseUserAgent, type ParsedUserAgent } from "./user-agent.js";

// =============================================================================
// Producer
// =============================================================================

export { publishClick, publishConversion, closeProducer } from "./producer.js";

/**
 * Realtime Event Producer
 *
 * Pushes click and conversion events onto the BullMQ queue consumed by the
 * realtime hub's ingest worker. Used by the click recorder and the
 * conversion tracker, which run in other processes.
 *
 * Fire-and-forget:
 * - Never throws; failures are logged and reported in the result
 * - Events are dropped if the queue is unavailable
 *
 * Enrichment (IP hashing, UA parsing) happens in the hub, so the raw IP
 * travels through Redis only until the job is consumed.
 */

import { Queue } from "bullmq";
import { redisConnectionOptions } from "@linkcast/cache";
import { logger } from "@linkcast/logger";
import type { ConversionEvent } from "@linkcast/shared";
import {
  QUEUE_NAMES,
  type ClickInput,
  type PublishResult,
  type RealtimeEventJob,
} from "./types.js";

// =============================================================================
// Queue Instance (Lazy Initialization)
// =============================================================================

let eventQueue: Queue<RealtimeEventJob> | null = null;

/**
 * Get or create the realtime events queue
 */
function getEventQueue(): Queue<RealtimeEventJob> {
  if (!eventQueue) {
    const redisUrl = process.env.REDIS_URL || "redis://localhost:6379";

    eventQueue = new Queue<RealtimeEventJob>(QUEUE_NAMES.REALTIME_EVENTS, {
      connection: redisConnectionOptions(redisUrl),
      defaultJobOptions: {
        // Live updates are worthless once stale, never retry
        attempts: 1,
        removeOnComplete: {
          age: 300,
          count: 1000,
        },
        removeOnFail: {
          age: 3600,
        },
      },
    });

    eventQueue.on("error", (error) => {
      logger.error({ err: error }, "Realtime event queue error");
    });

    logger.info("Realtime event queue initialized");
  }

  return eventQueue;
}

async function publish(
  name: RealtimeEventJob["kind"],
  job: RealtimeEventJob,
  shortCode: string
): Promise<PublishResult> {
  try {
    const added = await getEventQueue().add(name, job);

    logger.debug({ jobId: added.id, shortCode, kind: name }, "Realtime event published");

    return { success: true, jobId: added.id };
  } catch (error) {
    logger.error({ err: error, shortCode, kind: name }, "Failed to publish realtime event");

    return {
      success: false,
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Publish a click for live dashboards.
 *
 * @example
 * ```ts
 * // In the redirect handler (don't await)
 * void publishClick({
 *   shortCode: "abc123",
 *   ipAddress: req.ip,
 *   userAgent: req.headers["user-agent"],
 *   referrer: req.headers.referer,
 * });
 * ```
 */
export function publishClick(input: ClickInput): Promise<PublishResult> {
  const { occurredAt, ...rest } = input;
  return publish(
    "click",
    { kind: "click", click: { ...rest, occurredAt: (occurredAt ?? new Date()).getTime() } },
    input.shortCode
  );
}

/**
 * Publish a recorded conversion for live dashboards.
 */
export function publishConversion(conversion: ConversionEvent): Promise<PublishResult> {
  return publish("conversion", { kind: "conversion", conversion }, conversion.shortCode);
}

/**
 * Graceful shutdown - close queue connection
 */
export async function closeProducer(): Promise<void> {
  if (eventQueue) {
    await eventQueue.close();
    eventQueue = null;
    logger.info("Realtime event queue closed");
  }
}

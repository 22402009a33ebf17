/**
 * Realtime Event Ingest
 *
 * BullMQ worker for the realtime events queue. The click recorder and the
 * conversion tracker publish through @linkcast/analytics' producer; this
 * worker validates each job and hands it to the hub.
 *
 * Concurrency is 1 so jobs for a short code reach the hub in queue order.
 * Invalid payloads are logged and completed, never retried.
 */

import { Worker, type Job } from "bullmq";
import { z } from "zod";
import { redisConnectionOptions } from "@linkcast/cache";
import type { Logger } from "@linkcast/logger";
import { QUEUE_NAMES, type RealtimeEventJob } from "@linkcast/analytics";
import type { ConversionEvent } from "@linkcast/shared";
import { shortCodeSchema } from "./protocol.js";
import * as metrics from "./metrics.js";

// =============================================================================
// Validation
// =============================================================================

const clickJobSchema = z.object({
  kind: z.literal("click"),
  click: z.object({
    shortCode: shortCodeSchema,
    ipAddress: z.string().optional(),
    userAgent: z.string().optional(),
    referrer: z.string().optional(),
    country: z.string().length(2).optional(),
    occurredAt: z.number().int().nonnegative(),
  }),
});

const conversionJobSchema = z.object({
  kind: z.literal("conversion"),
  conversion: z.object({
    shortCode: shortCodeSchema,
    goalId: z.number().int(),
    conversionId: z.string().min(1),
    conversionType: z.string().min(1),
    conversionValue: z.number(),
    sessionId: z.string().optional(),
    clickId: z.number().int().optional(),
    attributionModel: z
      .enum(["first_click", "last_click", "linear", "time_decay", "position_based"])
      .optional(),
    timeToConversion: z.number().optional(),
    conversionTime: z.string().datetime({ offset: true }),
  }),
});

const realtimeEventJobSchema = z.discriminatedUnion("kind", [clickJobSchema, conversionJobSchema]);

// =============================================================================
// Processing
// =============================================================================

/**
 * What ingest needs from the hub
 */
export interface IngestTarget {
  broadcastClick(
    shortCode: string,
    ipAddress?: string,
    userAgent?: string,
    referrer?: string,
    country?: string,
    occurredAt?: Date
  ): boolean;
  broadcastConversion(shortCode: string, conversion: ConversionEvent): boolean;
}

export type IngestOutcome = "broadcast" | "dropped" | "rejected";

/**
 * Validate one job payload and hand it to the hub.
 */
export function processRealtimeEvent(
  data: unknown,
  target: IngestTarget,
  logger: Logger
): IngestOutcome {
  const parsed = realtimeEventJobSchema.safeParse(data);
  if (!parsed.success) {
    metrics.increment("ingest_rejected");
    logger.warn({ issues: parsed.error.issues }, "Rejected invalid realtime event");
    return "rejected";
  }

  const event = parsed.data;
  const accepted =
    event.kind === "click"
      ? target.broadcastClick(
          event.click.shortCode,
          event.click.ipAddress,
          event.click.userAgent,
          event.click.referrer,
          event.click.country,
          new Date(event.click.occurredAt)
        )
      : target.broadcastConversion(event.conversion.shortCode, event.conversion);

  metrics.increment("ingest_jobs");
  return accepted ? "broadcast" : "dropped";
}

// =============================================================================
// Worker
// =============================================================================

export interface IngestWorkerOptions {
  redisUrl: string;
  target: IngestTarget;
  logger: Logger;
}

export function startIngestWorker(options: IngestWorkerOptions): Worker<RealtimeEventJob> {
  const { target, logger } = options;

  const worker = new Worker<RealtimeEventJob>(
    QUEUE_NAMES.REALTIME_EVENTS,
    async (job: Job<RealtimeEventJob>) => processRealtimeEvent(job.data, target, logger),
    {
      connection: redisConnectionOptions(options.redisUrl),
      concurrency: 1,
    }
  );

  worker.on("failed", (job, err) => {
    logger.error({ err, jobId: job?.id }, "Realtime event job failed");
  });

  worker.on("error", (err) => {
    logger.error({ err }, "Ingest worker error");
  });

  logger.info({ queue: QUEUE_NAMES.REALTIME_EVENTS }, "Ingest worker started");

  return worker;
}

/**
 * Realtime Service Bootstrap
 *
 * Wires configuration, Postgres, Redis, the hub, the refresher and the
 * ingest worker together, serves them over Fastify and tears everything
 * down on SIGTERM/SIGINT.
 */

import type { FastifyInstance } from "fastify";
import type { Worker } from "bullmq";
import { createLogger, loggerOptions } from "@linkcast/logger";
import { createRedisCache, type RedisCache } from "@linkcast/cache";
import {
  CachedSnapshotProvider,
  createPgSnapshotStore,
  type PgSnapshotStore,
  type RealtimeEventJob,
} from "@linkcast/analytics";
import { buildApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";
import { Hub } from "./hub.js";
import { startIngestWorker } from "./ingest.js";
import { PeriodicRefresher } from "./refresher.js";

interface Runtime {
  app: FastifyInstance;
  hub: Hub;
  refresher: PeriodicRefresher;
  worker: Worker<RealtimeEventJob> | null;
  store: PgSnapshotStore;
  cache: RedisCache;
}

const log = createLogger("realtime");

let runtime: Runtime | null = null;
let shuttingDown = false;

// =============================================================================
// Server Lifecycle
// =============================================================================

/**
 * Start the realtime service.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config, log);
  log.info({ env: config.env }, "Initializing...");

  const store = createPgSnapshotStore(config.databaseUrl, {
    timeoutMs: config.dbTimeoutMs,
    logger: log.child({ component: "snapshot-store" }),
  });
  const cache = createRedisCache({ url: config.redisUrl });
  const snapshots = new CachedSnapshotProvider(store, cache, {
    ttlSeconds: config.snapshotCacheTtlSeconds,
    logger: log.child({ component: "snapshot-cache" }),
  });

  const hub = new Hub({
    snapshots,
    logger: log.child({ component: "hub" }),
    broadcastBufferSize: config.broadcastBufferSize,
    maxPendingRequests: config.maxPendingRequests,
    sendTimeoutMs: config.sendTimeoutMs,
    keepaliveIntervalMs: config.keepaliveIntervalMs,
    initialSnapshotDays: config.initialSnapshotDays,
  });

  const refresher = new PeriodicRefresher({
    target: hub,
    snapshots,
    logger: log.child({ component: "refresher" }),
    intervalMs: config.refreshIntervalMs,
    windowDays: config.refreshSnapshotDays,
  });

  const worker = config.ingestEnabled
    ? startIngestWorker({
        redisUrl: config.redisUrl,
        target: hub,
        logger: log.child({ component: "ingest" }),
      })
    : null;

  const app = await buildApp({
    hub,
    config,
    readiness: {
      database: () => store.ping(),
      cache: () => cache.ping(),
    },
    logger: log,
    fastifyLogger: loggerOptions("realtime-http", { level: config.logLevel }),
  });

  runtime = { app, hub, refresher, worker, store, cache };

  hub.start();
  refresher.start();

  await app.listen({ port: config.port, host: config.host });
  log.info(`Linkcast realtime service running on http://${config.host}:${config.port}`);
}

/**
 * Graceful shutdown handler.
 * Stops intake first, then closes clients, then drains connections.
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, "Shutting down...");

  const current = runtime;
  if (current) {
    current.refresher.stop();

    const steps: Array<[string, () => Promise<unknown>]> = [
      ["ingest worker", async () => current.worker?.close()],
      ["hub", () => current.hub.stop()],
      ["http server", () => current.app.close()],
      ["database", () => current.store.close()],
      ["cache", () => current.cache.disconnect()],
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (err) {
        log.error({ err }, `Error closing ${name}`);
      }
    }
  }

  log.info("Shutdown complete");
}

function exitAfterShutdown(signal: string, code: number): void {
  shutdown(signal)
    .catch((err: unknown) => log.error({ err }, "Shutdown failed"))
    .finally(() => process.exit(code));
}

// =============================================================================
// Main Entry Point
// =============================================================================

process.on("SIGTERM", () => exitAfterShutdown("SIGTERM", 0));
process.on("SIGINT", () => exitAfterShutdown("SIGINT", 0));

process.on("uncaughtException", (err) => {
  log.fatal({ err }, "Uncaught exception");
  exitAfterShutdown("uncaughtException", 1);
});

process.on("unhandledRejection", (reason) => {
  // Log and continue
  log.error({ err: reason }, "Unhandled rejection");
});

main().catch((err: unknown) => {
  log.fatal({ err }, "Failed to start");
  exitAfterShutdown("startup failure", 1);
});

/**
 * Fastify Application
 *
 * Builds the HTTP/WebSocket surface around a Hub. Kept free of process
 * concerns (env, signals, connections to Postgres/Redis) so tests can
 * build it with fakes and drive it through `app.inject`.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { Logger } from "@linkcast/logger";
import { websocketPlugin } from "./plugins/websocket.js";
import { healthRoutes, type ReadinessChecks } from "./routes/health.js";
import { realtimeRoutes } from "./routes/realtime.js";
import type { Hub } from "./hub.js";
import type { Config } from "./types.js";

export type AppConfig = Pick<
  Config,
  "env" | "corsOrigin" | "maxPayloadBytes" | "sendTimeoutMs" | "readTimeoutMs"
>;

export interface AppDependencies {
  hub: Hub;
  config: AppConfig;
  readiness: ReadinessChecks;
  /** Parent logger for connection handles */
  logger: Logger;
  /** Fastify request logging (pino options), false to disable */
  fastifyLogger?: FastifyServerOptions["logger"];
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { hub, config, readiness, logger } = deps;

  const app = Fastify({
    logger: deps.fastifyLogger ?? false,
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  // CORS
  await app.register(cors, {
    origin: config.corsOrigin ?? true,
  });

  await app.register(websocketPlugin, { maxPayload: config.maxPayloadBytes });

  await app.register(healthRoutes, { hub, readiness });
  await app.register(realtimeRoutes, {
    hub,
    logger: logger.child({ component: "connection" }),
    sendTimeoutMs: config.sendTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "Unhandled error");
    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: statusCode >= 500 ? "Internal Server Error" : error.message,
    });
  });

  return app;
}

/**
 * Realtime Routes
 *
 *   GET /realtime/ws     - WebSocket endpoint for live dashboards
 *   GET /realtime/stats  - connection and subscription counts
 */

import type { FastifyPluginAsync } from "fastify";
import type { Logger } from "@linkcast/logger";
import { WsConnection, nextConnectionId } from "../connection.js";
import type { Hub } from "../hub.js";

export interface RealtimeRouteOptions {
  hub: Hub;
  logger: Logger;
  sendTimeoutMs: number;
  readTimeoutMs: number;
}

/** Close code for "try again later" */
const CLOSE_TRY_AGAIN_LATER = 1013;

export const realtimeRoutes: FastifyPluginAsync<RealtimeRouteOptions> = async (
  fastify,
  options
) => {
  const { hub, logger, sendTimeoutMs, readTimeoutMs } = options;

  fastify.get("/realtime/ws", { websocket: true }, (socket, request) => {
    if (!hub.running) {
      socket.close(CLOSE_TRY_AGAIN_LATER, "Server shutting down");
      return;
    }

    const connection = new WsConnection(socket, hub, {
      id: nextConnectionId(),
      logger,
      sendTimeoutMs,
      readTimeoutMs,
    });
    connection.open();

    request.log.debug({ connectionId: connection.id }, "WebSocket connection accepted");
  });

  fastify.get("/realtime/stats", async () => {
    return {
      active_clients: hub.activeConnectionCount(),
      active_subscriptions: hub.activeSubscriptionCounts(),
    };
  });
};

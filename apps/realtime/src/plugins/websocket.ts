import fp from "fastify-plugin";
import websocket from "@fastify/websocket";

export interface WebsocketPluginOptions {
  /** Largest client frame accepted, in bytes */
  maxPayload: number;
}

/**
 * Registers WebSocket support for Fastify.
 * Must be registered BEFORE WS routes.
 */
export const websocketPlugin = fp<WebsocketPluginOptions>(async (app, options) => {
  await app.register(websocket, {
    options: {
      // Larger frames are closed by ws with 1009
      maxPayload: options.maxPayload,
    },
  });
});

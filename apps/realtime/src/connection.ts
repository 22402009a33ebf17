/**
 * WebSocket Connection Handle
 *
 * Wraps one `ws` socket accepted by @fastify/websocket:
 * - Outbound: serialized updates, each write bounded by the send timeout
 * - Inbound: client frames decoded once and forwarded to the hub
 * - Liveness: a read deadline reset by every frame and every pong
 *
 * Any failure (socket error, close, read deadline) unregisters the handle
 * from the hub, then terminates the socket. Teardown runs once.
 *
 * Malformed frames are counted and ignored. A frame larger than
 * MAX_PAYLOAD_BYTES never reaches this module: `ws` closes the socket with
 * 1009 (message too big), which tears the handle down like any other close.
 */

import type { Logger } from "@linkcast/logger";
import { ConnectionClosedError } from "./errors.js";
import { decodeClientMessage, encodePong, encodeUpdate, pingUpdate } from "./protocol.js";
import { withTimeout } from "./timeout.js";
import * as metrics from "./metrics.js";
import type { ConnectionHandle, HubPort, Update } from "./types.js";

/** ws readyState for an open socket */
const OPEN = 1;

/**
 * The part of a `ws` WebSocket this module uses
 */
export interface SocketLike {
  readonly readyState: number;
  on(event: string, listener: (...args: never[]) => void): unknown;
  off(event: string, listener: (...args: never[]) => void): unknown;
  send(data: string, cb: (err?: Error) => void): void;
  ping(): void;
  terminate(): void;
}

export interface ConnectionOptions {
  id: string;
  logger: Logger;
  /** Bound on every write (default: 1000ms) */
  sendTimeoutMs?: number;
  /** Close the connection after this long without a frame or pong (default: 60s) */
  readTimeoutMs?: number;
}

let connectionSeq = 0;

export function nextConnectionId(): string {
  connectionSeq++;
  return `conn_${connectionSeq}`;
}

export class WsConnection implements ConnectionHandle {
  readonly id: string;

  private readonly logger: Logger;
  private readonly sendTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readDeadline: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(
    private readonly socket: SocketLike,
    private readonly hub: HubPort,
    options: ConnectionOptions
  ) {
    this.id = options.id;
    this.logger = options.logger.child({ connectionId: options.id });
    this.sendTimeoutMs = options.sendTimeoutMs ?? 1000;
    this.readTimeoutMs = options.readTimeoutMs ?? 60_000;
  }

  /**
   * Attach socket listeners, arm the read deadline and register with the hub.
   */
  open(): void {
    this.socket.on("message", this.onMessage);
    this.socket.on("pong", this.onPong);
    this.socket.on("close", this.onClose);
    this.socket.on("error", this.onError);

    this.readDeadline = setTimeout(this.onReadTimeout, this.readTimeoutMs);
    this.hub.register(this);
    this.logger.debug("Connection opened");
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ---------------------------------------------------------------------------
  // ConnectionHandle
  // ---------------------------------------------------------------------------

  send(update: Update): Promise<void> {
    return this.write(encodeUpdate(update));
  }

  /**
   * Protocol-level ping frame (answered by the browser with a pong) plus a
   * JSON ping for clients that only see messages.
   */
  async ping(): Promise<void> {
    if (this.closed || this.socket.readyState !== OPEN) {
      throw new ConnectionClosedError(this.id);
    }
    this.socket.ping();
    await this.write(encodeUpdate(pingUpdate()));
  }

  /**
   * Called by the hub once the handle is unregistered or the hub stops.
   */
  close(): void {
    this.teardown("closed by hub", false);
  }

  // ---------------------------------------------------------------------------
  // Socket Events
  // ---------------------------------------------------------------------------

  private readonly onMessage = (data: unknown): void => {
    this.resetReadDeadline();

    const message = decodeClientMessage(data);
    if (!message) {
      metrics.increment("malformed_messages");
      this.logger.debug("Ignoring malformed client message");
      return;
    }

    switch (message.type) {
      case "subscribe":
        this.hub.subscribe(this, message.shortCode);
        return;
      case "unsubscribe":
        this.hub.unsubscribe(this, message.shortCode);
        return;
      case "ping":
        this.write(encodePong(message.shortCode)).catch((err: unknown) => {
          this.logger.debug({ err }, "Pong failed");
        });
        return;
    }
  };

  private readonly onPong = (): void => {
    this.resetReadDeadline();
  };

  private readonly onClose = (): void => {
    this.teardown("socket closed", true);
  };

  private readonly onError = (err: Error): void => {
    this.logger.debug({ err }, "Socket error");
    this.teardown("socket error", true);
  };

  private readonly onReadTimeout = (): void => {
    this.teardown("read timeout", true);
  };

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private write(payload: string): Promise<void> {
    if (this.closed || this.socket.readyState !== OPEN) {
      return Promise.reject(new ConnectionClosedError(this.id));
    }

    const written = new Promise<void>((resolve, reject) => {
      this.socket.send(payload, (err) => (err ? reject(err) : resolve()));
    });
    return withTimeout(written, this.sendTimeoutMs, `write to ${this.id}`);
  }

  private resetReadDeadline(): void {
    this.readDeadline?.refresh();
  }

  /**
   * Unregister unless the hub asked for the close, then terminate the socket.
   */
  private teardown(reason: string, notifyHub: boolean): void {
    if (this.closed) return;
    this.closed = true;

    if (this.readDeadline) {
      clearTimeout(this.readDeadline);
      this.readDeadline = null;
    }

    if (notifyHub) this.hub.unregister(this);

    this.socket.terminate();
    this.socket.off("message", this.onMessage);
    this.socket.off("pong", this.onPong);
    this.socket.off("close", this.onClose);
    // onError stays attached: ws may still report an error while the
    // socket is being destroyed

    this.logger.debug({ reason }, "Connection closed");
  }
}

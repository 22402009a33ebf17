/**
 * Realtime Errors
 *
 * Transport-level failures local to one connection. The hub treats every
 * one of them the same way: the connection is unregistered, never retried.
 */

export type RealtimeErrorCode = "SEND_TIMEOUT" | "CONNECTION_CLOSED";

export class RealtimeError extends Error {
  constructor(
    message: string,
    public readonly code: RealtimeErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RealtimeError";
  }
}

/**
 * A write or ping did not complete within the send timeout
 */
export class SendTimeoutError extends RealtimeError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "SEND_TIMEOUT");
    this.name = "SendTimeoutError";
  }
}

/**
 * The connection was already closed when a write was attempted
 */
export class ConnectionClosedError extends RealtimeError {
  constructor(public readonly connectionId: string) {
    super(`Connection ${connectionId} is closed`, "CONNECTION_CLOSED");
    this.name = "ConnectionClosedError";
  }
}

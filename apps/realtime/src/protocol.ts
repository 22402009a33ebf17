/**
 * WebSocket Wire Protocol
 *
 * Inbound (client → server):
 *   { "type": "subscribe" | "unsubscribe" | "ping", "short_code": string }
 *
 * Outbound (server → client):
 *   { "type", "short_code", "data", "timestamp" }
 *
 * Client messages are decoded once, here, into a closed union. Anything
 * that does not decode is dropped by the caller.
 */

import { z } from "zod";
import { SHORTCODE_CONFIG } from "@linkcast/shared";
import type {
  AnalyticsSnapshot,
  ConversionEvent,
  RealtimeClickData,
} from "@linkcast/shared";
import type { Update } from "./types.js";

// =============================================================================
// Outbound
// =============================================================================

export type ServerMessageType =
  | "click"
  | "conversion"
  | "analytics_update"
  | "initial_analytics"
  | "ping"
  | "pong";

export interface ServerMessage {
  type: ServerMessageType;
  short_code: string;
  data: RealtimeClickData | ConversionEvent | AnalyticsSnapshot | null;
  /** RFC 3339 */
  timestamp: string;
}

const MESSAGE_TYPES: Record<Update["kind"], ServerMessageType> = {
  click: "click",
  conversion: "conversion",
  analytics_snapshot: "analytics_update",
  initial_snapshot: "initial_analytics",
  ping: "ping",
};

export function toServerMessage(update: Update): ServerMessage {
  return {
    type: MESSAGE_TYPES[update.kind],
    short_code: update.topic,
    data: update.payload,
    timestamp: update.timestamp.toISOString(),
  };
}

export function encodeUpdate(update: Update): string {
  return JSON.stringify(toServerMessage(update));
}

/**
 * Reply to a client ping. Written directly by the connection, never
 * routed through the hub.
 */
export function encodePong(shortCode = "", now: Date = new Date()): string {
  const message: ServerMessage = {
    type: "pong",
    short_code: shortCode,
    data: null,
    timestamp: now.toISOString(),
  };
  return JSON.stringify(message);
}

// =============================================================================
// Update Constructors
// =============================================================================

export function clickUpdate(topic: string, click: RealtimeClickData, now = new Date()): Update {
  return Object.freeze({ kind: "click", topic, payload: click, timestamp: now });
}

export function conversionUpdate(
  topic: string,
  conversion: ConversionEvent,
  now = new Date()
): Update {
  return Object.freeze({ kind: "conversion", topic, payload: conversion, timestamp: now });
}

export function snapshotUpdate(
  topic: string,
  snapshot: AnalyticsSnapshot,
  now = new Date()
): Update {
  return Object.freeze({ kind: "analytics_snapshot", topic, payload: snapshot, timestamp: now });
}

export function initialSnapshotUpdate(
  topic: string,
  snapshot: AnalyticsSnapshot,
  now = new Date()
): Update {
  return Object.freeze({ kind: "initial_snapshot", topic, payload: snapshot, timestamp: now });
}

export function pingUpdate(topic = "", now = new Date()): Update {
  return Object.freeze({ kind: "ping", topic, payload: null, timestamp: now });
}

// =============================================================================
// Inbound
// =============================================================================

export type ClientMessage =
  | { type: "subscribe"; shortCode: string }
  | { type: "unsubscribe"; shortCode: string }
  | { type: "ping"; shortCode?: string };

/** A short code as it appears on the wire and on queue jobs */
export const shortCodeSchema = z
  .string()
  .min(SHORTCODE_CONFIG.MIN_LENGTH)
  .max(SHORTCODE_CONFIG.MAX_LENGTH)
  .regex(SHORTCODE_CONFIG.PATTERN);

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), short_code: shortCodeSchema }),
  z.object({ type: z.literal("unsubscribe"), short_code: shortCodeSchema }),
  z.object({ type: z.literal("ping"), short_code: z.string().optional() }),
]);

/**
 * Normalize a ws frame (string, Buffer, fragments or ArrayBuffer) to text
 */
function frameToText(data: unknown): string | null {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data) && data.every((part) => Buffer.isBuffer(part))) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return null;
}

/**
 * Decode a client frame. Returns null for anything malformed: invalid
 * JSON, unknown `type`, or a missing or invalid short code.
 */
export function decodeClientMessage(data: unknown): ClientMessage | null {
  const text = frameToText(data);
  if (text === null) return null;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = clientMessageSchema.safeParse(json);
  if (!parsed.success) return null;

  const message = parsed.data;
  switch (message.type) {
    case "subscribe":
      return { type: "subscribe", shortCode: message.short_code };
    case "unsubscribe":
      return { type: "unsubscribe", shortCode: message.short_code };
    case "ping":
      return message.short_code === undefined
        ? { type: "ping" }
        : { type: "ping", shortCode: message.short_code };
  }
}

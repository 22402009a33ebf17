/**
 * Click Enrichment
 *
 * Turns raw click metadata into the payload broadcast to live dashboards.
 *
 * Privacy:
 * - The IP address is reduced to a truncated SHA-256 hash
 * - User-Agent and Referer are truncated
 */

import { createHash } from "node:crypto";
import { CLICK_LIMITS, type RealtimeClickData } from "@linkcast/shared";
import { detectBot } from "./bot-detection.js";
import { parseUserAgent } from "./user-agent.js";
import type { ClickInput } from "./types.js";

/**
 * Hash IP address, truncated to 16 hex chars.
 * No salt: the same IP always produces the same hash (unique visitor counts).
 */
export function hashIpAddress(ip: string): string {
  return createHash("sha256").update(ip).digest("hex").slice(0, 16);
}

/**
 * Truncate string to max length
 */
export function truncate(str: string | undefined, maxLength: number): string | undefined {
  if (!str) return undefined;
  return str.length > maxLength ? str.slice(0, maxLength) : str;
}

/**
 * Build the realtime click payload for a click.
 */
export function enrichClick(input: ClickInput): RealtimeClickData {
  const userAgent = truncate(input.userAgent, CLICK_LIMITS.USER_AGENT_MAX_LENGTH);
  const parsed = parseUserAgent(userAgent);
  const bot = detectBot(userAgent).isBot;

  const click: RealtimeClickData = {
    shortCode: input.shortCode,
    device: bot && parsed.device !== "unknown" ? "bot" : parsed.device,
    browser: parsed.browser,
    os: parsed.os,
    bot,
    timestamp: (input.occurredAt ?? new Date()).toISOString(),
  };

  if (input.ipAddress) click.ipHash = hashIpAddress(input.ipAddress);
  if (userAgent) click.userAgent = userAgent;

  const referrer = truncate(input.referrer, CLICK_LIMITS.REFERRER_MAX_LENGTH);
  if (referrer) click.referrer = referrer;
  if (input.country) click.country = input.country.toUpperCase();

  return click;
}

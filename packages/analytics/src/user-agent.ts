/**
 * User-Agent Parsing
 *
 * Coarse device/browser/OS classification for live click feeds. Rules are
 * ordered: the first match wins, so more specific products (Edge, Opera,
 * Samsung Internet) are tested before the engines they embed (Chrome,
 * Safari).
 */

import type { DeviceType } from "@linkcast/shared";
import { isKnownBot } from "./bot-detection.js";

export interface ParsedUserAgent {
  device: DeviceType;
  browser: string;
  os: string;
}

interface NamedRule {
  name: string;
  pattern: RegExp;
}

const BROWSER_RULES: readonly NamedRule[] = [
  { name: "Edge", pattern: /edg(e|a|ios)?\//i },
  { name: "Opera", pattern: /opr\/|opera/i },
  { name: "Samsung Internet", pattern: /samsungbrowser/i },
  { name: "Brave", pattern: /brave/i },
  { name: "Vivaldi", pattern: /vivaldi/i },
  { name: "Firefox", pattern: /firefox|fxios/i },
  { name: "Chrome", pattern: /chrome|crios|chromium/i },
  { name: "Safari", pattern: /safari/i },
  { name: "Internet Explorer", pattern: /msie |trident\//i },
];

const OS_RULES: readonly NamedRule[] = [
  { name: "iOS", pattern: /iphone|ipad|ipod/i },
  { name: "Android", pattern: /android/i },
  { name: "ChromeOS", pattern: /\bcros\b/i },
  { name: "Windows", pattern: /windows/i },
  { name: "macOS", pattern: /mac os x|macintosh/i },
  { name: "Ubuntu", pattern: /ubuntu/i },
  { name: "Fedora", pattern: /fedora/i },
  { name: "Linux", pattern: /linux/i },
];

const TABLET_PATTERN =
  /ipad|tablet|kindle|silk\/|playbook|nexus (7|9|10)|xoom|galaxy tab|sm-t\d|pixel c/i;

const MOBILE_PATTERN = /mobi|iphone|ipod|android.*mobile|windows phone|blackberry/i;

const UNKNOWN = "Unknown";

function firstMatch(rules: readonly NamedRule[], userAgent: string): string {
  return rules.find((rule) => rule.pattern.test(userAgent))?.name ?? UNKNOWN;
}

function detectDevice(userAgent: string): DeviceType {
  if (isKnownBot(userAgent)) return "bot";
  if (TABLET_PATTERN.test(userAgent)) return "tablet";
  // Android without "Mobile" is a tablet
  if (/android/i.test(userAgent) && !/mobile/i.test(userAgent)) return "tablet";
  if (MOBILE_PATTERN.test(userAgent)) return "mobile";
  return "desktop";
}

/**
 * Classify a User-Agent header.
 *
 * @example
 * ```ts
 * parseUserAgent("Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) ... Safari/604.1")
 * // { device: "mobile", browser: "Safari", os: "iOS" }
 * ```
 */
export function parseUserAgent(userAgent: string | undefined): ParsedUserAgent {
  if (!userAgent || userAgent.trim() === "") {
    return { device: "unknown", browser: UNKNOWN, os: UNKNOWN };
  }

  return {
    device: detectDevice(userAgent),
    browser: firstMatch(BROWSER_RULES, userAgent),
    os: firstMatch(OS_RULES, userAgent),
  };
}

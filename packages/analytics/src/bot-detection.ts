/**
 * Bot Detection Module
 *
 * Flags clicks from crawlers, link unfurlers, monitoring probes and HTTP
 * libraries so live dashboards can separate them from human traffic.
 *
 * Rules are checked in order and the first match decides:
 *
 *   missing User-Agent     0.9
 *   known bot pattern      0.95
 *   suspicious User-Agent  0.6
 *
 * Patterns live in data/bot-patterns.json and are matched case-insensitively.
 */

import botPatterns from "../data/bot-patterns.json";
import type { BotDetectionReason, BotDetectionResult } from "./types.js";

interface BotRule {
  reason: BotDetectionReason;
  confidence: number;
  matches: (userAgent: string) => boolean;
}

function compile(sources: readonly string[]): readonly RegExp[] {
  return sources.map((source) => new RegExp(source, "i"));
}

const KNOWN = compile(botPatterns.known);
const SUSPICIOUS = compile(botPatterns.suspicious);

const matchesAny = (patterns: readonly RegExp[]) => (userAgent: string) =>
  patterns.some((pattern) => pattern.test(userAgent));

const RULES: readonly BotRule[] = [
  { reason: "missing_user_agent", confidence: 0.9, matches: (userAgent) => userAgent === "" },
  { reason: "user_agent_pattern", confidence: 0.95, matches: matchesAny(KNOWN) },
  { reason: "suspicious_user_agent", confidence: 0.6, matches: matchesAny(SUSPICIOUS) },
];

const HUMAN: BotDetectionResult = { isBot: false, confidence: 0 };

/**
 * Classify a click's User-Agent.
 */
export function detectBot(userAgent: string | undefined): BotDetectionResult {
  const normalized = userAgent?.trim() ?? "";
  const rule = RULES.find((candidate) => candidate.matches(normalized));
  if (!rule) return { ...HUMAN };

  return { isBot: true, reason: rule.reason, confidence: rule.confidence };
}

/**
 * Known crawler or HTTP client; an absent header counts as one.
 * Used for device classification, where "suspicious" is not enough.
 */
export function isKnownBot(userAgent: string | undefined): boolean {
  return !userAgent || matchesAny(KNOWN)(userAgent);
}

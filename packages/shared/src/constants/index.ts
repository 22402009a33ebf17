/**
 * Short Code Constraints
 *
 * A short code is either an auto-generated 7-character Base62 code or a
 * custom alias.
 * Anything that can be a link's short code can be a realtime topic, so
 * the realtime hub validates subscriptions against the union of both.
 */
export const SHORTCODE_CONFIG = {
  /** Shortest accepted code (single-character aliases exist) */
  MIN_LENGTH: 1,

  /** Longest accepted code (custom alias limit) */
  MAX_LENGTH: 30,

  /** Letters, digits, hyphens and underscores */
  PATTERN: /^[a-zA-Z0-9_-]+$/,
} as const;

/**
 * Analytics windows (days) used by the realtime hub.
 */
export const ANALYTICS_WINDOWS = {
  /** Window of the snapshot sent right after a subscribe */
  INITIAL_DAYS: 30,

  /** Window of the periodic refresh ("last 24 hours") */
  REFRESH_DAYS: 1,

  /** Upper bound accepted by snapshot stores */
  MAX_DAYS: 365,
} as const;

/**
 * Limits applied before click metadata is broadcast or queued
 */
export const CLICK_LIMITS = {
  USER_AGENT_MAX_LENGTH: 512,
  REFERRER_MAX_LENGTH: 2048,
} as const;

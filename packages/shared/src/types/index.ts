/**
 * Shared Type Definitions
 *
 * Payload shapes exchanged between the analytics collaborator, the event
 * producers and the realtime hub. Everything here is JSON-safe: dates are
 * ISO 8601 strings so values survive Redis caching and queue transport.
 */

// =============================================================================
// Analytics Snapshot
// =============================================================================

/**
 * Clicks on a single calendar day (UTC)
 */
export interface DailyClick {
  /** YYYY-MM-DD */
  date: string;
  clicks: number;
}

/**
 * Clicks attributed to one country
 */
export interface CountryStat {
  /** ISO 3166-1 alpha-2 country code */
  countryCode: string;
  clicks: number;
}

/**
 * Aggregated analytics for one short code over a trailing window.
 *
 * Sent as `initial_analytics` after a subscribe and as `analytics_update`
 * by the periodic refresher.
 */
export interface AnalyticsSnapshot {
  shortCode: string;

  /** Destination URL, null when the link is unknown */
  originalUrl: string | null;

  /** Trailing window the counters cover */
  windowDays: number;

  totalClicks: number;

  /** Distinct hashed IPs within the window */
  uniqueVisitors: number;

  botClicks: number;

  /** Link creation time (ISO 8601) */
  createdAt: string | null;

  /** Most recent click, regardless of window (ISO 8601) */
  lastClickAt: string | null;

  /** Newest day first */
  dailyClicks: DailyClick[];

  /** Top countries, most clicks first */
  countryStats: CountryStat[];
}

// =============================================================================
// Click Events
// =============================================================================

export type DeviceType = "desktop" | "mobile" | "tablet" | "bot" | "unknown";

/**
 * Click data pushed to dashboards as it happens.
 *
 * Privacy: the raw client IP is never included, only its truncated hash.
 */
export interface RealtimeClickData {
  shortCode: string;
  ipHash?: string;
  userAgent?: string;
  referrer?: string;
  country?: string;
  device: DeviceType;
  browser: string;
  os: string;
  bot: boolean;
  /** ISO 8601 */
  timestamp: string;
}

// =============================================================================
// Conversion Events
// =============================================================================

/**
 * Attribution model used when the conversion was credited
 */
export type AttributionModel =
  | "first_click"
  | "last_click"
  | "linear"
  | "time_decay"
  | "position_based";

/**
 * A tracked conversion, as reported by the conversion tracker
 */
export interface ConversionEvent {
  shortCode: string;
  goalId: number;
  conversionId: string;
  conversionType: string;
  conversionValue: number;
  sessionId?: string;
  clickId?: number;
  attributionModel?: AttributionModel;
  /** Minutes between the attributed click and the conversion */
  timeToConversion?: number;
  /** ISO 8601 */
  conversionTime: string;
}

import type { AnalyticsSnapshot } from "../types/index.js";

/**
 * Zero-value snapshot for a link without recorded analytics.
 */
export function emptySnapshot(shortCode: string, windowDays: number): AnalyticsSnapshot {
  return {
    shortCode,
    originalUrl: null,
    windowDays,
    totalClicks: 0,
    uniqueVisitors: 0,
    botClicks: 0,
    createdAt: null,
    lastClickAt: null,
    dailyClicks: [],
    countryStats: [],
  };
}

/**
 * @linkcast/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, and constants.
 * This is the ONLY public API for the shared package.
 *
 * ```ts
 * import { validateShortCode, type AnalyticsSnapshot } from "@linkcast/shared";
 * ```
 */

// Types (AnalyticsSnapshot, RealtimeClickData, ConversionEvent, ...)
export * from "./types/index.js";

// Utilities (short code validation, empty snapshots)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, ANALYTICS_WINDOWS)
export * from "./constants/index.js";

/**
 * Short Code Validation
 *
 * Format checks for short codes arriving from untrusted sources
 * (WebSocket subscribe messages, queued realtime events).
 */

import { SHORTCODE_CONFIG } from "../constants/index.js";

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

/**
 * Validate the format of a short code.
 *
 * @example
 * ```ts
 * validateShortCode("aB3xY9k")  // { valid: true }
 * validateShortCode("a b")      // { valid: false, error: "..." }
 * ```
 */
export function validateShortCode(code: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = SHORTCODE_CONFIG;

  if (code.length < MIN_LENGTH) {
    return { valid: false, error: "Short code must not be empty" };
  }

  if (code.length > MAX_LENGTH) {
    return {
      valid: false,
      error: `Short code must be at most ${MAX_LENGTH} characters`,
    };
  }

  if (!PATTERN.test(code)) {
    return {
      valid: false,
      error: "Short code must contain only letters, numbers, hyphens, and underscores",
    };
  }

  return { valid: true };
}

/**
 * Boolean shorthand for validateShortCode, usable as a type guard on
 * unknown input.
 */
export function isValidShortCode(code: unknown): code is string {
  return typeof code === "string" && validateShortCode(code).valid;
}

/**
 * Shared Utility Functions
 */

export { validateShortCode, isValidShortCode } from "./shortcode.js";
export type { ValidationResult } from "./shortcode.js";

export { emptySnapshot } from "./snapshot.js";

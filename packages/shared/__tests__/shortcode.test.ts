/**
 * Short Code Validation Tests
 *
 * @see packages/shared/src/utils/shortcode.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  validateShortCode,
  isValidShortCode,
  emptySnapshot,
  SHORTCODE_CONFIG,
} from "../src/index.js";

describe("Short Code Validation", () => {
  describe("validateShortCode", () => {
    it("should accept auto-generated Base62 codes", () => {
      expect(validateShortCode("aB3xY9k")).toEqual({ valid: true });
    });

    it("should accept custom aliases with hyphens and underscores", () => {
      expect(validateShortCode("summer-sale_2024")).toEqual({ valid: true });
    });

    it("should accept single-character codes", () => {
      expect(validateShortCode("x")).toEqual({ valid: true });
    });

    it("should reject empty codes", () => {
      expect(validateShortCode("")).toEqual({
        valid: false,
        error: "Short code must not be empty",
      });
    });

    it("should reject codes longer than the alias limit", () => {
      const code = "a".repeat(SHORTCODE_CONFIG.MAX_LENGTH + 1);

      expect(validateShortCode(code)).toEqual({
        valid: false,
        error: "Short code must be at most 30 characters",
      });
    });

    it("should accept codes exactly at the alias limit", () => {
      expect(validateShortCode("a".repeat(SHORTCODE_CONFIG.MAX_LENGTH)).valid).toBe(true);
    });

    it("should reject whitespace and punctuation", () => {
      expect(validateShortCode("abc 123").valid).toBe(false);
      expect(validateShortCode("abc/123").valid).toBe(false);
      expect(validateShortCode("abc.123").valid).toBe(false);
    });
  });

  describe("isValidShortCode", () => {
    it("should reject non-string input", () => {
      expect(isValidShortCode(undefined)).toBe(false);
      expect(isValidShortCode(42)).toBe(false);
      expect(isValidShortCode(null)).toBe(false);
    });

    it("should accept valid strings", () => {
      expect(isValidShortCode("abc123")).toBe(true);
    });
  });
});

describe("emptySnapshot", () => {
  it("should return zero counters and empty breakdowns", () => {
    expect(emptySnapshot("abc123", 30)).toEqual({
      shortCode: "abc123",
      originalUrl: null,
      windowDays: 30,
      totalClicks: 0,
      uniqueVisitors: 0,
      botClicks: 0,
      createdAt: null,
      lastClickAt: null,
      dailyClicks: [],
      countryStats: [],
    });
  });

  it("should return a fresh object on every call", () => {
    const first = emptySnapshot("abc123", 1);
    first.dailyClicks.push({ date: "2024-01-01", clicks: 1 });

    expect(emptySnapshot("abc123", 1).dailyClicks).toEqual([]);
  });
});

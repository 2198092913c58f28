/**
 * Unit tests for date encoding utilities.
 */
import { describe, expect, it } from "vitest";

import { isValidIsoDate, normalizeIsoDate, nowIso } from "../src/utils/date";

describe("date utilities", () => {
  describe("isValidIsoDate", () => {
    it("accepts ISO 8601 datetimes with or without milliseconds", () => {
      expect(isValidIsoDate("2024-01-15T10:30:00.000Z")).toBe(true);
      expect(isValidIsoDate("2024-01-15T10:30:00Z")).toBe(true);
      expect(isValidIsoDate("2024-01-15T10:30:00.1Z")).toBe(true);
    });

    it("accepts timezone offsets", () => {
      expect(isValidIsoDate("2024-01-15T12:30:00+02:00")).toBe(true);
      expect(isValidIsoDate("2024-01-15T05:30:00-05:00")).toBe(true);
    });

    it("rejects dates without time component", () => {
      expect(isValidIsoDate("2024-01-15")).toBe(false);
    });

    it("rejects impossible dates", () => {
      expect(isValidIsoDate("2024-13-45T10:30:00Z")).toBe(false);
    });

    it("rejects free text", () => {
      expect(isValidIsoDate("yesterday")).toBe(false);
    });
  });

  describe("normalizeIsoDate", () => {
    it("rewrites offsets as UTC with milliseconds", () => {
      expect(normalizeIsoDate("2024-01-15T12:30:00+02:00")).toBe(
        "2024-01-15T10:30:00.000Z",
      );
      expect(normalizeIsoDate("2024-01-15T10:30:00.1Z")).toBe(
        "2024-01-15T10:30:00.100Z",
      );
    });
  });

  describe("nowIso", () => {
    it("returns a normalized timestamp", () => {
      const now = nowIso();
      expect(isValidIsoDate(now)).toBe(true);
      expect(normalizeIsoDate(now)).toBe(now);
    });
  });
});

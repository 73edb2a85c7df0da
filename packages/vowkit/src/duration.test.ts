import { describe, it, expect } from "vitest";
import { MAX_DURATION_MS, parseDurationString, toMillis } from "./duration";

describe("duration", () => {
  describe("parseDurationString()", () => {
    it("parses every unit", () => {
      expect(parseDurationString("250ms")).toBe(250);
      expect(parseDurationString("2s")).toBe(2000);
      expect(parseDurationString("3m")).toBe(180000);
      expect(parseDurationString("1h")).toBe(3600000);
      expect(parseDurationString("1d")).toBe(86400000);
    });

    it("accepts decimals, whitespace and upper case", () => {
      expect(parseDurationString("1.5s")).toBe(1500);
      expect(parseDurationString(" 10 MS ")).toBe(10);
    });

    it("returns undefined for anything else", () => {
      expect(parseDurationString("soon")).toBeUndefined();
      expect(parseDurationString("5")).toBeUndefined();
      expect(parseDurationString("-5s")).toBeUndefined();
      expect(parseDurationString("5 weeks")).toBeUndefined();
    });
  });

  describe("toMillis()", () => {
    it("passes non-negative numbers through", () => {
      expect(toMillis(0)).toBe(0);
      expect(toMillis(42)).toBe(42);
    });

    it("converts strings", () => {
      expect(toMillis("5s")).toBe(5000);
    });

    it("rejects durations a timer cannot wait for", () => {
      expect(toMillis(MAX_DURATION_MS)).toBe(2147483647);
      expect(() => toMillis("30d")).toThrow(
        new TypeError(
          'Invalid duration: "30d". Expected at most 2147483647 milliseconds (about 24.8 days).'
        )
      );
      expect(() => toMillis(MAX_DURATION_MS + 1)).toThrow(TypeError);
    });

    it("rejects negative and non-finite numbers", () => {
      expect(() => toMillis(-1)).toThrow(
        new TypeError("Invalid duration: -1. Expected a non-negative number of milliseconds.")
      );
      expect(() => toMillis(Number.POSITIVE_INFINITY)).toThrow(TypeError);
      expect(() => toMillis(Number.NaN)).toThrow(TypeError);
    });

    it("rejects unparseable strings", () => {
      expect(() => toMillis("later")).toThrow(
        'Invalid duration: "later". Expected a number followed by ms, s, m, h or d (e.g. "100ms", "5s").'
      );
    });
  });
});

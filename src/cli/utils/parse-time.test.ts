import { describe, it, expect } from "vitest";
import { parseDuration, parseTime } from "./parse-time.js";

// Wednesday 2024-01-17 12:00 local time
const NOW = new Date(2024, 0, 17, 12, 0, 0, 0).getTime();

describe("parseTime", () => {
  it("resolves named times", () => {
    expect(parseTime("now", NOW)).toBe(NOW);
    expect(parseTime("today", NOW)).toBe(new Date(2024, 0, 17).getTime());
    expect(parseTime(" Yesterday ", NOW)).toBe(new Date(2024, 0, 16).getTime());
  });

  it("counts relative times back from now", () => {
    expect(parseTime("30s", NOW)).toBe(NOW - 30_000);
    expect(parseTime("5m", NOW)).toBe(NOW - 5 * 60_000);
    expect(parseTime("2h", NOW)).toBe(NOW - 2 * 3_600_000);
    expect(parseTime("3d", NOW)).toBe(NOW - 3 * 86_400_000);
    expect(parseTime("1w", NOW)).toBe(NOW - 7 * 86_400_000);
  });

  it("clamps relative times at the epoch", () => {
    expect(parseTime("1000000w", NOW)).toBe(0);
  });

  it("reads dates and datetimes as local time", () => {
    expect(parseTime("2024-01-01", NOW)).toBe(new Date(2024, 0, 1).getTime());
    expect(parseTime("2024-01-01T10:30", NOW)).toBe(new Date(2024, 0, 1, 10, 30).getTime());
    expect(parseTime("2024-01-01 10:30:15", NOW)).toBe(new Date(2024, 0, 1, 10, 30, 15).getTime());
  });

  it("honours an explicit zone", () => {
    expect(parseTime("2024-01-01T00:00:00Z", NOW)).toBe(Date.UTC(2024, 0, 1));
    expect(parseTime("2024-01-01T02:00:00+02:00", NOW)).toBe(Date.UTC(2024, 0, 1));
  });

  it("rejects impossible dates", () => {
    expect(() => parseTime("2024-02-30", NOW)).toThrow('Invalid date: "2024-02-30"');
    expect(() => parseTime("2024-01-01T25:00", NOW)).toThrow("Invalid date");
  });

  it("rejects anything else with the accepted formats", () => {
    expect(() => parseTime("next tuesday", NOW)).toThrow(/Unrecognised time "next tuesday"\. Use now, today/);
    expect(() => parseTime("5y", NOW)).toThrow("Unrecognised time");
  });
});

describe("parseDuration", () => {
  it("treats a bare number as milliseconds", () => {
    expect(parseDuration("250")).toBe(250);
    expect(parseDuration("250ms")).toBe(250);
  });

  it("converts larger units", () => {
    expect(parseDuration("2s")).toBe(2000);
    expect(parseDuration("1.5m")).toBe(90_000);
    expect(parseDuration("1h")).toBe(3_600_000);
  });

  it("rejects malformed input", () => {
    expect(() => parseDuration("fast")).toThrow('Unrecognised duration "fast"');
    expect(() => parseDuration("-5s")).toThrow("Unrecognised duration");
  });
});

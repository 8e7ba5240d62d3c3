import { describe, expect, it } from "vitest";
import {
  buildDateRange,
  formatWithOffset,
  inDateRange,
  isEmptyRange,
  parseDateInput,
  parseOffset,
} from "./time.js";

const CST = 8 * 60;

describe("parseOffset", () => {
  it("accepts signed offsets with or without a colon", () => {
    expect(parseOffset("+08:00")).toBe(480);
    expect(parseOffset("-0530")).toBe(-330);
    expect(parseOffset("Z")).toBe(0);
  });

  it("rejects malformed offsets", () => {
    expect(parseOffset("8")).toBeUndefined();
    expect(parseOffset("+15:00")).toBeUndefined();
  });
});

describe("formatWithOffset", () => {
  it("renders the instant at the fixed offset", () => {
    const d = new Date("2024-05-01T10:00:00Z");
    expect(formatWithOffset(d, CST)).toBe("2024-05-01T18:00:00+08:00");
    expect(formatWithOffset(d, -330)).toBe("2024-05-01T04:30:00-05:30");
  });
});

describe("parseDateInput", () => {
  it("reads zone-less dates at the configured offset", () => {
    const parsed = parseDateInput("2024-05-01", CST);
    expect(parsed?.date.toISOString()).toBe("2024-04-30T16:00:00.000Z");
    expect(parsed?.dateOnly).toBe(true);
  });

  it("accepts slashes and a time part", () => {
    const parsed = parseDateInput("2024/05/01 09:30", CST);
    expect(parsed?.date.toISOString()).toBe("2024-05-01T01:30:00.000Z");
    expect(parsed?.dateOnly).toBe(false);
  });

  it("accepts day-first dates", () => {
    expect(parseDateInput("01-05-2024", 0)?.date.toISOString()).toBe("2024-05-01T00:00:00.000Z");
  });

  it("keeps the zone of ISO strings that carry one", () => {
    expect(parseDateInput("2024-05-01T10:00:00Z", CST)?.date.toISOString()).toBe("2024-05-01T10:00:00.000Z");
  });

  it("rejects impossible and unrecognised dates", () => {
    expect(parseDateInput("2024-02-30", 0)).toBeUndefined();
    expect(parseDateInput("yesterday", 0)).toBeUndefined();
    expect(parseDateInput("", 0)).toBeUndefined();
  });
});

describe("buildDateRange", () => {
  it("makes a date-only end inclusive of the whole day", () => {
    const range = buildDateRange(parseDateInput("2024-05-01", CST), parseDateInput("2024-05-03", CST));
    expect(range.since?.toISOString()).toBe("2024-04-30T16:00:00.000Z");
    expect(range.before?.toISOString()).toBe("2024-05-03T16:00:00.000Z");
  });

  it("uses a timed end as the exclusive bound", () => {
    const range = buildDateRange(undefined, parseDateInput("2024-05-03 12:00", CST));
    expect(range.since).toBeUndefined();
    expect(range.before?.toISOString()).toBe("2024-05-03T04:00:00.000Z");
  });

  it("is half-open: start included, end excluded", () => {
    const range = buildDateRange(parseDateInput("2024-05-01", CST), parseDateInput("2024-05-03", CST));
    const since = Date.parse("2024-04-30T16:00:00Z");
    const before = Date.parse("2024-05-03T16:00:00Z");
    expect(inDateRange(since, range)).toBe(true);
    expect(inDateRange(since - 1, range)).toBe(false);
    expect(inDateRange(before - 1, range)).toBe(true);
    expect(inDateRange(before, range)).toBe(false);
  });

  it("reports an open range as empty", () => {
    expect(isEmptyRange(buildDateRange(undefined, undefined))).toBe(true);
  });
});

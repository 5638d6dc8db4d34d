import { describe, expect, test } from "vitest";
import { DateParseError } from "./errors";
import { ResultBuilder, hasDate, hasTime, validateResult } from "./parseResult";

describe("hasDate / hasTime", () => {
  test("date fields", () => {
    expect(hasDate({ year: 2024 })).toBe(true);
    expect(hasDate({ hour: 10, weekday: 0 })).toBe(false);
  });

  test("zero is a value", () => {
    expect(hasTime({ hour: 0 })).toBe(true);
    expect(hasTime({ microsecond: 0 })).toBe(true);
  });

  test("zone alone is neither", () => {
    const zoneOnly = { tzoffset: 0, tzname: "UTC" };
    expect(hasDate(zoneOnly)).toBe(false);
    expect(hasTime(zoneOnly)).toBe(false);
  });
});

describe("ResultBuilder", () => {
  test("builds only the fields that were set", () => {
    const b = new ResultBuilder("x");
    b.set("hour", 10);
    b.set("tzname", "EST");
    expect(b.build()).toEqual({ hour: 10, tzname: "EST" });
  });

  test("a field may be set once", () => {
    const b = new ResultBuilder("10:30 11:00");
    b.set("hour", 10, 0);
    expect(() => b.set("hour", 11, 6)).toThrow("hour given more than once at position 6");
  });

  test("adjust rewrites in place", () => {
    const b = new ResultBuilder("12 am");
    b.set("hour", 12);
    b.adjust("hour", 0);
    expect(b.get("hour")).toBe(0);
  });
});

describe("validateResult", () => {
  test("leap day with and without a year", () => {
    expect(() => validateResult({ month: 2, day: 29 }, "")).not.toThrow();
    expect(() => validateResult({ year: 2024, month: 2, day: 29 }, "")).not.toThrow();
    expect(() => validateResult({ year: 2023, month: 2, day: 29 }, "")).toThrow(DateParseError);
  });

  test("day without a month", () => {
    expect(() => validateResult({ day: 31 }, "")).not.toThrow();
    expect(() => validateResult({ day: 32 }, "")).toThrow("day 32 out of range");
  });

  test("clock ranges", () => {
    expect(() => validateResult({ hour: 23, minute: 59, second: 59 }, "")).not.toThrow();
    expect(() => validateResult({ hour: 24 }, "")).toThrow("hour 24 out of range");
    expect(() => validateResult({ second: 60 }, "")).toThrow("second 60 out of range");
  });

  test("month range", () => {
    expect(() => validateResult({ month: 0 }, "")).toThrow("month 0 out of range");
  });
});

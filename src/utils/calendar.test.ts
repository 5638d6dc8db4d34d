import { describe, expect, test } from "vitest";
import {
  daysInMonth,
  daysInYear,
  fromOrdinalDate,
  fromWeekDate,
  isoWeeksInYear,
  nextDay,
} from "./calendar";

describe("month and year lengths", () => {
  test("february", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
  });

  test("years below 100 are not shifted into the 1900s", () => {
    expect(daysInMonth(4, 2)).toBe(29);
    expect(daysInYear(4)).toBe(366);
  });

  test("ISO weeks per year", () => {
    expect(isoWeeksInYear(2015)).toBe(53);
    expect(isoWeeksInYear(2009)).toBe(53);
    expect(isoWeeksInYear(2026)).toBe(53);
    expect(isoWeeksInYear(2024)).toBe(52);
  });
});

describe("week dates", () => {
  test("week 53 rolls into December", () => {
    expect(fromWeekDate(2015, 53, 1)).toEqual({ year: 2015, month: 12, day: 28 });
  });

  test("last day of week 53 lands in the next year", () => {
    expect(fromWeekDate(2009, 53, 7)).toEqual({ year: 2010, month: 1, day: 3 });
  });

  test("first day of week 1 lands in the previous year", () => {
    expect(fromWeekDate(2009, 1, 1)).toEqual({ year: 2008, month: 12, day: 29 });
  });

  test("mid-year", () => {
    expect(fromWeekDate(2012, 5, 5)).toEqual({ year: 2012, month: 2, day: 3 });
    expect(fromWeekDate(2026, 36, 1)).toEqual({ year: 2026, month: 8, day: 31 });
  });
});

describe("ordinal dates", () => {
  test("leap day", () => {
    expect(fromOrdinalDate(2024, 60)).toEqual({ year: 2024, month: 2, day: 29 });
  });

  test("last day", () => {
    expect(fromOrdinalDate(2023, 365)).toEqual({ year: 2023, month: 12, day: 31 });
  });
});

describe("nextDay", () => {
  test("into a leap day", () => {
    expect(nextDay({ year: 2024, month: 2, day: 28 })).toEqual({ year: 2024, month: 2, day: 29 });
  });

  test("across a year boundary", () => {
    expect(nextDay({ year: 2023, month: 12, day: 31 })).toEqual({ year: 2024, month: 1, day: 1 });
  });
});

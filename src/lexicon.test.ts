import { describe, expect, test } from "vitest";
import {
  ampmOf,
  hmsOf,
  isJump,
  isOrdinalSuffix,
  isPertain,
  isUtcZone,
  looksLikeZoneName,
  monthOf,
  weekdayOf,
} from "./lexicon";

describe("months", () => {
  test("full names and abbreviations", () => {
    expect(monthOf("January")).toBe(1);
    expect(monthOf("feb")).toBe(2);
    expect(monthOf("Sept")).toBe(9);
    expect(monthOf("DECEMBER")).toBe(12);
  });

  test("unknown word", () => {
    expect(monthOf("Janvier")).toBeUndefined();
  });
});

describe("weekdays", () => {
  test("Monday is 0, Sunday is 6", () => {
    expect(weekdayOf("Monday")).toBe(0);
    expect(weekdayOf("sun")).toBe(6);
  });

  test("extra abbreviations", () => {
    expect(weekdayOf("Tues")).toBe(1);
    expect(weekdayOf("Thur")).toBe(3);
    expect(weekdayOf("thurs")).toBe(3);
  });
});

describe("markers and labels", () => {
  test("am/pm", () => {
    expect(ampmOf("AM")).toBe(0);
    expect(ampmOf("a")).toBe(0);
    expect(ampmOf("pm")).toBe(1);
    expect(ampmOf("P")).toBe(1);
    expect(ampmOf("noon")).toBeUndefined();
  });

  test("h/m/s labels", () => {
    expect(hmsOf("h")).toBe(0);
    expect(hmsOf("hours")).toBe(0);
    expect(hmsOf("min")).toBe(1);
    expect(hmsOf("secs")).toBe(2);
    expect(hmsOf("ms")).toBeUndefined();
  });

  test("jump words and separators", () => {
    expect(isJump(" ")).toBe(true);
    expect(isJump(",")).toBe(true);
    expect(isJump("AT")).toBe(true);
    expect(isJump("of")).toBe(true);
    expect(isJump("#")).toBe(false);
    expect(isJump("placed")).toBe(false);
  });

  test("ordinal suffixes and pertain", () => {
    expect(isOrdinalSuffix("th")).toBe(true);
    expect(isOrdinalSuffix("RD")).toBe(true);
    expect(isOrdinalSuffix("h")).toBe(false);
    expect(isPertain("of")).toBe(true);
  });
});

describe("zones", () => {
  test("UTC literals", () => {
    expect(isUtcZone("UTC")).toBe(true);
    expect(isUtcZone("GMT")).toBe(true);
    expect(isUtcZone("z")).toBe(true);
    expect(isUtcZone("EST")).toBe(false);
  });

  test("named zones by shape", () => {
    expect(looksLikeZoneName("EST")).toBe(true);
    expect(looksLikeZoneName("BRST")).toBe(true);
    expect(looksLikeZoneName("est")).toBe(false);
    expect(looksLikeZoneName("ABCDEF")).toBe(false);
    expect(looksLikeZoneName("z")).toBe(true);
  });
});

import { describe, expect, test } from "vitest";
import { offsetInRange, offsetSeconds, parseOffset } from "./offsets";

describe("parseOffset", () => {
  test("accepted forms", () => {
    expect(parseOffset("+05:30")).toBe(19800);
    expect(parseOffset("+0530")).toBe(19800);
    expect(parseOffset("-0800")).toBe(-28800);
    expect(parseOffset("+05")).toBe(18000);
  });

  test("negative zero is plain zero", () => {
    expect(Object.is(parseOffset("-00:00"), 0)).toBe(true);
  });

  test("out of range", () => {
    expect(parseOffset("+24:00")).toBeUndefined();
    expect(parseOffset("+05:60")).toBeUndefined();
  });

  test("malformed", () => {
    expect(parseOffset("+5")).toBeUndefined();
    expect(parseOffset("05:00")).toBeUndefined();
    expect(parseOffset("+05:3")).toBeUndefined();
  });
});

describe("offsetSeconds", () => {
  test("sign applies to the whole offset", () => {
    expect(offsetSeconds("-", 3, 30)).toBe(-12600);
    expect(Object.is(offsetSeconds("-", 0, 0), 0)).toBe(true);
  });
});

describe("offsetInRange", () => {
  test("hours to 23, minutes to 59", () => {
    expect(offsetInRange(23, 59)).toBe(true);
    expect(offsetInRange(24, 0)).toBe(false);
    expect(offsetInRange(5, 99)).toBe(false);
  });
});

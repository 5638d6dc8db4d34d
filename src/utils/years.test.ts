import { describe, expect, test } from "vitest";
import { convertYear } from "./years";

// Window around 2024 is [1974, 2073].
const NOW = new Date(2024, 5, 15);

describe("convertYear", () => {
  test("two-digit years land in the window", () => {
    expect(convertYear(24, false, NOW)).toBe(2024);
    expect(convertYear(5, false, NOW)).toBe(2005);
    expect(convertYear(73, false, NOW)).toBe(2073);
    expect(convertYear(74, false, NOW)).toBe(1974);
    expect(convertYear(99, false, NOW)).toBe(1999);
  });

  test("window moves with the reference year", () => {
    const later = new Date(2090, 0, 1);
    expect(convertYear(45, false, later)).toBe(2045);
    expect(convertYear(30, false, later)).toBe(2130);
  });

  test("explicit century is kept", () => {
    expect(convertYear(99, true, NOW)).toBe(99);
  });

  test("full years pass through", () => {
    expect(convertYear(1999, false, NOW)).toBe(1999);
    expect(convertYear(2150, false, NOW)).toBe(2150);
  });
});

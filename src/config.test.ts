import { describe, expect, test } from "vitest";
import { resolveConfig, resolveIsoConfig } from "./config";
import { DateParseError } from "./errors";

describe("resolveConfig", () => {
  test("defaults", () => {
    const config = resolveConfig();
    expect(config.dayfirst).toBe(false);
    expect(config.yearfirst).toBe(false);
    expect(config.fuzzy).toBe(false);
    expect(config.fuzzyWithTokens).toBe(false);
    expect(config.now).toBeInstanceOf(Date);
  });

  test("result is frozen", () => {
    expect(Object.isFrozen(resolveConfig({ dayfirst: true }))).toBe(true);
  });

  test("reference instant is kept", () => {
    const now = new Date(2024, 5, 15);
    expect(resolveConfig({ now }).now.getTime()).toBe(now.getTime());
  });

  test("fuzzyWithTokens requires fuzzy", () => {
    expect(() => resolveConfig({ fuzzyWithTokens: true })).toThrow("fuzzyWithTokens: fuzzyWithTokens requires fuzzy");
    expect(resolveConfig({ fuzzy: true, fuzzyWithTokens: true }).fuzzyWithTokens).toBe(true);
  });

  test("violations are InvalidConfiguration", () => {
    try {
      resolveConfig({ fuzzyWithTokens: true });
      throw new Error("expected a configuration error");
    } catch (err) {
      expect(err).toBeInstanceOf(DateParseError);
      if (err instanceof DateParseError) expect(err.kind).toBe("InvalidConfiguration");
    }
  });

  test("an invalid date is rejected", () => {
    expect(() => resolveConfig({ now: new Date(Number.NaN) })).toThrow(DateParseError);
  });
});

describe("resolveIsoConfig", () => {
  test("default separator", () => {
    expect(resolveIsoConfig().sep).toBe("T");
  });

  test("one character only", () => {
    expect(resolveIsoConfig({ sep: " " }).sep).toBe(" ");
    expect(() => resolveIsoConfig({ sep: "--" })).toThrow("sep: separator must be exactly one character");
  });
});

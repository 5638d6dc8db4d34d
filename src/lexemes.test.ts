import { describe, expect, test } from "vitest";
import { lex, numericValue, splitFraction } from "./lexemes";

/** Helper: lex and return [text, kind] tuples. */
function lexed(input: string): [string, string][] {
  return lex(input).map((l) => [l.text, l.kind]);
}

describe("lex", () => {
  test("whitespace runs collapse and ordinal suffixes drop", () => {
    expect(lexed("  Jan  15th,  2024")).toEqual([
      [" ", "space"],
      ["Jan", "letters"],
      [" ", "space"],
      ["15", "digits"],
      [",", "punct"],
      [" ", "space"],
      ["2024", "digits"],
    ]);
  });

  test("a suffix not after digits is kept", () => {
    expect(lexed("the 4th")).toEqual([
      ["the", "letters"],
      [" ", "space"],
      ["4", "digits"],
    ]);
  });

  test("digits.digits becomes one decimal", () => {
    expect(lexed("28.5s")).toEqual([
      ["28.5", "decimal"],
      ["s", "letters"],
    ]);
  });

  test("dotted dates stay split", () => {
    expect(lexed("15.01.2024")).toEqual([
      ["15", "digits"],
      [".", "punct"],
      ["01", "digits"],
      [".", "punct"],
      ["2024", "digits"],
    ]);
  });

  test("seconds fraction after a colon", () => {
    expect(lexed("10:30:45.123")).toEqual([
      ["10", "digits"],
      [":", "punct"],
      ["30", "digits"],
      [":", "punct"],
      ["45.123", "decimal"],
    ]);
  });

  test("comma fraction only after a colon", () => {
    expect(lexed("49:41,502").map(([t]) => t)).toEqual(["49", ":", "41,502"]);
    expect(lexed("1,5").map(([t]) => t)).toEqual(["1", ",", "5"]);
  });

  test("positions point into the original input", () => {
    expect(lex("Jan   5").map((l) => l.pos)).toEqual([0, 3, 6]);
  });
});

describe("numeric helpers", () => {
  test("comma decimals read as dots", () => {
    expect(numericValue({ text: "41,502", pos: 0, kind: "decimal" })).toBe(41.502);
  });

  test("fractions pad and truncate to microseconds", () => {
    expect(splitFraction("45")).toEqual({ whole: 45, micro: undefined });
    expect(splitFraction("45.5")).toEqual({ whole: 45, micro: 500000 });
    expect(splitFraction("41,502")).toEqual({ whole: 41, micro: 502000 });
    expect(splitFraction("45.1234567")).toEqual({ whole: 45, micro: 123456 });
  });
});

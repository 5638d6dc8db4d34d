// parseTime: time-of-day only. Tries the clock shapes first so that "0930"
// reads as 09:30 rather than a year, then falls back to the heuristic
// resolver and keeps its time fields.

import { resolveConfig } from "./config";
import { DateParseError } from "./errors";
import { resolveHeuristic } from "./heuristicParser";
import { ampmOf } from "./lexicon";
import { ResultBuilder, validateResult, type ParseResult } from "./parseResult";

const CLOCK_SHAPES = [
  // 9:30, 9.30.15, 9:30:15.751 pm
  /^(?<h>\d{1,2})[:.](?<m>\d{2})(?:[:.](?<s>\d{2})(?:[.,](?<f>\d+))?)?(?: +(?<ap>[ap])\.?m\.?)?$/i,
  // 0930, 093015, 093015,751 PM
  /^(?<h>\d{2})(?<m>\d{2})(?:(?<s>\d{2})(?:[.,](?<f>\d+))?)?(?: +(?<ap>[ap])\.?m\.?)?$/i,
];

function fromClock(input: string, groups: Record<string, string | undefined>): ParseResult {
  const b = new ResultBuilder(input);
  let hour = Number(groups.h);
  const ap = groups.ap === undefined ? undefined : ampmOf(groups.ap);
  if (ap !== undefined) {
    if (hour > 12) throw DateParseError.numeric(`hour ${hour} cannot take ${groups.ap}m`, input);
    if (ap === 1 && hour < 12) hour += 12;
    else if (ap === 0 && hour === 12) hour = 0;
  }
  b.set("hour", hour);
  b.set("minute", Number(groups.m));
  b.set("second", groups.s === undefined ? 0 : Number(groups.s));
  if (groups.f !== undefined) b.set("microsecond", Number(groups.f.padEnd(6, "0").slice(0, 6)));
  return b.build();
}

export function parseTime(input: string): ParseResult {
  const s = input.trim();

  for (const shape of CLOCK_SHAPES) {
    const groups = shape.exec(s)?.groups;
    if (groups) {
      const result = fromClock(input, groups);
      validateResult(result, input);
      return result;
    }
  }

  const { result: full } = resolveHeuristic(input, resolveConfig({ fuzzy: true }));
  if (full.hour === undefined) throw DateParseError.noComponents(input);

  const time: ParseResult = {
    hour: full.hour,
    minute: full.minute ?? 0,
    second: full.second ?? 0,
  };
  if (full.microsecond !== undefined) time.microsecond = full.microsecond;
  return time;
}

// isoParser: strict ISO-8601 resolver. Never guesses: any input outside
// the grammar below is rejected.
//
//   date      YYYY | YYYY-MM | YYYY-MM-DD | YYYYMMDD
//             YYYY-Www[-D] | YYYYWww[D]          (week date)
//             YYYY-DDD | YYYYDDD                 (ordinal date)
//   time      HH[:MM[:SS[.f]]] | HHMM[SS[.f]]    f is 1-9 digits, . or ,
//   zone      Z | z | ±HH | ±HHMM | ±HH:MM

import { resolveIsoConfig, type IsoConfig, type IsoOptions } from "./config";
import { DateParseError } from "./errors";
import { logDebug } from "./logger";
import { ResultBuilder, validateResult, type ParseResult } from "./parseResult";
import { daysInYear, fromOrdinalDate, fromWeekDate, isoWeeksInYear, nextDay, type CivilDate } from "./utils/calendar";
import { parseOffset } from "./utils/offsets";

const DATE_SEP = "-";
const TIME_SEP = ":";
const FRACTION = /^[.,](\d{1,9})/;

interface Scanned<T> {
  value: T;
  end: number;
}

interface IsoTime {
  hour: number;
  minute: number;
  second: number;
  microsecond?: number;
  tzoffset?: number;
  tzname?: string;
}

/** Exactly `n` ASCII digits at `pos`, or undefined. */
function digitsAt(s: string, pos: number, n: number): number | undefined {
  const chunk = s.slice(pos, pos + n);
  return chunk.length === n && /^\d+$/.test(chunk) ? Number(chunk) : undefined;
}

function trimEnd(input: string): string {
  return input.replace(/\s+$/u, "");
}

// YYYY[-MM[-DD]] | YYYYMMDD
function scanCalendarDate(s: string, input: string): Scanned<CivilDate> {
  const year = digitsAt(s, 0, 4);
  if (year === undefined) throw DateParseError.iso("expected a four-digit year", input, 0);
  let pos = 4;
  if (pos >= s.length) return { value: { year, month: 1, day: 1 }, end: pos };

  const dashed = s[pos] === DATE_SEP;
  if (dashed) pos++;

  const month = digitsAt(s, pos, 2);
  if (month === undefined) throw DateParseError.iso("expected a two-digit month", input, pos);
  pos += 2;

  if (pos >= s.length) {
    if (dashed) return { value: { year, month, day: 1 }, end: pos };
    throw DateParseError.iso("compact YYYYMM is ambiguous", input, 0);
  }

  if (dashed) {
    if (s[pos] !== DATE_SEP) throw DateParseError.iso("expected '-' before the day", input, pos);
    pos++;
  }

  const day = digitsAt(s, pos, 2);
  if (day === undefined) throw DateParseError.iso("expected a two-digit day", input, pos);
  return { value: { year, month, day }, end: pos + 2 };
}

// YYYY-?Www-?D | YYYY-?DDD
function scanWeekOrOrdinalDate(s: string, input: string): Scanned<CivilDate> {
  const year = digitsAt(s, 0, 4);
  if (year === undefined) throw DateParseError.iso("expected a four-digit year", input, 0);
  const dashed = s[4] === DATE_SEP;
  let pos = dashed ? 5 : 4;

  if (s[pos] === "W") {
    pos++;
    const week = digitsAt(s, pos, 2);
    if (week === undefined) throw DateParseError.iso("expected a two-digit week number", input, pos);
    pos += 2;

    let isoDay = 1;
    const next = s[pos];
    if (next !== undefined && (next === DATE_SEP || /\d/.test(next))) {
      if ((next === DATE_SEP) !== dashed) {
        throw DateParseError.iso("inconsistent use of '-' in week date", input, pos);
      }
      if (dashed) pos++;
      const d = digitsAt(s, pos, 1);
      if (d === undefined) throw DateParseError.iso("expected a week day digit", input, pos);
      isoDay = d;
      pos++;
    }

    const weeks = isoWeeksInYear(year);
    if (week < 1 || week > weeks) {
      throw DateParseError.weekDate(`week ${week} outside 1..${weeks} for ${year}`, input);
    }
    if (isoDay < 1 || isoDay > 7) {
      throw DateParseError.weekDate(`week day ${isoDay} outside 1..7`, input);
    }
    return { value: fromWeekDate(year, week, isoDay), end: pos };
  }

  const ordinal = digitsAt(s, pos, 3);
  if (ordinal === undefined) throw DateParseError.iso("expected a three-digit day of year", input, pos);
  const limit = daysInYear(year);
  if (ordinal < 1 || ordinal > limit) {
    throw DateParseError.numeric(`day of year ${ordinal} outside 1..${limit} for ${year}`, input, pos);
  }
  return { value: fromOrdinalDate(year, ordinal), end: pos + 3 };
}

function scanDate(s: string, input: string): Scanned<CivilDate> {
  try {
    return scanCalendarDate(s, input);
  } catch (err) {
    if (!(err instanceof DateParseError) || err.kind !== "MalformedIsoGrammar") throw err;
    logDebug("calendar date rejected, trying week/ordinal date", { input, reason: err.message });
    return scanWeekOrOrdinalDate(s, input);
  }
}

function scanZone(s: string, offset: number, input: string): Pick<IsoTime, "tzoffset" | "tzname"> {
  if (s === "Z" || s === "z") return { tzoffset: 0, tzname: "UTC" };
  const tzoffset = parseOffset(s);
  if (tzoffset === undefined) throw DateParseError.iso(`invalid UTC offset ${JSON.stringify(s)}`, input, offset);
  return { tzoffset };
}

/** `s` is the time part only; `offset` is its position in `input`. */
function scanTime(s: string, offset: number, input: string): IsoTime {
  if (s.length < 2) throw DateParseError.iso("time too short", input, offset);

  const clock = [0, 0, 0];
  let microsecond: number | undefined;
  let zone: Pick<IsoTime, "tzoffset" | "tzname"> = {};
  let pos = 0;
  let colons = false;

  // Components: hour, minute, second, fraction, then a zone may still follow.
  for (let comp = 0; comp < 5 && pos < s.length; comp++) {
    const ch = s[pos]!;
    if (ch === "+" || ch === "-" || ch === "Z" || ch === "z") {
      zone = scanZone(s.slice(pos), offset + pos, input);
      pos = s.length;
      break;
    }
    if (comp === 4) break;

    if (comp === 1 && ch === TIME_SEP) {
      colons = true;
      pos++;
    } else if (comp === 2 && colons) {
      if (ch !== TIME_SEP) throw DateParseError.iso("inconsistent use of ':' in time", input, offset + pos);
      pos++;
    }

    if (comp < 3) {
      const n = digitsAt(s, pos, 2);
      if (n === undefined) throw DateParseError.iso("expected two digits", input, offset + pos);
      clock[comp] = n;
      pos += 2;
      continue;
    }

    const frac = FRACTION.exec(s.slice(pos));
    if (frac) {
      microsecond = Number(frac[1]!.padEnd(6, "0").slice(0, 6));
      pos += frac[0].length;
    }
  }

  if (pos < s.length) {
    throw DateParseError.iso(`unexpected ${JSON.stringify(s.slice(pos))}`, input, offset + pos);
  }

  const [hour, minute, second] = [clock[0]!, clock[1]!, clock[2]!];
  if (hour === 24 && (minute !== 0 || second !== 0 || (microsecond ?? 0) !== 0)) {
    throw DateParseError.numeric("hour 24 is only valid as 24:00:00", input, offset);
  }

  const time: IsoTime = { hour, minute, second, ...zone };
  if (microsecond !== undefined) time.microsecond = microsecond;
  return time;
}

function putTime(b: ResultBuilder, t: IsoTime): void {
  b.set("hour", t.hour === 24 ? 0 : t.hour);
  b.set("minute", t.minute);
  b.set("second", t.second);
  if (t.microsecond !== undefined) b.set("microsecond", t.microsecond);
  if (t.tzoffset !== undefined) b.set("tzoffset", t.tzoffset);
  if (t.tzname !== undefined) b.set("tzname", t.tzname);
}

function putDate(b: ResultBuilder, d: CivilDate): void {
  b.set("year", d.year);
  b.set("month", d.month);
  b.set("day", d.day);
}

function isoparseWith(input: string, config: IsoConfig): ParseResult {
  const s = trimEnd(input);
  const date = scanDate(s, input);
  const b = new ResultBuilder(input);

  if (date.end >= s.length) {
    putDate(b, date.value);
  } else {
    if (s[date.end] !== config.sep) {
      throw DateParseError.iso(`expected separator ${JSON.stringify(config.sep)}`, input, date.end);
    }
    const timeStart = date.end + 1;
    const time = scanTime(s.slice(timeStart), timeStart, input);
    // 24:00 is midnight at the end of the day.
    putDate(b, time.hour === 24 ? nextDay(date.value) : date.value);
    putTime(b, time);
  }

  const result = b.build();
  validateResult(result, input);
  return result;
}

export function isoparse(input: string, sep = "T"): ParseResult {
  return isoparseWith(input, resolveIsoConfig({ sep }));
}

export function parseIsodate(input: string): ParseResult {
  const s = trimEnd(input);
  const date = scanDate(s, input);
  if (date.end < s.length) {
    throw DateParseError.iso(`unexpected ${JSON.stringify(s.slice(date.end))}`, input, date.end);
  }
  const b = new ResultBuilder(input);
  putDate(b, date.value);
  const result = b.build();
  validateResult(result, input);
  return result;
}

export function parseIsotime(input: string): ParseResult {
  const b = new ResultBuilder(input);
  putTime(b, scanTime(trimEnd(input), 0, input));
  const result = b.build();
  validateResult(result, input);
  return result;
}

export class IsoParser {
  private readonly config: IsoConfig;

  constructor(options: IsoOptions = {}) {
    this.config = resolveIsoConfig(options);
  }

  get sep(): string {
    return this.config.sep;
  }

  isoparse(input: string): ParseResult {
    return isoparseWith(input, this.config);
  }

  parseIsodate(input: string): ParseResult {
    return parseIsodate(input);
  }

  parseIsotime(input: string): ParseResult {
    return parseIsotime(input);
  }
}

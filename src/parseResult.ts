import { DateParseError } from "./errors";
import { daysInMonth } from "./utils/calendar";

/**
 * Components recovered from an input string. Every field is optional;
 * `tzoffset` is in signed seconds east of UTC. `weekday` uses Monday = 0
 * and is informational only.
 */
export interface ParseResult {
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
  microsecond?: number;
  weekday?: number;
  tzoffset?: number;
  tzname?: string;
}

export type ResultField = keyof ParseResult;

const DATE_FIELDS = ["year", "month", "day"] as const;
const TIME_FIELDS = ["hour", "minute", "second", "microsecond"] as const;

export function hasDate(result: ParseResult): boolean {
  return DATE_FIELDS.some((f) => result[f] !== undefined);
}

export function hasTime(result: ParseResult): boolean {
  return TIME_FIELDS.some((f) => result[f] !== undefined);
}

/**
 * Accumulates fields while a resolver walks its input. A field may be set
 * once; a second write is an AmbiguousOrInvalidNumeric error.
 */
export class ResultBuilder {
  private readonly fields: ParseResult = {};

  constructor(private readonly input: string) {}

  get<K extends ResultField>(field: K): ParseResult[K] {
    return this.fields[field];
  }

  has(field: ResultField): boolean {
    return this.fields[field] !== undefined;
  }

  set<K extends ResultField>(field: K, value: NonNullable<ParseResult[K]>, pos?: number): void {
    if (this.fields[field] !== undefined) {
      throw DateParseError.numeric(`${field} given more than once`, this.input, pos);
    }
    this.fields[field] = value;
  }

  /** Rewrites an already-set field (am/pm shifting the hour). */
  adjust<K extends ResultField>(field: K, value: NonNullable<ParseResult[K]>): void {
    this.fields[field] = value;
  }

  build(): ParseResult {
    return { ...this.fields };
  }
}

/**
 * Range checks shared by both resolvers. `day` is checked against the
 * month's length, using a leap year when the year is unknown.
 */
export function validateResult(result: ParseResult, input: string): void {
  const fail = (msg: string): never => {
    throw DateParseError.numeric(msg, input);
  };
  const { year, month, day, hour, minute, second, microsecond } = result;

  if (year !== undefined && year < 0) fail(`year ${year} out of range`);
  if (month !== undefined && (month < 1 || month > 12)) fail(`month ${month} out of range`);
  if (day !== undefined) {
    const limit = month === undefined ? 31 : daysInMonth(year ?? 2000, month);
    if (day < 1 || day > limit) fail(`day ${day} out of range`);
  }
  if (hour !== undefined && (hour < 0 || hour > 23)) fail(`hour ${hour} out of range`);
  if (minute !== undefined && (minute < 0 || minute > 59)) fail(`minute ${minute} out of range`);
  if (second !== undefined && (second < 0 || second > 59)) fail(`second ${second} out of range`);
  if (microsecond !== undefined && (microsecond < 0 || microsecond > 999_999)) {
    fail(`microsecond ${microsecond} out of range`);
  }
}

// heuristicParser: format-free date/time recovery.
//
// Walks the lexemes once, left to right, with a few lexemes of lookahead.
// Numbers go through a fixed chain of shape tests (compact runs, labelled
// units, clock times, separated dates, bare members); words are matched
// against the lexicon; everything else is skipped (fuzzy) or rejected.
// Date members are collected by the YMD accumulator and only resolved
// once the whole input has been read.

import { resolveConfig, type ResolverConfig, type ResolverOptions } from "./config";
import { DateParseError } from "./errors";
import { isDigits, isNumeric, lex, numericValue, splitFraction, type Lexeme } from "./lexemes";
import {
  ampmOf,
  hmsOf,
  isJump,
  isPertain,
  isUtcZone,
  looksLikeZoneName,
  monthOf,
  weekdayOf,
  type AmPm,
  type HmsUnit,
} from "./lexicon";
import { logDebug } from "./logger";
import { ResultBuilder, hasDate, hasTime, validateResult, type ParseResult } from "./parseResult";
import { offsetInRange, offsetSeconds } from "./utils/offsets";
import { convertYear } from "./utils/years";
import { YmdAccumulator } from "./ymd";

export interface HeuristicOutcome {
  result: ParseResult;
  /** Unattributed substrings, in input order. Empty unless fuzzy. */
  skipped: string[];
}

function adjustAmPm(hour: number, ampm: AmPm): number {
  if (hour < 12 && ampm === 1) return hour + 12;
  if (hour === 12 && ampm === 0) return 0;
  return hour;
}

function flipSign(sign: string): string {
  return sign === "+" ? "-" : "+";
}

/** Sixtieths of the fractional part of a decimal lexeme, truncated. */
function fractionToSixtieths(text: string): number | undefined {
  const m = /[.,](\d+)$/.exec(text);
  if (!m) return undefined;
  const digits = m[1]!;
  if (/^0+$/.test(digits)) return undefined;
  return Math.floor((60 * Number(digits)) / 10 ** digits.length);
}

class HeuristicRun {
  private readonly lx: Lexeme[];
  private readonly res: ResultBuilder;
  private readonly ymd: YmdAccumulator;
  private readonly skippedIdx: number[] = [];
  private tzname: string | undefined;
  private tzoffset: number | undefined;
  private ampmSeen = false;
  // "GMT+3" means "my time + 3 is GMT": the sign after a zone name is read reversed.
  private reversedSignAt: number | undefined;

  constructor(
    private readonly input: string,
    private readonly config: ResolverConfig,
  ) {
    this.lx = lex(input);
    this.res = new ResultBuilder(input);
    this.ymd = new YmdAccumulator(input);
  }

  run(): HeuristicOutcome {
    let i = 0;
    while (i < this.lx.length) {
      i = this.step(i) + 1;
    }
    const result = this.finish();
    const skipped = this.recombineSkipped();
    if (skipped.length > 0) logDebug("skipped tokens", { input: this.input, skipped });
    return { result, skipped: this.config.fuzzy ? skipped : [] };
  }

  /** Interpret the lexeme at `i`; returns the index of the last lexeme consumed. */
  private step(i: number): number {
    const l = this.lx[i]!;

    if (isNumeric(l)) return this.numeric(i);

    if (l.kind === "letters") {
      const weekday = weekdayOf(l.text);
      if (weekday !== undefined) {
        this.res.set("weekday", weekday, l.pos);
        return i;
      }
      const month = monthOf(l.text);
      if (month !== undefined) return this.monthName(i, month);
      const ampm = ampmOf(l.text);
      if (ampm !== undefined) {
        this.ampm(i, ampm);
        return i;
      }
      if (this.couldBeZoneName(l.text)) return this.zoneName(i);
    }

    const sign = this.signAt(i);
    if (sign !== undefined && this.res.has("hour") && isDigits(this.lx[i + 1])) {
      return this.numericOffset(i, sign);
    }

    this.skip(i);
    return i;
  }

  private signAt(i: number): "+" | "-" | undefined {
    const text = this.lx[i]!.text;
    if (text !== "+" && text !== "-") return undefined;
    const sign = this.reversedSignAt === i ? flipSign(text) : text;
    return sign === "+" ? "+" : "-";
  }

  private skip(i: number): void {
    const l = this.lx[i]!;
    if (this.config.fuzzy || l.kind === "space" || l.kind === "punct" || isJump(l.text)) {
      this.skippedIdx.push(i);
      return;
    }
    throw DateParseError.unrecognized(l.text, this.input, l.pos);
  }

  // Numbers that fit nowhere: recorded as skipped in fuzzy mode.
  private skipNumber(i: number): number {
    const l = this.lx[i]!;
    if (!this.config.fuzzy) throw DateParseError.unrecognized(l.text, this.input, l.pos);
    this.skippedIdx.push(i);
    return i;
  }

  private monthName(i: number, month: number): number {
    const lx = this.lx;
    this.ymd.append(month, "M", lx[i]!.pos);

    const next = lx[i + 1];
    if (next?.text === "-" || next?.text === "/") {
      // Jan-01[-99]
      const second = lx[i + 2];
      if (second === undefined || !isDigits(second)) return i;
      this.ymd.append(second.text, undefined, second.pos);
      const third = lx[i + 4];
      if (lx[i + 3]?.text === next.text && third !== undefined && isDigits(third)) {
        this.ymd.append(third.text, undefined, third.pos);
        return i + 4;
      }
      return i + 2;
    }

    const of = lx[i + 2];
    const year = lx[i + 4];
    if (
      next?.kind === "space" &&
      of?.kind === "letters" &&
      isPertain(of.text) &&
      lx[i + 3]?.kind === "space" &&
      year !== undefined &&
      isDigits(year)
    ) {
      // "September of 03": the number after "of" can only be the year.
      const full = convertYear(Number(year.text), year.text.length > 2, this.config.now);
      this.ymd.append(String(full).padStart(4, "0"), "Y", year.pos);
      return i + 4;
    }

    return i;
  }

  private ampm(i: number, value: AmPm): void {
    const l = this.lx[i]!;
    const hour = this.res.get("hour");
    const fuzzy = this.config.fuzzy;

    if (this.ampmSeen || hour === undefined || hour > 12) {
      if (fuzzy) {
        this.skippedIdx.push(i);
        return;
      }
      if (hour !== undefined && hour > 12) {
        throw DateParseError.numeric(`hour ${hour} cannot take ${l.text}`, this.input, l.pos);
      }
      throw DateParseError.unrecognized(l.text, this.input, l.pos);
    }

    this.res.adjust("hour", adjustAmPm(hour, value));
    this.ampmSeen = true;
  }

  private couldBeZoneName(word: string): boolean {
    if (this.tzname !== undefined || this.tzoffset !== undefined) return false;
    if (!looksLikeZoneName(word)) return false;
    return this.res.has("hour") || isUtcZone(word);
  }

  private zoneName(i: number): number {
    const name = this.lx[i]!.text;
    const utc = isUtcZone(name);
    if (utc) {
      const upper = name.toUpperCase();
      this.tzname = upper === "Z" ? "UTC" : upper;
      this.tzoffset = 0;
    } else {
      this.tzname = name;
    }

    const next = this.lx[i + 1]?.text;
    if (next === "+" || next === "-") {
      this.reversedSignAt = i + 1;
      this.tzoffset = undefined;
      // "GMT+3" is not GMT.
      if (utc) this.tzname = undefined;
    }
    return i;
  }

  private numericOffset(i: number, sign: "+" | "-"): number {
    const lx = this.lx;
    const digits = lx[i + 1]!;
    let hours: number;
    let minutes: number;
    let last = i + 1;

    if (digits.text.length === 4) {
      // -0300
      hours = Number(digits.text.slice(0, 2));
      minutes = Number(digits.text.slice(2));
    } else if (lx[i + 2]?.text === ":" && isDigits(lx[i + 3])) {
      // -03:00
      hours = Number(digits.text);
      minutes = Number(lx[i + 3]!.text);
      last = i + 3;
    } else if (digits.text.length <= 2) {
      // -[0]3
      hours = Number(digits.text);
      minutes = 0;
    } else {
      throw DateParseError.numeric(`malformed UTC offset ${JSON.stringify(digits.text)}`, this.input, digits.pos);
    }

    if (this.tzoffset !== undefined) {
      throw DateParseError.numeric("UTC offset given more than once", this.input, lx[i]!.pos);
    }
    if (!offsetInRange(hours, minutes)) {
      const hhmm = `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
      throw DateParseError.numeric(`UTC offset ${sign}${hhmm} out of range`, this.input, digits.pos);
    }
    this.tzoffset = offsetSeconds(sign, hours, minutes);
    return last;
  }

  private numeric(idx: number): number {
    const lx = this.lx;
    const res = this.res;
    const ymd = this.ymd;
    const tok = lx[idx]!;
    const text = tok.text;
    const len = text.length;
    const digits = tok.kind === "digits";
    const value = numericValue(tok);
    const next = lx[idx + 1];

    // 19990101T23[59]
    if (
      ymd.length === 3 &&
      digits &&
      (len === 2 || len === 4) &&
      !res.has("hour") &&
      (next === undefined || (next.text !== ":" && hmsOf(next.text) === undefined))
    ) {
      res.set("hour", Number(text.slice(0, 2)), tok.pos);
      if (len === 4) res.set("minute", Number(text.slice(2)), tok.pos);
      return idx;
    }

    // YYMMDD or HHMMSS[.ffffff]
    if ((digits && len === 6) || (!digits && text.search(/[.,]/) === 6)) {
      if (ymd.length === 0 && digits) {
        ymd.append(text.slice(0, 2), undefined, tok.pos);
        ymd.append(text.slice(2, 4), undefined, tok.pos + 2);
        ymd.append(text.slice(4), undefined, tok.pos + 4);
      } else {
        res.set("hour", Number(text.slice(0, 2)), tok.pos);
        res.set("minute", Number(text.slice(2, 4)), tok.pos + 2);
        this.setSeconds(text.slice(4), tok.pos + 4);
      }
      return idx;
    }

    // YYYYMMDD[HHMM[SS]]
    if (digits && (len === 8 || len === 12 || len === 14)) {
      ymd.append(text.slice(0, 4), "Y", tok.pos);
      ymd.append(text.slice(4, 6), undefined, tok.pos + 4);
      ymd.append(text.slice(6, 8), undefined, tok.pos + 6);
      if (len > 8) {
        res.set("hour", Number(text.slice(8, 10)), tok.pos + 8);
        res.set("minute", Number(text.slice(10, 12)), tok.pos + 10);
        if (len > 12) res.set("second", Number(text.slice(12)), tok.pos + 12);
      }
      return idx;
    }

    // 10h, 36 m, 28.5s, or the "04" of "12h04"
    const label = this.findHmsLabel(idx);
    if (label !== undefined) {
      if (label.at > idx) {
        this.assignHms(tok, label.unit);
        return label.at;
      }
      if (label.unit < 2) this.assignHms(tok, label.unit === 0 ? 1 : 2);
      return idx;
    }

    // HH:MM[:SS[.ffffff]]
    const minuteLex = lx[idx + 2];
    if (next?.text === ":" && minuteLex !== undefined && isNumeric(minuteLex)) {
      res.set("hour", Math.trunc(value), tok.pos);
      this.setMinutes(minuteLex);
      const secondLex = lx[idx + 4];
      if (lx[idx + 3]?.text === ":" && secondLex !== undefined && isNumeric(secondLex)) {
        this.setSeconds(secondLex.text, secondLex.pos);
        return idx + 4;
      }
      return idx + 2;
    }

    // 01-01[-01], 01/Jan/2003, 15.01.2024
    if (next !== undefined && (next.text === "-" || next.text === "/" || next.text === ".")) {
      if (!digits) return this.skipNumber(idx);
      ymd.append(text, undefined, tok.pos);
      const second = lx[idx + 2];
      if (second === undefined || isJump(second.text)) return idx + 1;
      if (!this.appendMember(second)) return idx + 1;
      const third = lx[idx + 4];
      if (lx[idx + 3]?.text === next.text && third !== undefined) {
        if (!this.appendMember(third)) return idx + 3;
        return idx + 4;
      }
      return idx + 2;
    }

    // A member standing alone: "15 ", "2024" at the end, or "12 am"
    if (next === undefined || isJump(next.text)) {
      const after = lx[idx + 2];
      const ap = after?.kind === "letters" ? ampmOf(after.text) : undefined;
      if (after !== undefined && ap !== undefined && !this.ampmSeen && this.clockHour(value, after)) {
        res.set("hour", adjustAmPm(Math.trunc(value), ap), tok.pos);
        this.ampmSeen = true;
        return idx + 2;
      }
      if (!digits || len > 4) return this.skipNumber(idx);
      ymd.append(text, undefined, tok.pos);
      return next === undefined ? idx : idx + 1;
    }

    // 12am
    const ap = next.kind === "letters" ? ampmOf(next.text) : undefined;
    if (ap !== undefined && !this.ampmSeen && this.clockHour(value, next)) {
      res.set("hour", adjustAmPm(Math.trunc(value), ap), tok.pos);
      this.ampmSeen = true;
      return idx + 1;
    }

    if (digits && ymd.couldBeDay(value)) {
      ymd.append(text, undefined, tok.pos);
      return idx;
    }

    return this.skipNumber(idx);
  }

  /**
   * Whether `value` can take the am/pm `marker` as a 12-hour clock hour. Out of
   * range, strict mode throws and fuzzy mode reads the number on its own.
   */
  private clockHour(value: number, marker: Lexeme): boolean {
    const hour = Math.trunc(value);
    if (hour >= 1 && hour <= 12) return true;
    if (this.config.fuzzy) return false;
    throw DateParseError.numeric(`hour ${hour} cannot take ${marker.text}`, this.input, marker.pos);
  }

  /** Second or third member of a separated date: digits or a month name. */
  private appendMember(l: Lexeme): boolean {
    if (isDigits(l)) {
      this.ymd.append(l.text, undefined, l.pos);
      return true;
    }
    const month = l.kind === "letters" ? monthOf(l.text) : undefined;
    if (month !== undefined) {
      this.ymd.append(month, "M", l.pos);
      return true;
    }
    if (!this.config.fuzzy) throw DateParseError.unrecognized(l.text, this.input, l.pos);
    return false;
  }

  /**
   * Find the h/m/s label that belongs to the number at `idx`: right after
   * it, after one space, right before it, or (for the final number only)
   * before it across a space.
   */
  private findHmsLabel(idx: number): { at: number; unit: HmsUnit } | undefined {
    const lx = this.lx;
    const labelAt = (j: number): HmsUnit | undefined => {
      const l = lx[j];
      return l?.kind === "letters" ? hmsOf(l.text) : undefined;
    };

    const after = labelAt(idx + 1);
    if (after !== undefined) return { at: idx + 1, unit: after };

    if (lx[idx + 1]?.kind === "space") {
      const spaced = labelAt(idx + 2);
      if (spaced !== undefined) return { at: idx + 2, unit: spaced };
    }

    if (idx > 0) {
      const before = labelAt(idx - 1);
      if (before !== undefined) return { at: idx - 1, unit: before };
    }

    if (idx > 1 && idx === lx.length - 1 && lx[idx - 1]?.kind === "space") {
      const spacedBefore = labelAt(idx - 2);
      if (spacedBefore !== undefined) return { at: idx - 2, unit: spacedBefore };
    }

    return undefined;
  }

  private assignHms(tok: Lexeme, unit: HmsUnit): void {
    switch (unit) {
      case 0: {
        this.res.set("hour", Math.trunc(numericValue(tok)), tok.pos);
        const minutes = fractionToSixtieths(tok.text);
        if (minutes !== undefined) this.res.set("minute", minutes, tok.pos);
        break;
      }
      case 1:
        this.setMinutes(tok);
        break;
      case 2:
        this.setSeconds(tok.text, tok.pos);
        break;
    }
  }

  private setMinutes(tok: Lexeme): void {
    this.res.set("minute", Math.trunc(numericValue(tok)), tok.pos);
    const seconds = fractionToSixtieths(tok.text);
    if (seconds !== undefined) this.res.set("second", seconds, tok.pos);
  }

  private setSeconds(text: string, pos: number): void {
    const { whole, micro } = splitFraction(text);
    this.res.set("second", whole, pos);
    if (micro !== undefined) this.res.set("microsecond", micro, pos);
  }

  private finish(): ParseResult {
    const { year, month, day } = this.ymd.resolve(this.config.yearfirst, this.config.dayfirst);
    if (year !== undefined) this.res.set("year", convertYear(year, this.ymd.centurySpecified, this.config.now));
    if (month !== undefined) this.res.set("month", month);
    if (day !== undefined) this.res.set("day", day);
    if (this.tzoffset !== undefined) this.res.set("tzoffset", this.tzoffset);
    if (this.tzname !== undefined) this.res.set("tzname", this.tzname);

    const result = this.res.build();
    if (!hasDate(result) && !hasTime(result)) throw DateParseError.noComponents(this.input);
    validateResult(result, this.input);
    return result;
  }

  private recombineSkipped(): string[] {
    const out: string[] = [];
    let prev = -2;
    for (const idx of this.skippedIdx) {
      const text = this.lx[idx]!.text;
      if (idx === prev + 1 && out.length > 0) out[out.length - 1] += text;
      else out.push(text);
      prev = idx;
    }
    return out;
  }
}

/** Run the heuristic resolver with an already-validated configuration. */
export function resolveHeuristic(input: string, config: ResolverConfig): HeuristicOutcome {
  return new HeuristicRun(input, config).run();
}

/**
 * Holds a resolver configuration for repeated use. Per-call options are
 * merged over the held ones.
 */
export class Parser {
  private readonly options: ResolverOptions;

  constructor(options: ResolverOptions = {}) {
    resolveConfig(options);
    this.options = { ...options };
  }

  parse(input: string, options: ResolverOptions & { fuzzyWithTokens: true }): [ParseResult, string[]];
  parse(input: string, options?: ResolverOptions): ParseResult;
  parse(input: string, options: ResolverOptions = {}): ParseResult | [ParseResult, string[]] {
    const config = resolveConfig({ ...this.options, ...options });
    const { result, skipped } = resolveHeuristic(input, config);
    return config.fuzzyWithTokens ? [result, skipped] : result;
  }
}

// ymd: collects up to three date members and decides which is the year,
// month and day once the whole input has been seen.

import { DateParseError } from "./errors";
import { logDebug } from "./logger";
import { daysInMonth } from "./utils/calendar";

export type YmdLabel = "Y" | "M" | "D";

export interface ResolvedYmd {
  year?: number;
  month?: number;
  day?: number;
}

export class YmdAccumulator {
  private readonly members: number[] = [];
  private yearIdx: number | undefined;
  private monthIdx: number | undefined;
  private dayIdx: number | undefined;
  /** A member was written with three or more digits, or exceeds 100. */
  centurySpecified = false;

  constructor(private readonly input: string) {}

  get length(): number {
    return this.members.length;
  }

  /**
   * Add a member. Strings are digit runs as written ("05", "2024"); numbers
   * come from names (a month) or already-expanded years.
   */
  append(value: string | number, label?: YmdLabel, pos?: number): void {
    let n: number;
    let tag = label;
    if (typeof value === "string") {
      n = Number(value);
      if (value.length > 2) tag = this.yearLabel(tag, pos);
    } else {
      n = value;
      if (n > 100) tag = this.yearLabel(tag, pos);
    }

    if (this.members.length >= 3) {
      throw DateParseError.numeric("more than three date members", this.input, pos);
    }
    this.members.push(n);
    const idx = this.members.length - 1;

    if (tag === "M") {
      if (this.monthIdx !== undefined) throw DateParseError.numeric("month given more than once", this.input, pos);
      this.monthIdx = idx;
    } else if (tag === "D") {
      if (this.dayIdx !== undefined) throw DateParseError.numeric("day given more than once", this.input, pos);
      this.dayIdx = idx;
    } else if (tag === "Y") {
      if (this.yearIdx !== undefined) throw DateParseError.numeric("two years in one date", this.input, pos);
      this.yearIdx = idx;
    }
  }

  private yearLabel(label: YmdLabel | undefined, pos: number | undefined): YmdLabel {
    this.centurySpecified = true;
    if (label !== undefined && label !== "Y") {
      throw DateParseError.numeric(`year-sized value labelled ${label}`, this.input, pos);
    }
    return "Y";
  }

  /** Whether `value` could still be the day given what is already known. */
  couldBeDay(value: number): boolean {
    if (this.dayIdx !== undefined) return false;
    if (this.monthIdx === undefined) return value >= 1 && value <= 31;
    const month = this.members[this.monthIdx]!;
    const year = this.yearIdx === undefined ? 2000 : this.members[this.yearIdx]!;
    return value >= 1 && value <= daysInMonth(year, month);
  }

  resolve(yearfirst: boolean, dayfirst: boolean): ResolvedYmd {
    const resolved = this.resolveOrder(yearfirst, dayfirst);
    logDebug("ymd resolved", { members: [...this.members], yearfirst, dayfirst, ...resolved });
    return resolved;
  }

  private resolveOrder(yearfirst: boolean, dayfirst: boolean): ResolvedYmd {
    const m = this.members;
    const known = this.knownPositions();
    const knownCount = Object.keys(known).length;

    if ((knownCount > 0 && knownCount === m.length) || (m.length === 3 && knownCount === 2)) {
      return this.fromKnown(known);
    }

    // A year with no month name: order the other two members.
    if (m.length === 3 && this.yearIdx !== undefined && this.monthIdx === undefined) {
      const year = m[this.yearIdx]!;
      const others = m.filter((_, i) => i !== this.yearIdx);
      const first = others[0]!;
      const second = others[1]!;
      if (first > 12) return { year, month: second, day: first };
      if (second > 12) return { year, month: first, day: second };
      return dayfirst ? { year, month: second, day: first } : { year, month: first, day: second };
    }

    const mIdx = this.monthIdx;

    if (m.length === 1 || (mIdx !== undefined && m.length === 2)) {
      const out: ResolvedYmd = {};
      let other: number;
      if (mIdx !== undefined) {
        out.month = m[mIdx]!;
        other = m[mIdx === 0 ? m.length - 1 : mIdx - 1]!;
      } else {
        other = m[0]!;
      }
      if (m.length > 1 || mIdx === undefined) {
        if (other > 31) out.year = other;
        else out.day = other;
      }
      return out;
    }

    if (m.length === 2) {
      const [a, b] = [m[0]!, m[1]!];
      if (a > 31) return { year: a, month: b };
      if (b > 31) return { month: a, year: b };
      if (dayfirst && b <= 12) return { day: a, month: b };
      return { month: a, day: b };
    }

    if (m.length === 3) {
      const [a, b, c] = [m[0]!, m[1]!, m[2]!];
      switch (mIdx) {
        case 0:
          return b > 31 ? { month: a, year: b, day: c } : { month: a, day: b, year: c };
        case 1:
          if (a > 31 || (yearfirst && c <= 31)) return { year: a, month: b, day: c };
          return { day: a, month: b, year: c };
        case 2:
          return b > 31 ? { day: a, year: b, month: c } : { year: a, day: b, month: c };
        default:
          if (a > 31 || this.yearIdx === 0 || (yearfirst && b <= 12 && c <= 31)) {
            if (dayfirst && c <= 12) return { year: a, day: b, month: c };
            return { year: a, month: b, day: c };
          }
          if (a > 12 || (dayfirst && b <= 12)) return { day: a, month: b, year: c };
          return { month: a, day: b, year: c };
      }
    }

    return {};
  }

  private knownPositions(): Partial<Record<YmdLabel, number>> {
    const known: Partial<Record<YmdLabel, number>> = {};
    if (this.yearIdx !== undefined) known.Y = this.yearIdx;
    if (this.monthIdx !== undefined) known.M = this.monthIdx;
    if (this.dayIdx !== undefined) known.D = this.dayIdx;
    return known;
  }

  private fromKnown(known: Partial<Record<YmdLabel, number>>): ResolvedYmd {
    const m = this.members;
    const filled = { ...known };
    if (m.length === 3 && Object.keys(known).length === 2) {
      const taken = new Set(Object.values(known));
      const free = [0, 1, 2].find((i) => !taken.has(i));
      if (filled.Y === undefined) filled.Y = free;
      else if (filled.M === undefined) filled.M = free;
      else filled.D = free;
    }
    const pick = (idx: number | undefined) => (idx === undefined ? undefined : m[idx]);
    const out: ResolvedYmd = {};
    const year = pick(filled.Y);
    const month = pick(filled.M);
    const day = pick(filled.D);
    if (year !== undefined) out.year = year;
    if (month !== undefined) out.month = month;
    if (day !== undefined) out.day = day;
    return out;
  }
}

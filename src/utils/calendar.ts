// calendar: civil-date arithmetic for the resolvers, on date-fns.
//
// All helpers work on local-midnight Dates built with setFullYear so that
// years below 100 are not remapped to 19xx by the Date constructor.

import {
  addDays,
  getDaysInMonth,
  getDaysInYear,
  getISOWeeksInYear,
  setDayOfYear,
  setISODay,
  setISOWeek,
} from "date-fns";

export interface CivilDate {
  year: number;
  month: number; // 1..12
  day: number;
}

function civil(year: number, month: number, day: number): Date {
  const d = new Date(0);
  d.setFullYear(year, month - 1, day);
  d.setHours(0, 0, 0, 0);
  return d;
}

function fromDate(d: Date): CivilDate {
  return { year: d.getFullYear(), month: d.getMonth() + 1, day: d.getDate() };
}

export function daysInMonth(year: number, month: number): number {
  return getDaysInMonth(civil(year, month, 1));
}

export function daysInYear(year: number): number {
  return getDaysInYear(civil(year, 1, 1));
}

/** 52 or 53. January 4th always falls in ISO week 1 of its own year. */
export function isoWeeksInYear(year: number): number {
  return getISOWeeksInYear(civil(year, 1, 4));
}

/** ISO week date to civil date; may land in the previous or next year. */
export function fromWeekDate(year: number, week: number, isoDay: number): CivilDate {
  const anchor = civil(year, 1, 4);
  return fromDate(setISODay(setISOWeek(anchor, week), isoDay));
}

export function fromOrdinalDate(year: number, dayOfYear: number): CivilDate {
  return fromDate(setDayOfYear(civil(year, 1, 1), dayOfYear));
}

export function nextDay(date: CivilDate): CivilDate {
  return fromDate(addDays(civil(date.year, date.month, date.day), 1));
}

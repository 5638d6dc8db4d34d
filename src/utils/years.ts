import { getYear } from "date-fns";

/**
 * Expand a two-digit year into the century window [Y-50, Y+49] around the
 * year of `now`. Years written with a century ("0099", "1999") pass through.
 */
export function convertYear(year: number, centurySpecified: boolean, now: Date): number {
  if (year >= 100 || centurySpecified) return year;

  const current = getYear(now);
  const century = current - (current % 100);
  let full = year + century;
  if (full >= current + 50) full -= 100;
  else if (full < current - 50) full += 100;
  return full;
}

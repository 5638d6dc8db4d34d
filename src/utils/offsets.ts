// offsets: numeric UTC offset designators to signed seconds.

const DESIGNATOR = /^([+-])(\d{2})(?::?(\d{2}))?$/;

/** Signed seconds for a sign and clock offset. Never returns -0. */
export function offsetSeconds(sign: "+" | "-", hours: number, minutes: number): number {
  const total = hours * 3600 + minutes * 60;
  if (total === 0) return 0;
  return sign === "-" ? -total : total;
}

export function offsetInRange(hours: number, minutes: number): boolean {
  return hours <= 23 && minutes <= 59;
}

/**
 * `±HH`, `±HHMM` or `±HH:MM` to signed seconds. Returns undefined when the
 * designator does not match or hours > 23 or minutes > 59.
 */
export function parseOffset(designator: string): number | undefined {
  const m = DESIGNATOR.exec(designator);
  if (!m) return undefined;
  const hours = Number(m[2]);
  const minutes = m[3] === undefined ? 0 : Number(m[3]);
  if (!offsetInRange(hours, minutes)) return undefined;
  return offsetSeconds(m[1] === "-" ? "-" : "+", hours, minutes);
}

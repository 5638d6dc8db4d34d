// Lexical tables used by the heuristic resolver. All lookups are case-insensitive.

import tables from "./lexicon.json";

/** Build a word → index map from groups of synonyms (index = group position). */
function indexGroups(groups: string[][], base = 0): ReadonlyMap<string, number> {
  const map = new Map<string, number>();
  groups.forEach((words, i) => {
    for (const w of words) map.set(w, i + base);
  });
  return map;
}

const MONTHS = indexGroups(tables.months, 1); // 1..12
const WEEKDAYS = indexGroups(tables.weekdays); // Monday = 0
const AMPM = indexGroups(tables.ampm); // 0 = am, 1 = pm
const HMS = indexGroups(tables.hms); // 0 = hour, 1 = minute, 2 = second
const JUMP: ReadonlySet<string> = new Set(tables.jump);
const ORDINAL_SUFFIXES: ReadonlySet<string> = new Set(tables.ordinalSuffixes);
const PERTAIN: ReadonlySet<string> = new Set(tables.pertain);
const UTC_ZONES: ReadonlySet<string> = new Set(tables.utcZones);

export type AmPm = 0 | 1;
export type HmsUnit = 0 | 1 | 2;

export function monthOf(word: string): number | undefined {
  return MONTHS.get(word.toLowerCase());
}

export function weekdayOf(word: string): number | undefined {
  return WEEKDAYS.get(word.toLowerCase());
}

export function ampmOf(word: string): AmPm | undefined {
  const v = AMPM.get(word.toLowerCase());
  return v === 0 || v === 1 ? v : undefined;
}

export function hmsOf(word: string): HmsUnit | undefined {
  const v = HMS.get(word.toLowerCase());
  return v === 0 || v === 1 || v === 2 ? v : undefined;
}

/** Separators and filler words that carry no date meaning ("at", "on", ","). */
export function isJump(word: string): boolean {
  return JUMP.has(word.toLowerCase());
}

export function isOrdinalSuffix(word: string): boolean {
  return ORDINAL_SUFFIXES.has(word.toLowerCase());
}

/** "of" as in "September of 2003". */
export function isPertain(word: string): boolean {
  return PERTAIN.has(word.toLowerCase());
}

/** Literals that always mean a zero offset: UTC, GMT, Z. */
export function isUtcZone(word: string): boolean {
  return UTC_ZONES.has(word.toLowerCase());
}

// Named zones are recognised by shape only; the engine never maps them to
// an offset.
const ZONE_NAME = /^[A-Z]{1,5}$/;

export function looksLikeZoneName(word: string): boolean {
  return ZONE_NAME.test(word) || isUtcZone(word);
}

import { resolveConfig, type ResolverOptions } from "./config";
import { resolveHeuristic } from "./heuristicParser";
import type { ParseResult } from "./parseResult";

export { IsoParser, isoparse, parseIsodate, parseIsotime } from "./isoParser";
export { Parser } from "./heuristicParser";
export { parseTime } from "./parseTime";
export { hasDate, hasTime } from "./parseResult";
export type { ParseResult, ResultField } from "./parseResult";
export { tokenize } from "./dateTokenizer";
export type { DateToken, DateTokenKind } from "./dateTokenizer";
export { DateParseError, isDateParseError } from "./errors";
export type { DateParseErrorKind } from "./errors";
export { resolveConfig, resolveIsoConfig } from "./config";
export type { IsoConfig, IsoOptions, LogLevel, ResolverConfig, ResolverOptions } from "./config";
export { setLogLevel } from "./logger";

/**
 * Recover date/time components from free-form text. With
 * `fuzzyWithTokens` the skipped substrings are returned alongside.
 *
 * @example
 * parse("10-09-2003", { dayfirst: true }); // { year: 2003, month: 9, day: 10 }
 */
export function parse(input: string, options: ResolverOptions & { fuzzyWithTokens: true }): [ParseResult, string[]];
export function parse(input: string, options?: ResolverOptions): ParseResult;
export function parse(input: string, options: ResolverOptions = {}): ParseResult | [ParseResult, string[]] {
  const config = resolveConfig(options);
  const { result, skipped } = resolveHeuristic(input, config);
  return config.fuzzyWithTokens ? [result, skipped] : result;
}

/** Fuzzy parse that also returns the text it could not attribute. */
export function parseFuzzyWithTokens(input: string, options: ResolverOptions = {}): [ParseResult, string[]] {
  const config = resolveConfig({ ...options, fuzzy: true, fuzzyWithTokens: true });
  const { result, skipped } = resolveHeuristic(input, config);
  return [result, skipped];
}

// lexemes: regroup raw tokens into the units the heuristic resolver walks.
//
//   "  "            -> one " " lexeme
//   "15th"          -> "15" (ordinal suffix dropped)
//   "28.5"          -> one decimal lexeme, unless part of "15.01.2024"
//   ":41,502"       -> ":" then decimal "41,502"

import { tokenize, type DateToken } from "./dateTokenizer";
import { isOrdinalSuffix } from "./lexicon";

export type LexemeKind = "digits" | "decimal" | "letters" | "space" | "punct";

export interface Lexeme {
  text: string;
  pos: number;
  kind: LexemeKind;
}

const SPACE = /^\s$/u;

function isWord(t: DateToken | undefined): boolean {
  return t !== undefined && (t.kind === "digits" || t.kind === "letters");
}

function isDot(t: DateToken | undefined): boolean {
  return t !== undefined && t.text === ".";
}

/**
 * Length in words of the dot-joined chain that contains the word at `i`
 * ("15.01.2024" is 3, "28.5" is 2, "a.m" is 2).
 */
function dottedChainLength(tokens: DateToken[], i: number): number {
  let start = i;
  while (isDot(tokens[start - 1]) && isWord(tokens[start - 2])) start -= 2;
  let end = i;
  while (isDot(tokens[end + 1]) && isWord(tokens[end + 2])) end += 2;
  return (end - start) / 2 + 1;
}

export function lex(input: string): Lexeme[] {
  const tokens = tokenize(input);
  const out: Lexeme[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i]!;

    if (t.kind === "separator" && SPACE.test(t.text)) {
      const prev = out[out.length - 1];
      if (prev?.kind !== "space") out.push({ text: " ", pos: t.pos, kind: "space" });
      continue;
    }

    if (t.kind === "letters") {
      if (isOrdinalSuffix(t.text) && tokens[i - 1]?.kind === "digits") continue;
      out.push({ text: t.text, pos: t.pos, kind: "letters" });
      continue;
    }

    if (t.kind === "digits") {
      const sep = tokens[i + 1];
      const frac = tokens[i + 2];
      if (sep !== undefined && frac?.kind === "digits") {
        const dotted = sep.text === "." && dottedChainLength(tokens, i) === 2;
        const comma = sep.text === "," && tokens[i - 1]?.text === ":";
        if (dotted || comma) {
          out.push({ text: t.text + sep.text + frac.text, pos: t.pos, kind: "decimal" });
          i += 2;
          continue;
        }
      }
      out.push({ text: t.text, pos: t.pos, kind: "digits" });
      continue;
    }

    out.push({ text: t.text, pos: t.pos, kind: "punct" });
  }

  return out;
}

export function isNumeric(l: Lexeme | undefined): boolean {
  return l !== undefined && (l.kind === "digits" || l.kind === "decimal");
}

export function isDigits(l: Lexeme | undefined): boolean {
  return l?.kind === "digits";
}

/** Numeric value of a digits or decimal lexeme; "41,502" reads as 41.502. */
export function numericValue(l: Lexeme): number {
  return Number(l.text.replace(",", "."));
}

/** Split "45.123" into whole seconds and microseconds (fraction truncated to 6 digits). */
export function splitFraction(text: string): { whole: number; micro: number | undefined } {
  const m = /^(\d+)(?:[.,](\d+))?$/.exec(text);
  if (!m) return { whole: Number(text), micro: undefined };
  const frac = m[2];
  return {
    whole: Number(m[1]),
    micro: frac === undefined ? undefined : Number(frac.padEnd(6, "0").slice(0, 6)),
  };
}

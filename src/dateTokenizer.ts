// Date string tokenizer.
// Splits raw input on transitions between digits, letters and everything
// else. Produces position-annotated tokens so that concatenating all token
// texts reproduces the original input exactly. Purely lexical: no token is
// given a date meaning here.

export type DateTokenKind =
  | "digits" // run of 0-9
  | "letters" // run of Unicode letters
  | "separator"; // any other single character (whitespace, : - / . , + ...)

export interface DateToken {
  text: string;
  pos: number;
  kind: DateTokenKind;
}

const LETTER = /\p{L}/u;

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

export function tokenize(input: string): DateToken[] {
  const tokens: DateToken[] = [];
  let pos = 0;

  while (pos < input.length) {
    const ch = input[pos]!;

    if (isDigit(ch)) {
      const start = pos;
      while (pos < input.length && isDigit(input[pos]!)) pos++;
      tokens.push({ text: input.slice(start, pos), pos: start, kind: "digits" });
      continue;
    }

    if (isLetter(ch)) {
      const start = pos;
      while (pos < input.length && isLetter(input[pos]!)) pos++;
      tokens.push({ text: input.slice(start, pos), pos: start, kind: "letters" });
      continue;
    }

    // Whitespace and punctuation are never grouped: "  " is two tokens.
    tokens.push({ text: ch, pos, kind: "separator" });
    pos++;
  }

  return tokens;
}

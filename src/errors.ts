export type DateParseErrorKind =
  | "NoComponentsFound"
  | "AmbiguousOrInvalidNumeric" // out-of-range field, two years, too many date members
  | "UnrecognizedToken" // leftover input outside fuzzy mode
  | "MalformedIsoGrammar"
  | "InvalidWeekDate"
  | "InvalidConfiguration";

/**
 * The single error type thrown by every resolver. `pos` is the character
 * offset in `input` where the problem was found, when one is known.
 */
export class DateParseError extends Error {
  readonly kind: DateParseErrorKind;
  readonly input: string;
  readonly pos: number | undefined;

  constructor(kind: DateParseErrorKind, message: string, input: string, pos?: number) {
    super(pos === undefined ? message : `${message} at position ${pos}`);
    this.name = "DateParseError";
    this.kind = kind;
    this.input = input;
    this.pos = pos;
  }

  static noComponents(input: string): DateParseError {
    return new DateParseError(
      "NoComponentsFound",
      `no date or time components found in ${JSON.stringify(input)}`,
      input,
    );
  }

  static numeric(message: string, input: string, pos?: number): DateParseError {
    return new DateParseError("AmbiguousOrInvalidNumeric", message, input, pos);
  }

  static unrecognized(token: string, input: string, pos: number): DateParseError {
    return new DateParseError(
      "UnrecognizedToken",
      `unrecognized token ${JSON.stringify(token)}`,
      input,
      pos,
    );
  }

  static iso(message: string, input: string, pos?: number): DateParseError {
    return new DateParseError("MalformedIsoGrammar", message, input, pos);
  }

  static weekDate(message: string, input: string): DateParseError {
    return new DateParseError("InvalidWeekDate", message, input);
  }

  static config(message: string): DateParseError {
    return new DateParseError("InvalidConfiguration", message, "");
  }
}

export function isDateParseError(err: unknown): err is DateParseError {
  return err instanceof DateParseError;
}

import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";

export enum LexErrorCode {
  IllegalCharacter = "IllegalCharacter",
  UnterminatedString = "UnterminatedString",
  BadEscapeAtEof = "BadEscapeAtEof",
  UnmatchedCloseBracket = "UnmatchedCloseBracket",
  UnclosedBracketAtEof = "UnclosedBracketAtEof",
}

/**
 * Thrown by the scanner and the preparser to halt token production.
 * `lex()` turns it back into a diagnostic on the result.
 */
export class LexError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "LexError";
    this.diagnostic = diagnostic;
  }
}

function coded(code: LexErrorCode, diag: Diagnostic): Diagnostic {
  return { ...diag, code };
}

function describeChar(ch: string): string {
  switch (ch) {
    case "\t": return "tab";
    case "\r": return "carriage return";
    case "\f": return "form feed";
    case "\v": return "vertical tab";
  }
  const code = ch.codePointAt(0) ?? 0;
  const hex = code.toString(16).toUpperCase().padStart(4, "0");
  return code < 0x20 || code > 0x7e ? `'${ch}' (U+${hex})` : `'${ch}'`;
}

export function illegalCharacter(ch: string, span: Span): Diagnostic {
  const help = /\s/.test(ch)
    ? "Only spaces and newlines may be used as whitespace"
    : undefined;
  return coded(LexErrorCode.IllegalCharacter, error(`Illegal character: ${describeChar(ch)}`, span, help));
}

export function malformedIdentifier(lexeme: string, span: Span): Diagnostic {
  return coded(
    LexErrorCode.IllegalCharacter,
    error(`Malformed identifier '${lexeme}'`, span, "Identifiers cannot start with a digit"),
  );
}

export function unterminatedString(quote: string, span: Span): Diagnostic {
  return coded(
    LexErrorCode.UnterminatedString,
    error("Unterminated string literal", span, `Close the string with ${quote} before the end of the line`),
  );
}

export function badEscapeAtEof(span: Span): Diagnostic {
  return coded(LexErrorCode.BadEscapeAtEof, error("Escape sequence at end of input", span));
}

export function unmatchedCloseBracket(span: Span): Diagnostic {
  return coded(LexErrorCode.UnmatchedCloseBracket, error("Unmatched ')'", span, "There is no open '(' for this ')' to close"));
}

export function unclosedBracketAtEof(opener: Span, eof: Span): Diagnostic {
  return {
    ...coded(LexErrorCode.UnclosedBracketAtEof, error("Unclosed '(' at end of input", opener)),
    notes: [{ message: "The input ends here without a matching ')'", span: eof }],
  };
}

import { readFileSync } from "node:fs";
import { Scanner } from "./lexer/scanner.js";
import { Preparser } from "./lexer/preparser.js";
import { LexError } from "./lexer/errors.js";
import type { Token } from "./lexer/tokens.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export interface LexOptions {
  /** Insert layout tokens. `false` returns the raw scanner stream. Defaults to `true`. */
  preparse?: boolean;
}

export interface LexResult {
  /** Everything produced before the first error; ends with EOF on success. */
  tokens: Token[];
  /** Empty on success, otherwise the single error that halted lexing. */
  errors: Diagnostic[];
}

/**
 * Lex a source string.
 * Used by tests and when source is provided directly.
 */
export function lex(
  source: string,
  filename: string,
  options: LexOptions = {},
): LexResult {
  const scanner = new Scanner(source, filename);
  const stream: Iterable<Token> = options.preparse === false ? scanner : new Preparser(scanner);

  const tokens: Token[] = [];
  try {
    for (const token of stream) {
      tokens.push(token);
    }
  } catch (e) {
    if (e instanceof LexError) {
      return { tokens, errors: [e.diagnostic] };
    }
    throw e;
  }
  return { tokens, errors: [] };
}

/** Read a UTF-8 file and lex it. I/O errors propagate to the caller. */
export function lexFile(filePath: string, options: LexOptions = {}): LexResult {
  const source = readFileSync(filePath, "utf-8");
  return lex(source, filePath, options);
}

/**
 * One line per token: kind, the JSON-quoted value when there is one, and
 * the start position, separated by tabs.
 */
export function renderTokenStream(tokens: readonly Token[]): string {
  return tokens
    .map((tok) => {
      const fields: string[] = [tok.kind];
      if (tok.value !== "") fields.push(JSON.stringify(tok.value));
      fields.push(`${tok.span.start.line}:${tok.span.start.column}`);
      return fields.join("\t");
    })
    .join("\n");
}

export { Scanner } from "./lexer/scanner.js";
export { Preparser } from "./lexer/preparser.js";
export { LexError, LexErrorCode } from "./lexer/errors.js";
export { TokenKind, isDummy } from "./lexer/tokens.js";
export type { Token, IntLiteralToken, KeywordKind, DummyKind } from "./lexer/tokens.js";
export { KEYWORDS } from "./lexer/keywords.js";
export { ConstructKind, DUMMY_TOKENS } from "./lexer/layout.js";
export type { IndentationStackEntry } from "./lexer/layout.js";
export type { Diagnostic, DiagnosticNote, Span, Position } from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";

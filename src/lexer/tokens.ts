import type { Span } from "../errors/diagnostic.js";

export enum TokenKind {
  // Literals
  IntLiteral = "IntLiteral",
  StringLiteral = "StringLiteral",

  // Identifiers
  Identifier = "Identifier",

  // Keywords
  And = "and",
  Def = "def",
  Else = "else",
  If = "if",
  Let = "let",
  Or = "or",
  Then = "then",

  // Delimiters
  LParen = "(",
  RParen = ")",

  // Operators
  Plus = "+",
  Minus = "-",

  // Punctuation
  Semicolon = ";",
  Comma = ",",
  Eq = "=",
  Arrow = "->",
  Ellipsis = "...",

  // Synthetic, inserted by the preparser
  DummyIn = "$in",
  DummyEndIf = "$endif",
  DummySemicolon = "$semicolon",

  // Special
  EOF = "EOF",
}

export type KeywordKind =
  | TokenKind.And
  | TokenKind.Def
  | TokenKind.Else
  | TokenKind.If
  | TokenKind.Let
  | TokenKind.Or
  | TokenKind.Then;

export type DummyKind = TokenKind.DummyIn | TokenKind.DummyEndIf | TokenKind.DummySemicolon;

interface TokenBase<K extends TokenKind> {
  readonly kind: K;
  /** Lexeme, or the decoded body for string literals. Empty for synthetic tokens and EOF. */
  readonly value: string;
  readonly span: Span;
}

export interface IntLiteralToken extends TokenBase<TokenKind.IntLiteral> {
  readonly intValue: bigint;
}

export type Token = IntLiteralToken | TokenBase<Exclude<TokenKind, TokenKind.IntLiteral>>;

export const DUMMY_KINDS: ReadonlySet<TokenKind> = new Set<DummyKind>([
  TokenKind.DummyIn,
  TokenKind.DummyEndIf,
  TokenKind.DummySemicolon,
]);

/** True for tokens the user never wrote: the preparser's insertions and EOF. */
export function isDummy(token: Token): boolean {
  return token.kind === TokenKind.EOF || DUMMY_KINDS.has(token.kind);
}

import { TokenKind, type IntLiteralToken, type Token } from "./tokens.js";
import { KEYWORDS } from "./keywords.js";
import type { Span } from "../errors/diagnostic.js";
import {
  LexError,
  badEscapeAtEof,
  illegalCharacter,
  malformedIdentifier,
  unterminatedString,
} from "./errors.js";

type PlainKind = Exclude<TokenKind, TokenKind.IntLiteral>;

/**
 * Pull-based scanner: each `nextToken()` call reads exactly one raw token.
 * After the end of input every call returns EOF. The first lexical error is
 * thrown as a `LexError` and re-thrown by every later call.
 */
export class Scanner implements Iterable<Token> {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;
  private failure: LexError | null = null;

  constructor(source: string, filename: string = "<stdin>") {
    this.source = source;
    this.filename = filename;
    // A leading byte order mark is not part of the text
    if (source.startsWith("\uFEFF")) this.pos = 1;
  }

  nextToken(): Token {
    if (this.failure) throw this.failure;
    try {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.source.length) {
        return this.makeToken(TokenKind.EOF, "", this.pos, this.line, this.col);
      }
      return this.readToken();
    } catch (e) {
      if (e instanceof LexError) this.failure = e;
      throw e;
    }
  }

  *[Symbol.iterator](): Generator<Token, void, undefined> {
    while (true) {
      const token = this.nextToken();
      yield token;
      if (token.kind === TokenKind.EOF) return;
    }
  }

  tokenize(): Token[] {
    return [...this];
  }

  private readToken(): Token {
    const ch = this.source[this.pos];

    if (this.isDigit(ch)) return this.readNumber();
    if (this.isIdentStart(ch)) return this.readIdentOrKeyword();
    if (ch === '"' || ch === "'") return this.readString(ch);

    return this.readPunctuation();
  }

  private readNumber(): IntLiteralToken {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      this.advance();
    }

    // `123abc` is neither a number followed by a name nor a name
    if (this.pos < this.source.length && this.isIdentStart(this.source[this.pos])) {
      while (this.pos < this.source.length && this.isIdentPart(this.source[this.pos])) {
        this.advance();
      }
      const lexeme = this.source.slice(startPos, this.pos);
      throw new LexError(malformedIdentifier(lexeme, this.spanFrom(startPos, startLine, startCol)));
    }

    const value = this.source.slice(startPos, this.pos);
    return {
      kind: TokenKind.IntLiteral,
      value,
      intValue: BigInt(value),
      span: this.spanFrom(startPos, startLine, startCol),
    };
  }

  private readIdentOrKeyword(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && this.isIdentPart(this.source[this.pos])) {
      this.advance();
    }

    const value = this.source.slice(startPos, this.pos);

    const keyword = KEYWORDS.get(value);
    if (keyword !== undefined) {
      return this.makeToken(keyword, value, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Identifier, value, startPos, startLine, startCol);
  }

  /**
   * The body is read one item at a time: a plain character, or a backslash
   * and the single character after it, kept verbatim.
   */
  private readString(quote: string): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    this.advance(); // skip opening quote

    let value = "";

    while (true) {
      if (this.pos >= this.source.length || this.source[this.pos] === "\n") {
        throw new LexError(unterminatedString(quote, this.spanFrom(startPos, startLine, startCol)));
      }

      const ch = this.source[this.pos];
      if (ch === quote) {
        this.advance();
        break;
      }

      if (ch === "\\") {
        const escPos = this.pos;
        const escLine = this.line;
        const escCol = this.col;
        this.advance(); // skip backslash
        if (this.pos >= this.source.length) {
          throw new LexError(badEscapeAtEof(this.spanFrom(escPos, escLine, escCol)));
        }
        if (this.source[this.pos] === "\n") {
          throw new LexError(unterminatedString(quote, this.spanFrom(startPos, startLine, startCol)));
        }
      }

      this.rejectWhitespace();
      const itemStart = this.pos;
      this.advance();
      value += this.source.slice(itemStart, this.pos);
    }

    return this.makeToken(TokenKind.StringLiteral, value, startPos, startLine, startCol);
  }

  private readPunctuation(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const ch = this.source[this.pos];

    if (this.source.startsWith("...", this.pos)) {
      this.advanceBy(3);
      return this.makeToken(TokenKind.Ellipsis, "...", startPos, startLine, startCol);
    }
    if (this.source.startsWith("->", this.pos)) {
      this.advanceBy(2);
      return this.makeToken(TokenKind.Arrow, "->", startPos, startLine, startCol);
    }

    switch (ch) {
      case "(": this.advance(); return this.makeToken(TokenKind.LParen, ch, startPos, startLine, startCol);
      case ")": this.advance(); return this.makeToken(TokenKind.RParen, ch, startPos, startLine, startCol);
      case "+": this.advance(); return this.makeToken(TokenKind.Plus, ch, startPos, startLine, startCol);
      case "-": this.advance(); return this.makeToken(TokenKind.Minus, ch, startPos, startLine, startCol);
      case ";": this.advance(); return this.makeToken(TokenKind.Semicolon, ch, startPos, startLine, startCol);
      case ",": this.advance(); return this.makeToken(TokenKind.Comma, ch, startPos, startLine, startCol);
      case "=": this.advance(); return this.makeToken(TokenKind.Eq, ch, startPos, startLine, startCol);
    }

    // Report the whole code point, not half of a surrogate pair
    this.advance();
    const illegal = this.source.slice(startPos, this.pos);
    throw new LexError(illegalCharacter(illegal, this.spanFrom(startPos, startLine, startCol)));
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === " " || ch === "\n") {
        this.advance();
      } else if (ch === "#") {
        while (this.pos < this.source.length && this.source[this.pos] !== "\n") {
          this.rejectWhitespace();
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  /** Tabs and other whitespace are illegal inside comments and strings too. */
  private rejectWhitespace(): void {
    const ch = this.source[this.pos];
    if (ch !== " " && /\s/.test(ch)) {
      const startPos = this.pos;
      const startLine = this.line;
      const startCol = this.col;
      this.advance();
      throw new LexError(illegalCharacter(ch, this.spanFrom(startPos, startLine, startCol)));
    }
  }

  /** Moves past one code point; columns count code points, offsets UTF-16 units. */
  private advance(): void {
    if (this.pos < this.source.length) {
      const codePoint = this.source.codePointAt(this.pos) ?? 0;
      if (codePoint === 0x0a) {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      this.pos += codePoint > 0xffff ? 2 : 1;
    }
  }

  private advanceBy(count: number): void {
    for (let i = 0; i < count; i++) this.advance();
  }

  private spanFrom(startPos: number, startLine: number, startCol: number): Span {
    return {
      start: { offset: startPos, line: startLine, column: startCol },
      end: { offset: this.pos, line: this.line, column: this.col },
      source: this.filename,
    };
  }

  private makeToken(
    kind: PlainKind,
    value: string,
    startPos: number,
    startLine: number,
    startCol: number,
  ): Token {
    return { kind, value, span: this.spanFrom(startPos, startLine, startCol) };
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isIdentStart(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isIdentPart(ch: string): boolean {
    return this.isIdentStart(ch) || this.isDigit(ch);
  }
}

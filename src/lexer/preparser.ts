import { TokenKind, type DummyKind, type Token } from "./tokens.js";
import {
  ConstructKind,
  dummyFor,
  type IndentationStackEntry,
  type PopReason,
} from "./layout.js";
import { pointSpan } from "../errors/diagnostic.js";
import { LexError, unclosedBracketAtEof, unmatchedCloseBracket } from "./errors.js";

/**
 * Removes layout sensitivity from a raw token stream by inserting `$in`,
 * `$endif` and `$semicolon` where indentation closes a binding, a
 * conditional or a statement.
 *
 * The technique follows the "pre-parsing" pass of F#'s lightweight syntax,
 * with far fewer restrictions on indentation. Each `let`, `if`, `(` and
 * statement line pushes an entry onto an indentation stack; later tokens pop
 * entries according to their line and indentation.
 *
 * Pull-based like the scanner: a raw token is read only when the output
 * buffer is empty, so memory is bounded by the stack depth.
 */
export class Preparser implements Iterable<Token> {
  private input: Iterator<Token>;
  private stack: IndentationStackEntry[] = [];
  private output: Token[] = [];
  private line: number = 0;
  private indentation: number = 0;
  private eof: Token | null = null;
  private failure: LexError | null = null;

  constructor(tokens: Iterable<Token>) {
    this.input = tokens[Symbol.iterator]();
  }

  get depth(): number {
    return this.stack.length;
  }

  nextToken(): Token {
    if (this.failure) throw this.failure;
    try {
      let next = this.output.shift();
      while (next === undefined) {
        if (this.eof) return this.eof;
        this.process(this.pull());
        next = this.output.shift();
      }
      return next;
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

  private pull(): Token {
    const result = this.input.next();
    if (result.done) {
      throw new Error("Token stream ended without an EOF token");
    }
    return result.value;
  }

  private process(token: Token): void {
    const lineLeading = token.span.start.line !== this.line;
    if (lineLeading) {
      this.line = token.span.start.line;
      // Only spaces can precede the first token of a line
      this.indentation = token.span.start.column - 1;
    }

    switch (token.kind) {
      case TokenKind.EOF:
        this.unwindAll(token);
        this.output.push(token);
        this.eof = token;
        return;
      case TokenKind.RParen:
        this.closeBracket(token);
        break;
      case TokenKind.Then:
      case TokenKind.Else:
        this.continueConditional(token);
        break;
      case TokenKind.Comma:
        if (lineLeading) this.layout(token);
        this.unwindToBracket(token);
        break;
      case TokenKind.LParen:
        if (lineLeading) this.layout(token);
        this.push({ kind: ConstructKind.Bracket, indentation: 0, line: this.line, token });
        break;
      case TokenKind.Let:
        if (lineLeading) this.layout(token);
        this.pushBinding(token);
        break;
      case TokenKind.If:
        if (lineLeading) this.layout(token);
        this.push({ kind: ConstructKind.Conditional, indentation: this.indentation, line: this.line, token, seenElse: false });
        break;
      default:
        if (lineLeading) this.layout(token);
    }

    this.output.push(token);
  }

  /**
   * Runs once per line, at its first token: entries indented deeper than the
   * line are closed, entries at the same indentation are replaced by the new
   * statement, and the line gets a line-start entry of its own. Brackets stop
   * all three, so content inside parentheses may be indented freely.
   */
  private layout(token: Token): void {
    let top = this.top();
    while (top && top.kind !== ConstructKind.Bracket && top.indentation > this.indentation) {
      this.pop(token, "close");
      top = this.top();
    }
    while (top && top.kind !== ConstructKind.Bracket && top.indentation === this.indentation) {
      this.pop(token, "replace");
      top = this.top();
    }
    if (!top || top.kind !== ConstructKind.Bracket) {
      this.push({ kind: ConstructKind.LineStart, indentation: this.indentation, line: this.line, token });
    }
  }

  private pushBinding(token: Token): void {
    // The rest of the block is the binding's body, so `let` takes over the
    // statement entry of its own line.
    const top = this.top();
    if (top && top.kind === ConstructKind.LineStart && top.line === this.line) {
      this.stack.pop();
    }
    this.push({ kind: ConstructKind.Binding, indentation: this.indentation, line: this.line, token });
  }

  private closeBracket(token: Token): void {
    while (true) {
      const top = this.top();
      if (!top) {
        throw new LexError(unmatchedCloseBracket(token.span));
      }
      if (top.kind === ConstructKind.Bracket) {
        this.stack.pop();
        return;
      }
      this.pop(token, "close");
    }
  }

  private unwindToBracket(token: Token): void {
    if (!this.stack.some((entry) => entry.kind === ConstructKind.Bracket)) return;
    let top = this.top();
    while (top && top.kind !== ConstructKind.Bracket) {
      this.pop(token, "close");
      top = this.top();
    }
  }

  /**
   * `then` and `else` belong to the nearest conditional that has not had
   * its `else` yet. Anything opened inside the previous branch is closed.
   */
  private continueConditional(token: Token): void {
    let target = -1;
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const entry = this.stack[i];
      if (entry.kind === ConstructKind.Bracket) break;
      if (entry.kind === ConstructKind.Conditional && !entry.seenElse) {
        target = i;
        break;
      }
    }
    if (target < 0) return;

    while (this.stack.length - 1 > target) {
      this.pop(token, "close");
    }

    const entry = this.stack[target];
    if (token.kind === TokenKind.Else && entry.kind === ConstructKind.Conditional) {
      this.stack[target] = { ...entry, seenElse: true };
    }
  }

  private unwindAll(eofToken: Token): void {
    let top = this.top();
    while (top) {
      if (top.kind === ConstructKind.Bracket) {
        throw new LexError(unclosedBracketAtEof(top.token.span, eofToken.span));
      }
      this.pop(eofToken, "close");
      top = this.top();
    }
  }

  private top(): IndentationStackEntry | undefined {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : undefined;
  }

  private push(entry: IndentationStackEntry): void {
    this.stack.push(entry);
  }

  private pop(trigger: Token, reason: PopReason): void {
    const entry = this.stack.pop();
    if (!entry) return;
    const kind = dummyFor(entry, reason);
    if (kind !== null) this.output.push(this.makeDummy(kind, trigger));
  }

  private makeDummy(kind: DummyKind, trigger: Token): Token {
    return { kind, value: "", span: pointSpan(trigger.span.source, trigger.span.start) };
  }
}

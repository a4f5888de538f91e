import { describe, it, expect } from "vitest";
import { Scanner } from "../../src/lexer/scanner.js";
import { Preparser } from "../../src/lexer/preparser.js";
import { TokenKind, isDummy, type Token } from "../../src/lexer/tokens.js";
import { LexError, LexErrorCode } from "../../src/lexer/errors.js";
import type { Diagnostic } from "../../src/errors/diagnostic.js";

const {
  Let, If, Then, Else, Identifier, IntLiteral, StringLiteral,
  Eq, Plus, LParen, RParen, Comma,
  DummyIn, DummyEndIf, DummySemicolon, EOF,
} = TokenKind;

function preparse(source: string): Token[] {
  return new Preparser(new Scanner(source, "test.ofs")).tokenize();
}

function kinds(source: string): TokenKind[] {
  return preparse(source).map((t) => t.kind);
}

function preparseError(source: string): Diagnostic {
  try {
    preparse(source);
  } catch (e) {
    if (e instanceof LexError) return e.diagnostic;
    throw e;
  }
  throw new Error(`expected a preparser error in ${JSON.stringify(source)}`);
}

describe("Preparser", () => {
  describe("statements", () => {
    it("passes an empty stream through", () => {
      expect(kinds("")).toEqual([EOF]);
    });

    it("joins statements at the same indentation", () => {
      expect(kinds("a\nb\nc")).toEqual([
        Identifier, DummySemicolon, Identifier, DummySemicolon, Identifier, EOF,
      ]);
    });

    it("inserts nothing after the last statement", () => {
      expect(kinds("print(x)\n")).toEqual([Identifier, LParen, Identifier, RParen, EOF]);
    });

    it("treats deeper lines as a continuation", () => {
      expect(kinds("a +\n  b")).toEqual([Identifier, Plus, Identifier, EOF]);
    });

    it("forwards a comma outside parentheses unchanged", () => {
      expect(kinds("a, b\nc")).toEqual([
        Identifier, Comma, Identifier, DummySemicolon, Identifier, EOF,
      ]);
    });

    it("ignores comments and blank lines", () => {
      const source = [
        "let a = 1",
        "# a comment",
        "    # an indented comment",
        "",
        "a",
      ].join("\n");
      expect(kinds(source)).toEqual([Let, Identifier, Eq, IntLiteral, DummyIn, Identifier, EOF]);
    });
  });

  describe("bindings", () => {
    it("sequences a multi-line binding body", () => {
      const source = [
        "let foo =",
        '  print("calculating foo")',
        '  "foo"',
        'print("the value of foo is " + foo)',
      ].join("\n");
      expect(kinds(source)).toEqual([
        Let, Identifier, Eq, Identifier, LParen, StringLiteral, RParen,
        DummySemicolon, StringLiteral, DummyIn,
        Identifier, LParen, StringLiteral, Plus, Identifier, RParen, EOF,
      ]);
    });

    it("chains consecutive bindings", () => {
      expect(kinds("let a = 1\nlet b = 2\na + b")).toEqual([
        Let, Identifier, Eq, IntLiteral, DummyIn,
        Let, Identifier, Eq, IntLiteral, DummyIn,
        Identifier, Plus, Identifier, EOF,
      ]);
    });

    it("separates a statement from a following binding", () => {
      expect(kinds("print(x)\nlet y = 1\ny")).toEqual([
        Identifier, LParen, Identifier, RParen, DummySemicolon,
        Let, Identifier, Eq, IntLiteral, DummyIn, Identifier, EOF,
      ]);
    });

    it("closes nested bindings on the same line innermost first", () => {
      expect(kinds("let a = let b = 1\n  b\na")).toEqual([
        Let, Identifier, Eq, Let, Identifier, Eq, IntLiteral,
        Identifier, DummyIn, DummyIn, Identifier, EOF,
      ]);
    });

    it("unwinds deeper lines before replacing the statement", () => {
      const source = [
        "let x =",
        "  a +",
        "    b",
        "  c",
        "x",
      ].join("\n");
      expect(kinds(source)).toEqual([
        Let, Identifier, Eq, Identifier, Plus, Identifier,
        DummySemicolon, Identifier, DummyIn, Identifier, EOF,
      ]);
    });

    it("closes an open binding at end of input", () => {
      expect(kinds("let x = 1")).toEqual([Let, Identifier, Eq, IntLiteral, DummyIn, EOF]);
    });

    it("places dummy tokens at the token that released them", () => {
      const tokens = preparse("let x =\n  a\n  b\nx");
      const semicolon = tokens.find((t) => t.kind === DummySemicolon);
      const dummyIn = tokens.find((t) => t.kind === DummyIn);
      expect(semicolon?.span.start).toEqual({ offset: 14, line: 3, column: 3 });
      expect(semicolon?.span.end).toEqual(semicolon?.span.start);
      expect(dummyIn?.span.start).toEqual({ offset: 16, line: 4, column: 1 });
      expect(dummyIn?.value).toBe("");
    });
  });

  describe("conditionals", () => {
    it("ends a conditional statement before the next statement", () => {
      expect(kinds("if c then a else b\nd")).toEqual([
        If, Identifier, Then, Identifier, Else, Identifier, DummyEndIf, DummySemicolon,
        Identifier, EOF,
      ]);
    });

    it("ends a conditional inside a binding", () => {
      expect(kinds("let x = if c then 1 else 2\nx")).toEqual([
        Let, Identifier, Eq, If, Identifier, Then, IntLiteral, Else, IntLiteral,
        DummyEndIf, DummyIn, Identifier, EOF,
      ]);
    });

    it("keeps 'then' and 'else' lines inside the conditional", () => {
      const source = [
        "if c then",
        "  a",
        "  b",
        "else",
        "  d",
        "e",
      ].join("\n");
      expect(kinds(source)).toEqual([
        If, Identifier, Then, Identifier, DummySemicolon, Identifier,
        Else, Identifier, DummyEndIf, DummySemicolon, Identifier, EOF,
      ]);
    });

    it("handles 'then' and 'else' at the start of deeper lines", () => {
      const source = [
        "let x =",
        "  if c",
        "  then 1",
        "  else 2",
        "x",
      ].join("\n");
      expect(kinds(source)).toEqual([
        Let, Identifier, Eq, If, Identifier, Then, IntLiteral, Else, IntLiteral,
        DummyEndIf, DummyIn, Identifier, EOF,
      ]);
    });

    it("closes an else-if chain once per conditional", () => {
      expect(kinds("if a then b\nelse if c then d\nelse e\nf")).toEqual([
        If, Identifier, Then, Identifier,
        Else, If, Identifier, Then, Identifier,
        Else, Identifier,
        DummyEndIf, DummyEndIf, DummySemicolon, Identifier, EOF,
      ]);
    });

    it("gives each 'else' to the innermost conditional still waiting for one", () => {
      expect(kinds("if a then if b then c else d else e")).toEqual([
        If, Identifier, Then, If, Identifier, Then, Identifier,
        Else, Identifier, DummyEndIf,
        Else, Identifier, DummyEndIf, EOF,
      ]);
    });

    it("closes a binding inside a branch", () => {
      const source = [
        "if a then",
        "  let x = 1",
        "  x",
      ].join("\n");
      expect(kinds(source)).toEqual([
        If, Identifier, Then, Let, Identifier, Eq, IntLiteral, DummyIn, Identifier,
        DummyEndIf, EOF,
      ]);
    });

    it("unwinds open constructs at end of input top of stack first", () => {
      expect(kinds("let x = if a then b")).toEqual([
        Let, Identifier, Eq, If, Identifier, Then, Identifier, DummyEndIf, DummyIn, EOF,
      ]);
    });

    it("forwards a stray 'else' unchanged", () => {
      expect(kinds("a else b")).toEqual([Identifier, Else, Identifier, EOF]);
    });
  });

  describe("brackets", () => {
    it("does not unwind inside parentheses", () => {
      const source = [
        "let x =",
        "  foo(1,",
        "2)",
        "  x",
        "y",
      ].join("\n");
      const result = kinds(source);
      expect(result).toEqual([
        Let, Identifier, Eq, Identifier, LParen, IntLiteral, Comma, IntLiteral, RParen,
        DummySemicolon, Identifier, DummyIn, Identifier, EOF,
      ]);
      expect(result.indexOf(DummySemicolon)).toBeGreaterThan(result.indexOf(RParen));
    });

    it("emits dummy tokens only after the matching close paren", () => {
      const source = [
        "let result = compute(",
        "1,",
        "2)",
        "result",
      ].join("\n");
      expect(kinds(source)).toEqual([
        Let, Identifier, Eq, Identifier, LParen, IntLiteral, Comma, IntLiteral, RParen,
        DummyIn, Identifier, EOF,
      ]);
    });

    it("does not split an expression continued after a close paren", () => {
      expect(kinds("foo(\na) + b")).toEqual([
        Identifier, LParen, Identifier, RParen, Plus, Identifier, EOF,
      ]);
    });

    it("closes constructs left open inside parentheses", () => {
      expect(kinds("f(if a then b else c)")).toEqual([
        Identifier, LParen, If, Identifier, Then, Identifier, Else, Identifier,
        DummyEndIf, RParen, EOF,
      ]);
    });

    it("closes constructs inside an argument at the next comma", () => {
      expect(kinds("f(if a then b else c, d)")).toEqual([
        Identifier, LParen, If, Identifier, Then, Identifier, Else, Identifier,
        DummyEndIf, Comma, Identifier, RParen, EOF,
      ]);
    });

    it("sequences a binding written on its own lines inside parentheses", () => {
      const source = [
        "f(",
        "  let x = 1",
        "  x)",
      ].join("\n");
      expect(kinds(source)).toEqual([
        Identifier, LParen, Let, Identifier, Eq, IntLiteral, DummyIn, Identifier, RParen, EOF,
      ]);
    });

    it("reports a close paren with nothing to close", () => {
      const diag = preparseError(")");
      expect(diag.code).toBe(LexErrorCode.UnmatchedCloseBracket);
      expect(diag.span.start).toEqual({ offset: 0, line: 1, column: 1 });
    });

    it("reports a close paren after the statement it would unwind", () => {
      const diag = preparseError("a\nb)");
      expect(diag.code).toBe(LexErrorCode.UnmatchedCloseBracket);
      expect(diag.span.start).toEqual({ offset: 3, line: 2, column: 2 });
    });

    it("reports an unclosed paren at its opening position", () => {
      const diag = preparseError("f(1");
      expect(diag.code).toBe(LexErrorCode.UnclosedBracketAtEof);
      expect(diag.span.start).toEqual({ offset: 1, line: 1, column: 2 });
      expect(diag.notes?.[0].span?.start).toEqual({ offset: 3, line: 1, column: 4 });
    });

    it("reports the innermost unclosed paren", () => {
      const diag = preparseError("f(g(\n");
      expect(diag.code).toBe(LexErrorCode.UnclosedBracketAtEof);
      expect(diag.span.start).toEqual({ offset: 3, line: 1, column: 4 });
    });
  });

  describe("production", () => {
    it("reads raw tokens only on demand", () => {
      const preparser = new Preparser(new Scanner("a\nb\n\t", "test.ofs"));
      expect(preparser.nextToken().kind).toBe(Identifier);
      expect(preparser.nextToken().kind).toBe(DummySemicolon);
      expect(preparser.nextToken().kind).toBe(Identifier);
      expect(() => preparser.nextToken()).toThrow(LexError);
    });

    it("keeps failing with the first error", () => {
      const preparser = new Preparser(new Scanner(")", "test.ofs"));
      const failures: unknown[] = [];
      for (let i = 0; i < 2; i++) {
        try {
          preparser.nextToken();
        } catch (e) {
          failures.push(e);
        }
      }
      expect(failures).toHaveLength(2);
      expect(failures[1]).toBe(failures[0]);
    });

    it("keeps returning EOF after the end", () => {
      const preparser = new Preparser(new Scanner("let x = 1", "test.ofs"));
      const produced = preparser.tokenize();
      expect(produced[produced.length - 1].kind).toBe(EOF);
      expect(preparser.nextToken().kind).toBe(EOF);
      expect(preparser.depth).toBe(0);
    });

    it("keeps the stack as deep as the nesting, not as long as the file", () => {
      const preparser = new Preparser(new Scanner("x\n".repeat(1000), "test.ofs"));
      let deepest = 0;
      for (const _token of preparser) {
        deepest = Math.max(deepest, preparser.depth);
      }
      expect(deepest).toBe(1);
    });

    it("produces identical output for identical input", () => {
      const source = "let a =\n  f(1,\n    2)\n  a\nif a then b else c\n";
      expect(preparse(source)).toEqual(preparse(source));
    });

    it("rejects a token stream without EOF", () => {
      const scanned = new Scanner("a", "test.ofs").tokenize().slice(0, -1);
      const preparser = new Preparser(scanned);
      expect(preparser.nextToken().kind).toBe(Identifier);
      expect(() => preparser.nextToken()).toThrow("Token stream ended without an EOF token");
    });

    it("marks only inserted tokens as dummies", () => {
      const tokens = preparse("let x = 1\nx");
      expect(tokens.filter(isDummy).map((t) => t.kind)).toEqual([DummyIn, EOF]);
    });
  });
});

import { TokenKind, type DummyKind, type Token } from "./tokens.js";

export enum ConstructKind {
  LineStart = "LineStart",
  Binding = "Binding",
  Conditional = "Conditional",
  Bracket = "Bracket",
}

interface EntryBase<K extends ConstructKind> {
  readonly kind: K;
  readonly indentation: number;
  readonly line: number;
  /** The token that opened the construct. */
  readonly token: Token;
}

export interface ConditionalEntry extends EntryBase<ConstructKind.Conditional> {
  readonly seenElse: boolean;
}

export type IndentationStackEntry =
  | EntryBase<ConstructKind.LineStart>
  | EntryBase<ConstructKind.Binding>
  | EntryBase<ConstructKind.Bracket>
  | ConditionalEntry;

/**
 * The synthetic token each construct leaves behind when it is popped.
 * A line-start's `$semicolon` separates two statements, so it is only
 * emitted when a following statement replaces the entry.
 */
export const DUMMY_TOKENS: Readonly<Record<ConstructKind, DummyKind | null>> = Object.freeze({
  [ConstructKind.LineStart]: TokenKind.DummySemicolon,
  [ConstructKind.Binding]: TokenKind.DummyIn,
  [ConstructKind.Conditional]: TokenKind.DummyEndIf,
  [ConstructKind.Bracket]: null,
});

export type PopReason = "replace" | "close";

export function dummyFor(entry: IndentationStackEntry, reason: PopReason): DummyKind | null {
  if (entry.kind === ConstructKind.LineStart && reason === "close") return null;
  return DUMMY_TOKENS[entry.kind];
}

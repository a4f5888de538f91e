import { TokenKind, type KeywordKind } from "./tokens.js";

export const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<string, KeywordKind>([
  ["and", TokenKind.And],
  ["def", TokenKind.Def],
  ["else", TokenKind.Else],
  ["if", TokenKind.If],
  ["let", TokenKind.Let],
  ["or", TokenKind.Or],
  ["then", TokenKind.Then],
]);

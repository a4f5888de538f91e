export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

/** Every lexical diagnostic halts token production. */
export type Severity = "error";

export interface DiagnosticNote {
  message: string;
  span?: Span;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  code?: string;
  help?: string;
  notes?: DiagnosticNote[];
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

export function makeSpan(
  source: string,
  startOffset: number,
  endOffset: number,
  startLine: number,
  startCol: number,
  endLine: number,
  endCol: number,
): Span {
  return {
    start: { offset: startOffset, line: startLine, column: startCol },
    end: { offset: endOffset, line: endLine, column: endCol },
    source,
  };
}

/** A zero-width span at the given position. */
export function pointSpan(source: string, at: Position): Span {
  return makeSpan(source, at.offset, at.offset, at.line, at.column, at.line, at.column);
}

import chalk from "chalk";
import type { Diagnostic, Span } from "./diagnostic.js";

function formatSnippet(lines: string[], span: Span, padding: string): string {
  const line = lines[span.start.line - 1] ?? "";
  const lineNum = String(span.start.line).padStart(padding.length);
  const width = span.end.line === span.start.line
    ? Math.max(1, span.end.column - span.start.column)
    : Math.max(1, line.length - span.start.column + 1);

  let output = `${padding} ${chalk.blue("|")}\n`;
  output += `${chalk.blue(lineNum)} ${chalk.blue("|")} ${line}\n`;
  output += `${padding} ${chalk.blue("|")} ${" ".repeat(span.start.column - 1)}${chalk.red("^".repeat(width))}\n`;
  return output;
}

export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const lines = source.split("\n");
  const gutter = Math.max(
    String(diag.span.start.line).length,
    ...(diag.notes ?? []).map((n) => (n.span ? String(n.span.start.line).length : 0)),
  );
  const padding = " ".repeat(gutter);

  const label = diag.code ? `${diag.severity}[${diag.code}]` : diag.severity;
  const severityLabel = chalk.red.bold(label);

  let output = `${severityLabel}: ${chalk.bold(diag.message)}\n`;
  output += `${padding} ${chalk.blue("-->")} ${diag.span.source}:${diag.span.start.line}:${diag.span.start.column}\n`;
  output += formatSnippet(lines, diag.span, padding);

  if (diag.help) {
    output += `${padding} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }

  for (const note of diag.notes ?? []) {
    output += `${padding} ${chalk.blue("=")} ${chalk.cyan("note")}: ${note.message}\n`;
    if (note.span) {
      output += `${padding} ${chalk.blue("-->")} ${note.span.source}:${note.span.start.line}:${note.span.start.column}\n`;
      output += formatSnippet(lines, note.span, padding);
    }
  }

  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}

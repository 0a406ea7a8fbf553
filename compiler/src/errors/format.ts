/**
 * Plain-text rendering of diagnostics with source context.
 */

import type { SourceFiles } from "../utils/source.ts";
import { type Diagnostic, type Label, LabelStyle } from "./diagnostic.ts";

/**
 * Format a diagnostic: a `file:line:col: severity: message` header located
 * at the primary label, then every label's source line underlined.
 */
export function formatDiagnostic(diag: Diagnostic, files: SourceFiles): string {
  const primary = diag.labels.find((l) => l.style === LabelStyle.Primary) ?? diag.labels[0];
  const lines: string[] = [];

  if (primary && files.has(primary.file)) {
    const source = files.get(primary.file);
    const loc = source.lineCol(primary.span.start);
    lines.push(`${source.filename}:${loc.line}:${loc.column}: ${diag.severity}: ${diag.message}`);
  } else {
    lines.push(`<unknown>: ${diag.severity}: ${diag.message}`);
  }

  for (const label of diag.labels) {
    lines.push(...formatLabel(label, files));
  }
  for (const note of diag.notes) {
    lines.push(`  = note: ${note}`);
  }
  return lines.join("\n");
}

function formatLabel(label: Label, files: SourceFiles): string[] {
  if (!files.has(label.file)) return [];
  const source = files.get(label.file);
  const start = source.lineCol(label.span.start);
  const end = source.lineCol(Math.max(label.span.start, label.span.end - 1));
  const text = source.lineText(start.line);

  // Multi-line spans are underlined to the end of their first line.
  const width = end.line === start.line ? end.column - start.column + 1 : text.length - start.column + 1;
  const mark = label.style === LabelStyle.Primary ? "^" : "-";
  const underline = " ".repeat(start.column - 1) + mark.repeat(Math.max(1, width));
  const suffix = label.message ? ` ${label.message}` : "";
  return [`  ${text}`, `  ${underline}${suffix}`];
}

/** Format every diagnostic, separated by blank lines. */
export function formatDiagnostics(diagnostics: readonly Diagnostic[], files: SourceFiles): string {
  return diagnostics.map((d) => formatDiagnostic(d, files)).join("\n\n");
}

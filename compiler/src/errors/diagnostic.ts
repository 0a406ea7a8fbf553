import type { FileId, Span } from "../utils/source.ts";

export enum Severity {
  Error = "error",
  Warning = "warning",
  Note = "note",
}

/** Category of a user-facing error, stable across message wording changes. */
export enum DiagnosticCode {
  TypeMismatch = "type-mismatch",
  UnknownIdentifier = "unknown-identifier",
  UnknownType = "unknown-type",
  UnknownField = "unknown-field",
  MissingField = "missing-field",
  ArgumentCount = "argument-count",
  InvalidCast = "invalid-cast",
  InvalidAssignment = "invalid-assignment",
  DuplicateDefinition = "duplicate-definition",
  RecursiveType = "recursive-type",
  MissingType = "missing-type",
  MissingReturn = "missing-return",
  InvalidControlFlow = "invalid-control-flow",
  InvalidMatchArm = "invalid-match-arm",
  EmptyArray = "empty-array",
  LiteralOutOfRange = "literal-out-of-range",
  InvalidDeclaration = "invalid-declaration",
}

export enum LabelStyle {
  Primary = "primary",
  Secondary = "secondary",
}

/** A source range the diagnostic points at, optionally annotated. */
export interface Label {
  style: LabelStyle;
  file: FileId;
  span: Span;
  message: string | null;
}

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  labels: Label[];
  notes: string[];
}

export function primaryLabel(file: FileId, span: Span, message: string | null = null): Label {
  return { style: LabelStyle.Primary, file, span, message };
}

export function secondaryLabel(file: FileId, span: Span, message: string | null = null): Label {
  return { style: LabelStyle.Secondary, file, span, message };
}

export function errorDiagnostic(
  code: DiagnosticCode,
  message: string,
  labels: Label[],
  notes: string[] = []
): Diagnostic {
  return { severity: Severity.Error, code, message, labels, notes };
}

export function isError(diag: Diagnostic): boolean {
  return diag.severity === Severity.Error;
}

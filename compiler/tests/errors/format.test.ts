import { describe, expect, test } from "vitest";
import {
  DiagnosticCode,
  errorDiagnostic,
  isError,
  primaryLabel,
  secondaryLabel,
  Severity,
} from "../../src/errors/diagnostic.ts";
import { formatDiagnostic, formatDiagnostics } from "../../src/errors/format.ts";
import { IrInvariantError } from "../../src/errors/invariant.ts";
import type { SourceFile } from "../../src/utils/source.ts";
import { SourceFiles, span } from "../../src/utils/source.ts";
import { indexFromRaw } from "../../src/utils/arena.ts";

const SOURCE = "fun f() -> i32 {\n  return x + true;\n}\n";

describe("formatDiagnostic", () => {
  test("header, underlined labels and notes", () => {
    const files = new SourceFiles();
    const file = files.add("test.em", SOURCE);
    const diag = errorDiagnostic(
      DiagnosticCode.TypeMismatch,
      "Cannot apply binary operator + to operand types i32 and bool",
      [primaryLabel(file, span(26, 34)), secondaryLabel(file, span(26, 27), "LHS of type i32 appears here")],
      ["operands must have the same type"]
    );
    expect(formatDiagnostic(diag, files)).toBe(
      [
        "test.em:2:10: error: Cannot apply binary operator + to operand types i32 and bool",
        "    return x + true;",
        "           ^^^^^^^^",
        "    return x + true;",
        "           - LHS of type i32 appears here",
        "  = note: operands must have the same type",
      ].join("\n")
    );
  });

  test("spans over several lines are underlined to the end of the first", () => {
    const files = new SourceFiles();
    const file = files.add("two.em", "ab\ncd");
    const diag = errorDiagnostic(DiagnosticCode.MissingReturn, "m", [primaryLabel(file, span(1, 4))]);
    expect(formatDiagnostic(diag, files)).toBe(["two.em:1:2: error: m", "  ab", "   ^"].join("\n"));
  });

  test("labels in unknown files are dropped", () => {
    const files = new SourceFiles();
    const diag = errorDiagnostic(DiagnosticCode.UnknownType, "Unknown type 'T'", [
      primaryLabel(indexFromRaw<SourceFile>(4), span(0, 1)),
    ]);
    expect(formatDiagnostic(diag, files)).toBe("<unknown>: error: Unknown type 'T'");
  });

  test("several diagnostics are separated by a blank line", () => {
    const files = new SourceFiles();
    const a = errorDiagnostic(DiagnosticCode.EmptyArray, "a", []);
    const b = errorDiagnostic(DiagnosticCode.EmptyArray, "b", []);
    expect(formatDiagnostics([a, b], files)).toBe("<unknown>: error: a\n\n<unknown>: error: b");
  });
});

describe("diagnostics", () => {
  test("errorDiagnostic builds an error", () => {
    const diag = errorDiagnostic(DiagnosticCode.InvalidCast, "c", []);
    expect(diag.severity).toBe(Severity.Error);
    expect(diag.notes).toEqual([]);
    expect(isError(diag)).toBe(true);
    expect(isError({ ...diag, severity: Severity.Warning })).toBe(false);
  });

  test("invariant errors are marked as internal", () => {
    const err = new IrInvariantError("block 3 has no terminator");
    expect(err.name).toBe("IrInvariantError");
    expect(err.message).toBe("internal compiler error: block 3 has no terminator");
    expect(err).toBeInstanceOf(Error);
  });
});

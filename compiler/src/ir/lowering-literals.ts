/**
 * Literal lowering methods for IrLowerer.
 * Extracted from lowering-expr.ts for modularity.
 */

import type { ArrayLiteral, FloatLiteral, IntLiteral, StructLiteral } from "../ast/nodes.ts";
import {
  type Diagnostic,
  DiagnosticCode,
  errorDiagnostic,
  primaryLabel,
  secondaryLabel,
} from "../errors/diagnostic.ts";
import { error, ok, type Result } from "../utils/result.ts";
import { IrContext } from "./context.ts";
import type { IntegerWidth, IrExpr } from "./ir-types.ts";
import { invalidExpr, typesAgree } from "./lowering-expr.ts";
import type { IrLowerer } from "./lowering.ts";

/** Inclusive bounds of an integer type. */
export function integerRange(signed: boolean, width: IntegerWidth): { min: bigint; max: bigint } {
  const bits = BigInt(width);
  if (signed) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

export function lowerIntLiteral(this: IrLowerer, expr: IntLiteral): Result<IrExpr, Diagnostic> {
  const signed = expr.suffix?.signed ?? true;
  const width = expr.suffix?.width ?? 32;
  const ty = IrContext.itype(signed, width);

  const { min, max } = integerRange(signed, width);
  if (expr.value < min || expr.value > max) {
    return error(
      errorDiagnostic(
        DiagnosticCode.LiteralOutOfRange,
        `Integer literal ${expr.value} does not fit in ${this.ctx.typename(ty)}`,
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  return ok({ kind: "integer", value: expr.value, span: expr.span, ty });
}

export function lowerFloatLiteral(this: IrLowerer, expr: FloatLiteral): Result<IrExpr, Diagnostic> {
  const ty = expr.doublewide === false ? IrContext.F32 : IrContext.F64;
  return ok({ kind: "float", value: expr.value, span: expr.span, ty });
}

export function lowerStructLiteral(
  this: IrLowerer,
  expr: StructLiteral
): Result<IrExpr, Diagnostic> {
  const alias = this.typeNames.get(expr.name);
  if (alias === undefined) {
    return error(
      errorDiagnostic(DiagnosticCode.UnknownType, `Unknown type '${expr.name}'`, [
        primaryLabel(this.file, expr.span),
      ])
    );
  }

  const structTy = this.ctx.resolved(alias);
  if (structTy.kind === "invalid") return ok(invalidExpr(expr.span));
  if (structTy.kind !== "struct") {
    return error(
      errorDiagnostic(DiagnosticCode.TypeMismatch, `Type '${expr.name}' is not a struct type`, [
        primaryLabel(this.file, expr.span),
      ])
    );
  }

  const values: (IrExpr | null)[] = structTy.fields.map(() => null);
  for (const init of expr.fields) {
    const index = structTy.fields.findIndex((f) => f.name === init.name);
    if (index < 0) {
      return error(
        errorDiagnostic(
          DiagnosticCode.UnknownField,
          `Type ${expr.name} has no field named '${init.name}'`,
          [primaryLabel(this.file, init.span)]
        )
      );
    }
    if (values[index] !== null) {
      return error(
        errorDiagnostic(
          DiagnosticCode.DuplicateDefinition,
          `Field '${init.name}' is initialized more than once`,
          [primaryLabel(this.file, init.span)]
        )
      );
    }

    const value = this.lowerExpr(init.value);
    if (!value.ok) return value;
    const fieldTy = structTy.fields[index].ty;
    if (!typesAgree(this.ctx, fieldTy, value.value.ty)) {
      return error(
        errorDiagnostic(
          DiagnosticCode.TypeMismatch,
          `Field '${init.name}' has type ${this.ctx.typename(fieldTy)} but the value has type ${this.ctx.typename(value.value.ty)}`,
          [primaryLabel(this.file, value.value.span)]
        )
      );
    }
    values[index] = value.value;
  }

  const fields = values.filter((v): v is IrExpr => v !== null);
  if (fields.length !== values.length) {
    const missing = structTy.fields.filter((_, i) => values[i] === null).map((f) => `'${f.name}'`);
    return error(
      errorDiagnostic(
        DiagnosticCode.MissingField,
        `Missing field(s) ${missing.join(", ")} in literal of type ${expr.name}`,
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  return ok({ kind: "struct_literal", fields, span: expr.span, ty: alias });
}

export function lowerArrayLiteral(this: IrLowerer, expr: ArrayLiteral): Result<IrExpr, Diagnostic> {
  if (expr.elements.length === 0) {
    return error(
      errorDiagnostic(
        DiagnosticCode.EmptyArray,
        "Cannot infer the element type of an empty array literal",
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  const elements: IrExpr[] = [];
  for (const element of expr.elements) {
    const lowered = this.lowerExpr(element);
    if (!lowered.ok) return lowered;
    elements.push(lowered.value);
  }

  if (elements.some((e) => e.ty === IrContext.INVALID)) return ok(invalidExpr(expr.span));

  const [first] = elements;
  for (const element of elements) {
    if (element.ty !== first.ty) {
      return error(
        errorDiagnostic(
          DiagnosticCode.TypeMismatch,
          `Array element has type ${this.ctx.typename(element.ty)} but the first element has type ${this.ctx.typename(first.ty)}`,
          [
            primaryLabel(this.file, element.span),
            secondaryLabel(this.file, first.span, "first element appears here"),
          ]
        )
      );
    }
  }

  const ty = this.ctx.types.insert({ kind: "array", element: first.ty, len: elements.length });
  return ok({ kind: "array_literal", elements, span: expr.span, ty });
}

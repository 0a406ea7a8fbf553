/**
 * Expression lowering methods for IrLowerer.
 * Extracted from lowering.ts for modularity.
 */

import type {
  CallExpr,
  CastExpr,
  Expression,
  Identifier,
  IndexExpr,
  MemberExpr,
} from "../ast/nodes.ts";
import {
  type Diagnostic,
  DiagnosticCode,
  errorDiagnostic,
  primaryLabel,
  secondaryLabel,
} from "../errors/diagnostic.ts";
import { error, ok, type Result } from "../utils/result.ts";
import type { Span } from "../utils/source.ts";
import { IrContext } from "./context.ts";
import type { IrExpr, TypeId } from "./ir-types.ts";
import type { IrLowerer } from "./lowering.ts";

// ─── Helpers ─────────────────────────────────────────────────────────────

/** Stand-in for an expression whose error was already reported. */
export function invalidExpr(span: Span): IrExpr {
  return { kind: "invalid", span, ty: IrContext.INVALID };
}

/**
 * Whether a value of type `actual` may be used where `expected` is wanted.
 * Function types agree on their argument and return types alone; parameter
 * names do not take part.
 */
export function typesAgree(ctx: IrContext, expected: TypeId, actual: TypeId): boolean {
  if (expected === actual || expected === IrContext.INVALID || actual === IrContext.INVALID) {
    return true;
  }
  const e = ctx.type(expected);
  const a = ctx.type(actual);
  switch (e.kind) {
    case "fun":
      return (
        a.kind === "fun" &&
        a.args.length === e.args.length &&
        e.args.every((arg, i) => typesAgree(ctx, arg.ty, a.args[i].ty)) &&
        typesAgree(ctx, e.returnTy, a.returnTy)
      );
    case "ptr":
      return a.kind === "ptr" && typesAgree(ctx, e.pointee, a.pointee);
    case "array":
      return a.kind === "array" && a.len === e.len && typesAgree(ctx, e.element, a.element);
    default:
      return false;
  }
}

/** Whether `e as to` is allowed for an `e` of type `from`. */
export function isCastAllowed(ctx: IrContext, from: TypeId, to: TypeId): boolean {
  if (from === to) return true;

  const f = ctx.type(from);
  const t = ctx.type(to);
  if (f.kind === "alias" && f.underlying === to) return true;
  if (t.kind === "alias" && t.underlying === from) return true;

  const target = ctx.resolved(to);
  if (target.kind === "sum" && target.variants.includes(from)) return true;

  switch (f.kind) {
    case "integer":
      return t.kind === "integer" || t.kind === "float" || (t.kind === "ptr" && f.width === 64);
    case "float":
      return t.kind === "integer" || t.kind === "float";
    case "bool":
      return t.kind === "integer";
    case "ptr":
      return t.kind === "ptr" || (t.kind === "integer" && t.width === 64);
    default:
      return false;
  }
}

// ─── Expressions ─────────────────────────────────────────────────────────

export function lowerExpr(this: IrLowerer, expr: Expression): Result<IrExpr, Diagnostic> {
  switch (expr.kind) {
    case "BinaryExpr": {
      const lhs = this.lowerExpr(expr.left);
      if (!lhs.ok) return lhs;
      const rhs = this.lowerExpr(expr.right);
      if (!rhs.ok) return rhs;
      return this.lowerBin(lhs.value, expr.operator, rhs.value);
    }
    case "UnaryExpr": {
      const operand = this.lowerExpr(expr.operand);
      if (!operand.ok) return operand;
      return this.lowerUnary(expr.operator, operand.value);
    }
    case "CallExpr":
      return this.lowerCallExpr(expr);
    case "MemberExpr":
      return this.lowerMemberExpr(expr);
    case "IndexExpr":
      return this.lowerIndexExpr(expr);
    case "CastExpr":
      return this.lowerCastExpr(expr);
    case "GroupExpr":
      return this.lowerExpr(expr.expression);
    case "Identifier":
      return this.lowerIdentifier(expr);
    case "IntLiteral":
      return this.lowerIntLiteral(expr);
    case "FloatLiteral":
      return this.lowerFloatLiteral(expr);
    case "BoolLiteral":
      return ok({ kind: "bool", value: expr.value, span: expr.span, ty: IrContext.BOOL });
    case "UnitLiteral":
      return ok({ kind: "unit", span: expr.span, ty: IrContext.UNIT });
    case "StructLiteral":
      return this.lowerStructLiteral(expr);
    case "ArrayLiteral":
      return this.lowerArrayLiteral(expr);
  }
}

export function lowerIdentifier(this: IrLowerer, expr: Identifier): Result<IrExpr, Diagnostic> {
  const varId = this.lookupVar(expr.name);
  if (varId !== null) {
    return ok({ kind: "var", var: varId, span: expr.span, ty: this.ctx.var(varId).ty });
  }

  const funId = this.funNames.get(expr.name);
  if (funId !== undefined) {
    const ty = this.ctx.types.insert(this.ctx.fun(funId).ty);
    return ok({ kind: "fun", fun: funId, span: expr.span, ty });
  }

  return error(
    errorDiagnostic(DiagnosticCode.UnknownIdentifier, `Unknown identifier '${expr.name}'`, [
      primaryLabel(this.file, expr.span),
    ])
  );
}

export function lowerCallExpr(this: IrLowerer, expr: CallExpr): Result<IrExpr, Diagnostic> {
  const callee = this.lowerExpr(expr.callee);
  if (!callee.ok) return callee;

  const args: IrExpr[] = [];
  for (const arg of expr.args) {
    const lowered = this.lowerExpr(arg);
    if (!lowered.ok) return lowered;
    args.push(lowered.value);
  }

  if (callee.value.ty === IrContext.INVALID) return ok(invalidExpr(expr.span));

  const calleeName = this.ctx.typename(callee.value.ty);
  const funTy = this.ctx.resolved(callee.value.ty);
  if (funTy.kind !== "fun") {
    return error(
      errorDiagnostic(DiagnosticCode.TypeMismatch, `Cannot call expression of type ${calleeName}`, [
        primaryLabel(this.file, callee.value.span),
      ])
    );
  }

  if (args.length !== funTy.args.length) {
    return error(
      errorDiagnostic(
        DiagnosticCode.ArgumentCount,
        `Function of type ${calleeName} takes ${funTy.args.length} argument(s) but ${args.length} were supplied`,
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  for (let i = 0; i < args.length; i++) {
    const expected = funTy.args[i].ty;
    if (!typesAgree(this.ctx, expected, args[i].ty)) {
      return error(
        errorDiagnostic(
          DiagnosticCode.TypeMismatch,
          `Argument ${i + 1} has type ${this.ctx.typename(args[i].ty)} but the parameter expects ${this.ctx.typename(expected)}`,
          [
            primaryLabel(this.file, args[i].span),
            secondaryLabel(this.file, callee.value.span, `Callee of type ${calleeName}`),
          ]
        )
      );
    }
  }

  return ok({ kind: "call", callee: callee.value, args, span: expr.span, ty: funTy.returnTy });
}

export function lowerMemberExpr(this: IrLowerer, expr: MemberExpr): Result<IrExpr, Diagnostic> {
  const object = this.lowerExpr(expr.object);
  if (!object.ok) return object;
  if (object.value.ty === IrContext.INVALID) return ok(invalidExpr(expr.span));

  const objectName = this.ctx.typename(object.value.ty);
  const structTy = this.ctx.resolved(object.value.ty);
  if (structTy.kind !== "struct") {
    return error(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Cannot access field '${expr.property}' of non-struct type ${objectName}`,
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  const field = structTy.fields.findIndex((f) => f.name === expr.property);
  if (field < 0) {
    return error(
      errorDiagnostic(
        DiagnosticCode.UnknownField,
        `Type ${objectName} has no field named '${expr.property}'`,
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  return ok({
    kind: "member",
    object: object.value,
    field,
    span: expr.span,
    ty: structTy.fields[field].ty,
  });
}

export function lowerIndexExpr(this: IrLowerer, expr: IndexExpr): Result<IrExpr, Diagnostic> {
  const object = this.lowerExpr(expr.object);
  if (!object.ok) return object;
  const index = this.lowerExpr(expr.index);
  if (!index.ok) return index;

  if (object.value.ty === IrContext.INVALID || index.value.ty === IrContext.INVALID) {
    return ok(invalidExpr(expr.span));
  }

  const container = this.ctx.resolved(object.value.ty);
  let ty: TypeId;
  if (container.kind === "array") {
    ty = container.element;
  } else if (container.kind === "ptr") {
    ty = container.pointee;
  } else {
    return error(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Cannot index into expression of type ${this.ctx.typename(object.value.ty)}`,
        [primaryLabel(this.file, object.value.span)]
      )
    );
  }

  if (this.ctx.resolved(index.value.ty).kind !== "integer") {
    return error(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Index must be an integer, found ${this.ctx.typename(index.value.ty)}`,
        [primaryLabel(this.file, index.value.span)]
      )
    );
  }

  return ok({ kind: "index", object: object.value, index: index.value, span: expr.span, ty });
}

export function lowerCastExpr(this: IrLowerer, expr: CastExpr): Result<IrExpr, Diagnostic> {
  const operand = this.lowerExpr(expr.operand);
  if (!operand.ok) return operand;
  const target = this.lowerTypeNode(expr.targetType);
  if (!target.ok) return target;

  if (operand.value.ty === IrContext.INVALID) return ok(invalidExpr(expr.span));

  if (!isCastAllowed(this.ctx, operand.value.ty, target.value)) {
    return error(
      errorDiagnostic(
        DiagnosticCode.InvalidCast,
        `Cannot cast expression of type ${this.ctx.typename(operand.value.ty)} to ${this.ctx.typename(target.value)}`,
        [primaryLabel(this.file, expr.span)]
      )
    );
  }

  return ok({ kind: "cast", operand: operand.value, span: expr.span, ty: target.value });
}

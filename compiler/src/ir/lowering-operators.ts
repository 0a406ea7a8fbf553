/**
 * Operator typing for IrLowerer.
 * Extracted from lowering-expr.ts for modularity.
 *
 * Operands are classified by their own type kind; aliases are not looked
 * through, and integer or float operands must share the same handle.
 */

import { Op } from "../ast/nodes.ts";
import {
  type Diagnostic,
  DiagnosticCode,
  errorDiagnostic,
  primaryLabel,
  secondaryLabel,
} from "../errors/diagnostic.ts";
import { error, ok, type Result } from "../utils/result.ts";
import { joinSpans } from "../utils/source.ts";
import { IrContext } from "./context.ts";
import type { IrExpr, TypeId } from "./ir-types.ts";
import type { IrLowerer } from "./lowering.ts";

const BOOL_OPS: ReadonlySet<Op> = new Set([Op.LogicalAnd, Op.LogicalOr, Op.LogicalNot, Op.Eq]);

const COMPARISON_OPS: readonly Op[] = [Op.Eq, Op.Greater, Op.GreaterEq, Op.Less, Op.LessEq];
const ARITHMETIC_OPS: readonly Op[] = [Op.Star, Op.Div, Op.Add, Op.Sub];
const SHIFT_OPS: ReadonlySet<Op> = new Set([Op.ShLeft, Op.ShRight]);

const INTEGER_OPS: ReadonlySet<Op> = new Set([...COMPARISON_OPS, ...ARITHMETIC_OPS, ...SHIFT_OPS]);
const FLOAT_OPS: ReadonlySet<Op> = new Set([...COMPARISON_OPS, ...ARITHMETIC_OPS]);

// ─── Typing rules ────────────────────────────────────────────────────────

/** Result type of `lhs op rhs`, or null when the operator does not apply. */
export function binaryResultType(ctx: IrContext, lhs: TypeId, op: Op, rhs: TypeId): TypeId | null {
  const l = ctx.type(lhs);
  const r = ctx.type(rhs);

  switch (l.kind) {
    case "bool":
      return r.kind === "bool" && BOOL_OPS.has(op) ? IrContext.BOOL : null;
    case "integer":
      return r.kind === "integer" && lhs === rhs && INTEGER_OPS.has(op) ? lhs : null;
    case "float":
      return r.kind === "float" && lhs === rhs && FLOAT_OPS.has(op) ? lhs : null;
    case "ptr":
      if (SHIFT_OPS.has(op) && r.kind === "integer") return lhs;
      if ((op === Op.Add || op === Op.Sub) && (r.kind === "ptr" || r.kind === "integer")) return lhs;
      return null;
    default:
      return null;
  }
}

/** Result type of `op operand`, or null when the operator does not apply. */
export function unaryResultType(ctx: IrContext, op: Op, operand: TypeId): TypeId | null {
  const ty = ctx.type(operand);
  switch (op) {
    case Op.Star:
      return ty.kind === "ptr" ? ty.pointee : null;
    case Op.AND:
      return ctx.ptrTo(operand);
    case Op.Sub:
      return ty.kind === "integer" || ty.kind === "float" ? operand : null;
    case Op.NOT:
      return ty.kind === "integer" || ty.kind === "ptr" ? operand : null;
    default:
      return null;
  }
}

// ─── Lowering ────────────────────────────────────────────────────────────

export function lowerBin(
  this: IrLowerer,
  lhs: IrExpr,
  op: Op,
  rhs: IrExpr
): Result<IrExpr, Diagnostic> {
  const span = joinSpans(lhs.span, rhs.span);

  if (lhs.ty === IrContext.INVALID || rhs.ty === IrContext.INVALID) {
    return ok({ kind: "binary", lhs, op, rhs, span, ty: IrContext.INVALID });
  }

  const ty = binaryResultType(this.ctx, lhs.ty, op, rhs.ty);
  if (ty === null) {
    const lhsName = this.ctx.typename(lhs.ty);
    const rhsName = this.ctx.typename(rhs.ty);
    return error(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Cannot apply binary operator ${op} to operand types ${lhsName} and ${rhsName}`,
        [
          primaryLabel(this.file, span),
          secondaryLabel(this.file, lhs.span, `LHS of type ${lhsName} appears here`),
          secondaryLabel(this.file, rhs.span, `RHS of type ${rhsName} appears here`),
        ]
      )
    );
  }

  return ok({ kind: "binary", lhs, op, rhs, span, ty });
}

export function lowerUnary(this: IrLowerer, op: Op, operand: IrExpr): Result<IrExpr, Diagnostic> {
  // The operator token is not part of the span: it covers the operand only.
  const span = operand.span;

  if (operand.ty === IrContext.INVALID) {
    return ok({ kind: "unary", op, operand, span, ty: IrContext.INVALID });
  }

  const ty = unaryResultType(this.ctx, op, operand.ty);
  if (ty === null) {
    return error(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Cannot apply unary operator ${op} to expression of type ${this.ctx.typename(operand.ty)}`,
        [primaryLabel(this.file, operand.span)]
      )
    );
  }

  return ok({ kind: "unary", op, operand, span, ty });
}

/**
 * Emission of IR expressions, statements and terminators as C.
 */

import { Op } from "../ast/nodes.ts";
import { IrInvariantError } from "../errors/invariant.ts";
import { IrContext } from "../ir/context.ts";
import type {
  IrBinaryExpr,
  IrCastExpr,
  IrExpr,
  IrStmt,
  IrTerminator,
  IrUnaryExpr,
  TypeId,
} from "../ir/ir-types.ts";
import { emitCType, sanitizeName, UNIT_C_TYPE } from "./c-emitter-types.ts";

const COMPARISON_OPS: ReadonlySet<Op> = new Set([
  Op.Eq,
  Op.Greater,
  Op.GreaterEq,
  Op.Less,
  Op.LessEq,
]);

// ─── Names ──────────────────────────────────────────────────────────────────

export function varName(id: number): string {
  return `v${id}`;
}

export function argName(index: number): string {
  return `a${index}`;
}

export function blockLabel(id: number): string {
  return `bb${id}`;
}

// ─── Literals ───────────────────────────────────────────────────────────────

function emitIntegerLiteral(ctx: IrContext, value: bigint, ty: TypeId): string {
  if (ty === IrContext.I32) return value < 0n ? `(${value})` : `${value}`;
  const t = ctx.type(ty);
  const suffix = t.kind === "integer" && !t.signed ? "ULL" : "LL";
  return `((${emitCType(ctx, ty)})${value}${suffix})`;
}

function emitFloatLiteral(value: number, ty: TypeId): string {
  if (!Number.isFinite(value)) {
    throw new IrInvariantError(`float literal ${value} has no C spelling`);
  }
  let text = String(value);
  if (!/[.e]/.test(text)) text += ".0";
  return ty === IrContext.F32 ? `${text}f` : text;
}

// ─── Expressions ────────────────────────────────────────────────────────────

function isUnitCall(ctx: IrContext, expr: IrExpr): boolean {
  return expr.kind === "call" && ctx.resolveAlias(expr.ty) === IrContext.UNIT;
}

/** Whether C accepts `&expr` directly. */
function isAddressable(ctx: IrContext, expr: IrExpr): boolean {
  switch (expr.kind) {
    case "var":
    case "arg":
      return true;
    case "unary":
      return expr.op === Op.Star;
    case "member":
    case "payload":
      return isAddressable(ctx, expr.kind === "member" ? expr.object : expr.value);
    case "index":
      return ctx.resolved(expr.object.ty).kind === "ptr" || isAddressable(ctx, expr.object);
    default:
      return false;
  }
}

function emitBinary(ctx: IrContext, expr: IrBinaryExpr): string {
  const l = emitExpr(ctx, expr.lhs);
  const r = emitExpr(ctx, expr.rhs);
  const lhsKind = ctx.type(expr.lhs.ty).kind;

  if (lhsKind === "ptr") {
    const rhsKind = ctx.type(expr.rhs.ty).kind;
    if (rhsKind === "integer" && (expr.op === Op.Add || expr.op === Op.Sub)) {
      return `(${l} ${expr.op} ${r})`;
    }
    const ty = emitCType(ctx, expr.ty);
    const rhs = rhsKind === "ptr" ? `(uintptr_t)${r}` : r;
    return `((${ty})((uintptr_t)${l} ${expr.op} ${rhs}))`;
  }

  if (lhsKind === "bool") {
    // `!` between two bools is exclusive or.
    const op = expr.op === Op.LogicalNot ? "!=" : expr.op;
    return `(${l} ${op} ${r})`;
  }

  if (COMPARISON_OPS.has(expr.op)) {
    return `((${emitCType(ctx, expr.ty)})(${l} ${expr.op} ${r}))`;
  }
  return `(${l} ${expr.op} ${r})`;
}

function emitUnary(ctx: IrContext, expr: IrUnaryExpr): string {
  const operand = emitExpr(ctx, expr.operand);
  switch (expr.op) {
    case Op.Star:
      return `(*${operand})`;
    case Op.AND:
      if (isAddressable(ctx, expr.operand)) return `(&${operand})`;
      return `(&(${emitCType(ctx, expr.operand.ty)}){${operand}})`;
    case Op.Sub:
      return `(-${operand})`;
    case Op.NOT:
      if (ctx.type(expr.operand.ty).kind === "ptr") {
        return `((${emitCType(ctx, expr.ty)})~(uintptr_t)${operand})`;
      }
      return `(~${operand})`;
    default:
      throw new IrInvariantError(`unary operator ${expr.op} reached the C emitter`);
  }
}

function emitCast(ctx: IrContext, expr: IrCastExpr): string {
  const operand = emitExpr(ctx, expr.operand);
  const from = expr.operand.ty;

  const target = ctx.resolveAlias(expr.ty);
  const targetTy = ctx.type(target);
  if (targetTy.kind === "sum") {
    const discriminant = targetTy.variants.indexOf(from);
    if (discriminant >= 0) {
      return `((${emitCType(ctx, target)}){.tag = ${discriminant}, .data.v${discriminant} = ${operand}})`;
    }
  }

  // Same C type on both sides: aliases and identity casts.
  if (ctx.resolveAlias(from) === target) return operand;
  return `((${emitCType(ctx, expr.ty)})${operand})`;
}

export function emitExpr(ctx: IrContext, expr: IrExpr): string {
  switch (expr.kind) {
    case "binary":
      return emitBinary(ctx, expr);
    case "unary":
      return emitUnary(ctx, expr);
    case "integer":
      return emitIntegerLiteral(ctx, expr.value, ctx.resolveAlias(expr.ty));
    case "float":
      return emitFloatLiteral(expr.value, ctx.resolveAlias(expr.ty));
    case "bool":
      return expr.value ? "true" : "false";
    case "unit":
      return `((${UNIT_C_TYPE})0)`;
    case "var":
      return varName(expr.var);
    case "arg":
      return argName(expr.index);
    case "fun":
      return sanitizeName(ctx.fun(expr.fun).name);
    case "call": {
      const call = `${emitExpr(ctx, expr.callee)}(${expr.args.map((a) => emitExpr(ctx, a)).join(", ")})`;
      // A `()` result is `void` in C; give it a value.
      return isUnitCall(ctx, expr) ? `(${call}, (${UNIT_C_TYPE})0)` : call;
    }
    case "member": {
      const object = ctx.resolved(expr.object.ty);
      if (object.kind !== "struct") {
        throw new IrInvariantError(`member access on ${ctx.typename(expr.object.ty)}`);
      }
      return `${emitExpr(ctx, expr.object)}.${sanitizeName(object.fields[expr.field].name)}`;
    }
    case "index": {
      const object = emitExpr(ctx, expr.object);
      const index = emitExpr(ctx, expr.index);
      return ctx.resolved(expr.object.ty).kind === "array"
        ? `${object}.items[${index}]`
        : `${object}[${index}]`;
    }
    case "cast":
      return emitCast(ctx, expr);
    case "payload":
      return `${emitExpr(ctx, expr.value)}.data.v${expr.discriminant}`;
    case "struct_literal": {
      const fields = expr.fields.length === 0 ? "0" : expr.fields.map((f) => emitExpr(ctx, f)).join(", ");
      return `((${emitCType(ctx, expr.ty)}){${fields}})`;
    }
    case "array_literal":
      return `((${emitCType(ctx, expr.ty)}){{${expr.elements.map((e) => emitExpr(ctx, e)).join(", ")}}})`;
    case "invalid":
      throw new IrInvariantError("invalid expression reached the C emitter");
  }
}

/** An expression evaluated only for its effects, as a C statement. */
function emitDiscarded(ctx: IrContext, expr: IrExpr): string {
  if (expr.kind === "call") {
    return `${emitExpr(ctx, expr.callee)}(${expr.args.map((a) => emitExpr(ctx, a)).join(", ")});`;
  }
  return `(void)${emitExpr(ctx, expr)};`;
}

// ─── Statements ─────────────────────────────────────────────────────────────

/** C statement for `stmt`, or null when it has no runtime effect. */
export function emitStmt(ctx: IrContext, stmt: IrStmt): string | null {
  switch (stmt.kind) {
    case "var_live":
      return null;
    case "store":
      return `${varName(stmt.var)} = ${emitExpr(ctx, stmt.val)};`;
    case "write":
      return `${emitExpr(ctx, stmt.place)} = ${emitExpr(ctx, stmt.val)};`;
    case "eval":
      return emitDiscarded(ctx, stmt.expr);
  }
}

// ─── Terminators ────────────────────────────────────────────────────────────

export function emitTerminator(ctx: IrContext, term: IrTerminator, returnsUnit: boolean): string[] {
  switch (term.kind) {
    case "return":
      if (!returnsUnit) return [`return ${emitExpr(ctx, term.value)};`];
      if (term.value.kind === "unit") return ["return;"];
      return [emitDiscarded(ctx, term.value), "return;"];
    case "jmp":
      return [`goto ${blockLabel(term.target)};`];
    case "jmp_if":
      return [
        `if (${emitExpr(ctx, term.condition)}) goto ${blockLabel(term.ifTrue)}; else goto ${blockLabel(term.ifFalse)};`,
      ];
    case "jmp_match":
      return [
        `switch (${emitExpr(ctx, term.variant)}.tag) {`,
        ...term.discriminants.map(([d, bb]) => `    case ${d}: goto ${blockLabel(bb)};`),
        `    default: goto ${blockLabel(term.defaultJmp)};`,
        "}",
      ];
  }
}

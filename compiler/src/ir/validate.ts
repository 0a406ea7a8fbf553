/**
 * Structural checks on lowered IR. A failure means the lowering pass is
 * broken, never that the input program is wrong, so every check throws.
 */

import { IrInvariantError } from "../errors/invariant.ts";
import { buildCfg } from "./cfg.ts";
import type { IrContext } from "./context.ts";
import type { FunId, IrExpr, IrStmt } from "./ir-types.ts";

/**
 * Verify a lowered function: every reachable block is terminated and every
 * handle it mentions belongs to `ctx`. Declarations without a body pass.
 */
export function validateFunction(ctx: IrContext, funId: FunId): void {
  const fun = ctx.fun(funId);
  if (fun.body === null) return;
  if (fun.body.parent !== funId) {
    throw new IrInvariantError(`body of '${fun.name}' names function ${fun.body.parent} as its parent`);
  }
  if (!ctx.bbs.has(fun.body.entry)) {
    throw new IrInvariantError(`'${fun.name}' has unknown entry block ${fun.body.entry}`);
  }

  const cfg = buildCfg(ctx, fun.body);
  for (const id of cfg.blockOrder) {
    const bb = ctx.bb(id);
    for (const stmt of bb.stmts) {
      checkStmt(ctx, stmt, fun.name);
    }
    const term = bb.terminator;
    if (term === null) {
      throw new IrInvariantError(`block ${id} of '${fun.name}' has no terminator`);
    }
    switch (term.kind) {
      case "return":
        checkExpr(ctx, term.value, fun.name);
        break;
      case "jmp_if":
        checkExpr(ctx, term.condition, fun.name);
        break;
      case "jmp_match":
        checkExpr(ctx, term.variant, fun.name);
        break;
      case "jmp":
        break;
    }
  }
}

/** Validate every function of the context. */
export function validateContext(ctx: IrContext): void {
  for (const [id] of ctx.funs.entries()) {
    validateFunction(ctx, id);
  }
}

function checkStmt(ctx: IrContext, stmt: IrStmt, where: string): void {
  switch (stmt.kind) {
    case "var_live":
      checkVar(ctx, stmt.var, where);
      return;
    case "store":
      checkVar(ctx, stmt.var, where);
      checkExpr(ctx, stmt.val, where);
      return;
    case "write":
      checkExpr(ctx, stmt.place, where);
      checkExpr(ctx, stmt.val, where);
      return;
    case "eval":
      checkExpr(ctx, stmt.expr, where);
      return;
  }
}

function checkVar(ctx: IrContext, id: number, where: string): void {
  if (!ctx.vars.has(id)) {
    throw new IrInvariantError(`'${where}' refers to unknown variable ${id}`);
  }
}

function checkExpr(ctx: IrContext, expr: IrExpr, where: string): void {
  if (!ctx.types.has(expr.ty)) {
    throw new IrInvariantError(`'${where}' has an expression of unknown type ${expr.ty}`);
  }
  switch (expr.kind) {
    case "binary":
      checkExpr(ctx, expr.lhs, where);
      checkExpr(ctx, expr.rhs, where);
      return;
    case "unary":
      checkExpr(ctx, expr.operand, where);
      return;
    case "var":
      checkVar(ctx, expr.var, where);
      return;
    case "fun":
      if (!ctx.funs.has(expr.fun)) {
        throw new IrInvariantError(`'${where}' refers to unknown function ${expr.fun}`);
      }
      return;
    case "call":
      checkExpr(ctx, expr.callee, where);
      for (const arg of expr.args) checkExpr(ctx, arg, where);
      return;
    case "member":
      checkExpr(ctx, expr.object, where);
      return;
    case "cast":
      checkExpr(ctx, expr.operand, where);
      return;
    case "index":
      checkExpr(ctx, expr.object, where);
      checkExpr(ctx, expr.index, where);
      return;
    case "payload":
      checkExpr(ctx, expr.value, where);
      return;
    case "struct_literal":
      for (const field of expr.fields) checkExpr(ctx, field, where);
      return;
    case "array_literal":
      for (const element of expr.elements) checkExpr(ctx, element, where);
      return;
    case "integer":
    case "float":
    case "bool":
    case "unit":
    case "arg":
    case "invalid":
      return;
  }
}

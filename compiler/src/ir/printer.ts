/**
 * IR text printer: human-readable debug output.
 *
 * Only blocks reachable from the entry are printed, entry first. Variables
 * print as `%<id>`, parameters as `arg<index>`, functions as `@<name>`.
 */

import { buildCfg, layoutBlocks } from "./cfg.ts";
import type { IrContext } from "./context.ts";
import type { BBId, FunId, IrExpr, IrFun, IrStmt, IrTerminator } from "./ir-types.ts";

export function printIr(ctx: IrContext, funs?: readonly FunId[]): string {
  const ids = funs ?? [...ctx.funs.entries()].map(([id]) => id);
  return `${ids.map((id) => printFunction(ctx, ctx.fun(id))).join("\n\n")}\n`;
}

function printFunction(ctx: IrContext, fun: IrFun): string {
  const args = fun.ty.args
    .map((a) => (a.name === null ? ctx.typename(a.ty) : `${ctx.typename(a.ty)} ${a.name}`))
    .join(", ");
  const prefix = `${fun.flags.isExtern ? "extern " : ""}${fun.flags.isInline ? "inline " : ""}`;
  const header = `${prefix}fun ${fun.name}(${args}) -> ${ctx.typename(fun.ty.returnTy)}`;
  if (fun.body === null) return header;

  const lines: string[] = [`${header} {`];
  for (const id of layoutBlocks(buildCfg(ctx, fun.body))) {
    lines.push(printBlock(ctx, id));
  }
  lines.push("}");
  return lines.join("\n");
}

function printBlock(ctx: IrContext, id: BBId): string {
  const bb = ctx.bb(id);
  const lines: string[] = [`bb${id}:`];
  for (const stmt of bb.stmts) {
    lines.push(`  ${printStmt(ctx, stmt)}`);
  }
  if (bb.terminator !== null) {
    lines.push(`  ${printTerminator(ctx, bb.terminator)}`);
  }
  return lines.join("\n");
}

function printStmt(ctx: IrContext, stmt: IrStmt): string {
  switch (stmt.kind) {
    case "var_live": {
      const v = ctx.var(stmt.var);
      return `live %${stmt.var} ${v.name}: ${ctx.typename(v.ty)}`;
    }
    case "store":
      return `%${stmt.var} = ${printExpr(ctx, stmt.val)}`;
    case "write":
      return `write ${printExpr(ctx, stmt.place)} = ${printExpr(ctx, stmt.val)}`;
    case "eval":
      return `eval ${printExpr(ctx, stmt.expr)}`;
  }
}

function printTerminator(ctx: IrContext, term: IrTerminator): string {
  switch (term.kind) {
    case "return":
      return `return ${printExpr(ctx, term.value)}`;
    case "jmp":
      return `jmp bb${term.target}`;
    case "jmp_if":
      return `jmp_if ${printExpr(ctx, term.condition)} then bb${term.ifTrue} else bb${term.ifFalse}`;
    case "jmp_match": {
      const arms = term.discriminants.map(([d, bb]) => `${d} => bb${bb}`).join(", ");
      return `jmp_match ${printExpr(ctx, term.variant)} [${arms}] else bb${term.defaultJmp}`;
    }
  }
}

export function printExpr(ctx: IrContext, expr: IrExpr): string {
  switch (expr.kind) {
    case "binary":
      return `(${printExpr(ctx, expr.lhs)} ${expr.op} ${printExpr(ctx, expr.rhs)})`;
    case "unary":
      return `${expr.op}${printExpr(ctx, expr.operand)}`;
    case "integer":
      return `${expr.value}`;
    case "float":
      return `${expr.value}`;
    case "bool":
      return expr.value ? "true" : "false";
    case "unit":
      return "()";
    case "var":
      return `%${expr.var}`;
    case "arg":
      return `arg${expr.index}`;
    case "fun":
      return `@${ctx.fun(expr.fun).name}`;
    case "call":
      return `${printExpr(ctx, expr.callee)}(${expr.args.map((a) => printExpr(ctx, a)).join(", ")})`;
    case "member": {
      const object = ctx.resolved(expr.object.ty);
      const name = object.kind === "struct" ? object.fields[expr.field].name : `#${expr.field}`;
      return `${printExpr(ctx, expr.object)}.${name}`;
    }
    case "index":
      return `${printExpr(ctx, expr.object)}[${printExpr(ctx, expr.index)}]`;
    case "cast":
      return `(${printExpr(ctx, expr.operand)} as ${ctx.typename(expr.ty)})`;
    case "payload":
      return `payload ${expr.discriminant} of ${printExpr(ctx, expr.value)}`;
    case "struct_literal":
      return `${ctx.typename(expr.ty)} {${expr.fields.map((f) => printExpr(ctx, f)).join(", ")}}`;
    case "array_literal":
      return `[${expr.elements.map((e) => printExpr(ctx, e)).join(", ")}]`;
    case "invalid":
      return "<invalid>";
  }
}

/**
 * Function body emission and local variable collection.
 */

import { IrInvariantError } from "../errors/invariant.ts";
import { buildCfg, layoutBlocks } from "../ir/cfg.ts";
import { IrContext } from "../ir/context.ts";
import type { BBId, FunId, VarId } from "../ir/ir-types.ts";
import { emitFunctionSignature } from "./c-emitter-decls.ts";
import { blockLabel, emitStmt, emitTerminator, varName } from "./c-emitter-exprs.ts";
import { emitCType } from "./c-emitter-types.ts";

// ─── Function emission ──────────────────────────────────────────────────────

export function emitFunction(ctx: IrContext, funId: FunId): string {
  const fun = ctx.fun(funId);
  if (fun.body === null) {
    throw new IrInvariantError(`function '${fun.name}' has no body to emit`);
  }
  const returnsUnit = ctx.resolveAlias(fun.ty.returnTy) === IrContext.UNIT;
  const blocks = layoutBlocks(buildCfg(ctx, fun.body));

  const out: string[] = [];
  out.push(`${emitFunctionSignature(ctx, fun)} {`);

  const locals = collectLocals(ctx, blocks);
  for (const id of locals) {
    out.push(`    ${emitCType(ctx, ctx.var(id).ty)} ${varName(id)};`);
  }
  if (locals.length > 0) out.push("");

  for (const id of blocks) {
    const bb = ctx.bb(id);
    out.push(`${blockLabel(id)}:`);
    for (const stmt of bb.stmts) {
      const line = emitStmt(ctx, stmt);
      if (line !== null) out.push(`    ${line}`);
    }
    if (bb.terminator === null) {
      throw new IrInvariantError(`block ${id} of '${fun.name}' has no terminator`);
    }
    for (const line of emitTerminator(ctx, bb.terminator, returnsUnit)) {
      out.push(`    ${line}`);
    }
  }

  out.push("}");
  return out.join("\n");
}

// ─── Local collection ───────────────────────────────────────────────────────

/** Variables made live in the given blocks, in handle order. */
function collectLocals(ctx: IrContext, blocks: readonly BBId[]): VarId[] {
  const locals = new Set<VarId>();
  for (const id of blocks) {
    for (const stmt of ctx.bb(id).stmts) {
      if (stmt.kind === "var_live") locals.add(stmt.var);
    }
  }
  return [...locals].sort((a, b) => a - b);
}

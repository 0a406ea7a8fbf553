/**
 * Emission of function prototypes.
 */

import type { IrContext } from "../ir/context.ts";
import type { IrFun } from "../ir/ir-types.ts";
import { argName } from "./c-emitter-exprs.ts";
import { emitCReturnType, emitCType, sanitizeName } from "./c-emitter-types.ts";

/** `int32_t add(int32_t a0, int32_t a1)`, with storage class for extern and inline functions. */
export function emitFunctionSignature(ctx: IrContext, fun: IrFun): string {
  const params =
    fun.ty.args.length === 0
      ? "void"
      : fun.ty.args.map((a, i) => `${emitCType(ctx, a.ty)} ${argName(i)}`).join(", ");
  const storage = fun.flags.isExtern ? "extern " : fun.flags.isInline ? "static inline " : "";
  return `${storage}${emitCReturnType(ctx, fun.ty.returnTy)} ${sanitizeName(fun.name)}(${params})`;
}

export function emitFunctionPrototype(ctx: IrContext, fun: IrFun): string {
  return `${emitFunctionSignature(ctx, fun)};`;
}

/**
 * C code generator: renders lowered IR as one C translation unit.
 *
 * Layout: prelude, forward typedefs, type definitions in dependency order,
 * function prototypes, then function bodies. Lowering must have finished
 * without diagnostics; anything malformed throws `IrInvariantError`.
 */

import type { IrContext } from "../ir/context.ts";
import type { FunId } from "../ir/ir-types.ts";
import { validateFunction } from "../ir/validate.ts";
import { emitFunctionPrototype } from "./c-emitter-decls.ts";
import { emitFunction } from "./c-emitter-fn.ts";
import {
  emitForwardTypedefs,
  emitTypeDefinition,
  orderTypeDefinitions,
  UNIT_C_TYPE,
} from "./c-emitter-types.ts";

export interface EmitOptions {
  /** Start the output with the standard includes and the unit typedef. */
  prelude: boolean;
}

export const DEFAULT_EMIT_OPTIONS: EmitOptions = {
  prelude: true,
};

export const C_PRELUDE: readonly string[] = [
  "#include <stdbool.h>",
  "#include <stdint.h>",
  "",
  `typedef uint8_t ${UNIT_C_TYPE};`,
];

export function emitC(ctx: IrContext, funs: readonly FunId[], options: Partial<EmitOptions> = {}): string {
  const opts = { ...DEFAULT_EMIT_OPTIONS, ...options };
  for (const id of funs) {
    validateFunction(ctx, id);
  }

  const sections: string[][] = [];
  if (opts.prelude) sections.push([...C_PRELUDE]);

  const order = orderTypeDefinitions(ctx);
  const forwards = emitForwardTypedefs(ctx, order);
  if (forwards.length > 0) sections.push(forwards);
  if (order.length > 0) sections.push(order.map((id) => emitTypeDefinition(ctx, id)));

  if (funs.length > 0) {
    sections.push(funs.map((id) => emitFunctionPrototype(ctx, ctx.fun(id))));
  }

  for (const id of funs) {
    if (ctx.fun(id).body !== null) sections.push([emitFunction(ctx, id)]);
  }

  return `${sections.map((lines) => lines.join("\n")).join("\n\n")}\n`;
}

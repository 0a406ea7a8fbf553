/**
 * Human-readable type names for diagnostics.
 *
 * Names are streamed into a sink chunk by chunk while walking the type, so
 * rendering `*[4]{i32 x,}` builds one string at the end instead of one per
 * nested type.
 */

import type { IrContext } from "./context.ts";
import type { TypeId } from "./ir-types.ts";

/** Receives the pieces of a rendered type name, in order. */
export interface TypenameSink {
  write(chunk: string): void;
}

export function writeTypename(ctx: IrContext, ty: TypeId, out: TypenameSink): void {
  const t = ctx.type(ty);
  switch (t.kind) {
    case "integer":
      out.write(`${t.signed ? "i" : "u"}${t.width}`);
      return;
    case "float":
      out.write(t.doublewide ? "f64" : "f32");
      return;
    case "bool":
      out.write("bool");
      return;
    case "unit":
      out.write("()");
      return;
    case "ptr":
      out.write("*");
      writeTypename(ctx, t.pointee, out);
      return;
    case "array":
      out.write(`[${t.len}]`);
      writeTypename(ctx, t.element, out);
      return;
    case "struct":
      out.write("{");
      for (const field of t.fields) {
        writeTypename(ctx, field.ty, out);
        out.write(` ${field.name},`);
      }
      out.write("}");
      return;
    case "sum":
      t.variants.forEach((variant, i) => {
        if (i > 0) out.write(" | ");
        writeTypename(ctx, variant, out);
      });
      return;
    case "fun":
      out.write("fun (");
      t.args.forEach((arg, i) => {
        if (i > 0) out.write(", ");
        writeTypename(ctx, arg.ty, out);
        if (arg.name !== null) out.write(` ${arg.name}`);
      });
      out.write(") -> ");
      writeTypename(ctx, t.returnTy, out);
      return;
    // Aliases print by name, which also ends recursion through self-referential types.
    case "alias":
      out.write(t.name);
      return;
    case "invalid":
      out.write("INVALID");
      return;
  }
}

export function typename(ctx: IrContext, ty: TypeId): string {
  const chunks: string[] = [];
  writeTypename(ctx, ty, { write: (chunk) => chunks.push(chunk) });
  return chunks.join("");
}

/**
 * C type mapping, name sanitization, and type definitions.
 *
 * Structs, sums and arrays become C structs named after their type handle
 * (`__struct_<id>`, `__sum_<id>`, `__array_<id>`); function types become
 * function-pointer typedefs (`__fun_<id>`). Aliases have no C name of their
 * own and render as their underlying type.
 */

import { IrInvariantError } from "../errors/invariant.ts";
import { IrContext } from "../ir/context.ts";
import type { IrType, TypeId } from "../ir/ir-types.ts";

/** C type of the unit value. */
export const UNIT_C_TYPE = "ember_unit";

// ─── Type mapping ───────────────────────────────────────────────────────────

export function emitCType(ctx: IrContext, ty: TypeId): string {
  const id = ctx.resolveAlias(ty);
  const t = ctx.type(id);
  switch (t.kind) {
    case "integer":
      return t.signed ? `int${t.width}_t` : `uint${t.width}_t`;
    case "float":
      return t.doublewide ? "double" : "float";
    case "bool":
      return "bool";
    case "unit":
      return UNIT_C_TYPE;
    case "ptr":
      return `${emitCType(ctx, t.pointee)}*`;
    case "array":
      return `__array_${id}`;
    case "struct":
      return `__struct_${id}`;
    case "sum":
      return `__sum_${id}`;
    case "fun":
      return `__fun_${id}`;
    case "alias":
      throw new IrInvariantError(`alias '${t.name}' has no underlying type`);
    case "invalid":
      throw new IrInvariantError("invalid type reached the C emitter");
  }
}

/** Return type of a C function; `()` results become `void`. */
export function emitCReturnType(ctx: IrContext, ty: TypeId): string {
  return ctx.resolveAlias(ty) === IrContext.UNIT ? "void" : emitCType(ctx, ty);
}

// ─── Name helpers ───────────────────────────────────────────────────────────

/** Sanitize a name for use as a C identifier. */
export function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_]/g, "_");
}

// ─── Type definitions ───────────────────────────────────────────────────────

type NamedKind = "struct" | "sum" | "array" | "fun";

function isNamed(t: IrType): t is Extract<IrType, { kind: NamedKind }> {
  return t.kind === "struct" || t.kind === "sum" || t.kind === "array" || t.kind === "fun";
}

/**
 * Named types a use of `ty` needs fully defined. By-value aggregates need
 * their definition; behind a pointer a forward typedef is enough, except for
 * function types, whose typedef is their only declaration.
 */
function requiredDefinitions(ctx: IrContext, ty: TypeId, byValue: boolean): TypeId[] {
  const id = ctx.resolveAlias(ty);
  const t = ctx.type(id);
  if (t.kind === "ptr") return requiredDefinitions(ctx, t.pointee, false);
  if (t.kind === "fun") return [id];
  if (isNamed(t) && byValue) return [id];
  return [];
}

function definitionDependencies(ctx: IrContext, id: TypeId): TypeId[] {
  const t = ctx.type(id);
  switch (t.kind) {
    case "struct":
      return t.fields.flatMap((f) => requiredDefinitions(ctx, f.ty, true));
    case "sum":
      return t.variants.flatMap((v) => requiredDefinitions(ctx, v, true));
    case "array":
      return requiredDefinitions(ctx, t.element, true);
    case "fun":
      // Parameter and return types of a prototype may be incomplete.
      return [...t.args.map((a) => a.ty), t.returnTy].flatMap((a) => requiredDefinitions(ctx, a, false));
    default:
      return [];
  }
}

/** Every named type of the context, ordered so definitions precede their uses. */
export function orderTypeDefinitions(ctx: IrContext): TypeId[] {
  const order: TypeId[] = [];
  const state = new Map<TypeId, "visiting" | "done">();

  const visit = (id: TypeId): void => {
    const s = state.get(id);
    if (s === "done") return;
    if (s === "visiting") {
      throw new IrInvariantError(`type ${ctx.typename(id)} contains itself by value`);
    }
    state.set(id, "visiting");
    for (const dep of definitionDependencies(ctx, id)) {
      visit(dep);
    }
    state.set(id, "done");
    order.push(id);
  };

  for (const [id, t] of ctx.types.entries()) {
    if (isNamed(t)) visit(id);
  }
  return order;
}

/** `typedef struct __struct_5 __struct_5;` for every struct-like type. */
export function emitForwardTypedefs(ctx: IrContext, order: readonly TypeId[]): string[] {
  return order.flatMap((id) => {
    if (ctx.type(id).kind === "fun") return [];
    const name = emitCType(ctx, id);
    return [`typedef struct ${name} ${name};`];
  });
}

export function emitTypeDefinition(ctx: IrContext, id: TypeId): string {
  const t = ctx.type(id);
  const name = emitCType(ctx, id);
  switch (t.kind) {
    case "struct": {
      const fields =
        t.fields.length === 0
          ? ["    uint8_t __empty;"]
          : t.fields.map((f) => `    ${emitCType(ctx, f.ty)} ${sanitizeName(f.name)};`);
      return [`struct ${name} {`, ...fields, "};"].join("\n");
    }
    case "sum": {
      const variants = t.variants.map((v, i) => `        ${emitCType(ctx, v)} v${i};`);
      return [
        `struct ${name} {`,
        "    uint32_t tag;",
        "    union {",
        ...variants,
        "    } data;",
        "};",
      ].join("\n");
    }
    case "array":
      return [`struct ${name} {`, `    ${emitCType(ctx, t.element)} items[${t.len}];`, "};"].join("\n");
    case "fun": {
      const params = t.args.length === 0 ? "void" : t.args.map((a) => emitCType(ctx, a.ty)).join(", ");
      return `typedef ${emitCReturnType(ctx, t.returnTy)} (*${name})(${params});`;
    }
    default:
      throw new IrInvariantError(`type ${ctx.typename(id)} needs no definition`);
  }
}

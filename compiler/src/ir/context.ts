/**
 * The IR context: the single mutable root passed through lowering and read
 * by every backend. It owns the type interner and the function, block and
 * variable arenas; handles issued by one context mean nothing to another.
 */

import { Arena, indexFromRaw, Interner } from "../utils/arena.ts";
import type {
  BBId,
  FunId,
  IntegerWidth,
  IrBB,
  IrFun,
  IrType,
  IrVar,
  TypeId,
  VarId,
} from "./ir-types.ts";
import { typename } from "./typename.ts";

export class IrContext {
  static readonly I8: TypeId = indexFromRaw<IrType>(0);
  static readonly I16: TypeId = indexFromRaw<IrType>(1);
  static readonly I32: TypeId = indexFromRaw<IrType>(2);
  static readonly I64: TypeId = indexFromRaw<IrType>(3);
  static readonly U8: TypeId = indexFromRaw<IrType>(4);
  static readonly U16: TypeId = indexFromRaw<IrType>(5);
  static readonly U32: TypeId = indexFromRaw<IrType>(6);
  static readonly U64: TypeId = indexFromRaw<IrType>(7);

  static readonly BOOL: TypeId = indexFromRaw<IrType>(8);
  static readonly UNIT: TypeId = indexFromRaw<IrType>(9);

  static readonly F32: TypeId = indexFromRaw<IrType>(10);
  static readonly F64: TypeId = indexFromRaw<IrType>(11);

  static readonly INVALID: TypeId = indexFromRaw<IrType>(12);

  /** Every type used by the program, deduplicated structurally. */
  readonly types = new Interner<IrType>("type", typeKey);
  /** All declared / defined functions. */
  readonly funs = new Arena<IrFun>("function");
  /** All basic blocks of all function bodies. */
  readonly bbs = new Arena<IrBB>("basic block");
  /** All variables of all function bodies. */
  readonly vars = new Arena<IrVar>("variable");

  /** Create a context with the primitive types registered at their fixed handles. */
  constructor() {
    for (const signed of [true, false]) {
      for (const width of [8, 16, 32, 64] as const) {
        this.types.insert({ kind: "integer", signed, width });
      }
    }
    this.types.insert({ kind: "bool" });
    this.types.insert({ kind: "unit" });
    this.types.insert({ kind: "float", doublewide: false });
    this.types.insert({ kind: "float", doublewide: true });
    this.types.insert({ kind: "invalid" });
  }

  /** Handle of the integer type with the given signedness and width. */
  static itype(signed: boolean, width: IntegerWidth): TypeId {
    switch (width) {
      case 8:
        return signed ? IrContext.I8 : IrContext.U8;
      case 16:
        return signed ? IrContext.I16 : IrContext.U16;
      case 32:
        return signed ? IrContext.I32 : IrContext.U32;
      case 64:
        return signed ? IrContext.I64 : IrContext.U64;
    }
  }

  type(id: TypeId): IrType {
    return this.types.get(id);
  }

  fun(id: FunId): IrFun {
    return this.funs.get(id);
  }

  bb(id: BBId): IrBB {
    return this.bbs.get(id);
  }

  var(id: VarId): IrVar {
    return this.vars.get(id);
  }

  /** Intern `*pointee`. */
  ptrTo(pointee: TypeId): TypeId {
    return this.types.insert({ kind: "ptr", pointee });
  }

  /** Follow aliases until reaching a non-alias type. */
  resolveAlias(id: TypeId): TypeId {
    let current = id;
    const seen = new Set<TypeId>();
    for (;;) {
      const ty = this.type(current);
      if (ty.kind !== "alias" || seen.has(current)) return current;
      seen.add(current);
      current = ty.underlying;
    }
  }

  /** The type behind any aliases of `id`. */
  resolved(id: TypeId): IrType {
    return this.type(this.resolveAlias(id));
  }

  /** Human-readable type name for diagnostics. */
  typename(ty: TypeId): string {
    return typename(this, ty);
  }
}

/**
 * Interning key. Structural for every kind except aliases, whose identity
 * is their name. Declared aliases bypass the key through `Interner.append`.
 */
function typeKey(ty: IrType): string {
  switch (ty.kind) {
    case "integer":
      return `${ty.signed ? "i" : "u"}${ty.width}`;
    case "float":
      return ty.doublewide ? "f64" : "f32";
    case "bool":
    case "unit":
    case "invalid":
      return ty.kind;
    case "ptr":
      return `*${ty.pointee}`;
    case "array":
      return `[${ty.len}]${ty.element}`;
    case "struct":
      return `{${ty.fields.map((f) => `${f.ty} ${JSON.stringify(f.name)}`).join(",")}}`;
    case "sum":
      return `(${ty.variants.join("|")})`;
    case "fun":
      return `fun(${ty.args.map((a) => `${a.ty} ${JSON.stringify(a.name)}`).join(",")})${ty.returnTy}`;
    case "alias":
      return `alias ${JSON.stringify(ty.name)}`;
  }
}

import type { TypeId } from "./identifiers.ts";

// ─── IR Types ────────────────────────────────────────────────────────────────

/** Union of all IR-level type representations. */
export type IrType =
  | IrIntegerType
  | IrFloatType
  | IrBoolType
  | IrUnitType
  | IrPtrType
  | IrArrayType
  | IrStructType
  | IrSumType
  | IrFunType
  | IrAliasType
  | IrInvalidType;

export type IntegerWidth = 8 | 16 | 32 | 64;

/** Fixed-width integer type. */
export interface IrIntegerType {
  readonly kind: "integer";
  readonly signed: boolean;
  readonly width: IntegerWidth;
}

/** `f32`, or `f64` when `doublewide`. */
export interface IrFloatType {
  readonly kind: "float";
  readonly doublewide: boolean;
}

export interface IrBoolType {
  readonly kind: "bool";
}

/** The unit type `()`, returned by functions with no result. */
export interface IrUnitType {
  readonly kind: "unit";
}

export interface IrPtrType {
  readonly kind: "ptr";
  readonly pointee: TypeId;
}

export interface IrArrayType {
  readonly kind: "array";
  readonly element: TypeId;
  readonly len: number;
}

export interface IrStructField {
  readonly ty: TypeId;
  readonly name: string;
}

/** Anonymous struct: an ordered list of named fields. */
export interface IrStructType {
  readonly kind: "struct";
  readonly fields: readonly IrStructField[];
}

/** Tagged union; the discriminant of a value is the index of its active variant. */
export interface IrSumType {
  readonly kind: "sum";
  readonly variants: readonly TypeId[];
}

export interface IrFunArg {
  readonly ty: TypeId;
  readonly name: string | null;
}

/** Function signature. */
export interface IrFunType {
  readonly kind: "fun";
  readonly args: readonly IrFunArg[];
  readonly returnTy: TypeId;
}

/**
 * A user-declared name for another type. Aliases are nominal: two aliases
 * with the same underlying type are different types. `underlying` is
 * assigned once, when the declaration is resolved.
 */
export interface IrAliasType {
  readonly kind: "alias";
  readonly name: string;
  underlying: TypeId;
}

/** Sentinel given to expressions whose type could not be determined. */
export interface IrInvalidType {
  readonly kind: "invalid";
}

import type { BaseNode } from "./base.ts";

/** A builtin or declared type name, e.g. `i32`, `Point`. */
export interface NamedType extends BaseNode {
  kind: "NamedType";
  name: string;
}

/** The unit type `()`. */
export interface UnitType extends BaseNode {
  kind: "UnitType";
}

/** Pointer type `*T`. */
export interface PtrType extends BaseNode {
  kind: "PtrType";
  pointee: TypeNode;
}

/** Fixed-length array type `[N]T`. */
export interface ArrayType extends BaseNode {
  kind: "ArrayType";
  element: TypeNode;
  length: number;
}

export interface StructFieldNode extends BaseNode {
  kind: "StructField";
  name: string;
  type: TypeNode;
}

/** Anonymous struct type `{i32 x, i32 y}`. */
export interface StructTypeNode extends BaseNode {
  kind: "StructTypeNode";
  fields: StructFieldNode[];
}

/** Tagged union of variant types `i32 | f64 | Point`. */
export interface SumTypeNode extends BaseNode {
  kind: "SumTypeNode";
  variants: TypeNode[];
}

export interface FunTypeArg {
  type: TypeNode;
  name: string | null;
}

/** Function type `fun (i32 a, i32) -> bool`. */
export interface FunTypeNode extends BaseNode {
  kind: "FunTypeNode";
  args: FunTypeArg[];
  returnType: TypeNode;
}

/** Any type annotation in surface syntax. */
export type TypeNode =
  | NamedType
  | UnitType
  | PtrType
  | ArrayType
  | StructTypeNode
  | SumTypeNode
  | FunTypeNode;

import type { BaseNode } from "./base.ts";
import type { Op } from "./operators.ts";
import type { TypeNode } from "./types.ts";

/** Binary operation (`a + b`, `x == y`, `p && q`). */
export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  left: Expression;
  operator: Op;
  right: Expression;
}

/** Unary prefix operation (`-x`, `*p`, `&v`, `~bits`). */
export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  operator: Op;
  operand: Expression;
}

/** Function call. */
export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: Expression;
  args: Expression[];
}

/** Member access (`obj.field`). */
export interface MemberExpr extends BaseNode {
  kind: "MemberExpr";
  object: Expression;
  property: string;
}

/** Indexed access (`arr[i]`, `ptr[i]`). */
export interface IndexExpr extends BaseNode {
  kind: "IndexExpr";
  object: Expression;
  index: Expression;
}

/** Explicit conversion (`x as u8`). */
export interface CastExpr extends BaseNode {
  kind: "CastExpr";
  operand: Expression;
  targetType: TypeNode;
}

/** Parenthesized expression. */
export interface GroupExpr extends BaseNode {
  kind: "GroupExpr";
  expression: Expression;
}

export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

/** Integer literal, optionally suffixed with its type (`255u8`). */
export interface IntLiteral extends BaseNode {
  kind: "IntLiteral";
  value: bigint;
  suffix: { signed: boolean; width: 8 | 16 | 32 | 64 } | null;
}

/** Floating-point literal; `doublewide` is null when unsuffixed. */
export interface FloatLiteral extends BaseNode {
  kind: "FloatLiteral";
  value: number;
  doublewide: boolean | null;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

/** The unit value `()`. */
export interface UnitLiteral extends BaseNode {
  kind: "UnitLiteral";
}

/** Field initializer within a struct literal. */
export interface FieldInit extends BaseNode {
  kind: "FieldInit";
  name: string;
  value: Expression;
}

/** Struct literal (`Point { x: 1, y: 2 }`). */
export interface StructLiteral extends BaseNode {
  kind: "StructLiteral";
  name: string;
  fields: FieldInit[];
}

/** Array literal (`[1, 2, 3]`). */
export interface ArrayLiteral extends BaseNode {
  kind: "ArrayLiteral";
  elements: Expression[];
}

export type Expression =
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | MemberExpr
  | IndexExpr
  | CastExpr
  | GroupExpr
  | Identifier
  | IntLiteral
  | FloatLiteral
  | BoolLiteral
  | UnitLiteral
  | StructLiteral
  | ArrayLiteral;
